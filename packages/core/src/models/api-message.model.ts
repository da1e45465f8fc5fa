/**
 * Envelope returned for deletes, user writes, login/logout and errors.
 *
 * @example
 * { "code": 1, "type": "error", "message": "Pet not found" }
 */
export interface ApiMessage {
	code: number;
	type: string;
	message: string;
}
