import type { HttpMethod } from "../protocols/http/http.types";

/**
 * One exchange with the service. `pending` until its response is read,
 * `failed` when no usable response came back (refused connection, body
 * that is not JSON).
 */
export interface Interaction {
	/** `#1`, `#2`, ... in the order the requests were sent through one recorder */
	id: string;
	method: HttpMethod;
	url: string;
	requestPayload?: unknown;
	/** Epoch milliseconds */
	sentAt: number;
	status: "pending" | "completed" | "failed";
	responseStatus?: number;
	responsePayload?: unknown;
	error?: string;
	duration?: number;
}

export type InteractionStatus = Interaction["status"];

export type RecordedRequest = Pick<Interaction, "method" | "url" | "requestPayload">;

/**
 * Settles the interaction `begin` opened. Only the first call counts.
 */
export interface InteractionHandle {
	readonly id: string;
	respond(responseStatus: number, responsePayload?: unknown): void;
	fail(error: string): void;
}

/** Every given field must match; a string `url` must match exactly */
export interface InteractionQuery {
	method?: HttpMethod;
	url?: string | RegExp;
	status?: InteractionStatus;
	responseStatus?: number;
}
