/**
 * User resource as exchanged with `/user`.
 */
export interface User {
	id: number;
	/** Path key; the service does not enforce uniqueness or format */
	username: string;
	firstName?: string;
	lastName?: string;
	email?: string;
	password?: string;
	phone?: string;
	userStatus?: number;
}
