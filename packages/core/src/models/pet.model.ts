/**
 * Pet resource as exchanged with `/pet`.
 */

export type PetStatus = "available" | "pending" | "sold" | (string & {});

export interface Category {
	id: number;
	name: string;
}

export interface Tag {
	id: number;
	name: string;
}

export interface Pet {
	id: number;
	name: string;
	category?: Category;
	/** Ordered; the service requires at least one */
	photoUrls: string[];
	tags?: Tag[];
	status?: PetStatus;
}
