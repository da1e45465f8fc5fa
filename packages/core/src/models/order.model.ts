/**
 * Order resource as exchanged with `/store/order`.
 */

export type OrderStatus = "placed" | "approved" | "delivered" | (string & {});

export interface Order {
	id: number;
	/** Not checked against `/pet` by the service */
	petId: number;
	quantity: number;
	/** `yyyy-MM-dd'T'HH:mm:ss.SSS+0000` */
	shipDate?: string;
	status?: OrderStatus;
	complete?: boolean;
}

/**
 * Pet counts keyed by pet status.
 */
export type Inventory = Record<string, number>;

/**
 * Render a ship date in UTC with millisecond precision and an explicit
 * `+0000` offset, the form the service echoes back unchanged.
 */
export function formatShipDate(date: Date): string {
	return date.toISOString().replace("Z", "+0000");
}
