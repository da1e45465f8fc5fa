/**
 * Fixtures
 *
 * Builders for the entities the suites create. Ids and names are random
 * per call so that runs against a shared service do not collide.
 */

import { formatShipDate, type Order, type Pet, type User } from "petprobe";

function randomInt(min: number, max: number): number {
	return Math.floor(Math.random() * (max - min + 1)) + min;
}

let sequence = 0;

/**
 * Millisecond timestamp plus a per-process counter, unique within a run
 */
export function uniqueSuffix(): string {
	sequence += 1;
	return `${Date.now()}_${sequence}`;
}

export function randomPetId(): number {
	return randomInt(1_000_000, 99_999_999);
}

export function randomOrderId(): number {
	return randomInt(1_000_000, 99_999_999);
}

export function randomUserId(): number {
	return randomInt(1_000_000, 1_000_999_999);
}

export function buildPet(overrides: Partial<Pet> = {}): Pet {
	return {
		id: randomPetId(),
		name: `TestPet_${uniqueSuffix()}`,
		category: { id: 1, name: "Dogs" },
		photoUrls: ["http://example.com/photo1.jpg", "http://example.com/photo2.jpg"],
		tags: [
			{ id: 10, name: "Friendly" },
			{ id: 11, name: "Cute" },
		],
		status: "available",
		...overrides,
	};
}

export function buildUser(overrides: Partial<User> = {}): User {
	const suffix = uniqueSuffix();
	return {
		id: randomUserId(),
		username: `testuser_${suffix}`,
		firstName: "John",
		lastName: "Doe",
		email: `email_${suffix}@test.com`,
		password: "test-secret",
		phone: "123-456-7890",
		userStatus: 1,
		...overrides,
	};
}

export function buildOrder(petId: number, overrides: Partial<Order> = {}): Order {
	return {
		id: randomOrderId(),
		petId,
		quantity: 1,
		shipDate: formatShipDate(new Date()),
		status: "placed",
		complete: false,
		...overrides,
	};
}
