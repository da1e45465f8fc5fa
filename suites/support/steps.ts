/**
 * Shared Steps
 *
 * Entity setup used by more than one suite. Each registers what it
 * created in a cleanup ledger of the running test case.
 */

import type { Pet, PetClient, TestContext, User, UserClient } from "petprobe";
import { assertBody } from "petprobe";
import { buildPet, buildUser } from "./fixtures";

/**
 * Create a pet and track it for cleanup. The service may assign a
 * different id than the one submitted; the returned pet carries the one
 * it answered with.
 */
export async function createPet(context: TestContext, pets: PetClient, overrides: Partial<Pet> = {}): Promise<Pet> {
	const created = context.ledger("pet", (id: number) => pets.deletePetRaw(id));
	const pet = buildPet(overrides);

	const response = await context.step(`create pet ${pet.id}`, () => pets.addPet(pet));
	const assignedId = response.body?.id ?? pet.id;
	if (assignedId !== pet.id) {
		context.log.warn(`service changed pet id from ${pet.id} to ${assignedId}`);
	}

	created.track(assignedId);
	return { ...pet, id: assignedId };
}

/**
 * Create a user, check the service echoed its id, and track it for cleanup.
 */
export async function createUser(
	context: TestContext,
	users: UserClient,
	overrides: Partial<User> = {},
): Promise<User> {
	const created = context.ledger("user", (username: string) => users.deleteUserRaw(username));
	const user = buildUser(overrides);

	await context.step(`create user ${user.username}`, async () =>
		assertBody(await users.createUser(user), { message: String(user.id) }),
	);

	created.track(user.username);
	return user;
}
