/**
 * Known Defects
 *
 * Checks for places where the service answers 200 although a client
 * error is due. Each case asserts the correct behavior and is skipped,
 * with the observed behavior as the skip reason, so it shows up in every
 * report and can be enabled once the service is fixed.
 */

import {
	assertBody,
	assertResponse,
	expectStatus,
	type Pet,
	type TestCase,
	testCase,
} from "petprobe";
import type { SuiteClients } from "./support/clients";
import { buildPet, buildUser, randomPetId, uniqueSuffix } from "./support/fixtures";

const MISSING_CREDENTIALS = "Missing required parameters: username and/or password";

export function knownDefectsSuite({ pets, users }: SuiteClients): TestCase[] {
	return [
		testCase("Updating an unknown user answers 404", async ({ step }) => {
			const username = `nonexistent_user_${uniqueSuffix()}`;
			const response = await step(`update user ${username}`, () =>
				users.updateUserRaw({ username, firstName: "Non-Existent" }),
			);
			await step("verify error", () => {
				assertResponse(response, expectStatus(404));
				assertBody(response, { message: "User not found" });
			});
		})
			.feature("User")
			.tags("known-defect")
			.skip("service answers 200 with an id in `message`"),

		testCase("Creating a user with an empty username answers 400", async (context) => {
			const user = buildUser({ username: "" });
			const response = await context.step("create user", () => users.createUserRaw(user));
			await context.step("verify status", () => {
				assertResponse(response, expectStatus(400));
			});
		})
			.feature("User")
			.tags("known-defect")
			.skip("service accepts the empty username with 200"),

		testCase("Creating a user with an invalid email answers 400", async (context) => {
			const created = context.ledger("user", (username: string) => users.deleteUserRaw(username));
			const user = buildUser({ email: "invalid-email" });
			created.track(user.username);

			const response = await context.step("create user", () => users.createUserRaw(user));
			await context.step("verify status", () => {
				assertResponse(response, expectStatus(400));
			});
		})
			.feature("User")
			.tags("known-defect")
			.skip("service accepts any email string with 200"),

		testCase("Logging in without a username answers 400", async ({ step }) => {
			const response = await step("log in without username", () =>
				users.loginUserExpectingStatus(undefined, "test-secret", 400),
			);
			await step("verify message", () => {
				assertBody(response, { message: MISSING_CREDENTIALS });
			});
		})
			.feature("User")
			.tags("known-defect")
			.skip("service answers 200 with a session message"),

		testCase("Logging in without a password answers 400", async ({ step }) => {
			const response = await step("log in without password", () =>
				users.loginUserExpectingStatus("some_user", undefined, 400),
			);
			await step("verify message", () => {
				assertBody(response, { message: MISSING_CREDENTIALS });
			});
		})
			.feature("User")
			.tags("known-defect")
			.skip("service answers 200 with a session message"),

		testCase("Updating an unknown pet answers 404", async (context) => {
			const created = context.ledger("pet", (id: number) => pets.deletePetRaw(id));
			const pet = buildPet({ id: randomPetId() });
			created.track(pet.id);

			const response = await context.step(`update pet ${pet.id}`, () => pets.updatePetRaw(pet));
			await context.step("verify status", () => {
				assertResponse(response, expectStatus(404));
			});
		})
			.feature("Pet")
			.tags("known-defect")
			.skip("service answers 200 and creates the pet"),

		testCase("Creating a pet without a name answers 400", async (context) => {
			const created = context.ledger("pet", (id: number) => pets.deletePetRaw(id));
			const pet = buildPet();
			const nameless: Partial<Pet> = { ...pet, name: undefined };
			created.track(pet.id);

			const response = await context.step("create pet without name", () => pets.addPetRaw(nameless));
			await context.step("verify status", () => {
				assertResponse(response, expectStatus(400));
			});
		})
			.feature("Pet")
			.tags("known-defect")
			.skip("service accepts a pet without `name` with 200"),

		testCase("Creating a pet without photo URLs answers 400", async (context) => {
			const created = context.ledger("pet", (id: number) => pets.deletePetRaw(id));
			const pet = buildPet();
			const photoless: Partial<Pet> = { ...pet, photoUrls: undefined };
			created.track(pet.id);

			const response = await context.step("create pet without photoUrls", () => pets.addPetRaw(photoless));
			await context.step("verify status", () => {
				assertResponse(response, expectStatus(400));
			});
		})
			.feature("Pet")
			.tags("known-defect")
			.skip("service accepts a pet without `photoUrls` with 200"),
	];
}
