/**
 * User Suite
 *
 * User CRUD, login/logout and batch creation.
 */

import { assertBody, assertResponse, expectStatus, type TestCase, testCase, type User } from "petprobe";
import type { SuiteClients } from "./support/clients";
import { buildUser, uniqueSuffix } from "./support/fixtures";
import { createUser } from "./support/steps";

export function userSuite({ users }: SuiteClients): TestCase[] {
	const batch = (count: number): User[] => Array.from({ length: count }, () => buildUser());

	return [
		testCase("Create a user and read it back by username", async (context) => {
			const user = await createUser(context, users);

			const response = await context.step(`read user ${user.username}`, () => users.getUserByUsername(user.username));
			await context.step("verify stored fields", () => {
				assertBody(response, {
					id: user.id,
					username: user.username,
					firstName: user.firstName,
					lastName: user.lastName,
					email: user.email,
					phone: user.phone,
					userStatus: user.userStatus,
				});
			});
		})
			.epic("Pet Store")
			.feature("User")
			.tags("smoke")
			.severity("critical"),

		testCase("Update a user and wait for the change", async (context) => {
			const user = await createUser(context, users);
			const updated: User = {
				...user,
				firstName: "Kate",
				email: `updated_${uniqueSuffix()}@example.com`,
				phone: "987-654-3210",
			};

			await context.step(`update user ${user.username}`, () => users.updateUser(updated));

			const response = await context.step(`wait for user ${user.username} to reflect the update`, () =>
				users.waitForUserUpdate(user.username, {
					firstName: updated.firstName,
					email: updated.email,
					phone: updated.phone,
				}),
			);
			await context.step("verify stored fields", () => {
				assertBody(response, { firstName: updated.firstName, email: updated.email, phone: updated.phone });
			});
		})
			.epic("Pet Store")
			.feature("User")
			.tags("smoke"),

		testCase("Delete a user and confirm it is gone", async (context) => {
			const user = await createUser(context, users);

			await context.step(`read user ${user.username}`, () => users.getUserByUsername(user.username));
			await context.step(`delete user ${user.username}`, () => users.deleteUser(user.username));
			const missing = await context.step(`wait for user ${user.username} to report 404`, () =>
				users.getUserByUsernameExpectingError(user.username),
			);
			await context.step("verify error message", () => {
				assertBody(missing, { message: "User not found" });
			});
		})
			.epic("Pet Store")
			.feature("User")
			.tags("smoke"),

		testCase("Reading an unknown user answers 404", async ({ step }) => {
			const username = `nonexistent_user_${uniqueSuffix()}`;
			const response = await step(`read user ${username}`, () => users.getUserByUsernameRaw(username));
			await step("verify error", () => {
				assertResponse(response, expectStatus(404));
				assertBody(response, { message: "User not found" });
			});
		})
			.epic("Pet Store")
			.feature("User")
			.tags("regression"),

		testCase("Deleting an unknown user answers 404", async ({ step }) => {
			const username = `nonexistent_user_${uniqueSuffix()}`;
			const response = await step(`delete user ${username}`, () => users.deleteUserRaw(username));
			await step("verify status", () => {
				assertResponse(response, expectStatus(404));
			});
		})
			.epic("Pet Store")
			.feature("User")
			.tags("regression"),

		testCase("Log a user in and out", async (context) => {
			const user = await createUser(context, users);

			await context.step(`log in as ${user.username}`, () => users.loginUser(user.username, user.password ?? ""));
			await context.step("log out", () => users.logoutUser());
		})
			.epic("Pet Store")
			.feature("User")
			.tags("smoke"),

		testCase("Create users with an array", async (context) => {
			const created = context.ledger("user", (username: string) => users.deleteUserRaw(username));
			const list = batch(3);
			for (const user of list) {
				created.track(user.username);
			}

			await context.step("create users with array", () => users.createUsersWithArray(list));
			for (const user of list) {
				await context.step(`read user ${user.username}`, () => users.getUserByUsername(user.username));
			}
		})
			.epic("Pet Store")
			.feature("User")
			.tags("regression"),

		testCase("Create users with a list", async (context) => {
			const created = context.ledger("user", (username: string) => users.deleteUserRaw(username));
			const list = batch(3);
			for (const user of list) {
				created.track(user.username);
			}

			await context.step("create users with list", () => users.createUsersWithList(list));
			for (const user of list) {
				await context.step(`read user ${user.username}`, () => users.getUserByUsername(user.username));
			}
		})
			.epic("Pet Store")
			.feature("User")
			.tags("regression"),
	];
}
