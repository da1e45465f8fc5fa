/**
 * Pet Suite
 *
 * Health check, create/read round trip, update, delete and the 404 for
 * an unknown pet.
 */

import {
	assertBody,
	assertBodyMatches,
	containsInAnyOrder,
	hasItem,
	hasSize,
	type TestCase,
	testCase,
} from "petprobe";
import type { SuiteClients } from "./support/clients";
import { createPet } from "./support/steps";

const NON_EXISTENT_PET_ID = -1;

export function petSuite({ pets }: SuiteClients): TestCase[] {
	return [
		testCase("Service is up and lists available pets", async ({ step }) => {
			await step("find pets by status available", () => pets.getPetsByStatus("available"));
		})
			.epic("Pet Store")
			.feature("Pet")
			.tags("smoke")
			.severity("blocker")
			.description("GET /pet/findByStatus answers 200 JSON for `available`."),

		testCase("Create a pet and read it back by id", async (context) => {
			const pet = await createPet(context, pets);

			const response = await context.step(`read pet ${pet.id}`, () => pets.getPetById(pet.id));
			await context.step("verify stored fields", () => {
				assertBody(response, {
					id: pet.id,
					name: pet.name,
					"category.name": pet.category?.name,
					status: "available",
				});
				assertBodyMatches(response, "photoUrls", hasSize(pet.photoUrls.length));
				assertBodyMatches(response, "tags.id", containsInAnyOrder((pet.tags ?? []).map((tag) => tag.id)));
				assertBodyMatches(response, "tags.name", containsInAnyOrder((pet.tags ?? []).map((tag) => tag.name)));
			});
		})
			.epic("Pet Store")
			.feature("Pet")
			.tags("smoke")
			.severity("critical"),

		testCase("Update a pet and verify the change", async (context) => {
			const pet = await createPet(context, pets);
			const updated = {
				...pet,
				name: `UpdatedBuddy_${Date.now()}`,
				status: "sold",
				tags: [...(pet.tags ?? []), { id: 12, name: "Loyal" }],
			};

			const response = await context.step(`update pet ${pet.id}`, () => pets.updatePet(updated));
			await context.step("verify update response", () => {
				assertBody(response, {
					id: updated.id,
					name: updated.name,
					status: updated.status,
					"tags.size()": updated.tags.length,
				});
				assertBodyMatches(response, "tags.name", hasItem("Loyal"));
			});

			const reread = await context.step(`wait for pet ${pet.id} to reflect the update`, () =>
				pets.waitForPet(pet.id, (current) => current.name === updated.name && current.status === updated.status),
			);
			await context.step("verify stored fields", () => {
				assertBody(reread, { name: updated.name, status: updated.status });
				assertBodyMatches(reread, "tags.name", hasItem("Loyal"));
			});
		})
			.epic("Pet Store")
			.feature("Pet")
			.tags("smoke"),

		testCase("Delete a pet and confirm it is gone", async (context) => {
			const pet = await createPet(context, pets);

			await context.step(`read pet ${pet.id}`, () => pets.getPetById(pet.id));
			const deleted = await context.step(`delete pet ${pet.id}`, () => pets.deletePet(pet.id));
			await context.step("verify delete response", () => {
				assertBody(deleted, { code: 200, message: String(pet.id) });
			});

			const missing = await context.step(`wait for pet ${pet.id} to report 404`, () =>
				pets.getPetByIdExpectingError(pet.id),
			);
			await context.step("verify error message", () => {
				assertBody(missing, { message: "Pet not found" });
			});
		})
			.epic("Pet Store")
			.feature("Pet")
			.tags("smoke"),

		testCase("Reading an unknown pet answers 404", async ({ step }) => {
			const response = await step(`read pet ${NON_EXISTENT_PET_ID}`, () =>
				pets.getPetByIdExpectingError(NON_EXISTENT_PET_ID),
			);
			await step("verify error message", () => {
				assertBody(response, { message: "Pet not found" });
			});
		})
			.epic("Pet Store")
			.feature("Pet")
			.tags("regression"),
	];
}
