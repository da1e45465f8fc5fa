/**
 * Store Suite
 *
 * Order lifecycle, order 404s and the inventory count.
 */

import { assertBody, assertResponse, expectStatus, type TestCase, testCase } from "petprobe";
import type { SuiteClients } from "./support/clients";
import { buildOrder, uniqueSuffix } from "./support/fixtures";
import { createPet } from "./support/steps";

const NON_EXISTENT_ORDER_ID = -1;

export function storeSuite({ pets, store }: SuiteClients): TestCase[] {
	return [
		testCase("Place, read and delete an order for an existing pet", async (context) => {
			const pet = await createPet(context, pets);
			const orders = context.ledger("order", (id: number) => store.deleteOrderRaw(id));
			const order = buildOrder(pet.id);

			const placed = await context.step(`place order ${order.id} for pet ${pet.id}`, () => {
				orders.track(order.id);
				return store.placeOrder(order);
			});
			await context.step("verify placed order", () => {
				assertBody(placed, {
					id: order.id,
					petId: pet.id,
					status: order.status,
					quantity: order.quantity,
					shipDate: order.shipDate,
					complete: order.complete,
				});
			});

			const read = await context.step(`read order ${order.id} and verify pet id`, () =>
				store.getOrderByIdAndVerifyPetId(order.id, pet.id),
			);
			await context.step("verify stored order", () => {
				assertBody(read, { id: order.id, petId: pet.id });
			});

			const deleted = await context.step(`delete order ${order.id}`, () => store.deleteOrder(order.id));
			orders.release(order.id);
			await context.step("verify delete response", () => {
				assertBody(deleted, { code: 200, message: String(order.id) });
			});
		})
			.epic("Pet Store")
			.feature("Store")
			.tags("regression")
			.severity("critical")
			.description("Full order lifecycle: place, read back, delete."),

		testCase("Reading an unknown order answers 404", async ({ step }) => {
			const response = await step(`read order ${NON_EXISTENT_ORDER_ID}`, () =>
				store.getOrderByIdRaw(NON_EXISTENT_ORDER_ID),
			);
			await step("verify error", () => {
				assertResponse(response, expectStatus(404));
				assertBody(response, { code: 1, type: "error", message: "Order not found" });
			});
		})
			.epic("Pet Store")
			.feature("Store")
			.tags("regression"),

		testCase("Deleting an unknown order answers 404", async ({ step }) => {
			const response = await step(`delete order ${NON_EXISTENT_ORDER_ID}`, () =>
				store.deleteOrderRaw(NON_EXISTENT_ORDER_ID),
			);
			await step("verify error", () => {
				assertResponse(response, expectStatus(404));
				assertBody(response, { code: 404, type: "unknown", message: "Order Not Found" });
			});
		})
			.epic("Pet Store")
			.feature("Store")
			.tags("regression"),

		testCase("Inventory counts a new pet under its status", async (context) => {
			const status = `test-status-${uniqueSuffix()}`;

			const initial = await context.step("read inventory", () => store.getInventory());
			const before = initial.body?.[status] ?? 0;

			await createPet(context, pets, { status });

			await context.step(`wait for inventory count of ${status} to reach ${before + 1}`, () =>
				store.getInventoryAndVerifyStatusCount(status, before + 1),
			);
		})
			.epic("Pet Store")
			.feature("Store")
			.tags("regression")
			.description("A fresh status string starts at zero, so one new pet must count as one."),
	];
}
