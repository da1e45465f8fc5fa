/**
 * Resource Clients Integration Tests
 *
 * Real HTTP against the in-process fake pet store, whose writes become
 * readable only after a lag.
 */

import { type AwaitPolicies, AwaitTimeoutError, type PetprobeClients, createClients } from "petprobe";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type FakePetStore, startFakePetStore } from "../helpers/fake-petstore";

const LAG_MS = 150;

const policy = { atMost: 2_000, pollInterval: 10 };
const policies: AwaitPolicies = {
	read: policy,
	update: policy,
	delete: policy,
	absence: policy,
	convergence: policy,
	inventory: policy,
};

const rex = {
	id: 12345,
	name: "Rex",
	photoUrls: ["http://x/a.jpg"],
	status: "available",
};

describe("resource clients against a lagging store", () => {
	let store: FakePetStore;
	let clients: PetprobeClients;

	beforeEach(async () => {
		store = await startFakePetStore({ lagMs: LAG_MS });
		clients = createClients({ baseUrl: store.baseUrl, logLevel: "silent", policies });
	});

	afterEach(async () => {
		await store.close();
	});

	describe("pets", () => {
		it("should read a created pet once it is visible", async () => {
			const created = await clients.pets.addPet(rex);
			expect(created.body).toEqual(rex);

			const read = await clients.pets.getPetById(12345);
			expect(read.code).toBe(200);
			expect(read.body).toMatchObject({ name: "Rex", status: "available" });
			expect(store.count("GET", "/pet/12345")).toBeGreaterThan(1);
		});

		it("should see a deleted pet disappear", async () => {
			await clients.pets.addPet(rex);
			await clients.pets.getPetById(12345);

			const deleted = await clients.pets.deletePet(12345);
			expect(deleted.body).toMatchObject({ code: 200, message: "12345" });

			const gone = await clients.pets.getPetByIdExpectingError(12345);
			expect(gone.code).toBe(404);
			expect(gone.body).toMatchObject({ message: "Pet not found" });
		});

		it("should retry a delete until the pet is visible", async () => {
			await clients.pets.addPet(rex);

			const deleted = await clients.pets.deletePet(12345);

			expect(deleted.code).toBe(200);
			expect(store.count("DELETE", "/pet/12345")).toBeGreaterThan(1);
		});

		it("should converge on an update", async () => {
			await clients.pets.addPet(rex);
			await clients.pets.getPetById(12345);

			await clients.pets.updatePet({ ...rex, name: "Max", status: "sold" });
			const updated = await clients.pets.waitForPet(12345, (p) => p.name === "Max" && p.status === "sold");

			expect(updated.body?.name).toBe("Max");
		});

		it("should find pets by status", async () => {
			await clients.pets.addPet({ ...rex, status: "pending" });
			await clients.pets.getPetById(12345);

			const found = await clients.pets.getPetsByStatus("pending");

			expect(found.body?.map((p) => p.id)).toEqual([12345]);
		});

		it("should time out waiting for a pet that never appears", async () => {
			clients = createClients({
				baseUrl: store.baseUrl,
				logLevel: "silent",
				policies: { ...policies, read: { atMost: 100, pollInterval: 20 } },
			});

			const error = await clients.pets.getPetById(99).catch((e: unknown) => e);

			expect(error).toBeInstanceOf(AwaitTimeoutError);
			expect(error).toMatchObject({ description: "pet 99 readable" });
		});
	});

	describe("orders", () => {
		const order = { id: 77, petId: 12345, quantity: 1, status: "placed", complete: false };

		it("should place, verify and delete an order", async () => {
			const placed = await clients.store.placeOrder(order);
			expect(placed.body).toEqual(order);

			const read = await clients.store.getOrderByIdAndVerifyPetId(77, 12345);
			expect(read.body?.petId).toBe(12345);

			const deleted = await clients.store.deleteOrder(77);
			expect(deleted.code).toBe(200);
			expect(deleted.body?.message).toBe("77");

			const gone = await clients.store.getOrderByIdExpectingError(77);
			expect(gone.body).toEqual({ code: 1, type: "error", message: "Order not found" });
		});

		it("should report deleting an unknown order", async () => {
			const response = await clients.store.deleteOrderRaw(404404);

			expect(response.code).toBe(404);
			expect(response.body).toEqual({ code: 404, type: "unknown", message: "Order Not Found" });
		});

		it("should count pets in the inventory once visible", async () => {
			await clients.pets.addPet({ ...rex, status: "inventory-check" });

			const inventory = await clients.store.getInventoryAndVerifyStatusCount("inventory-check", 1);

			expect(inventory.body?.["inventory-check"]).toBe(1);
		});
	});

	describe("users", () => {
		const jdoe = { id: 7, username: "jdoe", firstName: "John", lastName: "Doe", password: "test-secret" };

		it("should create, update and delete a user", async () => {
			const created = await clients.users.createUser(jdoe);
			expect(created.body?.message).toBe("7");

			await clients.users.getUserByUsername("jdoe");
			await clients.users.updateUser({ ...jdoe, firstName: "Jane" });
			const updated = await clients.users.waitForUserUpdate("jdoe", { firstName: "Jane" });
			expect(updated.body?.lastName).toBe("Doe");

			await clients.users.deleteUser("jdoe");
			const gone = await clients.users.getUserByUsernameExpectingError("jdoe");
			expect(gone.body?.message).toBe("User not found");
		});

		it("should create users in batches", async () => {
			await clients.users.createUsersWithArray([jdoe, { ...jdoe, id: 8, username: "asmith" }]);

			const read = await clients.users.getUserByUsername("asmith");

			expect(read.body?.id).toBe(8);
		});

		it("should log in and out", async () => {
			const login = await clients.users.loginUser("jdoe", "test-secret");
			expect(login.body?.message).toMatch(/^logged in user session:\d+$/);

			const logout = await clients.users.logoutUser();
			expect(logout.body?.message).toBe("ok");
		});

		it("should answer an empty 404 for deleting an unknown user", async () => {
			const response = await clients.users.deleteUserRaw("nobody-here");

			expect(response.code).toBe(404);
			expect(response.text).toBe("");
		});
	});

	it("should record every exchange", async () => {
		await clients.pets.addPet(rex);
		await clients.pets.getPetByIdRaw(12345);

		expect(clients.recorder.list().map((i) => `${i.method} ${i.url} ${i.status}`)).toEqual([
			`POST ${store.baseUrl}/pet completed`,
			`GET ${store.baseUrl}/pet/12345 completed`,
		]);
		expect(store.requests).toHaveLength(2);
	});
});
