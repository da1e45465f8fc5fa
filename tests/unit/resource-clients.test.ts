/**
 * Resource Client Tests
 *
 * Pet, user and store clients against a queued fetch stand-in, with
 * millisecond policies so polling finishes at once.
 */

import {
	type AwaitPolicies,
	AwaitTimeoutError,
	ConsoleLogger,
	ContractViolationError,
	DEFAULT_AWAIT_POLICIES,
	LOGIN_MESSAGE_PREFIX,
	type Logger,
	TransportError,
	createClients,
	loadConfig,
} from "petprobe";
import { afterEach, describe, expect, it, vi } from "vitest";
import { empty, json, queuedFetch } from "../helpers/responses";

const fast = { atMost: 200, pollInterval: 1 };
const policies: AwaitPolicies = {
	read: fast,
	update: fast,
	delete: fast,
	absence: fast,
	convergence: fast,
	inventory: fast,
};

const BASE_URL = "http://petstore.test/v2";

function clientsAnswering(...answers: (() => Response)[]) {
	const { fetch, calls } = queuedFetch(...answers);
	const clients = createClients({ baseUrl: BASE_URL, logLevel: "silent", policies }, { fetch });
	return { ...clients, calls };
}

const pet = { id: 42, name: "Rex", photoUrls: ["https://example.com/rex.png"], status: "available" };
const notFound = json(404, { code: 1, type: "error", message: "Pet not found" });

describe("createClients", () => {
	it("should hand the configured policies to every client", () => {
		const { pets, users, store } = clientsAnswering(json(200, {}));

		expect(pets.policy("read")).toEqual(fast);
		expect(users.policy("convergence")).toEqual(fast);
		expect(store.policy("inventory")).toEqual(fast);
	});

	it("should give every client its own copy of the policies", () => {
		const read = { atMost: 200, pollInterval: 1 };
		const { pets, users } = createClients(
			{ baseUrl: BASE_URL, logLevel: "silent", policies: { ...policies, read } },
			{ fetch: queuedFetch(json(200, {})).fetch },
		);

		read.atMost = 5;

		expect(pets.policy("read")).toEqual({ atMost: 200, pollInterval: 1 });
		expect(pets.policy("read")).not.toBe(users.policy("read"));
		expect(Object.isFrozen(pets.policy("read"))).toBe(true);
	});

	it("should not hand out the default policy objects", () => {
		const first = createClients({ baseUrl: BASE_URL, logLevel: "silent", policies: DEFAULT_AWAIT_POLICIES });
		const second = createClients(loadConfig({}));

		expect(first.pets.policy("read")).not.toBe(DEFAULT_AWAIT_POLICIES.read);
		expect(second.pets.policy("read")).not.toBe(first.pets.policy("read"));
		expect(DEFAULT_AWAIT_POLICIES.read).toEqual({ atMost: 20_000, pollInterval: 1_000 });
	});

	describe("logging", () => {
		afterEach(() => {
			vi.restoreAllMocks();
		});

		it("should log exchanges under an http scope", async () => {
			const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
			const { pets } = createClients(
				{ baseUrl: BASE_URL, logLevel: "debug", policies },
				{ logger: new ConsoleLogger({ level: "debug" }), fetch: queuedFetch(empty(404)).fetch },
			);

			await pets.getPetByIdRaw(42);

			expect(debug).toHaveBeenCalledWith(`[petprobe] [http] --> GET ${BASE_URL}/pet/42`);
		});

		it("should log through a logger without scopes as is", async () => {
			const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
			const { pets } = createClients(
				{ baseUrl: BASE_URL, logLevel: "debug", policies },
				{ logger, fetch: queuedFetch(empty(404)).fetch },
			);

			await pets.getPetByIdRaw(42);

			expect(logger.debug).toHaveBeenCalledWith(`--> GET ${BASE_URL}/pet/42`, undefined);
		});
	});

	it("should fall back to the default policies", () => {
		const { pets } = createClients({ baseUrl: BASE_URL, logLevel: "silent", policies: DEFAULT_AWAIT_POLICIES });

		expect(pets.policy("read")).toEqual({ atMost: 20_000, pollInterval: 1_000 });
	});
});

describe("PetClient", () => {
	it("should poll a read until it answers 200", async () => {
		const { pets, calls } = clientsAnswering(notFound, notFound, json(200, pet));

		const response = await pets.getPetById(42);

		expect(response.body).toEqual(pet);
		expect(calls).toHaveLength(3);
		expect(calls.every((c) => c.url === `${BASE_URL}/pet/42`)).toBe(true);
	});

	it("should time out when the pet never disappears", async () => {
		const { pets } = clientsAnswering(json(200, pet));

		const error = await pets.getPetByIdExpectingError(42).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(AwaitTimeoutError);
		expect(error).toMatchObject({ description: "pet 42 absent", lastObservation: { code: 200 } });
		expect(String(error)).toContain(`last observed: status 200, body ${JSON.stringify(pet)}`);
	});

	it("should stop polling on a transport error", async () => {
		const { pets, calls } = clientsAnswering(notFound, () => {
			throw new TypeError("fetch failed");
		});

		await expect(pets.getPetById(42)).rejects.toBeInstanceOf(TransportError);
		expect(calls).toHaveLength(2);
	});

	it("should assert a create answered 200 JSON", async () => {
		const { pets } = clientsAnswering(json(500, { code: 500, type: "unknown", message: "something bad happened" }));

		await expect(pets.addPet(pet)).rejects.toBeInstanceOf(ContractViolationError);
	});

	it("should wait for a field to converge", async () => {
		const { pets, calls } = clientsAnswering(json(200, pet), json(200, { ...pet, name: "Max" }));

		const response = await pets.waitForPet(42, (p) => p.name === "Max");

		expect(response.body?.name).toBe("Max");
		expect(calls).toHaveLength(2);
	});

	it("should return a raw delete of a missing pet as is", async () => {
		const { pets } = clientsAnswering(empty(404));

		const response = await pets.deletePetRaw(42);

		expect(response.code).toBe(404);
		expect(response.body).toBeUndefined();
	});

	it("should query pets by status", async () => {
		const { pets, calls } = clientsAnswering(json(200, [pet]));

		await pets.getPetsByStatus("available");

		expect(calls[0].url).toBe(`${BASE_URL}/pet/findByStatus?status=available`);
	});
});

describe("UserClient", () => {
	it("should log in with credentials in the query", async () => {
		const { users, calls } = clientsAnswering(
			json(200, { code: 200, type: "unknown", message: `${LOGIN_MESSAGE_PREFIX}1700000000000` }),
		);

		await users.loginUser("jdoe", "test-secret");

		expect(calls[0].url).toBe(`${BASE_URL}/user/login?username=jdoe&password=test-secret`);
	});

	it("should reject a login without a session message", async () => {
		const { users } = clientsAnswering(json(200, { code: 200, type: "unknown", message: "welcome" }));

		await expect(users.loginUser("jdoe", "test-secret")).rejects.toThrow(
			`expected message to start with "${LOGIN_MESSAGE_PREFIX}" but was "welcome"`,
		);
	});

	it("should leave out missing credentials", async () => {
		const { users, calls } = clientsAnswering(json(400, { code: 400, type: "unknown", message: "bad" }));

		const response = await users.loginUserExpectingStatus(undefined, "test-secret", 400);

		expect(response.code).toBe(400);
		expect(calls[0].url).toBe(`${BASE_URL}/user/login?password=test-secret`);
	});

	it("should expect ok on logout", async () => {
		const { users } = clientsAnswering(json(200, { code: 200, type: "unknown", message: "ok" }));

		await expect(users.logoutUser()).resolves.toMatchObject({ code: 200 });
	});

	it("should wait until every expected field matches", async () => {
		const user = { id: 7, username: "jdoe", firstName: "John", lastName: "Doe" };
		const { users, calls } = clientsAnswering(
			json(200, user),
			json(200, { ...user, firstName: "Jane" }),
			json(200, { ...user, firstName: "Jane", lastName: "Roe" }),
		);

		await users.waitForUserUpdate("jdoe", { firstName: "Jane", lastName: "Roe" });

		expect(calls).toHaveLength(3);
	});

	it("should honour an explicit convergence timeout", async () => {
		const { users } = clientsAnswering(json(200, { id: 7, username: "jdoe", firstName: "John" }));

		await expect(users.waitForUserUpdate("jdoe", { firstName: "Jane" }, 0)).rejects.toMatchObject({
			name: "AwaitTimeoutError",
			attempts: 1,
			timeout: 0,
		});
	});

	it("should address users by encoded username", async () => {
		const { users, calls } = clientsAnswering(json(200, { code: 200, type: "unknown", message: "7" }));

		await users.updateUser({ id: 7, username: "j doe", firstName: "Jane" });

		expect(calls[0].url).toBe(`${BASE_URL}/user/j%20doe`);
		expect(calls[0].init.method).toBe("PUT");
		expect(calls[0].init.body).toBe('{"id":7,"username":"j doe","firstName":"Jane"}');
	});
});

describe("StoreClient", () => {
	const order = { id: 7, petId: 42, quantity: 1, status: "placed", complete: false };

	const orderNotFound = json(404, { code: 1, type: "error", message: "Order not found" });

	it("should poll an order read until it answers 200", async () => {
		const { store, calls } = clientsAnswering(orderNotFound, orderNotFound, json(200, order));

		const response = await store.getOrderById(7);

		expect(response.body).toEqual(order);
		expect(calls.map((c) => `${c.init.method} ${c.url}`)).toEqual([
			`GET ${BASE_URL}/store/order/7`,
			`GET ${BASE_URL}/store/order/7`,
			`GET ${BASE_URL}/store/order/7`,
		]);
	});

	it("should time out reading an order that never appears", async () => {
		const { store } = clientsAnswering(orderNotFound);

		const error = await store.getOrderById(7).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(AwaitTimeoutError);
		expect(error).toMatchObject({ description: "order 7 readable", lastObservation: { code: 404 } });
	});

	it("should return a rejected raw order as is", async () => {
		const invalid = json(400, { code: 400, type: "unknown", message: "bad input" });
		const { store, calls } = clientsAnswering(invalid);

		const response = await store.placeOrderRaw({ id: 7, quantity: -1 });

		expect(response.code).toBe(400);
		expect(response.body).toEqual({ code: 400, type: "unknown", message: "bad input" });
		expect(calls).toHaveLength(1);
		expect(calls[0].init.body).toBe(JSON.stringify({ id: 7, quantity: -1 }));
	});

	it("should wait until the order references the pet", async () => {
		const { store, calls } = clientsAnswering(
			json(404, { code: 1, type: "error", message: "Order not found" }),
			json(200, { ...order, petId: 41 }),
			json(200, order),
		);

		const response = await store.getOrderByIdAndVerifyPetId(7, 42);

		expect(response.body?.petId).toBe(42);
		expect(calls).toHaveLength(3);
	});

	it("should wait until the inventory count catches up", async () => {
		const { store, calls } = clientsAnswering(json(200, { available: 3 }), json(200, { available: 3, "test-status": 1 }));

		const response = await store.getInventoryAndVerifyStatusCount("test-status", 1);

		expect(response.body).toEqual({ available: 3, "test-status": 1 });
		expect(calls).toHaveLength(2);
	});

	it("should give up on an inventory that never catches up", async () => {
		const { store } = clientsAnswering(json(200, { available: 3 }));

		const error = await store.getInventoryAndVerifyStatusCount("test-status", 1).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(AwaitTimeoutError);
		expect(error).toMatchObject({ cause: { name: "ContractViolationError", path: "test-status" } });
	});

	it("should stop waiting for the inventory on a broken response", async () => {
		const { store, calls } = clientsAnswering(() => new Response("{", { status: 200, headers: { "content-type": "application/json" } }));

		await expect(store.getInventoryAndVerifyStatusCount("test-status", 1)).rejects.toBeInstanceOf(TransportError);
		expect(calls).toHaveLength(1);
	});

	it("should record every exchange", async () => {
		const { store, recorder } = clientsAnswering(json(200, order));

		await store.placeOrder(order);

		expect(recorder.list()).toMatchObject([
			{ method: "POST", url: `${BASE_URL}/store/order`, responseStatus: 200, status: "completed" },
		]);
	});
});
