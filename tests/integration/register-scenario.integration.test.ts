/**
 * Vitest Registration Integration Tests
 *
 * Registers the store and known-defect suites as Vitest tests, the way the
 * live conformance run does, against the fake pet store. Tests are
 * collected before the store listens, so requests to the placeholder base
 * URL are redirected to it.
 */

import { type AwaitPolicies, SilentReporter, createClients, scenario } from "petprobe";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { knownDefectsSuite, registerScenario, storeSuite } from "../../suites";
import { type FakePetStore, startFakePetStore } from "../helpers/fake-petstore";

const PLACEHOLDER_BASE_URL = "http://petstore.test/v2";

const policy = { atMost: 3_000, pollInterval: 10 };
const policies: AwaitPolicies = {
	read: policy,
	update: policy,
	delete: policy,
	absence: policy,
	convergence: policy,
	inventory: policy,
};

let store: FakePetStore | undefined;

beforeAll(async () => {
	store = await startFakePetStore({ lagMs: 30 });
});

afterAll(async () => {
	await store?.close();
});

const clients = createClients(
	{ baseUrl: PLACEHOLDER_BASE_URL, logLevel: "silent", policies },
	{
		fetch: (url, init) => {
			if (!store) {
				return Promise.reject(new Error("fake pet store is not running"));
			}
			return fetch(url.replace(PLACEHOLDER_BASE_URL, store.baseUrl), init);
		},
	},
);

const storeReporter = new SilentReporter();
const defectsReporter = new SilentReporter();

registerScenario(
	scenario({ name: "Store API", recorder: clients.recorder, reporters: [storeReporter] }),
	storeSuite(clients),
);
registerScenario(scenario({ name: "Known defects", reporters: [defectsReporter] }), knownDefectsSuite(clients));

// Declared after the suites: runs once their `afterAll` hooks have finished the scenarios
describe("reported results", () => {
	it("should report the store cases as they ran", () => {
		expect(storeReporter.getTestCaseResults().map((tc) => tc.status)).toEqual([
			"passed",
			"passed",
			"passed",
			"passed",
		]);
	});

	it("should report every known defect as skipped once its scenario finished", () => {
		const result = defectsReporter.getLastResult();

		expect(result?.skippedTests).toBe(8);
		expect(result?.testCases.every((tc) => tc.skipReason !== undefined)).toBe(true);
	});
});
