/**
 * Error Taxonomy Tests
 */

import {
	AwaitTimeoutError,
	ConfigError,
	ContractViolationError,
	TimeoutError,
	TransportError,
	isAssertionFailure,
} from "petprobe";
import { describe, expect, it } from "vitest";

describe("ContractViolationError", () => {
	it("should name path, expectation, actual value and request", () => {
		const error = new ContractViolationError({
			path: "status",
			expected: 200,
			actual: 404,
			context: { method: "GET", url: "http://petstore.test/v2/pet/1" },
		});

		expect(error.name).toBe("ContractViolationError");
		expect(error.message).toBe("Contract violation (GET http://petstore.test/v2/pet/1): expected status to be 200 but was 404");
	});

	it("should append the body it was found in", () => {
		const error = new ContractViolationError({ path: "name", expected: "Rex", actual: "Max", body: { name: "Max" } });

		expect(error.message).toBe('Contract violation: expected name to be "Rex" but was "Max"; body: {"name":"Max"}');
	});

	it("should use a custom description", () => {
		const error = new ContractViolationError({
			path: "message",
			expected: "start with \"ok\"",
			actual: "no",
			description: "expected message to start with \"ok\"",
		});

		expect(error.message).toBe('Contract violation: expected message to start with "ok" but was "no"');
	});
});

describe("AwaitTimeoutError", () => {
	it("should be a TimeoutError carrying the policy", () => {
		const error = new AwaitTimeoutError({
			description: "order 7 readable",
			atMost: 20_000,
			pollInterval: 1_000,
			attempts: 21,
			elapsed: 20_004,
			lastObservation: { code: 404 },
		});

		expect(error).toBeInstanceOf(TimeoutError);
		expect(error.timeout).toBe(20_000);
		expect(error.message).toBe(
			'order 7 readable did not converge within 20000ms (21 attempts, poll interval 1000ms); last observed: {"code":404}',
		);
	});
});

describe("isAssertionFailure", () => {
	it("should tell service disagreements from broken runs", () => {
		expect(isAssertionFailure(new ContractViolationError({ path: "id", expected: 1, actual: 2 }))).toBe(true);
		expect(
			isAssertionFailure(
				new AwaitTimeoutError({ description: "x", atMost: 0, pollInterval: 1, attempts: 1, elapsed: 0 }),
			),
		).toBe(true);
		expect(isAssertionFailure(new TransportError("Request failed", { method: "GET", url: "http://x" }))).toBe(false);
		expect(isAssertionFailure(new ConfigError("bad", "PETPROBE_BASE_URL"))).toBe(false);
		expect(isAssertionFailure(new Error("other"))).toBe(false);
	});
});
