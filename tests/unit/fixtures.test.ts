/**
 * Fixture Builder Tests
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { buildOrder, randomOrderId, randomPetId } from "../../suites/support/fixtures";

describe("fixtures", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe("randomOrderId", () => {
		it("should draw from the same range as pet ids", () => {
			vi.spyOn(Math, "random").mockReturnValueOnce(0).mockReturnValueOnce(0);

			expect(randomOrderId()).toBe(1_000_000);
			expect(randomPetId()).toBe(1_000_000);
		});

		it("should reach the top of the range", () => {
			vi.spyOn(Math, "random").mockReturnValue(0.9999999999);

			expect(randomOrderId()).toBe(99_999_999);
		});
	});

	describe("buildOrder", () => {
		it("should give the order a wide random id", () => {
			vi.spyOn(Math, "random").mockReturnValue(0.5);

			const order = buildOrder(42);

			expect(order.id).toBe(50_500_000);
			expect(order).toMatchObject({ petId: 42, quantity: 1, status: "placed", complete: false });
		});
	});
});
