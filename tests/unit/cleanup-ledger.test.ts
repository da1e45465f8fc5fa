/**
 * Cleanup Ledger Tests
 */

import { CleanupLedger, type Logger } from "petprobe";
import { describe, expect, it, vi } from "vitest";

const createLogger = () => ({
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
}) satisfies Logger;

describe("CleanupLedger", () => {
	it("should remove tracked keys newest first", async () => {
		const removed: number[] = [];
		const ledger = new CleanupLedger<number>("pet", async (id) => {
			removed.push(id);
			return { code: 200 };
		}, createLogger());

		ledger.track(1);
		ledger.track(2);
		ledger.track(3);
		const outcomes = await ledger.drain();

		expect(removed).toEqual([3, 2, 1]);
		expect(outcomes.map((o) => o.ok)).toEqual([true, true, true]);
		expect(ledger.pending).toEqual([]);
	});

	it("should track a key once", async () => {
		const remover = vi.fn(async () => ({ code: 200 }));
		const ledger = new CleanupLedger<string>("user", remover, createLogger());

		expect(ledger.track("jdoe")).toBe("jdoe");
		ledger.track("jdoe");
		await ledger.drain();

		expect(remover).toHaveBeenCalledTimes(1);
	});

	it("should not remove released keys", async () => {
		const remover = vi.fn(async () => ({ code: 200 }));
		const ledger = new CleanupLedger<number>("order", remover, createLogger());

		ledger.track(5);
		ledger.track(6);
		ledger.release(5);
		ledger.release(99);

		expect(ledger.pending).toEqual([6]);
		await ledger.drain();
		expect(remover).toHaveBeenCalledWith(6);
		expect(remover).toHaveBeenCalledTimes(1);
	});

	it("should accept 404 as already gone", async () => {
		const logger = createLogger();
		const ledger = new CleanupLedger<number>("pet", async () => ({ code: 404 }), logger);

		ledger.track(1);
		const [outcome] = await ledger.drain();

		expect(outcome).toMatchObject({ entity: "pet", key: 1, ok: true, status: 404 });
		expect(logger.warn).not.toHaveBeenCalled();
	});

	it("should report other statuses without throwing", async () => {
		const logger = createLogger();
		const ledger = new CleanupLedger<number>("pet", async () => ({ code: 500 }), logger);

		ledger.track(1);
		const [outcome] = await ledger.drain();

		expect(outcome).toMatchObject({ ok: false, status: 500 });
		expect(logger.warn).toHaveBeenCalledWith("cleanup of pet 1 answered 500");
	});

	it("should keep draining after a remover throws", async () => {
		const logger = createLogger();
		const removed: string[] = [];
		const ledger = new CleanupLedger<string>("user", async (username) => {
			if (username === "broken") {
				throw new Error("connection reset");
			}
			removed.push(username);
			return { code: 200 };
		}, logger);

		ledger.track("first");
		ledger.track("broken");
		const outcomes = await ledger.drain();

		expect(removed).toEqual(["first"]);
		expect(outcomes[0]).toMatchObject({ key: "broken", ok: false, error: "connection reset" });
		expect(outcomes[1]).toMatchObject({ key: "first", ok: true });
		expect(logger.warn).toHaveBeenCalledWith("cleanup of user broken failed: connection reset");
	});
});
