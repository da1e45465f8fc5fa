/**
 * Cleanup Ledger
 *
 * Keys of entities a test case created, removed after the body has run.
 * One ledger belongs to one run of one test case and is never shared.
 */

import type { Logger } from "../logging";
import type { Remover } from "./execution.types";

/**
 * Statuses that count as "gone" on cleanup: removed now, or already absent.
 */
export const CLEANUP_ACCEPTED_STATUSES: readonly number[] = [200, 404];

export interface CleanupOutcome {
	entity: string;
	key: string | number;
	ok: boolean;
	status?: number;
	error?: string;
	duration: number;
}

export class CleanupLedger<K extends string | number> {
	private readonly keys: K[] = [];

	constructor(
		readonly entity: string,
		private readonly remover: Remover<K>,
		private readonly logger: Logger,
	) {}

	/**
	 * Register a created entity. Registering the same key twice is a no-op.
	 */
	track(key: K): K {
		if (!this.keys.includes(key)) {
			this.keys.push(key);
		}
		return key;
	}

	/**
	 * Forget a key, e.g. when the test itself deleted the entity.
	 */
	release(key: K): void {
		const index = this.keys.indexOf(key);
		if (index !== -1) {
			this.keys.splice(index, 1);
		}
	}

	get pending(): readonly K[] {
		return [...this.keys];
	}

	/**
	 * Remove every tracked entity, newest first. Never throws: failures are
	 * logged and returned.
	 */
	async drain(): Promise<CleanupOutcome[]> {
		const outcomes: CleanupOutcome[] = [];
		while (this.keys.length > 0) {
			const key = this.keys.pop();
			if (key === undefined) {
				break;
			}
			outcomes.push(await this.remove(key));
		}
		return outcomes;
	}

	private async remove(key: K): Promise<CleanupOutcome> {
		const startTime = Date.now();
		try {
			const { code } = await this.remover(key);
			const ok = CLEANUP_ACCEPTED_STATUSES.includes(code);
			if (!ok) {
				this.logger.warn(`cleanup of ${this.entity} ${key} answered ${code}`);
			}
			return { entity: this.entity, key, ok, status: code, duration: Date.now() - startTime };
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			this.logger.warn(`cleanup of ${this.entity} ${key} failed: ${message}`);
			return { entity: this.entity, key, ok: false, error: message, duration: Date.now() - startTime };
		}
	}
}
