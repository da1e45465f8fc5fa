/**
 * Await-Until
 *
 * Bounded polling with predicate-based termination. Used to wait out the
 * lag between a write to the service and a read that reflects it.
 *
 * Two states: WAITING (attempt, check, sleep) and DONE, which ends either
 * with the satisfying observation or with an AwaitTimeoutError. Errors
 * thrown by the action or the predicate end the wait immediately.
 */

import { AwaitTimeoutError, ContractViolationError } from "../errors";
import { sleep as defaultSleep, stringify } from "../utils";

/**
 * Timeout / poll interval pair, in milliseconds
 */
export interface AwaitPolicy {
	/** Maximum total wait */
	readonly atMost: number;
	/** Pause between two attempts */
	readonly pollInterval: number;
}

export interface AwaitOptions<T> extends AwaitPolicy {
	/** What is being waited for, used in the timeout message */
	description?: string;
	/** Render an observation for the timeout message */
	describe?: (observation: T) => string;
	/** Called after every attempt that did not satisfy the predicate */
	onAttempt?: (observation: T, attempt: number) => void;
	/** Clock, replaceable in tests */
	now?: () => number;
	/** Suspension, replaceable in tests */
	sleep?: (ms: number) => Promise<void>;
}

/**
 * Named policies for the call sites of the resource clients
 */
export interface AwaitPolicies {
	/** Read of a freshly written entity */
	readonly read: AwaitPolicy;
	/** Update acknowledged with 200 */
	readonly update: AwaitPolicy;
	/** Delete acknowledged with 200 */
	readonly delete: AwaitPolicy;
	/** Read expected to report 404 */
	readonly absence: AwaitPolicy;
	/** Field-level convergence check */
	readonly convergence: AwaitPolicy;
	/** Inventory count catching up with a write */
	readonly inventory: AwaitPolicy;
}

/**
 * Frozen copy of every policy of a set, so no holder shares a policy
 * object with another
 */
export function copyPolicies(policies: AwaitPolicies): AwaitPolicies {
	return mapPolicies(policies, ({ atMost, pollInterval }) => ({ atMost, pollInterval }));
}

export const DEFAULT_AWAIT_POLICIES: AwaitPolicies = copyPolicies({
	read: { atMost: 20_000, pollInterval: 1_000 },
	update: { atMost: 10_000, pollInterval: 1_000 },
	delete: { atMost: 10_000, pollInterval: 1_000 },
	absence: { atMost: 10_000, pollInterval: 1_000 },
	convergence: { atMost: 10_000, pollInterval: 100 },
	inventory: { atMost: 10_000, pollInterval: 1_000 },
});

/**
 * Multiply every policy of a set, e.g. to give a slow environment more time.
 */
export function scalePolicies(policies: AwaitPolicies, factor: number): AwaitPolicies {
	return mapPolicies(policies, (policy) => ({
		atMost: Math.round(policy.atMost * factor),
		pollInterval: Math.max(1, Math.round(policy.pollInterval * factor)),
	}));
}

function mapPolicies(policies: AwaitPolicies, map: (policy: AwaitPolicy) => AwaitPolicy): AwaitPolicies {
	const each = (policy: AwaitPolicy) => Object.freeze(map(policy));
	return Object.freeze({
		read: each(policies.read),
		update: each(policies.update),
		delete: each(policies.delete),
		absence: each(policies.absence),
		convergence: each(policies.convergence),
		inventory: each(policies.inventory),
	});
}

function validatePolicy(policy: AwaitPolicy): void {
	if (!Number.isFinite(policy.atMost) || policy.atMost < 0) {
		throw new RangeError(`atMost must be a non-negative number, got ${policy.atMost}`);
	}
	if (!Number.isFinite(policy.pollInterval) || policy.pollInterval <= 0) {
		throw new RangeError(`pollInterval must be a positive number, got ${policy.pollInterval}`);
	}
}

/**
 * Invoke `action` until `predicate` accepts its result or `atMost` elapses.
 *
 * Returns the first accepted observation without sleeping after it.
 * On timeout throws {@link AwaitTimeoutError} with the last observation.
 *
 * @example
 * const res = await awaitUntil(
 *   () => pets.getPetByIdRaw(42),
 *   (r) => r.code === 200,
 *   { atMost: 20_000, pollInterval: 1_000, description: "pet 42" },
 * );
 */
export async function awaitUntil<T>(
	action: () => Promise<T> | T,
	predicate: (observation: T) => boolean,
	options: AwaitOptions<T>,
): Promise<T> {
	validatePolicy(options);
	const now = options.now ?? Date.now;
	const pause = options.sleep ?? defaultSleep;

	const startedAt = now();
	const deadline = startedAt + options.atMost;
	let attempts = 0;

	for (;;) {
		const observation = await action();
		attempts++;

		if (predicate(observation)) {
			return observation;
		}
		options.onAttempt?.(observation, attempts);

		const current = now();
		if (current >= deadline) {
			throw new AwaitTimeoutError<T>({
				description: options.description ?? "condition",
				atMost: options.atMost,
				pollInterval: options.pollInterval,
				attempts,
				elapsed: current - startedAt,
				lastObservation: observation,
				observed: options.describe ? options.describe(observation) : stringify(observation),
			});
		}

		await pause(Math.min(options.pollInterval, deadline - current));
	}
}

/**
 * Invoke an asserting `action` until it stops throwing contract violations.
 *
 * Only {@link ContractViolationError} counts as "not yet"; anything else
 * propagates at once. The timeout carries the last violation as `cause`.
 */
export async function awaitAsserted<T>(
	action: () => Promise<T> | T,
	options: Omit<AwaitOptions<T>, "describe" | "onAttempt"> & {
		onViolation?: (violation: ContractViolationError, attempt: number) => void;
	},
): Promise<T> {
	type Outcome = { passed: true; value: T } | { passed: false; violation: ContractViolationError };

	const attempt = async (): Promise<Outcome> => {
		try {
			return { passed: true, value: await action() };
		} catch (error) {
			if (error instanceof ContractViolationError) {
				return { passed: false, violation: error };
			}
			throw error;
		}
	};

	const state: { lastViolation?: ContractViolationError } = {};
	try {
		const outcome = await awaitUntil<Outcome>(attempt, (o) => o.passed, {
			atMost: options.atMost,
			pollInterval: options.pollInterval,
			description: options.description,
			now: options.now,
			sleep: options.sleep,
			describe: (o) => (o.passed ? "passed" : o.violation.message),
			onAttempt: (o, n) => {
				if (!o.passed) {
					state.lastViolation = o.violation;
					options.onViolation?.(o.violation, n);
				}
			},
		});
		if (!outcome.passed) {
			throw outcome.violation;
		}
		return outcome.value;
	} catch (error) {
		if (error instanceof AwaitTimeoutError && state.lastViolation) {
			error.cause = state.lastViolation;
		}
		throw error;
	}
}
