/**
 * Errors
 *
 * Failure taxonomy of the suite: contract violations, await timeouts and
 * transport failures. All three propagate to the test case uncaught.
 */

import { stringify } from "../utils";

/**
 * Request that produced a failure, for diagnostics.
 */
export interface RequestContext {
	method: string;
	url: string;
}

/**
 * The service answered, but not the way the caller required.
 */
export class ContractViolationError extends Error {
	readonly expected: unknown;
	readonly actual: unknown;
	/** Body path or `status` / `content-type` */
	readonly path: string;
	readonly context?: RequestContext;
	/** Response body the violation was found in */
	readonly body?: unknown;

	constructor(params: {
		path: string;
		expected: unknown;
		actual: unknown;
		context?: RequestContext;
		body?: unknown;
		description?: string;
	}) {
		const where = params.context ? ` (${params.context.method} ${params.context.url})` : "";
		const what = params.description ?? `expected ${params.path} to be ${stringify(params.expected)}`;
		const tail = params.body !== undefined && params.path !== "body" ? `; body: ${stringify(params.body)}` : "";
		super(`Contract violation${where}: ${what} but was ${stringify(params.actual)}${tail}`);
		this.name = "ContractViolationError";
		this.expected = params.expected;
		this.actual = params.actual;
		this.path = params.path;
		this.context = params.context;
		this.body = params.body;
	}
}

/**
 * Timeout error
 */
export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeout: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

/**
 * A bounded wait never observed its predicate.
 */
export class AwaitTimeoutError<T = unknown> extends TimeoutError {
	readonly description: string;
	readonly lastObservation: T | undefined;
	readonly attempts: number;
	readonly elapsed: number;
	readonly pollInterval: number;

	constructor(params: {
		description: string;
		atMost: number;
		pollInterval: number;
		attempts: number;
		elapsed: number;
		lastObservation?: T;
		observed?: string;
		cause?: Error;
	}) {
		const observed = params.observed ?? stringify(params.lastObservation);
		super(
			`${params.description} did not converge within ${params.atMost}ms ` +
				`(${params.attempts} attempts, poll interval ${params.pollInterval}ms); last observed: ${observed}`,
			params.atMost,
		);
		this.name = "AwaitTimeoutError";
		this.description = params.description;
		this.lastObservation = params.lastObservation;
		this.attempts = params.attempts;
		this.elapsed = params.elapsed;
		this.pollInterval = params.pollInterval;
		if (params.cause) {
			this.cause = params.cause;
		}
	}
}

/**
 * The call itself could not complete: connectivity or body serialization.
 */
export class TransportError extends Error {
	readonly context: RequestContext;

	constructor(message: string, context: RequestContext, cause?: unknown) {
		super(`${message} (${context.method} ${context.url})`);
		this.name = "TransportError";
		this.context = context;
		if (cause !== undefined) {
			this.cause = cause;
		}
	}
}

/**
 * Invalid configuration value.
 */
export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly key: string,
	) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * Errors that mean "the service disagrees" rather than "the run broke".
 */
export function isAssertionFailure(error: unknown): boolean {
	return error instanceof ContractViolationError || error instanceof AwaitTimeoutError;
}
