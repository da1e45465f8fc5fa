/**
 * Response Assertions
 *
 * Status, content-type and body-fragment checks over HttpResponse. Each
 * failed check throws a ContractViolationError naming what was expected
 * and what the service sent.
 */

import { isDeepStrictEqual } from "node:util";
import { ContractViolationError } from "../errors";
import type { HttpResponse } from "../protocols/http";
import type { ResponseExpectation } from "../specs";
import { isRecord } from "../utils";

/**
 * Read a dotted path from a JSON body.
 *
 * Arrays are mapped over, so `tags.name` on `{ tags: [{ name: "a" }, { name: "b" }] }`
 * yields `["a", "b"]`. A numeric segment indexes into an array.
 */
export function readPath(body: unknown, path: string): unknown {
	if (path === "" || path === "$") {
		return body;
	}

	let current: unknown = body;
	for (const segment of path.split(".")) {
		current = readSegment(current, segment);
		if (current === undefined) {
			return undefined;
		}
	}
	return current;
}

function readSegment(value: unknown, segment: string): unknown {
	if (Array.isArray(value)) {
		if (/^\d+$/.test(segment)) {
			return value[Number(segment)];
		}
		if (segment === "size()") {
			return value.length;
		}
		return value.map((item) => readSegment(item, segment));
	}
	if (isRecord(value)) {
		return value[segment];
	}
	return undefined;
}

function contextOf(response: HttpResponse): { method: string; url: string } {
	return { method: response.method, url: response.url };
}

/**
 * Check status and, when the expectation names one, the content type.
 */
export function assertResponse<T>(response: HttpResponse<T>, expectation: ResponseExpectation): HttpResponse<T> {
	if (response.code !== expectation.status) {
		throw new ContractViolationError({
			path: "status",
			expected: expectation.status,
			actual: response.code,
			context: contextOf(response),
			body: response.body ?? response.text,
		});
	}

	if (expectation.contentType) {
		const contentType = response.headers["content-type"] ?? "";
		if (!contentType.toLowerCase().startsWith(expectation.contentType.toLowerCase())) {
			throw new ContractViolationError({
				path: "content-type",
				expected: expectation.contentType,
				actual: contentType || undefined,
				context: contextOf(response),
			});
		}
	}

	return response;
}

/**
 * Check that every listed body path deep-equals its expected value.
 *
 * @example
 * assertBody(res, { id: 42, name: "Rex", "category.name": "Dogs" });
 */
export function assertBody<T>(response: HttpResponse<T>, expected: Record<string, unknown>): HttpResponse<T> {
	for (const [path, value] of Object.entries(expected)) {
		const actual = readPath(response.body, path);
		if (!isDeepStrictEqual(actual, value)) {
			throw new ContractViolationError({
				path,
				expected: value,
				actual,
				context: contextOf(response),
				body: response.body,
			});
		}
	}
	return response;
}

/**
 * Check a body path against a matcher.
 *
 * @example
 * assertBodyMatches(res, "message", startsWith("logged in user session:"));
 */
export function assertBodyMatches<T>(response: HttpResponse<T>, path: string, matcher: Matcher): HttpResponse<T> {
	const actual = readPath(response.body, path);
	if (!matcher.matches(actual)) {
		throw new ContractViolationError({
			path,
			expected: matcher.description,
			actual,
			context: contextOf(response),
			body: response.body,
			description: `expected ${path} to ${matcher.description}`,
		});
	}
	return response;
}

/**
 * Named predicate over a body value
 */
export interface Matcher {
	readonly description: string;
	matches(value: unknown): boolean;
}

export function equalTo(expected: unknown): Matcher {
	return {
		description: `equal ${JSON.stringify(expected)}`,
		matches: (value) => isDeepStrictEqual(value, expected),
	};
}

export function startsWith(prefix: string): Matcher {
	return {
		description: `start with ${JSON.stringify(prefix)}`,
		matches: (value) => typeof value === "string" && value.startsWith(prefix),
	};
}

export function hasItem(item: unknown): Matcher {
	return {
		description: `contain ${JSON.stringify(item)}`,
		matches: (value) => Array.isArray(value) && value.some((entry) => isDeepStrictEqual(entry, item)),
	};
}

export function hasSize(size: number): Matcher {
	return {
		description: `have size ${size}`,
		matches: (value) => Array.isArray(value) && value.length === size,
	};
}

/**
 * Same items as `expected`, any order, duplicates counted.
 */
export function containsInAnyOrder(expected: readonly unknown[]): Matcher {
	return {
		description: `contain in any order ${JSON.stringify(expected)}`,
		matches: (value) => {
			if (!Array.isArray(value) || value.length !== expected.length) {
				return false;
			}
			const remaining = [...value];
			for (const item of expected) {
				const index = remaining.findIndex((entry) => isDeepStrictEqual(entry, item));
				if (index === -1) {
					return false;
				}
				remaining.splice(index, 1);
			}
			return true;
		},
	};
}

export function anyOf(...matchers: Matcher[]): Matcher {
	return {
		description: matchers.map((m) => m.description).join(" or "),
		matches: (value) => matchers.some((m) => m.matches(value)),
	};
}
