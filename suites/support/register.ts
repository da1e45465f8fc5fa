/**
 * Vitest Registration
 *
 * Turns a scenario's test cases into Vitest tests: one `it` per case, run
 * through the scenario so reporters see every result. A failed case
 * re-raises its error under its original name; a skipped case is reported
 * by the scenario and then marked skipped, with the reason in its title.
 */

import type { TestCase, TestCaseResult, TestScenario } from "petprobe";
import { afterAll, describe, it } from "vitest";

function toError(result: TestCaseResult): Error {
	const error = new Error(result.error ?? `${result.name} failed`);
	error.name = result.errorName ?? "Error";
	if (result.stackTrace) {
		error.stack = result.stackTrace;
	}
	return error;
}

export function registerScenario(scenario: TestScenario, cases: readonly TestCase[]): void {
	describe(scenario.name, () => {
		afterAll(() => {
			scenario.finish();
		});

		for (const testCase of cases) {
			const title =
				testCase.skipReason === undefined ? testCase.name : `${testCase.name} (known defect: ${testCase.skipReason})`;

			it(title, async (context) => {
				const result = await scenario.execute(testCase);
				if (result.status === "skipped") {
					context.skip();
				}
				if (result.status === "failed") {
					throw toError(result);
				}
			});
		}
	});
}
