import type { TestCaseResult, TestResult, TestStepResult } from "../execution/execution.types";

/**
 * Receives the results of a scenario as they are produced. Only
 * `onComplete` is required. A callback that throws is logged and handed
 * to `onError`; the scenario carries on.
 */
export interface TestReporter {
	readonly name: string;
	onStart?(scenario: { name: string; startTime: number }): void;
	onTestCaseStart?(testCase: { name: string }): void;
	/** Body steps, the after hook and every cleanup removal */
	onStepComplete?(step: TestStepResult): void;
	onTestCaseComplete?(result: TestCaseResult): void;
	onComplete(result: TestResult): void;
	onError?(error: Error): void;
}

/**
 * Prints nothing and keeps every result, for assertions in tests.
 */
export class SilentReporter implements TestReporter {
	readonly name = "silent";
	private readonly results: TestResult[] = [];
	private readonly caseResults: TestCaseResult[] = [];

	onTestCaseComplete(result: TestCaseResult): void {
		this.caseResults.push(result);
	}

	onComplete(result: TestResult): void {
		this.results.push(result);
	}

	getResults(): TestResult[] {
		return this.results;
	}

	getTestCaseResults(): TestCaseResult[] {
		return this.caseResults;
	}

	getLastResult(): TestResult | undefined {
		return this.results.at(-1);
	}
}
