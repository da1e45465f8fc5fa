/**
 * Console Reporter
 *
 * One line per test case, indented under the scenario name:
 *
 *     Pet API
 *       ✓ Create and read a pet (120ms, 3 requests)
 *       ✗ Update a pet (10012ms, 11 requests)
 *           AwaitTimeoutError: Condition not met within 10000ms (11 attempts, 10012ms elapsed): pet 7 is Max
 *       - Reject a pet without name [known defect: service accepts it]
 *     Pet API: 1 passed, 1 failed, 1 skipped in 10140ms (14 requests)
 *
 * Failed cleanups are printed whatever the verbosity; passing steps only
 * when verbose.
 */

import type { TestCaseResult, TestResult, TestStepResult } from "../execution/execution.types";
import type { TestReporter } from "./reporter";

export interface ConsoleReporterOptions {
	/** Print every step as it completes */
	verbose?: boolean;
	/** Defaults to `console.log` */
	write?: (line: string) => void;
}

export class ConsoleReporter implements TestReporter {
	readonly name = "console";
	private readonly verbose: boolean;
	private readonly write: (line: string) => void;

	constructor(options: ConsoleReporterOptions = {}) {
		this.verbose = options.verbose ?? false;
		this.write = options.write ?? ((line) => console.log(line));
	}

	onStart(scenario: { name: string }): void {
		this.write(scenario.name);
	}

	onStepComplete(step: TestStepResult): void {
		if (step.kind === "cleanup" && !step.passed) {
			this.write(`      ! ${step.description}: ${step.error ?? "failed"}`);
		} else if (this.verbose) {
			this.write(`      ${step.passed ? "·" : "x"} ${step.description} (${step.duration}ms)`);
		}
	}

	onTestCaseComplete(result: TestCaseResult): void {
		switch (result.status) {
			case "skipped":
				this.write(`  - ${result.name} [known defect: ${result.skipReason ?? "no reason given"}]`);
				return;
			case "passed":
				this.write(`  ✓ ${result.name} (${result.duration}ms, ${requests(result.interactions?.length ?? 0)})`);
				return;
			case "failed":
				this.write(`  ✗ ${result.name} (${result.duration}ms, ${requests(result.interactions?.length ?? 0)})`);
				this.write(`      ${result.errorName ?? "Error"}: ${result.error ?? "no error message"}`);
		}
	}

	onComplete(result: TestResult): void {
		this.write(
			`${result.name}: ${result.passedTests} passed, ${result.failedTests} failed, ` +
				`${result.skippedTests} skipped in ${result.duration}ms (${requests(result.summary.totalInteractions)})`,
		);
	}

	onError(error: Error): void {
		this.write(`  reporter error: ${error.message}`);
	}
}

function requests(count: number): string {
	return count === 1 ? "1 request" : `${count} requests`;
}
