/**
 * TestScenario Class
 *
 * Runs test cases one after another, attaches the HTTP exchanges each
 * case made and notifies reporters.
 *
 * Two ways to drive it:
 * - `run(...cases)` runs a batch and returns the TestResult;
 * - `start()` / `execute(case)` / `finish()` let a host runner (Vitest)
 *   own the loop, one `it` per case.
 */

import { type Logger, silentLogger } from "../logging";
import { ConsoleReporter, type ConsoleReporterOptions } from "../recording/console-reporter";
import type { InteractionRecorder } from "../recording/interaction-recorder";
import type { TestReporter } from "../recording/reporter";
import type { TestCaseResult, TestResult } from "./execution.types";
import type { TestCase } from "./test-case";

/**
 * Test scenario configuration
 */
export interface TestScenarioConfig {
	name: string;
	logger?: Logger;
	/** Same recorder the HTTP protocol writes to; drained after every case */
	recorder?: InteractionRecorder;
	reporters?: TestReporter[];
}

/**
 * TestScenario - orchestrates test execution
 */
export class TestScenario {
	readonly name: string;
	private readonly logger: Logger;
	private readonly recorder?: InteractionRecorder;
	private readonly reporters: TestReporter[];
	private results: TestCaseResult[] = [];
	private startTime?: number;

	constructor(config: TestScenarioConfig) {
		this.name = config.name;
		this.logger = config.logger ?? silentLogger;
		this.recorder = config.recorder;
		this.reporters = [...(config.reporters ?? [])];
	}

	/**
	 * Add a reporter
	 */
	addReporter(reporter: TestReporter): this {
		this.reporters.push(reporter);
		return this;
	}

	useConsoleReporter(options?: ConsoleReporterOptions): this {
		this.reporters.push(new ConsoleReporter(options));
		return this;
	}

	getRecorder(): InteractionRecorder | undefined {
		return this.recorder;
	}

	/**
	 * Begin a run. Called implicitly by the first `execute`.
	 */
	start(): void {
		if (this.startTime !== undefined) {
			return;
		}
		const startTime = Date.now();
		this.startTime = startTime;
		this.results = [];
		this.recorder?.clear();
		this.logger.info(`scenario "${this.name}" started`);
		this.notify((reporter) => reporter.onStart?.({ name: this.name, startTime }));
	}

	/**
	 * Execute a single test case
	 */
	async execute(testCase: TestCase): Promise<TestCaseResult> {
		this.start();
		this.notify((reporter) => reporter.onTestCaseStart?.({ name: testCase.name }));

		this.recorder?.clear();
		const result = await testCase.execute({
			logger: this.logger,
			onStepComplete: (step) => this.notify((reporter) => reporter.onStepComplete?.(step)),
		});

		const interactions = this.recorder?.drain() ?? [];
		if (interactions.length > 0) {
			result.interactions = interactions;
		}

		if (result.status === "failed") {
			this.logger.warn(`${testCase.name} failed: ${result.error ?? "unknown error"}`);
		} else {
			this.logger.debug(`${testCase.name} ${result.status}`);
		}

		this.results.push(result);
		this.notify((reporter) => reporter.onTestCaseComplete?.(result));
		return result;
	}

	/**
	 * Close the run and report it.
	 */
	finish(): TestResult {
		const startTime = this.startTime ?? Date.now();
		const result = createTestResult(this.name, this.results, startTime, Date.now());
		this.startTime = undefined;

		this.logger.info(
			`scenario "${this.name}" finished: ${result.passedTests} passed, ` +
				`${result.failedTests} failed, ${result.skippedTests} skipped`,
		);
		this.notify((reporter) => reporter.onComplete(result));
		return result;
	}

	/**
	 * Run test cases sequentially
	 */
	async run(...testCases: TestCase[]): Promise<TestResult> {
		this.start();
		for (const testCase of testCases) {
			await this.execute(testCase);
		}
		return this.finish();
	}

	private notify(call: (reporter: TestReporter) => void): void {
		for (const reporter of this.reporters) {
			try {
				call(reporter);
			} catch (error) {
				const err = error instanceof Error ? error : new Error(String(error));
				this.logger.error(`reporter "${reporter.name}" failed: ${err.message}`);
				if (reporter.onError) {
					reporter.onError(err);
				}
			}
		}
	}
}

/**
 * Create final test result
 */
export function createTestResult(
	name: string,
	testCases: TestCaseResult[],
	startTime: number,
	endTime: number,
): TestResult {
	const passedTests = testCases.filter((tc) => tc.status === "passed").length;
	const failedTests = testCases.filter((tc) => tc.status === "failed").length;
	const skippedTests = testCases.filter((tc) => tc.status === "skipped").length;
	const executed = passedTests + failedTests;
	const totalInteractions = testCases.reduce((sum, tc) => sum + (tc.interactions?.length ?? 0), 0);

	return {
		name,
		passed: failedTests === 0,
		duration: endTime - startTime,
		startTime,
		endTime,
		testCases,
		passedTests,
		failedTests,
		skippedTests,
		totalTests: testCases.length,
		summary: {
			totalTestCases: testCases.length,
			passedTestCases: passedTests,
			failedTestCases: failedTests,
			skippedTestCases: skippedTests,
			totalSteps: testCases.reduce((sum, tc) => sum + tc.totalSteps, 0),
			passedSteps: testCases.reduce((sum, tc) => sum + tc.passedSteps, 0),
			failedSteps: testCases.reduce((sum, tc) => sum + tc.failedSteps, 0),
			totalDuration: endTime - startTime,
			averageDuration: executed > 0 ? Math.round((endTime - startTime) / executed) : 0,
			totalInteractions,
			passRate: executed > 0 ? passedTests / executed : 1,
		},
	};
}

/**
 * Factory function for creating test scenarios
 */
export function scenario(config: TestScenarioConfig): TestScenario {
	return new TestScenario(config);
}
