/**
 * Allure Reporter
 *
 * Converts petprobe test results to Allure format. Each finished test
 * case is written as it completes; the scenario container and the
 * environment file are written when the scenario completes.
 */

import type { TestCaseResult, TestReporter, TestResult } from "petprobe";
import { convertTestCase, convertToContainer } from "./result-converter";
import type { AllureReporterOptions } from "./types";
import { FileSystemWriter } from "./writers/file-writer";
import type { AllureWriter } from "./writers/writer";

export class AllureReporter implements TestReporter {
	readonly name = "allure";
	private readonly options: AllureReporterOptions;
	private writerInstance?: AllureWriter;
	private testCaseUuids: string[] = [];

	/**
	 * @param writer - Replaces the file-system writer, e.g. in tests
	 */
	constructor(options?: AllureReporterOptions, writer?: AllureWriter) {
		this.options = {
			resultsDir: "allure-results",
			...options,
		};
		this.writerInstance = writer;
	}

	/**
	 * Get reporter options
	 */
	getOptions(): AllureReporterOptions {
		return this.options;
	}

	/**
	 * Created on first write, so constructing a reporter touches no disk
	 */
	private get writer(): AllureWriter {
		this.writerInstance ??= new FileSystemWriter(this.options.resultsDir ?? "allure-results");
		return this.writerInstance;
	}

	onStart(_info: { name: string; startTime: number }): void {
		this.testCaseUuids = [];
	}

	onTestCaseComplete(result: TestCaseResult): void {
		const allureResult = convertTestCase(result, this.options, this.writer);
		this.writer.writeTestResult(allureResult);
		this.testCaseUuids.push(allureResult.uuid);
	}

	onComplete(result: TestResult): void {
		this.writer.writeContainer(convertToContainer(result, this.testCaseUuids));

		if (this.options.environmentInfo && Object.keys(this.options.environmentInfo).length > 0) {
			this.writer.writeEnvironment(this.options.environmentInfo);
		}
	}
}
