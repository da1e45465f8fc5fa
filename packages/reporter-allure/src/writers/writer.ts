import type { ContentType, TestResult, TestResultContainer } from "allure-js-commons";

/**
 * Destination of the Allure results of one reporter. Every file Allure
 * reads (results, containers, attachments, `environment.properties`)
 * goes through it.
 */
export interface AllureWriter {
	writeTestResult(result: TestResult): void;
	writeContainer(container: TestResultContainer): void;
	writeEnvironment(info: Record<string, string>): void;
	/** @returns the `source` an Allure attachment refers to */
	writeAttachment(content: string, contentType: ContentType): string;
}
