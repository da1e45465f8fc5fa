/**
 * File System Writer
 *
 * One file per entry, named the way the Allure CLI globs for them:
 * `<uuid>-result.json`, `<uuid>-container.json`, `<uuid>-attachment.<ext>`.
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import { ContentType, type TestResult, type TestResultContainer } from "allure-js-commons";
import type { AllureWriter } from "./writer";

const EXTENSIONS: Partial<Record<ContentType, string>> = {
	[ContentType.JSON]: "json",
	[ContentType.TEXT]: "txt",
};

export class FileSystemWriter implements AllureWriter {
	constructor(readonly resultsDir: string) {
		fs.mkdirSync(resultsDir, { recursive: true });
	}

	writeTestResult(result: TestResult): void {
		this.writeJson(`${result.uuid}-result.json`, result);
	}

	writeContainer(container: TestResultContainer): void {
		this.writeJson(`${container.uuid}-container.json`, container);
	}

	writeEnvironment(info: Record<string, string>): void {
		const lines = Object.entries(info).map(([key, value]) => `${escapeKey(key)}=${value.replace(/\n/g, "\\n")}`);
		this.write("environment.properties", lines.join("\n"));
	}

	writeAttachment(content: string, contentType: ContentType): string {
		const source = `${randomUUID()}-attachment.${EXTENSIONS[contentType] ?? "bin"}`;
		this.write(source, content);
		return source;
	}

	private writeJson(file: string, value: TestResult | TestResultContainer): void {
		this.write(file, JSON.stringify(value, null, 2));
	}

	private write(file: string, content: string): void {
		fs.writeFileSync(path.join(this.resultsDir, file), content, "utf-8");
	}
}

// A .properties key ends at the first unescaped `=`, `:` or blank
function escapeKey(key: string): string {
	return key.replace(/([=: ])/g, "\\$1");
}
