/**
 * Result Converter
 *
 * Maps scenario and test case results onto Allure's result model. Only
 * `convertTestCase` touches the writer, to store the interactions
 * attachment.
 */

import { createHash, randomUUID } from "node:crypto";
import {
	type StepResult as AllureStepResult,
	type TestResult as AllureTestResult,
	type Attachment,
	ContentType,
	type Label,
	LabelName,
	type Link,
	LinkType,
	type Parameter,
	Stage,
	Status,
	type StatusDetails,
	type TestResultContainer,
} from "allure-js-commons";
import {
	type Interaction,
	type TestCaseMetadata,
	type TestCaseResult,
	type TestCaseStatus,
	type TestResult,
	type TestStepResult,
	truncate,
} from "petprobe";
import type { AllureReporterOptions } from "./types";
import type { AllureWriter } from "./writers/writer";

/**
 * Errors meaning the service disagreed with the suite. Anything else
 * means the run itself broke.
 */
export const FAILURE_ERROR_NAMES: readonly string[] = ["ContractViolationError", "AwaitTimeoutError"];

/**
 * `broken` for a failure that is not one of FAILURE_ERROR_NAMES
 */
export function convertStatus(status: TestCaseStatus, errorName?: string): Status {
	switch (status) {
		case "passed":
			return Status.PASSED;
		case "skipped":
			return Status.SKIPPED;
		case "failed":
			return errorName !== undefined && FAILURE_ERROR_NAMES.includes(errorName) ? Status.FAILED : Status.BROKEN;
	}
}

export function convertStatusDetails(error?: string, stackTrace?: string): StatusDetails | undefined {
	if (!error && !stackTrace) {
		return undefined;
	}
	return {
		message: error,
		trace: stackTrace,
	};
}

/**
 * Framework labels, then the reporter's own, then the case's. A case's
 * epic and feature win over the reporter defaults.
 */
export function convertMetadataToLabels(
	metadata: TestCaseMetadata | undefined,
	options: AllureReporterOptions,
): Label[] {
	const label = (name: string, value: string | undefined): Label[] => (value ? [{ name, value }] : []);

	return [
		...label(LabelName.FRAMEWORK, "petprobe"),
		...label(LabelName.LANGUAGE, "typescript"),
		...(options.labels ?? []),
		...label(LabelName.ALLURE_ID, metadata?.id),
		...label(LabelName.EPIC, metadata?.epic ?? options.defaultEpic),
		...label(LabelName.FEATURE, metadata?.feature ?? options.defaultFeature),
		...label(LabelName.STORY, metadata?.story),
		...label(LabelName.SEVERITY, metadata?.severity),
		...(metadata?.tags ?? []).map((tag) => ({ name: LabelName.TAG, value: tag })),
		...Object.entries(metadata?.labels ?? {}).map(([name, value]) => ({ name, value })),
	];
}

/**
 * A TMS link for the case id and an issue link per issue, each only when
 * its URL pattern is configured.
 */
export function convertMetadataToLinks(metadata: TestCaseMetadata | undefined, options: AllureReporterOptions): Link[] {
	const link = (pattern: string | undefined, id: string, type: LinkType): Link[] =>
		pattern ? [{ name: id, url: pattern.replace("{id}", id), type }] : [];

	return [
		...(metadata?.id ? link(options.tmsUrlPattern, metadata.id, LinkType.TMS) : []),
		...(metadata?.issues ?? []).flatMap((issue) => link(options.issueUrlPattern, issue, LinkType.ISSUE)),
	];
}

/**
 * The after hook and cleanup removals are named `[after] ...` and `[cleanup] ...`
 */
export function convertStep(step: TestStepResult): AllureStepResult {
	const name = step.kind === "step" ? step.description : `[${step.kind}] ${step.description}`;

	return {
		name,
		status: convertStatus(step.passed ? "passed" : "failed", step.errorName),
		statusDetails: convertStatusDetails(step.error, step.stackTrace) ?? { message: undefined },
		stage: Stage.FINISHED,
		start: step.startTime,
		stop: step.endTime,
		steps: [],
		attachments: [],
		parameters: [],
	};
}

/**
 * One parameter per exchange: `#1 GET https://…/pet/1` → `200`
 */
export function convertInteractionsToParameters(interactions: Interaction[], maxSize = 1000): Parameter[] {
	return interactions.map((interaction, index) => ({
		name: `#${index + 1} ${interaction.method} ${interaction.url}`,
		value: truncate(
			interaction.responseStatus !== undefined ? String(interaction.responseStatus) : (interaction.error ?? "pending"),
			maxSize,
		),
	}));
}

/**
 * Write the exchanges as one JSON attachment
 */
export function attachInteractions(interactions: Interaction[], writer: AllureWriter): Attachment {
	const source = writer.writeAttachment(JSON.stringify(interactions, null, 2), ContentType.JSON);
	return {
		name: "HTTP interactions",
		source,
		type: ContentType.JSON,
	};
}

/**
 * Skipped cases carry their skip reason as the status message.
 */
export function convertTestCase(
	testCase: TestCaseResult,
	options: AllureReporterOptions,
	writer?: AllureWriter,
): AllureTestResult {
	const metadata = testCase.testCaseMetadata;
	const include = options.includeInteractions ?? "attachments";
	const interactions = testCase.interactions ?? [];

	const attachments: Attachment[] = [];
	const parameters: Parameter[] = [];
	if (interactions.length > 0) {
		if ((include === "attachments" || include === "both") && writer) {
			attachments.push(attachInteractions(interactions, writer));
		}
		if (include === "parameters" || include === "both") {
			parameters.push(...convertInteractionsToParameters(interactions, options.maxParameterSize));
		}
	}

	const statusDetails =
		testCase.status === "skipped"
			? { message: testCase.skipReason }
			: convertStatusDetails(testCase.error, testCase.stackTrace);

	// Stable across runs, so Allure can track a case's history
	const historyId = createHash("md5").update(testCase.name).digest("hex");

	return {
		uuid: randomUUID(),
		historyId,
		testCaseId: historyId,
		name: testCase.name,
		fullName: testCase.name,
		description: metadata?.description,
		status: convertStatus(testCase.status, testCase.errorName),
		statusDetails: statusDetails ?? { message: undefined },
		stage: Stage.FINISHED,
		start: testCase.startTime,
		stop: testCase.endTime,
		steps: testCase.steps.map(convertStep),
		labels: convertMetadataToLabels(metadata, options),
		links: convertMetadataToLinks(metadata, options),
		attachments,
		parameters,
	};
}

export function convertToContainer(testResult: TestResult, testCaseUuids: string[]): TestResultContainer {
	return {
		uuid: randomUUID(),
		name: testResult.name,
		children: testCaseUuids,
		befores: [],
		afters: [],
	};
}
