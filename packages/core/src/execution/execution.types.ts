import type { Logger } from "../logging";
import type { Interaction } from "../recording/recording.types";
import type { CleanupLedger } from "./cleanup-ledger";

/**
 * Removes one created entity. Any response status is accepted here; the
 * ledger decides which ones count as a clean removal.
 */
export type Remover<K> = (key: K) => Promise<{ code: number }>;

/**
 * Handed to a test case body, for one run of one test case.
 */
export interface TestContext {
	/** Runs `action` as a named, timed step; its error fails the case */
	step<T>(description: string, action: () => Promise<T> | T): Promise<T>;
	/** Drained after the body and the after hook, whatever their outcome */
	ledger<K extends string | number>(entity: string, remover: Remover<K>): CleanupLedger<K>;
	log: Logger;
}

export type TestCaseBody = (context: TestContext) => Promise<void> | void;

export type Severity = "blocker" | "critical" | "normal" | "minor" | "trivial";

/**
 * Reporting metadata; none of it changes how a case runs.
 */
export interface TestCaseMetadata {
	/** Allure id and TMS link */
	id?: string;
	issues?: string[];
	epic?: string;
	feature?: string;
	story?: string;
	severity?: Severity;
	tags?: string[];
	labels?: Record<string, string>;
	/** Markdown */
	description?: string;
}

/** Epoch milliseconds */
export interface Timed {
	startTime: number;
	endTime: number;
	duration: number;
}

/** Error of a failed step or case, flattened for reporters */
export interface FailureDetails {
	error?: string;
	/** e.g. `ContractViolationError`, `AwaitTimeoutError` */
	errorName?: string;
	stackTrace?: string;
}

/** `after` is the case's after hook; `cleanup` one removal drained from a ledger */
export type StepKind = "step" | "after" | "cleanup";

export interface TestStepResult extends Timed, FailureDetails {
	/** 1-based, in the order steps finished */
	stepNumber: number;
	kind: StepKind;
	description: string;
	passed: boolean;
}

export type TestCaseStatus = "passed" | "failed" | "skipped";

export interface TestCaseResult extends Timed, FailureDetails {
	name: string;
	status: TestCaseStatus;
	/** Same as `status === "passed"` */
	passed: boolean;
	steps: TestStepResult[];
	passedSteps: number;
	failedSteps: number;
	totalSteps: number;
	skipReason?: string;
	/** Exchanges made while the case ran, absent when there were none */
	interactions?: Interaction[];
	testCaseMetadata?: TestCaseMetadata;
}

export interface TestSummary {
	totalTestCases: number;
	passedTestCases: number;
	failedTestCases: number;
	skippedTestCases: number;
	totalSteps: number;
	passedSteps: number;
	failedSteps: number;
	totalDuration: number;
	averageDuration: number;
	totalInteractions: number;
	/** Passed over executed, 0 to 1; skipped cases do not count */
	passRate: number;
}

/**
 * Outcome of one scenario. It passed when no case failed; skipped cases
 * do not fail it.
 */
export interface TestResult extends Timed {
	name: string;
	passed: boolean;
	testCases: TestCaseResult[];
	passedTests: number;
	failedTests: number;
	skippedTests: number;
	totalTests: number;
	summary: TestSummary;
}
