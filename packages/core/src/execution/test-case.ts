/**
 * Test Case
 *
 * An async body, an optional after hook and the cleanup ledgers the body
 * opens. The chainable setters only add reporting metadata; `skip` is the
 * one that changes how the case runs.
 */

import { type Logger, silentLogger } from "../logging";
import { CleanupLedger, type CleanupOutcome } from "./cleanup-ledger";
import type {
	Remover,
	Severity,
	StepKind,
	TestCaseBody,
	TestCaseMetadata,
	TestCaseResult,
	TestContext,
	TestStepResult,
} from "./execution.types";

export interface TestCaseExecuteOptions {
	logger?: Logger;
	onStepComplete?: (result: TestStepResult) => void;
}

type AfterHandler = (context: TestContext) => Promise<void> | void;

type SingleValued = "id" | "epic" | "feature" | "story" | "severity" | "description";

export class TestCase {
	private readonly metadata: TestCaseMetadata;
	private afterHandler?: AfterHandler;
	private _skipReason?: string;

	constructor(
		readonly name: string,
		private readonly body: TestCaseBody,
		metadata: TestCaseMetadata = {},
	) {
		this.metadata = { ...metadata };
	}

	private set<K extends SingleValued>(key: K, value: TestCaseMetadata[K]): this {
		this.metadata[key] = value;
		return this;
	}

	/** Allure id, also used for the TMS link */
	id(value: string): this {
		return this.set("id", value);
	}

	epic(value: string): this {
		return this.set("epic", value);
	}

	feature(value: string): this {
		return this.set("feature", value);
	}

	story(value: string): this {
		return this.set("story", value);
	}

	severity(value: Severity): this {
		return this.set("severity", value);
	}

	/** Markdown */
	description(text: string): this {
		return this.set("description", text);
	}

	tags(...values: string[]): this {
		this.metadata.tags = [...(this.metadata.tags ?? []), ...values];
		return this;
	}

	tag(value: string): this {
		return this.tags(value);
	}

	issue(id: string): this {
		this.metadata.issues = [...(this.metadata.issues ?? []), id];
		return this;
	}

	label(name: string, value: string): this {
		this.metadata.labels = { ...this.metadata.labels, [name]: value };
		return this;
	}

	/**
	 * Reports the case as skipped instead of running it, e.g. a check for
	 * a known service defect.
	 */
	skip(reason: string): this {
		this._skipReason = reason;
		return this;
	}

	get skipReason(): string | undefined {
		return this._skipReason;
	}

	getMetadata(): TestCaseMetadata {
		return { ...this.metadata };
	}

	/**
	 * Runs after the body whether it passed or not, before the ledgers drain
	 */
	after(handler: AfterHandler): this {
		this.afterHandler = handler;
		return this;
	}

	/**
	 * Never rejects: a failing body, after hook or cleanup ends up in the result
	 */
	async execute(options?: TestCaseExecuteOptions): Promise<TestCaseResult> {
		const startTime = Date.now();

		if (this._skipReason !== undefined) {
			return {
				name: this.name,
				status: "skipped",
				passed: true,
				duration: 0,
				startTime,
				endTime: startTime,
				steps: [],
				passedSteps: 0,
				failedSteps: 0,
				totalSteps: 0,
				skipReason: this._skipReason,
				testCaseMetadata: this.getMetadata(),
			};
		}

		const log = options?.logger ?? silentLogger;
		const steps: TestStepResult[] = [];
		const ledgers: Pick<CleanupLedger<string | number>, "drain">[] = [];

		const record = (kind: StepKind, description: string, began: number, error?: Error): void => {
			const endTime = Date.now();
			const result: TestStepResult = {
				stepNumber: steps.length + 1,
				kind,
				description,
				passed: error === undefined,
				duration: endTime - began,
				startTime: began,
				endTime,
				error: error?.message,
				errorName: error?.name,
				stackTrace: error?.stack,
			};
			steps.push(result);
			options?.onStepComplete?.(result);
		};

		const context: TestContext = {
			log,
			step: async <T>(description: string, action: () => Promise<T> | T): Promise<T> => {
				const began = Date.now();
				try {
					const value = await action();
					record("step", description, began);
					return value;
				} catch (error) {
					record("step", description, began, toError(error));
					throw error;
				}
			},
			ledger: <K extends string | number>(entity: string, remover: Remover<K>): CleanupLedger<K> => {
				const ledger = new CleanupLedger<K>(entity, remover, log);
				ledgers.push(ledger);
				return ledger;
			},
		};

		let failure: Error | undefined;
		try {
			await this.body(context);
		} catch (error) {
			failure = toError(error);
		} finally {
			if (this.afterHandler) {
				const began = Date.now();
				try {
					await this.afterHandler(context);
					record("after", "after", began);
				} catch (error) {
					const afterError = toError(error);
					record("after", "after", began, afterError);
					failure ??= afterError;
				}
			}

			for (const ledger of [...ledgers].reverse()) {
				for (const outcome of await ledger.drain()) {
					this.recordCleanup(outcome, record);
				}
			}
		}

		const endTime = Date.now();
		const passedSteps = steps.filter((s) => s.passed).length;

		return {
			name: this.name,
			status: failure ? "failed" : "passed",
			passed: failure === undefined,
			duration: endTime - startTime,
			startTime,
			endTime,
			steps,
			passedSteps,
			failedSteps: steps.length - passedSteps,
			totalSteps: steps.length,
			error: failure?.message,
			errorName: failure?.name,
			stackTrace: failure?.stack,
			testCaseMetadata: this.getMetadata(),
		};
	}

	private recordCleanup(
		outcome: CleanupOutcome,
		record: (kind: StepKind, description: string, began: number, error?: Error) => void,
	): void {
		const description = `cleanup ${outcome.entity} ${outcome.key}`;
		const began = Date.now() - outcome.duration;
		if (outcome.ok) {
			record("cleanup", description, began);
			return;
		}
		const reason = outcome.error ?? `unexpected status ${outcome.status}`;
		record("cleanup", description, began, new Error(`Cleanup failed: ${reason}`));
	}
}

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

/**
 * @example
 * const tc = testCase("Get pet", async ({ step }) => {
 *   await step("read", () => pets.getPetById(42));
 * })
 *   .epic("Pet Store")
 *   .feature("Pet API")
 *   .severity("critical");
 */
export function testCase(name: string, body: TestCaseBody, metadata?: TestCaseMetadata): TestCase {
	return new TestCase(name, body, metadata);
}
