/**
 * Execution Module
 *
 * TestCase, TestScenario and the per-case cleanup ledger.
 */

export * from "./execution.types";
export * from "./cleanup-ledger";
export * from "./test-case";
export * from "./test-scenario";
