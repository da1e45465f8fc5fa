/**
 * Allure Reporter for petprobe
 *
 * Writes Allure results for every test case a scenario runs.
 *
 * @example
 * ```typescript
 * import { scenario } from "petprobe";
 * import { AllureReporter } from "@petprobe/reporter-allure";
 *
 * const run = scenario({
 *   name: "Pet API",
 *   reporters: [
 *     new AllureReporter({
 *       resultsDir: "allure-results",
 *       includeInteractions: "both",
 *     }),
 *   ],
 * });
 * ```
 */

export { AllureReporter } from "./allure-reporter";
export * from "./result-converter";
export type { AllureReporterOptions, InteractionsMode } from "./types";
export { FileSystemWriter } from "./writers/file-writer";
export type { AllureWriter } from "./writers/writer";
export { ContentType, LabelName, LinkType, Stage, Status } from "allure-js-commons";
