/**
 * Recording Module
 *
 * Interaction recording and test reporting.
 */

export * from "./recording.types";
export * from "./interaction-recorder";
export * from "./reporter";
export * from "./console-reporter";
