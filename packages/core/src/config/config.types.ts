/**
 * Configuration Types
 */

import type { AwaitPolicies } from "../await";
import type { LogLevel } from "../logging";

export interface PetprobeConfig {
	/** Base address of the service under test, without trailing slash */
	baseUrl: string;
	logLevel: LogLevel;
	/** Directory for Allure results; unset disables the Allure reporter */
	allureResultsDir?: string;
	/** Await policies after PETPROBE_POLL_SCALE was applied */
	policies: AwaitPolicies;
}

/**
 * Environment variables read by loadConfig
 */
export const ENV_KEYS = {
	baseUrl: "PETPROBE_BASE_URL",
	logLevel: "PETPROBE_LOG_LEVEL",
	allureResults: "PETPROBE_ALLURE_RESULTS",
	pollScale: "PETPROBE_POLL_SCALE",
} as const;

export type Env = Record<string, string | undefined>;
