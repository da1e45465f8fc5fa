/**
 * Load Config
 *
 * Builds a PetprobeConfig from environment variables. Unset or empty
 * variables fall back to defaults; malformed ones raise ConfigError.
 */

import { copyPolicies, DEFAULT_AWAIT_POLICIES, scalePolicies } from "../await";
import { ConfigError } from "../errors";
import { isLogLevel, LOG_LEVELS } from "../logging";
import { DEFAULT_BASE_URL } from "../specs";
import { ENV_KEYS, type Env, type PetprobeConfig } from "./config.types";

function read(env: Env, key: string): string | undefined {
	const value = env[key]?.trim();
	return value ? value : undefined;
}

function readBaseUrl(env: Env): string {
	const value = read(env, ENV_KEYS.baseUrl) ?? DEFAULT_BASE_URL;
	let url: URL;
	try {
		url = new URL(value);
	} catch {
		throw new ConfigError(`${ENV_KEYS.baseUrl} is not a valid URL: ${value}`, ENV_KEYS.baseUrl);
	}
	if (url.protocol !== "http:" && url.protocol !== "https:") {
		throw new ConfigError(`${ENV_KEYS.baseUrl} must use http or https, got ${url.protocol}`, ENV_KEYS.baseUrl);
	}
	return value.replace(/\/+$/, "");
}

function readPollScale(env: Env): number {
	const value = read(env, ENV_KEYS.pollScale);
	if (value === undefined) {
		return 1;
	}
	const scale = Number(value);
	if (!Number.isFinite(scale) || scale <= 0) {
		throw new ConfigError(`${ENV_KEYS.pollScale} must be a positive number, got ${value}`, ENV_KEYS.pollScale);
	}
	return scale;
}

/**
 * Read the configuration.
 *
 * @example
 * const config = loadConfig({ PETPROBE_BASE_URL: "http://localhost:8080/v2" });
 */
export function loadConfig(env: Env = process.env): PetprobeConfig {
	const logLevel = read(env, ENV_KEYS.logLevel) ?? "info";
	if (!isLogLevel(logLevel)) {
		throw new ConfigError(
			`${ENV_KEYS.logLevel} must be one of ${LOG_LEVELS.join(", ")}, got ${logLevel}`,
			ENV_KEYS.logLevel,
		);
	}

	const scale = readPollScale(env);

	return {
		baseUrl: readBaseUrl(env),
		logLevel,
		allureResultsDir: read(env, ENV_KEYS.allureResults),
		policies: scale === 1 ? copyPolicies(DEFAULT_AWAIT_POLICIES) : scalePolicies(DEFAULT_AWAIT_POLICIES, scale),
	};
}
