import { defineConfig } from "vitest/config";
import { alias } from "./vitest.config";

/**
 * Runs the suites against the live service (PETPROBE_BASE_URL).
 * Polling waits up to 20s per call, hence the long test timeout.
 */
export default defineConfig({
	test: {
		watch: false,
		fileParallelism: false,
		include: ["suites/**/*.conformance.test.ts"],
		testTimeout: 120_000,
		hookTimeout: 60_000,
	},
	resolve: {
		alias,
	},
});
