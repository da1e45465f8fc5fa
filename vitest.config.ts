import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export const alias = {
	petprobe: fromRoot("./packages/core/src/index.ts"),
	"@petprobe/reporter-allure": fromRoot("./packages/reporter-allure/src/index.ts"),
};

export default defineConfig({
	test: {
		watch: false,
		fileParallelism: true,
		// Integration tests poll the fake pet store
		testTimeout: 20_000,
		include: ["tests/**/*.test.ts"],
		exclude: ["node_modules"],
	},
	resolve: {
		alias,
	},
});
