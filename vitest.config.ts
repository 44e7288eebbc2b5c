import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		watch: false,
		fileParallelism: true,
		include: ["tests/**/*.test.ts"],
		exclude: ["node_modules"],
	},
	resolve: {
		alias: {
			"@trialrun/reporter-allure": fileURLToPath(new URL("./packages/reporter-allure/src", import.meta.url)),
			trialrun: fileURLToPath(new URL("./packages/core/src", import.meta.url)),
		},
	},
});
