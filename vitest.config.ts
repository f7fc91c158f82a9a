import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		env: {
			PAGEPILOT_LOGGING_LEVEL: "error",
		},
		testTimeout: 10000,
	},
});
