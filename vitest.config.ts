import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: [
			"packages/*/test/**/*.test.ts",
			"packages/*/tests/**/*.test.ts",
			"apps/*/test/**/*.test.ts",
			"tests/**/*.test.ts",
		],
		environment: "node",
	},
});
