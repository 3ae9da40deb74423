import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: "@atm-teller/core/logger", replacement: source("./packages/core/src/logger/index.ts") },
			{ find: "@atm-teller/core", replacement: source("./packages/core/src/index.ts") },
			{ find: "@atm-teller/teller", replacement: source("./packages/teller/src/index.ts") },
			{ find: "@atm-teller/memory-store", replacement: source("./packages/memory-store/src/index.ts") },
			{ find: "@atm-teller/test-utils", replacement: source("./packages/test-utils/src/index.ts") },
		],
	},
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "**/test-utils/**"],
			thresholds: {
				lines: 80,
				branches: 75,
				functions: 80,
				statements: 80,
			},
		},
	},
});
