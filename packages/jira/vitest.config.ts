import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const here = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@tracklane/core": path.resolve(here, "../core/src/index.ts"),
		},
	},
	test: {
		name: "jira",
		globals: true,
		include: ["src/**/__tests__/**/*.test.ts"],
	},
});
