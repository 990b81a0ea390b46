import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		name: "core",
		globals: true,
		include: ["src/**/__tests__/**/*.test.ts"],
	},
});
