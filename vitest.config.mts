import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		clearMocks: true,
		include: ["src/**/*.test.ts", "integration-tests/**/*.test.ts"],
		exclude: ["dist", "node_modules"],
		setupFiles: ["console-fail-test/setup"],
		testTimeout: 60_000,
		hookTimeout: 60_000,
		disableConsoleIntercept: true,
	},
});
