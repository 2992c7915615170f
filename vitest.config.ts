import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/cli/**", "src/logger.ts", "src/ui.ts"],
			thresholds: {
				// Identity derivation must stay bit-for-bit stable
				"src/romname.ts": { statements: 95, branches: 90 },
				"src/rwlock.ts": { statements: 90 },
				"src/library/store.ts": { statements: 85 },
				"src/ipc/server.ts": { statements: 80 },
			},
		},
	},
})
