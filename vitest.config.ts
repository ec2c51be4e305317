import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		// loadConfig tests chdir, which worker threads do not allow
		pool: "forks",
	},
})
