#!/usr/bin/env node
/**
 * Stdio entry point for the SQL masking MCP server
 *
 * Config priority:
 *   1. CLI argument: a JSON object overlaid on the loaded config
 *   2. Environment variables
 *   3. config/config.local.yaml, then config/config.yaml
 *
 * Usage:
 *   node stdio.js '{"masking":{"mode":"business"}}'
 *
 * Or via environment variables:
 *   SQLMASK_MODE=semantic NAMING_ENABLED=true node stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { loadConfig, mergeConfig } from "./config/loadConfig.js"
import type { SqlMaskConfig } from "./config/loadConfig.js"
import { errorMessage } from "./errors.js"
import { createStderrLogger, parseLogLevel } from "./logger.js"
import createServer from "./index.js"

function resolveConfig(): SqlMaskConfig {
	const config = loadConfig()
	const configArg = process.argv[2]
	if (!configArg) return config
	return mergeConfig(config, JSON.parse(configArg))
}

async function main() {
	let config: SqlMaskConfig
	try {
		config = resolveConfig()
	} catch (e) {
		// Logging level is not known yet
		console.error("[ERROR] Failed to load config:", errorMessage(e))
		process.exit(1)
	}

	const logger = createStderrLogger(parseLogLevel(config.logging.level))
	logger.info("Starting SQL masking MCP server with stdio transport", {
		mode: config.masking.mode,
		backend: config.persistence.backend,
		naming: config.naming.enabled ? config.naming.url : "disabled",
	})
	if (config.persistence.backend === "postgres") {
		logger.info("Mapping database", {
			host: config.database.host,
			port: config.database.port,
			database: config.database.name,
		})
	}

	const app = createServer({ config, logger })
	if (app.namingClient) {
		const healthy = await app.namingClient.healthCheck()
		if (!healthy) logger.warn("Naming service unreachable; semantic mode will fall back to generated names")
		app.namingClient.startHealthChecks()
	}

	const transport = new StdioServerTransport()
	await app.connect(transport)

	logger.info("SQL masking MCP server running via stdio")

	const shutdown = async (signal: string) => {
		logger.info("Shutting down...", { signal })
		try {
			await app.close()
		} catch (error) {
			logger.error("Shutdown failed", { error: errorMessage(error) })
		}
		process.exit(0)
	}

	process.on("SIGINT", () => void shutdown("SIGINT"))
	process.on("SIGTERM", () => void shutdown("SIGTERM"))
}

main().catch((error) => {
	console.error("[ERROR] Fatal error:", errorMessage(error))
	process.exit(1)
})
