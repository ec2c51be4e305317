/**
 * SQL masking MCP server
 *
 * Builds the McpServer, one active MaskingSession, the mapping repository
 * and (when enabled) the naming client from a validated SqlMaskConfig.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js"
import { sqlMaskConfigSchema } from "./config/loadConfig.js"
import type { SqlMaskConfig } from "./config/loadConfig.js"
import type { Logger } from "./logger.js"
import { createMappingRepository } from "./mapping_repository.js"
import type { MappingRepository } from "./mapping_repository.js"
import {
	analyzeSqlShape,
	handleAnalyzeSql,
	handleClearMappings,
	handleListMappings,
	handleListSavedMappings,
	handleLoadMapping,
	handleMaskSql,
	handleRegenerateMappings,
	handleSaveMapping,
	handleSetMappingEnabled,
	handleUnmaskSql,
	listMappingsShape,
	mappingNameShape,
	maskSqlShape,
	regenerateMappingsShape,
	setMappingEnabledShape,
	unmaskSqlShape,
} from "./mask_tools.js"
import type { MaskToolContext } from "./mask_tools.js"
import { MaskingSession } from "./masking_session.js"
import type { MaskingSessionOptions } from "./masking_session.js"
import { getNamingClient } from "./naming_client.js"
import type { NamingClient } from "./naming_client.js"
import type { NameSuggester } from "./sql_types.js"

export const configSchema = sqlMaskConfigSchema

export interface CreateServerOptions {
	config: SqlMaskConfig
	logger: Logger
	/** Defaults to the backend named in config.persistence */
	repository?: MappingRepository
	/** Defaults to the naming client when config.naming.enabled */
	suggest?: NameSuggester
}

export interface SqlMaskServer {
	server: McpServer
	context: MaskToolContext
	/** Set when config.naming.enabled */
	namingClient: NamingClient | null
	connect(transport: Transport): Promise<void>
	close(): Promise<void>
}

/**
 * Session options from config. `suggest` is only used in semantic mode.
 */
export function sessionOptionsFromConfig(
	config: SqlMaskConfig,
	logger: Logger,
	suggest?: NameSuggester,
): MaskingSessionOptions {
	return {
		mode: config.masking.mode,
		suggest,
		timeoutMs: config.naming.timeout_ms,
		concurrency: config.naming.concurrency,
		maxAttempts: config.masking.max_attempts,
		stringExclusions: config.masking.string_exclusions,
		exclusionPatterns: config.masking.string_exclusion_patterns.map((source) => new RegExp(source)),
		backslashEscapes: config.masking.backslash_escapes,
		preserveLikeWildcards: config.masking.preserve_like_wildcards,
		logger,
	}
}

export default function createServer(options: CreateServerOptions): SqlMaskServer {
	const { config, logger } = options

	const namingClient = config.naming.enabled
		? getNamingClient({
				url: config.naming.url,
				model: config.naming.model,
				apiKey: config.naming.api_key,
				timeoutMs: config.naming.timeout_ms,
				temperature: config.naming.temperature,
			})
		: null
	const suggest = options.suggest ?? namingClient?.asSuggester()

	const repository =
		options.repository ??
		createMappingRepository(
			{
				backend: config.persistence.backend,
				mappingDir: config.persistence.mapping_dir,
				database: config.database,
			},
			logger,
		)

	const context: MaskToolContext = {
		session: new MaskingSession(sessionOptionsFromConfig(config, logger, suggest)),
		repository,
		defaultMappingSet: config.persistence.mapping_set,
		logger,
	}

	const server = new McpServer({
		name: "sql-mask",
		version: "0.1.0",
	})

	server.tool(
		"mask_sql",
		"Replace table, column, alias, function, schema names and string literals in SQL with synthetic names. Keywords, builtins, numbers and structure are kept.",
		maskSqlShape,
		(args) => handleMaskSql(args, context),
	)

	server.tool(
		"unmask_sql",
		"Restore original names in masked SQL (fences and prose around the SQL are stripped). Reports synthetic-looking names that have no mapping.",
		unmaskSqlShape,
		(args) => handleUnmaskSql(args, context),
	)

	server.tool(
		"analyze_sql",
		"Classify the entities in SQL without masking it.",
		analyzeSqlShape,
		(args) => handleAnalyzeSql(args, context),
	)

	server.tool(
		"list_mappings",
		"List the current session's mapping records.",
		listMappingsShape,
		(args) => handleListMappings(args, context),
	)

	server.tool(
		"set_mapping_enabled",
		"Enable or disable one mapping record and return the re-masked SQL.",
		setMappingEnabledShape,
		(args) => handleSetMappingEnabled(args, context),
	)

	server.tool(
		"regenerate_mappings",
		"Assign fresh synthetic names to every entity of the current SQL.",
		regenerateMappingsShape,
		(args) => handleRegenerateMappings(args, context),
	)

	server.tool(
		"save_mapping",
		"Persist the current mapping under a name.",
		mappingNameShape,
		(args) => handleSaveMapping(args, context),
	)

	server.tool(
		"load_mapping",
		"Merge a saved mapping into the session; existing enabled records win.",
		mappingNameShape,
		(args) => handleLoadMapping(args, context),
	)

	server.tool("list_saved_mappings", "List the names of saved mappings.", () => handleListSavedMappings(context))

	server.tool("clear_mappings", "Forget the current SQL and mapping.", () => handleClearMappings(context))

	return {
		server,
		context,
		namingClient,
		async connect(transport: Transport): Promise<void> {
			await server.connect(transport)
		},
		async close(): Promise<void> {
			namingClient?.stopHealthChecks()
			try {
				await server.close()
			} finally {
				await repository.close()
			}
		},
	}
}
