/**
 * Masking tools
 *
 * MCP tool handlers over one active MaskingSession. Each handler returns
 * JSON text content; errors become isError results carrying the error code,
 * message and offset or entity. Registration lives in index.ts.
 */

import { z } from "zod"
import { MaskingError, ParseError, SqlMaskError, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"
import type { MappingRepository } from "./mapping_repository.js"
import { entityRoleSchema } from "./mapping_store.js"
import type { MaskingSession } from "./masking_session.js"
import { NAMING_MODES } from "./sql_types.js"

// ============================================================================
// Types
// ============================================================================

export type ToolResult = {
	content: { type: "text"; text: string }[]
	isError?: boolean
}

export interface MaskToolContext {
	session: MaskingSession
	repository: MappingRepository
	/** Mapping set used when save_mapping / load_mapping get no name */
	defaultMappingSet: string
	logger: Logger
}

// ============================================================================
// Input shapes
// ============================================================================

const modeSchema = z.enum(NAMING_MODES)

export const maskSqlShape = {
	sql: z.string().min(1).describe("SQL text to mask"),
	mode: modeSchema.optional().describe("Naming mode (default from config)"),
	reuse_mapping: z
		.boolean()
		.optional()
		.describe("Keep the current mapping and only name new entities"),
}

export const unmaskSqlShape = {
	text: z.string().min(1).describe("Masked SQL, possibly inside markdown or prose"),
}

export const analyzeSqlShape = {
	sql: z.string().min(1).describe("SQL text to classify without masking"),
}

export const listMappingsShape = {
	role: entityRoleSchema.optional().describe("Only records of this role"),
}

export const setMappingEnabledShape = {
	role: entityRoleSchema,
	original: z.string().describe("Original name or literal body"),
	enabled: z.boolean(),
}

export const regenerateMappingsShape = {
	mode: modeSchema.optional(),
}

export const mappingNameShape = {
	name: z.string().min(1).optional().describe("Mapping set name (default from config)"),
}

export type MaskSqlInput = z.infer<z.ZodObject<typeof maskSqlShape>>
export type UnmaskSqlInput = z.infer<z.ZodObject<typeof unmaskSqlShape>>
export type AnalyzeSqlInput = z.infer<z.ZodObject<typeof analyzeSqlShape>>
export type ListMappingsInput = z.infer<z.ZodObject<typeof listMappingsShape>>
export type SetMappingEnabledInput = z.infer<z.ZodObject<typeof setMappingEnabledShape>>
export type RegenerateMappingsInput = z.infer<z.ZodObject<typeof regenerateMappingsShape>>
export type MappingNameInput = z.infer<z.ZodObject<typeof mappingNameShape>>

// ============================================================================
// Results
// ============================================================================

function jsonResult(payload: unknown): ToolResult {
	return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] }
}

/** Structured error payload for an isError result. */
export function describeError(error: unknown): Record<string, unknown> {
	if (error instanceof ParseError) {
		return { code: error.code, message: error.message, offset: error.offset }
	}
	if (error instanceof MaskingError) {
		return {
			code: error.code,
			message: error.message,
			entity: error.entity,
			reason: error.reason,
			failures: error.failures,
		}
	}
	if (error instanceof SqlMaskError) {
		return { code: error.code, message: error.message, recoverable: error.recoverable }
	}
	return { code: "internal", message: errorMessage(error) }
}

async function runTool(tool: string, ctx: MaskToolContext, fn: () => Promise<unknown>): Promise<ToolResult> {
	try {
		return jsonResult(await fn())
	} catch (error) {
		if (error instanceof SqlMaskError) {
			ctx.logger.warn("Tool failed", { tool, code: error.code, message: error.message })
		} else {
			ctx.logger.error("Unexpected tool error", { tool, error: errorMessage(error) })
		}
		return { content: [{ type: "text", text: JSON.stringify({ error: describeError(error) }, null, 2) }], isError: true }
	}
}

// ============================================================================
// Handlers
// ============================================================================

export function handleMaskSql(input: MaskSqlInput, ctx: MaskToolContext): Promise<ToolResult> {
	return runTool("mask_sql", ctx, async () => {
		const result = await ctx.session.mask(input.sql, { mode: input.mode, reuseMapping: input.reuse_mapping })
		return {
			session_id: result.sessionId,
			sql: result.sql,
			mode: result.mode,
			masked_tokens: result.maskedTokens,
			entities: result.entities,
			records: result.records,
		}
	})
}

export function handleUnmaskSql(input: UnmaskSqlInput, ctx: MaskToolContext): Promise<ToolResult> {
	return runTool("unmask_sql", ctx, async () => {
		const result = ctx.session.unmask(input.text)
		return { sql: result.sql, replaced: result.replaced, warnings: result.warnings }
	})
}

export function handleAnalyzeSql(input: AnalyzeSqlInput, ctx: MaskToolContext): Promise<ToolResult> {
	return runTool("analyze_sql", ctx, async () => {
		const result = ctx.session.analyze(input.sql)
		return {
			session_id: result.sessionId,
			counts: result.counts,
			entities: result.entities,
			excluded_strings: result.excludedStrings,
			reserved_tokens: result.reservedTokens,
		}
	})
}

export function handleListMappings(input: ListMappingsInput, ctx: MaskToolContext): Promise<ToolResult> {
	return runTool("list_mappings", ctx, async () => {
		const records = ctx.session.store.records(input.role)
		return { count: records.length, records }
	})
}

export function handleSetMappingEnabled(input: SetMappingEnabledInput, ctx: MaskToolContext): Promise<ToolResult> {
	return runTool("set_mapping_enabled", ctx, async () => {
		const found = ctx.session.setEnabled(input.role, input.original, input.enabled)
		if (!found) {
			throw new SqlMaskError("masking", `No mapping for ${input.role} "${input.original}"`, true, {
				role: input.role,
				original: input.original,
			})
		}
		return {
			role: input.role,
			original: input.original,
			enabled: input.enabled,
			sql: ctx.session.hasDocument ? ctx.session.remask() : null,
		}
	})
}

export function handleRegenerateMappings(input: RegenerateMappingsInput, ctx: MaskToolContext): Promise<ToolResult> {
	return runTool("regenerate_mappings", ctx, async () => {
		const result = await ctx.session.regenerate(input.mode)
		return { sql: result.sql, mode: result.mode, records: result.records }
	})
}

export function handleSaveMapping(input: MappingNameInput, ctx: MaskToolContext): Promise<ToolResult> {
	return runTool("save_mapping", ctx, async () => {
		const name = input.name ?? ctx.defaultMappingSet
		await ctx.repository.save(name, ctx.session.store)
		return { name, records: ctx.session.store.size }
	})
}

export function handleLoadMapping(input: MappingNameInput, ctx: MaskToolContext): Promise<ToolResult> {
	return runTool("load_mapping", ctx, async () => {
		const name = input.name ?? ctx.defaultMappingSet
		const loaded = await ctx.repository.load(name)
		ctx.session.loadMapping(loaded)
		return {
			name,
			loaded: loaded.size,
			total: ctx.session.store.size,
			sql: ctx.session.hasDocument ? ctx.session.remask() : null,
		}
	})
}

export function handleListSavedMappings(ctx: MaskToolContext): Promise<ToolResult> {
	return runTool("list_saved_mappings", ctx, async () => ({ names: await ctx.repository.list() }))
}

export function handleClearMappings(ctx: MaskToolContext): Promise<ToolResult> {
	return runTool("clear_mappings", ctx, async () => {
		const cleared = ctx.session.store.size
		ctx.session.clear()
		return { cleared }
	})
}
