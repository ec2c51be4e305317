import { describe, it, expect, vi, beforeEach } from "vitest"
import { PersistenceError } from "./errors.js"
import type { Logger } from "./logger.js"
import type { MappingRepository } from "./mapping_repository.js"
import { MappingStore } from "./mapping_store.js"
import {
	describeError,
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
} from "./mask_tools.js"
import type { MaskToolContext, ToolResult } from "./mask_tools.js"
import { MaskingSession } from "./masking_session.js"
import type { MappingRecord } from "./sql_types.js"

const BASIC_SQL = "SELECT customer_id, name FROM customer_table WHERE customer_id = 5;"
const BASIC_MASKED = "SELECT col_1, col_2 FROM table_1 WHERE col_1 = 5;"

class MemoryRepository implements MappingRepository {
	readonly saved = new Map<string, MappingRecord[]>()

	async save(name: string, store: MappingStore): Promise<void> {
		this.saved.set(name, store.records())
	}

	async load(name: string): Promise<MappingStore> {
		const records = this.saved.get(name)
		if (!records) throw new PersistenceError(`Mapping "${name}" not found`, { name })
		return MappingStore.fromRecords(records)
	}

	async list(): Promise<string[]> {
		return [...this.saved.keys()].sort()
	}

	async close(): Promise<void> {}
}

function fakeLogger(): Logger {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

function payload(result: ToolResult): unknown {
	return JSON.parse(result.content[0].text)
}

describe("mask tools", () => {
	let ctx: MaskToolContext
	let repository: MemoryRepository

	beforeEach(() => {
		repository = new MemoryRepository()
		ctx = {
			session: new MaskingSession({ maxAttempts: 1 }),
			repository,
			defaultMappingSet: "default",
			logger: fakeLogger(),
		}
	})

	describe("mask_sql", () => {
		it("should return the masked SQL and its records", async () => {
			const result = await handleMaskSql({ sql: BASIC_SQL }, ctx)
			expect(result.isError).toBeUndefined()
			expect(payload(result)).toMatchObject({
				session_id: ctx.session.id,
				sql: BASIC_MASKED,
				mode: "deterministic",
				masked_tokens: 4,
				records: [
					{ role: "column", original: "customer_id", synthetic: "col_1", enabled: true },
					{ role: "column", original: "name", synthetic: "col_2", enabled: true },
					{ role: "table", original: "customer_table", synthetic: "table_1", enabled: true },
				],
			})
		})

		it("should report parse errors with their offset", async () => {
			const result = await handleMaskSql({ sql: "SELECT 'abc" }, ctx)
			expect(result.isError).toBe(true)
			expect(payload(result)).toEqual({
				error: { code: "parse", message: "Unterminated string literal at offset 7", offset: 7 },
			})
			expect(ctx.logger.warn).toHaveBeenCalledWith("Tool failed", {
				tool: "mask_sql",
				code: "parse",
				message: "Unterminated string literal at offset 7",
			})
		})

		it("should report the entity that could not be named", async () => {
			const result = await handleMaskSql({ sql: "SELECT col_1 FROM t" }, ctx)
			expect(result.isError).toBe(true)
			expect(payload(result)).toEqual({
				error: {
					code: "masking",
					message: 'Cannot mask column "col_1": no free name after 1 attempts',
					entity: { role: "column", original: "col_1" },
					reason: "no free name after 1 attempts",
					failures: [{ role: "column", original: "col_1", reason: "no free name after 1 attempts" }],
				},
			})
		})
	})

	describe("unmask_sql", () => {
		it("should restore the original names", async () => {
			await handleMaskSql({ sql: BASIC_SQL }, ctx)
			const result = await handleUnmaskSql({ text: "```sql\n" + BASIC_MASKED + "\n```" }, ctx)
			expect(payload(result)).toEqual({ sql: BASIC_SQL, replaced: 4, warnings: [] })
		})
	})

	describe("analyze_sql", () => {
		it("should classify without masking", async () => {
			const result = await handleAnalyzeSql({ sql: "SELECT id FROM t" }, ctx)
			expect(payload(result)).toEqual({
				session_id: ctx.session.id,
				counts: { catalog: 0, schema: 0, table: 1, column: 1, alias: 0, function: 0, string_value: 0 },
				entities: [
					{ role: "column", original: "id", occurrences: 1 },
					{ role: "table", original: "t", occurrences: 1 },
				],
				excluded_strings: [],
				reserved_tokens: 0,
			})
			expect(ctx.session.hasDocument).toBe(false)
		})
	})

	describe("list_mappings and set_mapping_enabled", () => {
		it("should filter records by role", async () => {
			await handleMaskSql({ sql: BASIC_SQL }, ctx)
			const result = await handleListMappings({ role: "table" }, ctx)
			expect(payload(result)).toEqual({
				count: 1,
				records: [{ role: "table", original: "customer_table", synthetic: "table_1", enabled: true }],
			})
		})

		it("should return the re-masked SQL after a toggle", async () => {
			await handleMaskSql({ sql: BASIC_SQL }, ctx)
			const result = await handleSetMappingEnabled({ role: "column", original: "name", enabled: false }, ctx)
			expect(payload(result)).toEqual({
				role: "column",
				original: "name",
				enabled: false,
				sql: "SELECT col_1, name FROM table_1 WHERE col_1 = 5;",
			})
		})

		it("should report unknown records", async () => {
			const result = await handleSetMappingEnabled({ role: "table", original: "missing", enabled: false }, ctx)
			expect(result.isError).toBe(true)
			expect(payload(result)).toEqual({
				error: { code: "masking", message: 'No mapping for table "missing"', recoverable: true },
			})
		})
	})

	describe("regenerate_mappings", () => {
		it("should fail before anything was masked", async () => {
			const result = await handleRegenerateMappings({}, ctx)
			expect(payload(result)).toEqual({
				error: { code: "masking", message: "No SQL has been masked in this session", recoverable: true },
			})
		})

		it("should return fresh records for the current SQL", async () => {
			await handleMaskSql({ sql: BASIC_SQL }, ctx)
			const result = await handleRegenerateMappings({ mode: "deterministic" }, ctx)
			expect(payload(result)).toMatchObject({ sql: BASIC_MASKED, mode: "deterministic" })
		})
	})

	describe("mapping persistence", () => {
		it("should save, clear and load a mapping", async () => {
			await handleMaskSql({ sql: BASIC_SQL }, ctx)
			expect(payload(await handleSaveMapping({}, ctx))).toEqual({ name: "default", records: 3 })
			expect(payload(await handleListSavedMappings(ctx))).toEqual({ names: ["default"] })

			expect(payload(await handleClearMappings(ctx))).toEqual({ cleared: 3 })
			expect(ctx.session.store.size).toBe(0)

			expect(payload(await handleLoadMapping({}, ctx))).toEqual({ name: "default", loaded: 3, total: 3, sql: null })
		})

		it("should re-mask the current SQL after a load", async () => {
			repository.saved.set("crm", [{ role: "column", original: "name", synthetic: "full_label", enabled: true }])
			await handleMaskSql({ sql: "SELECT name FROM t" }, ctx)
			ctx.session.setEnabled("column", "name", false)

			const result = await handleLoadMapping({ name: "crm" }, ctx)
			expect(payload(result)).toEqual({ name: "crm", loaded: 1, total: 2, sql: "SELECT full_label FROM table_1" })
		})

		it("should report missing mappings", async () => {
			const result = await handleLoadMapping({ name: "nope" }, ctx)
			expect(payload(result)).toEqual({
				error: { code: "persistence", message: 'Mapping "nope" not found', recoverable: true },
			})
		})

		it("should log unexpected failures as errors", async () => {
			vi.spyOn(repository, "list").mockRejectedValueOnce(new Error("disk gone"))
			const result = await handleListSavedMappings(ctx)
			expect(payload(result)).toEqual({ error: { code: "internal", message: "disk gone" } })
			expect(ctx.logger.error).toHaveBeenCalledWith("Unexpected tool error", {
				tool: "list_saved_mappings",
				error: "disk gone",
			})
		})
	})
})

describe("describeError", () => {
	it("should describe non-Error values", () => {
		expect(describeError("boom")).toEqual({ code: "internal", message: "boom" })
	})
})
