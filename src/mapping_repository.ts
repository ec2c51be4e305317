/**
 * Mapping persistence
 *
 * One MappingRepository interface, two backends:
 * - FileMappingRepository: one JSON file per mapping set; also reads the
 *   legacy per-category layout {"tables": {...}, "columns": {...}, ...}
 * - PgMappingRepository: table sql_mask_mappings, written in one transaction
 */

import * as fs from "fs"
import * as path from "path"
import pg from "pg"
import { z } from "zod"
import { PersistenceError, SqlMaskError, errorMessage } from "./errors.js"
import { silentLogger } from "./logger.js"
import type { Logger } from "./logger.js"
import { MappingStore, mappingRecordSchema } from "./mapping_store.js"
import type { EntityRole, MappingRecord } from "./sql_types.js"

// ============================================================================
// Types
// ============================================================================

export interface MappingRepository {
	save(name: string, store: MappingStore): Promise<void>
	load(name: string): Promise<MappingStore>
	list(): Promise<string[]>
	close(): Promise<void>
}

const MAPPING_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/

export function validateMappingName(name: string): string {
	if (!MAPPING_NAME_RE.test(name) || name.includes("..")) {
		throw new PersistenceError(`Invalid mapping name "${name}"`, { name })
	}
	return name
}

// ============================================================================
// Legacy layout
// ============================================================================

const legacyMappingSchema = z
	.object({
		tables: z.record(z.string()),
		columns: z.record(z.string()),
		strings: z.record(z.string()),
		functions: z.record(z.string()),
		aliases: z.record(z.string()),
	})
	.partial()

type LegacyCategory = keyof z.infer<typeof legacyMappingSchema>

const LEGACY_CATEGORIES: ReadonlyArray<readonly [category: LegacyCategory, role: EntityRole]> = [
	["tables", "table"],
	["columns", "column"],
	["strings", "string_value"],
	["functions", "function"],
	["aliases", "alias"],
]

function stripQuotes(value: string): string {
	return value.length >= 2 && value.startsWith("'") && value.endsWith("'") ? value.slice(1, -1) : value
}

export function isLegacyMapping(data: unknown): boolean {
	if (typeof data !== "object" || data === null || "version" in data) return false
	return LEGACY_CATEGORIES.some(([category]) => category in data)
}

/** Records from the per-category layout; every record is enabled. */
export function parseLegacyMapping(data: unknown): MappingStore {
	const parsed = legacyMappingSchema.safeParse(data)
	if (!parsed.success) {
		throw new PersistenceError("Invalid legacy mapping data", {
			issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
		})
	}
	const records: MappingRecord[] = []
	for (const [category, role] of LEGACY_CATEGORIES) {
		const entries = parsed.data[category] ?? {}
		for (const [original, synthetic] of Object.entries(entries)) {
			records.push(
				role === "string_value"
					? { role, original: stripQuotes(original), synthetic: stripQuotes(synthetic), enabled: true }
					: { role, original, synthetic, enabled: true },
			)
		}
	}
	return MappingStore.fromRecords(records)
}

/** Current or legacy serialized mapping. */
export function parseMappingData(data: unknown): MappingStore {
	return isLegacyMapping(data) ? parseLegacyMapping(data) : MappingStore.fromJSON(data)
}

// ============================================================================
// File backend
// ============================================================================

export class FileMappingRepository implements MappingRepository {
	constructor(
		private readonly dir: string,
		private readonly logger: Logger = silentLogger,
	) {}

	private fileFor(name: string): string {
		return path.join(this.dir, `${validateMappingName(name)}.json`)
	}

	async save(name: string, store: MappingStore): Promise<void> {
		const file = this.fileFor(name)
		try {
			await fs.promises.mkdir(this.dir, { recursive: true })
			await fs.promises.writeFile(file, JSON.stringify(store.toJSON(), null, 2) + "\n", "utf-8")
		} catch (error) {
			throw new PersistenceError(`Failed to save mapping "${name}": ${errorMessage(error)}`, { file })
		}
		this.logger.info("Mapping saved", { name, file, records: store.size })
	}

	async load(name: string): Promise<MappingStore> {
		const file = this.fileFor(name)
		let content: string
		try {
			content = await fs.promises.readFile(file, "utf-8")
		} catch (error) {
			throw new PersistenceError(`Mapping "${name}" not found`, { file, originalError: errorMessage(error) })
		}

		let data: unknown
		try {
			data = JSON.parse(content)
		} catch (error) {
			throw new PersistenceError(`Mapping "${name}" is not valid JSON: ${errorMessage(error)}`, { file })
		}

		const store = parseMappingData(data)
		this.logger.info("Mapping loaded", { name, file, records: store.size, legacy: isLegacyMapping(data) })
		return store
	}

	async list(): Promise<string[]> {
		let entries: string[]
		try {
			entries = await fs.promises.readdir(this.dir)
		} catch (error) {
			if (error instanceof Error && "code" in error && error.code === "ENOENT") return []
			throw new PersistenceError(`Cannot list mappings: ${errorMessage(error)}`, { dir: this.dir })
		}
		return entries
			.filter((f) => f.endsWith(".json"))
			.map((f) => f.slice(0, -".json".length))
			.sort()
	}

	async close(): Promise<void> {}
}

// ============================================================================
// PostgreSQL backend
// ============================================================================

/** The part of pg's PoolClient this backend uses */
export interface PgClientLike {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>
	release(): void
}

/** The part of pg's Pool this backend uses */
export interface PgPoolLike {
	connect(): Promise<PgClientLike>
	end(): Promise<void>
}

export const MAPPING_TABLE_DDL = `
CREATE TABLE IF NOT EXISTS sql_mask_mappings (
	mapping_set TEXT NOT NULL,
	role TEXT NOT NULL,
	original TEXT NOT NULL,
	synthetic TEXT NOT NULL,
	enabled BOOLEAN NOT NULL DEFAULT TRUE,
	position INTEGER NOT NULL DEFAULT 0,
	spellings JSONB,
	PRIMARY KEY (mapping_set, role, original)
);
ALTER TABLE sql_mask_mappings ADD COLUMN IF NOT EXISTS spellings JSONB`

const mappingRowSchema = mappingRecordSchema.extend({
	enabled: z.boolean(),
	spellings: z
		.record(z.string())
		.nullish()
		.transform((v) => v ?? undefined),
})
const mappingSetRowSchema = z.object({ mapping_set: z.string() })

export class PgMappingRepository implements MappingRepository {
	private schemaReady = false

	constructor(
		private readonly pool: PgPoolLike,
		private readonly logger: Logger = silentLogger,
	) {}

	private async withClient<T>(action: string, fn: (client: PgClientLike) => Promise<T>): Promise<T> {
		let client: PgClientLike | null = null
		try {
			client = await this.pool.connect()
			if (!this.schemaReady) {
				await client.query(MAPPING_TABLE_DDL)
				this.schemaReady = true
			}
			return await fn(client)
		} catch (error) {
			if (error instanceof SqlMaskError) throw error
			this.logger.error(`Mapping ${action} failed`, { error: errorMessage(error) })
			throw new PersistenceError(`Mapping ${action} failed: ${errorMessage(error)}`)
		} finally {
			client?.release()
		}
	}

	async save(name: string, store: MappingStore): Promise<void> {
		validateMappingName(name)
		const records = store.records()
		await this.withClient("save", async (client) => {
			try {
				await client.query("BEGIN")
				await client.query("DELETE FROM sql_mask_mappings WHERE mapping_set = $1", [name])
				for (let i = 0; i < records.length; i++) {
					const r = records[i]
					await client.query(
						`INSERT INTO sql_mask_mappings (mapping_set, role, original, synthetic, enabled, position, spellings)
						 VALUES ($1, $2, $3, $4, $5, $6, $7)`,
						[name, r.role, r.original, r.synthetic, r.enabled, i, r.spellings ? JSON.stringify(r.spellings) : null],
					)
				}
				await client.query("COMMIT")
			} catch (err) {
				await client.query("ROLLBACK")
				throw err
			}
		})
		this.logger.info("Mapping saved", { name, backend: "postgres", records: records.length })
	}

	async load(name: string): Promise<MappingStore> {
		validateMappingName(name)
		const rows = await this.withClient("load", async (client) => {
			const result = await client.query(
				`SELECT role, original, synthetic, enabled, spellings
				 FROM sql_mask_mappings
				 WHERE mapping_set = $1
				 ORDER BY position`,
				[name],
			)
			return result.rows
		})
		if (rows.length === 0) throw new PersistenceError(`Mapping "${name}" not found`, { name })

		const parsed = z.array(mappingRowSchema).safeParse(rows)
		if (!parsed.success) {
			throw new PersistenceError(`Mapping "${name}" has invalid rows`, {
				issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
			})
		}
		this.logger.info("Mapping loaded", { name, backend: "postgres", records: parsed.data.length })
		return MappingStore.fromRecords(parsed.data)
	}

	async list(): Promise<string[]> {
		return this.withClient("list", async (client) => {
			const result = await client.query("SELECT DISTINCT mapping_set FROM sql_mask_mappings ORDER BY mapping_set")
			return z.array(mappingSetRowSchema).parse(result.rows).map((r) => r.mapping_set)
		})
	}

	async close(): Promise<void> {
		await this.pool.end()
	}
}

// ============================================================================
// Factory
// ============================================================================

export interface RepositorySettings {
	backend: "file" | "postgres"
	mappingDir: string
	database: {
		host: string
		port: number
		name: string
		user: string
		password: string
	}
}

export function createMappingRepository(settings: RepositorySettings, logger: Logger = silentLogger): MappingRepository {
	if (settings.backend === "postgres") {
		const pool = new pg.Pool({
			host: settings.database.host,
			port: settings.database.port,
			database: settings.database.name,
			user: settings.database.user,
			password: settings.database.password,
		})
		return new PgMappingRepository(pool, logger)
	}
	return new FileMappingRepository(settings.mappingDir, logger)
}
