/**
 * Mapping Store
 *
 * In-memory table of MappingRecords with O(1) lookups both ways:
 * - (role, original) → record
 * - synthetic → record, per namespace
 *
 * All identifier roles share one namespace (a synthetic table name may not
 * equal a synthetic column name); string values have their own. Identifier
 * originals and synthetics compare case-insensitively, string bodies exactly.
 */

import { z } from "zod"
import { MaskingError, PersistenceError } from "./errors.js"
import { isIdentifierRole } from "./sql_types.js"
import type { EntityRole, MappingRecord } from "./sql_types.js"

// ============================================================================
// Serialized form
// ============================================================================

export const entityRoleSchema = z.enum(["catalog", "schema", "table", "column", "alias", "function", "string_value"])

export const mappingRecordSchema = z.object({
	role: entityRoleSchema,
	original: z.string(),
	synthetic: z.string().min(1),
	enabled: z.boolean().default(true),
	spellings: z.record(z.string()).optional(),
})

export const mappingFileSchema = z.object({
	version: z.literal(1),
	records: z.array(mappingRecordSchema),
})

export type MappingFile = z.infer<typeof mappingFileSchema>

export type Namespace = "identifier" | "string_value"

export function namespaceOf(role: EntityRole): Namespace {
	return isIdentifierRole(role) ? "identifier" : "string_value"
}

/** Canonical form used for lookups: case-folded for identifiers, exact for strings. */
export function canonicalName(role: EntityRole, name: string): string {
	return isIdentifierRole(role) ? name.toLowerCase() : name
}

function copyRecord({ spellings, ...record }: MappingRecord): MappingRecord {
	return spellings ? { ...record, spellings: { ...spellings } } : record
}

export interface MergeOptions {
	/** Replace every record instead of keeping enabled ones */
	regenerate?: boolean
}

// ============================================================================
// Store
// ============================================================================

export class MappingStore {
	private byOriginal = new Map<string, MappingRecord>()
	private bySynthetic = new Map<string, MappingRecord>()

	private static originalIndex(role: EntityRole, original: string): string {
		return `${role}\u0000${canonicalName(role, original)}`
	}

	private static syntheticIndex(namespace: Namespace, synthetic: string): string {
		const name = namespace === "identifier" ? synthetic.toLowerCase() : synthetic
		return `${namespace}\u0000${name}`
	}

	/**
	 * Add or replace the record for (role, original).
	 * Throws MaskingError when the synthetic is already taken in its namespace.
	 */
	add(record: MappingRecord): MappingRecord {
		const originalKey = MappingStore.originalIndex(record.role, record.original)
		const syntheticKey = MappingStore.syntheticIndex(namespaceOf(record.role), record.synthetic)

		const holder = this.bySynthetic.get(syntheticKey)
		if (holder && MappingStore.originalIndex(holder.role, holder.original) !== originalKey) {
			throw new MaskingError([
				{
					role: record.role,
					original: record.original,
					reason: `synthetic "${record.synthetic}" is already used by ${holder.role} "${holder.original}"`,
				},
			])
		}

		const previous = this.byOriginal.get(originalKey)
		if (previous) {
			this.bySynthetic.delete(MappingStore.syntheticIndex(namespaceOf(previous.role), previous.synthetic))
		}

		const stored = copyRecord(record)
		this.byOriginal.set(originalKey, stored)
		this.bySynthetic.set(syntheticKey, stored)
		return copyRecord(stored)
	}

	get(role: EntityRole, original: string): MappingRecord | undefined {
		const record = this.byOriginal.get(MappingStore.originalIndex(role, original))
		return record ? copyRecord(record) : undefined
	}

	/** Alias of get(). */
	lookup(role: EntityRole, original: string): MappingRecord | undefined {
		return this.get(role, original)
	}

	has(role: EntityRole, original: string): boolean {
		return this.byOriginal.has(MappingStore.originalIndex(role, original))
	}

	/** Record of `role` whose synthetic is `synthetic`. */
	lookupSynthetic(role: EntityRole, synthetic: string): MappingRecord | undefined {
		const record = this.bySynthetic.get(MappingStore.syntheticIndex(namespaceOf(role), synthetic))
		return record && record.role === role ? copyRecord(record) : undefined
	}

	/** Record of any role in `namespace` whose synthetic is `synthetic`. */
	findSynthetic(synthetic: string, namespace: Namespace = "identifier"): MappingRecord | undefined {
		const record = this.bySynthetic.get(MappingStore.syntheticIndex(namespace, synthetic))
		return record ? copyRecord(record) : undefined
	}

	/** Is `synthetic` taken in `namespace`? */
	hasSynthetic(synthetic: string, namespace: Namespace): boolean {
		return this.bySynthetic.has(MappingStore.syntheticIndex(namespace, synthetic))
	}

	/** Returns false when no record exists for (role, original). */
	setEnabled(role: EntityRole, original: string, enabled: boolean): boolean {
		const record = this.byOriginal.get(MappingStore.originalIndex(role, original))
		if (!record) return false
		record.enabled = enabled
		return true
	}

	/**
	 * Give `spelling` of an identifier original its own synthetic spelling.
	 * `synthetic` must be a case variant of the record's synthetic.
	 */
	setSpelling(role: EntityRole, original: string, spelling: string, synthetic: string): boolean {
		const record = this.byOriginal.get(MappingStore.originalIndex(role, original))
		if (!record || synthetic.toLowerCase() !== record.synthetic.toLowerCase()) return false
		record.spellings = { ...record.spellings, [spelling]: synthetic }
		return true
	}

	enable(role: EntityRole, original: string): boolean {
		return this.setEnabled(role, original, true)
	}

	disable(role: EntityRole, original: string): boolean {
		return this.setEnabled(role, original, false)
	}

	records(role?: EntityRole): MappingRecord[] {
		const all = [...this.byOriginal.values()].map(copyRecord)
		return role ? all.filter((r) => r.role === role) : all
	}

	enabledRecords(): MappingRecord[] {
		return this.records().filter((r) => r.enabled)
	}

	get size(): number {
		return this.byOriginal.size
	}

	clear(): void {
		this.byOriginal.clear()
		this.bySynthetic.clear()
	}

	clone(): MappingStore {
		const copy = new MappingStore()
		for (const record of this.byOriginal.values()) copy.add(record)
		return copy
	}

	/**
	 * Fold `other` into this store. Records from `other` are added unless an
	 * enabled record for the same (role, original) exists here; disabled
	 * records are replaced. With `regenerate`, `other` replaces everything.
	 */
	merge(other: MappingStore, options: MergeOptions = {}): void {
		if (options.regenerate) {
			const staged = other.clone()
			this.byOriginal = staged.byOriginal
			this.bySynthetic = staged.bySynthetic
			return
		}
		const staged = this.clone()
		for (const record of other.records()) {
			const existing = staged.get(record.role, record.original)
			if (existing?.enabled) continue
			staged.add(record)
		}
		this.byOriginal = staged.byOriginal
		this.bySynthetic = staged.bySynthetic
	}

	toJSON(): MappingFile {
		return { version: 1, records: this.records() }
	}

	static fromRecords(records: readonly MappingRecord[]): MappingStore {
		const store = new MappingStore()
		for (const record of records) store.add(record)
		return store
	}

	/** Validate serialized data and build a store from it. */
	static fromJSON(data: unknown): MappingStore {
		const parsed = mappingFileSchema.safeParse(data)
		if (!parsed.success) {
			throw new PersistenceError("Invalid mapping data", {
				issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
			})
		}
		return MappingStore.fromRecords(parsed.data.records)
	}
}

/** Count records (or entities) per role, for summaries. */
export function countByRole(items: readonly { role: EntityRole }[]): Record<EntityRole, number> {
	const counts: Record<EntityRole, number> = {
		catalog: 0,
		schema: 0,
		table: 0,
		column: 0,
		alias: 0,
		function: 0,
		string_value: 0,
	}
	for (const item of items) counts[item.role]++
	return counts
}
