/**
 * Synthetic name shapes.
 *
 * Deterministic names are role-prefixed counters (table_1, col_2, value_3).
 * Business names draw a role prefix and a business word from the fixed pools
 * in data/name_pools.json by a stable hash of the entity key, then append the
 * role counter (dim_invoice_3). Both shapes are recognizable, which is how the
 * unmasker spots synthetic names with no record.
 */

import { readDataFile } from "./sql_keywords.js"
import { ENTITY_ROLES } from "./sql_types.js"
import type { EntityRole } from "./sql_types.js"

// ============================================================================
// Deterministic names
// ============================================================================

export const DETERMINISTIC_PREFIX: Record<EntityRole, string> = {
	catalog: "catalog",
	schema: "schema",
	table: "table",
	column: "col",
	alias: "alias",
	function: "func",
	string_value: "value",
}

export function deterministicName(role: EntityRole, counter: number): string {
	return `${DETERMINISTIC_PREFIX[role]}_${counter}`
}

export const DETERMINISTIC_NAME_RE = /^(catalog|schema|table|col|alias|func|value)_\d+$/i

// ============================================================================
// Business pools
// ============================================================================

export interface NamePools {
	prefixes: Record<EntityRole, readonly string[]>
	words: readonly string[]
}

function stringList(value: unknown): string[] {
	return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : []
}

function loadNamePools(): NamePools {
	const raw = readDataFile("name_pools.json")
	if (typeof raw !== "object" || raw === null) throw new Error("name_pools.json must be an object")

	const rawPrefixes: unknown = Reflect.get(raw, "prefixes")
	const prefixFor = (role: EntityRole): readonly string[] => {
		const list =
			typeof rawPrefixes === "object" && rawPrefixes !== null ? stringList(Reflect.get(rawPrefixes, role)) : []
		return list.length > 0 ? list : [DETERMINISTIC_PREFIX[role]]
	}
	const prefixes: Record<EntityRole, readonly string[]> = {
		catalog: prefixFor("catalog"),
		schema: prefixFor("schema"),
		table: prefixFor("table"),
		column: prefixFor("column"),
		alias: prefixFor("alias"),
		function: prefixFor("function"),
		string_value: prefixFor("string_value"),
	}

	const words = stringList(Reflect.get(raw, "words"))
	if (words.length === 0) throw new Error("name_pools.json has no words")

	return { prefixes, words }
}

export const NAME_POOLS: NamePools = loadNamePools()

/** 32-bit FNV-1a: stable across runs and platforms. */
export function stableHash(text: string, seed = 0x811c9dc5): number {
	let hash = seed >>> 0
	for (let i = 0; i < text.length; i++) {
		hash ^= text.charCodeAt(i)
		hash = Math.imul(hash, 0x01000193) >>> 0
	}
	return hash
}

function pick<T>(list: readonly T[], hash: number): T {
	return list[hash % list.length]
}

export function businessName(role: EntityRole, key: string, counter: number, pools: NamePools = NAME_POOLS): string {
	const prefix = pick(pools.prefixes[role], stableHash(`${role}:${key}`))
	const word = pick(pools.words, stableHash(key))
	return `${prefix}_${word}_${counter}`
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/** Matches every name businessName can produce from `pools`. */
export function businessNamePattern(pools: NamePools = NAME_POOLS): RegExp {
	const prefixes = new Set<string>()
	for (const role of ENTITY_ROLES) {
		for (const p of pools.prefixes[role]) prefixes.add(escapeRegExp(p))
	}
	const words = pools.words.map(escapeRegExp)
	return new RegExp(`^(?:${[...prefixes].join("|")})_(?:${words.join("|")})_\\d+$`, "i")
}

const BUSINESS_NAME_RE = businessNamePattern()

/** Deterministic or business shape: a lexeme the generator could have produced. */
export function looksSynthetic(lexeme: string): boolean {
	return DETERMINISTIC_NAME_RE.test(lexeme) || BUSINESS_NAME_RE.test(lexeme)
}
