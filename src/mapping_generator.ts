/**
 * Mapping Generator
 *
 * Assigns a synthetic name to every entity.
 *
 * Modes:
 * - deterministic: role-prefixed counters (table_1, col_1, value_1)
 * - business: pooled words picked by a stable hash (dim_invoice_3)
 * - semantic: names suggested by an external collaborator for the detected
 *   domain, with per-entity deterministic fallback
 *
 * Every candidate is checked against keywords and builtins, synthetic names
 * already committed in its namespace, and original lexemes. Records are staged
 * in a clone of the store and committed only when every entity got a name.
 */

import { detectDomain } from "./domain_detector.js"
import { MaskingError, NamingCollaboratorError, errorMessage } from "./errors.js"
import type { MaskingFailure } from "./errors.js"
import { silentLogger } from "./logger.js"
import type { Logger } from "./logger.js"
import { MappingStore, canonicalName, namespaceOf } from "./mapping_store.js"
import type { Namespace } from "./mapping_store.js"
import { NAME_POOLS, businessName, deterministicName } from "./name_pools.js"
import type { NamePools } from "./name_pools.js"
import { isReservedWord } from "./sql_keywords.js"
import type { Entity, EntityRole, MappingRecord, NameSuggester, NamingMode } from "./sql_types.js"

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions {
	mode: NamingMode
	/** Existing mapping: records found here are reused, new ones are committed here */
	store?: MappingStore
	/** Extra names no synthetic may take */
	reserved?: Iterable<string>
	/** Semantic-mode collaborator */
	suggest?: NameSuggester
	/** Per-call budget for `suggest` (default 5000) */
	timeoutMs?: number
	/** Max `suggest` calls in flight (default 4) */
	concurrency?: number
	/** Collision retries per entity (default 1000) */
	maxAttempts?: number
	/** Keep leading/trailing % of string bodies (default true) */
	preserveLikeWildcards?: boolean
	pools?: NamePools
	logger?: Logger
}

export const DEFAULT_MAX_ATTEMPTS = 1000
export const DEFAULT_NAMING_TIMEOUT_MS = 5000
export const DEFAULT_NAMING_CONCURRENCY = 4

const IDENTIFIER_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/
const MAX_IDENTIFIER_LENGTH = 63
const STRING_BODY_RE = /^[^\u0000-\u001f\u007f'"\\]+$/
const MAX_STRING_LENGTH = 200

// ============================================================================
// LIKE wildcards
// ============================================================================

const LIKE_WILDCARDS_RE = /^(%*)([\s\S]*?)(%*)$/

/** Split "%Tel%" into ["%", "Tel", "%"]. Bodies that are all % have no core. */
export function splitLikeWildcards(body: string): [lead: string, core: string, trail: string] {
	const m = LIKE_WILDCARDS_RE.exec(body)
	if (!m || m[2].length === 0) return ["", body, ""]
	return [m[1], m[2], m[3]]
}

// ============================================================================
// Name validation
// ============================================================================

/** Accept a suggested name as-is, or return null. */
export function validateSuggestion(role: EntityRole, candidate: unknown): string | null {
	if (typeof candidate !== "string") return null
	const name = candidate.trim()
	if (role === "string_value") {
		return name.length <= MAX_STRING_LENGTH && STRING_BODY_RE.test(name) ? name : null
	}
	return name.length <= MAX_IDENTIFIER_LENGTH && IDENTIFIER_NAME_RE.test(name) ? name : null
}

// ============================================================================
// Collision tracking
// ============================================================================

class NameRegistry {
	private readonly taken = new Map<Namespace, Set<string>>([
		["identifier", new Set()],
		["string_value", new Set()],
	])
	private readonly originals = new Map<Namespace, Set<string>>([
		["identifier", new Set()],
		["string_value", new Set()],
	])
	private readonly reserved: Set<string>

	constructor(entities: readonly Entity[], store: MappingStore, reserved: Iterable<string>) {
		this.reserved = new Set([...reserved].map((r) => r.toLowerCase()))
		for (const e of entities) this.originals.get(namespaceOf(e.role))?.add(canonicalName(e.role, e.original))
		for (const r of store.records()) {
			this.originals.get(namespaceOf(r.role))?.add(canonicalName(r.role, r.original))
			this.taken.get(namespaceOf(r.role))?.add(canonicalName(r.role, r.synthetic))
		}
	}

	/** Why `candidate` cannot be used for `role`, or null when it is free. */
	conflict(role: EntityRole, candidate: string): string | null {
		const ns = namespaceOf(role)
		const name = canonicalName(role, candidate)
		if (isReservedWord(candidate) || this.reserved.has(candidate.toLowerCase())) return "reserved word"
		if (this.taken.get(ns)?.has(name)) return "already assigned"
		if (this.originals.get(ns)?.has(name)) return "equals an original name"
		return null
	}

	claim(role: EntityRole, candidate: string): void {
		this.taken.get(namespaceOf(role))?.add(canonicalName(role, candidate))
	}
}

// ============================================================================
// Semantic suggestions
// ============================================================================

/** Run `suggest` bounded by `timeoutMs`; the signal aborts on expiry. */
export async function suggestWithTimeout(
	suggest: NameSuggester,
	role: EntityRole,
	key: string,
	domain: string,
	timeoutMs: number,
): Promise<string> {
	const controller = new AbortController()
	let timeoutId: ReturnType<typeof setTimeout> | undefined
	const timeout = new Promise<never>((_, reject) => {
		timeoutId = setTimeout(() => {
			controller.abort()
			reject(new NamingCollaboratorError(`Naming timed out after ${timeoutMs}ms`, "timeout", { role, key }))
		}, timeoutMs)
	})
	try {
		const call = Promise.resolve().then(() => suggest(role, key, domain, controller.signal))
		return await Promise.race([call, timeout])
	} finally {
		clearTimeout(timeoutId)
	}
}

type SuggestionOutcome = { ok: true; value: string } | { ok: false; error: string }

/** Map over `items` with at most `limit` promises pending. Results keep input order. */
async function mapWithConcurrency<T, R>(
	items: readonly T[],
	limit: number,
	fn: (item: T) => Promise<R>,
): Promise<R[]> {
	const results: R[] = new Array(items.length)
	let next = 0
	const worker = async (): Promise<void> => {
		while (next < items.length) {
			const index = next++
			results[index] = await fn(items[index])
		}
	}
	const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker())
	await Promise.all(workers)
	return results
}

async function collectSuggestions(
	entities: readonly Entity[],
	domain: string,
	suggest: NameSuggester,
	timeoutMs: number,
	concurrency: number,
): Promise<Map<Entity, SuggestionOutcome>> {
	const outcomes = await mapWithConcurrency(entities, concurrency, async (entity): Promise<SuggestionOutcome> => {
		try {
			return { ok: true, value: await suggestWithTimeout(suggest, entity.role, entity.key, domain, timeoutMs) }
		} catch (error) {
			return { ok: false, error: errorMessage(error) }
		}
	})
	return new Map(entities.map((e, i): [Entity, SuggestionOutcome] => [e, outcomes[i]]))
}

// ============================================================================
// Generator
// ============================================================================

/**
 * Build the record set covering `entities`, in entity order.
 *
 * Entities that already have a record in `options.store` keep it. New records
 * are committed to `options.store` only when every entity was named;
 * otherwise MaskingError lists each failure and the store is untouched.
 */
export async function generateMappings(entities: readonly Entity[], options: GenerateOptions): Promise<MappingRecord[]> {
	const logger = options.logger ?? silentLogger
	const store = options.store ?? new MappingStore()
	const staged = store.clone()
	const registry = new NameRegistry(entities, store, options.reserved ?? [])
	const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
	const preserveWildcards = options.preserveLikeWildcards ?? true
	const pools = options.pools ?? NAME_POOLS

	const counters = new Map<EntityRole, number>()
	const failures: MaskingFailure[] = []
	const records: MappingRecord[] = []

	const fresh = entities.filter((e) => !store.has(e.role, e.original))

	let suggestions = new Map<Entity, SuggestionOutcome>()
	let domain: string | undefined
	if (options.mode === "semantic" && options.suggest) {
		domain = detectDomain(entities)
		const wanted = fresh.filter((e) => e.role !== "alias")
		logger.info("Requesting semantic names", { domain, count: wanted.length })
		suggestions = await collectSuggestions(
			wanted,
			domain,
			options.suggest,
			options.timeoutMs ?? DEFAULT_NAMING_TIMEOUT_MS,
			options.concurrency ?? DEFAULT_NAMING_CONCURRENCY,
		)
	}

	const wrap = (entity: Entity, core: string): string => {
		if (entity.role !== "string_value" || !preserveWildcards) return core
		const [lead, , trail] = splitLikeWildcards(entity.original)
		return `${lead}${core}${trail}`
	}

	/** Counter-based candidates until one is free or attempts run out. */
	const nextCounterName = (entity: Entity): string | null => {
		let counter = counters.get(entity.role) ?? 0
		for (let attempt = 0; attempt < maxAttempts; attempt++) {
			counter++
			const core =
				options.mode === "business" && entity.role !== "alias"
					? businessName(entity.role, entity.key, counter, pools)
					: deterministicName(entity.role, counter)
			const candidate = wrap(entity, core)
			if (registry.conflict(entity.role, candidate) === null) {
				counters.set(entity.role, counter)
				return candidate
			}
		}
		counters.set(entity.role, counter)
		return null
	}

	for (const entity of entities) {
		const existing = store.get(entity.role, entity.original)
		if (existing) {
			records.push(existing)
			continue
		}

		let synthetic: string | null = null

		const outcome = suggestions.get(entity)
		if (outcome) {
			const accepted = outcome.ok ? validateSuggestion(entity.role, outcome.value) : null
			const reason = !outcome.ok
				? outcome.error
				: accepted === null
					? "malformed suggestion"
					: registry.conflict(entity.role, wrap(entity, accepted))
			if (accepted !== null && reason === null) {
				synthetic = wrap(entity, accepted)
			} else {
				logger.warn("Semantic name rejected, using fallback", { role: entity.role, key: entity.key, reason })
			}
		}

		synthetic ??= nextCounterName(entity)
		if (synthetic === null) {
			failures.push({
				role: entity.role,
				original: entity.original,
				reason: `no free name after ${maxAttempts} attempts`,
			})
			continue
		}

		registry.claim(entity.role, synthetic)
		const record: MappingRecord = { role: entity.role, original: entity.original, synthetic, enabled: true }
		staged.add(record)
		records.push(record)
	}

	if (failures.length > 0) throw new MaskingError(failures)

	store.merge(staged)
	logger.debug("Mappings generated", { mode: options.mode, domain, total: records.length, added: fresh.length })
	return records
}
