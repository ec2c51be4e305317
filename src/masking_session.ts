/**
 * Masking Session
 *
 * One session per SQL document. Orchestrates:
 * 1. tokenize + classify (analyze)
 * 2. generate mappings (fresh, or reusing the loaded mapping)
 * 3. rewrite into masked SQL
 *
 * and afterwards toggling, regeneration, mapping merge and unmasking.
 * Nothing in the session changes when masking throws.
 */

import { v4 as uuidv4 } from "uuid"
import { classify, unmaskedLexemes } from "./entity_classifier.js"
import type { StringExclusionRule } from "./entity_classifier.js"
import { SqlMaskError } from "./errors.js"
import { silentLogger } from "./logger.js"
import type { Logger } from "./logger.js"
import { generateMappings } from "./mapping_generator.js"
import type { MappingRepository } from "./mapping_repository.js"
import { MappingStore, countByRole } from "./mapping_store.js"
import type { MergeOptions } from "./mapping_store.js"
import { countMaskedTokens, recordSpellings, rewrite } from "./sql_rewriter.js"
import { stringBody, tokenize } from "./sql_tokenizer.js"
import { unmask } from "./sql_unmasker.js"
import type { UnmaskResult } from "./sql_unmasker.js"
import type { Classification, EntityRole, MappingRecord, NameSuggester, NamingMode, Token } from "./sql_types.js"

// ============================================================================
// Types
// ============================================================================

export interface MaskingSessionOptions {
	mode?: NamingMode
	suggest?: NameSuggester
	timeoutMs?: number
	concurrency?: number
	maxAttempts?: number
	stringExclusions?: readonly StringExclusionRule[]
	exclusionPatterns?: readonly RegExp[]
	backslashEscapes?: boolean
	preserveLikeWildcards?: boolean
	logger?: Logger
}

export interface MaskOptions {
	mode?: NamingMode
	/** Keep the session's current mapping and only name new entities */
	reuseMapping?: boolean
}

export interface EntitySummary {
	role: EntityRole
	original: string
	occurrences: number
}

export interface ExcludedLiteral {
	literal: string
	rule: string
	offset: number
}

export interface AnalyzeResult {
	sessionId: string
	entities: EntitySummary[]
	counts: Record<EntityRole, number>
	excludedStrings: ExcludedLiteral[]
	/** Identifier tokens protected as keywords or builtins */
	reservedTokens: number
}

export interface MaskResult {
	sessionId: string
	sql: string
	mode: NamingMode
	records: MappingRecord[]
	entities: EntitySummary[]
	maskedTokens: number
}

interface Analysis {
	tokens: Token[]
	classification: Classification
}

// ============================================================================
// Session
// ============================================================================

export class MaskingSession {
	readonly id: string = uuidv4()
	private analysis: Analysis | null = null
	private mappingStore: MappingStore
	private readonly logger: Logger

	constructor(
		private readonly options: MaskingSessionOptions = {},
		store: MappingStore = new MappingStore(),
	) {
		this.mappingStore = store
		this.logger = options.logger ?? silentLogger
	}

	get store(): MappingStore {
		return this.mappingStore
	}

	get hasDocument(): boolean {
		return this.analysis !== null
	}

	private parse(sql: string): Analysis {
		const tokens = tokenize(sql, { backslashEscapes: this.options.backslashEscapes })
		const classification = classify(tokens, {
			stringExclusions: this.options.stringExclusions,
			exclusionPatterns: this.options.exclusionPatterns,
		})
		return { tokens, classification }
	}

	private generate(analysis: Analysis, mode: NamingMode, store: MappingStore): Promise<MappingRecord[]> {
		return generateMappings(analysis.classification.entities, {
			mode,
			store,
			reserved: unmaskedLexemes(analysis.tokens, analysis.classification),
			suggest: this.options.suggest,
			timeoutMs: this.options.timeoutMs,
			concurrency: this.options.concurrency,
			maxAttempts: this.options.maxAttempts,
			preserveLikeWildcards: this.options.preserveLikeWildcards,
			logger: this.logger,
		})
	}

	/** Case variants for spellings of the document the three case forms cannot tell apart. */
	private recordSpellings(analysis: Analysis, store: MappingStore): void {
		const exhausted = recordSpellings(analysis.tokens, analysis.classification, store)
		if (exhausted.length > 0) {
			this.logger.warn("No case variant left; these spellings unmask as the recorded original", {
				session_id: this.id,
				spellings: exhausted,
			})
		}
	}

	private summarize(classification: Classification): EntitySummary[] {
		return classification.entities.map((e) => ({
			role: e.role,
			original: e.original,
			occurrences: e.occurrences.length,
		}))
	}

	/** Classify without touching the session. */
	analyze(sql: string): AnalyzeResult {
		const { tokens, classification } = this.parse(sql)
		const excludedStrings = [...classification.excludedStrings].map(([index, rule]) => ({
			literal: stringBody(tokens[index]),
			rule,
			offset: tokens[index].start,
		}))
		return {
			sessionId: this.id,
			entities: this.summarize(classification),
			counts: countByRole(classification.entities),
			excludedStrings,
			reservedTokens: classification.reserved.size,
		}
	}

	/**
	 * Mask `sql`. Without `reuseMapping` the prior mapping is discarded;
	 * with it, existing records keep their synthetic names.
	 */
	async mask(sql: string, options: MaskOptions = {}): Promise<MaskResult> {
		const mode = options.mode ?? this.options.mode ?? "deterministic"
		const analysis = this.parse(sql)
		const target = options.reuseMapping ? this.mappingStore.clone() : new MappingStore()

		this.logger.info("Masking SQL", {
			session_id: this.id,
			mode,
			entities: analysis.classification.entities.length,
			reuse_mapping: options.reuseMapping ?? false,
		})

		const records = await this.generate(analysis, mode, target)
		this.recordSpellings(analysis, target)

		this.analysis = analysis
		this.mappingStore = target
		return this.result(mode, records)
	}

	private result(mode: NamingMode, records: MappingRecord[]): MaskResult {
		const analysis = this.requireAnalysis()
		return {
			sessionId: this.id,
			sql: rewrite(analysis.tokens, analysis.classification, this.mappingStore),
			mode,
			records: records.map((r) => this.mappingStore.get(r.role, r.original) ?? r),
			entities: this.summarize(analysis.classification),
			maskedTokens: countMaskedTokens(analysis.classification, this.mappingStore),
		}
	}

	private requireAnalysis(): Analysis {
		if (!this.analysis) throw new SqlMaskError("masking", "No SQL has been masked in this session", true)
		return this.analysis
	}

	/** Masked SQL for the current document under the current mapping. */
	remask(): string {
		const analysis = this.requireAnalysis()
		return rewrite(analysis.tokens, analysis.classification, this.mappingStore)
	}

	setEnabled(role: EntityRole, original: string, enabled: boolean): boolean {
		const found = this.mappingStore.setEnabled(role, original, enabled)
		this.logger.debug("Mapping toggled", { session_id: this.id, role, original, enabled, found })
		return found
	}

	/** Replace every record of the current document with fresh names. */
	async regenerate(mode?: NamingMode): Promise<MaskResult> {
		const analysis = this.requireAnalysis()
		const effective = mode ?? this.options.mode ?? "deterministic"
		const fresh = new MappingStore()
		const records = await this.generate(analysis, effective, fresh)
		this.recordSpellings(analysis, fresh)
		this.mappingStore.merge(fresh, { regenerate: true })
		this.logger.info("Mappings regenerated", { session_id: this.id, mode: effective, total: records.length })
		return this.result(effective, records)
	}

	/** Fold a saved mapping into the session (existing enabled records win). */
	loadMapping(store: MappingStore, options: MergeOptions = {}): void {
		this.mappingStore.merge(store, options)
		if (this.analysis) this.recordSpellings(this.analysis, this.mappingStore)
		this.logger.info("Mapping loaded", { session_id: this.id, records: store.size, regenerate: options.regenerate ?? false })
	}

	unmask(text: string): UnmaskResult {
		return unmask(text, this.mappingStore, {
			backslashEscapes: this.options.backslashEscapes,
			logger: this.logger,
		})
	}

	clear(): void {
		this.analysis = null
		this.mappingStore = new MappingStore()
	}
}

// ============================================================================
// Saved mapping sets
// ============================================================================

export interface SavedMaskOptions {
	mode?: NamingMode
	/** Start from an empty mapping instead of the saved one */
	regenerate?: boolean
}

/**
 * Mask `sql` against the mapping set saved as `name` and save the result back.
 * Names handed out earlier are kept, so text masked with an older version of
 * the set still unmasks.
 */
export async function maskWithSavedMapping(
	session: MaskingSession,
	repository: MappingRepository,
	name: string,
	sql: string,
	options: SavedMaskOptions = {},
): Promise<MaskResult & { reused: boolean }> {
	const reused = !options.regenerate && (await repository.list()).includes(name)
	if (reused) session.loadMapping(await repository.load(name))
	const result = await session.mask(sql, { mode: options.mode, reuseMapping: reused })
	await repository.save(name, session.store)
	return { ...result, reused }
}
