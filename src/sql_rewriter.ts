/**
 * Rewriter
 *
 * Substitutes enabled mappings into the original token stream by token
 * index. Every other token is emitted verbatim, so masked output differs
 * from the input only inside masked spans.
 */

import { quoteIdentifier, identifierName } from "./sql_tokenizer.js"
import type { MappingStore } from "./mapping_store.js"
import { isIdentifierRole } from "./sql_types.js"
import type { Classification, MappingRecord, Token } from "./sql_types.js"

// ============================================================================
// Case shape
// ============================================================================

/**
 * Spellings of a synthetic identifier for the three spellings of its original
 * that can be told apart: as recorded, all upper case, all lower case.
 *
 * The three forms are distinct whenever the original's three spellings are,
 * so the unmasker can restore each occurrence exactly. Any other spelling of
 * the original gets its own case variant, kept in the record's `spellings`.
 */
export interface CaseForms {
	exact: string
	upper: string
	lower: string
}

function capitalize(name: string): string {
	return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase()
}

export function caseForms(original: string, synthetic: string): CaseForms {
	const upper = synthetic.toUpperCase()
	const lower = synthetic.toLowerCase()
	let exact = synthetic

	if (original === original.toLowerCase()) {
		if (synthetic === upper) exact = lower
	} else if (original === original.toUpperCase()) {
		if (synthetic === lower) exact = upper
	} else if (synthetic === upper || synthetic === lower) {
		// Mixed-case original: needs a spelling distinct from both variants
		const capitalized = capitalize(synthetic)
		if (capitalized !== upper && capitalized !== lower) exact = capitalized
	}

	return { exact, upper, lower }
}

/** Spelled as neither the original nor its upper or lower variant. */
export function needsOwnSpelling(occurrence: string, original: string): boolean {
	return occurrence !== original && occurrence !== original.toUpperCase() && occurrence !== original.toLowerCase()
}

/** Synthetic spelling for one occurrence of `original`. */
export function maskLexeme(
	occurrence: string,
	original: string,
	synthetic: string,
	spellings?: Readonly<Record<string, string>>,
): string {
	const forms = caseForms(original, synthetic)
	if (occurrence === original) return forms.exact
	if (occurrence === original.toUpperCase()) return forms.upper
	if (occurrence === original.toLowerCase()) return forms.lower
	return spellings?.[occurrence] ?? forms.exact
}

/** Inverse of maskLexeme: original spelling for one occurrence of `synthetic`. */
export function restoreLexeme(
	lexeme: string,
	original: string,
	synthetic: string,
	spellings?: Readonly<Record<string, string>>,
): string {
	const forms = caseForms(original, synthetic)
	if (lexeme === forms.exact) return original
	if (lexeme === forms.upper) return original.toUpperCase()
	if (lexeme === forms.lower) return original.toLowerCase()
	for (const [spelling, variant] of Object.entries(spellings ?? {})) {
		if (variant === lexeme) return spelling
	}
	return original
}

/** Every synthetic spelling `record` can emit. */
export function syntheticSpellings(record: MappingRecord): string[] {
	const forms = caseForms(record.original, record.synthetic)
	return [forms.exact, forms.upper, forms.lower, ...Object.values(record.spellings ?? {})]
}

const MAX_CASE_BITS = 12

/**
 * First case variant of the record's synthetic that it does not emit yet.
 * Variants count up in binary over the letters, lowest bit first.
 */
export function freeSpelling(record: MappingRecord): string | null {
	const used = new Set(syntheticSpellings(record))
	const base = [...record.synthetic.toLowerCase()]
	const letters = base.flatMap((ch, i) => (ch.toUpperCase() !== ch ? [i] : [])).slice(0, MAX_CASE_BITS)
	for (let n = 0; n < 2 ** letters.length; n++) {
		const chars = [...base]
		letters.forEach((position, bit) => {
			if (n & (1 << bit)) chars[position] = chars[position].toUpperCase()
		})
		const candidate = chars.join("")
		if (!used.has(candidate)) return candidate
	}
	return null
}

/**
 * Give every unusual spelling of a masked identifier in the document its own
 * synthetic spelling, so unmasking restores it exactly. Returns the spellings
 * that ran out of case variants; those mask as the exact form.
 */
export function recordSpellings(
	tokens: readonly Token[],
	classification: Classification,
	store: MappingStore,
): string[] {
	const exhausted = new Set<string>()
	for (const entity of classification.entities) {
		if (!isIdentifierRole(entity.role)) continue
		for (const index of entity.occurrences) {
			const record = store.get(entity.role, entity.original)
			if (!record) break
			const spelling = identifierName(tokens[index])
			if (!needsOwnSpelling(spelling, record.original) || record.spellings?.[spelling] !== undefined) continue
			const synthetic = freeSpelling(record)
			if (synthetic === null) exhausted.add(spelling)
			else store.setSpelling(record.role, record.original, spelling, synthetic)
		}
	}
	return [...exhausted]
}

// ============================================================================
// Token rendering
// ============================================================================

/**
 * Re-quote a raw string body the way `token` was quoted. Originals and
 * synthetics are both stored as raw bodies, escapes included.
 */
export function renderStringLiteral(token: Token, body: string): string {
	if (token.dollarTag !== undefined) {
		const tag = `$${token.dollarTag}$`
		return `${tag}${body}${tag}`
	}
	return `${token.prefix ?? ""}'${body}'`
}

/** Emit `name` with the delimiters `token` was written with. */
export function renderIdentifier(token: Token, name: string): string {
	return token.quoted && token.quoteChar ? quoteIdentifier(name, token.quoteChar) : name
}

function renderMasked(token: Token, record: MappingRecord): string {
	if (token.kind === "string") return renderStringLiteral(token, record.synthetic)
	return renderIdentifier(
		token,
		maskLexeme(identifierName(token), record.original, record.synthetic, record.spellings),
	)
}

// ============================================================================
// Rewrite
// ============================================================================

export function rewrite(tokens: readonly Token[], classification: Classification, store: MappingStore): string {
	let out = ""
	tokens.forEach((token, index) => {
		const entity = classification.tokenEntities.get(index)
		const record = entity ? store.get(entity.role, entity.original) : undefined
		out += record?.enabled ? renderMasked(token, record) : token.text
	})
	return out
}

/** Number of tokens rewrite() would replace. */
export function countMaskedTokens(classification: Classification, store: MappingStore): number {
	let count = 0
	for (const entity of classification.tokenEntities.values()) {
		if (store.get(entity.role, entity.original)?.enabled) count++
	}
	return count
}
