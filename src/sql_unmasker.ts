/**
 * Unmasker
 *
 * Reverses a rewrite on text that may have been through an AI tool:
 * 1. Strip markdown fences (```sql, ```, ~~~) and surrounding prose
 * 2. Re-tokenize and classify fresh (no structural identity assumed)
 * 3. Replace synthetic lexemes by their originals, restoring case shape
 * 4. Warn about synthetic-looking lexemes that have no record
 */

import { classify } from "./entity_classifier.js"
import { silentLogger } from "./logger.js"
import type { Logger } from "./logger.js"
import type { MappingStore } from "./mapping_store.js"
import { looksSynthetic } from "./name_pools.js"
import { splitLikeWildcards } from "./mapping_generator.js"
import { renderIdentifier, renderStringLiteral, restoreLexeme, syntheticSpellings } from "./sql_rewriter.js"
import { identifierName, stringBody, tokenize } from "./sql_tokenizer.js"
import type { EntityRole, MappingRecord, Token } from "./sql_types.js"

// ============================================================================
// Types
// ============================================================================

export interface UnmaskDriftWarning {
	lexeme: string
	/** Offset in the SQL after fence stripping */
	offset: number
	role: EntityRole | null
	message: string
}

export interface UnmaskResult {
	sql: string
	warnings: UnmaskDriftWarning[]
	/** Number of tokens restored */
	replaced: number
}

export interface UnmaskOptions {
	backslashEscapes?: boolean
	logger?: Logger
}

// ============================================================================
// Wrapping artifacts
// ============================================================================

const FENCE_RE = /^[ \t]*(```|~~~)[^\n]*\n([\s\S]*?)^[ \t]*\1[ \t]*$/gm
const FENCE_LINE_RE = /^[ \t]*(?:```|~~~)[^\n]*$/m
const TRAILING_FENCE_RE = /[ \t]*(?:```|~~~)[ \t]*$/
const FENCE_MARK_RE = /```|~~~/
const LEADING_BLANK_LINES_RE = /^(?:[ \t]*\r?\n)+/
const TRAILING_BLANK_LINES_RE = /(?:\r?\n[ \t]*)+$/

function trimBlankLines(text: string): string {
	return text.replace(LEADING_BLANK_LINES_RE, "").replace(TRAILING_BLANK_LINES_RE, "")
}

/**
 * Text around an unpaired fence. After an opening fence line: up to the next
 * fence mark, which may close on the last SQL line. Before a closing fence
 * line: everything above it.
 */
function stripLoneFence(text: string): string {
	const fence = FENCE_LINE_RE.exec(text)
	if (!fence) return text.replace(TRAILING_FENCE_RE, "")
	const after = text.slice(fence.index + fence[0].length)
	if (after.trim().length === 0) return text.slice(0, fence.index)
	const close = FENCE_MARK_RE.exec(after)
	return close ? after.slice(0, close.index) : after
}

/**
 * SQL inside fenced blocks, joined by a blank line; the whole text when
 * there are no fences. Blank lines at either end are dropped.
 */
export function stripWrapping(text: string): string {
	const bodies: string[] = []
	for (const match of text.matchAll(FENCE_RE)) {
		bodies.push(trimBlankLines(match[2]))
	}
	return bodies.length > 0 ? bodies.join("\n\n") : trimBlankLines(stripLoneFence(text))
}

// ============================================================================
// Unmask
// ============================================================================

function matchIdentifier(token: Token, role: EntityRole | undefined, store: MappingStore): MappingRecord | undefined {
	const name = identifierName(token)
	const record = (role ? store.lookupSynthetic(role, name) : undefined) ?? store.findSynthetic(name, "identifier")
	if (!record || !token.quoted) return record
	// Quoted identifiers match case-sensitively
	return syntheticSpellings(record).includes(name) ? record : undefined
}

export function unmask(text: string, store: MappingStore, options: UnmaskOptions = {}): UnmaskResult {
	const logger = options.logger ?? silentLogger
	const sql = stripWrapping(text)
	const tokens = tokenize(sql, { backslashEscapes: options.backslashEscapes })
	const classification = classify(tokens, { stringExclusions: [] })

	const warnings: UnmaskDriftWarning[] = []
	let replaced = 0
	let out = ""

	const warn = (token: Token, lexeme: string, role: EntityRole | null): void => {
		const kind = role ?? (token.kind === "string" ? "string_value" : "identifier")
		warnings.push({
			lexeme,
			offset: token.start,
			role,
			message: `No mapping for synthetic-looking ${kind} "${lexeme}"`,
		})
	}

	tokens.forEach((token, index) => {
		const role = classification.tokenEntities.get(index)?.role

		if (token.kind === "identifier") {
			const name = identifierName(token)
			const record = matchIdentifier(token, role, store)
			if (record) {
				out += renderIdentifier(token, restoreLexeme(name, record.original, record.synthetic, record.spellings))
				replaced++
				return
			}
			if (looksSynthetic(name)) warn(token, name, role ?? null)
		} else if (token.kind === "string") {
			const body = stringBody(token)
			const record = store.findSynthetic(body, "string_value")
			if (record) {
				out += renderStringLiteral(token, record.original)
				replaced++
				return
			}
			const [, core] = splitLikeWildcards(body)
			if (looksSynthetic(core)) warn(token, body, "string_value")
		}

		out += token.text
	})

	if (warnings.length > 0) {
		logger.warn("Unmask found unmapped synthetic names", { count: warnings.length })
	}
	return { sql: out, warnings, replaced }
}
