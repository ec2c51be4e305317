/**
 * Shared types for the masking pipeline
 *
 * Tokens flow from the tokenizer into the classifier; entities and mapping
 * records flow from the classifier through the generator into the rewriter
 * and the unmasker.
 */

// ============================================================================
// Tokens
// ============================================================================

export type TokenKind =
	| "keyword"
	| "identifier"
	| "string"
	| "number"
	| "operator"
	| "punctuation"
	| "variable"
	| "whitespace"
	| "comment"

export type QuoteChar = '"' | "`" | "["

export interface Token {
	readonly kind: TokenKind
	/** Exact source lexeme, delimiters included */
	readonly text: string
	/** UTF-16 offset of the first character */
	readonly start: number
	/** UTF-16 offset one past the last character */
	readonly end: number
	/** Delimited identifier ("x", `x`, [x]) */
	readonly quoted: boolean
	readonly quoteChar?: QuoteChar
	/** String literal prefix such as N, E, X, B or U& */
	readonly prefix?: string
	/** Dollar-quote tag for $tag$...$tag$ strings ("" for $$) */
	readonly dollarTag?: string
}

// ============================================================================
// Entities
// ============================================================================

export type EntityRole = "catalog" | "schema" | "table" | "column" | "alias" | "function" | "string_value"

export const ENTITY_ROLES: readonly EntityRole[] = [
	"catalog",
	"schema",
	"table",
	"column",
	"alias",
	"function",
	"string_value",
]

export function isIdentifierRole(role: EntityRole): boolean {
	return role !== "string_value"
}

export interface Entity {
	role: EntityRole
	/** Canonical lookup key: lower-cased identifier, or raw literal body */
	key: string
	/** First spelling seen, without delimiters */
	original: string
	/** Token indices in source order */
	occurrences: number[]
}

export interface Classification {
	/** Entities in order of first occurrence */
	entities: Entity[]
	/** Token index → entity */
	tokenEntities: Map<number, Entity>
	/** Identifier-like token indices protected as keywords or builtins */
	reserved: Set<number>
	/** String literal token indices skipped by an exclusion rule, with the rule name */
	excludedStrings: Map<number, string>
}

// ============================================================================
// Mapping
// ============================================================================

export const NAMING_MODES = ["deterministic", "business", "semantic"] as const

export type NamingMode = (typeof NAMING_MODES)[number]

export interface MappingRecord {
	role: EntityRole
	original: string
	synthetic: string
	enabled: boolean
	/**
	 * Spellings of an identifier original other than itself and its upper and
	 * lower variants, each mapped to its own case variant of `synthetic`
	 */
	spellings?: Record<string, string>
}

/**
 * Optional semantic-name collaborator. May reject or never settle; the
 * generator bounds each call with a timeout and aborts `signal` on expiry.
 */
export type NameSuggester = (
	role: EntityRole,
	key: string,
	domain: string,
	signal: AbortSignal,
) => Promise<string>
