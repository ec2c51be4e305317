/**
 * SQL Tokenizer
 *
 * Lossless lexer: the concatenated `text` of the returned tokens is exactly
 * the input. Whitespace and comments are kept as tokens so the rewriter can
 * reproduce formatting byte for byte.
 *
 * Handles:
 * - Line comments (--) and nested block comments
 * - Single-quoted strings with '' and (optionally) backslash escapes,
 *   including N'', E'', X'', B'' and U&'' prefixes
 * - Dollar-quoted strings ($tag$...$tag$)
 * - Quoted identifiers: "..." `...` [...]
 * - Bind parameters and session variables (?, $1, :name, @name, @@name)
 *
 * Unterminated strings, identifiers and comments raise ParseError.
 */

import { ParseError } from "./errors.js"
import { isKeyword } from "./sql_keywords.js"
import type { QuoteChar, Token, TokenKind } from "./sql_types.js"

export interface TokenizeOptions {
	/** Treat backslash as an escape inside '...' literals (default true) */
	backslashEscapes?: boolean
}

// ============================================================================
// Character classes
// ============================================================================

const WHITESPACE_RE = /\s+/y
const NUMBER_RE = /0[xX][0-9a-fA-F]+|(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y
const WORD_RE = /[A-Za-z_\u0080-\uffff][A-Za-z0-9_$\u0080-\uffff]*/y
const DOLLAR_TAG_RE = /\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/y
const VARIABLE_RE = /@@?[A-Za-z_][A-Za-z0-9_$#@]*|:[A-Za-z_][A-Za-z0-9_]*|\$\d+/y
const STRING_PREFIX_RE = /(?:[NnEeXxBb]|[Uu]&)'/y

const WORD_START_RE = /[A-Za-z_\u0080-\uffff]/

/** Longest first, so "->>" wins over "->" */
const MULTI_CHAR_OPERATORS = [
	"->>", "#>>",
	"::", "<=", ">=", "<>", "!=", "||", "->", "#>", "<<", ">>", "=>", ":=", "**", "@>", "<@",
]

const PUNCTUATION = new Set(["(", ")", ",", ";", ".", "[", "]", "{", "}"])

function matchAt(re: RegExp, sql: string, index: number): string | null {
	re.lastIndex = index
	const m = re.exec(sql)
	return m ? m[0] : null
}

// ============================================================================
// Delimited runs
// ============================================================================

/**
 * Scan a delimited run starting at `openIdx` (the opening delimiter).
 * A doubled closing delimiter is an escaped character.
 * Returns the index one past the closing delimiter, or -1 if unterminated.
 */
function scanDelimited(
	sql: string,
	openIdx: number,
	close: string,
	backslashEscapes: boolean,
): number {
	let i = openIdx + 1
	while (i < sql.length) {
		const ch = sql[i]
		if (backslashEscapes && ch === "\\") {
			i += 2
			continue
		}
		if (ch === close) {
			if (sql[i + 1] === close) {
				i += 2
				continue
			}
			return i + 1
		}
		i++
	}
	return -1
}

/** Nested block comment. Returns end index or -1 if unterminated. */
function scanBlockComment(sql: string, start: number): number {
	let depth = 0
	let i = start
	while (i < sql.length) {
		if (sql[i] === "/" && sql[i + 1] === "*") {
			depth++
			i += 2
			continue
		}
		if (sql[i] === "*" && sql[i + 1] === "/") {
			depth--
			i += 2
			if (depth === 0) return i
			continue
		}
		i++
	}
	return -1
}

/**
 * `[` opens a bracket identifier unless it reads as a subscript or an
 * array literal: arr[1], f(x)[2], ARRAY[1, 2].
 */
function opensBracketIdentifier(sql: string, index: number, previous: Token | undefined): boolean {
	if (previous) {
		if (previous.kind === "identifier" || previous.kind === "number") return false
		if (previous.kind === "punctuation" && (previous.text === ")" || previous.text === "]")) return false
		if (previous.kind === "keyword" && previous.text.toUpperCase() === "ARRAY") return false
	}
	const next = sql[index + 1]
	return next !== undefined && !/[\d\-'\]\s]/.test(next)
}

// ============================================================================
// Tokenizer
// ============================================================================

export function tokenize(sql: string, options: TokenizeOptions = {}): Token[] {
	const backslashEscapes = options.backslashEscapes ?? true
	const tokens: Token[] = []
	const len = sql.length
	let i = 0

	const push = (kind: TokenKind, start: number, end: number, extra: Partial<Token> = {}): void => {
		tokens.push({ kind, text: sql.substring(start, end), start, end, quoted: false, ...extra })
	}

	while (i < len) {
		const char = sql[i]
		const next = i + 1 < len ? sql[i + 1] : ""

		// Whitespace run
		const ws = matchAt(WHITESPACE_RE, sql, i)
		if (ws) {
			push("whitespace", i, i + ws.length)
			i += ws.length
			continue
		}

		// Line comment: -- ... (newline belongs to the following whitespace)
		if (char === "-" && next === "-") {
			let end = sql.indexOf("\n", i)
			if (end === -1) end = len
			if (end > i && sql[end - 1] === "\r") end--
			push("comment", i, end)
			i = end
			continue
		}

		// Block comment: /* ... */ (nesting allowed)
		if (char === "/" && next === "*") {
			const end = scanBlockComment(sql, i)
			if (end === -1) throw new ParseError(i, "Unterminated block comment")
			push("comment", i, end)
			i = end
			continue
		}

		// Prefixed string literal: N'...', E'...', U&'...'
		const prefixed = matchAt(STRING_PREFIX_RE, sql, i)
		if (prefixed) {
			const prefix = prefixed.slice(0, -1)
			const quoteIdx = i + prefix.length
			const forceBackslash = prefix.toUpperCase() === "E"
			const end = scanDelimited(sql, quoteIdx, "'", backslashEscapes || forceBackslash)
			if (end === -1) throw new ParseError(i, "Unterminated string literal")
			push("string", i, end, { prefix })
			i = end
			continue
		}

		// Single-quoted string literal
		if (char === "'") {
			const end = scanDelimited(sql, i, "'", backslashEscapes)
			if (end === -1) throw new ParseError(i, "Unterminated string literal")
			push("string", i, end)
			i = end
			continue
		}

		// Double-quoted or backtick identifier
		if (char === '"' || char === "`") {
			const end = scanDelimited(sql, i, char, false)
			if (end === -1) throw new ParseError(i, "Unterminated quoted identifier")
			const quoteChar: QuoteChar = char === '"' ? '"' : "`"
			push("identifier", i, end, { quoted: true, quoteChar })
			i = end
			continue
		}

		// Bracket identifier: [...]
		if (char === "[" && opensBracketIdentifier(sql, i, tokens[tokens.length - 1])) {
			const end = scanDelimited(sql, i, "]", false)
			if (end === -1) throw new ParseError(i, "Unterminated bracket identifier")
			const quoteChar: QuoteChar = "["
			push("identifier", i, end, { quoted: true, quoteChar })
			i = end
			continue
		}

		// Dollar-quoted string: $tag$ ... $tag$
		if (char === "$") {
			const tag = matchAt(DOLLAR_TAG_RE, sql, i)
			if (tag) {
				const close = sql.indexOf(tag, i + tag.length)
				if (close === -1) throw new ParseError(i, "Unterminated dollar-quoted string")
				const end = close + tag.length
				push("string", i, end, { dollarTag: tag.slice(1, -1) })
				i = end
				continue
			}
		}

		// Number
		if (/\d/.test(char) || (char === "." && /\d/.test(next))) {
			const num = matchAt(NUMBER_RE, sql, i)
			if (num) {
				push("number", i, i + num.length)
				i += num.length
				continue
			}
		}

		// Word: keyword or identifier
		if (WORD_START_RE.test(char)) {
			const word = matchAt(WORD_RE, sql, i)
			if (word) {
				push(isKeyword(word) ? "keyword" : "identifier", i, i + word.length)
				i += word.length
				continue
			}
		}

		// Variables and bind parameters (checked after "::" and ":=")
		if (char === "?") {
			push("variable", i, i + 1)
			i++
			continue
		}
		if ((char === "@" && next !== ">") || (char === ":" && next !== ":" && next !== "=") || char === "$") {
			const variable = matchAt(VARIABLE_RE, sql, i)
			if (variable) {
				push("variable", i, i + variable.length)
				i += variable.length
				continue
			}
		}

		// Operators
		const op = MULTI_CHAR_OPERATORS.find((candidate) => sql.startsWith(candidate, i))
		if (op) {
			push("operator", i, i + op.length)
			i += op.length
			continue
		}

		if (PUNCTUATION.has(char)) {
			push("punctuation", i, i + 1)
			i++
			continue
		}

		// Anything else is a one-character operator; nothing is dropped
		push("operator", i, i + 1)
		i++
	}

	return tokens
}

/** Whitespace and comments carry no syntax. */
export function isTrivia(token: Token): boolean {
	return token.kind === "whitespace" || token.kind === "comment"
}

/** Inverse of tokenize: rebuilds the source text. */
export function detokenize(tokens: readonly Token[]): string {
	return tokens.map((t) => t.text).join("")
}

/**
 * Identifier text without delimiters, with doubled delimiters collapsed.
 */
export function identifierName(token: Token): string {
	if (!token.quoted || !token.quoteChar) return token.text
	const close = token.quoteChar === "[" ? "]" : token.quoteChar
	const inner = token.text.slice(1, -1)
	return inner.split(close + close).join(close)
}

/** Body of a string literal between its delimiters, escapes kept as written. */
export function stringBody(token: Token): string {
	if (token.dollarTag !== undefined) {
		const delimiter = token.dollarTag.length + 2
		return token.text.slice(delimiter, token.text.length - delimiter)
	}
	const prefixLength = token.prefix?.length ?? 0
	return token.text.slice(prefixLength + 1, -1)
}

/** Quote a name with the given identifier delimiter, escaping the closing one. */
export function quoteIdentifier(name: string, quoteChar: QuoteChar): string {
	const close = quoteChar === "[" ? "]" : quoteChar
	return quoteChar + name.split(close).join(close + close) + close
}
