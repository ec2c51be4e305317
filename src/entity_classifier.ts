/**
 * Entity Classifier
 *
 * Tags identifier tokens with a role (catalog, schema, table, column, alias,
 * function) and string literals as string values. Classification is
 * positional and keyword-driven: it looks at the clause the token sits in,
 * the keyword before it, and whether it is followed by "(" or ".". Names are
 * never resolved against a schema.
 *
 * Keywords and builtin functions are never entities, whatever their position
 * (quoted or not).
 *
 * Qualifiers (the "o" in o.customer_id) and bare names in ORDER BY / GROUP BY
 * / HAVING are resolved once the whole statement has been seen, because
 * aliases may be defined after their first use.
 *
 * Select-list aliases of subqueries, CTE bodies and views name columns of the
 * relation they produce, so they take the column role and outer references to
 * them get the same synthetic name. SELECT ... INTO targets are variables when
 * the document declares them (DECLARE, routine parameters), tables otherwise.
 */

import { identifierName, isTrivia, stringBody } from "./sql_tokenizer.js"
import { isReservedWord } from "./sql_keywords.js"
import type { Classification, Entity, EntityRole, Token } from "./sql_types.js"

// ============================================================================
// String exclusion rules
// ============================================================================

export const STRING_EXCLUSION_RULES = [
	"typed_literal",
	"limit_context",
	"numeric_like",
	"date_like",
	"empty",
	"dollar_quoted",
	"format_argument",
] as const

export type StringExclusionRule = (typeof STRING_EXCLUSION_RULES)[number]

export interface ClassifyOptions {
	/** Enabled exclusion rules (default: all) */
	stringExclusions?: readonly StringExclusionRule[]
	/** Extra patterns; a literal whose body matches any of them is not masked */
	exclusionPatterns?: readonly RegExp[]
}

const TYPED_LITERAL_KEYWORDS = new Set(["DATE", "TIME", "TIMESTAMP", "TIMESTAMPTZ", "INTERVAL"])
const LIMIT_KEYWORDS = new Set(["LIMIT", "OFFSET", "TOP", "FETCH"])
const NUMERIC_BODY_RE = /^\s*[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?\s*$/
const DATE_BODY_RE = /^(?:\d{4}-\d{2}-\d{2}(?:[ T]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?)?|\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/

/** Functions whose literal arguments are formats, units or zones */
const FORMAT_FUNCTIONS = new Set([
	"date_trunc", "date_part", "to_char", "to_date", "to_timestamp", "to_number",
	"date_format", "str_to_date", "strftime", "format", "datepart", "datename",
	"dateadd", "datediff", "extract", "convert_tz",
])

// ============================================================================
// Walker state
// ============================================================================

type Clause =
	| "none"
	| "select"
	| "from"
	| "where"
	| "group_by"
	| "order_by"
	| "having"
	| "set"
	| "values"
	| "on"
	| "with"
	| "columns"
	| "other"

type Expectation = "table" | "function" | "alias" | "name" | "cte_name" | "type" | "into" | "declare"

type FrameKind = "root" | "call" | "group" | "columns" | "cte_body"

interface Frame {
	kind: FrameKind
	clause: Clause
	callee?: string
	expect: Expectation | null
	/** The table expectation came from FROM / JOIN / APPLY / USING or a FROM-list comma */
	expectFrom: boolean
	/** Directly after a table reference or derived table: a bare name is its alias */
	afterTableRef: boolean
	/** A CTE name was read; AS ( opens its body */
	cteAwaitingAs: boolean
	cteBodyNext: boolean
	/** A CTE body just closed; "," introduces the next CTE */
	cteListOpen: boolean
	/** CREATE INDEX / CREATE TRIGGER: the next ON names a table */
	objectOnPending: boolean
	/** An INTO target was read; "," introduces the next one */
	intoListOpen: boolean
	/** Parameter list of a routine definition or call */
	declaresNames: boolean
}

type PendingRole = EntityRole | "qualifier" | "order_ref" | "into_target"

interface Assignment {
	tokenIndex: number
	role: PendingRole
	statement: number
}

/** Keywords that take a parenthesized argument list like a function */
const CALL_KEYWORDS = new Set([
	"CAST", "COALESCE", "CONVERT", "EXTRACT", "SUBSTRING", "TRIM", "POSITION", "OVERLAY",
	"LEFT", "RIGHT", "REPLACE", "REPEAT", "NULLIF", "ISNULL", "DATE", "TIME", "TIMESTAMP",
	"YEAR", "MONTH", "DAY", "HOUR", "MINUTE", "SECOND", "CHAR", "VARCHAR", "NVARCHAR",
	"NCHAR", "DECIMAL", "NUMERIC", "FLOAT", "BINARY", "VARBINARY", "CHARACTER", "TREAT",
])

const CAST_FUNCTIONS = new Set(["cast", "try_cast", "convert", "treat"])

/** Keywords that leave a pending table expectation in place */
const TABLE_SKIP_KEYWORDS = new Set(["IF", "NOT", "EXISTS", "ONLY", "LATERAL", "OUTER", "TEMP", "TEMPORARY"])

const CLAUSE_KEYWORDS: Record<string, Clause> = {
	SELECT: "select",
	RETURNING: "select",
	WHERE: "where",
	GROUP: "group_by",
	ORDER: "order_by",
	HAVING: "having",
	QUALIFY: "having",
	SET: "set",
	VALUES: "values",
	LIMIT: "other",
	OFFSET: "other",
	UNION: "none",
	INTERSECT: "none",
	EXCEPT: "none",
}

const ALIAS_RESOLVED_CLAUSES = new Set<Clause>(["order_by", "group_by", "having"])

function newFrame(kind: FrameKind, clause: Clause): Frame {
	return {
		kind,
		clause,
		expect: null,
		expectFrom: false,
		afterTableRef: false,
		cteAwaitingAs: false,
		cteBodyNext: false,
		cteListOpen: false,
		objectOnPending: false,
		intoListOpen: false,
		declaresNames: false,
	}
}

// ============================================================================
// Classifier
// ============================================================================

class StatementWalker {
	private readonly sig: number[]
	private frames: Frame[] = [newFrame("root", "none")]
	private readonly assignments: Assignment[] = []
	private readonly aliasKeys = new Map<number, Set<string>>()
	private readonly columnAliasKeys = new Map<number, Set<string>>()
	/** Variables and routine parameters, across statements */
	private readonly declared = new Set<string>()
	private readonly reserved = new Set<number>()
	private readonly excluded = new Map<number, string>()
	private statement = 0
	private lastTableRef = -1
	private routineName = -1
	/** CREATE VIEW / CREATE TABLE ... AS: top-level select aliases are columns */
	private exportsColumns = false
	private readonly rules: ReadonlySet<StringExclusionRule>
	private readonly patterns: readonly RegExp[]

	constructor(
		private readonly tokens: readonly Token[],
		options: ClassifyOptions,
	) {
		this.sig = []
		tokens.forEach((t, i) => {
			if (!isTrivia(t)) this.sig.push(i)
		})
		this.rules = new Set(options.stringExclusions ?? STRING_EXCLUSION_RULES)
		this.patterns = options.exclusionPatterns ?? []
	}

	run(): Classification {
		let k = 0
		while (k < this.sig.length) {
			k = this.step(k)
		}
		return this.buildClassification()
	}

	// ------------------------------------------------------------------
	// Token access
	// ------------------------------------------------------------------

	private at(k: number): Token | undefined {
		const idx = this.sig[k]
		return idx === undefined ? undefined : this.tokens[idx]
	}

	private upper(k: number): string {
		const t = this.at(k)
		return t && (t.kind === "keyword" || t.kind === "identifier") && !t.quoted ? t.text.toUpperCase() : ""
	}

	private isKeywordAt(k: number, ...words: string[]): boolean {
		const t = this.at(k)
		return t !== undefined && t.kind === "keyword" && words.includes(t.text.toUpperCase())
	}

	private isPunct(k: number, text: string): boolean {
		const t = this.at(k)
		return t !== undefined && t.kind === "punctuation" && t.text === text
	}

	private get frame(): Frame {
		return this.frames[this.frames.length - 1]
	}

	private assign(k: number, role: PendingRole): void {
		this.assignments.push({ tokenIndex: this.sig[k], role, statement: this.statement })
	}

	private keyAt(k: number): string {
		const t = this.at(k)
		return t ? identifierName(t).toLowerCase() : ""
	}

	private remember(scopes: Map<number, Set<string>>, k: number): void {
		let keys = scopes.get(this.statement)
		if (!keys) {
			keys = new Set()
			scopes.set(this.statement, keys)
		}
		keys.add(this.keyAt(k))
	}

	private defineAlias(k: number): void {
		this.remember(this.aliasKeys, k)
		this.assign(k, "alias")
	}

	/** Select-list alias: a column of the enclosing subquery, CTE body or view. */
	private defineColumnAlias(k: number): void {
		if (this.frames.length === 1 && !this.exportsColumns) {
			this.defineAlias(k)
			return
		}
		this.remember(this.columnAliasKeys, k)
		this.assign(k, "column")
	}

	private inSelectList(): boolean {
		return this.frame.clause === "select" && this.frame.kind !== "call"
	}

	/** Identifier token that names something; false for keywords and builtins. */
	private isNameable(k: number): boolean {
		const t = this.at(k)
		if (!t || t.kind !== "identifier") return false
		if (isReservedWord(identifierName(t))) {
			this.reserved.add(this.sig[k])
			return false
		}
		return true
	}

	/** Does the token before k end an expression (so a bare name after it is an alias)? */
	private endsExpression(k: number): boolean {
		const t = this.at(k)
		if (!t) return false
		switch (t.kind) {
			case "identifier":
			case "string":
			case "variable":
				return true
			case "number":
				return !this.isKeywordAt(k - 1, "TOP")
			case "punctuation":
				return t.text === ")" || t.text === "]"
			case "keyword":
				if (["END", "NULL", "TRUE", "FALSE"].includes(t.text.toUpperCase())) return true
				return this.at(k - 1)?.text === "::"
			case "operator":
				return (
					t.text === "*" &&
					(this.isKeywordAt(k - 1, "SELECT", "DISTINCT", "ALL") ||
						this.isPunct(k - 1, ",") ||
						this.isPunct(k - 1, "."))
				)
			case "whitespace":
			case "comment":
				return false
		}
	}

	// ------------------------------------------------------------------
	// Main dispatch
	// ------------------------------------------------------------------

	private step(k: number): number {
		const t = this.at(k)
		if (!t) return k + 1

		switch (t.kind) {
			case "keyword":
				this.onKeyword(k, t.text.toUpperCase())
				return k + 1
			case "identifier":
				return this.onIdentifierChain(k)
			case "string":
				this.onString(k, t)
				this.clearExpectation()
				return k + 1
			case "punctuation":
				this.onPunctuation(k, t.text)
				return k + 1
			case "number":
			case "operator":
			case "variable":
				this.clearExpectation()
				return k + 1
			case "whitespace":
			case "comment":
				return k + 1
		}
	}

	private clearExpectation(): void {
		const f = this.frame
		f.expect = null
		f.expectFrom = false
		f.afterTableRef = false
	}

	private expectTable(fromClause: boolean): void {
		const f = this.frame
		f.expect = "table"
		f.expectFrom = fromClause
		f.afterTableRef = false
	}

	// ------------------------------------------------------------------
	// Keywords
	// ------------------------------------------------------------------

	private onKeyword(k: number, word: string): void {
		const f = this.frame
		f.intoListOpen = false

		if (f.expect === "table" && TABLE_SKIP_KEYWORDS.has(word)) return
		if (f.expect === "cte_name" && word === "RECURSIVE") return
		if (f.cteBodyNext && (word === "MATERIALIZED" || word === "NOT")) return

		switch (word) {
			case "SELECT":
				f.clause = "select"
				f.cteListOpen = false
				this.clearExpectation()
				return
			case "FROM":
				// EXTRACT(YEAR FROM d), a IS DISTINCT FROM b
				if (f.kind === "call" || this.isKeywordAt(k - 1, "DISTINCT")) {
					this.clearExpectation()
					return
				}
				f.clause = "from"
				this.expectTable(true)
				return
			case "JOIN":
			case "APPLY":
				f.clause = "from"
				this.expectTable(true)
				return
			case "USING":
				this.expectTable(true)
				return
			case "INTO":
				// INSERT / MERGE / REPLACE INTO name a table; other INTO targets may be variables
				if (!this.isKeywordAt(k - 1, "INSERT", "MERGE", "REPLACE")) {
					this.clearExpectation()
					f.expect = "into"
					return
				}
				this.expectTable(false)
				return
			case "DECLARE":
				this.clearExpectation()
				f.expect = "declare"
				return
			case "TABLE":
			case "VIEW":
				this.exportsColumns = true
				this.expectTable(false)
				return
			case "REFERENCES":
			case "TRUNCATE":
			case "DESCRIBE":
				this.expectTable(false)
				return
			case "DESC":
				// DESC t as a statement; ORDER BY x DESC is a sort direction
				if (k === 0 || this.isPunct(k - 1, ";")) {
					this.expectTable(false)
					return
				}
				break
			case "UPDATE":
				if (this.isKeywordAt(k - 1, "KEY")) {
					f.clause = "set"
					this.clearExpectation()
					return
				}
				this.expectTable(false)
				return
			case "INDEX":
			case "TRIGGER":
				f.objectOnPending = true
				this.clearExpectation()
				if (word === "INDEX") f.expect = "name"
				else f.expect = "function"
				return
			case "ON":
				if (f.objectOnPending) {
					f.objectOnPending = false
					this.expectTable(false)
					return
				}
				f.clause = "on"
				this.clearExpectation()
				return
			case "FUNCTION":
			case "PROCEDURE":
			case "CALL":
			case "EXEC":
			case "EXECUTE":
				this.clearExpectation()
				f.expect = "function"
				return
			case "WITH":
				if (this.at(k + 1)?.kind === "identifier" || this.isKeywordAt(k + 1, "RECURSIVE")) {
					f.clause = "with"
					this.clearExpectation()
					f.expect = "cte_name"
					return
				}
				this.clearExpectation()
				return
			case "OVER":
			case "WINDOW":
				this.clearExpectation()
				f.expect = "name"
				return
			case "AS":
				this.onAs()
				return
		}

		const clause = CLAUSE_KEYWORDS[word]
		if (clause !== undefined && !(word === "GROUP" && this.isKeywordAt(k - 1, "WITHIN"))) {
			f.clause = clause
			if (clause === "none") f.cteListOpen = false
		}
		this.clearExpectation()
	}

	private onAs(): void {
		const f = this.frame
		if (f.cteAwaitingAs) {
			f.cteAwaitingAs = false
			f.cteBodyNext = true
			this.clearExpectation()
			return
		}
		if (f.kind === "call" && f.callee !== undefined && CAST_FUNCTIONS.has(f.callee)) {
			this.clearExpectation()
			f.expect = "type"
			return
		}
		this.clearExpectation()
		f.expect = "alias"
	}

	// ------------------------------------------------------------------
	// Punctuation
	// ------------------------------------------------------------------

	private onPunctuation(k: number, text: string): void {
		const f = this.frame
		switch (text) {
			case "(":
				this.openFrame(k)
				return
			case ")":
				this.closeFrame()
				return
			case ",":
				if (f.intoListOpen) {
					this.clearExpectation()
					f.expect = "into"
					return
				}
				if (f.cteListOpen) {
					this.clearExpectation()
					f.expect = "cte_name"
					return
				}
				if (f.clause === "from") {
					this.expectTable(true)
					return
				}
				this.clearExpectation()
				return
			case ";":
				this.frames = [newFrame("root", "none")]
				this.statement++
				this.exportsColumns = false
				return
			default:
				this.clearExpectation()
		}
	}

	private openFrame(k: number): void {
		const parent = this.frame
		const prev = this.at(k - 1)
		const nextIsQuery = this.isKeywordAt(k + 1, "SELECT", "WITH", "VALUES")

		let child: Frame
		if (parent.cteBodyNext) {
			child = newFrame("cte_body", "none")
			parent.cteBodyNext = false
		} else if (k - 1 === this.lastTableRef || this.isKeywordAt(k - 1, "USING")) {
			child = newFrame("columns", "columns")
		} else if (prev && prev.kind === "identifier") {
			child = newFrame("call", parent.clause)
			child.callee = identifierName(prev).toLowerCase()
			child.declaresNames = k - 1 === this.routineName
		} else if (prev && prev.kind === "keyword" && CALL_KEYWORDS.has(prev.text.toUpperCase())) {
			child = newFrame("call", parent.clause)
			child.callee = prev.text.toLowerCase()
		} else {
			child = newFrame("group", nextIsQuery ? "none" : parent.clause)
			// Parenthesized join: FROM (a JOIN b ON ...)
			if (parent.expect === "table" && parent.expectFrom && !nextIsQuery) {
				child.expect = "table"
				child.expectFrom = true
				child.clause = "from"
			}
		}

		this.clearExpectation()
		this.frames.push(child)
	}

	private closeFrame(): void {
		if (this.frames.length === 1) {
			this.clearExpectation()
			return
		}
		const closed = this.frames.pop()
		const parent = this.frame
		this.clearExpectation()
		if (closed?.kind === "cte_body") {
			parent.cteListOpen = true
			return
		}
		if (parent.clause === "from") parent.afterTableRef = true
	}

	// ------------------------------------------------------------------
	// Identifier chains: a, a.b, a.b.c, a.*
	// ------------------------------------------------------------------

	private onIdentifierChain(k: number): number {
		// Collect dotted parts
		const parts: number[] = [k]
		let star = false
		let j = k + 1
		while (this.isPunct(j, ".")) {
			const part = this.at(j + 1)
			if (part && (part.kind === "identifier" || part.kind === "keyword")) {
				parts.push(j + 1)
				j += 2
				continue
			}
			if (part && part.kind === "operator" && part.text === "*") {
				star = true
				j += 2
			}
			break
		}
		const next = j
		const callNext = this.isPunct(next, "(")
		this.classifyChain(k, parts, star, callNext)
		return next
	}

	private classifyChain(k: number, parts: number[], star: boolean, callNext: boolean): void {
		const f = this.frame
		const last = parts[parts.length - 1]
		const qualifiers = star ? parts : parts.slice(0, -1)
		const head = star ? -1 : last

		const expect = f.expect
		const expectFrom = f.expectFrom
		const afterTableRef = f.afterTableRef
		this.clearExpectation()

		// Type after a cast operator: x::my_type
		if (this.at(k - 1)?.text === "::") return

		// SELECT ... INTO target [, target]
		if (expect === "into" && !star) {
			if (this.isNameable(last)) this.assign(last, parts.length === 1 ? "into_target" : "table")
			this.assignQualifierPath(qualifiers, "schema")
			f.intoListOpen = true
			return
		}

		// DECLARE name type
		if (expect === "declare" && parts.length === 1 && !star) {
			if (this.isNameable(last)) {
				this.declared.add(this.keyAt(last))
				this.assign(last, "column")
			}
			return
		}

		// CTE name: WITH name [(cols)] AS (
		if (expect === "cte_name" && !star) {
			if (this.isNameable(last)) this.assign(last, "table")
			this.assignQualifierPath(qualifiers, "schema")
			f.cteAwaitingAs = true
			f.cteListOpen = false
			this.lastTableRef = last
			return
		}

		// Table position
		if (expect === "table" && !star) {
			// Table-valued function: FROM generate_items(3) g
			if (callNext && expectFrom) {
				if (this.isNameable(last)) this.assign(last, "function")
				this.assignQualifierPath(qualifiers, "schema")
				return
			}
			if (this.isNameable(last)) this.assign(last, "table")
			this.assignQualifierPath(qualifiers, "schema")
			this.lastTableRef = last
			f.afterTableRef = true
			return
		}

		// Definitions and calls of routines
		if (expect === "function" && !star) {
			if (this.isNameable(last)) this.assign(last, "function")
			this.assignQualifierPath(qualifiers, "schema")
			this.routineName = last
			return
		}

		// Cast target type: CAST(x AS my_type)
		if (expect === "type") return

		// Explicit alias: AS name
		if (expect === "alias" && parts.length === 1 && !star && !callNext) {
			if (!this.isNameable(last)) return
			if (this.inSelectList()) this.defineColumnAlias(last)
			else this.defineAlias(last)
			return
		}

		// OVER name, WINDOW name, index names
		if (expect === "name" && parts.length === 1 && !star && !callNext) {
			if (this.isNameable(last)) this.defineAlias(last)
			return
		}

		// Implicit table alias: FROM orders o
		if (afterTableRef && parts.length === 1 && !star && !callNext) {
			if (this.isNameable(last)) this.defineAlias(last)
			return
		}

		// Function call
		if (callNext && !star) {
			if (this.isNameable(last)) this.assign(last, "function")
			this.assignQualifierPath(qualifiers, "schema")
			return
		}

		// Implicit column alias: SELECT amount total
		if (this.inSelectList() && parts.length === 1 && !star && this.endsExpression(k - 1)) {
			if (this.isNameable(last)) this.defineColumnAlias(last)
			return
		}

		// Expression position
		if (parts.length === 1 && !star) {
			if (this.isNameable(last)) {
				if (f.declaresNames) this.declared.add(this.keyAt(last))
				this.assign(last, ALIAS_RESOLVED_CLAUSES.has(f.clause) ? "order_ref" : "column")
			}
			return
		}
		if (head !== -1 && this.isNameable(head)) this.assign(head, "column")
		this.assignQualifierPath(qualifiers, "qualifier")
	}

	/**
	 * Qualifiers read right to left: the nearest takes `nearest`, then schema,
	 * then catalog for every element further left.
	 */
	private assignQualifierPath(qualifiers: number[], nearest: "schema" | "qualifier"): void {
		for (let q = qualifiers.length - 1, depth = 0; q >= 0; q--, depth++) {
			const k = qualifiers[q]
			if (!this.isNameable(k)) continue
			let role: PendingRole
			if (nearest === "qualifier") {
				role = depth === 0 ? "qualifier" : depth === 1 ? "schema" : "catalog"
			} else {
				role = depth === 0 ? "schema" : "catalog"
			}
			this.assign(k, role)
		}
	}

	// ------------------------------------------------------------------
	// String literals
	// ------------------------------------------------------------------

	private onString(k: number, t: Token): void {
		const rule = this.exclusionFor(k, t)
		if (rule) {
			this.excluded.set(this.sig[k], rule)
			return
		}
		this.assign(k, "string_value")
	}

	private exclusionFor(k: number, t: Token): string | null {
		const body = stringBody(t)
		const prevWord = this.upper(k - 1)

		if (this.rules.has("dollar_quoted") && t.dollarTag !== undefined) return "dollar_quoted"
		if (this.rules.has("typed_literal")) {
			if (TYPED_LITERAL_KEYWORDS.has(prevWord)) return "typed_literal"
			const prefix = t.prefix?.toUpperCase()
			if (prefix === "X" || prefix === "B") return "typed_literal"
		}
		if (this.rules.has("limit_context") && LIMIT_KEYWORDS.has(prevWord)) return "limit_context"
		if (this.rules.has("empty") && body.length === 0) return "empty"
		if (this.rules.has("numeric_like") && NUMERIC_BODY_RE.test(body)) return "numeric_like"
		if (this.rules.has("date_like") && DATE_BODY_RE.test(body.trim())) return "date_like"
		if (this.rules.has("format_argument")) {
			const f = this.frame
			if (f.kind === "call" && f.callee !== undefined && FORMAT_FUNCTIONS.has(f.callee)) return "format_argument"
			if (prevWord === "ZONE") return "format_argument"
		}
		for (const pattern of this.patterns) {
			pattern.lastIndex = 0
			if (pattern.test(body)) return `pattern:${pattern.source}`
		}
		return null
	}

	// ------------------------------------------------------------------
	// Resolution and entity building
	// ------------------------------------------------------------------

	private resolve(a: Assignment): EntityRole {
		if (a.role !== "qualifier" && a.role !== "order_ref" && a.role !== "into_target") return a.role
		const key = identifierName(this.tokens[a.tokenIndex]).toLowerCase()
		if (a.role === "into_target") return this.declared.has(key) ? "column" : "table"
		const isAlias = this.aliasKeys.get(a.statement)?.has(key) ?? false
		if (a.role === "qualifier") return isAlias ? "alias" : "table"
		if (this.columnAliasKeys.get(a.statement)?.has(key)) return "column"
		return isAlias ? "alias" : "column"
	}

	private buildClassification(): Classification {
		const entities: Entity[] = []
		const byKey = new Map<string, Entity>()
		const tokenEntities = new Map<number, Entity>()

		const ordered = [...this.assignments].sort((x, y) => x.tokenIndex - y.tokenIndex)
		for (const a of ordered) {
			if (tokenEntities.has(a.tokenIndex)) continue
			const token = this.tokens[a.tokenIndex]
			const role = this.resolve(a)
			const original = role === "string_value" ? stringBody(token) : identifierName(token)
			const key = role === "string_value" ? original : original.toLowerCase()
			const mapKey = `${role}\u0000${key}`
			let entity = byKey.get(mapKey)
			if (!entity) {
				entity = { role, key, original, occurrences: [] }
				byKey.set(mapKey, entity)
				entities.push(entity)
			}
			entity.occurrences.push(a.tokenIndex)
			tokenEntities.set(a.tokenIndex, entity)
		}

		return {
			entities,
			tokenEntities,
			reserved: this.reserved,
			excludedStrings: this.excluded,
		}
	}
}

/**
 * Classify a token stream into entities.
 */
export function classify(tokens: readonly Token[], options: ClassifyOptions = {}): Classification {
	return new StatementWalker(tokens, options).run()
}

/**
 * Identifier and string lexemes left unmasked: type names, excluded literals
 * and the like. Unmasking would rewrite them if a synthetic name equalled one.
 */
export function unmaskedLexemes(tokens: readonly Token[], classification: Classification): string[] {
	const lexemes = new Set<string>()
	tokens.forEach((token, index) => {
		if (classification.tokenEntities.has(index) || classification.reserved.has(index)) return
		if (token.kind === "identifier") lexemes.add(identifierName(token))
		else if (token.kind === "string") lexemes.add(stringBody(token))
	})
	return [...lexemes]
}

/** Entities of one role, in order of first occurrence. */
export function entitiesByRole(classification: Classification, role: EntityRole): Entity[] {
	return classification.entities.filter((e) => e.role === role)
}
