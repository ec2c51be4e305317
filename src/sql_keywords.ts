/**
 * Reserved word and builtin function lists
 *
 * Lexemes in either list are never masked, and no synthetic name may equal
 * one of them. The lists live in data/*.json next to the package root.
 */

import * as fs from "fs"
import * as path from "path"
import { fileURLToPath } from "url"

function findDataDir(): string {
	// Walk up from this module: works from src/ and from dist/src/
	let dir = path.dirname(fileURLToPath(import.meta.url))
	for (let i = 0; i < 5; i++) {
		const candidate = path.join(dir, "data")
		if (fs.existsSync(path.join(candidate, "sql_keywords.json"))) return candidate
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	throw new Error("data/sql_keywords.json not found")
}

const DATA_DIR = findDataDir()

/** Read a JSON data file shipped with the package. */
export function readDataFile(name: string): unknown {
	return JSON.parse(fs.readFileSync(path.join(DATA_DIR, name), "utf-8"))
}

function readWordList(name: string): Set<string> {
	const raw = readDataFile(name)
	if (!Array.isArray(raw)) throw new Error(`${name} must be a JSON array`)
	return new Set(raw.filter((w): w is string => typeof w === "string").map((w) => w.toLowerCase()))
}

export const SQL_KEYWORDS: ReadonlySet<string> = readWordList("sql_keywords.json")
const BUILTIN_FUNCTIONS: ReadonlySet<string> = readWordList("builtin_functions.json")

export function isKeyword(word: string): boolean {
	return SQL_KEYWORDS.has(word.toLowerCase())
}

/** Keyword or builtin: never an entity, never a synthetic name. */
export function isReservedWord(word: string): boolean {
	const lower = word.toLowerCase()
	return SQL_KEYWORDS.has(lower) || BUILTIN_FUNCTIONS.has(lower)
}
