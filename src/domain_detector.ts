/**
 * Domain detection for semantic naming.
 *
 * Counts vocabulary-term hits in table, column and string keys against fixed
 * per-domain vocabularies (data/domain_vocabularies.json). The highest count
 * wins, ties go to the domain listed first, no hits at all means "general".
 */

import { readDataFile } from "./sql_keywords.js"
import type { Entity } from "./sql_types.js"

export const GENERAL_DOMAIN = "general"

export type DomainVocabularies = ReadonlyArray<readonly [domain: string, terms: readonly string[]]>

function loadVocabularies(): DomainVocabularies {
	const raw = readDataFile("domain_vocabularies.json")
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		throw new Error("domain_vocabularies.json must be an object of term lists")
	}
	return Object.entries(raw).map(([domain, terms]) => {
		const list = Array.isArray(terms) ? terms.filter((t): t is string => typeof t === "string") : []
		return [domain, list.map((t) => t.toLowerCase())] as const
	})
}

export const DOMAIN_VOCABULARIES: DomainVocabularies = loadVocabularies()

const DOMAIN_SIGNAL_ROLES = new Set(["table", "column", "string_value"])

/**
 * Count hits per domain. A hit is one term contained in one key, so
 * "customer_order_id" scores twice for a vocabulary with "customer" and "order".
 */
export function scoreDomains(
	entities: readonly Entity[],
	vocabularies: DomainVocabularies = DOMAIN_VOCABULARIES,
): Map<string, number> {
	const keys = entities.filter((e) => DOMAIN_SIGNAL_ROLES.has(e.role)).map((e) => e.key.toLowerCase())
	const scores = new Map<string, number>()
	for (const [domain, terms] of vocabularies) {
		let hits = 0
		for (const key of keys) {
			for (const term of terms) {
				if (key.includes(term)) hits++
			}
		}
		scores.set(domain, hits)
	}
	return scores
}

export function detectDomain(
	entities: readonly Entity[],
	vocabularies: DomainVocabularies = DOMAIN_VOCABULARIES,
): string {
	let best = GENERAL_DOMAIN
	let bestScore = 0
	for (const [domain, score] of scoreDomains(entities, vocabularies)) {
		if (score > bestScore) {
			best = domain
			bestScore = score
		}
	}
	return best
}
