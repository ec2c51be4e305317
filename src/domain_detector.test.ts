import { describe, it, expect } from "vitest"
import { GENERAL_DOMAIN, detectDomain, scoreDomains } from "./domain_detector.js"
import type { DomainVocabularies } from "./domain_detector.js"
import type { Entity, EntityRole } from "./sql_types.js"

function entity(role: EntityRole, original: string): Entity {
	return { role, key: role === "string_value" ? original : original.toLowerCase(), original, occurrences: [] }
}

const VOCAB: DomainVocabularies = [
	["telecom", ["network", "provider"]],
	["finance", ["account", "payment"]],
]

describe("scoreDomains", () => {
	it("should count one hit per term contained in a key", () => {
		const scores = scoreDomains([entity("table", "account_payment"), entity("column", "provider")], VOCAB)
		expect([...scores]).toEqual([
			["telecom", 1],
			["finance", 2],
		])
	})

	it("should ignore aliases and functions", () => {
		const scores = scoreDomains([entity("alias", "account"), entity("function", "network_fn")], VOCAB)
		expect([...scores.values()]).toEqual([0, 0])
	})

	it("should match string values case-insensitively", () => {
		const scores = scoreDomains([entity("string_value", "Mobile NETWORK")], VOCAB)
		expect(scores.get("telecom")).toBe(1)
	})
})

describe("detectDomain", () => {
	it("should pick the highest score", () => {
		expect(detectDomain([entity("table", "customer_account"), entity("column", "payment_id")], VOCAB)).toBe("finance")
	})

	it("should break ties by vocabulary order", () => {
		expect(detectDomain([entity("table", "network"), entity("column", "account")], VOCAB)).toBe("telecom")
	})

	it("should fall back to general without hits", () => {
		expect(detectDomain([entity("table", "widgets")], VOCAB)).toBe(GENERAL_DOMAIN)
		expect(detectDomain([], VOCAB)).toBe("general")
	})

	it("should use the shipped vocabularies by default", () => {
		expect(detectDomain([entity("column", "msisdn")])).toBe("telecom")
		expect(detectDomain([entity("table", "patient_id")])).toBe("healthcare")
		expect(detectDomain([entity("table", "payroll_run")])).toBe("hr")
	})
})
