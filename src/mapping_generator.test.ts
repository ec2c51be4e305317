import { describe, it, expect, vi } from "vitest"
import { classify } from "./entity_classifier.js"
import { MaskingError } from "./errors.js"
import type { Logger } from "./logger.js"
import { generateMappings, splitLikeWildcards, suggestWithTimeout, validateSuggestion } from "./mapping_generator.js"
import { MappingStore } from "./mapping_store.js"
import type { NamePools } from "./name_pools.js"
import { tokenize } from "./sql_tokenizer.js"
import type { Entity, NameSuggester } from "./sql_types.js"

function entitiesOf(sql: string): Entity[] {
	return classify(tokenize(sql)).entities
}

function fakeLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

const TINY_POOLS: NamePools = {
	prefixes: {
		catalog: ["c"],
		schema: ["s"],
		table: ["t"],
		column: ["f"],
		alias: ["a"],
		function: ["fn"],
		string_value: ["v"],
	},
	words: ["w"],
}

describe("splitLikeWildcards", () => {
	it("should split leading and trailing percent signs", () => {
		expect(splitLikeWildcards("%Tel%")).toEqual(["%", "Tel", "%"])
		expect(splitLikeWildcards("%%abc")).toEqual(["%%", "abc", ""])
		expect(splitLikeWildcards("abc")).toEqual(["", "abc", ""])
	})

	it("should leave bodies without a core alone", () => {
		expect(splitLikeWildcards("%%")).toEqual(["", "%%", ""])
		expect(splitLikeWildcards("")).toEqual(["", "", ""])
	})
})

describe("validateSuggestion", () => {
	it("should accept trimmed identifiers", () => {
		expect(validateSuggestion("column", " good_name ")).toBe("good_name")
	})

	it("should reject malformed identifiers", () => {
		expect(validateSuggestion("column", "1abc")).toBeNull()
		expect(validateSuggestion("table", "has space")).toBeNull()
		expect(validateSuggestion("table", "x".repeat(64))).toBeNull()
		expect(validateSuggestion("table", 42)).toBeNull()
	})

	it("should reject string values that need escaping", () => {
		expect(validateSuggestion("string_value", "Generic Provider")).toBe("Generic Provider")
		expect(validateSuggestion("string_value", "O'Brien")).toBeNull()
		expect(validateSuggestion("string_value", "a\\b")).toBeNull()
		expect(validateSuggestion("string_value", "")).toBeNull()
	})
})

describe("suggestWithTimeout", () => {
	it("should resolve with the suggestion", async () => {
		const suggest: NameSuggester = async (_role, key) => `renamed_${key}`
		await expect(suggestWithTimeout(suggest, "table", "orders", "general", 100)).resolves.toBe("renamed_orders")
	})

	it("should reject and abort the signal on timeout", async () => {
		let seen: AbortSignal | undefined
		const suggest: NameSuggester = (_role, _key, _domain, signal) => {
			seen = signal
			return new Promise<string>(() => {})
		}
		await expect(suggestWithTimeout(suggest, "table", "orders", "general", 20)).rejects.toThrow(
			"Naming timed out after 20ms",
		)
		expect(seen?.aborted).toBe(true)
	})

	it("should turn a synchronous throw into a rejection", async () => {
		const suggest: NameSuggester = () => {
			throw new Error("boom")
		}
		await expect(suggestWithTimeout(suggest, "table", "orders", "general", 100)).rejects.toThrow("boom")
	})
})

describe("generateMappings", () => {
	describe("deterministic mode", () => {
		it("should number names per role in entity order", async () => {
			const records = await generateMappings(entitiesOf("SELECT customer_id, name FROM customer_table"), {
				mode: "deterministic",
			})
			expect(records).toEqual([
				{ role: "column", original: "customer_id", synthetic: "col_1", enabled: true },
				{ role: "column", original: "name", synthetic: "col_2", enabled: true },
				{ role: "table", original: "customer_table", synthetic: "table_1", enabled: true },
			])
		})

		it("should skip names equal to an original or a reserved name", async () => {
			const records = await generateMappings(entitiesOf("SELECT col_1, x FROM t"), {
				mode: "deterministic",
				reserved: ["COL_2"],
			})
			expect(records.map((r) => [r.original, r.synthetic])).toEqual([
				["col_1", "col_3"],
				["x", "col_4"],
				["t", "table_1"],
			])
		})

		it("should keep LIKE wildcards around string values", async () => {
			const entities = entitiesOf("SELECT * FROM t WHERE p LIKE '%Tel%'")
			const kept = await generateMappings(entities, { mode: "deterministic" })
			expect(kept.find((r) => r.role === "string_value")?.synthetic).toBe("%value_1%")

			const dropped = await generateMappings(entities, { mode: "deterministic", preserveLikeWildcards: false })
			expect(dropped.find((r) => r.role === "string_value")?.synthetic).toBe("value_1")
		})
	})

	describe("business mode", () => {
		it("should draw from the pools and keep aliases deterministic", async () => {
			const records = await generateMappings(entitiesOf("SELECT o.id FROM orders o, items"), {
				mode: "business",
				pools: TINY_POOLS,
			})
			expect(records.map((r) => [r.role, r.synthetic])).toEqual([
				["alias", "alias_1"],
				["column", "f_w_1"],
				["table", "t_w_1"],
				["table", "t_w_2"],
			])
		})
	})

	describe("existing mapping", () => {
		it("should reuse stored names and add fresh ones without collisions", async () => {
			const store = MappingStore.fromRecords([
				{ role: "table", original: "customer_table", synthetic: "client_data", enabled: true },
				{ role: "table", original: "archive", synthetic: "table_1", enabled: true },
			])
			const records = await generateMappings(entitiesOf("SELECT id FROM customer_table, orders"), {
				mode: "deterministic",
				store,
			})
			expect(records.map((r) => [r.original, r.synthetic])).toEqual([
				["id", "col_1"],
				["customer_table", "client_data"],
				["orders", "table_2"],
			])
			expect(store.size).toBe(4)
			expect(store.get("table", "orders")?.synthetic).toBe("table_2")
		})

		it("should reuse a disabled record as it is", async () => {
			const store = MappingStore.fromRecords([{ role: "table", original: "t", synthetic: "table_7", enabled: false }])
			const records = await generateMappings(entitiesOf("SELECT * FROM t"), { mode: "deterministic", store })
			expect(records).toEqual([{ role: "table", original: "t", synthetic: "table_7", enabled: false }])
		})
	})

	describe("collision exhaustion", () => {
		it("should fail every unnamed entity and leave the store untouched", async () => {
			const store = new MappingStore()
			const promise = generateMappings(entitiesOf("SELECT x FROM t"), {
				mode: "deterministic",
				store,
				maxAttempts: 2,
				reserved: ["col_1", "col_2"],
			})
			await expect(promise).rejects.toThrow(MaskingError)
			await expect(promise).rejects.toThrow('Cannot mask column "x": no free name after 2 attempts')
			expect(store.size).toBe(0)
		})
	})

	describe("semantic mode", () => {
		it("should use valid suggestions for everything but aliases", async () => {
			const suggest = vi.fn<Parameters<NameSuggester>, ReturnType<NameSuggester>>(async (_role, key) => `renamed_${key}`)
			const records = await generateMappings(entitiesOf("SELECT o.id FROM t o"), { mode: "semantic", suggest })
			expect(records.map((r) => r.synthetic)).toEqual(["alias_1", "renamed_id", "renamed_t"])
			expect(suggest).toHaveBeenCalledTimes(2)
		})

		it("should pass the detected domain", async () => {
			const domains: string[] = []
			const suggest: NameSuggester = async (_role, key, domain) => {
				domains.push(domain)
				return `renamed_${key}`
			}
			await generateMappings(entitiesOf("SELECT msisdn FROM lines"), { mode: "semantic", suggest })
			expect(domains).toEqual(["telecom", "telecom"])
		})

		it("should fall back to deterministic names when every call fails", async () => {
			const logger = fakeLogger()
			const entities = entitiesOf("SELECT customer_id, name FROM customer_table WHERE provider = 'Telstra - Consumer'")
			const failing: NameSuggester = async () => {
				throw new Error("service down")
			}
			const semantic = await generateMappings(entities, { mode: "semantic", suggest: failing, logger })
			const deterministic = await generateMappings(entities, { mode: "deterministic" })
			expect(semantic).toEqual(deterministic)
			expect(logger.warn).toHaveBeenCalledTimes(5)
			expect(logger.warn).toHaveBeenCalledWith("Semantic name rejected, using fallback", {
				role: "column",
				key: "customer_id",
				reason: "service down",
			})
		})

		it("should fall back when a call times out", async () => {
			const hanging: NameSuggester = () => new Promise<string>(() => {})
			const records = await generateMappings(entitiesOf("SELECT id FROM t"), {
				mode: "semantic",
				suggest: hanging,
				timeoutMs: 10,
			})
			expect(records.map((r) => r.synthetic)).toEqual(["col_1", "table_1"])
		})

		it("should reject malformed and colliding suggestions", async () => {
			const logger = fakeLogger()
			const suggest: NameSuggester = async (role) => (role === "column" ? "t" : "bad name!")
			const records = await generateMappings(entitiesOf("SELECT id FROM t"), { mode: "semantic", suggest, logger })
			expect(records.map((r) => r.synthetic)).toEqual(["col_1", "table_1"])
			expect(logger.warn.mock.calls.map((call) => call[1])).toEqual([
				{ role: "column", key: "id", reason: "equals an original name" },
				{ role: "table", key: "t", reason: "malformed suggestion" },
			])
		})

		it("should not give two entities the same suggestion", async () => {
			const suggest: NameSuggester = async () => "same_name"
			const records = await generateMappings(entitiesOf("SELECT a, b FROM t"), { mode: "semantic", suggest })
			expect(records.map((r) => r.synthetic)).toEqual(["same_name", "col_1", "table_1"])
		})

		it("should bound the number of calls in flight", async () => {
			let inFlight = 0
			let maxInFlight = 0
			const suggest: NameSuggester = async (_role, key) => {
				inFlight++
				maxInFlight = Math.max(maxInFlight, inFlight)
				await new Promise((resolve) => setTimeout(resolve, 5))
				inFlight--
				return `renamed_${key}`
			}
			const records = await generateMappings(entitiesOf("SELECT * FROM a, b, c, d, e"), {
				mode: "semantic",
				suggest,
				concurrency: 2,
			})
			expect(records).toHaveLength(5)
			expect(maxInFlight).toBe(2)
		})

		it("should not call the suggester for entities already mapped", async () => {
			const suggest = vi.fn<Parameters<NameSuggester>, ReturnType<NameSuggester>>(async (_role, key) => `renamed_${key}`)
			const store = MappingStore.fromRecords([{ role: "table", original: "t", synthetic: "table_1", enabled: true }])
			await generateMappings(entitiesOf("SELECT id FROM t"), { mode: "semantic", suggest, store })
			expect(suggest).toHaveBeenCalledTimes(1)
			expect(suggest.mock.calls[0][0]).toBe("column")
		})
	})
})
