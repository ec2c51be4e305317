import { describe, it, expect } from "vitest"
import {
	DETERMINISTIC_NAME_RE,
	NAME_POOLS,
	businessName,
	businessNamePattern,
	deterministicName,
	looksSynthetic,
	stableHash,
} from "./name_pools.js"
import type { NamePools } from "./name_pools.js"

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

describe("deterministicName", () => {
	it("should prefix the counter by role", () => {
		expect(deterministicName("table", 1)).toBe("table_1")
		expect(deterministicName("column", 3)).toBe("col_3")
		expect(deterministicName("function", 2)).toBe("func_2")
		expect(deterministicName("string_value", 10)).toBe("value_10")
	})

	it("should be recognized by the deterministic pattern in any case", () => {
		expect(DETERMINISTIC_NAME_RE.test("COL_12")).toBe(true)
		expect(DETERMINISTIC_NAME_RE.test("schema_4")).toBe(true)
		expect(DETERMINISTIC_NAME_RE.test("col_x")).toBe(false)
		expect(DETERMINISTIC_NAME_RE.test("column_1")).toBe(false)
	})
})

describe("stableHash", () => {
	it("should compute 32-bit FNV-1a", () => {
		expect(stableHash("")).toBe(0x811c9dc5)
		expect(stableHash("a")).toBe(0xe40c292c)
	})
})

describe("businessName", () => {
	it("should join prefix, word and counter", () => {
		expect(businessName("table", "orders", 4, TINY_POOLS)).toBe("t_w_4")
		expect(businessName("string_value", "Acme", 1, TINY_POOLS)).toBe("v_w_1")
	})

	it("should be stable for the same key", () => {
		expect(businessName("column", "amount", 2)).toBe(businessName("column", "amount", 2))
	})

	it("should only produce names the business pattern matches", () => {
		const pattern = businessNamePattern()
		for (const key of ["orders", "customer_id", "region", "x"]) {
			expect(pattern.test(businessName("table", key, 7, NAME_POOLS))).toBe(true)
			expect(pattern.test(businessName("column", key, 1, NAME_POOLS))).toBe(true)
		}
	})
})

describe("looksSynthetic", () => {
	it("should recognize deterministic and business shapes", () => {
		expect(looksSynthetic("table_1")).toBe(true)
		expect(looksSynthetic("TABLE_1")).toBe(true)
		expect(looksSynthetic("dim_invoice_3")).toBe(true)
		expect(looksSynthetic("label_region_12")).toBe(true)
	})

	it("should not flag ordinary names", () => {
		expect(looksSynthetic("customer")).toBe(false)
		expect(looksSynthetic("dim_invoice")).toBe(false)
		expect(looksSynthetic("table_one")).toBe(false)
	})
})
