import { describe, it, expect, vi } from "vitest"
import type { Logger } from "./logger.js"
import { MappingStore } from "./mapping_store.js"
import { stripWrapping, unmask } from "./sql_unmasker.js"
import type { EntityRole, MappingRecord } from "./sql_types.js"

function rec(role: EntityRole, original: string, synthetic: string): MappingRecord {
	return { role, original, synthetic, enabled: true }
}

const BASIC = MappingStore.fromRecords([
	rec("column", "customer_id", "col_1"),
	rec("column", "name", "col_2"),
	rec("table", "customer_table", "table_1"),
])

describe("stripWrapping", () => {
	it("should keep only the fenced SQL", () => {
		expect(stripWrapping("Here you go:\n```sql\nSELECT 1\n```\nAnything else?")).toBe("SELECT 1")
	})

	it("should join several fenced blocks", () => {
		expect(stripWrapping("```\nSELECT 1\n```\nand\n~~~\nSELECT 2\n~~~")).toBe("SELECT 1\n\nSELECT 2")
	})

	it("should trim blank lines around unfenced text", () => {
		expect(stripWrapping("\n\nSELECT 1\n  \n")).toBe("SELECT 1")
	})

	describe("unpaired fences", () => {
		it("should keep the SQL after an opening fence that never closes", () => {
			expect(stripWrapping("Here:\n```sql\nSELECT 1\nFROM t")).toBe("SELECT 1\nFROM t")
		})

		it("should drop a closing fence on the last SQL line", () => {
			expect(stripWrapping("```sql\nSELECT 1 FROM t```\nDone.")).toBe("SELECT 1 FROM t")
			expect(stripWrapping("SELECT 1 FROM t ```")).toBe("SELECT 1 FROM t")
		})

		it("should keep the SQL above a lone closing fence", () => {
			expect(stripWrapping("SELECT 1\nFROM t\n```\n")).toBe("SELECT 1\nFROM t")
		})
	})
})

describe("unmask", () => {
	it("should restore every synthetic identifier", () => {
		const result = unmask("SELECT col_1, col_2 FROM table_1 WHERE col_1 = 5;", BASIC)
		expect(result.sql).toBe("SELECT customer_id, name FROM customer_table WHERE customer_id = 5;")
		expect(result.replaced).toBe(4)
		expect(result.warnings).toEqual([])
	})

	it("should unwrap fenced output first", () => {
		const result = unmask("Sure!\n```sql\nSELECT col_2 FROM table_1\n```", BASIC)
		expect(result.sql).toBe("SELECT name FROM customer_table")
	})

	it("should unwrap output with an unpaired fence", () => {
		expect(unmask("```sql\nSELECT col_2 FROM table_1", BASIC).sql).toBe("SELECT name FROM customer_table")
		expect(unmask("```sql\nSELECT col_2 FROM table_1```", BASIC).sql).toBe("SELECT name FROM customer_table")
	})

	it("should restore the case shape of each occurrence", () => {
		const store = MappingStore.fromRecords([rec("column", "Amount", "col_1"), rec("table", "t", "table_1")])
		expect(unmask("SELECT Col_1, COL_1, col_1 FROM table_1", store).sql).toBe("SELECT Amount, AMOUNT, amount FROM t")
	})

	it("should restore a synthetic that moved to another role", () => {
		const store = MappingStore.fromRecords([rec("table", "orders", "table_1")])
		const result = unmask("SELECT table_1 FROM x", store)
		expect(result.sql).toBe("SELECT orders FROM x")
		expect(result.warnings).toEqual([])
	})

	it("should restore string values with their wildcards", () => {
		const store = MappingStore.fromRecords([
			rec("string_value", "Telstra - Consumer", "value_1"),
			rec("string_value", "%Tel%", "%value_2%"),
		])
		const result = unmask("SELECT * FROM t WHERE p = 'value_1' OR q LIKE '%value_2%'", store)
		expect(result.sql).toBe("SELECT * FROM t WHERE p = 'Telstra - Consumer' OR q LIKE '%Tel%'")
		expect(result.replaced).toBe(2)
	})

	it("should warn about unmapped synthetic-looking names", () => {
		const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
		const store = MappingStore.fromRecords([rec("table", "x", "table_1")])
		const result = unmask("SELECT col_9 FROM table_1 WHERE a = 'value_3'", store, { logger })
		expect(result.sql).toBe("SELECT col_9 FROM x WHERE a = 'value_3'")
		expect(result.warnings).toEqual([
			{ lexeme: "col_9", offset: 7, role: "column", message: 'No mapping for synthetic-looking column "col_9"' },
			{
				lexeme: "value_3",
				offset: 36,
				role: "string_value",
				message: 'No mapping for synthetic-looking string_value "value_3"',
			},
		])
		expect(logger.warn).toHaveBeenCalledWith("Unmask found unmapped synthetic names", { count: 2 })
	})

	it("should match quoted identifiers case-sensitively", () => {
		const store = MappingStore.fromRecords([rec("column", "Amount", "col_1"), rec("table", "t", "table_1")])
		expect(unmask('SELECT "COL_1" FROM table_1', store).sql).toBe('SELECT "AMOUNT" FROM t')

		const drifted = unmask('SELECT "CoL_1" FROM table_1', store)
		expect(drifted.sql).toBe('SELECT "CoL_1" FROM t')
		expect(drifted.warnings.map((w) => w.message)).toEqual(['No mapping for synthetic-looking column "CoL_1"'])
	})

	it("should restore recorded spellings, quoted or not", () => {
		const store = MappingStore.fromRecords([
			{ ...rec("column", "Amount", "col_1"), spellings: { aMOUNT: "cOl_1" } },
			rec("table", "t", "table_1"),
		])
		const result = unmask('SELECT "cOl_1", cOl_1, Col_1 FROM table_1', store)
		expect(result.sql).toBe('SELECT "aMOUNT", aMOUNT, Amount FROM t')
		expect(result.warnings).toEqual([])
	})

	it("should fall back to the recorded spelling for unquoted case drift", () => {
		const store = MappingStore.fromRecords([rec("column", "Amount", "col_1"), rec("table", "t", "table_1")])
		expect(unmask("SELECT CoL_1 FROM table_1", store).sql).toBe("SELECT Amount FROM t")
	})
})
