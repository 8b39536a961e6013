import { describe, it, expect } from "vitest"
import { scanSql, validateSql } from "./sql_validator.js"
import { QueryRuntimeError, SchemaError, SqlSyntaxError, type QueryMendError } from "./errors.js"
import { makeSnapshot } from "./test_support.js"
import type { SchemaSnapshot, TableInfo } from "./schema_types.js"

const snapshot = makeSnapshot()

function errorOf(sql: string): QueryMendError {
	const result = validateSql(sql, snapshot)
	if (result.valid) throw new Error(`expected validation to fail: ${sql}`)
	return result.error
}

describe("scanSql", () => {
	it("keeps strings, identifiers and comments apart from code", () => {
		const lexemes = scanSql(`SELECT "Last Name", 'it''s' -- note\nFROM t /* x */`)
		expect(lexemes.map((l) => `${l.kind}:${l.text}`)).toEqual([
			"word:SELECT",
			"ident:Last Name",
			"punct:,",
			"string:it's",
			"word:FROM",
			"word:T",
		])
	})

	it("reads two-character operators and numbers", () => {
		expect(scanSql("a>=1.5").map((l) => l.text)).toEqual(["A", ">=", "1.5"])
	})
})

describe("validateSql", () => {
	it("accepts a known query and reports what it references", () => {
		const result = validateSql("SELECT first_name, last_name FROM customers WHERE last_name = 'Murray'", snapshot)
		expect(result).toEqual({
			valid: true,
			tables: ["customers"],
			columns: [
				{ table: "customers", column: "first_name" },
				{ table: "customers", column: "last_name" },
			],
		})
	})

	it("resolves aliased joins", () => {
		const result = validateSql(
			"SELECT c.first_name, i.total FROM customers c JOIN invoices i ON i.customer_id = c.customer_id",
			snapshot,
		)
		expect(result.valid && result.columns).toEqual([
			{ table: "customers", column: "first_name" },
			{ table: "invoices", column: "total" },
			{ table: "invoices", column: "customer_id" },
			{ table: "customers", column: "customer_id" },
		])
	})

	it("ignores case, trailing semicolons and comments", () => {
		expect(validateSql("select FIRST_NAME from CUSTOMERS;", snapshot).valid).toBe(true)
		expect(validateSql("SELECT name FROM artists; -- done", snapshot).valid).toBe(true)
	})

	it("accepts select-list aliases used later", () => {
		expect(validateSql("SELECT country, COUNT(*) AS n FROM customers GROUP BY country ORDER BY n DESC", snapshot).valid).toBe(
			true,
		)
		expect(validateSql("SELECT SUM(total) revenue FROM invoices ORDER BY revenue", snapshot).valid).toBe(true)
	})

	it("accepts ARRAY constructors", () => {
		expect(validateSql("SELECT first_name FROM customers WHERE country = ANY(ARRAY['Norway'])", snapshot).valid).toBe(
			true,
		)
	})

	describe("case-sensitive identifiers", () => {
		const mixed: TableInfo = {
			name: "Customer",
			schema: "public",
			columns: [
				{ name: "CustomerId", data_type: "integer", nullable: false, primary_key: true },
				{ name: "city", data_type: "text", nullable: true, primary_key: false },
			],
			foreign_keys: [],
		}
		const pg: SchemaSnapshot = { ...makeSnapshot(1, "fixture", "postgresql"), tables: [...snapshot.tables, mixed] }
		const options = { identifiersCaseSensitive: true }

		it("folds unquoted names to lowercase", () => {
			expect(validateSql("SELECT first_name FROM Customers", pg, options).valid).toBe(true)
			const result = validateSql("SELECT city FROM Customer", pg, options)
			expect(!result.valid && result.error.message).toBe("Unknown table: Customer")
		})

		it("matches quoted names exactly", () => {
			expect(validateSql('SELECT "CustomerId", city FROM "Customer"', pg, options).valid).toBe(true)
			const result = validateSql('SELECT CustomerId FROM "Customer"', pg, options)
			expect(!result.valid && result.error.message).toBe("Unknown column: CustomerId")
		})

		it("ignores case unless asked to", () => {
			expect(validateSql("SELECT CustomerId FROM Customer", pg).valid).toBe(true)
		})
	})

	it("does not treat FROM inside EXTRACT as a table clause", () => {
		expect(validateSql("SELECT EXTRACT(YEAR FROM invoice_date) FROM invoices", snapshot).valid).toBe(true)
	})

	it("does not look inside string literals", () => {
		expect(validateSql("SELECT name FROM artists WHERE name = 'DROP TABLE x'", snapshot).valid).toBe(true)
	})

	it("accepts CTEs without knowing their columns", () => {
		const sql =
			"WITH big AS (SELECT customer_id, total FROM invoices WHERE total > 10) SELECT b.customer_id, whatever FROM big b"
		expect(validateSql(sql, snapshot).valid).toBe(true)
	})

	describe("structure", () => {
		it("rejects statements other than SELECT", () => {
			const error = errorOf("EXPLAIN SELECT 1")
			expect(error).toBeInstanceOf(SqlSyntaxError)
			expect(error.message).toBe("Only SELECT statements are allowed, got EXPLAIN")
		})

		it("rejects several statements", () => {
			expect(errorOf("SELECT 1; SELECT 2").message).toBe("Multiple statements are not allowed")
		})

		it("rejects unbalanced parentheses", () => {
			expect(errorOf("SELECT COUNT(* FROM customers").message).toBe("Unbalanced parentheses")
		})

		it("rejects unterminated strings", () => {
			const error = errorOf("SELECT * FROM customers WHERE city = 'Oslo")
			expect(error).toBeInstanceOf(SqlSyntaxError)
			expect(error.message).toBe("Unterminated string literal starting at position 37")
		})

		it("rejects empty input", () => {
			expect(errorOf("  -- nothing").message).toBe("Empty SQL statement")
		})
	})

	describe("safety", () => {
		it("refuses write statements as a permission error", () => {
			const error = errorOf("DELETE FROM customers")
			expect(error).toBeInstanceOf(QueryRuntimeError)
			expect(error instanceof QueryRuntimeError && error.category).toBe("permission")
			expect(error.message).toBe("Statement is not read-only: DELETE is not allowed")
		})

		it("refuses admin functions", () => {
			expect(errorOf("SELECT pg_sleep(10)").message).toBe("Function pg_sleep is not allowed")
		})
	})

	describe("schema", () => {
		it("names an unknown column", () => {
			const error = errorOf("SELECT middle_name FROM customers")
			expect(error).toBeInstanceOf(SchemaError)
			expect(error.message).toBe("Unknown column: middle_name")
			expect(error instanceof SchemaError && error.target).toEqual({ object: "column", identifier: "middle_name" })
		})

		it("names an unknown qualified column with its qualifier", () => {
			const error = errorOf("SELECT c.middle FROM customers c")
			expect(error instanceof SchemaError && error.target).toEqual({
				object: "column",
				identifier: "middle",
				qualifier: "c",
			})
		})

		it("names an unknown qualifier", () => {
			expect(errorOf("SELECT x.name FROM artists a").message).toBe("Unknown table or alias: x")
		})

		it("names an unknown table", () => {
			const error = errorOf("SELECT * FROM customer")
			expect(error instanceof SchemaError && error.target).toEqual({ object: "table", identifier: "customer" })
		})
	})

	describe("types", () => {
		it("refuses LIKE on a numeric column", () => {
			const error = errorOf("SELECT * FROM invoices WHERE total LIKE '1%'")
			expect(error instanceof QueryRuntimeError && error.category).toBe("type")
			expect(error.message).toBe("LIKE cannot be applied to numeric column invoices.total (NUMERIC)")
		})

		it("refuses comparing a numeric column with a word", () => {
			expect(errorOf("SELECT * FROM invoices WHERE total > 'lots'").message).toBe(
				"Numeric column invoices.total compared with non-numeric value 'lots'",
			)
			expect(validateSql("SELECT * FROM invoices WHERE total > '10'", snapshot).valid).toBe(true)
		})

		it("compares interval columns with time literals", () => {
			const tracks: TableInfo = {
				name: "tracks",
				schema: "public",
				columns: [
					{ name: "track_id", data_type: "integer", nullable: false, primary_key: true },
					{ name: "duration", data_type: "interval", nullable: true, primary_key: false },
				],
				foreign_keys: [],
			}
			const pg: SchemaSnapshot = { ...makeSnapshot(1, "fixture", "postgresql"), tables: [tracks] }
			expect(validateSql("SELECT * FROM tracks WHERE duration > '00:05:00'", pg).valid).toBe(true)
			const error = validateSql("SELECT * FROM tracks WHERE track_id > 'first'", pg)
			expect(error.valid).toBe(false)
		})

		it("refuses SUM and AVG over text", () => {
			expect(errorOf("SELECT AVG(first_name) FROM customers").message).toBe(
				"AVG cannot be applied to text column customers.first_name (TEXT)",
			)
			expect(validateSql("SELECT SUM(total) FROM invoices", snapshot).valid).toBe(true)
		})
	})
})
