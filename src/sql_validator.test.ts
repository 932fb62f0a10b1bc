import { describe, it, expect } from "vitest"
import { analyzeSQL, checkSyntax, compressIssuesForRepair } from "./sql_validator.js"
import type { Candidate } from "./judge_types.js"
import type { SchemaDescriptor } from "./schema_types.js"
import { doctorSchema } from "./test_fixtures.js"

function candidate(sql: string): Candidate {
	return { sql, iteration_index: 1 }
}

describe("checkSyntax", () => {
	const schema = doctorSchema()

	describe("valid queries", () => {
		it("should accept a count query with no column references", () => {
			const result = checkSyntax(candidate("SELECT COUNT(*) FROM doctor_info"), schema)
			expect(result).toEqual({
				layer_id: "syntax",
				valid: true,
				errors: [],
				metrics: { error_count: 0, warning_count: 0 },
				details: { columns_used: [] },
			})
		})

		it("should resolve qualified columns and list them in schema order", () => {
			const result = checkSyntax(
				candidate(
					"SELECT d.name, department FROM hospital.doctor_info d WHERE hire_date >= DATE '2020-01-01' ORDER BY d.name",
				),
				schema,
			)
			expect(result.valid).toBe(true)
			expect(result.details?.columns_used).toEqual(["name", "department", "hire_date"])
			expect(result.metrics.warning_count).toBe(0)
		})

		it("should resolve columns case-insensitively", () => {
			const result = checkSyntax(candidate("SELECT NAME, Department FROM doctor_info"), schema)
			expect(result.details?.columns_used).toEqual(["name", "department"])
		})

		it("should allow one trailing semicolon", () => {
			expect(checkSyntax(candidate("SELECT name FROM doctor_info;"), schema).valid).toBe(true)
		})

		it("should ignore keywords and semicolons inside string literals", () => {
			const result = checkSyntax(candidate("SELECT name FROM doctor_info WHERE title = 'DROP TABLE; DELETE'"), schema)
			expect(result.valid).toBe(true)
			expect(result.details?.columns_used).toEqual(["name", "title"])
		})

		it("should not treat EXTRACT(... FROM col) as a table reference", () => {
			const result = checkSyntax(
				candidate("SELECT EXTRACT(YEAR FROM hire_date) AS y, COUNT(*) FROM doctor_info GROUP BY y"),
				schema,
			)
			expect(result.valid).toBe(true)
			expect(result.details?.columns_used).toEqual(["hire_date"])
			expect(result.metrics.warning_count).toBe(0)
		})

		it("should accept CTE names as tables", () => {
			const result = checkSyntax(
				candidate(
					"WITH recent AS (SELECT name FROM doctor_info WHERE hire_date > '2020-01-01') SELECT COUNT(*) FROM recent",
				),
				schema,
			)
			expect(result.valid).toBe(true)
			expect(result.details?.columns_used).toEqual(["name", "hire_date"])
		})
	})

	it("should accept a CTE that declares a column list", () => {
		const result = checkSyntax(candidate("WITH x(n) AS (SELECT COUNT(*) FROM doctor_info) SELECT n FROM x"), schema)
		expect(result.valid).toBe(true)
		expect(result.errors).toEqual([])
		expect(result.details?.columns_used).toEqual([])
	})

	it("should resolve columns whose names are also keywords", () => {
		const admissions: SchemaDescriptor = {
			database: "hospital",
			table: "admissions",
			columns: [
				{ name: "year", type: "integer", nullable: false, comment: "admission year", sample_values: [], constrained: false },
				{ name: "patients", type: "integer", nullable: false, comment: "patient count", sample_values: [], constrained: false },
			],
		}
		const result = checkSyntax(candidate("SELECT year, SUM(patients) FROM admissions GROUP BY year"), admissions)
		expect(result.valid).toBe(true)
		expect(result.details?.columns_used).toEqual(["year", "patients"])
		expect(result.metrics.warning_count).toBe(0)
	})

	describe("unresolved identifiers", () => {
		it("should warn without failing the layer", () => {
			const result = checkSyntax(candidate("SELECT salary FROM doctor_info"), schema)
			expect(result.valid).toBe(true)
			expect(result.errors).toEqual(['UNRESOLVED_IDENTIFIER: Identifier "salary" is not a column of doctor_info'])
			expect(result.metrics).toEqual({ error_count: 0, warning_count: 1 })
		})
	})

	describe("invalid queries", () => {
		it("should reject statements that do not start with SELECT", () => {
			const result = checkSyntax(candidate("DELETE FROM doctor_info"), schema)
			expect(result.valid).toBe(false)
			expect(result.reason).toBe("Query must start with SELECT")
			expect(result.fix_suggestion).toBe("Query must start with SELECT")
			expect(result.errors).toEqual(["NO_SELECT: Query must start with SELECT"])
		})

		it("should reject multiple statements", () => {
			const result = checkSyntax(candidate("SELECT 1; DROP TABLE doctor_info"), schema)
			expect(result.errors).toEqual(["MULTIPLE_STATEMENTS: Multiple statements detected (separated by semicolons)"])
			expect(result.fix_suggestion).toBe("Output one SELECT statement only, no multiple queries")
		})

		it("should reject write keywords after SELECT", () => {
			const result = checkSyntax(candidate("SELECT name FROM doctor_info FOR UPDATE"), schema)
			expect(result.valid).toBe(false)
			expect(result.reason).toBe("Dangerous keywords detected: UPDATE")
		})

		it("should reject SELECT INTO", () => {
			const result = checkSyntax(candidate("SELECT name INTO copy_table FROM doctor_info"), schema)
			expect(result.reason).toBe("Dangerous keywords detected: INTO")
		})

		it("should reject dangerous functions", () => {
			const result = checkSyntax(candidate("SELECT pg_sleep(10)"), schema)
			expect(result.reason).toBe("Dangerous functions detected: pg_sleep")
		})

		it("should reject unknown tables", () => {
			const result = checkSyntax(candidate("SELECT name FROM patients"), schema)
			expect(result.valid).toBe(false)
			expect(result.errors).toEqual(["UNKNOWN_TABLE: Unknown table: patients"])
			expect(result.fix_suggestion).toBe("Use only table hospital.doctor_info")
		})

		it("should reject the table under another schema", () => {
			const result = checkSyntax(candidate("SELECT name FROM public.doctor_info"), schema)
			expect(result.reason).toBe("Unknown table: public.doctor_info")
		})

		it("should reject unbalanced parentheses", () => {
			const result = checkSyntax(candidate("SELECT COUNT(* FROM doctor_info"), schema)
			expect(result.valid).toBe(false)
			expect(result.reason).toBe("1 unclosed '(' in query")
		})

		it("should reject unterminated strings", () => {
			const result = checkSyntax(candidate("SELECT name FROM doctor_info WHERE title = 'Chief"), schema)
			expect(result.valid).toBe(false)
			expect(result.reason).toBe("Unterminated string literal at position 43")
		})
	})

	it("should be idempotent", () => {
		const c = candidate("SELECT d.name FROM doctor_info d WHERE d.salary > 10")
		expect(checkSyntax(c, schema)).toEqual(checkSyntax(c, schema))
	})
})

describe("analyzeSQL", () => {
	it("should report a derived table alias as known", () => {
		const { issues } = analyzeSQL("SELECT t.name FROM (SELECT name FROM doctor_info) t", doctorSchema())
		expect(issues).toEqual([])
	})
})

describe("compressIssuesForRepair", () => {
	it("should deduplicate instructions", () => {
		const instructions = compressIssuesForRepair([
			{ code: "UNKNOWN_TABLE", severity: "error", message: "Unknown table: a", suggestion: "Use only table s.t" },
			{ code: "UNKNOWN_TABLE", severity: "error", message: "Unknown table: b", suggestion: "Use only table s.t" },
			{ code: "UNBALANCED_PARENS", severity: "error", message: "1 unclosed '(' in query", suggestion: "Balance every parenthesis" },
		])
		expect(instructions).toEqual(["Use only table s.t", "Balance every parenthesis"])
	})
})
