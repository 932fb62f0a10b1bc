import { describe, it, expect, beforeAll, afterAll } from "vitest"
import { CollaboratorError } from "./config.js"
import type { DataSource, QueryOptions, QueryOutput, Row } from "./data_source.js"
import { ExplainPrechecker, parsePlanEstimates, SchemaPrechecker } from "./execution_precheck.js"
import { silentLogger } from "./logger.js"
import { createHospitalDatabase, doctorSchema, type PgliteDataSource } from "./test_fixtures.js"

/** DataSource that fails every query with the given error. */
class FailingDataSource implements DataSource {
	options: QueryOptions[] = []

	constructor(private error: Error) {}

	async query<T extends Row>(_sql: string, _params?: unknown[], options: QueryOptions = {}): Promise<QueryOutput<T>> {
		this.options.push(options)
		throw this.error
	}

	async close(): Promise<void> {}
}

function pgError(code: string, message: string): Error {
	return Object.assign(new Error(message), { code })
}

const candidate = (sql: string) => ({ sql, iteration_index: 1 })

describe("ExplainPrechecker", () => {
	let db: PgliteDataSource

	beforeAll(async () => {
		db = await createHospitalDatabase()
	})

	afterAll(async () => {
		await db.close()
	})

	it("should accept a plannable query and report plan estimates", async () => {
		const prechecker = new ExplainPrechecker(db, silentLogger, 2000)
		const result = await prechecker.precheck(candidate("SELECT COUNT(*) FROM doctor_info"), doctorSchema())

		expect(result.valid).toBe(true)
		expect(result.reason).toBe("EXPLAIN succeeded")
		expect(result.details).toEqual({ method: "explain" })
		expect(result.metrics.estimated_cost).toBeGreaterThan(0)
		expect(result.metrics.estimated_rows).toBe(1)
	})

	it("should turn an undefined column into a repairable verdict", async () => {
		const prechecker = new ExplainPrechecker(db, silentLogger, 2000)
		const result = await prechecker.precheck(candidate("SELECT salary_total FROM doctor_info"), doctorSchema())

		expect(result).toEqual({
			layer_id: "execution",
			valid: false,
			reason: 'column "salary_total" does not exist',
			fix_suggestion: "Use correct column name - check schema",
			errors: ['42703: column "salary_total" does not exist'],
			metrics: {},
			details: { method: "explain" },
		})
	})

	it("should turn an undefined table into a repairable verdict", async () => {
		const prechecker = new ExplainPrechecker(db, silentLogger, 2000)
		const result = await prechecker.precheck(candidate("SELECT * FROM patients"), doctorSchema())

		expect(result.valid).toBe(false)
		expect(result.reason).toBe('relation "patients" does not exist')
		expect(result.fix_suggestion).toBe("Use the table name given in the schema")
	})

	it("should plan under a read-only transaction scoped to the schema", async () => {
		const fake = new FailingDataSource(pgError("42601", "syntax error at or near \"FORM\""))
		await new ExplainPrechecker(fake, silentLogger, 1500).precheck(candidate("SELECT 1"), doctorSchema())

		expect(fake.options).toEqual([{ timeoutMs: 1500, searchPath: "hospital", readOnly: true }])
	})

	it("should report a planning timeout with a simplify hint", async () => {
		const fake = new FailingDataSource(pgError("57014", "canceling statement due to statement timeout"))
		const result = await new ExplainPrechecker(fake, silentLogger, 2000).precheck(candidate("SELECT 1"), doctorSchema())

		expect(result.valid).toBe(false)
		expect(result.reason).toBe("EXPLAIN timed out after 2000ms")
		expect(result.fix_suggestion).toBe("Query timed out - simplify query or add filters")
		expect(result.errors).toEqual(["57014: EXPLAIN timed out after 2000ms"])
	})

	it("should raise infrastructure failures as CollaboratorError", async () => {
		const fake = new FailingDataSource(pgError("57P01", "terminating connection due to administrator command"))
		const error = await new ExplainPrechecker(fake, silentLogger, 2000)
			.precheck(candidate("SELECT 1"), doctorSchema())
			.catch((err: unknown) => err)

		expect(error).toBeInstanceOf(CollaboratorError)
		expect(error).toMatchObject({
			kind: "unavailable",
			message: "Server shutting down: terminating connection due to administrator command",
		})
	})

	it("should rethrow errors that carry no SQLSTATE", async () => {
		const fake = new FailingDataSource(new Error("socket hang up"))
		await expect(new ExplainPrechecker(fake, silentLogger, 2000).precheck(candidate("SELECT 1"), doctorSchema())).rejects.toThrow(
			"socket hang up",
		)
	})
})

describe("parsePlanEstimates", () => {
	it("should read the plan root from text output", () => {
		const cell = JSON.stringify([{ Plan: { "Node Type": "Seq Scan", "Total Cost": 12.5, "Plan Rows": 40 } }])
		expect(parsePlanEstimates(cell)).toEqual({ estimated_cost: 12.5, estimated_rows: 40 })
	})

	it("should return null for anything else", () => {
		expect(parsePlanEstimates("not json")).toBeNull()
		expect(parsePlanEstimates([])).toBeNull()
	})
})

describe("SchemaPrechecker", () => {
	const prechecker = new SchemaPrechecker()

	it("should pass qualified references to existing columns", async () => {
		const result = await prechecker.precheck(
			candidate("SELECT d.name, doctor_info.department FROM hospital.doctor_info AS d"),
			doctorSchema(),
		)
		expect(result).toEqual({
			layer_id: "execution",
			valid: true,
			reason: "schema check passed",
			errors: [],
			metrics: {},
			details: { method: "schema" },
		})
	})

	it("should reject qualified references to missing columns", async () => {
		const result = await prechecker.precheck(candidate("SELECT d.salary FROM doctor_info d"), doctorSchema())
		expect(result.valid).toBe(false)
		expect(result.errors).toEqual(["Unknown column: d.salary"])
		expect(result.fix_suggestion).toBe("Use only table hospital.doctor_info and its listed columns")
	})

	it("should reject unqualified references to missing columns", async () => {
		const result = await prechecker.precheck(candidate("SELECT salary FROM doctor_info"), doctorSchema())
		expect(result.valid).toBe(false)
		expect(result.reason).toBe("Unknown column: salary")
		expect(result.errors).toEqual(["Unknown column: salary"])
	})

	it("should accept output aliases and CTE column names", async () => {
		const result = await prechecker.precheck(
			candidate("WITH x(n) AS (SELECT COUNT(*) AS total FROM doctor_info) SELECT n FROM x ORDER BY n"),
			doctorSchema(),
		)
		expect(result.valid).toBe(true)
	})

	it("should reject other tables", async () => {
		const result = await prechecker.precheck(candidate("SELECT * FROM patients"), doctorSchema())
		expect(result.errors).toEqual(["Unknown table: patients"])
	})
})
