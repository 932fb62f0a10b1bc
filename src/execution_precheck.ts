/**
 * Execution Precheck
 *
 * Last judgment layer. Asks the database to plan the candidate without
 * running it, or, without a database, re-validates it against the descriptor.
 *
 * Database errors are classified by SQLSTATE:
 * - repairable / other SQL errors: invalid verdict with a hint for the generator
 * - timeout (57014): invalid verdict, the plan itself was too expensive
 * - infrastructure: CollaboratorError, never fed back to the generator
 */

import { z } from "zod"
import {
	CollaboratorError,
	errorMessage,
	getInfrastructureErrorReason,
	getSQLSTATE,
	getSQLSTATEHint,
	isInfrastructureError,
	isTimeoutError,
} from "./config.js"
import type { DataSource } from "./data_source.js"
import type { Candidate, LayerResult } from "./judge_types.js"
import type { Logger } from "./logger.js"
import { qualifiedTableName, type SchemaDescriptor } from "./schema_types.js"
import { analyzeSQL, findUnresolvedColumns, findUnresolvedQualifiedColumns } from "./sql_validator.js"

export interface ExecutionPrechecker {
	precheck(candidate: Candidate, schema: SchemaDescriptor): Promise<LayerResult>
}

const planSchema = z
	.array(
		z.object({
			Plan: z
				.object({
					"Total Cost": z.number(),
					"Plan Rows": z.number(),
				})
				.passthrough(),
		}),
	)
	.min(1)

/**
 * Plan root estimates from an `EXPLAIN (FORMAT JSON)` cell.
 * Drivers return the cell either parsed or as text.
 */
export function parsePlanEstimates(cell: unknown): { estimated_cost: number; estimated_rows: number } | null {
	let value = cell
	if (typeof value === "string") {
		try {
			value = JSON.parse(value)
		} catch {
			return null
		}
	}
	const parsed = planSchema.safeParse(value)
	if (!parsed.success) return null
	const root = parsed.data[0].Plan
	return { estimated_cost: root["Total Cost"], estimated_rows: root["Plan Rows"] }
}

// ============================================================================
// EXPLAIN precheck
// ============================================================================

export class ExplainPrechecker implements ExecutionPrechecker {
	constructor(
		private db: DataSource,
		private logger: Logger,
		private timeoutMs: number,
	) {}

	async precheck(candidate: Candidate, schema: SchemaDescriptor): Promise<LayerResult> {
		const startTime = Date.now()
		try {
			const result = await this.db.query(`EXPLAIN (FORMAT JSON) ${candidate.sql}`, [], {
				timeoutMs: this.timeoutMs,
				searchPath: schema.database,
				readOnly: true,
			})
			const estimates = parsePlanEstimates(result.rows[0]?.["QUERY PLAN"])
			this.logger.debug("EXPLAIN succeeded", {
				iteration: candidate.iteration_index,
				latency_ms: Date.now() - startTime,
				...estimates,
			})
			return {
				layer_id: "execution",
				valid: true,
				reason: "EXPLAIN succeeded",
				errors: [],
				metrics: estimates ?? {},
				details: { method: "explain" },
			}
		} catch (err) {
			return this.classify(err, candidate)
		}
	}

	private classify(err: unknown, candidate: Candidate): LayerResult {
		if (err instanceof CollaboratorError) throw err

		const sqlstate = getSQLSTATE(err)
		const message = errorMessage(err)
		if (!sqlstate) throw err

		if (isInfrastructureError(sqlstate)) {
			this.logger.error("EXPLAIN infrastructure failure", { sqlstate, error: message })
			throw new CollaboratorError("unavailable", `${getInfrastructureErrorReason(sqlstate)}: ${message}`, { sqlstate })
		}

		const reason = isTimeoutError(sqlstate) ? `EXPLAIN timed out after ${this.timeoutMs}ms` : message
		this.logger.debug("EXPLAIN rejected candidate", {
			iteration: candidate.iteration_index,
			sqlstate,
			error: message,
		})
		return {
			layer_id: "execution",
			valid: false,
			reason,
			fix_suggestion: getSQLSTATEHint(sqlstate),
			errors: [`${sqlstate}: ${reason}`],
			metrics: {},
			details: { method: "explain" },
		}
	}
}

// ============================================================================
// Schema-only precheck
// ============================================================================

/**
 * Structural re-validation used when no database is available
 */
export class SchemaPrechecker implements ExecutionPrechecker {
	async precheck(candidate: Candidate, schema: SchemaDescriptor): Promise<LayerResult> {
		const errors: string[] = []
		if (schema.columns.length === 0) {
			errors.push(`Table ${qualifiedTableName(schema)} has no columns`)
		}
		for (const issue of analyzeSQL(candidate.sql, schema).issues) {
			if (issue.code === "UNKNOWN_TABLE") errors.push(issue.message)
		}
		for (const name of findUnresolvedColumns(candidate.sql, schema)) {
			errors.push(`Unknown column: ${name}`)
		}
		for (const ref of findUnresolvedQualifiedColumns(candidate.sql, schema)) {
			errors.push(`Unknown column: ${ref}`)
		}

		const valid = errors.length === 0
		return {
			layer_id: "execution",
			valid,
			reason: valid ? "schema check passed" : errors[0],
			...(valid ? {} : { fix_suggestion: `Use only table ${qualifiedTableName(schema)} and its listed columns` }),
			errors,
			metrics: {},
			details: { method: "schema" },
		}
	}
}
