/**
 * Shared types and error handling for the SQL judge MCP server
 *
 * Includes:
 * - Structured error classes (collaborator failures, judge failures)
 * - SQLSTATE classification used by the execution precheck and executor
 * - Tool response interfaces
 */

import type { JudgeResult } from "./judge_types.js"
import type { TaggedTable } from "./result_normalizer.js"
import type { TableSummary } from "./result_analyzer.js"

// ============================================================================
// Errors
// ============================================================================

export type CollaboratorErrorKind = "unavailable" | "timeout" | "rejected"

/**
 * Failure of an external collaborator (model server, database).
 *
 * Never retried by the judge loop; the tool layer turns it into `{ok: false}`.
 */
export class CollaboratorError extends Error {
	constructor(
		public kind: CollaboratorErrorKind,
		message: string,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "CollaboratorError"
	}
}

export type JudgeErrorType = "invalid_input" | "not_found" | "cancelled" | "execution"

/**
 * Error types for structured error handling
 */
export class JudgeError extends Error {
	constructor(
		public type: JudgeErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "JudgeError"
	}
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

// ============================================================================
// SQLSTATE classification
// ============================================================================

/**
 * SQLSTATE classification for error handling
 */
export const SQLSTATE_CLASSIFICATION = {
	// Infrastructure errors: never a property of the candidate
	infrastructure: [
		"08", // Connection exception (08000, 08003, 08006, etc.)
		"53", // Insufficient resources (53100, 53200, 53300)
		"58", // System error (58000, 58030)
		"57P01", // Admin shutdown
		"57P02", // Crash shutdown
		"57P03", // Cannot connect now
		"F0", // Config file error
		"XX", // Internal error
	],

	// Timeout: candidate is too expensive even to plan or run
	timeout: [
		"57014", // Query canceled (statement_timeout)
	],
}

function matchesClass(codes: string[], sqlstate: string): boolean {
	// Exact match first (e.g., 57P01), then two-character class prefix
	if (codes.includes(sqlstate)) return true
	return codes.some((prefix) => prefix.length === 2 && sqlstate.startsWith(prefix))
}

/**
 * Check if SQLSTATE is an infrastructure error (connection, pool, resource)
 */
export function isInfrastructureError(sqlstate: string): boolean {
	return matchesClass(SQLSTATE_CLASSIFICATION.infrastructure, sqlstate)
}

/**
 * Check if SQLSTATE is a timeout error
 */
export function isTimeoutError(sqlstate: string): boolean {
	return SQLSTATE_CLASSIFICATION.timeout.includes(sqlstate)
}

/**
 * Get hint for SQLSTATE error
 */
export function getSQLSTATEHint(sqlstate: string): string {
	const hints: Record<string, string> = {
		"42601": "Fix SQL syntax based on the error position",
		"42P01": "Use the table name given in the schema",
		"42703": "Use correct column name - check schema",
		"42702": "Qualify ambiguous column with table alias",
		"42P09": "Qualify ambiguous column with table alias",
		"42P10": "Add table qualifier to column reference",
		"42804": "Fix datatype mismatch in comparison",
		"42883": "Use correct function name or check argument types",
		"42803": "Add missing column to GROUP BY or use aggregate",
		"22012": "Avoid division by zero - add NULLIF or CASE",
		"57014": "Query timed out - simplify query or add filters",
	}
	return hints[sqlstate] ?? "Review the error message and fix the SQL"
}

/**
 * Get human-readable reason for infrastructure error
 */
export function getInfrastructureErrorReason(sqlstate: string): string {
	const reasons: Record<string, string> = {
		"08000": "Connection error",
		"08003": "Connection does not exist",
		"08006": "Connection failure",
		"08001": "Unable to establish connection",
		"08004": "Server rejected connection",
		"53100": "Disk full",
		"53200": "Out of memory",
		"53300": "Too many connections",
		"57P01": "Server shutting down",
		"57P03": "Server cannot accept connections now",
		"58030": "I/O error",
	}

	const exact = reasons[sqlstate]
	if (exact) return exact

	if (sqlstate.startsWith("08")) return "Connection failure"
	if (sqlstate.startsWith("53")) return "Insufficient resources"
	if (sqlstate.startsWith("58")) return "System error"
	if (sqlstate.startsWith("F0")) return "Configuration error"
	if (sqlstate.startsWith("XX")) return "Internal error"

	return "Infrastructure failure"
}

/**
 * SQLSTATE carried by a driver error (pg and PGlite both expose `code`).
 */
export function getSQLSTATE(err: unknown): string | undefined {
	if (typeof err !== "object" || err === null || !("code" in err)) return undefined
	const code = err.code
	return typeof code === "string" && code.length === 5 ? code : undefined
}

// ============================================================================
// Tool responses
// ============================================================================

export interface GenerateResponse {
	ok: boolean
	/** Query ID shared by every log line of this request */
	query_id: string
	sql?: string
	/** Question actually sent to the generator, after refinement */
	refined_question?: string
	judge?: JudgeResult
	steps: string[]
	timing: { total: number }
	error?: string
}

export interface ExecuteResponse {
	ok: boolean
	query_id: string
	result?: TaggedTable
	/** Rows returned by the database, before the preview cut */
	row_count?: number
	/** More rows matched than `execution.max_rows` */
	truncated?: boolean
	analysis?: {
		table: TableSummary
		report: string
	}
	steps: string[]
	timing: { total: number }
	error?: string
}

export type ChatMessage =
	| { type: "text"; content: string }
	| { type: "sql"; content: string }
	| { type: "judge"; content: JudgeResult }
	| { type: "table"; content: TaggedTable }
	| { type: "analysis"; content: TableSummary | string }

export interface ChatResponse {
	ok: boolean
	query_id: string
	messages: ChatMessage[]
	error?: string
}

export interface ListDatabasesResponse {
	ok: boolean
	databases: string[]
	steps: string[]
	error?: string
}

export interface ListTablesResponse {
	ok: boolean
	tables: string[]
	steps: string[]
	error?: string
}
