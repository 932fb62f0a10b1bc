/**
 * Query Tools
 *
 * The operations exposed over MCP:
 * 1. generate_sql: describe the table, refine the question, run the judge loop
 * 2. execute_sql: re-validate, run read-only, normalize and analyze the result
 * 3. chat: generate + execute for the last user turn of a conversation
 * 4. list_databases / list_tables: discovery
 *
 * Every failure is returned as `{ok: false, error}`; nothing throws past here.
 */

import { v4 as uuidv4 } from "uuid"
import {
	CollaboratorError,
	errorMessage,
	getInfrastructureErrorReason,
	getSQLSTATE,
	isInfrastructureError,
	JudgeError,
	type ChatMessage,
	type ChatResponse,
	type ExecuteResponse,
	type GenerateResponse,
	type ListDatabasesResponse,
	type ListTablesResponse,
} from "./config.js"
import type { DataSource } from "./data_source.js"
import type { PipelineContext } from "./pipeline_context.js"
import { normalizeRows, previewTable } from "./result_normalizer.js"
import { summarizeTable } from "./result_analyzer.js"
import type { SchemaIntrospector } from "./schema_introspector.js"
import { checkSyntax } from "./sql_validator.js"

// ============================================================================
// Inputs
// ============================================================================

export interface GenerateInput {
	database: string
	table: string
	question: string
}

export interface ExecuteInput {
	database: string
	table: string
	question?: string
	sql: string
}

export interface ChatTurn {
	role: "user" | "assistant" | "system"
	content: string
}

export interface ChatInput {
	history: ChatTurn[]
	database?: string
	table?: string
}

export interface ToolOptions {
	signal?: AbortSignal
	/** Reuse an existing query ID (chat passes its own) */
	queryId?: string
}

export const NO_ROWS_ERROR = "query returned no rows"
export const ASK_FOR_TABLE_MESSAGE = "Please choose a database and a table before asking a question."

// ============================================================================
// Helpers
// ============================================================================

/** Seconds since `start`, 2 decimals. */
function elapsed(start: number): number {
	return Math.round((Date.now() - start) / 10) / 100
}

/**
 * User-facing message for a thrown error
 */
export function describeFailure(err: unknown): string {
	if (err instanceof CollaboratorError || err instanceof JudgeError) return err.message
	const sqlstate = getSQLSTATE(err)
	if (sqlstate && isInfrastructureError(sqlstate)) {
		return `${getInfrastructureErrorReason(sqlstate)}: ${errorMessage(err)}`
	}
	if (sqlstate) return `Query failed [${sqlstate}]: ${errorMessage(err)}`
	return errorMessage(err)
}

function requireText(value: string | undefined, name: string): string {
	const trimmed = value?.trim() ?? ""
	if (trimmed.length === 0) throw new JudgeError("invalid_input", `${name} is required`)
	return trimmed
}

function requireIntrospector(ctx: PipelineContext): SchemaIntrospector {
	const introspector = ctx.introspector()
	if (!introspector) throw new JudgeError("invalid_input", "No database is configured")
	return introspector
}

function requireDb(ctx: PipelineContext): DataSource {
	const db = ctx.db
	if (!db) throw new JudgeError("invalid_input", "No database is configured")
	return db
}

// ============================================================================
// generate_sql
// ============================================================================

export async function generateSql(input: GenerateInput, ctx: PipelineContext, options: ToolOptions = {}): Promise<GenerateResponse> {
	const startTime = Date.now()
	const queryId = options.queryId ?? uuidv4()
	const { logger, config } = ctx
	const steps = [`select database: ${input.database}`, `select table: ${input.table}`]

	logger.info("Generate request received", {
		query_id: queryId,
		database: input.database,
		table: input.table,
		question: input.question,
	})

	try {
		const database = requireText(input.database, "database")
		const table = requireText(input.table, "table")
		const question = requireText(input.question, "question")

		let t = Date.now()
		const schema = await requireIntrospector(ctx).describeSchema(database, table)
		steps.push(`describe schema: ${elapsed(t)}s`)

		let refined = question
		if (config.judge.refine_question) {
			t = Date.now()
			refined = await ctx.refiner().refine(question)
			steps.push(`refine question: ${elapsed(t)}s`)
		}

		t = Date.now()
		const maxIterations = config.judge.max_iterations
		const judge = await ctx.judgeLoop().run(question, schema, maxIterations, {
			signal: options.signal,
			queryId,
			generationQuestion: refined,
		})
		steps.push(`generate and judge: ${elapsed(t)}s`)

		const candidate = judge.last_judge.candidate
		if (!judge.accepted || !candidate) {
			logger.warn("No valid SQL produced", { query_id: queryId, iterations: judge.iterations.length })
			return {
				ok: false,
				query_id: queryId,
				refined_question: refined,
				judge,
				steps,
				timing: { total: elapsed(startTime) },
				error: `no valid SQL within ${maxIterations} iterations`,
			}
		}

		logger.info("SQL accepted", {
			query_id: queryId,
			iterations: judge.iterations.length,
			latency_ms: Date.now() - startTime,
		})
		return {
			ok: true,
			query_id: queryId,
			sql: candidate.sql,
			refined_question: refined,
			judge,
			steps,
			timing: { total: elapsed(startTime) },
		}
	} catch (err) {
		const error = describeFailure(err)
		logger.error("Generate request failed", { query_id: queryId, error })
		return { ok: false, query_id: queryId, steps, timing: { total: elapsed(startTime) }, error }
	}
}

// ============================================================================
// execute_sql
// ============================================================================

/** Wrap a SELECT so that at most `limit` rows come back. */
export function capRows(sql: string, limit: number): string {
	const body = sql.trim().replace(/;\s*$/, "")
	return `SELECT * FROM (\n${body}\n) AS capped LIMIT ${limit}`
}

export async function executeSql(input: ExecuteInput, ctx: PipelineContext, options: ToolOptions = {}): Promise<ExecuteResponse> {
	const startTime = Date.now()
	const queryId = options.queryId ?? uuidv4()
	const { logger, config } = ctx
	const steps = [`select database: ${input.database}`]

	try {
		const database = requireText(input.database, "database")
		const table = requireText(input.table, "table")
		const sql = requireText(input.sql, "sql")

		// Structural rules and the table allowlist; no column metadata here
		const syntax = checkSyntax({ sql, iteration_index: 1 }, { database, table, columns: [] })
		steps.push("validate SQL")
		if (!syntax.valid) {
			logger.warn("Execute refused", { query_id: queryId, reason: syntax.reason })
			return {
				ok: false,
				query_id: queryId,
				steps,
				timing: { total: elapsed(startTime) },
				error: `SQL rejected: ${syntax.reason ?? "invalid SQL"}`,
			}
		}

		let t = Date.now()
		const maxRows = config.execution.max_rows
		const result = await requireDb(ctx).query(capRows(sql, maxRows + 1), [], {
			timeoutMs: config.database.statement_timeout_ms,
			searchPath: database,
			readOnly: true,
		})
		steps.push(`execute SQL: ${elapsed(t)}s`)

		if (result.rows.length === 0) {
			return { ok: false, query_id: queryId, row_count: 0, steps, timing: { total: elapsed(startTime) }, error: NO_ROWS_ERROR }
		}
		const truncated = result.rows.length > maxRows
		const rows = truncated ? result.rows.slice(0, maxRows) : result.rows

		t = Date.now()
		const tagged = normalizeRows(rows, result.fields)
		const summary = summarizeTable(tagged)
		const report = await ctx.analyzer().report(input.question ?? "", summary)
		steps.push(`analyze result: ${elapsed(t)}s`)

		logger.info("SQL executed", {
			query_id: queryId,
			rows: rows.length,
			truncated,
			latency_ms: Date.now() - startTime,
		})
		return {
			ok: true,
			query_id: queryId,
			result: previewTable(tagged, config.execution.preview_rows),
			row_count: rows.length,
			truncated,
			analysis: { table: summary, report },
			steps,
			timing: { total: elapsed(startTime) },
		}
	} catch (err) {
		const error = describeFailure(err)
		logger.error("Execute request failed", { query_id: queryId, error })
		return { ok: false, query_id: queryId, steps, timing: { total: elapsed(startTime) }, error }
	}
}

// ============================================================================
// chat
// ============================================================================

function lastUserMessage(history: ChatTurn[]): string | undefined {
	for (let i = history.length - 1; i >= 0; i--) {
		if (history[i].role === "user" && history[i].content.trim()) return history[i].content.trim()
	}
	return undefined
}

export async function chat(input: ChatInput, ctx: PipelineContext, options: ToolOptions = {}): Promise<ChatResponse> {
	const queryId = options.queryId ?? uuidv4()
	const question = lastUserMessage(input.history)
	if (!question) {
		return {
			ok: false,
			query_id: queryId,
			messages: [{ type: "text", content: "No user message found." }],
			error: "no user message",
		}
	}
	if (!input.database || !input.table) {
		return { ok: true, query_id: queryId, messages: [{ type: "text", content: ASK_FOR_TABLE_MESSAGE }] }
	}

	const { database, table } = input
	const messages: ChatMessage[] = []
	const generated = await generateSql({ database, table, question }, ctx, { ...options, queryId })
	if (generated.judge) messages.push({ type: "judge", content: generated.judge })
	if (!generated.ok || !generated.sql) {
		const error = generated.error ?? "no SQL generated"
		messages.push({ type: "text", content: error })
		return { ok: false, query_id: queryId, messages, error }
	}
	messages.push({ type: "sql", content: generated.sql })

	const executed = await executeSql({ database, table, question, sql: generated.sql }, ctx, { queryId })
	if (!executed.ok || !executed.result || !executed.analysis) {
		const error = executed.error ?? "execution failed"
		messages.push({ type: "text", content: error })
		return { ok: false, query_id: queryId, messages, error }
	}
	messages.push({ type: "table", content: executed.result })
	messages.push({ type: "analysis", content: executed.analysis.table })
	messages.push({ type: "analysis", content: executed.analysis.report })
	return { ok: true, query_id: queryId, messages }
}

// ============================================================================
// Discovery
// ============================================================================

export async function listDatabases(ctx: PipelineContext): Promise<ListDatabasesResponse> {
	const steps = ["connect to database", "list databases"]
	try {
		const databases = await requireIntrospector(ctx).listDatabases()
		return { ok: true, databases, steps }
	} catch (err) {
		const error = describeFailure(err)
		ctx.logger.error("List databases failed", { error })
		return { ok: false, databases: [], steps, error }
	}
}

export async function listTables(database: string, ctx: PipelineContext): Promise<ListTablesResponse> {
	const steps = [`select database: ${database}`, "list tables"]
	try {
		const tables = await requireIntrospector(ctx).listTables(requireText(database, "database"))
		return { ok: true, tables, steps }
	} catch (err) {
		const error = describeFailure(err)
		ctx.logger.error("List tables failed", { database, error })
		return { ok: false, tables: [], steps, error }
	}
}
