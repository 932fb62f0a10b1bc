/**
 * SQL Generator
 *
 * Builds the generation prompt (schema JSON, sample values, correction hints),
 * calls the generator model and canonicalizes its output:
 * - code fence body extracted
 * - whitespace collapsed outside literals, comments dropped
 * - trailing semicolons removed
 *
 * Output that is empty, holds more than one statement or is not a SELECT is
 * returned as a GenerationFailure, never as a candidate.
 */

import type { GenerationOutcome } from "./judge_types.js"
import type { LanguageModel, PromptMessage } from "./llm_client.js"
import type { Logger } from "./logger.js"
import { renderColumnsJson, renderSampleValues, type SchemaDescriptor } from "./schema_types.js"
import { collapseWhitespace, lexSQL } from "./sql_tokenizer.js"

export interface SqlGenerator {
	generate(question: string, schema: SchemaDescriptor, feedback?: string, iterationIndex?: number): Promise<GenerationOutcome>
}

export type CanonicalSQL = { ok: true; sql: string } | { ok: false; reason: string }

// ============================================================================
// Prompt
// ============================================================================

const SYSTEM_PROMPT = `You are a senior SQL assistant. You translate a user's question about one PostgreSQL table into exactly one query.

Output rules:
1) Output a single SELECT statement and nothing else: no explanation, no comments, no markdown.
2) Use only the table and columns listed in the prompt; never invent a column.
3) The statement must be valid PostgreSQL and must not modify data.

Generation rules:
1) Row limit: never return an unbounded result; if the question does not specify a row count, append LIMIT 1000.
2) Aggregation: when the question asks for a value per group ("each", "per", "by"), use GROUP BY and select both the group column and the aggregate.
3) Precision: wrap AVG, SUM and ratios in ROUND(..., 2) (cast to numeric first when needed).
4) NULL safety: use COALESCE for missing values and NULLIF(denominator, 0) in divisions.
5) Ranking: "highest/top N" means ORDER BY metric DESC; "lowest" means ASC. A per-group extreme needs a window function (ROW_NUMBER/RANK OVER (PARTITION BY ...)) or a subquery; a global extreme needs ORDER BY ... LIMIT 1.
6) Filters on aggregates go in HAVING; row filters go in WHERE.
7) Time series ("by day/month/year", "trend"): select the truncated time bucket and group by it.
8) Ratios and shares: (numerator / NULLIF(denominator, 0)) * 100, rounded to 2 decimals.
9) For columns with allowed values, compare only against one of those exact values.
10) List the needed columns explicitly instead of SELECT *.
11) Durations (tenure, length of stay, usage time): use date subtraction or AGE(). A NULL end date may be replaced by CURRENT_DATE only when NULL means "still ongoing" (leave_date, discharge_date, usage_end, or status in ('active', 'in_progress', 'ongoing')); when NULL means the value is missing, keep NULL or filter the row out.
12) Status and negation: "not yet/never/no" means IS NULL or = 0; "already/has" means IS NOT NULL or > 0; "in progress" means start_date <= CURRENT_DATE AND (end_date IS NULL OR end_date >= CURRENT_DATE).`

/**
 * Build the chat messages for one generation call
 */
export function buildGeneratorMessages(question: string, schema: SchemaDescriptor, feedback?: string): PromptMessage[] {
	const sampleValues = renderSampleValues(schema)
	let user =
		`Question: ${question}\n\n` +
		`Table ${schema.database}.${schema.table} columns:\n${renderColumnsJson(schema)}\n\n` +
		`Column values:\n${sampleValues || "(none)"}`

	if (feedback) {
		user += `\n\nCorrection hints (follow strictly):\n${feedback}`
	}

	user += "\n\nWrite one PostgreSQL SELECT statement that answers the question. Output SQL only."

	return [
		{ role: "system", content: SYSTEM_PROMPT },
		{ role: "user", content: user },
	]
}

// ============================================================================
// Post-processing
// ============================================================================

/**
 * Canonicalize raw model output into a single SELECT without trailing semicolon
 */
export function canonicalizeSQL(raw: string): CanonicalSQL {
	let text = raw.trim()

	// Extract the body of the first code fence, if any
	const fence = /```[A-Za-z]*\s*\n?([\s\S]*?)```/.exec(text)
	if (fence) text = fence[1]

	text = collapseWhitespace(text)
	while (text.endsWith(";")) {
		text = text.slice(0, -1).trimEnd()
	}

	if (text.length === 0) {
		return { ok: false, reason: "empty model output" }
	}

	const lexemes = lexSQL(text)
	if (lexemes.some((lx) => lx.kind === "punct" && lx.value === ";")) {
		return { ok: false, reason: "model output contains more than one statement" }
	}

	const first = lexemes[0]
	const keyword = first && first.kind === "word" ? first.value.toUpperCase() : ""
	if (keyword !== "SELECT" && keyword !== "WITH") {
		return { ok: false, reason: "model output does not begin with SELECT" }
	}

	return { ok: true, sql: text }
}

// ============================================================================
// Generator
// ============================================================================

export class ModelSqlGenerator implements SqlGenerator {
	constructor(
		private model: LanguageModel,
		private logger: Logger,
	) {}

	async generate(question: string, schema: SchemaDescriptor, feedback?: string, iterationIndex: number = 1): Promise<GenerationOutcome> {
		if (question.trim().length === 0) {
			return { ok: false, failure: { reason: "question is empty" } }
		}
		if (schema.columns.length === 0) {
			return { ok: false, failure: { reason: `table ${schema.table} has no columns` } }
		}

		const messages = buildGeneratorMessages(question, schema, feedback)
		const raw = await this.model.complete(messages, "generator")
		const canonical = canonicalizeSQL(raw)

		if (!canonical.ok) {
			this.logger.warn("Generator output rejected", { iteration: iterationIndex, reason: canonical.reason })
			return { ok: false, failure: { reason: canonical.reason, raw_output: raw } }
		}

		this.logger.debug("Candidate generated", { iteration: iterationIndex, sql: canonical.sql })
		return {
			ok: true,
			candidate: {
				sql: canonical.sql,
				iteration_index: iterationIndex,
				...(feedback ? { source_feedback: feedback } : {}),
			},
		}
	}
}
