/**
 * Result Analyzer
 *
 * Structural summary of a result set (fields, record count, numeric ranges,
 * a short preview) and a model-written report built on top of it.
 */

import { CollaboratorError, errorMessage } from "./config.js"
import type { LanguageModel, PromptMessage } from "./llm_client.js"
import type { Logger } from "./logger.js"
import { cellText, previewTable, type TaggedTable } from "./result_normalizer.js"

export interface NumericStats {
	column: string
	min: number
	max: number
	sum: number
}

export interface TableSummary {
	fields: string[]
	record_count: number
	numeric: NumericStats[]
	preview: TaggedTable
}

const SUMMARY_PREVIEW_ROWS = 10
const MAX_NUMERIC_STATS = 20

// ============================================================================
// Summary
// ============================================================================

/**
 * Summarize a table. A column is numeric when every non-null cell is a number.
 */
export function summarizeTable(table: TaggedTable): TableSummary {
	const numeric: NumericStats[] = []

	table.columns.forEach((column, idx) => {
		const values: number[] = []
		for (const row of table.rows) {
			const cell = row[idx]
			if (cell.kind === "null") continue
			if (cell.kind !== "number") return
			values.push(cell.value)
		}
		if (values.length === 0) return
		numeric.push({
			column,
			min: values.reduce((a, b) => Math.min(a, b)),
			max: values.reduce((a, b) => Math.max(a, b)),
			sum: values.reduce((a, b) => a + b, 0),
		})
	})

	return {
		fields: table.columns,
		record_count: table.rows.length,
		numeric: numeric.slice(0, MAX_NUMERIC_STATS),
		preview: previewTable(table, SUMMARY_PREVIEW_ROWS),
	}
}

function escapeCell(text: string): string {
	return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ")
}

export function renderMarkdownTable(table: TaggedTable): string {
	const header = `| ${table.columns.map(escapeCell).join(" | ")} |`
	const divider = `| ${table.columns.map(() => "---").join(" | ")} |`
	const body = table.rows.map((row) => `| ${row.map((cell) => escapeCell(cellText(cell))).join(" | ")} |`)
	return [header, divider, ...body].join("\n")
}

/** Text form of a summary, used in the report prompt. */
export function renderSummary(summary: TableSummary): string {
	const lines = [`Fields: ${summary.fields.join(", ")}`, `Records: ${summary.record_count}`]
	if (summary.numeric.length > 0) {
		lines.push("Numeric columns:")
		for (const s of summary.numeric) {
			lines.push(`- ${s.column}: min=${s.min}, max=${s.max}, sum=${s.sum}`)
		}
	}
	lines.push("Preview:")
	lines.push(renderMarkdownTable(summary.preview))
	return lines.join("\n")
}

// ============================================================================
// Report
// ============================================================================

const SYSTEM_PROMPT = `You are a senior data analyst.
Given a user's question and a summary of the query result, write a short report in markdown:
1. Summary: the direct answer to the question.
2. Key figures: the most relevant numbers.
3. Observations: trends, outliers or comparisons worth noting.
Use only the data provided. Answer in the language of the question.`

export function buildReportMessages(question: string, summary: TableSummary): PromptMessage[] {
	return [
		{ role: "system", content: SYSTEM_PROMPT },
		{ role: "user", content: `Question: ${question}\n\nData summary:\n${renderSummary(summary)}` },
	]
}

export class ResultAnalyzer {
	constructor(
		private model: LanguageModel,
		private logger: Logger,
	) {}

	/**
	 * Model-written report. A model failure degrades to a notice; the result
	 * set itself is still returned to the caller.
	 */
	async report(question: string, summary: TableSummary): Promise<string> {
		try {
			const text = await this.model.complete(buildReportMessages(question, summary), "analyst")
			return text.trim()
		} catch (error) {
			if (!(error instanceof CollaboratorError)) throw error
			this.logger.warn("Report generation failed", { kind: error.kind, error: errorMessage(error) })
			return `Report unavailable: ${errorMessage(error)}`
		}
	}
}
