/**
 * Semantic Judge
 *
 * Asks the reasoning model whether a candidate answers the question and
 * parses its strict-JSON verdict. Unparseable output is an invalid verdict,
 * not an exception.
 */

import { z } from "zod"
import type { Candidate, LayerResult } from "./judge_types.js"
import type { LanguageModel, PromptMessage } from "./llm_client.js"
import type { Logger } from "./logger.js"
import { renderColumnsJson, type SchemaDescriptor } from "./schema_types.js"

export interface SemanticJudge {
	check(question: string, candidate: Candidate, schema: SchemaDescriptor): Promise<LayerResult>
}

const verdictSchema = z.object({
	valid: z.boolean(),
	reason: z.string().default(""),
	fix_suggestion: z.string().nullable().default(""),
	need_regenerate: z.boolean().optional(),
})

export interface JudgeVerdict {
	valid: boolean
	reason: string
	fix_suggestion: string
	need_regenerate: boolean
}

export const NO_JSON_REASON = "judge returned no valid JSON"
const NO_JSON_FIX = "Check GROUP BY/HAVING/WHERE, that every column exists, and that the query matches the question"

const SYSTEM_PROMPT = `You are a senior SQL reviewer.
Judge whether a PostgreSQL query correctly answers the user's question, and reply with strict JSON.

Check:
- PostgreSQL syntax;
- that every table and column exists in the given schema;
- correct use of WHERE, HAVING and GROUP BY;
- that the query matches the question (aggregation, grouping, ordering, top N, time range, units, rounding).

Output:
- JSON only, no explanation;
- keys: valid (boolean), reason (string), fix_suggestion (string), need_regenerate (boolean);
- if the query is correct but could be improved, set valid=true and put the improvement in fix_suggestion.`

export function buildJudgeMessages(question: string, candidate: Candidate, schema: SchemaDescriptor): PromptMessage[] {
	const user =
		`Question: ${question}\n` +
		`Table ${schema.database}.${schema.table} columns:\n${renderColumnsJson(schema)}\n\n` +
		`Candidate SQL:\n${candidate.sql}\n\n` +
		"Reply with strict JSON, for example:\n" +
		"{\n" +
		'  "valid": false,\n' +
		'  "reason": "column user_id in WHERE does not exist",\n' +
		'  "fix_suggestion": "use the real key column id and list the selected columns explicitly",\n' +
		'  "need_regenerate": true\n' +
		"}"
	return [
		{ role: "system", content: SYSTEM_PROMPT },
		{ role: "user", content: user },
	]
}

function tryParseObject(text: string): unknown {
	try {
		const value: unknown = JSON.parse(text)
		return typeof value === "object" && value !== null && !Array.isArray(value) ? value : undefined
	} catch {
		return undefined
	}
}

/**
 * Extract the JSON object from model output: fenced block, whole text, or
 * outermost braces, in that order
 */
export function extractJSONObject(text: string): unknown {
	let s = text.trim()
	const fence = /^```(?:json)?\s*\n([\s\S]*?)\n```\s*$/i.exec(s)
	if (fence) s = fence[1].trim()

	const whole = tryParseObject(s)
	if (whole !== undefined) return whole

	const start = s.indexOf("{")
	const end = s.lastIndexOf("}")
	if (start !== -1 && end > start) return tryParseObject(s.slice(start, end + 1))
	return undefined
}

/**
 * Parse a verdict; null when the output holds no usable JSON object
 */
export function parseVerdict(text: string): JudgeVerdict | null {
	const parsed = verdictSchema.safeParse(extractJSONObject(text))
	if (!parsed.success) return null
	const { valid, reason, fix_suggestion, need_regenerate } = parsed.data
	return {
		valid,
		reason,
		fix_suggestion: fix_suggestion ?? "",
		need_regenerate: need_regenerate ?? !valid,
	}
}

export class ModelSemanticJudge implements SemanticJudge {
	constructor(
		private model: LanguageModel,
		private logger: Logger,
	) {}

	async check(question: string, candidate: Candidate, schema: SchemaDescriptor): Promise<LayerResult> {
		const text = await this.model.complete(buildJudgeMessages(question, candidate, schema), "judge")
		const verdict = parseVerdict(text)

		if (!verdict) {
			this.logger.warn("Semantic judge returned no valid JSON", { output: text.slice(0, 200) })
			return {
				layer_id: "semantic",
				valid: false,
				reason: NO_JSON_REASON,
				fix_suggestion: NO_JSON_FIX,
				errors: [NO_JSON_REASON],
				metrics: {},
				details: { need_regenerate: true },
			}
		}

		return {
			layer_id: "semantic",
			valid: verdict.valid,
			reason: verdict.reason,
			...(verdict.fix_suggestion ? { fix_suggestion: verdict.fix_suggestion } : {}),
			errors: verdict.valid ? [] : [verdict.reason],
			metrics: {},
			details: { need_regenerate: verdict.need_regenerate },
		}
	}
}
