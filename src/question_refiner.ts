/**
 * Question Refiner
 *
 * Optional step before generation: the refiner model rewrites a colloquial or
 * vague question into one explicit sentence (grouping, ranking direction,
 * aggregate, time range). Any failure or SQL-looking output falls back to the
 * original question.
 */

import { CollaboratorError, errorMessage } from "./config.js"
import type { LanguageModel, PromptMessage } from "./llm_client.js"
import type { Logger } from "./logger.js"

const SYSTEM_PROMPT = `You normalize natural-language data questions.
Rewrite the user's question into one clear sentence that a SQL writer can follow.

Rules:
1) Output exactly one line of natural language: no SQL, no code block, no explanation, no list.
2) Do not invent table names, column names or business assumptions; only make the logic explicit.
3) Keep the user's meaning. When the question is vague, make explicit:
   - the time range ("in the last year", "up to now")
   - top N or sort direction (highest/lowest/first N)
   - the grouping ("for each ...", "per ...")
   - the aggregate (average, sum, count)
4) "in each X, the highest Y" is a per-group extreme; "the highest Y" alone is a global extreme.
5) Answer in the language of the question.

Examples:
Input: department with most doctors in each hospital
Output: For each hospital, count the doctors in every department and find the department with the most doctors in that hospital.

Input: title with the highest average salary
Output: Across all titles, compute the average salary and find the title with the highest average salary.`

const SQL_MARKERS = ["select ", "insert ", "update ", "delete ", "create ", "drop "]

/**
 * Clean refiner output; null when it should not replace the question
 */
export function cleanRefinedQuestion(text: string): string | null {
	let t = text.trim()
	if (t.startsWith("```") && t.endsWith("```")) {
		t = t.replace(/^`+[A-Za-z]*/, "").replace(/`+$/, "").trim()
	}
	const lower = t.toLowerCase()
	if (SQL_MARKERS.some((kw) => lower.includes(kw))) return null
	t = t.split(/\s+/).join(" ").trim()
	return t.length > 0 ? t : null
}

export class QuestionRefiner {
	constructor(
		private model: LanguageModel,
		private logger: Logger,
	) {}

	/**
	 * Rewrite the question; returns the original on any failure
	 */
	async refine(question: string): Promise<string> {
		if (question.trim().length === 0) return question

		const messages: PromptMessage[] = [
			{ role: "system", content: SYSTEM_PROMPT },
			{ role: "user", content: `Original question: ${question}\n\nOutput the rewritten question as one sentence.` },
		]

		try {
			const text = await this.model.complete(messages, "refiner")
			const refined = cleanRefinedQuestion(text)
			if (refined === null) {
				this.logger.warn("Refiner output unusable, keeping original question", { output: text.slice(0, 200) })
				return question
			}
			return refined
		} catch (error) {
			if (!(error instanceof CollaboratorError)) throw error
			this.logger.warn("Question refinement failed, keeping original question", {
				kind: error.kind,
				error: errorMessage(error),
			})
			return question
		}
	}
}
