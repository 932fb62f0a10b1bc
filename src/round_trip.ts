/**
 * Round-Trip Explainer
 *
 * Paraphrases a candidate back into one sentence of natural language so the
 * similarity layer can compare it with the question. Always a passing layer;
 * its output is the explanation itself.
 */

import type { Candidate, LayerResult } from "./judge_types.js"
import type { LanguageModel, PromptMessage } from "./llm_client.js"

export interface RoundTripExplainer {
	/** `language` names the answer language only; the question itself is never shown */
	explain(candidate: Candidate, language?: string): Promise<string>
}

const SYSTEM_PROMPT = `You explain SQL queries to non-technical users.
Describe in one sentence what data the query retrieves, as if it were the question a user asked.
Do not mention SQL keywords, table aliases or syntax. Output only the sentence.`

/** Language the explanation should be written in, judged from the question's script. */
export function detectLanguage(text: string): string {
	return /\p{Script=Han}/u.test(text) ? "Chinese" : "English"
}

export function buildExplainMessages(candidate: Candidate, language?: string): PromptMessage[] {
	let user = `SQL:\n${candidate.sql}`
	if (language) {
		user += `\n\nAnswer in ${language}.`
	}
	return [
		{ role: "system", content: SYSTEM_PROMPT },
		{ role: "user", content: user },
	]
}

/** Strip code fences and collapse whitespace. */
export function cleanExplanation(text: string): string {
	return text
		.replace(/```[A-Za-z]*/g, "")
		.split(/\s+/)
		.join(" ")
		.trim()
}

export function roundTripResult(explanation: string): LayerResult {
	return {
		layer_id: "round_trip",
		valid: true,
		errors: [],
		metrics: { explanation_length: explanation.length },
		details: { explanation },
	}
}

export class ModelRoundTripExplainer implements RoundTripExplainer {
	constructor(private model: LanguageModel) {}

	async explain(candidate: Candidate, language?: string): Promise<string> {
		const text = await this.model.complete(buildExplainMessages(candidate, language), "explainer")
		return cleanExplanation(text)
	}
}
