/**
 * Embedding Similarity Scorer
 *
 * Cosine similarity between the question and the round-trip explanation,
 * clamped to [0, 1] and compared against a fixed threshold (ties pass).
 *
 * Embedders:
 * - the model server's /embeddings endpoint (ModelClient)
 * - LexicalEmbedder: hashed character bigrams, used when no embedding model
 *   is configured
 */

import type { LayerResult } from "./judge_types.js"
import type { EmbeddingModel } from "./llm_client.js"

export interface SimilarityScorer {
	score(question: string, explanation: string): Promise<LayerResult>
}

export const DIVERGENCE_HINT = "candidate diverges from question intent"

// ============================================================================
// Vector math
// ============================================================================

export function cosine(a: number[], b: number[]): number {
	if (a.length !== b.length) {
		throw new Error(`Embedding dimensions differ: ${a.length} vs ${b.length}`)
	}
	let dot = 0
	let normA = 0
	let normB = 0
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i]
		normA += a[i] * a[i]
		normB += b[i] * b[i]
	}
	if (normA === 0 || normB === 0) return 0
	return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

function clamp01(value: number): number {
	return Math.min(1, Math.max(0, value))
}

/** Lowercase, drop punctuation, collapse whitespace. */
export function normalizeText(text: string): string {
	return text
		.normalize("NFKC")
		.toLowerCase()
		.replace(/[\p{P}\p{S}]/gu, " ")
		.replace(/\s+/g, " ")
		.trim()
}

// ============================================================================
// Lexical embedder
// ============================================================================

/** 32-bit FNV-1a */
function fnv1a(text: string): number {
	let hash = 0x811c9dc5
	for (let i = 0; i < text.length; i++) {
		hash ^= text.charCodeAt(i)
		hash = Math.imul(hash, 0x01000193) >>> 0
	}
	return hash
}

/**
 * Deterministic bag of hashed character bigrams, L2-normalized.
 * Works for both space-delimited and CJK text.
 */
export class LexicalEmbedder implements EmbeddingModel {
	constructor(private dimensions: number = 512) {}

	async embed(texts: string[]): Promise<number[][]> {
		return texts.map((text) => this.vector(text))
	}

	vector(text: string): number[] {
		const chars = Array.from(normalizeText(text))
		const vec = new Array<number>(this.dimensions).fill(0)
		const grams = chars.length < 2 ? chars : chars.slice(1).map((c, i) => chars[i] + c)
		for (const gram of grams) {
			vec[fnv1a(gram) % this.dimensions] += 1
		}
		const norm = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0))
		return norm === 0 ? vec : vec.map((v) => v / norm)
	}
}

// ============================================================================
// Scorer
// ============================================================================

export class EmbeddingSimilarityScorer implements SimilarityScorer {
	constructor(
		private embedder: EmbeddingModel,
		private threshold: number,
	) {}

	async score(question: string, explanation: string): Promise<LayerResult> {
		if (explanation.trim().length === 0) {
			return this.result(0, "explanation is empty")
		}

		if (normalizeText(question) === normalizeText(explanation)) {
			return this.result(1)
		}

		const [q, e] = await this.embedder.embed([question, explanation])
		return this.result(clamp01(cosine(q, e)))
	}

	private result(score: number, why?: string): LayerResult {
		const valid = score >= this.threshold
		const summary = `similarity ${score.toFixed(3)} ${valid ? "meets" : "is below"} threshold ${this.threshold}`
		const reason = why ? `${why}; ${summary}` : summary
		return {
			layer_id: "embedding",
			valid,
			reason,
			...(valid ? {} : { fix_suggestion: DIVERGENCE_HINT }),
			errors: valid ? [] : [reason],
			metrics: { score, threshold: this.threshold },
		}
	}
}
