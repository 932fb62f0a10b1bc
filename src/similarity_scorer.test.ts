import { describe, it, expect, vi } from "vitest"
import { cosine, DIVERGENCE_HINT, EmbeddingSimilarityScorer, LexicalEmbedder, normalizeText } from "./similarity_scorer.js"
import type { EmbeddingModel } from "./llm_client.js"

/** Embedder double returning fixed vectors for the question and the explanation. */
function fixedEmbedder(question: number[], explanation: number[]) {
	const embed = vi.fn(async (texts: string[]) => texts.map((_t, i) => (i === 0 ? question : explanation)))
	const embedder: EmbeddingModel = { embed }
	return { embedder, embed }
}

describe("cosine", () => {
	it("should compute exact values for simple vectors", () => {
		expect(cosine([1, 0], [3, 4])).toBe(0.6)
		expect(cosine([1, 0], [0, 0])).toBe(0)
	})

	it("should refuse vectors of different length", () => {
		expect(() => cosine([1], [1, 2])).toThrow("Embedding dimensions differ: 1 vs 2")
	})
})

describe("normalizeText", () => {
	it("should ignore case and punctuation", () => {
		expect(normalizeText("How many  doctors?")).toBe("how many doctors")
	})
})

describe("EmbeddingSimilarityScorer", () => {
	it("should pass when the score meets the threshold", async () => {
		const { embedder } = fixedEmbedder([1, 0], [4, 3])
		const result = await new EmbeddingSimilarityScorer(embedder, 0.75).score("q", "e")

		expect(result).toEqual({
			layer_id: "embedding",
			valid: true,
			reason: "similarity 0.800 meets threshold 0.75",
			errors: [],
			metrics: { score: 0.8, threshold: 0.75 },
		})
	})

	it("should fail below the threshold with the divergence hint", async () => {
		const { embedder } = fixedEmbedder([1, 0], [3, 4])
		const result = await new EmbeddingSimilarityScorer(embedder, 0.75).score("q", "e")

		expect(result.valid).toBe(false)
		expect(result.metrics.score).toBe(0.6)
		expect(result.fix_suggestion).toBe(DIVERGENCE_HINT)
		expect(result.errors).toEqual(["similarity 0.600 is below threshold 0.75"])
	})

	it("should let a score equal to the threshold pass", async () => {
		const { embedder } = fixedEmbedder([3, 4], [3, 4])
		const result = await new EmbeddingSimilarityScorer(embedder, 1).score("q", "e")
		expect(result.valid).toBe(true)
	})

	it("should clamp negative similarity to zero", async () => {
		const { embedder } = fixedEmbedder([1, 0], [-1, 0])
		const result = await new EmbeddingSimilarityScorer(embedder, 0.75).score("q", "e")
		expect(result.metrics.score).toBe(0)
	})

	it("should score an empty explanation as zero without embedding", async () => {
		const { embedder, embed } = fixedEmbedder([1, 0], [1, 0])
		const result = await new EmbeddingSimilarityScorer(embedder, 0.75).score("How many doctors?", "  ")

		expect(result.valid).toBe(false)
		expect(result.metrics.score).toBe(0)
		expect(result.reason).toBe("explanation is empty; similarity 0.000 is below threshold 0.75")
		expect(embed).not.toHaveBeenCalled()
	})

	it("should score identical text as one without embedding", async () => {
		const { embedder, embed } = fixedEmbedder([1, 0], [0, 1])
		const result = await new EmbeddingSimilarityScorer(embedder, 0.75).score("How many doctors?", "how many doctors")

		expect(result.metrics.score).toBe(1)
		expect(result.valid).toBe(true)
		expect(embed).not.toHaveBeenCalled()
	})
})

describe("LexicalEmbedder", () => {
	const embedder = new LexicalEmbedder()

	it("should be deterministic and unit length", async () => {
		const [a, b] = await embedder.embed(["查询医生总人数", "查询医生总人数"])
		expect(a).toEqual(b)
		expect(cosine(a, a)).toBeCloseTo(1, 10)
	})

	it("should score related text above unrelated text", async () => {
		const [q, close, far] = await embedder.embed([
			"how many doctors are there",
			"how many doctors are there in total",
			"list pharmacy stock by supplier",
		])
		expect(cosine(q, close)).toBeGreaterThan(cosine(q, far))
		expect(cosine(q, far)).toBeLessThan(0.75)
	})

	it("should return a zero vector for punctuation-only text", () => {
		expect(embedder.vector("?!").every((v) => v === 0)).toBe(true)
	})
})
