/**
 * Judge Loop
 *
 * Bounded generate → validate → retry state machine:
 *
 *   GENERATING → VALIDATING → ACCEPTED | RETRYING | EXHAUSTED
 *
 * RETRYING goes back to GENERATING with the previous iteration's reason and
 * fix suggestion as feedback. Iterations are strictly sequential because
 * each one depends on the feedback of the one before.
 *
 * Layer failures are recorded as data; only collaborator errors and
 * cancellation are thrown.
 */

import { JudgeError } from "./config.js"
import type { ExecutionPrechecker } from "./execution_precheck.js"
import type { Candidate, GenerationFailure, IterationRecord, JudgeResult, LayerResult } from "./judge_types.js"
import type { Logger } from "./logger.js"
import { detectLanguage, roundTripResult, type RoundTripExplainer } from "./round_trip.js"
import type { SchemaDescriptor } from "./schema_types.js"
import type { SemanticJudge } from "./semantic_judge.js"
import type { SimilarityScorer } from "./similarity_scorer.js"
import type { SqlGenerator } from "./sql_generator.js"
import { checkSyntax } from "./sql_validator.js"

// ============================================================================
// Types
// ============================================================================

export interface JudgeLayers {
	generator: SqlGenerator
	semantic: SemanticJudge
	explainer: RoundTripExplainer
	similarity: SimilarityScorer
	precheck: ExecutionPrechecker
}

export interface JudgeLoopOptions {
	/** Make a below-threshold similarity reject the iteration */
	embeddingBlocking: boolean
	/** Run semantic, round-trip→embedding and execution concurrently */
	parallelLayers: boolean
}

export interface RunOptions {
	signal?: AbortSignal
	/** Correlates log lines of one request */
	queryId?: string
	/** Question sent to the generator (e.g. after refinement); judges always see the original */
	generationQuestion?: string
}

export const GENERATION_FAILED_REASON = "generation failed"
const GENERATION_FAILED_FIX = "Output exactly one SELECT statement and nothing else"

// ============================================================================
// Feedback
// ============================================================================

/**
 * Feedback text for the next generation call
 */
export function formatFeedback(record: IterationRecord): string {
	const lines = [`reason: ${record.reason}`]
	if (record.fix_suggestion) lines.push(`fix_suggestion: ${record.fix_suggestion}`)
	return lines.join("\n")
}

function generationFailureRecord(iterationIndex: number, failure: GenerationFailure): IterationRecord {
	return {
		iteration_index: iterationIndex,
		candidate: null,
		layer_results: [
			{
				layer_id: "syntax",
				valid: false,
				reason: failure.reason,
				errors: [`GENERATION_FAILED: ${failure.reason}`],
				metrics: {},
			},
		],
		valid: false,
		reason: GENERATION_FAILED_REASON,
		fix_suggestion: GENERATION_FAILED_FIX,
	}
}

function failureReason(result: LayerResult): string {
	return result.reason ?? `${result.layer_id} check failed`
}

// ============================================================================
// Loop
// ============================================================================

export class JudgeLoop {
	constructor(
		private layers: JudgeLayers,
		private logger: Logger,
		private options: JudgeLoopOptions,
	) {}

	async run(question: string, schema: SchemaDescriptor, maxIterations: number, runOptions: RunOptions = {}): Promise<JudgeResult> {
		if (!Number.isInteger(maxIterations) || maxIterations < 1) {
			throw new JudgeError("invalid_input", `max_iterations must be an integer >= 1, got ${maxIterations}`)
		}

		const { signal, queryId } = runOptions
		const generationQuestion = runOptions.generationQuestion ?? question
		const iterations: IterationRecord[] = []
		let previous: IterationRecord | undefined

		for (let i = 1; i <= maxIterations; i++) {
			this.throwIfCancelled(signal, queryId, i)

			const feedback = previous ? formatFeedback(previous) : undefined
			const outcome = await this.layers.generator.generate(generationQuestion, schema, feedback, i)
			const record = outcome.ok
				? await this.judge(question, outcome.candidate, schema, i)
				: generationFailureRecord(i, outcome.failure)

			// Results of calls that were in flight when the request was aborted are dropped
			this.throwIfCancelled(signal, queryId, i)

			iterations.push(record)
			this.logger.info("Iteration judged", {
				query_id: queryId,
				iteration: i,
				valid: record.valid,
				reason: record.reason,
				layers: Object.fromEntries(record.layer_results.map((r) => [r.layer_id, r.valid])),
				similarity: record.semantic_similarity,
			})

			if (record.valid) {
				return { iterations, last_judge: record, accepted: true }
			}
			previous = record
		}

		this.logger.warn("Iteration budget exhausted", { query_id: queryId, max_iterations: maxIterations })
		return { iterations, last_judge: iterations[iterations.length - 1], accepted: false }
	}

	/**
	 * Run every layer on one candidate and aggregate in fixed layer order
	 */
	private async judge(
		question: string,
		candidate: Candidate,
		schema: SchemaDescriptor,
		iterationIndex: number,
	): Promise<IterationRecord> {
		const syntax = checkSyntax(candidate, schema)
		if (!syntax.valid) {
			return {
				iteration_index: iterationIndex,
				candidate,
				layer_results: [syntax],
				valid: false,
				reason: failureReason(syntax),
				...(syntax.fix_suggestion ? { fix_suggestion: syntax.fix_suggestion } : {}),
			}
		}

		const [semantic, [roundTrip, embedding], execution] = await this.runLayers(question, candidate, schema)

		const blocking = [syntax, semantic, ...(this.options.embeddingBlocking ? [embedding] : []), execution]
		const firstFailure = blocking.find((r) => !r.valid)
		const fix = firstFailure ? firstFailure.fix_suggestion : semantic.fix_suggestion

		return {
			iteration_index: iterationIndex,
			candidate,
			layer_results: [syntax, semantic, roundTrip, embedding, execution],
			valid: firstFailure === undefined,
			reason: firstFailure ? failureReason(firstFailure) : (semantic.reason ?? "all checks passed"),
			...(fix ? { fix_suggestion: fix } : {}),
			semantic_similarity: embedding.metrics.score,
		}
	}

	/**
	 * Semantic, round-trip→embedding and execution; concurrently when configured
	 */
	private async runLayers(
		question: string,
		candidate: Candidate,
		schema: SchemaDescriptor,
	): Promise<[LayerResult, [LayerResult, LayerResult], LayerResult]> {
		const semanticCall = () => this.layers.semantic.check(question, candidate, schema)
		const roundTripCall = async (): Promise<[LayerResult, LayerResult]> => {
			const explanation = await this.layers.explainer.explain(candidate, detectLanguage(question))
			const embedding = await this.layers.similarity.score(question, explanation)
			return [roundTripResult(explanation), embedding]
		}
		const precheckCall = () => this.layers.precheck.precheck(candidate, schema)

		if (this.options.parallelLayers) {
			return Promise.all([semanticCall(), roundTripCall(), precheckCall()])
		}
		const semantic = await semanticCall()
		const roundTrip = await roundTripCall()
		const execution = await precheckCall()
		return [semantic, roundTrip, execution]
	}

	private throwIfCancelled(signal: AbortSignal | undefined, queryId: string | undefined, iteration: number): void {
		if (!signal?.aborted) return
		this.logger.info("Judge loop cancelled", { query_id: queryId, iteration })
		throw new JudgeError("cancelled", "Request was cancelled", false, { iteration })
	}
}
