/**
 * Judge Types
 *
 * Candidate, per-layer verdicts, iteration records and the final JudgeResult.
 * Field names are snake_case because these objects go over the wire as-is.
 */

export type LayerId = "syntax" | "semantic" | "round_trip" | "embedding" | "execution"


/**
 * One generated SQL statement
 */
export interface Candidate {
	/** Canonical form: single SELECT, no trailing semicolon */
	sql: string
	iteration_index: number
	/** Feedback text that produced this candidate (absent on the first iteration) */
	source_feedback?: string
}

export interface LayerDetails {
	columns_used?: string[]
	explanation?: string
	method?: "explain" | "schema"
	need_regenerate?: boolean
}

/**
 * Verdict of one judgment layer for one candidate
 */
export interface LayerResult {
	layer_id: LayerId
	valid: boolean
	reason?: string
	fix_suggestion?: string
	errors: string[]
	metrics: Record<string, number>
	details?: LayerDetails
}

/**
 * Everything recorded for one loop iteration
 */
export interface IterationRecord {
	iteration_index: number
	/** Null when generation itself failed */
	candidate: Candidate | null
	layer_results: LayerResult[]
	valid: boolean
	reason: string
	fix_suggestion?: string
	semantic_similarity?: number
}

/**
 * Outcome of the judge loop
 */
export interface JudgeResult {
	iterations: IterationRecord[]
	last_judge: IterationRecord
	accepted: boolean
}

/**
 * Generator output: a candidate or a failure the loop records as data
 */
export interface GenerationFailure {
	reason: string
	raw_output?: string
}

export type GenerationOutcome = { ok: true; candidate: Candidate } | { ok: false; failure: GenerationFailure }

/** Look up a layer's result in an iteration record. */
export function layerResult(record: IterationRecord, layer: LayerId): LayerResult | undefined {
	return record.layer_results.find((r) => r.layer_id === layer)
}
