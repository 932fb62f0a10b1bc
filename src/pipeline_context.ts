/**
 * Pipeline Context
 *
 * Created once per process and passed to every tool call. Collaborator
 * clients are built on first use and shared afterwards; nothing here is
 * mutated per request.
 */

import type { SQLJudgeConfig } from "./config/loadConfig.js"
import { PgDataSource, type DataSource } from "./data_source.js"
import { ExplainPrechecker, SchemaPrechecker, type ExecutionPrechecker } from "./execution_precheck.js"
import { JudgeLoop } from "./judge_loop.js"
import { ModelClient, type EmbeddingModel, type LanguageModel } from "./llm_client.js"
import type { Logger } from "./logger.js"
import { QuestionRefiner } from "./question_refiner.js"
import { ResultAnalyzer } from "./result_analyzer.js"
import { ModelRoundTripExplainer } from "./round_trip.js"
import { SchemaIntrospector } from "./schema_introspector.js"
import { ModelSemanticJudge } from "./semantic_judge.js"
import { EmbeddingSimilarityScorer, LexicalEmbedder } from "./similarity_scorer.js"
import { ModelSqlGenerator } from "./sql_generator.js"

/**
 * Pre-built collaborators; `db: null` means no database (schema-only precheck)
 */
export interface ContextOverrides {
	model?: LanguageModel
	embedder?: EmbeddingModel
	db?: DataSource | null
}

export class PipelineContext {
	private modelClient?: ModelClient
	private embeddingModel?: EmbeddingModel
	private dataSource?: DataSource | null

	constructor(
		readonly config: SQLJudgeConfig,
		readonly logger: Logger,
		private overrides: ContextOverrides = {},
	) {
		if (overrides.embedder) this.embeddingModel = overrides.embedder
		if (overrides.db !== undefined) this.dataSource = overrides.db
	}

	get model(): LanguageModel {
		return this.overrides.model ?? this.client()
	}

	get embedder(): EmbeddingModel {
		if (!this.embeddingModel) {
			this.embeddingModel = this.config.model.embedding ? this.client() : new LexicalEmbedder()
		}
		return this.embeddingModel
	}

	/** Database handle; null when running without one. */
	get db(): DataSource | null {
		if (this.dataSource === undefined) {
			this.dataSource = PgDataSource.fromConfig(this.config.database, this.logger)
		}
		return this.dataSource
	}

	introspector(): SchemaIntrospector | null {
		const db = this.db
		if (!db) return null
		return new SchemaIntrospector(db, this.logger, {
			sampleValueLimit: this.config.judge.sample_value_limit,
			timeoutMs: this.config.database.statement_timeout_ms,
		})
	}

	prechecker(): ExecutionPrechecker {
		const db = this.db
		if (!db || this.config.judge.precheck_mode === "schema") return new SchemaPrechecker()
		return new ExplainPrechecker(db, this.logger, this.config.judge.explain_timeout_ms)
	}

	judgeLoop(): JudgeLoop {
		const { judge } = this.config
		return new JudgeLoop(
			{
				generator: new ModelSqlGenerator(this.model, this.logger),
				semantic: new ModelSemanticJudge(this.model, this.logger),
				explainer: new ModelRoundTripExplainer(this.model),
				similarity: new EmbeddingSimilarityScorer(this.embedder, judge.similarity_threshold),
				precheck: this.prechecker(),
			},
			this.logger,
			{ embeddingBlocking: judge.embedding_blocking, parallelLayers: judge.parallel_layers },
		)
	}

	refiner(): QuestionRefiner {
		return new QuestionRefiner(this.model, this.logger)
	}

	analyzer(): ResultAnalyzer {
		return new ResultAnalyzer(this.model, this.logger)
	}

	async close(): Promise<void> {
		if (this.dataSource) await this.dataSource.close()
	}

	private client(): ModelClient {
		if (!this.modelClient) {
			this.modelClient = new ModelClient(this.config.model, this.logger)
		}
		return this.modelClient
	}
}

export function createPipelineContext(config: SQLJudgeConfig, logger: Logger, overrides: ContextOverrides = {}): PipelineContext {
	return new PipelineContext(config, logger, overrides)
}
