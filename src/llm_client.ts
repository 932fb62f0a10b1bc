/**
 * Language Model HTTP Client
 *
 * Talks to an OpenAI-compatible server (vLLM, SGLang, Ollama /v1).
 *
 * Responsibilities:
 * - Chat completions with a model chosen per role
 * - Batch embeddings
 * - Request-scoped timeouts and mapping transport failures to CollaboratorError
 */

import { z } from "zod"
import { CollaboratorError } from "./config.js"
import type { ModelRole, SQLJudgeConfig } from "./config/loadConfig.js"
import type { Logger } from "./logger.js"

export type ModelConfig = SQLJudgeConfig["model"]

export interface PromptMessage {
	role: "system" | "user" | "assistant"
	content: string
}

/**
 * Text completion capability used by every model-backed component
 */
export interface LanguageModel {
	complete(messages: PromptMessage[], role: ModelRole): Promise<string>
}

/**
 * Embedding capability used by the similarity layer
 */
export interface EmbeddingModel {
	embed(texts: string[]): Promise<number[][]>
}

const chatResponseSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({
					content: z.string().nullable().optional(),
				}),
			}),
		)
		.min(1),
})

const embeddingResponseSchema = z.object({
	data: z.array(
		z.object({
			embedding: z.array(z.number()),
			index: z.number().int().optional(),
		}),
	),
})

/** Remove a reasoning block some models emit ahead of the answer. */
export function stripThinking(text: string): string {
	return text.replace(/<think>[\s\S]*?<\/think>/g, "").trim()
}

export class ModelClient implements LanguageModel, EmbeddingModel {
	private baseUrl: string

	constructor(
		private config: ModelConfig,
		private logger: Logger,
	) {
		this.baseUrl = config.base_url.replace(/\/+$/, "")
	}

	/** Model name for a role, falling back to the default LLM. */
	modelFor(role: ModelRole): string {
		return this.config.roles[role] || this.config.llm
	}

	/**
	 * Chat completion; returns the assistant text with any reasoning block removed
	 */
	async complete(messages: PromptMessage[], role: ModelRole): Promise<string> {
		const model = this.modelFor(role)
		const startTime = Date.now()

		const body = await this.postJSON("/chat/completions", {
			model,
			messages,
			temperature: this.config.temperature,
			top_p: this.config.top_p,
			max_tokens: this.config.max_tokens,
			stream: false,
			chat_template_kwargs: { enable_thinking: this.config.enable_thinking },
		})

		const parsed = chatResponseSchema.safeParse(body)
		if (!parsed.success) {
			throw new CollaboratorError("unavailable", "Model server returned a malformed chat completion", {
				model,
				issues: parsed.error.issues.map((i) => i.message),
			})
		}

		const content = parsed.data.choices[0].message.content ?? ""
		this.logger.debug("Model completion", { role, model, latency_ms: Date.now() - startTime, chars: content.length })
		return stripThinking(content)
	}

	/**
	 * Get embeddings for multiple texts (batch), in input order
	 */
	async embed(texts: string[]): Promise<number[][]> {
		if (!this.config.embedding) {
			throw new CollaboratorError("rejected", "No embedding model configured")
		}
		if (texts.length === 0) return []

		const body = await this.postJSON("/embeddings", { model: this.config.embedding, input: texts })
		const parsed = embeddingResponseSchema.safeParse(body)
		if (!parsed.success || parsed.data.data.length !== texts.length) {
			throw new CollaboratorError("unavailable", "Model server returned a malformed embedding response", {
				model: this.config.embedding,
				expected: texts.length,
			})
		}

		const rows = parsed.data.data.map((row, position) => ({ order: row.index ?? position, embedding: row.embedding }))
		rows.sort((a, b) => a.order - b.order)

		const dimension = rows[0].embedding.length
		if (rows.some((row) => row.embedding.length !== dimension)) {
			throw new CollaboratorError("unavailable", "Embedding dimensions differ within one response", {
				model: this.config.embedding,
				dimensions: rows.map((row) => row.embedding.length),
			})
		}
		return rows.map((row) => row.embedding)
	}

	private async postJSON(endpoint: string, payload: Record<string, unknown>): Promise<unknown> {
		const url = `${this.baseUrl}${endpoint}`
		const timeout = this.config.timeout_ms

		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), timeout)

		try {
			const headers: Record<string, string> = {
				"Content-Type": "application/json",
				Accept: "application/json",
			}
			if (this.config.api_key) headers.Authorization = `Bearer ${this.config.api_key}`

			const response = await fetch(url, {
				method: "POST",
				headers,
				body: JSON.stringify(payload),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new CollaboratorError(
					response.status >= 500 ? "unavailable" : "rejected",
					`Model server returned error: ${response.status} ${errorText}`,
					{ statusCode: response.status, url },
				)
			}

			const data: unknown = await response.json()
			return data
		} catch (error) {
			// Handle timeout
			if (error instanceof Error && error.name === "AbortError") {
				throw new CollaboratorError("timeout", `Model request timed out after ${timeout}ms`, { timeout, url })
			}

			// Re-throw CollaboratorError as-is
			if (error instanceof CollaboratorError) {
				throw error
			}

			// Network errors (fetch rejects with TypeError) and bad JSON bodies
			const message = error instanceof Error ? error.message : String(error)
			throw new CollaboratorError("unavailable", `Cannot reach model server at ${this.baseUrl}: ${message}`, {
				url,
				originalError: message,
			})
		} finally {
			clearTimeout(timeoutId)
		}
	}
}
