/**
 * Unified config loader for the SQL judge server.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged document is validated by a zod schema that also supplies every
 * default, so callers always see a fully populated config.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"

// ── Schema ───────────────────────────────────────────────────────────

const databaseSchema = z.object({
	host: z.string().default("localhost"),
	port: z.number().int().positive().default(5432),
	name: z.string().default("postgres"),
	user: z.string().default("postgres"),
	password: z.string().default(""),
	max_connections: z.number().int().positive().default(5),
	connect_timeout_ms: z.number().int().positive().default(10000),
	statement_timeout_ms: z.number().int().positive().default(30000),
})

const modelSchema = z.object({
	base_url: z.string().default("http://localhost:8000/v1"),
	api_key: z.string().default("EMPTY"),
	llm: z.string().default("qwen3-32b"),
	roles: z
		.object({
			generator: z.string().default(""),
			judge: z.string().default(""),
			explainer: z.string().default(""),
			refiner: z.string().default(""),
			analyst: z.string().default(""),
		})
		.default({}),
	embedding: z.string().default(""),
	timeout_ms: z.number().int().positive().default(60000),
	temperature: z.number().min(0).max(2).default(0.7),
	top_p: z.number().min(0).max(1).default(0.8),
	max_tokens: z.number().int().positive().default(1024),
	enable_thinking: z.boolean().default(false),
})

const judgeSchema = z.object({
	max_iterations: z.number().int().min(1).default(3),
	similarity_threshold: z.number().min(0).max(1).default(0.75),
	embedding_blocking: z.boolean().default(false),
	parallel_layers: z.boolean().default(false),
	refine_question: z.boolean().default(true),
	sample_value_limit: z.number().int().min(1).default(10),
	precheck_mode: z.enum(["explain", "schema"]).default("explain"),
	explain_timeout_ms: z.number().int().positive().default(2000),
})

export const configSchema = z.object({
	database: databaseSchema.default({}),
	model: modelSchema.default({}),
	judge: judgeSchema.default({}),
	execution: z
		.object({
			preview_rows: z.number().int().positive().default(100),
			max_rows: z.number().int().positive().default(1000),
		})
		.default({}),
	logging: z
		.object({
			level: z.enum(["debug", "info", "warn", "error"]).default("info"),
		})
		.default({}),
})

export type SQLJudgeConfig = z.infer<typeof configSchema>
export type ModelRole = keyof SQLJudgeConfig["model"]["roles"]

// ── YAML Loading ─────────────────────────────────────────────────────

type PlainObject = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainObject {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): PlainObject {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed: unknown = yaml.load(raw)
	return isPlainObject(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
export function deepMerge(a: PlainObject, b: PlainObject): PlainObject {
	const result: PlainObject = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isPlainObject(left) && isPlainObject(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v.toLowerCase() === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(cfg: PlainObject, name: string): PlainObject {
	const existing = cfg[name]
	if (isPlainObject(existing)) return existing
	const created: PlainObject = {}
	cfg[name] = created
	return created
}

function put(target: PlainObject, key: string, value: unknown): void {
	if (value !== undefined) target[key] = value
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: PlainObject): void {
	const db = section(cfg, "database")
	put(db, "host", env("DB_HOST"))
	put(db, "port", envInt("DB_PORT"))
	put(db, "name", env("DB_NAME"))
	put(db, "user", env("DB_USER"))
	put(db, "password", env("DB_PASSWORD"))
	put(db, "connect_timeout_ms", envInt("DB_CONNECT_TIMEOUT_MS"))

	const m = section(cfg, "model")
	put(m, "base_url", env("MODEL_SERVER"))
	put(m, "api_key", env("API_KEY"))
	put(m, "llm", env("MODEL_NAME"))
	put(m, "embedding", env("EMBEDDING_MODEL"))
	put(m, "timeout_ms", envInt("MODEL_TIMEOUT_MS"))
	put(m, "temperature", envFloat("TEMPERATURE"))
	put(m, "top_p", envFloat("TOP_P"))
	put(m, "enable_thinking", envBool("ENABLE_THINKING"))

	const j = section(cfg, "judge")
	put(j, "max_iterations", envInt("MAX_ITERATIONS"))
	put(j, "similarity_threshold", envFloat("SIMILARITY_THRESHOLD"))
	put(j, "embedding_blocking", envBool("EMBEDDING_BLOCKING"))
	put(j, "parallel_layers", envBool("PARALLEL_LAYERS"))
	put(j, "refine_question", envBool("REFINE_QUESTION"))
	put(j, "precheck_mode", env("PRECHECK_MODE"))

	const l = section(cfg, "logging")
	put(l, "level", env("LOG_LEVEL"))
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: SQLJudgeConfig | null = null

/** Validate a raw config document, filling in defaults. */
export function parseConfig(raw: unknown): SQLJudgeConfig {
	return configSchema.parse(raw ?? {})
}

export function loadConfig(): SQLJudgeConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: PlainObject = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = parseConfig(merged)
	return _config
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
