/**
 * Data Source
 *
 * Every statement runs inside its own short transaction so that
 * `statement_timeout` and `search_path` apply to that statement only
 * (`set_config(..., true)` is transaction-local).
 */

import pg from "pg"
import { CollaboratorError, errorMessage } from "./config.js"
import type { SQLJudgeConfig } from "./config/loadConfig.js"
import type { Logger } from "./logger.js"

export type Row = Record<string, unknown>

/** Parsers that keep date and timestamp values as text */
export const RAW_TEXT_PARSERS = {
	1082: (value: string) => value,
	1114: (value: string) => value,
}

export interface FieldInfo {
	name: string
	/** PostgreSQL type OID */
	dataTypeID: number
}

export interface QueryOutput<T extends Row> {
	rows: T[]
	fields: FieldInfo[]
}

export interface QueryOptions {
	timeoutMs?: number
	/** Schema put first on the search path */
	searchPath?: string
	readOnly?: boolean
}

export interface DataSource {
	query<T extends Row>(sql: string, params?: unknown[], options?: QueryOptions): Promise<QueryOutput<T>>
	close(): Promise<void>
}

/**
 * Minimal session both drivers expose inside a transaction
 */
export interface SqlSession {
	query<T extends Row>(sql: string, params?: unknown[]): Promise<QueryOutput<T>>
}

/**
 * Apply per-statement settings, then run the statement.
 * Must be called inside an open transaction.
 */
export async function runScoped<T extends Row>(
	session: SqlSession,
	sql: string,
	params: unknown[],
	options: QueryOptions,
): Promise<QueryOutput<T>> {
	if (options.readOnly) {
		await session.query("SET TRANSACTION READ ONLY")
	}
	if (options.timeoutMs !== undefined) {
		await session.query("SELECT set_config('statement_timeout', $1, true)", [String(options.timeoutMs)])
	}
	if (options.searchPath) {
		await session.query("SELECT set_config('search_path', $1, true)", [quoteIdent(options.searchPath)])
	}
	return session.query<T>(sql, params)
}

/** Quote an identifier for use in SQL text. */
export function quoteIdent(name: string): string {
	return `"${name.replace(/"/g, '""')}"`
}

// ============================================================================
// pg Pool adapter
// ============================================================================

/** date and timestamp without time zone stay text: a JS Date would add the process time zone */
const RAW_TEXT_OIDS = Object.keys(RAW_TEXT_PARSERS).map(Number)

export class PgDataSource implements DataSource {
	constructor(
		private pool: pg.Pool,
		private logger: Logger,
		private connectTimeoutMs: number,
	) {}

	static fromConfig(config: SQLJudgeConfig["database"], logger: Logger): PgDataSource {
		for (const oid of RAW_TEXT_OIDS) {
			pg.types.setTypeParser(oid, (value: string) => value)
		}
		const pool = new pg.Pool({
			host: config.host,
			port: config.port,
			database: config.name,
			user: config.user,
			password: config.password,
			max: config.max_connections,
			connectionTimeoutMillis: config.connect_timeout_ms,
		})
		pool.on("error", (err) => {
			logger.error("Idle database client error", { error: err.message })
		})
		return new PgDataSource(pool, logger, config.connect_timeout_ms)
	}

	async query<T extends Row>(sql: string, params: unknown[] = [], options: QueryOptions = {}): Promise<QueryOutput<T>> {
		let client: pg.PoolClient
		try {
			client = await this.pool.connect()
		} catch (err) {
			if (/timeout/i.test(errorMessage(err))) {
				throw new CollaboratorError("timeout", `Database connection timed out after ${this.connectTimeoutMs}ms`)
			}
			throw new CollaboratorError("unavailable", `Database connection failed: ${errorMessage(err)}`)
		}

		const session: SqlSession = {
			query: async <R extends Row>(text: string, values: unknown[] = []) => {
				const result = await client.query<R>(text, values)
				return { rows: result.rows, fields: result.fields }
			},
		}

		try {
			await client.query("BEGIN")
			const output = await runScoped<T>(session, sql, params, options)
			await client.query("COMMIT")
			client.release()
			return output
		} catch (err) {
			await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
				this.logger.warn("Rollback failed", { error: errorMessage(rollbackErr) })
			})
			// Destroy the client instead of returning it to the pool
			client.release(err instanceof Error ? err : true)
			throw err
		}
	}

	async close(): Promise<void> {
		await this.pool.end()
	}
}
