/**
 * Schema Introspector
 *
 * Builds the SchemaDescriptor for one table via information_schema + pg_catalog,
 * then samples the most frequent distinct values of every column.
 *
 * Also lists schemas and tables for the discovery tools.
 */

import { CollaboratorError, errorMessage, getSQLSTATE, isInfrastructureError, JudgeError } from "./config.js"
import { quoteIdent, type DataSource } from "./data_source.js"
import type { Logger } from "./logger.js"
import type { ColumnSpec, SchemaDescriptor } from "./schema_types.js"

// ============================================================================
// Types
// ============================================================================

export interface IntrospectorOptions {
	/** Distinct values kept per column; one more is fetched to decide `constrained` */
	sampleValueLimit: number
	/** statement_timeout for catalog and sampling queries */
	timeoutMs: number
}

interface ColumnRow {
	[key: string]: unknown
	column_name: string
	data_type: string
	is_nullable: boolean
	comment: string | null
}

interface SampleRow {
	[key: string]: unknown
	value: string
}

const SYSTEM_SCHEMAS = ["pg_catalog", "information_schema", "pg_toast"]

// ============================================================================
// Introspector Class
// ============================================================================

export class SchemaIntrospector {
	constructor(
		private db: DataSource,
		private logger: Logger,
		private options: IntrospectorOptions,
	) {}

	/**
	 * Describe one table with sample values.
	 *
	 * @throws JudgeError("not_found") when the table has no columns
	 */
	async describeSchema(database: string, table: string): Promise<SchemaDescriptor> {
		const startTime = Date.now()

		const columns = await this.getColumns(database, table)
		if (columns.length === 0) {
			throw new JudgeError("not_found", `Table ${database}.${table} not found or has no columns`, false, {
				database,
				table,
			})
		}

		const specs: ColumnSpec[] = []
		for (const col of columns) {
			const { values, constrained } = await this.sampleColumn(database, table, col.column_name)
			specs.push({
				name: col.column_name,
				type: col.data_type,
				nullable: col.is_nullable,
				comment: col.comment ?? "",
				sample_values: values,
				constrained,
			})
		}

		this.logger.info("Schema described", {
			database,
			table,
			columns: specs.length,
			constrained: specs.filter((c) => c.constrained).length,
			latency_ms: Date.now() - startTime,
		})

		return { database, table, columns: specs }
	}

	/** Non-system schemas, alphabetically. */
	async listDatabases(): Promise<string[]> {
		const result = await this.db.query<{ schema_name: string }>(
			`
			SELECT schema_name
			FROM information_schema.schemata
			WHERE schema_name != ALL($1)
				AND schema_name NOT LIKE 'pg\\_temp\\_%'
				AND schema_name NOT LIKE 'pg\\_toast\\_temp\\_%'
			ORDER BY schema_name
		`,
			[SYSTEM_SCHEMAS],
			{ timeoutMs: this.options.timeoutMs },
		)
		return result.rows.map((r) => r.schema_name)
	}

	/** Base tables and views of one schema, alphabetically. */
	async listTables(database: string): Promise<string[]> {
		const result = await this.db.query<{ table_name: string }>(
			`
			SELECT table_name
			FROM information_schema.tables
			WHERE table_schema = $1
				AND table_type IN ('BASE TABLE', 'VIEW')
			ORDER BY table_name
		`,
			[database],
			{ timeoutMs: this.options.timeoutMs },
		)
		return result.rows.map((r) => r.table_name)
	}

	/**
	 * Columns with comments from pg_description, in ordinal order
	 */
	private async getColumns(database: string, table: string): Promise<ColumnRow[]> {
		const query = `
			SELECT
				c.column_name,
				c.data_type,
				(c.is_nullable = 'YES') AS is_nullable,
				pg_catalog.col_description(
					(quote_ident(c.table_schema) || '.' || quote_ident(c.table_name))::regclass,
					c.ordinal_position
				) AS comment
			FROM information_schema.columns c
			WHERE c.table_schema = $1
				AND c.table_name = $2
			ORDER BY c.ordinal_position
		`
		const result = await this.db.query<ColumnRow>(query, [database, table], { timeoutMs: this.options.timeoutMs })
		return result.rows
	}

	/**
	 * Most frequent distinct non-null values, ties broken by first appearance.
	 *
	 * A sampling failure other than an infrastructure one leaves the column
	 * without samples and unconstrained.
	 */
	private async sampleColumn(
		database: string,
		table: string,
		column: string,
	): Promise<{ values: string[]; constrained: boolean }> {
		const limit = this.options.sampleValueLimit
		const col = quoteIdent(column)
		const query = `
			SELECT v AS value
			FROM (
				SELECT ${col}::text AS v, row_number() OVER () AS rn
				FROM ${quoteIdent(database)}.${quoteIdent(table)}
			) s
			WHERE v IS NOT NULL
			GROUP BY v
			ORDER BY COUNT(*) DESC, MIN(rn)
			LIMIT ${limit + 1}
		`

		try {
			const result = await this.db.query<SampleRow>(query, [], { timeoutMs: this.options.timeoutMs })
			const values = result.rows.map((r) => r.value)
			return { values: values.slice(0, limit), constrained: values.length <= limit }
		} catch (err) {
			const sqlstate = getSQLSTATE(err)
			if (err instanceof CollaboratorError || (sqlstate && isInfrastructureError(sqlstate))) {
				throw err
			}
			this.logger.warn("Sampling column values failed", {
				database,
				table,
				column,
				sqlstate,
				error: errorMessage(err),
			})
			return { values: [], constrained: false }
		}
	}
}
