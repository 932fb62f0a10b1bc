/**
 * Schema Types
 *
 * Defines types for:
 * - ColumnSpec (one column with sample values)
 * - SchemaDescriptor (the single table a question is answered from)
 * - Rendering the descriptor into the generator prompt
 */

// ============================================================================
// Descriptor Types
// ============================================================================

/**
 * One column of the target table
 */
export interface ColumnSpec {
	name: string
	/** PostgreSQL data type as reported by information_schema */
	type: string
	nullable: boolean
	comment: string
	/** Up to 10 distinct non-null values, most frequent first */
	sample_values: string[]
	/** True iff the column has at most 10 distinct non-null values */
	constrained: boolean
}

/**
 * The table a question is answered from.
 *
 * `database` is the PostgreSQL schema (namespace) holding the table.
 */
export interface SchemaDescriptor {
	database: string
	table: string
	columns: ColumnSpec[]
}

// ============================================================================
// Lookups
// ============================================================================

/** Case-insensitive column lookup. */
export function findColumn(schema: SchemaDescriptor, name: string): ColumnSpec | undefined {
	const lower = name.toLowerCase()
	return schema.columns.find((c) => c.name.toLowerCase() === lower)
}

/** Schema-qualified table name as it appears in SQL. */
export function qualifiedTableName(schema: SchemaDescriptor): string {
	return `${schema.database}.${schema.table}`
}

// ============================================================================
// Prompt Rendering
// ============================================================================

/**
 * Column metadata as JSON for the generator prompt (no sample values).
 */
export function renderColumnsJson(schema: SchemaDescriptor): string {
	const columns = schema.columns.map((c) => ({
		name: c.name,
		type: c.type,
		nullable: c.nullable,
		comment: c.comment,
	}))
	return JSON.stringify(columns, null, 2)
}

/**
 * Sample value block for the generator prompt.
 *
 * Constrained columns list their full value set; the others list examples.
 * Columns with no sample values are omitted.
 */
export function renderSampleValues(schema: SchemaDescriptor): string {
	const lines: string[] = []
	for (const c of schema.columns) {
		if (c.sample_values.length === 0) continue
		const values = c.sample_values.map((v) => JSON.stringify(v)).join(", ")
		const label = c.constrained ? "allowed values (pick one)" : "example values"
		lines.push(`- ${c.name} ${label}: ${values}`)
	}
	return lines.join("\n")
}
