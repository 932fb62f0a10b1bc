/**
 * Result Normalizer
 *
 * Converts driver rows into JSON-safe tagged values so clients never depend
 * on how the driver coerced numeric and temporal types.
 */

import type { FieldInfo, Row } from "./data_source.js"

export type TaggedValue =
	| { kind: "number"; value: number }
	| { kind: "string"; value: string }
	| { kind: "date"; value: string }
	| { kind: "boolean"; value: boolean }
	| { kind: "null"; value: null }
	| { kind: "json"; value: unknown }

export interface TaggedTable {
	columns: string[]
	rows: TaggedValue[][]
}

// ============================================================================
// Type OIDs
// ============================================================================

/** int8, numeric: delivered as text by the drivers */
const TEXT_NUMERIC_OIDS = new Set([20, 1700])

/** date, time, timestamp, timestamptz, timetz */
export const TEMPORAL_OIDS = new Set([1082, 1083, 1114, 1184, 1266])

function numberOrString(text: string): TaggedValue {
	const n = Number(text)
	if (text.trim() === "" || !Number.isFinite(n)) return { kind: "string", value: text }
	if (Number.isInteger(n) && !Number.isSafeInteger(n)) return { kind: "string", value: text }
	return { kind: "number", value: n }
}

// ============================================================================
// Tagging
// ============================================================================

export function tagValue(value: unknown, dataTypeID?: number): TaggedValue {
	if (value === null || value === undefined) return { kind: "null", value: null }

	if (typeof value === "number") {
		return Number.isFinite(value) ? { kind: "number", value } : { kind: "string", value: String(value) }
	}
	if (typeof value === "bigint") {
		return Number.isSafeInteger(Number(value)) ? { kind: "number", value: Number(value) } : { kind: "string", value: value.toString() }
	}
	if (typeof value === "boolean") return { kind: "boolean", value }

	if (typeof value === "string") {
		if (dataTypeID !== undefined && TEXT_NUMERIC_OIDS.has(dataTypeID)) return numberOrString(value)
		if (dataTypeID !== undefined && TEMPORAL_OIDS.has(dataTypeID)) return { kind: "date", value }
		return { kind: "string", value }
	}

	if (value instanceof Date) {
		return Number.isNaN(value.getTime()) ? { kind: "string", value: String(value) } : { kind: "date", value: value.toISOString() }
	}
	if (value instanceof Uint8Array) {
		return { kind: "string", value: Buffer.from(value).toString("base64") }
	}

	return { kind: "json", value }
}

/**
 * Tag every cell. Column order follows the driver's field list.
 */
export function normalizeRows(rows: Row[], fields: FieldInfo[]): TaggedTable {
	const columns = fields.length > 0 ? fields.map((f) => f.name) : Object.keys(rows[0] ?? {})
	const typeOf = new Map(fields.map((f) => [f.name, f.dataTypeID]))
	return {
		columns,
		rows: rows.map((row) => columns.map((name) => tagValue(row[name], typeOf.get(name)))),
	}
}

/** First `limit` rows of a table. */
export function previewTable(table: TaggedTable, limit: number): TaggedTable {
	return { columns: table.columns, rows: table.rows.slice(0, limit) }
}

/** Plain value of a tagged cell, for rendering. */
export function cellText(cell: TaggedValue): string {
	switch (cell.kind) {
		case "null":
			return ""
		case "json":
			return JSON.stringify(cell.value)
		default:
			return String(cell.value)
	}
}
