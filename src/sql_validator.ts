/**
 * SQL Validator (syntax layer)
 *
 * Structural checks on a candidate, on top of the state-machine tokenizer:
 * - Single read-only statement (SELECT, or WITH ... SELECT)
 * - Dangerous keywords and functions
 * - Balanced parentheses and closed quotes
 * - Table allowlist (the one table of the SchemaDescriptor)
 * - Column resolution against the descriptor (unresolved names are warnings)
 *
 * Pure and deterministic: the same SQL and schema always give the same result.
 */

import type { Candidate, LayerResult } from "./judge_types.js"
import { findColumn, qualifiedTableName, type SchemaDescriptor } from "./schema_types.js"
import { isReservedWord, lexSQL, tokenizeSQL, TokenType, type Lexeme } from "./sql_tokenizer.js"

export interface ValidationIssue {
	code: IssueCode
	severity: "error" | "warning"
	message: string
	suggestion?: string
}

export type IssueCode =
	// Structure issues
	| "NO_SELECT"
	| "MULTIPLE_STATEMENTS"
	// Safety issues
	| "DANGEROUS_KEYWORD"
	| "DANGEROUS_FUNCTION"
	// Syntax issues
	| "UNBALANCED_PARENS"
	| "QUOTE_MISMATCH"
	// Schema issues
	| "UNKNOWN_TABLE"
	| "UNRESOLVED_IDENTIFIER"

export interface SyntaxAnalysis {
	issues: ValidationIssue[]
	/** Referenced schema columns, in schema order */
	columnsUsed: string[]
}

/**
 * Keywords that should never appear in queries
 * (checked outside strings/comments only)
 */
const DANGEROUS_KEYWORDS = new Set([
	// DDL
	"DROP",
	"CREATE",
	"ALTER",
	"TRUNCATE",
	"RENAME",
	// DML (write operations)
	"INSERT",
	"UPDATE",
	"DELETE",
	"MERGE",
	// SELECT ... INTO creates a table
	"INTO",
	// DCL
	"GRANT",
	"REVOKE",
	// TCL
	"BEGIN",
	"COMMIT",
	"ROLLBACK",
	"SAVEPOINT",
	// Other dangerous
	"COPY",
	"EXECUTE",
	"PREPARE",
	"CALL",
	"LOCK",
	"VACUUM",
])

/**
 * Functions that should be blocked
 * (admin functions, file I/O, system access)
 */
const DANGEROUS_FUNCTIONS = new Set([
	// File I/O
	"pg_read_file",
	"pg_read_binary_file",
	"pg_ls_dir",
	"lo_export",
	"lo_import",
	// System functions
	"pg_sleep",
	"pg_terminate_backend",
	"pg_cancel_backend",
	// External connections
	"dblink",
	"dblink_connect",
	"dblink_exec",
	// Admin functions
	"pg_reload_conf",
	"pg_rotate_logfile",
	"pg_stat_reset",
	"set_config",
])

/** Functions whose argument list uses FROM as a separator, not a clause. */
const FROM_ARGUMENT_FUNCTIONS = new Set(["EXTRACT", "SUBSTRING", "TRIM", "OVERLAY", "POSITION"])

// ============================================================================
// Lexeme helpers
// ============================================================================

function upper(lx: Lexeme | undefined): string {
	return lx && lx.kind === "word" ? lx.value.toUpperCase() : ""
}

function isPunct(lx: Lexeme | undefined, value: string): boolean {
	return lx !== undefined && lx.kind === "punct" && lx.value === value
}

/** Identifier position: quoted identifier or non-reserved word. */
function isName(lx: Lexeme | undefined): lx is Lexeme {
	if (!lx) return false
	if (lx.kind === "quoted_ident") return true
	return lx.kind === "word" && !isReservedWord(lx.value)
}

function identKey(lx: Lexeme): string {
	return lx.value.toLowerCase()
}

// ============================================================================
// Structural rules
// ============================================================================

function checkQuotes(sql: string): ValidationIssue | null {
	const open = tokenizeSQL(sql).find((t) => !t.closed)
	if (!open) return null
	const what =
		open.type === TokenType.BLOCK_COMMENT
			? "block comment"
			: open.type === TokenType.DOUBLE_QUOTE
				? "quoted identifier"
				: "string literal"
	return {
		code: "QUOTE_MISMATCH",
		severity: "error",
		message: `Unterminated ${what} at position ${open.start}`,
		suggestion: "Close every string literal and quoted identifier",
	}
}

/**
 * Semicolons outside strings/comments; one trailing semicolon is allowed.
 */
function hasMultipleStatements(lexemes: Lexeme[]): boolean {
	const semicolons = lexemes.filter((lx) => isPunct(lx, ";"))
	if (semicolons.length === 0) return false
	if (semicolons.length > 1) return true
	return lexemes.some((lx) => lx.start > semicolons[0].start)
}

function checkParens(lexemes: Lexeme[]): ValidationIssue | null {
	let depth = 0
	for (const lx of lexemes) {
		if (isPunct(lx, "(")) depth++
		if (isPunct(lx, ")")) {
			depth--
			if (depth < 0) {
				return {
					code: "UNBALANCED_PARENS",
					severity: "error",
					message: `Unexpected ')' at position ${lx.start}`,
					suggestion: "Balance every parenthesis",
				}
			}
		}
	}
	if (depth > 0) {
		return {
			code: "UNBALANCED_PARENS",
			severity: "error",
			message: `${depth} unclosed '(' in query`,
			suggestion: "Balance every parenthesis",
		}
	}
	return null
}

// ============================================================================
// Table and column resolution
// ============================================================================

interface TableRef {
	schema?: string
	name: string
	display: string
	alias?: string
}

interface ReferenceScan {
	tables: TableRef[]
	aliases: Set<string>
	cteNames: Set<string>
	consumed: Set<number>
}

/**
 * Find FROM/JOIN targets, their aliases, output aliases and CTE names.
 * Best-effort, not a full parser.
 */
function scanReferences(lexemes: Lexeme[]): ReferenceScan {
	const scan: ReferenceScan = { tables: [], aliases: new Set(), cteNames: new Set(), consumed: new Set() }
	// Word preceding each open paren (function name or clause keyword)
	const parenOwners: string[] = []

	for (let k = 0; k < lexemes.length; k++) {
		const lx = lexemes[k]
		const prev = lexemes[k - 1]
		const next = lexemes[k + 1]

		if (isPunct(lx, "(")) {
			parenOwners.push(upper(prev))
			continue
		}
		if (isPunct(lx, ")")) {
			const owner = parenOwners.pop()
			// Derived table alias without AS: FROM (SELECT ...) t
			if ((owner === "FROM" || owner === "JOIN") && isName(next)) {
				scan.aliases.add(identKey(next))
				scan.consumed.add(k + 1)
			}
			continue
		}

		const word = upper(lx)
		if (word === "AS") {
			if (isPunct(next, "(") && prev && (prev.kind === "word" || prev.kind === "quoted_ident")) {
				scan.cteNames.add(identKey(prev))
				scan.consumed.add(k - 1)
			} else if (isPunct(next, "(") && isPunct(prev, ")")) {
				// CTE with a column list: name (col, ...) AS (...)
				const open = findOpeningParen(lexemes, k - 1)
				const name = lexemes[open - 1]
				if (open > 0 && isName(name)) {
					scan.cteNames.add(identKey(name))
					scan.consumed.add(open - 1)
					for (let c = open + 1; c < k - 1; c++) {
						if (!isName(lexemes[c])) continue
						scan.aliases.add(identKey(lexemes[c]))
						scan.consumed.add(c)
					}
				}
			} else if (next && (next.kind === "word" || next.kind === "quoted_ident")) {
				scan.aliases.add(identKey(next))
				scan.consumed.add(k + 1)
			}
			continue
		}

		if (word !== "FROM" && word !== "JOIN") continue
		if (word === "FROM") {
			if (FROM_ARGUMENT_FUNCTIONS.has(parenOwners[parenOwners.length - 1] ?? "")) continue
			// IS [NOT] DISTINCT FROM
			if (upper(prev) === "DISTINCT" && ["IS", "NOT"].includes(upper(lexemes[k - 2]))) continue
		}

		let j = k + 1
		while (isName(lexemes[j])) {
			const first = lexemes[j]
			let ref: TableRef
			if (isPunct(lexemes[j + 1], ".") && isName(lexemes[j + 2])) {
				const second = lexemes[j + 2]
				ref = { schema: identKey(first), name: identKey(second), display: `${first.value}.${second.value}` }
				scan.consumed.add(j).add(j + 2)
				j += 3
			} else {
				ref = { name: identKey(first), display: first.value }
				scan.consumed.add(j)
				j += 1
			}
			// Table function such as generate_series(...)
			if (isPunct(lexemes[j], "(")) break
			scan.tables.push(ref)

			if (upper(lexemes[j]) === "AS" && isName(lexemes[j + 1])) j++
			const alias = lexemes[j]
			if (isName(alias)) {
				ref.alias = identKey(alias)
				scan.aliases.add(ref.alias)
				scan.consumed.add(j)
				j++
			}
			if (!isPunct(lexemes[j], ",")) break
			j++
		}
	}

	return scan
}

function findOpeningParen(lexemes: Lexeme[], close: number): number {
	let depth = 0
	for (let k = close; k >= 0; k--) {
		if (isPunct(lexemes[k], ")")) depth++
		else if (isPunct(lexemes[k], "(") && --depth === 0) return k
	}
	return -1
}

function checkTables(scan: ReferenceScan, schema: SchemaDescriptor): ValidationIssue[] {
	const table = schema.table.toLowerCase()
	const database = schema.database.toLowerCase()
	const unknown = scan.tables.filter((ref) => {
		if (ref.schema === undefined) return ref.name !== table && !scan.cteNames.has(ref.name)
		return ref.schema !== database || ref.name !== table
	})
	const names = Array.from(new Set(unknown.map((ref) => ref.display)))
	return names.map((name) => ({
		code: "UNKNOWN_TABLE" as const,
		severity: "error" as const,
		message: `Unknown table: ${name}`,
		suggestion: `Use only table ${qualifiedTableName(schema)}`,
	}))
}

function resolveColumns(
	lexemes: Lexeme[],
	scan: ReferenceScan,
	schema: SchemaDescriptor,
): { used: Set<string>; unresolved: string[]; unqualified: string[] } {
	const used = new Set<string>()
	const unresolved: string[] = []
	const unqualified: string[] = []
	const known = new Set([...scan.aliases, ...scan.cteNames, schema.table.toLowerCase(), schema.database.toLowerCase()])

	for (let k = 0; k < lexemes.length; k++) {
		const lx = lexemes[k]
		if (scan.consumed.has(k) || (lx.kind !== "word" && lx.kind !== "quoted_ident")) continue
		const prev = lexemes[k - 1]
		const next = lexemes[k + 1]
		// Function call, type cast target, or qualifier of a dotted name
		if (isPunct(next, "(") || isPunct(prev, "::") || isPunct(next, ".")) continue

		// Columns may share a name with a keyword (year, date, text)
		const column = findColumn(schema, lx.value)
		if (column) {
			used.add(column.name)
			continue
		}
		if (!isName(lx)) continue
		if (!isPunct(prev, ".") && known.has(identKey(lx))) continue
		if (!unresolved.includes(lx.value)) unresolved.push(lx.value)
		if (!isPunct(prev, ".") && !unqualified.includes(lx.value)) unqualified.push(lx.value)
	}

	return { used, unresolved, unqualified }
}

// ============================================================================
// Entry points
// ============================================================================

/**
 * Unqualified identifiers that are neither a column of the schema table nor
 * an alias or CTE name declared in the query.
 */
export function findUnresolvedColumns(sql: string, schema: SchemaDescriptor): string[] {
	const lexemes = lexSQL(sql)
	return resolveColumns(lexemes, scanReferences(lexemes), schema).unqualified
}

/**
 * Qualified references `t.col` whose qualifier names the schema table (or one
 * of its aliases) but whose column does not exist.
 */
export function findUnresolvedQualifiedColumns(sql: string, schema: SchemaDescriptor): string[] {
	const lexemes = lexSQL(sql)
	const scan = scanReferences(lexemes)
	const table = schema.table.toLowerCase()
	const qualifiers = new Set([table])
	for (const ref of scan.tables) {
		if (ref.name === table && ref.alias) qualifiers.add(ref.alias)
	}

	const unresolved: string[] = []
	for (let k = 1; k < lexemes.length - 1; k++) {
		if (!isPunct(lexemes[k], ".")) continue
		const qualifier = lexemes[k - 1]
		const column = lexemes[k + 1]
		if (!isName(qualifier) || !qualifiers.has(identKey(qualifier))) continue
		if (column.kind !== "word" && column.kind !== "quoted_ident") continue
		if (findColumn(schema, column.value)) continue
		const display = `${qualifier.value}.${column.value}`
		if (!unresolved.includes(display)) unresolved.push(display)
	}
	return unresolved
}

/**
 * Run every structural rule. Fail-fast rules stop the analysis early.
 */
export function analyzeSQL(sql: string, schema: SchemaDescriptor): SyntaxAnalysis {
	const issues: ValidationIssue[] = []
	const trimmed = sql.trim()

	// Rule 1: Strings, identifiers and comments must be closed
	const quoteIssue = checkQuotes(trimmed)
	if (quoteIssue) return { issues: [quoteIssue], columnsUsed: [] }

	// Rule 2: Must start with SELECT (or WITH ... SELECT)
	const lexemes = lexSQL(trimmed)
	const first = upper(lexemes[0])
	if (first !== "SELECT" && first !== "WITH") {
		return {
			issues: [
				{
					code: "NO_SELECT",
					severity: "error",
					message: "Query must start with SELECT",
					suggestion: "Only SELECT queries are allowed",
				},
			],
			columnsUsed: [],
		}
	}

	// Rule 3: Single statement only
	if (hasMultipleStatements(lexemes)) {
		return {
			issues: [
				{
					code: "MULTIPLE_STATEMENTS",
					severity: "error",
					message: "Multiple statements detected (separated by semicolons)",
					suggestion: "Submit only one SELECT statement",
				},
			],
			columnsUsed: [],
		}
	}

	// Rule 4: Dangerous keywords
	const keywords = Array.from(new Set(lexemes.map(upper).filter((w) => DANGEROUS_KEYWORDS.has(w))))
	if (keywords.length > 0) {
		return {
			issues: [
				{
					code: "DANGEROUS_KEYWORD",
					severity: "error",
					message: `Dangerous keywords detected: ${keywords.join(", ")}`,
					suggestion: "Only SELECT queries are allowed",
				},
			],
			columnsUsed: [],
		}
	}

	// Rule 5: Dangerous functions
	const functions = Array.from(
		new Set(
			lexemes
				.filter((lx, k) => lx.kind === "word" && isPunct(lexemes[k + 1], "(") && DANGEROUS_FUNCTIONS.has(lx.value.toLowerCase()))
				.map((lx) => lx.value.toLowerCase()),
		),
	)
	if (functions.length > 0) {
		return {
			issues: [
				{
					code: "DANGEROUS_FUNCTION",
					severity: "error",
					message: `Dangerous functions detected: ${functions.join(", ")}`,
					suggestion: "Admin functions and file I/O are not allowed",
				},
			],
			columnsUsed: [],
		}
	}

	// Rule 6: Balanced parentheses
	const parenIssue = checkParens(lexemes)
	if (parenIssue) issues.push(parenIssue)

	// Rule 7: Table allowlist
	const scan = scanReferences(lexemes)
	issues.push(...checkTables(scan, schema))

	// Rule 8: Column resolution (warnings only)
	const { used, unresolved } = resolveColumns(lexemes, scan, schema)
	for (const name of unresolved) {
		issues.push({
			code: "UNRESOLVED_IDENTIFIER",
			severity: "warning",
			message: `Identifier "${name}" is not a column of ${schema.table}`,
		})
	}

	const columnsUsed = schema.columns.filter((c) => used.has(c.name)).map((c) => c.name)
	return { issues, columnsUsed }
}

/**
 * Syntax layer: wrap the analysis as a LayerResult.
 */
export function checkSyntax(candidate: Candidate, schema: SchemaDescriptor): LayerResult {
	const { issues, columnsUsed } = analyzeSQL(candidate.sql, schema)
	const errors = issues.filter((i) => i.severity === "error")
	const warnings = issues.filter((i) => i.severity === "warning")
	const valid = errors.length === 0

	return {
		layer_id: "syntax",
		valid,
		reason: valid ? undefined : errors[0].message,
		fix_suggestion: valid ? undefined : compressIssuesForRepair(errors).join("; "),
		errors: issues.map((i) => `${i.code}: ${i.message}`),
		metrics: { error_count: errors.length, warning_count: warnings.length },
		details: { columns_used: columnsUsed },
	}
}

/**
 * Compress validator issues into short delta instructions for repair
 */
export function compressIssuesForRepair(issues: ValidationIssue[]): string[] {
	const instructions: string[] = []
	const seen = new Set<string>()

	for (const issue of issues) {
		let instruction: string

		switch (issue.code) {
			case "MULTIPLE_STATEMENTS":
				instruction = "Output one SELECT statement only, no multiple queries"
				break
			case "NO_SELECT":
				instruction = "Query must start with SELECT"
				break
			case "DANGEROUS_KEYWORD":
				instruction = "Remove write operations (INSERT/UPDATE/DELETE/DROP/INTO/etc)"
				break
			case "DANGEROUS_FUNCTION":
				instruction = "Remove admin functions and file I/O (pg_read_file, pg_sleep, etc)"
				break
			case "UNKNOWN_TABLE":
				instruction = issue.suggestion ?? "Use only the given table"
				break
			default:
				instruction = issue.suggestion ?? issue.message
		}

		// Avoid duplicates
		if (!seen.has(instruction)) {
			seen.add(instruction)
			instructions.push(instruction)
		}
	}

	return instructions
}
