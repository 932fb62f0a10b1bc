/**
 * SQL Tokenizer with State Machine Parsing
 *
 * Splits SQL into segments with proper handling of:
 * - Strings (single quotes with '' escaping)
 * - Quoted identifiers ("..." with "" escaping)
 * - Dollar-quoted strings ($tag$...$tag$)
 * - Comments (line comments and block comments)
 *
 * Code segments are further split into lexemes (words, numbers, punctuation)
 * for the structural checks in sql_validator.ts.
 */

/**
 * Segment types for state machine
 */
export enum TokenType {
	NORMAL = "NORMAL",
	SINGLE_QUOTE = "SINGLE_QUOTE",
	DOUBLE_QUOTE = "DOUBLE_QUOTE",
	DOLLAR_QUOTE = "DOLLAR_QUOTE",
	LINE_COMMENT = "LINE_COMMENT",
	BLOCK_COMMENT = "BLOCK_COMMENT",
}

/**
 * Segment extracted from SQL
 */
export interface Token {
	type: TokenType
	value: string
	start: number
	end: number
	/** False when a quote or block comment runs to end of input */
	closed: boolean
}

const RESERVED_WORDS = new Set([
	"ALL", "AND", "ANY", "ARRAY", "AS", "ASC", "ASYMMETRIC", "AT",
	"BETWEEN", "BIGINT", "BOOLEAN", "BOTH", "BY",
	"CASE", "CAST", "CHAR", "CHARACTER", "COLLATE", "CROSS", "CURRENT_DATE", "CURRENT_TIME", "CURRENT_TIMESTAMP", "CURRENT_USER",
	"DATE", "DAY", "DEC", "DECIMAL", "DESC", "DISTINCT", "DOUBLE", "DOW", "DOY",
	"ELSE", "END", "EPOCH", "ESCAPE", "EXCEPT", "EXISTS",
	"FALSE", "FETCH", "FILTER", "FIRST", "FLOAT", "FOLLOWING", "FOR", "FROM", "FULL",
	"GROUP", "GROUPING",
	"HAVING", "HOUR",
	"ILIKE", "IN", "INNER", "INT", "INTEGER", "INTERSECT", "INTERVAL", "INTO", "IS", "ISNULL",
	"JOIN",
	"LAST", "LATERAL", "LEADING", "LEFT", "LIKE", "LIMIT", "LOCALTIME", "LOCALTIMESTAMP",
	"MINUTE", "MONTH",
	"NATURAL", "NEXT", "NOT", "NOTNULL", "NULL", "NULLS", "NUMERIC",
	"OF", "OFFSET", "ON", "ONLY", "OR", "ORDER", "OUTER", "OVER",
	"PARTITION", "PRECEDING", "PRECISION",
	"QUARTER",
	"RANGE", "REAL", "RECURSIVE", "RIGHT", "ROW", "ROWS",
	"SECOND", "SELECT", "SIMILAR", "SMALLINT", "SOME", "SYMMETRIC",
	"TEXT", "THEN", "TIES", "TIME", "TIMESTAMP", "TIMESTAMPTZ", "TO", "TRAILING", "TRUE",
	"UNBOUNDED", "UNION", "UNKNOWN", "USING",
	"VALUES", "VARCHAR", "VARYING",
	"WEEK", "WHEN", "WHERE", "WINDOW", "WITH", "WITHIN", "WITHOUT",
	"YEAR",
	"ZONE",
])

/** True for words that are SQL syntax rather than identifiers. */
export function isReservedWord(word: string): boolean {
	return RESERVED_WORDS.has(word.toUpperCase())
}

/**
 * Scan a quoted run starting at `start` (which holds the quote char).
 * A doubled quote is an escaped quote.
 */
function scanQuoted(sql: string, start: number, quote: string): { end: number; closed: boolean } {
	let i = start + 1
	while (i < sql.length) {
		if (sql[i] === quote) {
			if (sql[i + 1] === quote) {
				i += 2
				continue
			}
			return { end: i + 1, closed: true }
		}
		i++
	}
	return { end: i, closed: false }
}

/**
 * Tokenize SQL with proper handling of strings, comments, and dollar quoting
 */
export function tokenizeSQL(sql: string): Token[] {
	const tokens: Token[] = []
	let i = 0
	const len = sql.length

	while (i < len) {
		const char = sql[i]
		const next = i + 1 < len ? sql[i + 1] : ""
		const start = i

		// Line comment: -- ... (newline stays with the following code)
		if (char === "-" && next === "-") {
			i += 2
			while (i < len && sql[i] !== "\n") i++
			tokens.push({ type: TokenType.LINE_COMMENT, value: sql.substring(start, i), start, end: i, closed: true })
			continue
		}

		// Block comment: /* ... */
		if (char === "/" && next === "*") {
			i += 2
			let closed = false
			while (i < len - 1) {
				if (sql[i] === "*" && sql[i + 1] === "/") {
					i += 2
					closed = true
					break
				}
				i++
			}
			if (!closed) i = len
			tokens.push({ type: TokenType.BLOCK_COMMENT, value: sql.substring(start, i), start, end: i, closed })
			continue
		}

		// Single-quoted string or double-quoted identifier
		if (char === "'" || char === '"') {
			const scan = scanQuoted(sql, i, char)
			i = scan.end
			tokens.push({
				type: char === "'" ? TokenType.SINGLE_QUOTE : TokenType.DOUBLE_QUOTE,
				value: sql.substring(start, i),
				start,
				end: i,
				closed: scan.closed,
			})
			continue
		}

		// Dollar-quoted string: $tag$...$tag$ or $$...$$
		if (char === "$") {
			const tagMatch = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/.exec(sql.substring(i))
			if (tagMatch) {
				const delim = tagMatch[0]
				const closeAt = sql.indexOf(delim, i + delim.length)
				const closed = closeAt >= 0
				i = closed ? closeAt + delim.length : len
				tokens.push({ type: TokenType.DOLLAR_QUOTE, value: sql.substring(start, i), start, end: i, closed })
				continue
			}
		}

		// Normal segment (accumulate until a char that may open something else)
		i++
		while (
			i < len &&
			sql[i] !== "'" &&
			sql[i] !== '"' &&
			sql[i] !== "$" &&
			sql[i] !== "/" &&
			sql[i] !== "-"
		) {
			i++
		}
		const last = tokens[tokens.length - 1]
		if (last && last.type === TokenType.NORMAL && last.end === start) {
			// Merge with preceding code so lone '-' or '/' don't split words
			last.value += sql.substring(start, i)
			last.end = i
		} else {
			tokens.push({ type: TokenType.NORMAL, value: sql.substring(start, i), start, end: i, closed: true })
		}
	}

	return tokens
}

export function isComment(token: Token): boolean {
	return token.type === TokenType.LINE_COMMENT || token.type === TokenType.BLOCK_COMMENT
}

// ============================================================================
// Lexemes
// ============================================================================

export type LexemeKind = "word" | "quoted_ident" | "literal" | "number" | "punct"

export interface Lexeme {
	kind: LexemeKind
	/** Words keep their spelling; quoted identifiers are unquoted */
	value: string
	start: number
}

const LEXEME_PATTERN = /([A-Za-z_][A-Za-z0-9_]*)|(\d+(?:\.\d*)?(?:[eE][+-]?\d+)?)|(::|<>|<=|>=|!=|\|\||\S)/g

/**
 * Split tokens into lexemes, dropping comments and whitespace.
 */
export function lexSQL(sql: string): Lexeme[] {
	const lexemes: Lexeme[] = []
	for (const token of tokenizeSQL(sql)) {
		switch (token.type) {
			case TokenType.LINE_COMMENT:
			case TokenType.BLOCK_COMMENT:
				break
			case TokenType.SINGLE_QUOTE:
			case TokenType.DOLLAR_QUOTE:
				lexemes.push({ kind: "literal", value: token.value, start: token.start })
				break
			case TokenType.DOUBLE_QUOTE: {
				const inner = token.closed ? token.value.slice(1, -1) : token.value.slice(1)
				lexemes.push({ kind: "quoted_ident", value: inner.replace(/""/g, '"'), start: token.start })
				break
			}
			case TokenType.NORMAL: {
				LEXEME_PATTERN.lastIndex = 0
				let match: RegExpExecArray | null
				while ((match = LEXEME_PATTERN.exec(token.value)) !== null) {
					const kind: LexemeKind = match[1] ? "word" : match[2] ? "number" : "punct"
					lexemes.push({ kind, value: match[0], start: token.start + match.index })
				}
				break
			}
		}
	}
	return lexemes
}

/**
 * Collapse whitespace runs to one space outside literals and quoted
 * identifiers. Comments are dropped.
 */
export function collapseWhitespace(sql: string): string {
	let out = ""
	const appendCode = (text: string): void => {
		let collapsed = text.replace(/\s+/g, " ")
		if (collapsed.startsWith(" ") && (out === "" || out.endsWith(" "))) {
			collapsed = collapsed.slice(1)
		}
		out += collapsed
	}
	for (const token of tokenizeSQL(sql)) {
		if (isComment(token)) {
			appendCode(" ")
		} else if (token.type === TokenType.NORMAL) {
			appendCode(token.value)
		} else {
			out += token.value
		}
	}
	return out.trim()
}
