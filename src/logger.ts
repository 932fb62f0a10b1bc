/**
 * Structured logger injected into every component.
 *
 * Writes to stderr: stdout is reserved for the MCP protocol.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogFn = (message: string, data?: Record<string, unknown>) => void

export interface Logger {
	info: LogFn
	error: LogFn
	warn: LogFn
	debug: LogFn
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

/** Format a log line as `[LEVEL] message {json}`. */
export function formatLogLine(level: LogLevel, message: string, data?: Record<string, unknown>): string {
	const prefix = `[${level.toUpperCase()}] ${message}`
	if (!data || Object.keys(data).length === 0) return prefix
	return `${prefix} ${JSON.stringify(data)}`
}

export function createStderrLogger(
	level: LogLevel = "info",
	write: (line: string) => void = (line) => process.stderr.write(line + "\n"),
): Logger {
	const threshold = LEVEL_ORDER[level]
	const emit = (lvl: LogLevel): LogFn => (message, data) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		write(formatLogLine(lvl, message, data))
	}
	return {
		info: emit("info"),
		error: emit("error"),
		warn: emit("warn"),
		debug: emit("debug"),
	}
}

/** Logger that drops everything (scripts and tests). */
export const silentLogger: Logger = {
	info: () => {},
	error: () => {},
	warn: () => {},
	debug: () => {},
}
