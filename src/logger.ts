/**
 * Logger passed into components.
 *
 * Writes to stderr: stdout is reserved for the MCP protocol.
 */

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR"

export interface Logger {
	debug(message: string, data?: Record<string, unknown>): void
	info(message: string, data?: Record<string, unknown>): void
	warn(message: string, data?: Record<string, unknown>): void
	error(message: string, data?: Record<string, unknown>): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	DEBUG: 10,
	INFO: 20,
	WARN: 30,
	ERROR: 40,
}

export function parseLogLevel(value: string | undefined): LogLevel {
	const upper = (value ?? "").toUpperCase()
	if (upper === "DEBUG" || upper === "INFO" || upper === "WARN" || upper === "ERROR") return upper
	if (upper === "WARNING") return "WARN"
	return "INFO"
}

export function formatLogLine(level: LogLevel, message: string, data?: Record<string, unknown>): string {
	const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : ""
	return `[${level}] ${message}${suffix}`
}

export function createStderrLogger(level: LogLevel = "INFO"): Logger {
	const threshold = LEVEL_ORDER[level]
	const write = (lineLevel: LogLevel) => (message: string, data?: Record<string, unknown>) => {
		if (LEVEL_ORDER[lineLevel] < threshold) return
		console.error(formatLogLine(lineLevel, message, data))
	}
	return {
		debug: write("DEBUG"),
		info: write("INFO"),
		warn: write("WARN"),
		error: write("ERROR"),
	}
}

export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
