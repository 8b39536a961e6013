/**
 * Structured logger passed into every component.
 *
 * Writes to stderr: stdout is reserved for the MCP stdio protocol.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export interface Logger {
	debug(message: string, data?: Record<string, unknown>): void
	info(message: string, data?: Record<string, unknown>): void
	warn(message: string, data?: Record<string, unknown>): void
	error(message: string, data?: Record<string, unknown>): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export function createLogger(level: LogLevel = "info"): Logger {
	const threshold = LEVEL_ORDER[level]

	const write = (lvl: LogLevel, message: string, data?: Record<string, unknown>) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		const tag = `[${lvl.toUpperCase()}]`
		if (data && Object.keys(data).length > 0) {
			console.error(tag, message, JSON.stringify(data))
		} else {
			console.error(tag, message)
		}
	}

	return {
		debug: (message, data) => write("debug", message, data),
		info: (message, data) => write("info", message, data),
		warn: (message, data) => write("warn", message, data),
		error: (message, data) => write("error", message, data),
	}
}

/** Logger that discards everything (tests, embedding). */
export const silentLogger: Logger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
}
