/**
 * Error taxonomy for the query pipeline
 *
 * Every failure the core can surface is a QueryMendError carrying:
 * - kind: stable discriminator used by error analysis and the tool surface
 * - terminal: whether the pipeline must abort instead of refining
 * - context: structured details for logs (engine codes, identifiers, ...)
 */

export type ErrorKind =
	| "config"
	| "connection"
	| "syntax"
	| "schema"
	| "runtime"
	| "timeout"
	| "model_unavailable"
	| "stale_context"
	| "busy"
	| "ambiguous_correction"
	| "cancelled"

export class QueryMendError extends Error {
	constructor(
		public readonly kind: ErrorKind,
		message: string,
		public readonly terminal: boolean = false,
		public readonly context: Record<string, unknown> = {},
	) {
		super(message)
		this.name = "QueryMendError"
	}
}

export class ConfigError extends QueryMendError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("config", message, true, context)
		this.name = "ConfigError"
	}
}

export class ConnectionError extends QueryMendError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("connection", message, true, context)
		this.name = "ConnectionError"
	}
}

export class SqlSyntaxError extends QueryMendError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("syntax", message, false, context)
		this.name = "SqlSyntaxError"
	}
}

/** What the schema error is about, when it is known. */
export interface SchemaErrorTarget {
	/** "table" or "column" */
	object: "table" | "column"
	identifier: string
	/** Table (or alias) the column was qualified with, if any */
	qualifier?: string
}

export class SchemaError extends QueryMendError {
	constructor(
		message: string,
		public readonly target?: SchemaErrorTarget,
		context?: Record<string, unknown>,
	) {
		super("schema", message, false, context)
		this.name = "SchemaError"
	}
}

export type RuntimeCategory = "constraint" | "type" | "permission" | "other"

export class QueryRuntimeError extends QueryMendError {
	constructor(
		public readonly category: RuntimeCategory,
		message: string,
		context?: Record<string, unknown>,
	) {
		super("runtime", message, false, context)
		this.name = "QueryRuntimeError"
	}
}

export class QueryTimeoutError extends QueryMendError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("timeout", message, false, context)
		this.name = "QueryTimeoutError"
	}
}

export class ModelUnavailableError extends QueryMendError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("model_unavailable", message, true, context)
		this.name = "ModelUnavailableError"
	}
}

export class StaleContextError extends QueryMendError {
	constructor(heldVersion: number, currentVersion: number) {
		super(
			"stale_context",
			`Schema version ${heldVersion} is stale (active version is ${currentVersion}); the database was switched during this run`,
			true,
			{ held_version: heldVersion, current_version: currentVersion },
		)
		this.name = "StaleContextError"
	}
}

export class BusyError extends QueryMendError {
	constructor(inFlight: string, requested: string) {
		super(
			"busy",
			`A switch to '${inFlight}' is already in progress; request for '${requested}' rejected`,
			true,
			{ in_flight: inFlight, requested },
		)
		this.name = "BusyError"
	}
}

export class AmbiguousCorrectionError extends QueryMendError {
	constructor(
		public readonly token: string,
		public readonly options: string[],
	) {
		super(
			"ambiguous_correction",
			`Multiple possible matches for '${token}': ${options.join(", ")}`,
			true,
			{ token, options },
		)
		this.name = "AmbiguousCorrectionError"
	}
}

export class CancelledError extends QueryMendError {
	constructor(stage: string) {
		super("cancelled", `Run cancelled before ${stage}`, true, { stage })
		this.name = "CancelledError"
	}
}

export function isQueryMendError(error: unknown): error is QueryMendError {
	return error instanceof QueryMendError
}

export function isTerminalError(error: unknown): boolean {
	return isQueryMendError(error) && error.terminal
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
