/**
 * Database Adapter contract
 *
 * One polymorphic surface over SQLite, PostgreSQL and Vertica:
 * connect / validate / introspect / sample / execute / disconnect.
 * Dialect differences live in each variant's Dialect; callers never branch
 * on engine kind.
 */

import type {
	ConnectionParams,
	DatabaseKind,
	QueryResult,
	Scalar,
	SchemaCatalog,
	ValidationVerdict,
} from "../schema_types.js"
import type { Logger } from "../logger.js"
import { QueryTimeoutError } from "../errors.js"

// ============================================================================
// Types
// ============================================================================

export interface ExecuteOptions {
	/** Server-side and client-side bound for the statement */
	timeoutMs: number
	/** Rows beyond this are dropped and the result marked truncated */
	maxRows: number
}

export interface Dialect {
	/** Quote an identifier for this engine */
	quoteIdentifier(name: string): string
	/** Schema-qualified, quoted table reference */
	qualify(table: string, schema: string | null): string
	/** Cap a SELECT at n rows */
	limit(sql: string, n: number): string
	/** Whether unquoted identifiers keep their case */
	readonly identifiersCaseSensitive: boolean
}

export interface DatabaseAdapter {
	readonly kind: DatabaseKind
	readonly dialect: Dialect

	/**
	 * Open the connection (a pool for server engines).
	 * Throws ConnectionError when unreachable, ConfigError on bad parameters.
	 */
	connect(params: ConnectionParams): Promise<void>

	/** Release every handle. Safe to call twice. */
	disconnect(): Promise<void>

	/** Cheap health check. Never throws. */
	validate(): Promise<ValidationVerdict>

	introspectSchema(): Promise<SchemaCatalog>

	/** Up to `limit` distinct non-null values, as strings */
	sampleColumnValues(table: string, column: string, limit: number): Promise<string[]>

	/** Frozen result, or a SqlSyntaxError / SchemaError / QueryRuntimeError / QueryTimeoutError */
	execute(sql: string, options: ExecuteOptions): Promise<QueryResult>
}

/**
 * Minimal client surface the server-engine adapters drive.
 * Lets tests inject an in-process fake.
 */
export interface SqlClient {
	query(text: string, values?: readonly unknown[]): Promise<RawRows>
	/** Run statements on one session, e.g. a session timeout followed by the query */
	session<T>(fn: (run: (text: string, values?: readonly unknown[]) => Promise<RawRows>) => Promise<T>): Promise<T>
	close(): Promise<void>
}

export interface RawRows {
	columns: string[]
	rows: unknown[][]
}

// ============================================================================
// Dialects
// ============================================================================

function doubleQuote(name: string): string {
	return `"${name.replace(/"/g, '""')}"`
}

/**
 * Statement text without trailing semicolons and comments
 */
function stripStatementTail(sql: string): string {
	let body = sql.trim()
	for (;;) {
		const before = body
		body = body.replace(/;+\s*$/, "").trimEnd()
		if (body.endsWith("*/")) {
			const open = body.lastIndexOf("/*")
			if (open >= 0) body = body.slice(0, open).trimEnd()
		}
		const lineStart = body.lastIndexOf("\n") + 1
		const dash = lineCommentStart(body.slice(lineStart))
		if (dash >= 0) body = body.slice(0, lineStart + dash).trimEnd()
		if (body === before) return body
	}
}

/** Index of a `--` outside single quotes, or -1 */
function lineCommentStart(line: string): number {
	let quoted = false
	for (let i = 0; i < line.length; i++) {
		const char = line[i]
		if (char === "'") quoted = !quoted
		else if (!quoted && char === "-" && line[i + 1] === "-") return i
	}
	return -1
}

/**
 * Cap a SELECT at n rows: a trailing LIMIT above n is lowered, a smaller
 * one kept, and a statement ending in FETCH FIRST ... ONLY left alone.
 * The clause goes on its own line so nothing can comment it out.
 */
function appendLimit(sql: string, n: number): string {
	const body = stripStatementTail(sql)
	const cap = Math.max(0, Math.floor(n))

	const existing = /\blimit\s+(\d+)(\s+offset\s+\d+)?$/i.exec(body)
	if (existing) {
		if (Number(existing[1]) <= cap) return body
		return `${body.slice(0, existing.index)}LIMIT ${cap}${existing[2] ?? ""}`
	}
	if (/\bfetch\s+(?:first|next)\b[\s\S]*\bonly$/i.test(body)) return body
	return `${body}\nLIMIT ${cap}`
}

export const sqliteDialect: Dialect = {
	quoteIdentifier: doubleQuote,
	qualify: (table) => doubleQuote(table),
	limit: appendLimit,
	identifiersCaseSensitive: false,
}

export const postgresDialect: Dialect = {
	quoteIdentifier: doubleQuote,
	qualify: (table, schema) => (schema ? `${doubleQuote(schema)}.${doubleQuote(table)}` : doubleQuote(table)),
	limit: appendLimit,
	identifiersCaseSensitive: true,
}

export const verticaDialect: Dialect = {
	quoteIdentifier: doubleQuote,
	qualify: (table, schema) => (schema ? `${doubleQuote(schema)}.${doubleQuote(table)}` : doubleQuote(table)),
	limit: appendLimit,
	identifiersCaseSensitive: false,
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Normalize a driver value to a JSON-safe scalar
 */
export function toScalar(value: unknown): Scalar {
	if (value === null || value === undefined) return null
	if (typeof value === "string" || typeof value === "boolean") return value
	if (typeof value === "number") return Number.isFinite(value) ? value : String(value)
	if (typeof value === "bigint") {
		return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
			? Number(value)
			: value.toString()
	}
	if (value instanceof Date) return value.toISOString()
	if (value instanceof Uint8Array) return Buffer.from(value).toString("base64")
	return JSON.stringify(value)
}

/**
 * Build a frozen QueryResult, cutting rows at maxRows
 */
export function freezeResult(columns: string[], rows: unknown[][], maxRows: number): QueryResult {
	const truncated = rows.length > maxRows
	const kept = (truncated ? rows.slice(0, maxRows) : rows).map((row) => Object.freeze(row.map(toScalar)))
	return Object.freeze({
		columns: Object.freeze([...columns]),
		rows: Object.freeze(kept),
		row_count: kept.length,
		truncated,
	})
}

/**
 * Bound a promise by a client-side timer.
 *
 * If the work settles after the timer fired, its outcome is logged at debug
 * level; the caller has already received the QueryTimeoutError.
 */
export function withTimeout<T>(
	work: Promise<T>,
	timeoutMs: number,
	logger: Logger,
	context: Record<string, unknown> = {},
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		let timedOut = false
		const timer = setTimeout(() => {
			timedOut = true
			reject(new QueryTimeoutError(`Query exceeded ${timeoutMs}ms`, { ...context, timeout_ms: timeoutMs }))
		}, timeoutMs)

		work.then(
			(value) => {
				clearTimeout(timer)
				if (timedOut) {
					logger.debug("Statement finished after client timeout", context)
					return
				}
				resolve(value)
			},
			(err: unknown) => {
				clearTimeout(timer)
				if (timedOut) {
					logger.debug("Statement failed after client timeout", {
						...context,
						error: err instanceof Error ? err.message : String(err),
					})
					return
				}
				reject(err)
			},
		)
	})
}

/**
 * Escape a string as a SQL literal (for engines without bind parameters)
 */
export function sqlLiteral(value: string): string {
	return `'${value.replace(/'/g, "''")}'`
}
