/**
 * Engine error classification
 *
 * Maps SQLSTATE codes (PostgreSQL and Vertica share the standard classes) and
 * SQLite message text onto the QueryMendError taxonomy, and extracts the
 * table/column an undefined-object error is about.
 */

import {
	ConnectionError,
	QueryMendError,
	QueryRuntimeError,
	QueryTimeoutError,
	SchemaError,
	SqlSyntaxError,
	type SchemaErrorTarget,
} from "../errors.js"

// ============================================================================
// SQLSTATE Tables
// ============================================================================

/**
 * Exact codes are matched first, then two-character class prefixes
 */
export const SQLSTATE_CLASSIFICATION = {
	syntax: [
		"42601", // Syntax error
		"42000", // Syntax error or access rule violation (generic)
	],
	schema: [
		"42P01", // Undefined table
		"42703", // Undefined column
		"42702", // Ambiguous column
		"42P09", // Ambiguous alias
		"42P10", // Invalid column reference
		"42V01", // Vertica: undefined relation
		"3F000", // Invalid schema name
	],
	type: [
		"42804", // Datatype mismatch
		"42883", // Undefined function / operator
		"42803", // Grouping error
		"22", // Data exception
	],
	constraint: [
		"23", // Integrity constraint violation
	],
	permission: [
		"42501", // Insufficient privilege
		"25006", // Read-only transaction
	],
	timeout: [
		"57014", // Query canceled (statement_timeout / RUNTIMECAP)
	],
	connection: [
		"08", // Connection exception
		"28", // Invalid authorization
		"3D000", // Invalid catalog (database) name
		"57P01", // Admin shutdown
		"57P02", // Crash shutdown
		"57P03", // Cannot connect now
		"53", // Insufficient resources
	],
} as const

export type SqlStateClass = keyof typeof SQLSTATE_CLASSIFICATION

const CLASS_ORDER: SqlStateClass[] = ["timeout", "connection", "syntax", "schema", "permission", "constraint", "type"]

/**
 * Classify a SQLSTATE code, or null when unknown
 */
export function classifySqlState(sqlstate: string): SqlStateClass | null {
	for (const cls of CLASS_ORDER) {
		const codes: readonly string[] = SQLSTATE_CLASSIFICATION[cls]
		if (codes.includes(sqlstate)) return cls
	}
	for (const cls of CLASS_ORDER) {
		const codes: readonly string[] = SQLSTATE_CLASSIFICATION[cls]
		if (codes.some((prefix) => prefix.length === 2 && sqlstate.startsWith(prefix))) return cls
	}
	return null
}

/**
 * Get hint for SQLSTATE error
 */
export function getSQLSTATEHint(sqlstate: string): string {
	const hints: Record<string, string> = {
		"42601": "Fix SQL syntax based on the error position",
		"42P01": "Use a table name from the schema",
		"42V01": "Use a table name from the schema",
		"42703": "Use a column name from the schema",
		"42702": "Qualify the ambiguous column with its table",
		"42P09": "Qualify the ambiguous column with its table",
		"42P10": "Add a table qualifier to the column reference",
		"42804": "Fix the datatype mismatch in the comparison",
		"42883": "Use a known function or cast the arguments",
		"42803": "Add the missing column to GROUP BY or aggregate it",
		"22012": "Avoid division by zero with NULLIF or CASE",
		"57014": "Query timed out; simplify the query or add filters",
	}
	return hints[sqlstate] ?? "Review the error message and fix the SQL"
}

// ============================================================================
// Message Parsing
// ============================================================================

function stripQualifier(name: string): string {
	const dot = name.lastIndexOf(".")
	return dot >= 0 ? name.slice(dot + 1) : name
}

/**
 * Extract the undefined column from an engine message
 *
 * Formats:
 * - 'column "foo" of relation "bar" does not exist' (PostgreSQL)
 * - 'column "t.foo" does not exist' / 'column t.foo does not exist'
 * - 'Column "foo" does not exist' (Vertica)
 * - 'no such column: t.foo' (SQLite)
 */
export function parseUndefinedColumn(message: string): { column: string; tableHint?: string } | null {
	const withRelation = /column "?([^"\s]+)"? of relation "?([^"\s]+)"? does not exist/i.exec(message)
	if (withRelation) {
		return { column: withRelation[1], tableHint: stripQualifier(withRelation[2]) }
	}

	const simple =
		/column "([^"]+)" does not exist/i.exec(message) ??
		/column ([\w.]+) does not exist/i.exec(message) ??
		/no such column: "?([\w.]+)"?/i.exec(message)
	if (!simple) return null

	const name = simple[1]
	const dot = name.lastIndexOf(".")
	if (dot > 0) {
		return { column: name.slice(dot + 1), tableHint: name.slice(0, dot) }
	}
	return { column: name }
}

/**
 * Extract the missing table from an engine message
 *
 * Formats:
 * - 'relation "foo" does not exist' (PostgreSQL, Vertica "Relation")
 * - 'Table "foo" does not exist' (Vertica)
 * - 'missing FROM-clause entry for table "foo"' (PostgreSQL, unknown alias)
 * - 'no such table: foo' (SQLite)
 */
export function parseMissingTable(message: string): string | null {
	const match =
		/missing FROM-clause entry for table "?([^"\s]+)"?/i.exec(message) ??
		/(?:relation|table) "?([^"\s]+)"? does not exist/i.exec(message) ??
		/no such table: "?([\w.]+)"?/i.exec(message)
	return match ? stripQualifier(match[1]) : null
}

/**
 * Best-effort target of a schema error
 */
export function schemaTargetFromMessage(message: string): SchemaErrorTarget | undefined {
	const column = parseUndefinedColumn(message)
	if (column) {
		return { object: "column", identifier: column.column, qualifier: column.tableHint }
	}
	const table = parseMissingTable(message)
	if (table) {
		return { object: "table", identifier: table }
	}
	return undefined
}

// ============================================================================
// Error Construction
// ============================================================================

/**
 * Build a taxonomy error from a SQLSTATE-carrying engine error.
 * The engine's raw message is kept as the error message.
 */
export function errorFromSqlState(
	sqlstate: string | undefined,
	message: string,
	context: Record<string, unknown> = {},
): QueryMendError {
	const ctx = { ...context, sqlstate: sqlstate ?? null }
	const cls = sqlstate ? classifySqlState(sqlstate) : null

	switch (cls) {
		case "syntax":
			return new SqlSyntaxError(message, ctx)
		case "schema":
			return new SchemaError(message, schemaTargetFromMessage(message), ctx)
		case "type":
			return new QueryRuntimeError("type", message, ctx)
		case "constraint":
			return new QueryRuntimeError("constraint", message, ctx)
		case "permission":
			return new QueryRuntimeError("permission", message, ctx)
		case "timeout":
			return new QueryTimeoutError(message, ctx)
		case "connection":
			return new ConnectionError(message, ctx)
		default:
			return new QueryRuntimeError("other", message, ctx)
	}
}

/**
 * Classify a SQLite error from its message text (SQLite has no SQLSTATE)
 */
export function errorFromSqliteMessage(
	message: string,
	context: Record<string, unknown> = {},
): QueryMendError {
	const lower = message.toLowerCase()

	if (lower.includes("no such table") || lower.includes("no such column") || lower.includes("ambiguous column")) {
		return new SchemaError(message, schemaTargetFromMessage(message), context)
	}
	if (lower.includes("syntax error") || lower.includes("incomplete input") || lower.includes("unrecognized token")) {
		return new SqlSyntaxError(message, context)
	}
	if (lower.includes("no such function") || lower.includes("wrong number of arguments") || lower.includes("datatype mismatch")) {
		return new QueryRuntimeError("type", message, context)
	}
	if (lower.includes("constraint failed")) {
		return new QueryRuntimeError("constraint", message, context)
	}
	if (lower.includes("readonly") || lower.includes("not authorized") || lower.includes("access permission denied")) {
		return new QueryRuntimeError("permission", message, context)
	}
	if (lower.includes("interrupted")) {
		return new QueryTimeoutError(message, context)
	}
	if (lower.includes("unable to open database") || lower.includes("file is not a database")) {
		return new ConnectionError(message, context)
	}
	return new QueryRuntimeError("other", message, context)
}
