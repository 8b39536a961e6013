/**
 * Error analysis for the refinement loop
 *
 * Turns a failed validation or execution into a category and a hint the
 * next generation can act on. Schema errors name the closest real table or
 * column.
 */

import type { SchemaSnapshot, TableInfo } from "./schema_types.js"
import {
	QueryMendError,
	QueryRuntimeError,
	QueryTimeoutError,
	SchemaError,
	SqlSyntaxError,
	type SchemaErrorTarget,
} from "./errors.js"
import { getSQLSTATEHint, schemaTargetFromMessage } from "./adapters/sqlstate.js"
import { closestMatches } from "./similarity.js"

export type ErrorCategory = "syntax" | "schema" | "type" | "timeout" | "permission" | "repeat" | "unknown"

export interface Diagnosis {
	category: ErrorCategory
	/** Validator or engine message */
	message: string
	/** What the next attempt should change */
	hint: string
	/** Closest real identifier (schema errors), as table or table.column */
	suggestion?: string
	/** The model's own reading of the failure, when it gave one */
	model_hint?: string
}

const SUGGESTION_MIN_SIMILARITY = 0.5

export function categorizeError(error: QueryMendError): ErrorCategory {
	if (error instanceof SqlSyntaxError) return "syntax"
	if (error instanceof SchemaError) return "schema"
	if (error instanceof QueryTimeoutError) return "timeout"
	if (error instanceof QueryRuntimeError) {
		switch (error.category) {
			case "type":
				return "type"
			case "permission":
				return "permission"
			default:
				return "unknown"
		}
	}
	return "unknown"
}

function sqlstateOf(error: QueryMendError): string | null {
	const code = error.context.sqlstate
	return typeof code === "string" ? code : null
}

/**
 * Deterministic diagnosis of a failed attempt
 */
export function analyzeError(error: QueryMendError, snapshot: SchemaSnapshot): Diagnosis {
	const category = categorizeError(error)
	const message = error.message
	const sqlstate = sqlstateOf(error)

	switch (category) {
		case "schema": {
			const target = error instanceof SchemaError ? (error.target ?? schemaTargetFromMessage(message)) : undefined
			return { category, message, ...schemaHint(target, snapshot) }
		}
		case "syntax":
			return { category, message, hint: sqlstate ? getSQLSTATEHint(sqlstate) : "Fix the SQL syntax near the reported position" }
		case "type":
			return {
				category,
				message,
				hint: sqlstate
					? getSQLSTATEHint(sqlstate)
					: "Compare values of matching types: numeric columns with numbers, text columns with LIKE",
			}
		case "timeout":
			return { category, message, hint: "Query timed out; simplify the query or add filters" }
		case "permission":
			return { category, message, hint: "Only a single read-only SELECT statement is allowed" }
		default:
			return { category, message, hint: sqlstate ? getSQLSTATEHint(sqlstate) : "Review the error message and fix the SQL" }
	}
}

/**
 * Diagnosis for a generation identical to the previous attempt
 */
export function repeatDiagnosis(previous: Diagnosis | null): Diagnosis {
	const reason = previous ? ` It failed with: ${previous.message}.` : ""
	return {
		category: "repeat",
		message: "Generated SQL is identical to the previous attempt",
		hint: `Write a different query; the previous one must not be repeated.${reason}`,
	}
}

// ============================================================================
// Schema Hints
// ============================================================================

function schemaHint(
	target: SchemaErrorTarget | undefined,
	snapshot: SchemaSnapshot,
): Pick<Diagnosis, "hint" | "suggestion"> {
	if (!target) {
		return { hint: "Use only tables and columns listed in the schema" }
	}

	if (target.object === "table") {
		const best = closestMatches(
			target.identifier,
			snapshot.tables.map((t) => t.name),
			SUGGESTION_MIN_SIMILARITY,
			1,
		)[0]
		if (!best) {
			return { hint: `Table "${target.identifier}" does not exist; use one of: ${snapshot.tables.map((t) => t.name).join(", ")}` }
		}
		return { hint: `Table "${target.identifier}" does not exist; did you mean ${best.name}?`, suggestion: best.name }
	}

	// A qualifier naming a real table narrows the search; aliases do not
	const qualified = target.qualifier
		? snapshot.tables.find((t) => t.name.toLowerCase() === target.qualifier?.toLowerCase())
		: undefined
	const tables: TableInfo[] = qualified ? [qualified] : snapshot.tables

	const owner = new Map<string, string>()
	for (const table of tables) {
		for (const column of table.columns) {
			if (!owner.has(column.name.toLowerCase())) owner.set(column.name.toLowerCase(), table.name)
		}
	}
	const names = tables.flatMap((t) => t.columns.map((c) => c.name))
	const best = closestMatches(target.identifier, names, SUGGESTION_MIN_SIMILARITY, 1)[0]
	const where = qualified ? ` in ${qualified.name}` : ""

	if (!best) {
		return { hint: `Column "${target.identifier}" does not exist${where}; use a column listed in the schema` }
	}
	const suggestion = `${owner.get(best.name.toLowerCase()) ?? ""}.${best.name}`
	return {
		hint: `Column "${target.identifier}" does not exist${where}; did you mean ${suggestion}?`,
		suggestion,
	}
}
