/**
 * Shared data model
 *
 * Defines types for:
 * - Connection parameters and lifecycle state
 * - Normalized schema catalog / snapshot
 * - Query results and validation verdicts
 * - Correction candidates
 */

// ============================================================================
// Connections
// ============================================================================

export type DatabaseKind = "sqlite" | "postgresql" | "vertica"

export interface SqliteConnectionParams {
	name: string
	kind: "sqlite"
	/** Path to the database file */
	database: string
}

export interface ServerConnectionParams {
	name: string
	kind: "postgresql" | "vertica"
	host: string
	port: number
	database: string
	schema: string
	user: string
	password: string
	ssl: boolean
	connect_timeout_ms: number
}

export type ConnectionParams = SqliteConnectionParams | ServerConnectionParams

export type ConnectionState = "unvalidated" | "valid" | "invalid" | "active"

export interface DatabaseConnection {
	name: string
	kind: DatabaseKind
	state: ConnectionState
}

// ============================================================================
// Schema
// ============================================================================

export interface ColumnInfo {
	name: string
	data_type: string
	nullable: boolean
	primary_key: boolean
}

/** Declared reference from one column to another table's column */
export interface ForeignKey {
	column: string
	ref_table: string
	ref_column: string
}

export interface TableInfo {
	name: string
	/** Schema the table lives in (null for SQLite) */
	schema: string | null
	columns: ColumnInfo[]
	foreign_keys: ForeignKey[]
}

/**
 * Engine-normalized catalog as returned by an adapter
 */
export interface SchemaCatalog {
	kind: DatabaseKind
	schema: string | null
	tables: TableInfo[]
}

/**
 * Catalog bound to one session generation
 */
export interface SchemaSnapshot extends SchemaCatalog {
	version: number
	connection: string
}

// ============================================================================
// Results
// ============================================================================

export type Scalar = string | number | boolean | null

export interface QueryResult {
	readonly columns: readonly string[]
	readonly rows: ReadonlyArray<readonly Scalar[]>
	readonly row_count: number
	/** True when rows were cut at max_rows */
	readonly truncated: boolean
}

export interface SampleTable {
	name: string
	row_count: number
}

export type ValidationVerdict =
	| {
			valid: true
			table_count: number
			/** Bytes, when the engine can report it */
			size_estimate: number | null
			sample_tables: SampleTable[]
	  }
	| {
			valid: false
			error: string
	  }

// ============================================================================
// Autocorrect
// ============================================================================

export interface CorrectionCandidate {
	token: string
	replacement: string
	/** 0.0 - 1.0 */
	confidence: number
	table: string
	column: string
}

/**
 * Text-like column types across the three engines
 */
export function isTextType(dataType: string): boolean {
	return /char|text|string|clob|citext/i.test(dataType)
}

export function isNumericType(dataType: string): boolean {
	return /^(?:(?:tiny|small|medium|big)?int\d*|integer|numeric|decimal|real|double|float\d*|number|money)\b/i.test(dataType)
}
