/**
 * Shared base for pooled server engines (PostgreSQL, Vertica)
 *
 * Subclasses supply the catalog/size/timeout SQL and a client factory;
 * this class owns the connection lifecycle, result shaping and error mapping.
 */

import type { DatabaseAdapter, Dialect, ExecuteOptions, RawRows, SqlClient } from "./adapter.js"
import { freezeResult, withTimeout } from "./adapter.js"
import { errorFromSqlState } from "./sqlstate.js"
import { parseConnectionParams } from "./params.js"
import type {
	ColumnInfo,
	ConnectionParams,
	ForeignKey,
	QueryResult,
	SampleTable,
	SchemaCatalog,
	ServerConnectionParams,
	TableInfo,
	ValidationVerdict,
} from "../schema_types.js"
import { ConfigError, ConnectionError, QueryMendError, errorMessage, isQueryMendError } from "../errors.js"
import type { Logger } from "../logger.js"

// ============================================================================
// Types
// ============================================================================

export type SqlClientFactory = (params: ServerConnectionParams, logger: Logger) => SqlClient

export interface CatalogStatement {
	text: string
	values?: readonly unknown[]
}

interface TableKeys {
	primary: Map<string, Set<string>>
	foreign: Map<string, ForeignKey[]>
}

/** Tables counted in the validation verdict */
const SAMPLE_TABLE_COUNT = 5

/** Extra wait past the server-side timeout before the client gives up */
const CLIENT_GRACE_MS = 500

// ============================================================================
// Helpers
// ============================================================================

/**
 * SQLSTATE (or driver code) carried on a driver error
 */
export function driverErrorCode(err: unknown): string | undefined {
	if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
		return err.code
	}
	return undefined
}

function isTruthyFlag(value: unknown): boolean {
	if (typeof value === "boolean") return value
	if (typeof value === "string") return /^(yes|y|t|true|1)$/i.test(value)
	return value === 1
}

// ============================================================================
// Base Adapter
// ============================================================================

export abstract class ServerAdapter implements DatabaseAdapter {
	abstract readonly kind: "postgresql" | "vertica"
	abstract readonly dialect: Dialect

	protected client: SqlClient | null = null
	protected params: ServerConnectionParams | null = null

	constructor(
		protected readonly logger: Logger,
		private readonly clientFactory?: SqlClientFactory,
	) {}

	/** Driver-backed client for this engine */
	protected abstract createClient(params: ServerConnectionParams): SqlClient

	/** Column catalog rows: table_name, column_name, data_type, is_nullable */
	protected abstract catalogStatement(schema: string): CatalogStatement

	/**
	 * Key rows: table_name, constraint_type ('PRIMARY KEY' | 'FOREIGN KEY'),
	 * column_name, ref_table, ref_column (null for primary keys)
	 */
	protected abstract keyStatement(schema: string): CatalogStatement

	/** Single-value size estimate in bytes, or null when unsupported */
	protected abstract sizeStatement(schema: string): CatalogStatement | null

	/** Session-level statement timeout */
	protected abstract timeoutStatement(timeoutMs: number): string

	async connect(params: ConnectionParams): Promise<void> {
		const parsed = parseConnectionParams(params)
		if (parsed.kind === "sqlite" || parsed.kind !== this.kind) {
			throw new ConfigError(`${this.kind} adapter cannot open a ${parsed.kind} connection`, {
				connection: parsed.name,
			})
		}

		const client = this.clientFactory ? this.clientFactory(parsed, this.logger) : this.createClient(parsed)
		try {
			await withTimeout(client.query("SELECT 1"), parsed.connect_timeout_ms, this.logger, {
				connection: parsed.name,
			})
		} catch (err) {
			await client.close().catch((closeErr: unknown) => {
				this.logger.debug("Error closing failed client", { error: errorMessage(closeErr) })
			})
			throw new ConnectionError(
				`Cannot connect to ${this.kind} '${parsed.name}' at ${parsed.host}:${parsed.port}: ${errorMessage(err)}`,
				{ connection: parsed.name, code: driverErrorCode(err) ?? null },
			)
		}

		this.client = client
		this.params = parsed
		this.logger.info("Database connected", {
			connection: parsed.name,
			kind: this.kind,
			host: parsed.host,
			database: parsed.database,
			schema: parsed.schema,
		})
	}

	async disconnect(): Promise<void> {
		const client = this.client
		if (!client) return
		this.client = null
		await client.close()
		this.logger.debug("Database disconnected", { connection: this.params?.name })
	}

	async validate(): Promise<ValidationVerdict> {
		try {
			const { client, params } = this.requireClient()
			const catalog = await this.introspectSchema()
			const baseTables = catalog.tables

			let sizeEstimate: number | null = null
			const sizeStmt = this.sizeStatement(params.schema)
			if (sizeStmt) {
				const sized = await client.query(sizeStmt.text, sizeStmt.values)
				const raw = sized.rows[0]?.[0]
				const n = Number(raw)
				sizeEstimate = raw !== null && raw !== undefined && Number.isFinite(n) ? n : null
			}

			const sampleTables: SampleTable[] = []
			for (const table of baseTables.slice(0, SAMPLE_TABLE_COUNT)) {
				const counted = await client.query(
					`SELECT COUNT(*) FROM ${this.dialect.qualify(table.name, params.schema)}`,
				)
				sampleTables.push({ name: table.name, row_count: Number(counted.rows[0]?.[0] ?? 0) })
			}

			return {
				valid: true,
				table_count: baseTables.length,
				size_estimate: sizeEstimate,
				sample_tables: sampleTables,
			}
		} catch (err) {
			return { valid: false, error: errorMessage(err) }
		}
	}

	async introspectSchema(): Promise<SchemaCatalog> {
		const { client, params } = this.requireClient()
		const stmt = this.catalogStatement(params.schema)

		let raw: RawRows
		try {
			raw = await client.query(stmt.text, stmt.values)
		} catch (err) {
			throw this.engineError(err, { stage: "introspect" })
		}

		const byTable = new Map<string, ColumnInfo[]>()
		for (const row of raw.rows) {
			const [tableName, columnName, dataType, isNullable] = row
			const table = String(tableName)
			const columns = byTable.get(table) ?? []
			columns.push({
				name: String(columnName),
				data_type: String(dataType),
				nullable: isTruthyFlag(isNullable),
				primary_key: false,
			})
			byTable.set(table, columns)
		}

		const keys = await this.introspectKeys(client, params)
		const tables: TableInfo[] = [...byTable.entries()]
			.sort(([a], [b]) => a.localeCompare(b))
			.map(([name, columns]) => {
				const primary = keys.primary.get(name) ?? new Set<string>()
				return {
					name,
					schema: params.schema,
					columns: columns.map((c) => ({ ...c, primary_key: primary.has(c.name) })),
					foreign_keys: keys.foreign.get(name) ?? [],
				}
			})

		this.logger.debug("Schema introspected", { kind: this.kind, schema: params.schema, tables: tables.length })
		return { kind: this.kind, schema: params.schema, tables }
	}

	/**
	 * Primary-key columns and foreign keys per table. A catalog the login
	 * cannot read yields no keys; a lost connection is rethrown.
	 */
	private async introspectKeys(client: SqlClient, params: ServerConnectionParams): Promise<TableKeys> {
		const keys: TableKeys = { primary: new Map(), foreign: new Map() }
		const stmt = this.keyStatement(params.schema)

		let raw: RawRows
		try {
			raw = await client.query(stmt.text, stmt.values)
		} catch (err) {
			const mapped = this.engineError(err, { stage: "introspect_keys" })
			if (mapped.terminal) throw mapped
			this.logger.warn("Key introspection failed; continuing without keys", {
				connection: params.name,
				error: mapped.message,
			})
			return keys
		}

		for (const [tableName, constraintType, columnName, refTable, refColumn] of raw.rows) {
			const table = String(tableName)
			const column = String(columnName)
			if (String(constraintType).toUpperCase() === "PRIMARY KEY") {
				const primary = keys.primary.get(table) ?? new Set<string>()
				primary.add(column)
				keys.primary.set(table, primary)
			} else if (refTable !== null && refTable !== undefined && refColumn !== null && refColumn !== undefined) {
				const foreign = keys.foreign.get(table) ?? []
				foreign.push({ column, ref_table: String(refTable), ref_column: String(refColumn) })
				keys.foreign.set(table, foreign)
			}
		}
		return keys
	}

	async sampleColumnValues(table: string, column: string, limit: number): Promise<string[]> {
		const { client, params } = this.requireClient()
		const col = this.dialect.quoteIdentifier(column)
		const sql =
			`SELECT DISTINCT ${col} FROM ${this.dialect.qualify(table, params.schema)} ` +
			`WHERE ${col} IS NOT NULL LIMIT ${Math.max(0, Math.floor(limit))}`
		try {
			const raw = await client.query(sql)
			return raw.rows.map((row) => String(row[0]))
		} catch (err) {
			throw this.engineError(err, { table, column })
		}
	}

	async execute(sql: string, options: ExecuteOptions): Promise<QueryResult> {
		const { client, params } = this.requireClient()
		const context = { connection: params.name }
		// one extra row tells us the result was cut
		const bounded = this.dialect.limit(sql, options.maxRows + 1)

		try {
			const raw = await withTimeout(
				client.session(async (run) => {
					await run(this.timeoutStatement(options.timeoutMs))
					return run(bounded)
				}),
				options.timeoutMs + CLIENT_GRACE_MS,
				this.logger,
				context,
			)
			return freezeResult(raw.columns, raw.rows, options.maxRows)
		} catch (err) {
			if (isQueryMendError(err)) throw err
			throw this.engineError(err, context)
		}
	}

	/**
	 * Map a driver error onto the taxonomy, keeping the engine message
	 */
	protected engineError(err: unknown, context: Record<string, unknown>): QueryMendError {
		if (isQueryMendError(err)) return err
		const code = driverErrorCode(err)
		const message = errorMessage(err)
		if (code && /^E[A-Z]+$/.test(code)) {
			// Node socket errors (ECONNRESET, ECONNREFUSED, ...)
			return new ConnectionError(message, { ...context, code })
		}
		return errorFromSqlState(code, message, context)
	}

	private requireClient(): { client: SqlClient; params: ServerConnectionParams } {
		if (!this.client || !this.params) {
			throw new ConnectionError(`${this.kind} adapter is not connected`)
		}
		return { client: this.client, params: this.params }
	}
}
