/**
 * SQLite adapter (sql.js)
 *
 * The database file must already exist (":memory:" opens an empty
 * database). Its bytes are loaded into the WebAssembly engine on connect,
 * and the copy is switched to query_only, so nothing is ever written back.
 * Later changes to the file are seen after the next connect.
 *
 * sql.js steps statements synchronously; the execute timeout is checked
 * between rows and cannot interrupt a single long step.
 */

import { readFile } from "node:fs/promises"
import sqlJs from "sql.js"
import type { Database, SqlJsStatic, SqlValue } from "sql.js"
import { z } from "zod"
import type { DatabaseAdapter, Dialect, ExecuteOptions } from "./adapter.js"
import { freezeResult, sqliteDialect } from "./adapter.js"
import { errorFromSqliteMessage } from "./sqlstate.js"
import { parseConnectionParams } from "./params.js"
import type {
	ConnectionParams,
	ForeignKey,
	QueryResult,
	SampleTable,
	SchemaCatalog,
	TableInfo,
	ValidationVerdict,
} from "../schema_types.js"
import { ConfigError, ConnectionError, QueryTimeoutError, errorMessage, isQueryMendError } from "../errors.js"
import type { Logger } from "../logger.js"

/** Tables counted in the validation verdict */
const SAMPLE_TABLE_COUNT = 5

const tableRowSchema = z.object({ name: z.string(), type: z.string() })

const pragmaColumnSchema = z.object({
	name: z.string(),
	type: z.string().nullable(),
	notnull: z.number(),
	pk: z.number(),
})

const pragmaForeignKeySchema = z.object({
	table: z.string(),
	from: z.string(),
	/** null when the key references the parent's primary key implicitly */
	to: z.string().nullable(),
})

// The WebAssembly module is compiled once per process
let engine: Promise<SqlJsStatic> | null = null

function loadEngine(): Promise<SqlJsStatic> {
	if (!engine) {
		// the CommonJS build sets the init function as module.exports and as its .default
		engine = sqlJs.default().catch((err: unknown) => {
			engine = null
			throw err
		})
	}
	return engine
}

export class SqliteAdapter implements DatabaseAdapter {
	readonly kind = "sqlite" as const
	readonly dialect: Dialect = sqliteDialect

	private db: Database | null = null
	private path: string | null = null

	constructor(private readonly logger: Logger) {}

	async connect(params: ConnectionParams): Promise<void> {
		const parsed = parseConnectionParams(params)
		if (parsed.kind !== "sqlite") {
			throw new ConfigError(`SQLite adapter cannot open a ${parsed.kind} connection`, { connection: parsed.name })
		}

		let db: Database | null = null
		try {
			const SQL = await loadEngine()
			db = parsed.database === ":memory:" ? new SQL.Database() : new SQL.Database(await readFile(parsed.database))
			// Confirms the file is a database, not just a readable file
			db.exec("SELECT count(*) FROM sqlite_master")
			db.exec("PRAGMA query_only = ON")
		} catch (err) {
			db?.close()
			throw new ConnectionError(`Cannot open SQLite database '${parsed.database}': ${errorMessage(err)}`, {
				connection: parsed.name,
			})
		}

		this.db?.close()
		this.db = db
		this.path = parsed.database
		this.logger.info("SQLite database opened", { connection: parsed.name, path: parsed.database })
	}

	async disconnect(): Promise<void> {
		if (!this.db) return
		this.db.close()
		this.db = null
		this.logger.debug("SQLite database closed", { path: this.path })
	}

	async validate(): Promise<ValidationVerdict> {
		try {
			const db = this.requireDb()
			const tables = this.listTables(db).filter((t) => t.type === "table")

			const pageCount = Number(this.scalar(db, "PRAGMA page_count"))
			const pageSize = Number(this.scalar(db, "PRAGMA page_size"))
			const sizeEstimate = Number.isFinite(pageCount * pageSize) ? pageCount * pageSize : null

			const sampleTables: SampleTable[] = tables.slice(0, SAMPLE_TABLE_COUNT).map((t) => ({
				name: t.name,
				row_count: Number(this.scalar(db, `SELECT COUNT(*) FROM ${this.dialect.quoteIdentifier(t.name)}`)),
			}))

			return {
				valid: true,
				table_count: tables.length,
				size_estimate: sizeEstimate,
				sample_tables: sampleTables,
			}
		} catch (err) {
			return { valid: false, error: errorMessage(err) }
		}
	}

	async introspectSchema(): Promise<SchemaCatalog> {
		const db = this.requireDb()
		const tables: TableInfo[] = []

		for (const t of this.listTables(db)) {
			const quoted = this.dialect.quoteIdentifier(t.name)
			const columns = pragmaColumnSchema.array().parse(this.records(db, `PRAGMA table_info(${quoted})`))
			const keys = pragmaForeignKeySchema.array().parse(this.records(db, `PRAGMA foreign_key_list(${quoted})`))
			const foreignKeys: ForeignKey[] = keys.map((k) => ({
				column: k.from,
				ref_table: k.table,
				ref_column: k.to ?? this.primaryKeyOf(db, k.table) ?? k.from,
			}))

			tables.push({
				name: t.name,
				schema: null,
				columns: columns.map((c) => ({
					name: c.name,
					data_type: c.type && c.type.length > 0 ? c.type : "ANY",
					// INTEGER PRIMARY KEY aliases rowid and is never null
					nullable: c.notnull === 0 && c.pk === 0,
					primary_key: c.pk > 0,
				})),
				foreign_keys: foreignKeys,
			})
		}

		this.logger.debug("SQLite schema introspected", { tables: tables.length })
		return { kind: "sqlite", schema: null, tables }
	}

	async sampleColumnValues(table: string, column: string, limit: number): Promise<string[]> {
		const db = this.requireDb()
		const col = this.dialect.quoteIdentifier(column)
		const sql = `SELECT DISTINCT ${col} FROM ${this.dialect.quoteIdentifier(table)} WHERE ${col} IS NOT NULL LIMIT ?`
		try {
			const [result] = db.exec(sql, [limit])
			return (result?.values ?? []).map((row) => String(row[0]))
		} catch (err) {
			throw errorFromSqliteMessage(errorMessage(err), { table, column })
		}
	}

	async execute(sql: string, options: ExecuteOptions): Promise<QueryResult> {
		const db = this.requireDb()
		const deadline = Date.now() + Math.max(0, options.timeoutMs)

		try {
			const stmt = db.prepare(sql)
			try {
				const columns = stmt.getColumnNames()
				const rows: SqlValue[][] = []
				while (stmt.step()) {
					rows.push(stmt.get())
					// one extra row tells us the result was cut
					if (rows.length > options.maxRows) break
					if (Date.now() > deadline) {
						throw new QueryTimeoutError(`Query exceeded ${options.timeoutMs}ms`, {
							sql,
							timeout_ms: options.timeoutMs,
						})
					}
				}
				return freezeResult(columns, rows, options.maxRows)
			} finally {
				stmt.free()
			}
		} catch (err) {
			if (isQueryMendError(err)) throw err
			throw errorFromSqliteMessage(errorMessage(err), { sql })
		}
	}

	private requireDb(): Database {
		if (!this.db) {
			throw new ConnectionError("SQLite adapter is not connected")
		}
		return this.db
	}

	/** Rows of a statement as column-keyed objects */
	private records(db: Database, sql: string): Array<Record<string, SqlValue>> {
		const [result] = db.exec(sql)
		if (!result) return []
		return result.values.map((row) => Object.fromEntries(result.columns.map((name, i) => [name, row[i] ?? null])))
	}

	private scalar(db: Database, sql: string): SqlValue {
		const [result] = db.exec(sql)
		return result?.values[0]?.[0] ?? null
	}

	private primaryKeyOf(db: Database, table: string): string | null {
		const columns = pragmaColumnSchema
			.array()
			.parse(this.records(db, `PRAGMA table_info(${this.dialect.quoteIdentifier(table)})`))
		const keys = columns.filter((c) => c.pk > 0)
		return keys.length === 1 ? keys[0].name : null
	}

	private listTables(db: Database): Array<{ name: string; type: string }> {
		const rows = this.records(
			db,
			"SELECT name, type FROM sqlite_master WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite_%' ORDER BY name",
		)
		return tableRowSchema.array().parse(rows)
	}
}
