/**
 * PostgreSQL adapter (node-postgres Pool)
 */

import pg from "pg"
import type { Dialect, RawRows, SqlClient } from "./adapter.js"
import { postgresDialect } from "./adapter.js"
import { ServerAdapter, type CatalogStatement } from "./server_adapter.js"
import type { ServerConnectionParams } from "../schema_types.js"
import type { Logger } from "../logger.js"

const POOL_MAX = 10

function toRawRows(result: pg.QueryArrayResult): RawRows {
	return {
		columns: result.fields.map((f) => f.name),
		rows: result.rows,
	}
}

/**
 * SqlClient over a pg.Pool. Rows come back as arrays so duplicate
 * column names survive.
 */
export function createPgClient(params: ServerConnectionParams, logger: Logger): SqlClient {
	const pool = new pg.Pool({
		host: params.host,
		port: params.port,
		database: params.database,
		user: params.user,
		password: params.password,
		ssl: params.ssl ? { rejectUnauthorized: false } : undefined,
		connectionTimeoutMillis: params.connect_timeout_ms,
		max: POOL_MAX,
	})

	// Idle clients can error when the server goes away; the next query reports it
	pool.on("error", (err) => {
		logger.warn("Idle PostgreSQL client error", { connection: params.name, error: err.message })
	})

	return {
		async query(text, values) {
			const result = await pool.query({ text, values: values ? [...values] : undefined, rowMode: "array" })
			return toRawRows(result)
		},
		async session(fn) {
			const client = await pool.connect()
			try {
				return await fn(async (text, values) =>
					toRawRows(await client.query({ text, values: values ? [...values] : undefined, rowMode: "array" })),
				)
			} finally {
				client.release()
			}
		},
		async close() {
			await pool.end()
		},
	}
}

export class PostgresAdapter extends ServerAdapter {
	readonly kind = "postgresql" as const
	readonly dialect: Dialect = postgresDialect

	protected createClient(params: ServerConnectionParams): SqlClient {
		return createPgClient(params, this.logger)
	}

	protected catalogStatement(schema: string): CatalogStatement {
		return {
			text: `
				SELECT c.table_name, c.column_name, c.data_type, c.is_nullable
				FROM information_schema.columns c
				JOIN information_schema.tables t
					ON t.table_schema = c.table_schema AND t.table_name = c.table_name
				WHERE c.table_schema = $1
					AND t.table_type IN ('BASE TABLE', 'VIEW')
				ORDER BY c.table_name, c.ordinal_position
			`,
			values: [schema],
		}
	}

	protected keyStatement(schema: string): CatalogStatement {
		return {
			text: `
				SELECT tc.table_name, tc.constraint_type, kcu.column_name, ref.table_name, ref.column_name
				FROM information_schema.table_constraints tc
				JOIN information_schema.key_column_usage kcu
					ON kcu.constraint_schema = tc.constraint_schema AND kcu.constraint_name = tc.constraint_name
				LEFT JOIN information_schema.referential_constraints rc
					ON rc.constraint_schema = tc.constraint_schema AND rc.constraint_name = tc.constraint_name
				LEFT JOIN information_schema.key_column_usage ref
					ON ref.constraint_schema = rc.unique_constraint_schema
					AND ref.constraint_name = rc.unique_constraint_name
					AND ref.ordinal_position = kcu.position_in_unique_constraint
				WHERE tc.table_schema = $1
					AND tc.constraint_type IN ('PRIMARY KEY', 'FOREIGN KEY')
				ORDER BY tc.table_name, tc.constraint_name, kcu.ordinal_position
			`,
			values: [schema],
		}
	}

	protected sizeStatement(): CatalogStatement {
		return { text: "SELECT pg_database_size(current_database())" }
	}

	protected timeoutStatement(timeoutMs: number): string {
		return `SET statement_timeout = ${Math.max(1, Math.floor(timeoutMs))}`
	}
}
