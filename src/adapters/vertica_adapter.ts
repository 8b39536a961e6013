/**
 * Vertica adapter (vertica-nodejs Pool)
 *
 * Catalog statements inline escaped literals instead of bind parameters.
 * Statement timeouts use the session RUNTIMECAP, which has one-second
 * granularity.
 */

import vertica from "vertica-nodejs"
import type { Dialect, RawRows, SqlClient } from "./adapter.js"
import { sqlLiteral, verticaDialect } from "./adapter.js"
import { ServerAdapter, type CatalogStatement } from "./server_adapter.js"
import type { ServerConnectionParams } from "../schema_types.js"
import { QueryRuntimeError } from "../errors.js"
import type { Logger } from "../logger.js"

const POOL_MAX = 5

function rejectBindValues(values: readonly unknown[] | undefined): void {
	if (values && values.length > 0) {
		throw new QueryRuntimeError("other", "Vertica statements take inline literals, not bind values")
	}
}

function toRawRows(result: { fields: Array<{ name: string }>; rows: unknown[][] }): RawRows {
	return { columns: result.fields.map((f) => f.name), rows: result.rows }
}

export function createVerticaClient(params: ServerConnectionParams, logger: Logger): SqlClient {
	const pool = new vertica.Pool({
		host: params.host,
		port: params.port,
		database: params.database,
		user: params.user,
		password: params.password,
		tls_mode: params.ssl ? "require" : "disable",
		connectionTimeoutMillis: params.connect_timeout_ms,
		max: POOL_MAX,
	})

	pool.on("error", (err) => {
		logger.warn("Idle Vertica client error", { connection: params.name, error: err.message })
	})

	return {
		async query(text, values) {
			rejectBindValues(values)
			return toRawRows(await pool.query({ text, rowMode: "array" }))
		},
		async session(fn) {
			const client = await pool.connect()
			try {
				return await fn(async (text, values) => {
					rejectBindValues(values)
					return toRawRows(await client.query({ text, rowMode: "array" }))
				})
			} finally {
				client.release()
			}
		},
		async close() {
			await pool.end()
		},
	}
}

export class VerticaAdapter extends ServerAdapter {
	readonly kind = "vertica" as const
	readonly dialect: Dialect = verticaDialect

	protected createClient(params: ServerConnectionParams): SqlClient {
		return createVerticaClient(params, this.logger)
	}

	protected catalogStatement(schema: string): CatalogStatement {
		return {
			text: `
				SELECT table_name, column_name, data_type, is_nullable
				FROM v_catalog.columns
				WHERE table_schema = ${sqlLiteral(schema)}
				ORDER BY table_name, ordinal_position
			`,
		}
	}

	protected keyStatement(schema: string): CatalogStatement {
		const literal = sqlLiteral(schema)
		return {
			text: `
				SELECT table_name, 'PRIMARY KEY' AS constraint_type, column_name,
					NULL AS ref_table, NULL AS ref_column, ordinal_position
				FROM v_catalog.primary_keys
				WHERE table_schema = ${literal}
				UNION ALL
				SELECT table_name, 'FOREIGN KEY', column_name,
					reference_table_name, reference_column_name, ordinal_position
				FROM v_catalog.foreign_keys
				WHERE table_schema = ${literal}
				ORDER BY 1, 2, 6
			`,
		}
	}

	protected sizeStatement(schema: string): CatalogStatement {
		return {
			text: `SELECT SUM(used_bytes) FROM v_monitor.projection_storage WHERE anchor_table_schema = ${sqlLiteral(schema)}`,
		}
	}

	protected timeoutStatement(timeoutMs: number): string {
		const seconds = Math.max(1, Math.ceil(timeoutMs / 1000))
		return `SET SESSION RUNTIMECAP '${seconds} SECONDS'`
	}
}
