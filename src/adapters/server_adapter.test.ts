import { describe, it, expect } from "vitest"
import type { RawRows, SqlClient } from "./adapter.js"
import { PostgresAdapter } from "./postgres_adapter.js"
import { VerticaAdapter } from "./vertica_adapter.js"
import type { SqlClientFactory } from "./server_adapter.js"
import { silentLogger } from "../logger.js"
import {
	ConfigError,
	ConnectionError,
	QueryRuntimeError,
	QueryTimeoutError,
	SchemaError,
} from "../errors.js"
import type { ServerConnectionParams } from "../schema_types.js"

// ============================================================================
// In-process stand-in for a driver pool
// ============================================================================

type Handler = (text: string) => RawRows | Promise<RawRows>

class FakeClient implements SqlClient {
	statements: string[] = []
	closed = false

	constructor(private readonly handler: Handler) {}

	async query(text: string, _values?: readonly unknown[]): Promise<RawRows> {
		this.statements.push(text.trim())
		return this.handler(text)
	}

	async session<T>(
		fn: (run: (text: string, values?: readonly unknown[]) => Promise<RawRows>) => Promise<T>,
	): Promise<T> {
		return fn((text, values) => this.query(text, values))
	}

	async close(): Promise<void> {
		this.closed = true
	}
}

function driverError(code: string, message: string): Error {
	return Object.assign(new Error(message), { code })
}

const EMPTY: RawRows = { columns: [], rows: [] }

const CATALOG_ROWS: unknown[][] = [
	["customers", "customer_id", "integer", "NO"],
	["customers", "last_name", "character varying", "NO"],
	["customers", "city", "text", "YES"],
	["artists", "name", "text", "YES"],
	["invoices", "invoice_id", "integer", "NO"],
	["invoices", "customer_id", "integer", "NO"],
]

const KEY_ROWS: unknown[][] = [
	["customers", "PRIMARY KEY", "customer_id", null, null],
	["invoices", "FOREIGN KEY", "customer_id", "customers", "customer_id"],
	["invoices", "PRIMARY KEY", "invoice_id", null, null],
]

function pgHandler(text: string): RawRows {
	if (text.includes("information_schema.table_constraints")) {
		return { columns: ["table_name", "constraint_type", "column_name", "table_name", "column_name"], rows: KEY_ROWS }
	}
	if (text.includes("information_schema.columns")) {
		return { columns: ["table_name", "column_name", "data_type", "is_nullable"], rows: CATALOG_ROWS }
	}
	if (text.includes("pg_database_size")) return { columns: ["pg_database_size"], rows: [["8192000"]] }
	if (text.startsWith("SELECT COUNT(*)")) {
		return { columns: ["count"], rows: [[text.includes('"artists"') ? "4" : "59"]] }
	}
	if (text.startsWith("SELECT DISTINCT")) return { columns: ["city"], rows: [["Oslo"], ["Prague"]] }
	return EMPTY
}

function pgParams(overrides: Partial<ServerConnectionParams> = {}): ServerConnectionParams {
	return {
		name: "warehouse",
		kind: "postgresql",
		host: "db.test",
		port: 5432,
		database: "warehouse",
		schema: "public",
		user: "reader",
		password: "test-secret",
		ssl: false,
		connect_timeout_ms: 1000,
		...overrides,
	}
}

async function connectedPostgres(handler: Handler = pgHandler): Promise<{ adapter: PostgresAdapter; client: FakeClient }> {
	const client = new FakeClient(handler)
	const factory: SqlClientFactory = () => client
	const adapter = new PostgresAdapter(silentLogger, factory)
	await adapter.connect(pgParams())
	return { adapter, client }
}

// ============================================================================
// PostgreSQL
// ============================================================================

describe("PostgresAdapter.connect", () => {
	it("checks the server and keeps the client", async () => {
		const { client } = await connectedPostgres()
		expect(client.statements).toEqual(["SELECT 1"])
	})

	it("rejects parameters for another engine", async () => {
		const adapter = new PostgresAdapter(silentLogger, () => new FakeClient(pgHandler))
		await expect(adapter.connect(pgParams({ kind: "vertica" }))).rejects.toBeInstanceOf(ConfigError)
	})

	it("wraps an unreachable server in ConnectionError and closes the client", async () => {
		const client = new FakeClient(() => {
			throw driverError("ECONNREFUSED", "connect ECONNREFUSED 127.0.0.1:5432")
		})
		const adapter = new PostgresAdapter(silentLogger, () => client)
		const err = await adapter.connect(pgParams()).catch((e: unknown) => e)
		expect(err).toBeInstanceOf(ConnectionError)
		if (err instanceof ConnectionError) {
			expect(err.message).toBe(
				"Cannot connect to postgresql 'warehouse' at db.test:5432: connect ECONNREFUSED 127.0.0.1:5432",
			)
		}
		expect(client.closed).toBe(true)
	})
})

describe("PostgresAdapter.introspectSchema", () => {
	it("groups catalog rows by table, sorted by name", async () => {
		const { adapter } = await connectedPostgres()
		const catalog = await adapter.introspectSchema()
		expect(catalog.kind).toBe("postgresql")
		expect(catalog.schema).toBe("public")
		expect(catalog.tables.map((t) => t.name)).toEqual(["artists", "customers", "invoices"])
		expect(catalog.tables[1].columns).toEqual([
			{ name: "customer_id", data_type: "integer", nullable: false, primary_key: true },
			{ name: "last_name", data_type: "character varying", nullable: false, primary_key: false },
			{ name: "city", data_type: "text", nullable: true, primary_key: false },
		])
		expect(catalog.tables[1].foreign_keys).toEqual([])
		expect(catalog.tables[2].foreign_keys).toEqual([
			{ column: "customer_id", ref_table: "customers", ref_column: "customer_id" },
		])
	})

	it("carries on without keys when the constraint catalog is unreadable", async () => {
		const { adapter } = await connectedPostgres((text) => {
			if (text.includes("table_constraints")) throw driverError("42501", "permission denied for table_constraints")
			return pgHandler(text)
		})
		const catalog = await adapter.introspectSchema()
		expect(catalog.tables.map((t) => t.name)).toEqual(["artists", "customers", "invoices"])
		expect(catalog.tables.every((t) => t.foreign_keys.length === 0)).toBe(true)
		expect(catalog.tables.flatMap((t) => t.columns).some((c) => c.primary_key)).toBe(false)
	})

	it("fails when the connection drops while reading keys", async () => {
		const { adapter } = await connectedPostgres((text) => {
			if (text.includes("table_constraints")) throw driverError("ECONNRESET", "read ECONNRESET")
			return pgHandler(text)
		})
		await expect(adapter.introspectSchema()).rejects.toBeInstanceOf(ConnectionError)
	})
})

describe("PostgresAdapter.validate", () => {
	it("reports size and row counts", async () => {
		const { adapter } = await connectedPostgres()
		expect(await adapter.validate()).toEqual({
			valid: true,
			table_count: 3,
			size_estimate: 8192000,
			sample_tables: [
				{ name: "artists", row_count: 4 },
				{ name: "customers", row_count: 59 },
				{ name: "invoices", row_count: 59 },
			],
		})
	})

	it("returns a failure verdict when the catalog query fails", async () => {
		const { adapter } = await connectedPostgres((text) => {
			if (text.includes("information_schema")) throw driverError("42501", "permission denied for schema public")
			return EMPTY
		})
		expect(await adapter.validate()).toEqual({ valid: false, error: "permission denied for schema public" })
	})
})

describe("PostgresAdapter.sampleColumnValues", () => {
	it("queries distinct non-null values with a literal limit", async () => {
		const { adapter, client } = await connectedPostgres()
		expect(await adapter.sampleColumnValues("customers", "city", 501)).toEqual(["Oslo", "Prague"])
		expect(client.statements[1]).toBe(
			'SELECT DISTINCT "city" FROM "public"."customers" WHERE "city" IS NOT NULL LIMIT 501',
		)
	})
})

describe("PostgresAdapter.execute", () => {
	it("sets the statement timeout on the session before the query", async () => {
		const { adapter, client } = await connectedPostgres((text) =>
			text.startsWith("SELECT last_name")
				? { columns: ["last_name"], rows: [["Murray"], ["Holy"], ["Hansen"]] }
				: EMPTY,
		)
		const result = await adapter.execute("SELECT last_name FROM customers", { timeoutMs: 5000, maxRows: 2 })
		expect(client.statements.slice(1)).toEqual([
			"SET statement_timeout = 5000",
			"SELECT last_name FROM customers\nLIMIT 3",
		])
		expect(result.rows).toEqual([["Murray"], ["Holy"]])
		expect(result.truncated).toBe(true)
		expect(Object.isFrozen(result)).toBe(true)
	})

	it("maps SQLSTATE 42703 to SchemaError with the column target", async () => {
		const { adapter } = await connectedPostgres((text) => {
			if (text.startsWith("SELECT lastname")) throw driverError("42703", 'column "lastname" does not exist')
			return EMPTY
		})
		const err = await adapter
			.execute("SELECT lastname FROM customers", { timeoutMs: 1000, maxRows: 10 })
			.catch((e: unknown) => e)
		expect(err).toBeInstanceOf(SchemaError)
		if (err instanceof SchemaError) {
			expect(err.message).toBe('column "lastname" does not exist')
			expect(err.target).toEqual({ object: "column", identifier: "lastname" })
			expect(err.context.sqlstate).toBe("42703")
		}
	})

	it("maps SQLSTATE 57014 to QueryTimeoutError", async () => {
		const { adapter } = await connectedPostgres((text) => {
			if (text.startsWith("SELECT pg_sleep")) {
				throw driverError("57014", "canceling statement due to statement timeout")
			}
			return EMPTY
		})
		await expect(
			adapter.execute("SELECT pg_sleep(10)", { timeoutMs: 100, maxRows: 10 }),
		).rejects.toBeInstanceOf(QueryTimeoutError)
	})

	it("maps a datatype mismatch to a type runtime error", async () => {
		const { adapter } = await connectedPostgres((text) => {
			if (text.startsWith("SELECT *")) {
				throw driverError("42883", "operator does not exist: integer ~~ unknown")
			}
			return EMPTY
		})
		const err = await adapter
			.execute("SELECT * FROM customers WHERE customer_id LIKE '1%'", { timeoutMs: 100, maxRows: 10 })
			.catch((e: unknown) => e)
		expect(err).toBeInstanceOf(QueryRuntimeError)
		if (err instanceof QueryRuntimeError) expect(err.category).toBe("type")
	})

	it("maps a dropped socket to ConnectionError", async () => {
		const { adapter } = await connectedPostgres((text) => {
			if (text.startsWith("SELECT name")) throw driverError("ECONNRESET", "read ECONNRESET")
			return EMPTY
		})
		await expect(
			adapter.execute("SELECT name FROM artists", { timeoutMs: 100, maxRows: 10 }),
		).rejects.toBeInstanceOf(ConnectionError)
	})

	it("gives up on a hung statement with a client-side timeout", async () => {
		const { adapter } = await connectedPostgres((text) =>
			text.startsWith("SELECT name") ? new Promise<RawRows>(() => undefined) : EMPTY,
		)
		await expect(
			adapter.execute("SELECT name FROM artists", { timeoutMs: 10, maxRows: 10 }),
		).rejects.toBeInstanceOf(QueryTimeoutError)
	})

	it("fails when not connected", async () => {
		const adapter = new PostgresAdapter(silentLogger, () => new FakeClient(pgHandler))
		await expect(
			adapter.execute("SELECT 1", { timeoutMs: 100, maxRows: 10 }),
		).rejects.toBeInstanceOf(ConnectionError)
	})

	it("disconnect closes the client once", async () => {
		const { adapter, client } = await connectedPostgres()
		await adapter.disconnect()
		await adapter.disconnect()
		expect(client.closed).toBe(true)
	})
})

// ============================================================================
// Vertica
// ============================================================================

describe("VerticaAdapter", () => {
	const verticaParams = pgParams({ name: "analytics", kind: "vertica", port: 5433, schema: "o'brien" })

	it("uses v_catalog with an escaped schema literal", async () => {
		const client = new FakeClient((text) =>
			text.includes("v_catalog.columns")
				? { columns: [], rows: [["events", "city", "varchar(80)", true]] }
				: EMPTY,
		)
		const adapter = new VerticaAdapter(silentLogger, () => client)
		await adapter.connect(verticaParams)
		const catalog = await adapter.introspectSchema()

		expect(client.statements[1]).toContain("WHERE table_schema = 'o''brien'")
		expect(catalog.kind).toBe("vertica")
		expect(catalog.tables).toEqual([
			{
				name: "events",
				schema: "o'brien",
				columns: [{ name: "city", data_type: "varchar(80)", nullable: true, primary_key: false }],
				foreign_keys: [],
			},
		])
		expect(client.statements[2]).toContain("FROM v_catalog.foreign_keys")
	})

	it("sets RUNTIMECAP in whole seconds", async () => {
		const client = new FakeClient(() => EMPTY)
		const adapter = new VerticaAdapter(silentLogger, () => client)
		await adapter.connect(verticaParams)
		await adapter.execute("SELECT 1", { timeoutMs: 1500, maxRows: 10 })
		expect(client.statements.slice(1)).toEqual(["SET SESSION RUNTIMECAP '2 SECONDS'", "SELECT 1\nLIMIT 11"])
	})

	it("reports projection storage as the size estimate", async () => {
		const client = new FakeClient((text) => {
			if (text.includes("projection_storage")) return { columns: ["sum"], rows: [[123456]] }
			return EMPTY
		})
		const adapter = new VerticaAdapter(silentLogger, () => client)
		await adapter.connect(verticaParams)
		expect(await adapter.validate()).toEqual({
			valid: true,
			table_count: 0,
			size_estimate: 123456,
			sample_tables: [],
		})
	})

	it("maps SQLSTATE 42V01 to SchemaError on the relation", async () => {
		const client = new FakeClient((text) => {
			if (text.startsWith("SELECT * FROM evnts")) {
				throw driverError("42V01", 'Relation "evnts" does not exist')
			}
			return EMPTY
		})
		const adapter = new VerticaAdapter(silentLogger, () => client)
		await adapter.connect(verticaParams)
		const err = await adapter
			.execute("SELECT * FROM evnts", { timeoutMs: 1000, maxRows: 10 })
			.catch((e: unknown) => e)
		expect(err).toBeInstanceOf(SchemaError)
		if (err instanceof SchemaError) {
			expect(err.target).toEqual({ object: "table", identifier: "evnts" })
		}
	})
})
