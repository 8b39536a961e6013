import type { DatabaseAdapter } from "./adapter.js"
import { SqliteAdapter } from "./sqlite_adapter.js"
import { PostgresAdapter } from "./postgres_adapter.js"
import { VerticaAdapter } from "./vertica_adapter.js"
import type { SqlClientFactory } from "./server_adapter.js"
import type { DatabaseKind } from "../schema_types.js"
import type { Logger } from "../logger.js"

export type AdapterFactory = (kind: DatabaseKind) => DatabaseAdapter

/**
 * Default adapter factory. `clientFactory` replaces the driver pool for
 * server engines (tests pass an in-process fake).
 */
export function createAdapterFactory(logger: Logger, clientFactory?: SqlClientFactory): AdapterFactory {
	return (kind) => {
		switch (kind) {
			case "sqlite":
				return new SqliteAdapter(logger)
			case "postgresql":
				return new PostgresAdapter(logger, clientFactory)
			case "vertica":
				return new VerticaAdapter(logger, clientFactory)
		}
	}
}
