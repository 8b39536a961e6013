/**
 * Session Manager
 *
 * Owns the single active database: its adapter, the knowledge base built
 * from its schema, and a generation counter. A switch builds the new
 * session completely (connect, validate, introspect) before swapping it in,
 * so a failed switch never disturbs the active one. Runs capture a
 * SessionContext at start and compare its version against `version`.
 */

import type { AdapterFactory } from "./adapters/factory.js"
import type { DatabaseAdapter } from "./adapters/adapter.js"
import { KnowledgeBase, type KnowledgeBaseOptions } from "./knowledge_base.js"
import type {
	ConnectionParams,
	ConnectionState,
	DatabaseConnection,
	DatabaseKind,
	SchemaSnapshot,
	ValidationVerdict,
} from "./schema_types.js"
import { BusyError, ConfigError, ConnectionError, QueryMendError, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"

// ============================================================================
// Types
// ============================================================================

/** Resolves named parameter sets. Read-only. */
export interface ConnectionStore {
	names(): string[]
	resolve(name: string): ConnectionParams | null
}

export interface SessionIdentity {
	name: string
	kind: DatabaseKind
	version: number
}

/** Everything one run needs, captured once at its start */
export interface SessionContext extends SessionIdentity {
	adapter: DatabaseAdapter
	kb: KnowledgeBase
}

export type SwitchResult = { ok: true; session: SessionIdentity } | { ok: false; error: QueryMendError }

/**
 * Store over the `connections` list of the loaded configuration
 */
export class ConfigConnectionStore implements ConnectionStore {
	private readonly byName = new Map<string, ConnectionParams>()

	constructor(connections: ConnectionParams[]) {
		for (const conn of connections) this.byName.set(conn.name, conn)
	}

	names(): string[] {
		return [...this.byName.keys()]
	}

	resolve(name: string): ConnectionParams | null {
		return this.byName.get(name) ?? null
	}
}

// ============================================================================
// Session Manager
// ============================================================================

export class SessionManager {
	private active: SessionContext | null = null
	private generation = 0
	private switching: string | null = null
	private readonly states = new Map<string, ConnectionState>()

	constructor(
		private readonly store: ConnectionStore,
		private readonly createAdapter: AdapterFactory,
		private readonly kbOptions: KnowledgeBaseOptions,
		private readonly logger: Logger,
	) {}

	/** Version of the active session; 0 before the first switch */
	get version(): number {
		return this.active?.version ?? 0
	}

	current(): SessionIdentity | null {
		if (!this.active) return null
		const { name, kind, version } = this.active
		return { name, kind, version }
	}

	/**
	 * Context for a new run. Throws ConnectionError when nothing is active.
	 */
	acquire(): SessionContext {
		if (!this.active) {
			throw new ConnectionError("No active database; switch to one first")
		}
		return this.active
	}

	listDatabases(): DatabaseConnection[] {
		return this.store.names().flatMap((name) => {
			const params = this.store.resolve(name)
			return params ? [{ name, kind: params.kind, state: this.states.get(name) ?? "unvalidated" }] : []
		})
	}

	/**
	 * Make `name` the active database. Never throws; a failure leaves the
	 * active session as it was.
	 */
	async switchDatabase(name: string): Promise<SwitchResult> {
		if (this.switching !== null) {
			const error = new BusyError(this.switching, name)
			this.logger.warn("Switch rejected", { requested: name, in_flight: this.switching })
			return { ok: false, error }
		}

		this.switching = name
		try {
			const params = this.requireParams(name)
			const { adapter, snapshot } = await this.open(params)

			// Swap
			const previous = this.active
			const version = ++this.generation
			this.active = {
				name,
				kind: params.kind,
				version,
				adapter,
				kb: new KnowledgeBase({ ...snapshot, version }, adapter, this.kbOptions, this.logger),
			}
			if (previous && previous.name !== name) this.states.set(previous.name, "valid")
			this.states.set(name, "active")
			this.logger.info("Active database switched", {
				name,
				kind: params.kind,
				version,
				tables: snapshot.tables.length,
				previous: previous?.name ?? null,
			})

			if (previous) await this.release(previous.adapter, previous.name)
			return { ok: true, session: { name, kind: params.kind, version } }
		} catch (err) {
			const error = err instanceof QueryMendError ? err : new ConnectionError(errorMessage(err))
			this.logger.warn("Switch failed", { name, kind: error.kind, error: error.message })
			return { ok: false, error }
		} finally {
			this.switching = null
		}
	}

	/**
	 * Check a named connection. The active one is checked in place; any other
	 * through a temporary adapter. Never throws.
	 */
	async validateDatabase(name: string): Promise<ValidationVerdict> {
		if (this.active?.name === name) {
			return this.active.adapter.validate()
		}

		const params = this.store.resolve(name)
		if (!params) {
			return { valid: false, error: `Unknown connection '${name}'` }
		}

		const adapter = this.createAdapter(params.kind)
		let verdict: ValidationVerdict
		try {
			await adapter.connect(params)
			verdict = await adapter.validate()
		} catch (err) {
			verdict = { valid: false, error: errorMessage(err) }
		} finally {
			await this.release(adapter, name)
		}

		this.states.set(name, verdict.valid ? "valid" : "invalid")
		this.logger.info("Connection validated", { name, valid: verdict.valid })
		return verdict
	}

	/** Disconnect the active session */
	async close(): Promise<void> {
		const previous = this.active
		this.active = null
		if (previous) {
			this.states.set(previous.name, "valid")
			await this.release(previous.adapter, previous.name)
		}
	}

	// ==========================================================================
	// Helpers
	// ==========================================================================

	private requireParams(name: string): ConnectionParams {
		const params = this.store.resolve(name)
		if (!params) {
			throw new ConfigError(`Unknown connection '${name}'`, { name })
		}
		return params
	}

	/**
	 * Connect, validate and introspect a fresh adapter. On failure the
	 * adapter is released and the connection marked invalid.
	 */
	private async open(params: ConnectionParams): Promise<{ adapter: DatabaseAdapter; snapshot: SchemaSnapshot }> {
		const adapter = this.createAdapter(params.kind)
		try {
			await adapter.connect(params)
			const verdict = await adapter.validate()
			if (!verdict.valid) {
				throw new ConnectionError(`Connection '${params.name}' failed validation: ${verdict.error}`, {
					name: params.name,
				})
			}
			const catalog = await adapter.introspectSchema()
			return { adapter, snapshot: { ...catalog, version: this.generation, connection: params.name } }
		} catch (err) {
			this.states.set(params.name, "invalid")
			await this.release(adapter, params.name)
			throw err
		}
	}

	private async release(adapter: DatabaseAdapter, name: string): Promise<void> {
		try {
			await adapter.disconnect()
		} catch (err) {
			this.logger.warn("Disconnect failed", { name, error: errorMessage(err) })
		}
	}
}
