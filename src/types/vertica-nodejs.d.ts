// vertica-nodejs ships no type declarations; this covers the Pool surface used here.
declare module "vertica-nodejs" {
	export interface PoolConfig {
		host?: string
		port?: number
		database?: string
		user?: string
		password?: string
		tls_mode?: "disable" | "prefer" | "require" | "verify-ca" | "verify-full"
		connectionTimeoutMillis?: number
		max?: number
	}

	export interface FieldDef {
		name: string
	}

	export interface QueryArrayResult {
		fields: FieldDef[]
		rows: unknown[][]
	}

	export interface QueryArrayConfig {
		text: string
		rowMode: "array"
	}

	export interface PoolClient {
		query(config: QueryArrayConfig): Promise<QueryArrayResult>
		release(err?: Error | boolean): void
	}

	export class Pool {
		constructor(config?: PoolConfig)
		connect(): Promise<PoolClient>
		query(config: QueryArrayConfig): Promise<QueryArrayResult>
		end(): Promise<void>
		on(event: "error", listener: (err: Error) => void): this
	}

	const vertica: {
		Pool: typeof Pool
	}
	export default vertica
}
