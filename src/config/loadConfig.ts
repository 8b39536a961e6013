/**
 * Unified config loader.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged document is validated (and defaulted) by configSchema.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { ConfigError } from "../errors.js"

// ── Schema ───────────────────────────────────────────────────────────

export const sqliteConnectionSchema = z.object({
	name: z.string().min(1),
	kind: z.literal("sqlite"),
	database: z.string().min(1),
})

const serverConnectionFields = {
	name: z.string().min(1),
	host: z.string().min(1),
	database: z.string().min(1),
	schema: z.string().min(1).default("public"),
	user: z.string().min(1),
	password: z.string().default(""),
	ssl: z.boolean().default(false),
	connect_timeout_ms: z.number().int().positive().default(10000),
}

export const postgresConnectionSchema = z.object({
	...serverConnectionFields,
	kind: z.literal("postgresql"),
	port: z.number().int().positive().default(5432),
})

export const verticaConnectionSchema = z.object({
	...serverConnectionFields,
	kind: z.literal("vertica"),
	port: z.number().int().positive().default(5433),
})

export const connectionSchema = z.discriminatedUnion("kind", [
	sqliteConnectionSchema,
	postgresConnectionSchema,
	verticaConnectionSchema,
])

export const configSchema = z.object({
	active_connection: z.string().optional(),
	connections: z.array(connectionSchema).default([]),
	model: z
		.object({
			ollama_url: z.string().url().default("http://localhost:11434"),
			llm: z.string().default("qwen2.5-coder:7b"),
			timeout_ms: z.number().int().positive().default(30000),
			temperature: z.number().min(0).max(2).default(0.1),
		})
		.default({}),
	pipeline: z
		.object({
			retry_budget: z.number().int().min(0).default(3),
			execute_timeout_ms: z.number().int().positive().default(30000),
			max_rows: z.number().int().positive().default(1000),
		})
		.default({}),
	autocorrect: z
		.object({
			acceptance_threshold: z.number().min(0).max(1).default(0.85),
			min_candidate_score: z.number().min(0).max(1).default(0.5),
			min_token_length: z.number().int().min(1).default(3),
			history_boost: z.number().min(0).max(1).default(0.05),
			history_boost_cap: z.number().min(0).max(1).default(0.15),
			fail_on_ambiguity: z.boolean().default(false),
		})
		.default({}),
	knowledge_base: z
		.object({
			cardinality_threshold: z.number().int().positive().default(500),
			entity_column_pattern: z
				.string()
				.default("name|city|country|state|region|title|artist|album|company|customer|product|brand|genre|category|first|last|surname"),
		})
		.default({}),
	logging: z
		.object({
			level: z.enum(["debug", "info", "warn", "error"]).default("info"),
		})
		.default({}),
})

export type QueryMendConfig = z.infer<typeof configSchema>
export type AutocorrectConfig = QueryMendConfig["autocorrect"]
export type KnowledgeBaseConfig = QueryMendConfig["knowledge_base"]
export type PipelineConfig = QueryMendConfig["pipeline"]
export type ModelConfig = QueryMendConfig["model"]

type RawDocument = Record<string, unknown>

// ── YAML Loading ─────────────────────────────────────────────────────

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function isRecord(value: unknown): value is RawDocument {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function loadYaml(filePath: string): RawDocument {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	let parsed: unknown
	try {
		parsed = yaml.load(raw)
	} catch (err) {
		throw new ConfigError(`Invalid YAML in ${filePath}: ${err instanceof Error ? err.message : String(err)}`)
	}
	if (parsed === undefined || parsed === null) return {}
	if (!isRecord(parsed)) {
		throw new ConfigError(`${filePath} must contain a mapping at the top level`)
	}
	return parsed
}

/** Deep merge b into a (b wins on conflicts; arrays are replaced). */
export function deepMerge(a: RawDocument, b: RawDocument): RawDocument {
	const result: RawDocument = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(left) && isRecord(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

function env(name: string): string | undefined {
	return process.env[name]
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(doc: RawDocument, key: string): RawDocument {
	const existing = doc[key]
	if (isRecord(existing)) return existing
	const created: RawDocument = {}
	doc[key] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: RawDocument): void {
	cfg.active_connection = env("ACTIVE_CONNECTION") ?? cfg.active_connection

	const m = section(cfg, "model")
	m.ollama_url = env("OLLAMA_BASE_URL") ?? m.ollama_url
	m.llm = env("OLLAMA_MODEL") ?? m.llm
	m.timeout_ms = envInt("OLLAMA_TIMEOUT_MS") ?? m.timeout_ms

	const p = section(cfg, "pipeline")
	p.retry_budget = envInt("RETRY_BUDGET") ?? p.retry_budget
	p.execute_timeout_ms = envInt("EXECUTE_TIMEOUT_MS") ?? p.execute_timeout_ms
	p.max_rows = envInt("MAX_ROWS") ?? p.max_rows

	const a = section(cfg, "autocorrect")
	a.acceptance_threshold = envFloat("AUTOCORRECT_THRESHOLD") ?? a.acceptance_threshold

	const k = section(cfg, "knowledge_base")
	k.cardinality_threshold = envInt("CARDINALITY_THRESHOLD") ?? k.cardinality_threshold

	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL") ?? l.level
}

/** Validate a raw document, converting zod issues into a ConfigError. */
export function parseConfig(doc: unknown): QueryMendConfig {
	const result = configSchema.safeParse(doc)
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
			.join("; ")
		throw new ConfigError(`Invalid configuration: ${details}`, { issues: result.error.issues.length })
	}
	const names = new Set<string>()
	for (const conn of result.data.connections) {
		if (names.has(conn.name)) {
			throw new ConfigError(`Duplicate connection name '${conn.name}'`)
		}
		names.add(conn.name)
	}
	return result.data
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: QueryMendConfig | null = null

export function loadConfig(): QueryMendConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: RawDocument = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	const parsed = parseConfig(merged)
	_config = configDir ? resolveDatabasePaths(parsed, path.dirname(configDir)) : parsed
	return _config
}

/**
 * Relative SQLite paths name files under the project root (the directory
 * holding config/), wherever the process was started from.
 */
function resolveDatabasePaths(config: QueryMendConfig, root: string): QueryMendConfig {
	return {
		...config,
		connections: config.connections.map((conn) =>
			conn.kind === "sqlite" && conn.database !== ":memory:" && !path.isAbsolute(conn.database)
				? { ...conn, database: path.resolve(root, conn.database) }
				: conn,
		),
	}
}

export function getConfig(): QueryMendConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
