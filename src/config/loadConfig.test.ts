import { describe, it, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as path from "path"
import * as os from "os"
import { loadConfig, resetConfig, getConfig, parseConfig, deepMerge } from "./loadConfig.js"
import { ConfigError } from "../errors.js"

/**
 * Tests for the unified config loader.
 *
 * Strategy: create a temp directory with config/config.yaml (and optionally
 * config.local.yaml), chdir into it, and verify loadConfig() reads the right
 * values. Env-var overrides are tested by setting process.env before loading.
 */

let tmpDir: string
let originalCwd: string
const savedEnv: Record<string, string | undefined> = {}

// Env vars that the loader reads; saved/restored between tests
const ENV_VARS = [
	"ACTIVE_CONNECTION", "OLLAMA_BASE_URL", "OLLAMA_MODEL", "OLLAMA_TIMEOUT_MS",
	"RETRY_BUDGET", "EXECUTE_TIMEOUT_MS", "MAX_ROWS",
	"AUTOCORRECT_THRESHOLD", "CARDINALITY_THRESHOLD", "LOG_LEVEL",
]

function writeYaml(dir: string, filename: string, content: string) {
	const configDir = path.join(dir, "config")
	fs.mkdirSync(configDir, { recursive: true })
	fs.writeFileSync(path.join(configDir, filename), content)
}

beforeEach(() => {
	resetConfig()
	for (const v of ENV_VARS) {
		savedEnv[v] = process.env[v]
		delete process.env[v]
	}
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "querymend-config-test-"))
	originalCwd = process.cwd()
	process.chdir(tmpDir)
})

afterEach(() => {
	process.chdir(originalCwd)
	fs.rmSync(tmpDir, { recursive: true, force: true })
	for (const v of ENV_VARS) {
		if (savedEnv[v] === undefined) {
			delete process.env[v]
		} else {
			process.env[v] = savedEnv[v]
		}
	}
	resetConfig()
})

// ── Basic Loading ─────────────────────────────────────────────────────

describe("loadConfig: basic YAML loading", () => {
	it("loads values from config/config.yaml", () => {
		writeYaml(tmpDir, "config.yaml", `
active_connection: shop
connections:
  - name: shop
    kind: sqlite
    database: ./shop.sqlite
  - name: dwh
    kind: postgresql
    host: db.internal
    database: dwh
    user: reader
    password: test-secret
  - name: events
    kind: vertica
    host: vert.internal
    database: events
    schema: analytics
    user: reader
model:
  llm: "llama3.1:8b"
  timeout_ms: 5000
pipeline:
  retry_budget: 2
  max_rows: 50
autocorrect:
  acceptance_threshold: 0.9
  fail_on_ambiguity: true
knowledge_base:
  cardinality_threshold: 100
logging:
  level: debug
`)
		const cfg = loadConfig()

		expect(cfg.active_connection).toBe("shop")
		expect(cfg.connections.map((c) => c.name)).toEqual(["shop", "dwh", "events"])

		const dwh = cfg.connections[1]
		expect(dwh.kind).toBe("postgresql")
		if (dwh.kind === "postgresql") {
			expect(dwh.port).toBe(5432)
			expect(dwh.schema).toBe("public")
			expect(dwh.password).toBe("test-secret")
		}
		const events = cfg.connections[2]
		if (events.kind === "vertica") {
			expect(events.port).toBe(5433)
			expect(events.schema).toBe("analytics")
			expect(events.password).toBe("")
		}

		expect(cfg.model.llm).toBe("llama3.1:8b")
		expect(cfg.model.timeout_ms).toBe(5000)
		expect(cfg.pipeline.retry_budget).toBe(2)
		expect(cfg.pipeline.max_rows).toBe(50)
		expect(cfg.pipeline.execute_timeout_ms).toBe(30000)
		expect(cfg.autocorrect.acceptance_threshold).toBe(0.9)
		expect(cfg.autocorrect.fail_on_ambiguity).toBe(true)
		expect(cfg.knowledge_base.cardinality_threshold).toBe(100)
		expect(cfg.logging.level).toBe("debug")
	})

	it("resolves relative SQLite paths against the project root", () => {
		writeYaml(tmpDir, "config.yaml", `
connections:
  - name: shop
    kind: sqlite
    database: ./data/shop.sqlite
  - name: scratch
    kind: sqlite
    database: ":memory:"
  - name: archive
    kind: sqlite
    database: /srv/archive.sqlite
`)
		const nested = path.join(tmpDir, "work", "deeper")
		fs.mkdirSync(nested, { recursive: true })
		process.chdir(nested)

		const cfg = loadConfig()
		const root = fs.realpathSync(tmpDir)
		expect(cfg.connections.map((c) => c.database)).toEqual([
			path.join(root, "data", "shop.sqlite"),
			":memory:",
			"/srv/archive.sqlite",
		])
	})

	it("returns defaults when no config directory exists", () => {
		const cfg = loadConfig()
		expect(cfg.connections).toEqual([])
		expect(cfg.active_connection).toBeUndefined()
		expect(cfg.pipeline.retry_budget).toBe(3)
		expect(cfg.autocorrect.acceptance_threshold).toBe(0.85)
		expect(cfg.knowledge_base.cardinality_threshold).toBe(500)
	})

	it("is a singleton; second call returns same object", () => {
		writeYaml(tmpDir, "config.yaml", "active_connection: one\n")
		const a = loadConfig()
		const b = loadConfig()
		expect(a).toBe(b)
	})

	it("resetConfig clears the singleton", () => {
		writeYaml(tmpDir, "config.yaml", "active_connection: one\n")
		const a = loadConfig()
		resetConfig()
		writeYaml(tmpDir, "config.yaml", "active_connection: two\n")
		const b = loadConfig()
		expect(a.active_connection).toBe("one")
		expect(b.active_connection).toBe("two")
	})

	it("getConfig() auto-loads if not loaded", () => {
		writeYaml(tmpDir, "config.yaml", "active_connection: autoload\n")
		expect(getConfig().active_connection).toBe("autoload")
	})
})

// ── Deep Merge (config.local.yaml overrides) ──────────────────────────

describe("loadConfig: config.local.yaml overlay", () => {
	it("local YAML overrides nested values without clobbering siblings", () => {
		writeYaml(tmpDir, "config.yaml", `
pipeline:
  retry_budget: 3
  max_rows: 200
model:
  llm: "base-model"
`)
		writeYaml(tmpDir, "config.local.yaml", `
pipeline:
  max_rows: 20
`)
		const cfg = loadConfig()
		expect(cfg.pipeline.max_rows).toBe(20)
		expect(cfg.pipeline.retry_budget).toBe(3)
		expect(cfg.model.llm).toBe("base-model")
	})

	it("local connections list replaces the base list", () => {
		writeYaml(tmpDir, "config.yaml", `
connections:
  - name: a
    kind: sqlite
    database: a.sqlite
  - name: b
    kind: sqlite
    database: b.sqlite
`)
		writeYaml(tmpDir, "config.local.yaml", `
connections:
  - name: c
    kind: sqlite
    database: c.sqlite
`)
		expect(loadConfig().connections.map((c) => c.name)).toEqual(["c"])
	})
})

// ── Env-Var Overrides ─────────────────────────────────────────────────

describe("loadConfig: env-var overrides", () => {
	it("env vars override YAML values", () => {
		writeYaml(tmpDir, "config.yaml", `
active_connection: yaml_conn
model:
  llm: "yaml-model"
pipeline:
  retry_budget: 1
`)
		process.env.ACTIVE_CONNECTION = "env_conn"
		process.env.OLLAMA_MODEL = "env-model"
		process.env.RETRY_BUDGET = "5"
		process.env.AUTOCORRECT_THRESHOLD = "0.75"
		process.env.LOG_LEVEL = "warn"

		const cfg = loadConfig()
		expect(cfg.active_connection).toBe("env_conn")
		expect(cfg.model.llm).toBe("env-model")
		expect(cfg.pipeline.retry_budget).toBe(5)
		expect(cfg.autocorrect.acceptance_threshold).toBe(0.75)
		expect(cfg.logging.level).toBe("warn")
	})

	it("non-numeric env values are ignored", () => {
		writeYaml(tmpDir, "config.yaml", "pipeline:\n  max_rows: 40\n")
		process.env.MAX_ROWS = "lots"
		expect(loadConfig().pipeline.max_rows).toBe(40)
	})

	it("an invalid LOG_LEVEL is rejected", () => {
		process.env.LOG_LEVEL = "chatty"
		expect(() => loadConfig()).toThrow(ConfigError)
	})
})

// ── Validation ────────────────────────────────────────────────────────

describe("parseConfig", () => {
	it("rejects a connection with an unknown kind", () => {
		expect(() =>
			parseConfig({ connections: [{ name: "x", kind: "oracle", database: "x" }] }),
		).toThrow(ConfigError)
	})

	it("rejects a server connection without a host", () => {
		expect(() =>
			parseConfig({ connections: [{ name: "x", kind: "postgresql", database: "d", user: "u" }] }),
		).toThrow(/connections\.0\.host/)
	})

	it("rejects duplicate connection names", () => {
		expect(() =>
			parseConfig({
				connections: [
					{ name: "dup", kind: "sqlite", database: "a.sqlite" },
					{ name: "dup", kind: "sqlite", database: "b.sqlite" },
				],
			}),
		).toThrow("Duplicate connection name 'dup'")
	})

	it("rejects malformed YAML", () => {
		writeYaml(tmpDir, "config.yaml", "pipeline: [unclosed\n")
		expect(() => loadConfig()).toThrow(/Invalid YAML/)
	})
})

describe("deepMerge", () => {
	it("merges nested records and replaces scalars and arrays", () => {
		const merged = deepMerge(
			{ a: { x: 1, y: 2 }, list: [1, 2], s: "base" },
			{ a: { y: 3 }, list: [9], s: "local" },
		)
		expect(merged).toEqual({ a: { x: 1, y: 3 }, list: [9], s: "local" })
	})
})
