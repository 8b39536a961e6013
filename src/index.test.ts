import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { Client } from "@modelcontextprotocol/sdk/client/index.js"
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js"
import { z } from "zod"
import createServer from "./index.js"
import { parseConfig } from "./config/loadConfig.js"
import { CorrectionHistory } from "./correction_history.js"
import { createQueryService } from "./query_service.js"
import { silentLogger } from "./logger.js"
import { FakeAdapter, FakeModel } from "./test_support.js"

const toolResultSchema = z.object({
	content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
	isError: z.boolean().optional(),
})

/** Parsed JSON payload and error flag of a tool result */
function payloadOf(result: unknown): { value: unknown; isError: boolean } {
	const parsed = toolResultSchema.parse(result)
	return { value: JSON.parse(parsed.content[0]?.text ?? "null"), isError: parsed.isError ?? false }
}

describe("MCP server", () => {
	const config = parseConfig({ connections: [{ name: "chinook", kind: "sqlite", database: ":memory:" }] })
	let client: Client
	let close: () => Promise<void>

	beforeEach(async () => {
		const service = createQueryService(config, silentLogger, {
			model: new FakeModel(["SELECT name FROM artists;"]),
			adapterFactory: (kind) => new FakeAdapter(kind, () => ({ columns: ["name"], rows: [["AC/DC"]] })),
			history: new CorrectionHistory(),
		})
		const server = createServer({ config, logger: silentLogger, service })
		const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
		client = new Client({ name: "test-client", version: "1.0.0" })
		await Promise.all([server.connect(serverTransport), client.connect(clientTransport)])
		close = async () => {
			await client.close()
			await server.close()
		}
	})

	afterEach(async () => {
		await close()
	})

	it("publishes the query and database tools", async () => {
		const { tools } = await client.listTools()
		expect(tools.map((t) => t.name).sort()).toEqual([
			"correction_report",
			"current_database",
			"list_databases",
			"run_query",
			"switch_database",
			"validate_database",
		])
	})

	it("switches databases and runs queries", async () => {
		expect(payloadOf(await client.callTool({ name: "current_database", arguments: {} })).value).toBeNull()

		const switched = payloadOf(await client.callTool({ name: "switch_database", arguments: { name: "chinook" } }))
		expect(switched).toEqual({
			value: { ok: true, database: { name: "chinook", kind: "sqlite", version: 1 } },
			isError: false,
		})

		const run = payloadOf(await client.callTool({ name: "run_query", arguments: { query: "Show artists" } }))
		expect(run.isError).toBe(false)
		expect(run.value).toMatchObject({
			status: "success",
			sql: "SELECT name FROM artists;",
			columns: ["name"],
			rows: [["AC/DC"]],
		})

		const listed = payloadOf(await client.callTool({ name: "list_databases", arguments: {} }))
		expect(listed.value).toEqual([{ name: "chinook", kind: "sqlite", state: "active" }])
	})

	it("flags failures as tool errors", async () => {
		const switched = payloadOf(await client.callTool({ name: "switch_database", arguments: { name: "nowhere" } }))
		expect(switched).toEqual({
			value: { ok: false, error: { kind: "config", message: "Unknown connection 'nowhere'" } },
			isError: true,
		})

		const run = payloadOf(await client.callTool({ name: "run_query", arguments: { query: "Show artists" } }))
		expect(run.isError).toBe(true)
		expect(run.value).toMatchObject({ status: "failed", error: { kind: "connection" } })

		const verdict = payloadOf(await client.callTool({ name: "validate_database", arguments: { name: "nowhere" } }))
		expect(verdict).toEqual({ value: { valid: false, error: "Unknown connection 'nowhere'" }, isError: true })
	})
})
