/**
 * querymend MCP server
 *
 * Publishes QueryService as MCP tools:
 * - run_query: natural-language question → corrected, validated, executed SQL
 * - list_databases / validate_database / switch_database / current_database
 * - correction_report: most frequent accepted autocorrections
 *
 * Every tool answers with one JSON text block; failures set isError.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js"
import { z } from "zod"
import type { QueryMendConfig } from "./config/loadConfig.js"
import type { Logger } from "./logger.js"
import { createQueryService, type QueryService } from "./query_service.js"

export const SERVER_NAME = "querymend"
export const SERVER_VERSION = "0.1.0"

export interface ServerOptions {
	config: QueryMendConfig
	logger: Logger
	/** Defaults to a service built from `config` */
	service?: QueryService
}

function jsonResult(value: unknown, isError: boolean = false): CallToolResult {
	return {
		content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
		...(isError ? { isError } : {}),
	}
}

export default function createServer({ config, logger, service: provided }: ServerOptions): McpServer {
	const service = provided ?? createQueryService(config, logger)
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	server.tool(
		"run_query",
		"Answer a natural-language question with SQL against the active database. " +
			"Misspelled names are corrected from the database's own values; failed SQL is diagnosed and regenerated.",
		{
			query: z.string().min(1).describe("Question in plain language, e.g. 'Invoices of Steve Murray in 2021'"),
		},
		async ({ query }, extra) => {
			logger.info("run_query", { length: query.length })
			const summary = await service.runQuery(query, extra.signal)
			return jsonResult(summary, summary.status === "failed")
		},
	)

	server.tool("list_databases", "List configured database connections with their kind and state.", async () => {
		return jsonResult(service.listDatabases())
	})

	server.tool(
		"validate_database",
		"Check a configured connection: reachability, table count, size estimate and sample row counts.",
		{ name: z.string().min(1).describe("Connection name") },
		async ({ name }) => {
			const verdict = await service.validateDatabase(name)
			return jsonResult(verdict, !verdict.valid)
		},
	)

	server.tool(
		"switch_database",
		"Make a configured connection the active database. On failure the previous database stays active.",
		{ name: z.string().min(1).describe("Connection name") },
		async ({ name }) => {
			logger.info("switch_database", { name })
			const result = await service.switchDatabase(name)
			return jsonResult(result, !result.ok)
		},
	)

	server.tool("current_database", "Name, kind and schema version of the active database, or null.", async () => {
		return jsonResult(service.currentDatabase())
	})

	server.tool(
		"correction_report",
		"Most frequent autocorrections accepted so far.",
		{ limit: z.number().int().positive().max(100).optional().describe("Maximum patterns (default 10)") },
		async ({ limit }) => {
			return jsonResult(service.correctionReport(limit))
		},
	)

	return server
}
