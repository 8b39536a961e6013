#!/usr/bin/env node
/**
 * Stdio entry point for the querymend MCP server
 *
 * Config comes from config/config.yaml (+ config.local.yaml, + env), see
 * config/loadConfig.ts. The connection named by active_connection is
 * activated before the transport opens; a failure there is logged and the
 * server starts without an active database.
 *
 * Usage:
 *   node dist/stdio.js
 *   ACTIVE_CONNECTION=warehouse LOG_LEVEL=debug node dist/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import createServer from "./index.js"
import { loadConfig } from "./config/loadConfig.js"
import { createQueryService } from "./query_service.js"
import { createLogger } from "./logger.js"
import { errorMessage } from "./errors.js"

async function main() {
	const config = loadConfig()
	// stdout is reserved for the MCP protocol; the logger writes to stderr
	const logger = createLogger(config.logging.level)

	logger.info("Starting querymend MCP server with stdio transport", {
		connections: config.connections.map((c) => c.name),
		model: config.model.llm,
	})

	const service = createQueryService(config, logger)
	if (config.active_connection) {
		const result = await service.switchDatabase(config.active_connection)
		if (!result.ok) {
			logger.error("Could not activate the configured connection", {
				name: config.active_connection,
				error: result.error.message,
			})
		}
	}

	const server = createServer({ config, logger, service })
	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("querymend MCP server running via stdio")

	const shutdown = (signal: string) => {
		logger.info("Shutting down...", { signal })
		server
			.close()
			.then(() => service.close())
			.then(
				() => process.exit(0),
				(error: unknown) => {
					logger.error("Shutdown failed", { error: errorMessage(error) })
					process.exit(1)
				},
			)
	}

	process.on("SIGINT", () => shutdown("SIGINT"))
	process.on("SIGTERM", () => shutdown("SIGTERM"))
}

main().catch((error: unknown) => {
	console.error("[ERROR] Fatal error:", errorMessage(error))
	process.exit(1)
})
