import { connectionSchema } from "../config/loadConfig.js"
import { ConfigError } from "../errors.js"
import type { ConnectionParams } from "../schema_types.js"

/**
 * Validate connection parameters before any network or file access
 */
export function parseConnectionParams(params: unknown): ConnectionParams {
	const result = connectionSchema.safeParse(params)
	if (!result.success) {
		const details = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ")
		throw new ConfigError(`Malformed connection parameters: ${details}`)
	}
	return result.data
}
