/**
 * Language Model Capability
 *
 * The pipeline only sees ModelCapability. OllamaModelClient implements it
 * over Ollama's /api/generate endpoint. Every failure (HTTP status,
 * network, timeout, unreadable output) surfaces as ModelUnavailableError.
 */

import { z } from "zod"
import type { ModelConfig } from "./config/loadConfig.js"
import type { Diagnosis } from "./error_analysis.js"
import { CancelledError, ModelUnavailableError, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"

// ============================================================================
// Types
// ============================================================================

export type IntentKind = "lookup" | "aggregate" | "relational" | "unsupported"

export interface IntentResult {
	intent: IntentKind
	/** 0.0 - 1.0 */
	confidence: number
}

/** One failed attempt fed back into generation */
export interface GenerationTurn {
	sql: string
	diagnosis: Diagnosis
}

export interface ModelCapability {
	classifyIntent(query: string, schema: string, signal?: AbortSignal): Promise<IntentResult>
	generateSQL(prompt: string, schema: string, history: GenerationTurn[], signal?: AbortSignal): Promise<string>
	diagnoseError(sql: string, error: string, schema: string, signal?: AbortSignal): Promise<string>
}

const generateResponseSchema = z.object({
	response: z.string(),
})

const intentSchema = z.object({
	intent: z.enum(["lookup", "aggregate", "relational", "unsupported"]),
	confidence: z.coerce.number().min(0).max(1).catch(0.5),
})

/** Longest model diagnosis kept */
const MAX_DIAGNOSIS_LENGTH = 500

// ============================================================================
// Response Cleaning
// ============================================================================

/**
 * Strip code fences and "SQL:"-style labels; end with exactly one semicolon
 */
export function cleanSqlResponse(text: string): string {
	let sql = text.replace(/```[a-zA-Z]*/g, "")
	sql = sql.replace(/^\s*(?:SQLQuery|SQL|Query)\s*:\s*/gim, "")
	sql = sql.trim().replace(/[;\s]+$/, "")
	return sql ? `${sql};` : ""
}

// ============================================================================
// Prompts
// ============================================================================

function intentPrompt(query: string, schema: string): string {
	return [
		"Classify the question against the database schema below.",
		'Answer with JSON only: {"intent": "lookup" | "aggregate" | "relational" | "unsupported", "confidence": 0.0-1.0}',
		"- lookup: rows filtered from one table",
		"- aggregate: counts, sums, averages, rankings",
		"- relational: needs joins across tables",
		"- unsupported: cannot be answered from this schema, or asks to change data",
		"",
		"Schema:",
		schema,
		"",
		`Question: ${query}`,
	].join("\n")
}

function generationPrompt(prompt: string, schema: string, history: GenerationTurn[]): string {
	const lines = [
		"Write one read-only SQL SELECT statement that answers the request.",
		"Use only the tables and columns in the schema. Return only the SQL, ending with a semicolon.",
		"",
		"Schema:",
		schema,
		"",
		prompt,
	]
	if (history.length > 0) {
		lines.push("", "Previous attempts failed:")
		history.forEach((turn, i) => {
			lines.push(
				`--- Attempt ${i + 1} ---`,
				turn.sql,
				`Problem (${turn.diagnosis.category}): ${turn.diagnosis.message}`,
				`Hint: ${turn.diagnosis.hint}`,
			)
			if (turn.diagnosis.model_hint) lines.push(`Analysis: ${turn.diagnosis.model_hint}`)
		})
		lines.push("", "Write a corrected query that differs from every failed attempt.")
	}
	return lines.join("\n")
}

function diagnosisPrompt(sql: string, error: string, schema: string): string {
	return [
		"This SQL failed. In one or two sentences, say what is wrong and how to fix it.",
		"",
		"Schema:",
		schema,
		"",
		"SQL:",
		sql,
		"",
		`Error: ${error}`,
	].join("\n")
}

// ============================================================================
// Ollama Client
// ============================================================================

export class OllamaModelClient implements ModelCapability {
	private baseUrl: string

	constructor(
		private readonly config: ModelConfig,
		private readonly logger: Logger,
	) {
		this.baseUrl = config.ollama_url.replace(/\/+$/, "")
	}

	async classifyIntent(query: string, schema: string, signal?: AbortSignal): Promise<IntentResult> {
		const text = await this.generate(intentPrompt(query, schema), "intent", signal, true)
		let raw: unknown
		try {
			raw = JSON.parse(text)
		} catch {
			throw new ModelUnavailableError("Model returned an unreadable intent", { response: text.slice(0, 200) })
		}
		const parsed = intentSchema.safeParse(raw)
		if (!parsed.success) {
			throw new ModelUnavailableError("Model returned an unreadable intent", { response: text.slice(0, 200) })
		}
		return parsed.data
	}

	async generateSQL(prompt: string, schema: string, history: GenerationTurn[], signal?: AbortSignal): Promise<string> {
		const text = await this.generate(generationPrompt(prompt, schema, history), "generate_sql", signal)
		const sql = cleanSqlResponse(text)
		if (!sql) {
			throw new ModelUnavailableError("Model returned no SQL")
		}
		return sql
	}

	async diagnoseError(sql: string, error: string, schema: string, signal?: AbortSignal): Promise<string> {
		const text = await this.generate(diagnosisPrompt(sql, error, schema), "diagnose_error", signal)
		return text.trim().slice(0, MAX_DIAGNOSIS_LENGTH)
	}

	/**
	 * POST /api/generate with a timeout; returns the response text
	 */
	private async generate(prompt: string, operation: string, signal?: AbortSignal, json: boolean = false): Promise<string> {
		const url = `${this.baseUrl}/api/generate`
		const timeout = this.config.timeout_ms
		const startTime = Date.now()

		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), timeout)
		const onAbort = () => controller.abort()
		signal?.addEventListener("abort", onAbort, { once: true })

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					Accept: "application/json",
				},
				body: JSON.stringify({
					model: this.config.llm,
					prompt,
					stream: false,
					...(json ? { format: "json" } : {}),
					options: { temperature: this.config.temperature },
				}),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new ModelUnavailableError(`Model server returned ${response.status}: ${errorText.slice(0, 200)}`, {
					operation,
					status: response.status,
				})
			}

			const parsed = generateResponseSchema.safeParse(await response.json())
			if (!parsed.success) {
				throw new ModelUnavailableError("Model server returned an unexpected response", { operation })
			}

			this.logger.debug("Model call complete", {
				operation,
				model: this.config.llm,
				latency_ms: Date.now() - startTime,
			})
			return parsed.data.response
		} catch (error) {
			if (error instanceof ModelUnavailableError) throw error

			if (signal?.aborted) {
				throw new CancelledError(operation)
			}
			if (error instanceof Error && error.name === "AbortError") {
				throw new ModelUnavailableError(`Model request timed out after ${timeout}ms`, { operation, timeout_ms: timeout })
			}
			throw new ModelUnavailableError(`Cannot reach model server at ${this.baseUrl}: ${errorMessage(error)}`, {
				operation,
			})
		} finally {
			clearTimeout(timeoutId)
			signal?.removeEventListener("abort", onAbort)
		}
	}
}
