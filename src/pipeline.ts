/**
 * Query Correction Pipeline
 *
 * INTENT → ENTITIES → AUTOCORRECT → GENERATE_SQL → VALIDATE → EXECUTE
 *   → SUCCESS
 *   → ANALYZE_ERROR → REFINE → GENERATE_SQL (bounded by the retry budget)
 *
 * Every stage result is appended, frozen, to the run's log. Before each
 * transition the run checks for cancellation and for a database switch
 * (the session version it captured is no longer current).
 *
 * Terminal errors (connection, model, stale context, cancellation,
 * ambiguous correction) end the run immediately; everything else becomes
 * a diagnosis that feeds the next generation.
 */

import { v4 as uuidv4 } from "uuid"
import type { AutocorrectConfig, PipelineConfig } from "./config/loadConfig.js"
import type { CorrectionHistory } from "./correction_history.js"
import { EntityAutocorrector, type AmbiguousToken } from "./entity_autocorrect.js"
import { extractEntities, type EntityMap } from "./entity_extractor.js"
import { analyzeError, repeatDiagnosis, type Diagnosis } from "./error_analysis.js"
import { CancelledError, QueryMendError, StaleContextError, type ErrorKind } from "./errors.js"
import { renderSchema } from "./knowledge_base.js"
import type { Logger } from "./logger.js"
import type { GenerationTurn, IntentResult, ModelCapability } from "./model_client.js"
import type { CorrectionCandidate, QueryResult } from "./schema_types.js"
import type { SessionContext } from "./session_manager.js"
import { validateSql } from "./sql_validator.js"

// ============================================================================
// Stage Results
// ============================================================================

export type StageResult =
	| { stage: "intent"; intent: IntentResult }
	| { stage: "entities"; entities: EntityMap }
	| {
			stage: "autocorrect"
			query: string
			entities: EntityMap
			applied: CorrectionCandidate[]
			rejected: CorrectionCandidate[]
			ambiguous: AmbiguousToken[]
	  }
	| { stage: "generate_sql"; attempt: number; sql: string }
	| { stage: "validate"; attempt: number; valid: boolean; error?: string }
	| { stage: "execute"; attempt: number; ok: true; row_count: number; truncated: boolean }
	| { stage: "execute"; attempt: number; ok: false; error: string }
	| { stage: "analyze_error"; attempt: number; diagnosis: Diagnosis }
	| { stage: "refine"; retries: number }
	| { stage: "success"; sql: string; row_count: number }
	| { stage: "unsupported"; reason: string }
	| { stage: "failed"; reason: string; error_kind: ErrorKind | null }

export type StageName = StageResult["stage"]

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value)
		for (const child of Object.values(value)) deepFreeze(child)
	}
	return value
}

/**
 * Append-only log of one request
 */
export class PipelineRun {
	readonly id = uuidv4()
	private readonly entries: StageResult[] = []

	constructor(
		readonly query: string,
		readonly version: number,
	) {}

	append(result: StageResult): StageResult {
		const frozen = deepFreeze(structuredClone(result))
		this.entries.push(frozen)
		return frozen
	}

	get stages(): readonly StageResult[] {
		return this.entries
	}

	/** Number of GENERATE_SQL passes, including those diagnosed as repeats */
	get attempts(): number {
		let attempts = 0
		for (const entry of this.entries) {
			if (entry.stage === "generate_sql") attempts++
			if (entry.stage === "analyze_error" && entry.diagnosis.category === "repeat") attempts++
		}
		return attempts
	}
}

// ============================================================================
// Outcome
// ============================================================================

interface OutcomeBase {
	run_id: string
	query: string
	/** Query after autocorrection (equal to query when nothing changed) */
	corrected_query: string
	intent: IntentResult | null
	corrections: CorrectionCandidate[]
	ambiguities: AmbiguousToken[]
	attempts: number
	schema_version: number
	stages: readonly StageResult[]
}

export type PipelineOutcome =
	| (OutcomeBase & { status: "success"; sql: string; result: QueryResult })
	| (OutcomeBase & { status: "unsupported"; reason: string })
	| (OutcomeBase & {
			status: "failed"
			/** Last SQL attempted, if any */
			sql: string | null
			reason: string
			diagnosis: Diagnosis | null
			error_kind: ErrorKind | null
	  })

export interface PipelineOptions {
	pipeline: Pick<PipelineConfig, "retry_budget" | "execute_timeout_ms" | "max_rows">
	autocorrect: Pick<
		AutocorrectConfig,
		"acceptance_threshold" | "min_token_length" | "history_boost" | "history_boost_cap" | "fail_on_ambiguity"
	>
}

export interface RunOptions {
	signal?: AbortSignal
	/** Active session version; a difference from the captured one ends the run */
	currentVersion?: () => number
}

/**
 * Collapse whitespace and drop trailing semicolons
 */
export function normalizeSql(sql: string): string {
	return sql.replace(/\s+/g, " ").trim().replace(/[;\s]+$/, "")
}

// ============================================================================
// Pipeline
// ============================================================================

export class QueryPipeline {
	constructor(
		private readonly model: ModelCapability,
		private readonly history: CorrectionHistory,
		private readonly options: PipelineOptions,
		private readonly logger: Logger,
	) {}

	async run(query: string, session: SessionContext, runOptions: RunOptions = {}): Promise<PipelineOutcome> {
		const run = new PipelineRun(query, session.version)
		const state: RunState = {
			correctedQuery: query,
			intent: null,
			corrections: [],
			ambiguities: [],
			lastSql: null,
			lastDiagnosis: null,
		}
		const base = (): OutcomeBase => ({
			run_id: run.id,
			query,
			corrected_query: state.correctedQuery,
			intent: state.intent,
			corrections: state.corrections,
			ambiguities: state.ambiguities,
			attempts: run.attempts,
			schema_version: session.version,
			stages: run.stages,
		})

		this.logger.info("Run started", { run_id: run.id, connection: session.name, version: session.version })

		try {
			return await this.execute(query, session, runOptions, run, state, base)
		} catch (err) {
			if (!(err instanceof QueryMendError)) throw err

			run.append({ stage: "failed", reason: err.message, error_kind: err.kind })
			this.logger.warn("Run aborted", { run_id: run.id, kind: err.kind, error: err.message })
			return {
				...base(),
				status: "failed",
				sql: state.lastSql,
				reason: err.message,
				diagnosis: state.lastDiagnosis,
				error_kind: err.kind,
			}
		}
	}

	private async execute(
		query: string,
		session: SessionContext,
		runOptions: RunOptions,
		run: PipelineRun,
		state: RunState,
		base: () => OutcomeBase,
	): Promise<PipelineOutcome> {
		const { signal } = runOptions
		const currentVersion = runOptions.currentVersion ?? (() => session.version)
		const { kb, adapter } = session
		const schemaText = renderSchema(kb.snapshot)
		const budget = this.options.pipeline.retry_budget

		const checkpoint = (next: StageName) => {
			if (signal?.aborted) throw new CancelledError(next)
			const active = currentVersion()
			if (active !== session.version) throw new StaleContextError(session.version, active)
			kb.assertVersion(session.version)
		}

		// INTENT
		checkpoint("intent")
		const intent = await this.model.classifyIntent(query, schemaText, signal)
		state.intent = intent
		run.append({ stage: "intent", intent })
		if (intent.intent === "unsupported") {
			const reason = "This question cannot be answered from the active database"
			run.append({ stage: "unsupported", reason })
			this.logger.info("Run ended: unsupported intent", { run_id: run.id, confidence: intent.confidence })
			return { ...base(), status: "unsupported", reason }
		}

		// ENTITIES
		checkpoint("entities")
		const entities = extractEntities(query, kb)
		run.append({ stage: "entities", entities })

		// AUTOCORRECT
		checkpoint("autocorrect")
		const autocorrector = new EntityAutocorrector(kb, this.history, this.options.autocorrect, this.logger)
		const corrected = await autocorrector.correct(query, entities)
		state.correctedQuery = corrected.query
		state.corrections = corrected.applied
		state.ambiguities = corrected.ambiguous
		run.append({ stage: "autocorrect", ...corrected })

		const prompt = buildPrompt(corrected.query, corrected.entities, intent)
		const turns: GenerationTurn[] = []
		let attempt = 0
		let retries = 0

		while (true) {
			// GENERATE_SQL
			checkpoint("generate_sql")
			const sql = await this.model.generateSQL(prompt, schemaText, turns, signal)
			attempt++

			let diagnosis: Diagnosis
			if (state.lastSql !== null && normalizeSql(sql) === normalizeSql(state.lastSql)) {
				diagnosis = repeatDiagnosis(state.lastDiagnosis)
				run.append({ stage: "analyze_error", attempt, diagnosis })
				this.logger.info("Generated SQL repeats the previous attempt", { run_id: run.id, attempt })
			} else {
				run.append({ stage: "generate_sql", attempt, sql })
				state.lastSql = sql

				// VALIDATE
				checkpoint("validate")
				const verdict = validateSql(sql, kb.snapshot, {
					identifiersCaseSensitive: adapter.dialect.identifiersCaseSensitive,
				})
				let failure: QueryMendError
				if (verdict.valid) {
					run.append({ stage: "validate", attempt, valid: true })

					// EXECUTE
					checkpoint("execute")
					try {
						const result = await adapter.execute(sql, {
							timeoutMs: this.options.pipeline.execute_timeout_ms,
							maxRows: this.options.pipeline.max_rows,
						})
						run.append({
							stage: "execute",
							attempt,
							ok: true,
							row_count: result.row_count,
							truncated: result.truncated,
						})
						for (const ref of verdict.columns) this.history.recordColumnUsage(ref.table, ref.column)
						run.append({ stage: "success", sql, row_count: result.row_count })
						this.logger.info("Run succeeded", { run_id: run.id, attempts: attempt, rows: result.row_count })
						return { ...base(), status: "success", sql, result }
					} catch (err) {
						if (!(err instanceof QueryMendError) || err.terminal) throw err
						run.append({ stage: "execute", attempt, ok: false, error: err.message })
						failure = err
					}
				} else {
					run.append({ stage: "validate", attempt, valid: false, error: verdict.error.message })
					failure = verdict.error
				}

				// ANALYZE_ERROR
				checkpoint("analyze_error")
				diagnosis = analyzeError(failure, kb.snapshot)
				diagnosis.model_hint = await this.model.diagnoseError(sql, failure.message, schemaText, signal)
				run.append({ stage: "analyze_error", attempt, diagnosis })
				this.logger.info("Attempt failed", {
					run_id: run.id,
					attempt,
					category: diagnosis.category,
					error: diagnosis.message,
				})
				state.lastDiagnosis = diagnosis
			}

			turns.push({ sql, diagnosis })

			// REFINE
			checkpoint("refine")
			retries++
			if (retries > budget) {
				const reason = `Retry budget of ${budget} exhausted; last error: ${diagnosis.message}`
				run.append({ stage: "failed", reason, error_kind: null })
				this.logger.warn("Run failed", { run_id: run.id, attempts: attempt })
				return {
					...base(),
					status: "failed",
					sql: state.lastSql,
					reason,
					diagnosis,
					error_kind: null,
				}
			}
			run.append({ stage: "refine", retries })
		}
	}
}

interface RunState {
	correctedQuery: string
	intent: IntentResult | null
	corrections: CorrectionCandidate[]
	ambiguities: AmbiguousToken[]
	lastSql: string | null
	lastDiagnosis: Diagnosis | null
}

function buildPrompt(query: string, entities: EntityMap, intent: IntentResult): string {
	const lines = [`Request: ${query}`, `Intent: ${intent.intent}`]
	const pairs = Object.entries(entities)
	if (pairs.length > 0) {
		lines.push("Entities:")
		for (const [role, value] of pairs) lines.push(`- ${role}: ${value}`)
	}
	return lines.join("\n")
}
