/**
 * QueryService - the operations exposed to callers
 *
 * Wires the configured pieces together (session manager, model client,
 * pipeline, correction history) and flattens pipeline outcomes into
 * summaries a tool surface can serialize as-is.
 */

import type { QueryMendConfig } from "./config/loadConfig.js"
import { createAdapterFactory, type AdapterFactory } from "./adapters/factory.js"
import { CorrectionHistory, getCorrectionHistory, type CorrectionPattern } from "./correction_history.js"
import type { AmbiguousToken } from "./entity_autocorrect.js"
import { QueryMendError, type ErrorKind } from "./errors.js"
import type { Logger } from "./logger.js"
import { OllamaModelClient, type IntentResult, type ModelCapability } from "./model_client.js"
import { QueryPipeline, type PipelineOutcome } from "./pipeline.js"
import type { CorrectionCandidate, DatabaseConnection, Scalar, ValidationVerdict } from "./schema_types.js"
import { ConfigConnectionStore, SessionManager, type SessionContext, type SessionIdentity } from "./session_manager.js"

// ============================================================================
// Summaries
// ============================================================================

export interface QueryErrorSummary {
	/** null when the retry budget ran out */
	kind: ErrorKind | null
	message: string
	hint: string | null
	suggestion: string | null
}

export interface QuerySummary {
	run_id: string | null
	status: PipelineOutcome["status"]
	query: string
	corrected_query: string
	intent: IntentResult | null
	sql: string | null
	columns: readonly string[]
	rows: ReadonlyArray<readonly Scalar[]>
	row_count: number
	truncated: boolean
	error: QueryErrorSummary | null
	corrections: CorrectionCandidate[]
	ambiguities: AmbiguousToken[]
	attempts: number
	schema_version: number | null
}

export type SwitchSummary = { ok: true; database: SessionIdentity } | { ok: false; error: { kind: ErrorKind; message: string } }

export interface CorrectionReport {
	total: number
	common: CorrectionPattern[]
}

export function summarizeOutcome(outcome: PipelineOutcome): QuerySummary {
	const base = {
		run_id: outcome.run_id,
		status: outcome.status,
		query: outcome.query,
		corrected_query: outcome.corrected_query,
		intent: outcome.intent,
		corrections: outcome.corrections,
		ambiguities: outcome.ambiguities,
		attempts: outcome.attempts,
		schema_version: outcome.schema_version,
	}
	switch (outcome.status) {
		case "success":
			return {
				...base,
				sql: outcome.sql,
				columns: outcome.result.columns,
				rows: outcome.result.rows,
				row_count: outcome.result.row_count,
				truncated: outcome.result.truncated,
				error: null,
			}
		case "unsupported":
			return {
				...base,
				sql: null,
				columns: [],
				rows: [],
				row_count: 0,
				truncated: false,
				error: { kind: null, message: outcome.reason, hint: null, suggestion: null },
			}
		case "failed":
			return {
				...base,
				sql: outcome.sql,
				columns: [],
				rows: [],
				row_count: 0,
				truncated: false,
				error: {
					kind: outcome.error_kind,
					message: outcome.reason,
					hint: outcome.diagnosis?.hint ?? null,
					suggestion: outcome.diagnosis?.suggestion ?? null,
				},
			}
	}
}

/** Summary for a request rejected before a run started */
function rejectedSummary(query: string, kind: ErrorKind | null, message: string): QuerySummary {
	return {
		run_id: null,
		status: "failed",
		query,
		corrected_query: query,
		intent: null,
		sql: null,
		columns: [],
		rows: [],
		row_count: 0,
		truncated: false,
		error: { kind, message, hint: null, suggestion: null },
		corrections: [],
		ambiguities: [],
		attempts: 0,
		schema_version: null,
	}
}

// ============================================================================
// Service
// ============================================================================

export class QueryService {
	constructor(
		private readonly sessions: SessionManager,
		private readonly pipeline: QueryPipeline,
		private readonly history: CorrectionHistory,
		private readonly logger: Logger,
	) {}

	/**
	 * Run one question against the active database. Failures come back in
	 * the summary; only programming errors throw.
	 */
	async runQuery(text: string, signal?: AbortSignal): Promise<QuerySummary> {
		const query = text.trim()
		if (!query) {
			return rejectedSummary(text, null, "Query text is empty")
		}

		let session: SessionContext
		try {
			session = this.sessions.acquire()
		} catch (err) {
			if (!(err instanceof QueryMendError)) throw err
			return rejectedSummary(query, err.kind, err.message)
		}

		const outcome = await this.pipeline.run(query, session, {
			signal,
			currentVersion: () => this.sessions.version,
		})
		this.logger.debug("Query summarized", { run_id: outcome.run_id, status: outcome.status })
		return summarizeOutcome(outcome)
	}

	listDatabases(): DatabaseConnection[] {
		return this.sessions.listDatabases()
	}

	validateDatabase(name: string): Promise<ValidationVerdict> {
		return this.sessions.validateDatabase(name)
	}

	async switchDatabase(name: string): Promise<SwitchSummary> {
		const result = await this.sessions.switchDatabase(name)
		if (result.ok) return { ok: true, database: result.session }
		return { ok: false, error: { kind: result.error.kind, message: result.error.message } }
	}

	currentDatabase(): SessionIdentity | null {
		return this.sessions.current()
	}

	/** Most frequent accepted corrections so far */
	correctionReport(limit: number = 10): CorrectionReport {
		return { total: this.history.totalCorrections, common: this.history.commonMistakes(limit) }
	}

	close(): Promise<void> {
		return this.sessions.close()
	}
}

// ============================================================================
// Factory
// ============================================================================

export interface QueryServiceDeps {
	/** Defaults to the Ollama client built from config.model */
	model?: ModelCapability
	/** Defaults to the driver-backed adapters */
	adapterFactory?: AdapterFactory
	/** Defaults to the process-wide history */
	history?: CorrectionHistory
}

export function createQueryService(config: QueryMendConfig, logger: Logger, deps: QueryServiceDeps = {}): QueryService {
	const history = deps.history ?? getCorrectionHistory()
	const model = deps.model ?? new OllamaModelClient(config.model, logger)
	const sessions = new SessionManager(
		new ConfigConnectionStore(config.connections),
		deps.adapterFactory ?? createAdapterFactory(logger),
		{
			cardinalityThreshold: config.knowledge_base.cardinality_threshold,
			entityColumnPattern: config.knowledge_base.entity_column_pattern,
			minCandidateScore: config.autocorrect.min_candidate_score,
		},
		logger,
	)
	const pipeline = new QueryPipeline(
		model,
		history,
		{ pipeline: config.pipeline, autocorrect: config.autocorrect },
		logger,
	)
	return new QueryService(sessions, pipeline, history, logger)
}
