/**
 * Schema & Content Knowledge Base
 *
 * Built from the SchemaSnapshot of one session generation. Distinct values
 * of plausible entity columns are sampled on first reference and cached;
 * a column returning more than the cardinality threshold is marked
 * high-cardinality and caches nothing.
 *
 * Concurrent first references to the same column may sample it twice.
 * The results are identical, so no lock is taken.
 */

import type { DatabaseAdapter } from "./adapters/adapter.js"
import type { CorrectionCandidate, SchemaSnapshot, TableInfo } from "./schema_types.js"
import { isTextType } from "./schema_types.js"
import { StaleContextError, errorMessage, isTerminalError } from "./errors.js"
import { equalsIgnoreCase, normalizedSimilarity, similarityScore } from "./similarity.js"
import type { Logger } from "./logger.js"

// ============================================================================
// Types
// ============================================================================

export interface KnowledgeBaseOptions {
	/** Columns with more distinct values than this are not cached */
	cardinalityThreshold: number
	/** Regex source matched (case-insensitively) against column names */
	entityColumnPattern: string
	/** Candidates scoring below this are dropped */
	minCandidateScore: number
}

export interface ColumnRef {
	table: string
	column: string
}

/** Outcome of matching one token against sampled content */
export interface LookupResult {
	/** Token already equals a sampled value (case-insensitively) */
	exact: ColumnRef | null
	/** Top-scoring values of each column (all of them on a tie), highest confidence first */
	candidates: CorrectionCandidate[]
}

type ColumnSample = { kind: "values"; values: string[] } | { kind: "high_cardinality" }

/** Fuzzy table resolution cutoff */
const TABLE_MATCH_THRESHOLD = 0.7

/** Scores closer than this are equal */
const SCORE_EPSILON = 1e-9

// ============================================================================
// Knowledge Base
// ============================================================================

export class KnowledgeBase {
	readonly version: number
	private readonly entityPattern: RegExp
	private readonly samples = new Map<string, ColumnSample>()
	private readonly identifiers: Set<string>

	constructor(
		readonly snapshot: SchemaSnapshot,
		private readonly adapter: Pick<DatabaseAdapter, "sampleColumnValues">,
		private readonly options: KnowledgeBaseOptions,
		private readonly logger: Logger,
	) {
		this.version = snapshot.version
		this.entityPattern = new RegExp(options.entityColumnPattern, "i")

		this.identifiers = new Set<string>()
		for (const table of snapshot.tables) {
			this.identifiers.add(table.name.toLowerCase())
			for (const column of table.columns) {
				this.identifiers.add(column.name.toLowerCase())
			}
		}
	}

	// ==========================================================================
	// Schema Queries
	// ==========================================================================

	tableNames(): string[] {
		return this.snapshot.tables.map((t) => t.name)
	}

	findTable(name: string): TableInfo | undefined {
		return this.snapshot.tables.find((t) => equalsIgnoreCase(t.name, name))
	}

	isSchemaIdentifier(word: string): boolean {
		return this.identifiers.has(word.toLowerCase())
	}

	/**
	 * Text-typed columns whose names look like they hold entity values
	 */
	plausibleColumns(): ColumnRef[] {
		const refs: ColumnRef[] = []
		for (const table of this.snapshot.tables) {
			for (const column of table.columns) {
				if (isTextType(column.data_type) && this.entityPattern.test(column.name)) {
					refs.push({ table: table.name, column: column.name })
				}
			}
		}
		return refs
	}

	/**
	 * Resolve a word to a table: exact, then singular/plural, then fuzzy
	 */
	resolveTableForEntity(name: string): string | null {
		const exact = this.findTable(name)
		if (exact) return exact.name

		for (const variant of numberVariants(name.toLowerCase())) {
			const match = this.findTable(variant)
			if (match) return match.name
		}

		let best: { name: string; score: number } | null = null
		for (const table of this.snapshot.tables) {
			const score = normalizedSimilarity(name, table.name)
			if (score >= TABLE_MATCH_THRESHOLD && (!best || score > best.score)) {
				best = { name: table.name, score }
			}
		}
		return best?.name ?? null
	}

	/**
	 * Throws StaleContextError when `version` is not this knowledge base's
	 */
	assertVersion(version: number): void {
		if (version !== this.version) {
			throw new StaleContextError(version, this.version)
		}
	}

	// ==========================================================================
	// Content Sampling
	// ==========================================================================

	/**
	 * Distinct values of a column, sampled on first reference.
	 * High-cardinality columns and failed samples yield []; a terminal
	 * failure (lost connection, closed adapter) is rethrown.
	 */
	async columnValues(table: string, column: string): Promise<string[]> {
		const key = `${table}.${column}`
		const cached = this.samples.get(key)
		if (cached) return cached.kind === "values" ? cached.values : []

		const threshold = this.options.cardinalityThreshold
		let values: string[]
		try {
			values = await this.adapter.sampleColumnValues(table, column, threshold + 1)
		} catch (err) {
			if (isTerminalError(err)) throw err
			this.logger.warn("Column sampling failed", { table, column, error: errorMessage(err) })
			return []
		}

		if (values.length > threshold) {
			this.samples.set(key, { kind: "high_cardinality" })
			this.logger.debug("Column is high-cardinality, not cached", { table, column, threshold })
			return []
		}

		this.samples.set(key, { kind: "values", values })
		this.logger.debug("Column sampled", { table, column, values: values.length })
		return values
	}

	isHighCardinality(table: string, column: string): boolean {
		return this.samples.get(`${table}.${column}`)?.kind === "high_cardinality"
	}

	/**
	 * Match a token against every plausible column's values
	 */
	async lookup(token: string): Promise<LookupResult> {
		const candidates: CorrectionCandidate[] = []

		for (const ref of this.plausibleColumns()) {
			const values = await this.columnValues(ref.table, ref.column)

			let top = 0
			let tied: string[] = []
			for (const value of values) {
				if (equalsIgnoreCase(token, value)) {
					return { exact: ref, candidates: [] }
				}
				const confidence = similarityScore(token, value)
				if (confidence < this.options.minCandidateScore) continue
				if (tied.length === 0 || confidence > top + SCORE_EPSILON) {
					top = confidence
					tied = [value]
				} else if (Math.abs(confidence - top) <= SCORE_EPSILON) {
					tied.push(value)
				}
			}
			// every value sharing the column's top score stays, so ties surface as ambiguity
			for (const value of [...new Set(tied)].sort()) {
				candidates.push({ token, replacement: value, confidence: top, table: ref.table, column: ref.column })
			}
		}

		candidates.sort((a, b) => b.confidence - a.confidence)
		return { exact: null, candidates }
	}

	/**
	 * Correction candidates for a token; [] when it is already a known value
	 */
	async lookupSimilar(token: string): Promise<CorrectionCandidate[]> {
		return (await this.lookup(token)).candidates
	}
}

/**
 * Singular/plural spellings of a lowercase word
 */
export function numberVariants(word: string): string[] {
	const variants = new Set<string>()
	if (word.endsWith("ies") && word.length > 3) variants.add(`${word.slice(0, -3)}y`)
	if (word.endsWith("es") && word.length > 2) variants.add(word.slice(0, -2))
	if (word.endsWith("s") && word.length > 1) variants.add(word.slice(0, -1))
	if (word.endsWith("y") && word.length > 1) variants.add(`${word.slice(0, -1)}ies`)
	variants.add(`${word}s`)
	variants.add(`${word}es`)
	variants.delete(word)
	return [...variants]
}

// ============================================================================
// Prompt Rendering
// ============================================================================

export interface Relationship {
	from_table: string
	from_column: string
	to_table: string
	to_column: string
	/** declared: a foreign key; inferred: a `<table>_id` naming match */
	source: "declared" | "inferred"
}

/**
 * Declared foreign keys, then `<table>_id` columns pointing at a table of
 * that name (singular or plural) which has the same column or a single
 * primary key. Columns covered by a declared key are not inferred again.
 */
export function schemaRelationships(tables: TableInfo[]): Relationship[] {
	const relationships: Relationship[] = []
	const declared = new Set<string>()
	for (const table of tables) {
		for (const fk of table.foreign_keys) {
			declared.add(`${table.name}.${fk.column}`.toLowerCase())
			relationships.push({
				from_table: table.name,
				from_column: fk.column,
				to_table: fk.ref_table,
				to_column: fk.ref_column,
				source: "declared",
			})
		}
	}

	for (const table of tables) {
		for (const column of table.columns) {
			if (column.primary_key || declared.has(`${table.name}.${column.name}`.toLowerCase())) continue
			const match = /^(.+?)_?id$/i.exec(column.name)
			if (!match) continue
			const stem = match[1].toLowerCase()
			const names = new Set([stem, ...numberVariants(stem)])

			for (const target of tables) {
				if (target === table || !names.has(target.name.toLowerCase())) continue
				const keys = target.columns.filter((c) => c.primary_key)
				const same = target.columns.find((c) => c.name.toLowerCase() === column.name.toLowerCase())
				const ref = same ?? (keys.length === 1 ? keys[0] : undefined)
				if (!ref) continue
				relationships.push({
					from_table: table.name,
					from_column: column.name,
					to_table: target.name,
					to_column: ref.name,
					source: "inferred",
				})
				break
			}
		}
	}
	return relationships
}

/**
 * Compact schema text for model prompts
 */
export function renderSchema(snapshot: SchemaSnapshot): string {
	const lines: string[] = [`-- ${snapshot.kind} database "${snapshot.connection}"${snapshot.schema ? `, schema ${snapshot.schema}` : ""}`]
	for (const table of snapshot.tables) {
		const cols = table.columns.map((c) => {
			const constraint = c.primary_key ? " PRIMARY KEY" : c.nullable ? "" : " NOT NULL"
			return `${c.name} ${c.data_type}${constraint}`
		})
		lines.push(`${table.name}(${cols.join(", ")})`)
	}

	const relationships = schemaRelationships(snapshot.tables)
	if (relationships.length > 0) {
		lines.push("-- relationships")
		for (const r of relationships) {
			const note = r.source === "inferred" ? " (inferred from name)" : ""
			lines.push(`${r.from_table}.${r.from_column} -> ${r.to_table}.${r.to_column}${note}`)
		}
	}
	return lines.join("\n")
}
