/**
 * Autonomous entity autocorrection
 *
 * Matches entity-like query tokens against sampled database content and
 * substitutes confident corrections into the query and the entity map.
 *
 * Token selection:
 * - capitalized words that are not stopwords
 * - quoted strings
 * - words following a filter keyword (in, from, named, called, by, ...)
 * - the same, applied to every entity value
 * Schema identifiers and tokens shorter than min_token_length are ignored.
 *
 * Acceptance: confidence (plus history boost, capped at 1) ≥ threshold.
 * Equal top confidence with different replacements is broken by column
 * usage history; a remaining tie is reported as ambiguous.
 */

import type { KnowledgeBase } from "./knowledge_base.js"
import type { CorrectionHistory } from "./correction_history.js"
import type { CorrectionCandidate } from "./schema_types.js"
import type { EntityMap } from "./entity_extractor.js"
import { isCapitalized, quotedValues, replaceWord, words } from "./entity_extractor.js"
import { getLexicon } from "./lexicon.js"
import { AmbiguousCorrectionError } from "./errors.js"
import type { AutocorrectConfig } from "./config/loadConfig.js"
import type { Logger } from "./logger.js"

// ============================================================================
// Types
// ============================================================================

export interface AmbiguousToken {
	token: string
	options: string[]
}

export interface AutocorrectOutcome {
	query: string
	entities: EntityMap
	applied: CorrectionCandidate[]
	/** Best candidate per token that fell below the threshold */
	rejected: CorrectionCandidate[]
	ambiguous: AmbiguousToken[]
}

export type AutocorrectOptions = Pick<
	AutocorrectConfig,
	"acceptance_threshold" | "min_token_length" | "history_boost" | "history_boost_cap" | "fail_on_ambiguity"
>

/** Confidences closer than this are treated as equal */
const TIE_EPSILON = 1e-9

// ============================================================================
// Token Selection
// ============================================================================

/**
 * Entity-like tokens of a text, in order of appearance, deduplicated
 * case-insensitively
 */
export function candidateTokens(text: string, kb: KnowledgeBase, minLength: number): string[] {
	const { stopwords, filterKeywords } = getLexicon()
	const tokens: string[] = []
	const seen = new Set<string>()

	const push = (token: string) => {
		const trimmed = token.trim()
		const lower = trimmed.toLowerCase()
		if (trimmed.length < minLength || seen.has(lower)) return
		if (stopwords.has(lower) || kb.isSchemaIdentifier(trimmed)) return
		if (!/\p{L}/u.test(trimmed)) return
		seen.add(lower)
		tokens.push(trimmed)
	}

	for (const value of quotedValues(text)) push(value)

	const spans = words(text)
	for (let i = 0; i < spans.length; i++) {
		const word = spans[i].text
		if (isCapitalized(word)) {
			push(word)
		} else if (i > 0 && filterKeywords.has(spans[i - 1].text.toLowerCase())) {
			push(word)
		}
	}

	return tokens
}

// ============================================================================
// Engine
// ============================================================================

export class EntityAutocorrector {
	constructor(
		private readonly kb: KnowledgeBase,
		private readonly history: CorrectionHistory,
		private readonly options: AutocorrectOptions,
		private readonly logger: Logger,
	) {}

	/**
	 * Confidence after the history boost
	 */
	boosted(candidate: CorrectionCandidate): CorrectionCandidate {
		const accepted = this.history.timesAccepted(candidate.token, candidate.replacement)
		const boost = Math.min(this.options.history_boost_cap, this.options.history_boost * accepted)
		return { ...candidate, confidence: Math.min(1, candidate.confidence + boost) }
	}

	async correct(query: string, entities: EntityMap): Promise<AutocorrectOutcome> {
		const minLength = this.options.min_token_length
		const tokens = candidateTokens(query, this.kb, minLength)
		const seen = new Set(tokens.map((t) => t.toLowerCase()))
		for (const value of Object.values(entities)) {
			for (const token of candidateTokens(value, this.kb, minLength)) {
				if (!seen.has(token.toLowerCase())) {
					seen.add(token.toLowerCase())
					tokens.push(token)
				}
			}
		}

		const applied: CorrectionCandidate[] = []
		const rejected: CorrectionCandidate[] = []
		const ambiguous: AmbiguousToken[] = []

		for (const token of tokens) {
			const lookup = await this.kb.lookup(token)
			if (lookup.exact) continue
			if (lookup.candidates.length === 0) continue

			const scored = lookup.candidates.map((c) => this.boosted(c)).sort((a, b) => b.confidence - a.confidence)
			const top = scored[0]

			if (top.confidence < this.options.acceptance_threshold) {
				rejected.push(top)
				this.logger.debug("Correction below threshold", {
					token,
					replacement: top.replacement,
					confidence: top.confidence,
				})
				continue
			}

			const chosen = this.resolveTie(scored)
			if (!chosen) {
				const options = distinctReplacements(scored.filter((c) => isTied(c, top)))
				if (this.options.fail_on_ambiguity) {
					throw new AmbiguousCorrectionError(token, options)
				}
				ambiguous.push({ token, options })
				this.logger.info("Ambiguous correction left unapplied", { token, options })
				continue
			}

			applied.push(chosen)
		}

		let correctedQuery = query
		const correctedEntities: EntityMap = { ...entities }
		for (const c of applied) {
			correctedQuery = replaceWord(correctedQuery, c.token, c.replacement)
			for (const [role, value] of Object.entries(correctedEntities)) {
				correctedEntities[role] = replaceWord(value, c.token, c.replacement)
			}
			this.history.recordCorrection(c.token, c.replacement)
			this.logger.info("Correction applied", {
				token: c.token,
				replacement: c.replacement,
				confidence: Number(c.confidence.toFixed(4)),
				column: `${c.table}.${c.column}`,
			})
		}

		return { query: correctedQuery, entities: correctedEntities, applied, rejected, ambiguous }
	}

	/**
	 * Pick among equally confident candidates; null when still tied
	 */
	private resolveTie(scored: CorrectionCandidate[]): CorrectionCandidate | null {
		const top = scored[0]
		const tied = scored.filter((c) => isTied(c, top))
		if (distinctReplacements(tied).length === 1) return top

		let bestUsage = -1
		let leaders: CorrectionCandidate[] = []
		for (const c of tied) {
			const usage = this.history.columnUsageCount(c.table, c.column)
			if (usage > bestUsage) {
				bestUsage = usage
				leaders = [c]
			} else if (usage === bestUsage) {
				leaders.push(c)
			}
		}
		return distinctReplacements(leaders).length === 1 ? leaders[0] : null
	}
}

function isTied(a: CorrectionCandidate, b: CorrectionCandidate): boolean {
	return Math.abs(a.confidence - b.confidence) < TIE_EPSILON
}

function distinctReplacements(candidates: CorrectionCandidate[]): string[] {
	return [...new Set(candidates.map((c) => c.replacement))]
}

