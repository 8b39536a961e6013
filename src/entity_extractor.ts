/**
 * Deterministic entity extraction
 *
 * Produces a flat role → value map from the user question:
 * names, quoted values, dates, years, numeric thresholds, limits,
 * locations, and tables resolved through the knowledge base.
 * Repeated roles are numbered: name, name_2, name_3, ...
 */

import type { KnowledgeBase } from "./knowledge_base.js"
import { getLexicon } from "./lexicon.js"

export type EntityMap = Record<string, string>

// ============================================================================
// Text Helpers
// ============================================================================

export interface WordSpan {
	text: string
	index: number
}

const WORD_RE = /[\p{L}\p{M}][\p{L}\p{M}\p{N}'’-]*/gu
const QUOTED_RE = /(?:^|[\s(,:=])(["'“‘])(.+?)(["'”’])(?=$|[\s),.?!:;])/gu
const CAPITALIZED_SEQUENCE_RE = /\p{Lu}[\p{L}\p{M}'’-]*(?:\s+\p{Lu}[\p{L}\p{M}'’-]*)*/gu

export function words(text: string): WordSpan[] {
	const spans: WordSpan[] = []
	for (const m of text.matchAll(WORD_RE)) {
		spans.push({ text: m[0], index: m.index ?? 0 })
	}
	return spans
}

/**
 * Values wrapped in single, double or typographic quotes
 */
export function quotedValues(text: string): string[] {
	const values: string[] = []
	for (const m of text.matchAll(QUOTED_RE)) {
		const inner = m[2].trim()
		if (inner.length > 0) values.push(inner)
	}
	return values
}

export function isCapitalized(word: string): boolean {
	return /^\p{Lu}/u.test(word)
}

function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Match `token` as a whole word, where letters, digits and underscore are
 * word characters in any script
 */
export function wordBoundaryPattern(token: string, flags: string = "gu"): RegExp {
	return new RegExp(`(?<![\\p{L}\\p{M}\\p{N}_])${escapeRegex(token)}(?![\\p{L}\\p{M}\\p{N}_])`, flags)
}

export function replaceWord(text: string, token: string, replacement: string): string {
	// Function form so "$" in the replacement stays literal
	return text.replace(wordBoundaryPattern(token), () => replacement)
}

/**
 * Runs of capitalized words with leading/trailing stopwords removed
 */
export function capitalizedPhrases(text: string): string[] {
	const { stopwords } = getLexicon()
	const phrases: string[] = []
	for (const m of text.matchAll(CAPITALIZED_SEQUENCE_RE)) {
		const parts = m[0].split(/\s+/)
		while (parts.length > 0 && stopwords.has(parts[0].toLowerCase())) parts.shift()
		while (parts.length > 0 && stopwords.has(parts[parts.length - 1].toLowerCase())) parts.pop()
		if (parts.length > 0) phrases.push(parts.join(" "))
	}
	return phrases
}

// ============================================================================
// Extraction
// ============================================================================

const ISO_DATE_RE = /\b(\d{4}-\d{2}-\d{2})\b/g
const YEAR_RE = /\b((?:19|20)\d{2})\b/g
const THRESHOLD_PATTERNS: Array<{ role: string; re: RegExp }> = [
	{ role: "at_least", re: /\bat least\s+(\d+(?:\.\d+)?)/gi },
	{ role: "at_most", re: /\bat most\s+(\d+(?:\.\d+)?)/gi },
	{ role: "greater_than", re: /\b(?:more than|greater than|over|above|exceeding)\s+(\d+(?:\.\d+)?)/gi },
	{ role: "less_than", re: /\b(?:less than|fewer than|under|below)\s+(\d+(?:\.\d+)?)/gi },
]
const LIMIT_RE = /\b(?:top|first|limit|last)\s+(\d+)\b/gi
const LOCATION_RE = /\b(?:in|from|located in|lives in|living in|based in)\s+(\p{Lu}[\p{L}\p{M}'’-]*(?:\s+\p{Lu}[\p{L}\p{M}'’-]*)*)/gu

class EntityCollector {
	readonly entities: EntityMap = {}
	private seen = new Set<string>()

	add(role: string, value: string): void {
		const key = `${role}:${value.toLowerCase()}`
		if (this.seen.has(key)) return
		this.seen.add(key)

		let slot = role
		for (let n = 2; slot in this.entities; n++) slot = `${role}_${n}`
		this.entities[slot] = value
	}
}

/**
 * Extract entities from a question. `kb` resolves table mentions; without
 * it no table entities are produced.
 */
export function extractEntities(query: string, kb?: KnowledgeBase): EntityMap {
	const { stopwords } = getLexicon()
	const out = new EntityCollector()

	const quoted = quotedValues(query)
	for (const value of quoted) out.add("value", value)

	const dateSpans: Array<[number, number]> = []
	for (const m of query.matchAll(ISO_DATE_RE)) {
		const start = m.index ?? 0
		out.add("date", m[1])
		dateSpans.push([start, start + m[0].length])
	}
	for (const m of query.matchAll(YEAR_RE)) {
		const index = m.index ?? 0
		if (dateSpans.some(([start, end]) => index >= start && index < end)) continue
		out.add("year", m[1])
	}

	for (const { role, re } of THRESHOLD_PATTERNS) {
		for (const m of query.matchAll(re)) out.add(role, m[1])
	}
	for (const m of query.matchAll(LIMIT_RE)) out.add("limit", m[1])

	const locations = new Set<string>()
	for (const m of query.matchAll(LOCATION_RE)) {
		const place = m[1].trim()
		if (stopwords.has(place.toLowerCase()) || kb?.isSchemaIdentifier(place)) continue
		out.add("location", place)
		locations.add(place.toLowerCase())
	}

	const quotedLower = new Set(quoted.map((q) => q.toLowerCase()))
	for (const phrase of capitalizedPhrases(query)) {
		const lower = phrase.toLowerCase()
		if (locations.has(lower) || quotedLower.has(lower)) continue
		if (kb && phrase.split(" ").every((w) => kb.isSchemaIdentifier(w) || kb.resolveTableForEntity(w) !== null)) continue
		out.add("name", phrase)
	}

	if (kb) {
		for (const word of words(query)) {
			const lower = word.text.toLowerCase()
			if (stopwords.has(lower) || lower.length < 3) continue
			const table = kb.resolveTableForEntity(lower)
			if (table) out.add("table", table)
		}
	}

	return out.entities
}
