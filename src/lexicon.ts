/**
 * Word lists shared by entity extraction, autocorrection and validation.
 * Loaded once from data/lexicon.json at the repository root.
 */

import * as fs from "fs"
import { z } from "zod"

const lexiconSchema = z.object({
	stopwords: z.array(z.string()),
	filterKeywords: z.array(z.string()),
	sqlKeywords: z.array(z.string()),
})

export interface Lexicon {
	/** Words that never name an entity (lowercase) */
	stopwords: ReadonlySet<string>
	/** Words after which the next word is treated as a filter value */
	filterKeywords: ReadonlySet<string>
	/** SQL words that are never identifiers */
	sqlKeywords: ReadonlySet<string>
}

let _lexicon: Lexicon | null = null

export function getLexicon(): Lexicon {
	if (_lexicon) return _lexicon
	const raw = fs.readFileSync(new URL("../data/lexicon.json", import.meta.url), "utf-8")
	const parsed = lexiconSchema.parse(JSON.parse(raw))
	const lower = (words: string[]) => new Set(words.map((w) => w.toLowerCase()))
	_lexicon = {
		stopwords: lower(parsed.stopwords),
		filterKeywords: lower(parsed.filterKeywords),
		sqlKeywords: lower(parsed.sqlKeywords),
	}
	return _lexicon
}
