/**
 * String similarity for entity autocorrection and identifier suggestions
 *
 * Scoring combines:
 * 1. Normalized Levenshtein similarity on lowercase text
 * 2. Diacritic-folded similarity ("Bjorn" vs "Bjørn" fold to the same string)
 * 3. A phonetic bonus when Soundex codes agree
 */

// ============================================================================
// Constants
// ============================================================================

/** Score assigned to a pair that differs only by diacritics */
export const FOLD_EQUAL_SCORE = 0.97

/** Added when both strings share a Soundex code */
export const PHONETIC_BONUS = 0.1

/** Ceiling for any non-identical pair */
export const MAX_FUZZY_SCORE = 0.99

/** Letters NFD decomposition leaves untouched */
const FOLD_MAP: Record<string, string> = {
	ø: "o",
	æ: "ae",
	œ: "oe",
	ß: "ss",
	đ: "d",
	ð: "d",
	ł: "l",
	þ: "th",
	ı: "i",
}

const SOUNDEX_CODES: Record<string, string> = {
	b: "1", f: "1", p: "1", v: "1",
	c: "2", g: "2", j: "2", k: "2", q: "2", s: "2", x: "2", z: "2",
	d: "3", t: "3",
	l: "4",
	m: "5", n: "5",
	r: "6",
}

// ============================================================================
// Primitives
// ============================================================================

/**
 * Levenshtein edit distance
 */
export function levenshtein(s1: string, s2: string): number {
	const m = s1.length
	const n = s2.length

	if (m === 0) return n
	if (n === 0) return m

	// Two rolling rows instead of the full matrix
	let prev: number[] = Array.from({ length: n + 1 }, (_, j) => j)
	let curr: number[] = new Array<number>(n + 1).fill(0)

	for (let i = 1; i <= m; i++) {
		curr[0] = i
		for (let j = 1; j <= n; j++) {
			const cost = s1[i - 1] === s2[j - 1] ? 0 : 1
			curr[j] = Math.min(
				prev[j] + 1, // deletion
				curr[j - 1] + 1, // insertion
				prev[j - 1] + cost, // substitution
			)
		}
		;[prev, curr] = [curr, prev]
	}

	return prev[n]
}

/**
 * 1 - distance / longer length, on lowercase text
 */
export function normalizedSimilarity(a: string, b: string): number {
	const x = a.toLowerCase()
	const y = b.toLowerCase()
	const longest = Math.max(x.length, y.length)
	if (longest === 0) return 1
	return 1 - levenshtein(x, y) / longest
}

/**
 * Lowercase and strip diacritics
 */
export function foldDiacritics(text: string): string {
	const stripped = text.toLowerCase().normalize("NFD").replace(/\p{M}/gu, "")
	let out = ""
	for (const ch of stripped) {
		out += FOLD_MAP[ch] ?? ch
	}
	return out
}

/**
 * American Soundex. Returns "" when the input has no ASCII letters.
 */
export function soundex(text: string): string {
	const letters = foldDiacritics(text).replace(/[^a-z]/g, "")
	if (letters.length === 0) return ""

	let code = letters[0].toUpperCase()
	let lastDigit = SOUNDEX_CODES[letters[0]] ?? ""

	for (let i = 1; i < letters.length && code.length < 4; i++) {
		const ch = letters[i]
		const digit = SOUNDEX_CODES[ch]
		if (digit !== undefined) {
			if (digit !== lastDigit) code += digit
			lastDigit = digit
		} else if (ch !== "h" && ch !== "w") {
			// vowels separate repeated codes, h and w do not
			lastDigit = ""
		}
	}

	return code.padEnd(4, "0")
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * Case-insensitive equality
 */
export function equalsIgnoreCase(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase()
}

/**
 * Similarity of a query token to a database value, in [0, 0.99].
 *
 * Case-insensitive equality is not scored here: callers treat it as
 * "already correct".
 */
export function similarityScore(token: string, value: string): number {
	const editSim = normalizedSimilarity(token, value)

	const foldedToken = foldDiacritics(token)
	const foldedValue = foldDiacritics(value)
	const foldedSim =
		foldedToken === foldedValue ? FOLD_EQUAL_SCORE : normalizedSimilarity(foldedToken, foldedValue)

	const tokenCode = soundex(token)
	const bonus = tokenCode !== "" && tokenCode === soundex(value) ? PHONETIC_BONUS : 0

	return Math.min(MAX_FUZZY_SCORE, Math.max(editSim, foldedSim) + bonus)
}

/**
 * Closest names by normalized similarity, best first.
 */
export function closestMatches(
	target: string,
	names: Iterable<string>,
	minSimilarity: number = 0.5,
	limit: number = 3,
): Array<{ name: string; similarity: number }> {
	const scored: Array<{ name: string; similarity: number }> = []
	const seen = new Set<string>()
	for (const name of names) {
		const key = name.toLowerCase()
		if (seen.has(key)) continue
		seen.add(key)
		const similarity = normalizedSimilarity(target, name)
		if (similarity >= minSimilarity) scored.push({ name, similarity })
	}
	scored.sort((a, b) => b.similarity - a.similarity || a.name.localeCompare(b.name))
	return scored.slice(0, limit)
}
