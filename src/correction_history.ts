/**
 * Process-wide correction history
 *
 * Two append/increment-only tallies:
 * - token → accepted replacement → times accepted (biases future confidence)
 * - table.column → successful queries that referenced it (breaks ties)
 *
 * Nothing is ever removed; resetCorrectionHistory() exists for tests.
 */

export interface CorrectionPattern {
	original: string
	replacement: string
	count: number
}

export class CorrectionHistory {
	private accepted = new Map<string, Map<string, number>>()
	private columnUsage = new Map<string, number>()

	recordCorrection(token: string, replacement: string): void {
		const key = token.toLowerCase()
		const byReplacement = this.accepted.get(key) ?? new Map<string, number>()
		byReplacement.set(replacement, (byReplacement.get(replacement) ?? 0) + 1)
		this.accepted.set(key, byReplacement)
	}

	/** How often `token` was corrected to `replacement` */
	timesAccepted(token: string, replacement: string): number {
		return this.accepted.get(token.toLowerCase())?.get(replacement) ?? 0
	}

	recordColumnUsage(table: string, column: string): void {
		const key = columnKey(table, column)
		this.columnUsage.set(key, (this.columnUsage.get(key) ?? 0) + 1)
	}

	columnUsageCount(table: string, column: string): number {
		return this.columnUsage.get(columnKey(table, column)) ?? 0
	}

	/**
	 * Most frequent original → replacement pairs
	 */
	commonMistakes(limit: number = 10): CorrectionPattern[] {
		const patterns: CorrectionPattern[] = []
		for (const [original, byReplacement] of this.accepted) {
			for (const [replacement, count] of byReplacement) {
				patterns.push({ original, replacement, count })
			}
		}
		patterns.sort((a, b) => b.count - a.count || a.original.localeCompare(b.original))
		return patterns.slice(0, limit)
	}

	get totalCorrections(): number {
		let total = 0
		for (const byReplacement of this.accepted.values()) {
			for (const count of byReplacement.values()) total += count
		}
		return total
	}
}

function columnKey(table: string, column: string): string {
	return `${table.toLowerCase()}.${column.toLowerCase()}`
}

// ============================================================================
// Singleton
// ============================================================================

let _history: CorrectionHistory | null = null

export function getCorrectionHistory(): CorrectionHistory {
	if (!_history) _history = new CorrectionHistory()
	return _history
}

/** Reset singleton (for tests). */
export function resetCorrectionHistory(): void {
	_history = null
}
