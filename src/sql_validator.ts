/**
 * Static SQL Validator
 *
 * Checks generated SQL against the active schema snapshot without touching
 * the database:
 * - Structure: one statement, SELECT (or WITH ... SELECT) only
 * - Safety: write/DDL keywords and admin functions are refused
 * - Parentheses balance, terminated strings and comments
 * - Known tables (CTE names allowed)
 * - Known columns, qualified (alias.column) and unqualified
 * - Type compatibility: LIKE on numeric columns, numeric columns compared
 *   with non-numeric string literals, SUM/AVG over text columns
 *
 * Not a parser. The scanner is a small state machine that keeps strings,
 * quoted identifiers and comments apart from code; the checks work on the
 * resulting lexemes and stay quiet where they cannot tell (derived tables,
 * table functions).
 */

import type { ColumnInfo, SchemaSnapshot, TableInfo } from "./schema_types.js"
import { isNumericType, isTextType } from "./schema_types.js"
import type { ColumnRef } from "./knowledge_base.js"
import { QueryMendError, QueryRuntimeError, SchemaError, SqlSyntaxError } from "./errors.js"
import { getLexicon } from "./lexicon.js"

// ============================================================================
// Types
// ============================================================================

export type SqlValidation =
	| {
			valid: true
			/** Tables named in FROM/JOIN clauses, as spelled in the schema */
			tables: string[]
			/** Columns the statement resolved to */
			columns: ColumnRef[]
	  }
	| {
			valid: false
			error: QueryMendError
	  }

const DANGEROUS_KEYWORDS = new Set([
	// DDL
	"DROP",
	"CREATE",
	"ALTER",
	"TRUNCATE",
	"RENAME",
	// DML
	"INSERT",
	"UPDATE",
	"DELETE",
	"MERGE",
	"REPLACE",
	"UPSERT",
	// DCL
	"GRANT",
	"REVOKE",
	// TCL
	"BEGIN",
	"COMMIT",
	"ROLLBACK",
	"SAVEPOINT",
	// Other
	"COPY",
	"EXECUTE",
	"PREPARE",
	"ATTACH",
	"DETACH",
	"PRAGMA",
	"VACUUM",
])

const DANGEROUS_FUNCTIONS = new Set([
	"pg_read_file",
	"pg_read_binary_file",
	"pg_ls_dir",
	"lo_export",
	"lo_import",
	"pg_sleep",
	"pg_terminate_backend",
	"pg_cancel_backend",
	"dblink",
	"dblink_connect",
	"dblink_exec",
	"pg_reload_conf",
	"load_extension",
	"readfile",
	"writefile",
])

/** Keywords that close a FROM list */
const CLAUSE_KEYWORDS = new Set([
	"WHERE",
	"GROUP",
	"ORDER",
	"HAVING",
	"LIMIT",
	"ON",
	"USING",
	"UNION",
	"EXCEPT",
	"INTERSECT",
	"WINDOW",
	"OFFSET",
	"FETCH",
	"SELECT",
])

const COMPARISON_OPERATORS = new Set(["=", "<>", "!=", "<", ">", "<=", ">="])

const NUMERIC_LITERAL_RE = /^\s*[-+]?\d+(\.\d+)?\s*$/

// ============================================================================
// Scanner
// ============================================================================

export type LexemeKind = "word" | "ident" | "string" | "number" | "punct"

export interface Lexeme {
	kind: LexemeKind
	/** Words are upper-cased; identifiers and strings are unquoted */
	text: string
	/** Original spelling, for words and identifiers */
	raw: string
	start: number
}

enum ScanState {
	CODE = "CODE",
	SINGLE_QUOTE = "SINGLE_QUOTE",
	DOUBLE_QUOTE = "DOUBLE_QUOTE",
	DOLLAR_QUOTE = "DOLLAR_QUOTE",
	LINE_COMMENT = "LINE_COMMENT",
	BLOCK_COMMENT = "BLOCK_COMMENT",
}

const TWO_CHAR_OPERATORS = new Set(["<=", ">=", "<>", "!=", "||", "::"])

/**
 * Split SQL into lexemes, dropping comments and whitespace
 */
export function scanSql(sql: string): Lexeme[] {
	const lexemes: Lexeme[] = []
	const len = sql.length
	let i = 0
	let state = ScanState.CODE
	let start = 0
	let buffer = ""
	let dollarTag = ""
	let quoteChar = '"'

	while (i < len) {
		const char = sql[i]
		const next = i + 1 < len ? sql[i + 1] : ""

		switch (state) {
			case ScanState.LINE_COMMENT:
				if (char === "\n") state = ScanState.CODE
				i++
				continue

			case ScanState.BLOCK_COMMENT:
				if (char === "*" && next === "/") {
					state = ScanState.CODE
					i += 2
				} else {
					i++
				}
				continue

			case ScanState.SINGLE_QUOTE:
				if (char === "'") {
					// '' is an escaped quote
					if (next === "'") {
						buffer += "'"
						i += 2
						continue
					}
					lexemes.push({ kind: "string", text: buffer, raw: buffer, start })
					state = ScanState.CODE
				} else {
					buffer += char
				}
				i++
				continue

			case ScanState.DOUBLE_QUOTE:
				if (char === quoteChar) {
					if (next === quoteChar) {
						buffer += char
						i += 2
						continue
					}
					lexemes.push({ kind: "ident", text: buffer, raw: buffer, start })
					state = ScanState.CODE
				} else {
					buffer += char
				}
				i++
				continue

			case ScanState.DOLLAR_QUOTE: {
				const close = `$${dollarTag}$`
				if (sql.startsWith(close, i)) {
					lexemes.push({ kind: "string", text: buffer, raw: buffer, start })
					state = ScanState.CODE
					i += close.length
				} else {
					buffer += char
					i++
				}
				continue
			}

			case ScanState.CODE:
				break
		}

		if (/\s/.test(char)) {
			i++
			continue
		}
		if (char === "-" && next === "-") {
			state = ScanState.LINE_COMMENT
			i += 2
			continue
		}
		if (char === "/" && next === "*") {
			state = ScanState.BLOCK_COMMENT
			start = i
			i += 2
			continue
		}
		if (char === "'") {
			state = ScanState.SINGLE_QUOTE
			start = i
			buffer = ""
			i++
			continue
		}
		if (char === '"' || char === "`") {
			state = ScanState.DOUBLE_QUOTE
			quoteChar = char
			start = i
			buffer = ""
			i++
			continue
		}
		if (char === "$") {
			const tag = /^\$([A-Za-z_]*)\$/.exec(sql.slice(i))
			if (tag) {
				state = ScanState.DOLLAR_QUOTE
				dollarTag = tag[1]
				start = i
				buffer = ""
				i += tag[0].length
				continue
			}
		}

		const rest = sql.slice(i)
		const number = /^(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?/.exec(rest)
		if (number) {
			lexemes.push({ kind: "number", text: number[0], raw: number[0], start: i })
			i += number[0].length
			continue
		}
		const word = /^[\p{L}_][\p{L}\p{N}_$]*/u.exec(rest)
		if (word) {
			lexemes.push({ kind: "word", text: word[0].toUpperCase(), raw: word[0], start: i })
			i += word[0].length
			continue
		}

		const pair = char + next
		const op = TWO_CHAR_OPERATORS.has(pair) ? pair : char
		lexemes.push({ kind: "punct", text: op, raw: op, start: i })
		i += op.length
	}

	switch (state) {
		case ScanState.SINGLE_QUOTE:
		case ScanState.DOLLAR_QUOTE:
			throw new SqlSyntaxError(`Unterminated string literal starting at position ${start}`)
		case ScanState.DOUBLE_QUOTE:
			throw new SqlSyntaxError(`Unterminated quoted identifier starting at position ${start}`)
		case ScanState.BLOCK_COMMENT:
			throw new SqlSyntaxError(`Unterminated block comment starting at position ${start}`)
		default:
			return lexemes
	}
}

// ============================================================================
// Analysis
// ============================================================================

interface Frame {
	/** "(" opening a subquery, or any other parenthesized expression */
	kind: "query" | "expr"
	/** Inside the FROM list of this query level */
	fromList: boolean
	/** Opened as a derived table in a FROM/JOIN position */
	derived: boolean
}

interface ResolvedColumn {
	table: TableInfo
	column: ColumnInfo
	/** Index of the first and last lexeme of the reference */
	first: number
	last: number
}

function isWord(lx: Lexeme | undefined, ...words: string[]): boolean {
	return lx !== undefined && lx.kind === "word" && (words.length === 0 || words.includes(lx.text))
}

function isPunct(lx: Lexeme | undefined, text: string): boolean {
	return lx !== undefined && lx.kind === "punct" && lx.text === text
}

function isName(lx: Lexeme | undefined): lx is Lexeme {
	return lx !== undefined && (lx.kind === "word" || lx.kind === "ident")
}

class StatementAnalyzer {
	private readonly keywords = getLexicon().sqlKeywords
	private readonly tablesByName = new Map<string, TableInfo>()
	private readonly cteNames = new Set<string>()
	/** alias (or table name) → table, lowercase keys */
	private readonly tableAliases = new Map<string, TableInfo>()
	/** aliases of derived tables, CTE references and table functions */
	private readonly opaqueAliases = new Set<string>()
	private readonly columnAliases = new Set<string>()
	/** Lexemes already accounted for (table references, aliases) */
	private readonly consumed = new Set<number>()
	private readonly referenced: TableInfo[] = []
	private readonly resolved: ResolvedColumn[] = []
	private hasOpaqueSource = false

	constructor(
		private readonly lx: Lexeme[],
		private readonly snapshot: SchemaSnapshot,
		private readonly caseSensitive: boolean,
	) {
		for (const table of snapshot.tables) {
			this.tablesByName.set(table.name.toLowerCase(), table)
		}
	}

	/** Catalog table a name lexeme refers to */
	private findTable(name: Lexeme): TableInfo | undefined {
		if (!this.caseSensitive) return this.tablesByName.get(name.raw.toLowerCase())
		return this.snapshot.tables.find((t) => namesMatch(name, t.name, true))
	}

	run(): SqlValidation {
		this.checkStructure()
		this.collectCtes()
		this.collectTables()
		this.collectColumnAliases()
		this.checkColumns()
		this.checkTypes()

		const columns: ColumnRef[] = []
		const seen = new Set<string>()
		for (const r of this.resolved) {
			const key = `${r.table.name}.${r.column.name}`
			if (seen.has(key)) continue
			seen.add(key)
			columns.push({ table: r.table.name, column: r.column.name })
		}
		return { valid: true, tables: [...new Set(this.referenced.map((t) => t.name))], columns }
	}

	private isKeyword(lx: Lexeme): boolean {
		return lx.kind === "word" && this.keywords.has(lx.text.toLowerCase())
	}

	// ==========================================================================
	// Structure and safety
	// ==========================================================================

	private checkStructure(): void {
		const lx = this.lx
		if (lx.length === 0) {
			throw new SqlSyntaxError("Empty SQL statement")
		}

		for (let i = 0; i < lx.length; i++) {
			const cur = lx[i]
			if (cur.kind !== "word") continue
			if (DANGEROUS_KEYWORDS.has(cur.text) && !isPunct(lx[i + 1], "(")) {
				throw new QueryRuntimeError("permission", `Statement is not read-only: ${cur.text} is not allowed`, {
					keyword: cur.text,
				})
			}
			if (DANGEROUS_FUNCTIONS.has(cur.raw.toLowerCase()) && isPunct(lx[i + 1], "(")) {
				throw new QueryRuntimeError("permission", `Function ${cur.raw} is not allowed`, { function: cur.raw })
			}
		}

		if (!isWord(lx[0], "SELECT", "WITH")) {
			throw new SqlSyntaxError(`Only SELECT statements are allowed, got ${lx[0].raw}`)
		}

		// Trailing semicolons are fine, anything after one is another statement
		let end = lx.length
		while (end > 0 && isPunct(lx[end - 1], ";")) end--
		if (lx.slice(0, end).some((l) => isPunct(l, ";"))) {
			throw new SqlSyntaxError("Multiple statements are not allowed")
		}
		lx.length = end

		let depth = 0
		for (const l of lx) {
			if (isPunct(l, "(")) depth++
			if (isPunct(l, ")")) depth--
			if (depth < 0) break
		}
		if (depth !== 0) {
			throw new SqlSyntaxError("Unbalanced parentheses")
		}
	}

	// ==========================================================================
	// Tables
	// ==========================================================================

	/**
	 * WITH name [(cols)] AS (SELECT ...)
	 */
	private collectCtes(): void {
		const lx = this.lx
		for (let i = 1; i < lx.length - 2; i++) {
			if (!isWord(lx[i], "AS") || !isPunct(lx[i + 1], "(") || !isWord(lx[i + 2], "SELECT", "WITH", "VALUES")) {
				continue
			}
			let nameAt = i - 1
			if (isPunct(lx[nameAt], ")")) {
				let depth = 0
				for (; nameAt >= 0; nameAt--) {
					if (isPunct(lx[nameAt], ")")) depth++
					if (isPunct(lx[nameAt], "(")) depth--
					if (depth === 0) break
				}
				nameAt--
			}
			const name = lx[nameAt]
			if (isName(name)) {
				this.cteNames.add(name.raw.toLowerCase())
				this.consumed.add(nameAt)
			}
		}
	}

	private collectTables(): void {
		const lx = this.lx
		const frames: Frame[] = [{ kind: "query", fromList: false, derived: false }]
		let expectTable = false

		for (let i = 0; i < lx.length; i++) {
			const cur = lx[i]
			const frame = frames[frames.length - 1]

			if (isPunct(cur, "(")) {
				frames.push({
					kind: isWord(lx[i + 1], "SELECT", "WITH", "VALUES") ? "query" : "expr",
					fromList: false,
					derived: expectTable,
				})
				if (expectTable) this.hasOpaqueSource = true
				expectTable = false
				continue
			}
			if (isPunct(cur, ")")) {
				const closed = frames.pop()
				if (closed?.derived) i = this.takeAlias(i + 1, null) - 1
				continue
			}

			if (expectTable) {
				expectTable = false
				if (isWord(cur, "LATERAL", "ONLY")) {
					expectTable = true
					continue
				}
				if (isName(cur)) i = this.takeTableRef(i) - 1
				continue
			}

			if (frame.kind !== "query") continue

			if (isWord(cur, "FROM")) {
				frame.fromList = true
				expectTable = true
			} else if (isWord(cur, "JOIN")) {
				expectTable = true
			} else if (isPunct(cur, ",") && frame.fromList) {
				expectTable = true
			} else if (cur.kind === "word" && CLAUSE_KEYWORDS.has(cur.text)) {
				frame.fromList = false
			}
		}
	}

	/**
	 * [schema.]table [[AS] alias]; returns the index after the reference
	 */
	private takeTableRef(at: number): number {
		const lx = this.lx
		let j = at
		const parts = [lx[j]]
		this.consumed.add(j)
		while (isPunct(lx[j + 1], ".") && isName(lx[j + 2])) {
			parts.push(lx[j + 2])
			this.consumed.add(j + 2)
			j += 2
		}
		const nameLexeme = parts[parts.length - 1]
		const name = nameLexeme.raw
		j++

		// Table function: FROM json_each(...), generate_series(...)
		if (isPunct(lx[j], "(")) {
			this.hasOpaqueSource = true
			return j
		}

		const lower = name.toLowerCase()
		if (this.cteNames.has(lower) && parts.length === 1) {
			this.hasOpaqueSource = true
			this.opaqueAliases.add(lower)
			return this.takeAlias(j, null)
		}

		const table = this.findTable(nameLexeme)
		if (!table) {
			throw new SchemaError(`Unknown table: ${name}`, { object: "table", identifier: name })
		}
		this.referenced.push(table)
		this.tableAliases.set(lower, table)
		return this.takeAlias(j, table)
	}

	/**
	 * Optional [AS] alias at `at`; registers it and returns the index after it
	 */
	private takeAlias(at: number, table: TableInfo | null): number {
		const lx = this.lx
		let j = at
		if (isWord(lx[j], "AS")) j++
		const alias = lx[j]
		if (!isName(alias) || this.isKeyword(alias)) return at

		const lower = alias.raw.toLowerCase()
		if (table) {
			this.tableAliases.set(lower, table)
		} else {
			this.opaqueAliases.add(lower)
		}
		this.consumed.add(j)
		// Column list of a derived table alias: AS t(a, b)
		if (isPunct(lx[j + 1], "(")) {
			let k = j + 2
			for (; k < lx.length && !isPunct(lx[k], ")"); k++) this.consumed.add(k)
			return k + 1
		}
		return j + 1
	}

	// ==========================================================================
	// Columns
	// ==========================================================================

	/**
	 * `expr AS alias` and bare `expr alias` in select lists
	 */
	private collectColumnAliases(): void {
		const lx = this.lx
		for (let i = 1; i < lx.length; i++) {
			const cur = lx[i]
			if (this.consumed.has(i) || !isName(cur) || this.isKeyword(cur)) continue
			if (isPunct(lx[i + 1], "(") || isPunct(lx[i + 1], ".")) continue

			const prev = lx[i - 1]
			const afterValue =
				(isName(prev) && !this.isKeyword(prev)) ||
				prev.kind === "string" ||
				prev.kind === "number" ||
				isPunct(prev, ")") ||
				isWord(prev, "END")
			if (isWord(prev, "AS") || afterValue) {
				this.columnAliases.add(cur.raw.toLowerCase())
				this.consumed.add(i)
			}
		}
	}

	private checkColumns(): void {
		const lx = this.lx
		for (let i = 0; i < lx.length; i++) {
			const cur = lx[i]
			if (this.consumed.has(i) || !isName(cur)) continue
			if (cur.kind === "word" && this.isKeyword(cur)) continue
			if (isPunct(lx[i + 1], "(")) continue
			if (isPunct(lx[i - 1], "::")) continue

			if (isPunct(lx[i + 1], ".")) {
				i = this.checkQualified(i) - 1
				continue
			}
			this.checkUnqualified(i)
		}
	}

	/**
	 * [schema.]qualifier.column or qualifier.*; returns the index after it
	 */
	private checkQualified(at: number): number {
		const lx = this.lx
		const parts: Lexeme[] = [lx[at]]
		let j = at
		while (isPunct(lx[j + 1], ".") && (isName(lx[j + 2]) || isPunct(lx[j + 2], "*"))) {
			parts.push(lx[j + 2])
			j += 2
		}
		const next = j + 1
		if (parts.length < 2) return next

		const columnLexeme = parts[parts.length - 1]
		const qualifier = parts[parts.length - 2].raw
		const lowerQualifier = qualifier.toLowerCase()

		if (this.opaqueAliases.has(lowerQualifier) || this.cteNames.has(lowerQualifier)) return next

		const table = this.tableAliases.get(lowerQualifier) ?? this.findTable(parts[parts.length - 2])
		if (!table) {
			throw new SchemaError(`Unknown table or alias: ${qualifier}`, { object: "table", identifier: qualifier })
		}
		if (columnLexeme.kind === "punct") return next

		const name = columnLexeme.raw
		const column = findColumn(table, columnLexeme, this.caseSensitive)
		if (!column) {
			throw new SchemaError(`Unknown column: ${qualifier}.${name}`, {
				object: "column",
				identifier: name,
				qualifier,
			})
		}
		this.resolved.push({ table, column, first: at, last: j })
		return next
	}

	private checkUnqualified(at: number): void {
		const cur = this.lx[at]
		const lower = cur.raw.toLowerCase()
		if (this.columnAliases.has(lower) || this.tableAliases.has(lower)) return
		if (this.opaqueAliases.has(lower) || this.cteNames.has(lower)) return
		if (this.referenced.length === 0) return

		for (const table of this.referenced) {
			const column = findColumn(table, cur, this.caseSensitive)
			if (column) {
				this.resolved.push({ table, column, first: at, last: at })
				return
			}
		}
		// Columns may come from a source whose shape is unknown here
		if (this.hasOpaqueSource) return

		throw new SchemaError(`Unknown column: ${cur.raw}`, { object: "column", identifier: cur.raw })
	}

	// ==========================================================================
	// Types
	// ==========================================================================

	private checkTypes(): void {
		const lx = this.lx
		const byFirst = new Map<number, ResolvedColumn>()
		const byLast = new Map<number, ResolvedColumn>()
		for (const r of this.resolved) {
			byFirst.set(r.first, r)
			byLast.set(r.last, r)
		}
		const label = (r: ResolvedColumn) => `${r.table.name}.${r.column.name}`
		const context = (r: ResolvedColumn) => ({ table: r.table.name, column: r.column.name, data_type: r.column.data_type })

		for (let k = 0; k < lx.length; k++) {
			const cur = lx[k]

			if (isWord(cur, "LIKE", "ILIKE")) {
				const left = byLast.get(isWord(lx[k - 1], "NOT") ? k - 2 : k - 1)
				if (left && isNumericType(left.column.data_type)) {
					throw new QueryRuntimeError(
						"type",
						`${cur.text} cannot be applied to numeric column ${label(left)} (${left.column.data_type})`,
						context(left),
					)
				}
				continue
			}

			if (cur.kind === "punct" && COMPARISON_OPERATORS.has(cur.text)) {
				const pairs: Array<[ResolvedColumn | undefined, Lexeme | undefined]> = [
					[byLast.get(k - 1), lx[k + 1]],
					[byFirst.get(k + 1), lx[k - 1]],
				]
				for (const [column, literal] of pairs) {
					if (!column || literal?.kind !== "string") continue
					if (isNumericType(column.column.data_type) && !NUMERIC_LITERAL_RE.test(literal.text)) {
						throw new QueryRuntimeError(
							"type",
							`Numeric column ${label(column)} compared with non-numeric value '${literal.text}'`,
							context(column),
						)
					}
				}
				continue
			}

			if (isWord(cur, "SUM", "AVG") && isPunct(lx[k + 1], "(")) {
				const argAt = isWord(lx[k + 2], "DISTINCT") ? k + 3 : k + 2
				const arg = byFirst.get(argAt)
				if (arg && isPunct(lx[arg.last + 1], ")") && isTextType(arg.column.data_type)) {
					throw new QueryRuntimeError(
						"type",
						`${cur.text} cannot be applied to text column ${label(arg)} (${arg.column.data_type})`,
						context(arg),
					)
				}
			}
		}
	}
}

/**
 * Whether a name lexeme denotes a catalog name. Case-sensitive engines fold
 * unquoted names to lowercase and match quoted ones exactly.
 */
function namesMatch(name: Lexeme, catalogName: string, caseSensitive: boolean): boolean {
	if (!caseSensitive) return name.raw.toLowerCase() === catalogName.toLowerCase()
	return name.kind === "ident" ? name.raw === catalogName : name.raw.toLowerCase() === catalogName
}

function findColumn(table: TableInfo, name: Lexeme, caseSensitive: boolean): ColumnInfo | undefined {
	return table.columns.find((c) => namesMatch(name, c.name, caseSensitive))
}

// ============================================================================
// Entry Point
// ============================================================================

export interface ValidateOptions {
	/** Match names the way a case-sensitive engine (PostgreSQL) resolves them */
	identifiersCaseSensitive?: boolean
}

/**
 * Validate SQL against a schema snapshot. Never throws for problems in the
 * statement itself; they come back as the verdict's error.
 */
export function validateSql(sql: string, snapshot: SchemaSnapshot, options: ValidateOptions = {}): SqlValidation {
	try {
		return new StatementAnalyzer(scanSql(sql), snapshot, options.identifiersCaseSensitive ?? false).run()
	} catch (err) {
		if (err instanceof QueryMendError) return { valid: false, error: err }
		throw err
	}
}
