import { describe, it, expect } from "vitest"
import { capitalizedPhrases, extractEntities, quotedValues, replaceWord } from "./entity_extractor.js"
import { makeKnowledgeBase } from "./test_support.js"

describe("extractEntities", () => {
	const kb = makeKnowledgeBase()

	it("picks up a person name", () => {
		expect(extractEntities("Show me Steve Muray", kb)).toEqual({ name: "Steve Muray" })
	})

	it("collects tables, thresholds, limits, locations and dates", () => {
		const entities = extractEntities("List the top 5 customers in Oslo with more than 3 invoices since 2021-03-01", kb)
		expect(entities).toEqual({
			date: "2021-03-01",
			greater_than: "3",
			limit: "5",
			location: "Oslo",
			table: "customers",
			table_2: "invoices",
		})
	})

	it("keeps quoted values and does not repeat them as names", () => {
		expect(extractEntities('Find artists named "Led Zepelin"', kb)).toEqual({
			value: "Led Zepelin",
			table: "artists",
		})
	})

	it("numbers repeated roles and dedupes identical values", () => {
		expect(extractEntities("Customers in Oslo and customers in Prague", kb)).toEqual({
			location: "Oslo",
			location_2: "Prague",
			table: "customers",
		})
	})

	it("reads standalone years", () => {
		expect(extractEntities("Invoices in 2021 over 100", kb)).toEqual({
			year: "2021",
			greater_than: "100",
			table: "invoices",
		})
	})

	it("treats table words as names when no knowledge base is given", () => {
		expect(extractEntities("Customers from Canada")).toEqual({ location: "Canada", name: "Customers" })
		expect(extractEntities("Customers from Canada", kb)).toEqual({ location: "Canada", table: "customers" })
	})
})

describe("text helpers", () => {
	it("finds quoted values but not apostrophes", () => {
		expect(quotedValues("Who is 'Helena Holy'?")).toEqual(["Helena Holy"])
		expect(quotedValues("O'Brien's invoices")).toEqual([])
	})

	it("strips stopwords from capitalized runs", () => {
		expect(capitalizedPhrases("Show Steve Murray")).toEqual(["Steve Murray"])
	})

	it("replaces whole words only", () => {
		expect(replaceWord("Show me Muray and Murayx", "Muray", "Murray")).toBe("Show me Murray and Murayx")
		expect(replaceWord("Bjorn's albums", "Bjorn", "Bjørn")).toBe("Bjørn's albums")
		expect(replaceWord("a Cost b", "Cost", "$1")).toBe("a $1 b")
	})
})
