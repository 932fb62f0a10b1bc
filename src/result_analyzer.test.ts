import { describe, it, expect } from "vitest"
import { CollaboratorError } from "./config.js"
import type { LanguageModel } from "./llm_client.js"
import { silentLogger } from "./logger.js"
import { renderMarkdownTable, renderSummary, ResultAnalyzer, summarizeTable } from "./result_analyzer.js"
import { normalizeRows } from "./result_normalizer.js"
import { ScriptedModel } from "./test_fixtures.js"

const table = normalizeRows(
	[
		{ department: "Cardiology", doctors: "3", avg_salary: "24750.25" },
		{ department: "Neurology", doctors: "1", avg_salary: null },
		{ department: "Pediatrics", doctors: "1", avg_salary: "21000.00" },
	],
	[
		{ name: "department", dataTypeID: 25 },
		{ name: "doctors", dataTypeID: 20 },
		{ name: "avg_salary", dataTypeID: 1700 },
	],
)

describe("summarizeTable", () => {
	it("should compute numeric stats and skip text columns", () => {
		const summary = summarizeTable(table)

		expect(summary.fields).toEqual(["department", "doctors", "avg_salary"])
		expect(summary.record_count).toBe(3)
		expect(summary.numeric).toEqual([
			{ column: "doctors", min: 1, max: 3, sum: 5 },
			{ column: "avg_salary", min: 21000, max: 24750.25, sum: 45750.25 },
		])
		expect(summary.preview.rows).toHaveLength(3)
	})

	it("should preview at most ten rows", () => {
		const rows = Array.from({ length: 12 }, (_v, i) => ({ n: i }))
		const summary = summarizeTable(normalizeRows(rows, [{ name: "n", dataTypeID: 23 }]))
		expect(summary.record_count).toBe(12)
		expect(summary.preview.rows).toHaveLength(10)
	})
})

describe("renderSummary", () => {
	it("should render fields, stats and a markdown preview", () => {
		const small = normalizeRows([{ title: "A|B", n: 2 }], [
			{ name: "title", dataTypeID: 25 },
			{ name: "n", dataTypeID: 23 },
		])
		expect(renderSummary(summarizeTable(small))).toBe(
			[
				"Fields: title, n",
				"Records: 1",
				"Numeric columns:",
				"- n: min=2, max=2, sum=2",
				"Preview:",
				"| title | n |",
				"| --- | --- |",
				"| A\\|B | 2 |",
			].join("\n"),
		)
	})

	it("should render an empty table as a header only", () => {
		expect(renderMarkdownTable({ columns: ["a"], rows: [] })).toBe("| a |\n| --- |")
	})
})

describe("ResultAnalyzer", () => {
	it("should ask the analyst role with the rendered summary", async () => {
		const model = new ScriptedModel({ analyst: ["  Cardiology has the most doctors.\n"] })
		const summary = summarizeTable(table)
		const report = await new ResultAnalyzer(model, silentLogger).report("doctors per department", summary)

		expect(report).toBe("Cardiology has the most doctors.")
		expect(model.calls[0].role).toBe("analyst")
		expect(model.calls[0].messages[1].content).toBe(`Question: doctors per department\n\nData summary:\n${renderSummary(summary)}`)
	})

	it("should degrade to a notice when the model is unavailable", async () => {
		const model: LanguageModel = {
			complete: async () => {
				throw new CollaboratorError("unavailable", "Model server returned 503")
			},
		}
		const report = await new ResultAnalyzer(model, silentLogger).report("q", summarizeTable(table))
		expect(report).toBe("Report unavailable: Model server returned 503")
	})
})
