import { describe, it, expect } from "vitest"
import { cleanExplanation, detectLanguage, ModelRoundTripExplainer, roundTripResult } from "./round_trip.js"
import { ScriptedModel } from "./test_fixtures.js"

describe("cleanExplanation", () => {
	it("should strip fences and collapse whitespace", () => {
		expect(cleanExplanation("```text\nCounts all\n  doctors.\n```")).toBe("Counts all doctors.")
	})
})

describe("ModelRoundTripExplainer", () => {
	it("should call the explainer role with the answer language", async () => {
		const model = new ScriptedModel({ explainer: ["  How many doctors are there in total?\n"] })
		const explainer = new ModelRoundTripExplainer(model)

		const text = await explainer.explain({ sql: "SELECT COUNT(*) FROM doctor_info", iteration_index: 1 }, "Chinese")

		expect(text).toBe("How many doctors are there in total?")
		expect(model.calls[0].role).toBe("explainer")
		expect(model.calls[0].messages[1].content).toBe("SQL:\nSELECT COUNT(*) FROM doctor_info\n\nAnswer in Chinese.")
	})
})

describe("detectLanguage", () => {
	it("should name Chinese for Han characters and English otherwise", () => {
		expect(detectLanguage("查询医生总人数是多少？")).toBe("Chinese")
		expect(detectLanguage("how many cardiologists were hired last year")).toBe("English")
	})
})

describe("roundTripResult", () => {
	it("should always pass and carry the explanation", () => {
		expect(roundTripResult("Counts doctors.")).toEqual({
			layer_id: "round_trip",
			valid: true,
			errors: [],
			metrics: { explanation_length: 15 },
			details: { explanation: "Counts doctors." },
		})
	})
})
