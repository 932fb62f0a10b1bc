import { describe, it, expect } from "vitest"
import { extractJSONObject, ModelSemanticJudge, NO_JSON_REASON, parseVerdict } from "./semantic_judge.js"
import { silentLogger } from "./logger.js"
import { doctorSchema, ScriptedModel } from "./test_fixtures.js"

const candidate = { sql: "SELECT COUNT(*) FROM doctor_info", iteration_index: 1 }

describe("extractJSONObject", () => {
	it("should read a fenced json block", () => {
		expect(extractJSONObject('```json\n{"valid": true}\n```')).toEqual({ valid: true })
	})

	it("should read the outermost braces inside prose", () => {
		expect(extractJSONObject('Verdict: {"valid": false, "reason": "x"} done')).toEqual({ valid: false, reason: "x" })
	})

	it("should return undefined for arrays and plain text", () => {
		expect(extractJSONObject("[1, 2]")).toBeUndefined()
		expect(extractJSONObject("looks fine")).toBeUndefined()
	})
})

describe("parseVerdict", () => {
	it("should default need_regenerate to the negation of valid", () => {
		expect(parseVerdict('{"valid": false, "reason": "wrong filter", "fix_suggestion": "drop WHERE"}')).toEqual({
			valid: false,
			reason: "wrong filter",
			fix_suggestion: "drop WHERE",
			need_regenerate: true,
		})
	})

	it("should reject objects without a boolean valid", () => {
		expect(parseVerdict('{"valid": "yes"}')).toBeNull()
	})
})

describe("ModelSemanticJudge", () => {
	it("should accept a valid verdict", async () => {
		const model = new ScriptedModel({
			judge: ['{"valid": true, "reason": "counts all doctors", "fix_suggestion": "", "need_regenerate": false}'],
		})
		const result = await new ModelSemanticJudge(model, silentLogger).check("How many doctors?", candidate, doctorSchema())

		expect(result).toEqual({
			layer_id: "semantic",
			valid: true,
			reason: "counts all doctors",
			errors: [],
			metrics: {},
			details: { need_regenerate: false },
		})
		expect(model.calls[0].role).toBe("judge")
		expect(model.calls[0].messages[1].content).toContain("Candidate SQL:\nSELECT COUNT(*) FROM doctor_info")
	})

	it("should carry the fix suggestion of an invalid verdict", async () => {
		const model = new ScriptedModel({
			judge: ['{"valid": false, "reason": "filters on missing column", "fix_suggestion": "use department", "need_regenerate": true}'],
		})
		const result = await new ModelSemanticJudge(model, silentLogger).check("q", candidate, doctorSchema())

		expect(result.valid).toBe(false)
		expect(result.reason).toBe("filters on missing column")
		expect(result.fix_suggestion).toBe("use department")
		expect(result.errors).toEqual(["filters on missing column"])
	})

	it("should turn unparseable output into an invalid result", async () => {
		const model = new ScriptedModel({ judge: ["The query looks correct to me."] })
		const result = await new ModelSemanticJudge(model, silentLogger).check("q", candidate, doctorSchema())

		expect(result.valid).toBe(false)
		expect(result.reason).toBe(NO_JSON_REASON)
		expect(result.errors).toEqual([NO_JSON_REASON])
		expect(result.details).toEqual({ need_regenerate: true })
	})
})
