/**
 * Run one question through generate + execute and print the outcome.
 *
 * Usage:
 *   tsx scripts/judge_single.ts <database> <table> "<question>"
 */

import { loadConfig } from "../src/config/loadConfig.js"
import { createStderrLogger } from "../src/logger.js"
import { createPipelineContext } from "../src/pipeline_context.js"
import { executeSql, generateSql } from "../src/query_tools.js"

async function main() {
	const [database, table, question] = process.argv.slice(2)
	if (!database || !table || !question) {
		console.error('Usage: tsx scripts/judge_single.ts <database> <table> "<question>"')
		process.exit(1)
	}

	const config = loadConfig()
	const ctx = createPipelineContext(config, createStderrLogger(config.logging.level))

	try {
		const generated = await generateSql({ database, table, question }, ctx)

		console.log("\n=== JUDGE ===")
		for (const record of generated.judge?.iterations ?? []) {
			const failed = record.layer_results.filter((r) => !r.valid).map((r) => r.layer_id)
			console.log(
				`#${record.iteration_index} ${record.valid ? "PASS" : "FAIL"}`,
				record.candidate?.sql ?? "(no SQL)",
				failed.length > 0 ? `failed: ${failed.join(", ")}` : "",
			)
		}
		console.log("Steps:", generated.steps.join(" | "))

		if (!generated.ok || !generated.sql) {
			console.log("Error:", generated.error)
			return
		}

		const executed = await executeSql({ database, table, question, sql: generated.sql }, ctx)
		console.log("\n=== RESULT ===")
		console.log("SQL:", generated.sql)
		console.log("Rows:", executed.row_count ?? 0)
		if (executed.error) console.log("Error:", executed.error)
		if (executed.analysis) console.log("Analysis:", executed.analysis.report)
	} finally {
		await ctx.close()
	}
}

main().catch((err) => {
	console.error(err)
	process.exit(1)
})
