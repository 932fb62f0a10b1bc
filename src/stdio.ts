#!/usr/bin/env node
/**
 * Stdio entry point for the SQL Judge MCP Server
 *
 * Config priority:
 *   1. CLI argument (JSON, merged over the loaded config)
 *   2. Environment variables
 *   3. config/config.local.yaml, then config/config.yaml
 *
 * Usage:
 *   node stdio.js '{"database":{"host":"db.internal","name":"clinic"}}'
 *
 * Or via environment variables:
 *   DB_HOST=db.internal DB_NAME=clinic MODEL_SERVER=http://localhost:8000/v1 node stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { z } from "zod"
import { deepMerge, loadConfig, parseConfig, type SQLJudgeConfig } from "./config/loadConfig.js"
import { errorMessage } from "./config.js"
import createServer from "./index.js"
import { createStderrLogger } from "./logger.js"
import { createPipelineContext } from "./pipeline_context.js"

function resolveConfig(): SQLJudgeConfig {
	const config = loadConfig()
	const configArg = process.argv[2]
	if (!configArg) return config

	const override = z.record(z.unknown()).parse(JSON.parse(configArg))
	return parseConfig(deepMerge(config, override))
}

async function main() {
	let config: SQLJudgeConfig
	try {
		config = resolveConfig()
	} catch (e) {
		process.stderr.write(`[ERROR] Failed to load config: ${errorMessage(e)}\n`)
		process.exit(1)
	}

	const logger = createStderrLogger(config.logging.level)
	logger.info("Starting SQL Judge MCP Server with stdio transport", {
		database: `${config.database.user}@${config.database.host}:${config.database.port}/${config.database.name}`,
		model: config.model.llm,
		max_iterations: config.judge.max_iterations,
		precheck_mode: config.judge.precheck_mode,
	})

	const ctx = createPipelineContext(config, logger)
	const server = createServer({ ctx })

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("SQL Judge MCP Server running via stdio")

	const shutdown = async () => {
		logger.info("Shutting down...")
		await server.close()
		await ctx.close()
		process.exit(0)
	}

	process.on("SIGINT", () => {
		shutdown().catch((err) => {
			logger.error("Shutdown failed", { error: errorMessage(err) })
			process.exit(1)
		})
	})
	process.on("SIGTERM", () => {
		shutdown().catch((err) => {
			logger.error("Shutdown failed", { error: errorMessage(err) })
			process.exit(1)
		})
	})
}

main().catch((error) => {
	process.stderr.write(`[ERROR] Fatal error: ${errorMessage(error)}\n`)
	process.exit(1)
})
