/**
 * SQL Judge MCP Server
 *
 * Registers the query tools on an McpServer. Transport setup lives in stdio.ts.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import type { PipelineContext } from "./pipeline_context.js"
import { chat, executeSql, generateSql, listDatabases, listTables } from "./query_tools.js"

export const SERVER_NAME = "sql-judge"
export const SERVER_VERSION = "0.1.0"

export interface ServerOptions {
	ctx: PipelineContext
}

interface ToolResponse {
	ok: boolean
}

/**
 * Wrap a tool response as MCP text content; `ok: false` marks the result as an error.
 */
export function toolResult(response: ToolResponse) {
	return {
		content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
		isError: !response.ok,
	}
}

const tableTarget = {
	database: z.string().min(1).describe("Schema that holds the table"),
	table: z.string().min(1).describe("Table the question is about"),
}

export default function createServer({ ctx }: ServerOptions): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })
	const { logger } = ctx

	server.registerTool(
		"generate_sql",
		{
			description:
				"Translate a natural-language question about one table into a single read-only SELECT. " +
				"The SQL is judged by syntax, semantic, round-trip similarity and plan checks and regenerated with feedback until it passes.",
			inputSchema: {
				...tableTarget,
				question: z.string().min(1).describe("Question in natural language"),
			},
			annotations: { readOnlyHint: true },
		},
		async (args, extra) => {
			logger.debug("Tool called", { tool: "generate_sql" })
			return toolResult(await generateSql(args, ctx, { signal: extra.signal }))
		},
	)

	server.registerTool(
		"execute_sql",
		{
			description:
				"Run a SELECT against the table inside a read-only transaction and return typed rows, " +
				"a statistical summary and a short written analysis.",
			inputSchema: {
				...tableTarget,
				sql: z.string().min(1).describe("SELECT statement to run"),
				question: z.string().optional().describe("Question the SQL answers, used for the analysis"),
			},
			annotations: { readOnlyHint: true },
		},
		async (args) => {
			logger.debug("Tool called", { tool: "execute_sql" })
			return toolResult(await executeSql(args, ctx))
		},
	)

	server.registerTool(
		"chat",
		{
			description:
				"Answer the last user turn of a conversation: generate and judge SQL, run it and analyze the result. " +
				"Returns a list of typed messages (judge, sql, table, analysis, text).",
			inputSchema: {
				history: z
					.array(
						z.object({
							role: z.enum(["user", "assistant", "system"]),
							content: z.string(),
						}),
					)
					.describe("Conversation so far, oldest first"),
				database: z.string().optional().describe("Selected schema"),
				table: z.string().optional().describe("Selected table"),
			},
			annotations: { readOnlyHint: true },
		},
		async (args, extra) => {
			logger.debug("Tool called", { tool: "chat" })
			return toolResult(await chat(args, ctx, { signal: extra.signal }))
		},
	)

	server.registerTool(
		"list_databases",
		{
			description: "List the schemas available to query.",
			annotations: { readOnlyHint: true },
		},
		async () => toolResult(await listDatabases(ctx)),
	)

	server.registerTool(
		"list_tables",
		{
			description: "List the tables and views of a schema.",
			inputSchema: { database: tableTarget.database },
			annotations: { readOnlyHint: true },
		},
		async (args) => toolResult(await listTables(args.database, ctx)),
	)

	return server
}
