/**
 * Shared descriptors, doubles and an in-process database for unit tests.
 */

import { PGlite } from "@electric-sql/pglite"
import type { ModelRole } from "./config/loadConfig.js"
import { RAW_TEXT_PARSERS, runScoped, type DataSource, type QueryOptions, type QueryOutput, type Row, type SqlSession } from "./data_source.js"
import type { LanguageModel, PromptMessage } from "./llm_client.js"
import type { SchemaDescriptor } from "./schema_types.js"

export function doctorSchema(): SchemaDescriptor {
	return {
		database: "hospital",
		table: "doctor_info",
		columns: [
			{ name: "doctor_id", type: "integer", nullable: false, comment: "primary key", sample_values: [], constrained: false },
			{ name: "name", type: "text", nullable: false, comment: "doctor name", sample_values: ["Li Wei", "Zhang Min"], constrained: false },
			{
				name: "department",
				type: "text",
				nullable: true,
				comment: "department",
				sample_values: ["Cardiology", "Neurology", "Pediatrics"],
				constrained: true,
			},
			{ name: "title", type: "text", nullable: true, comment: "job title", sample_values: ["Chief Physician", "Resident"], constrained: true },
			{ name: "hire_date", type: "date", nullable: true, comment: "hire date", sample_values: [], constrained: false },
		],
	}
}

/**
 * LanguageModel double: answers from per-role reply queues and records calls.
 * The last reply of a queue repeats once the queue is drained.
 */
export class ScriptedModel implements LanguageModel {
	calls: { messages: PromptMessage[]; role: ModelRole }[] = []

	constructor(private replies: Partial<Record<ModelRole, string[]>>) {}

	async complete(messages: PromptMessage[], role: ModelRole): Promise<string> {
		this.calls.push({ messages, role })
		const queue = this.replies[role]
		if (!queue || queue.length === 0) throw new Error(`no scripted reply for role ${role}`)
		return queue.length > 1 ? (queue.shift() ?? "") : queue[0]
	}

	callsFor(role: ModelRole): PromptMessage[][] {
		return this.calls.filter((c) => c.role === role).map((c) => c.messages)
	}
}

/**
 * DataSource over an in-process PGlite database.
 */
export class PgliteDataSource implements DataSource {
	statements: string[] = []

	constructor(public db: PGlite) {}

	async query<T extends Row>(sql: string, params: unknown[] = [], options: QueryOptions = {}): Promise<QueryOutput<T>> {
		this.statements.push(sql)
		return this.db.transaction((tx) => {
			const session: SqlSession = {
				query: async <R extends Row>(text: string, values: unknown[] = []) => {
					const result = await tx.query<R>(text, values, { parsers: RAW_TEXT_PARSERS })
					return { rows: result.rows, fields: result.fields }
				},
			}
			return runScoped<T>(session, sql, params, options)
		})
	}

	async close(): Promise<void> {
		await this.db.close()
	}
}

/** Fresh in-memory database holding the `hospital.doctor_info` table. */
export async function createHospitalDatabase(): Promise<PgliteDataSource> {
	const db = new PGlite()
	await db.exec(`
		CREATE SCHEMA hospital;
		CREATE TABLE hospital.doctor_info (
			doctor_id INTEGER PRIMARY KEY,
			name TEXT NOT NULL,
			department TEXT,
			title TEXT,
			hire_date DATE,
			salary NUMERIC(10, 2)
		);
		COMMENT ON COLUMN hospital.doctor_info.name IS 'doctor name';
		COMMENT ON COLUMN hospital.doctor_info.department IS 'department';
		INSERT INTO hospital.doctor_info VALUES
			(1, 'Li Wei', 'Cardiology', 'Chief Physician', '2015-03-01', 32000.50),
			(2, 'Zhang Min', 'Neurology', 'Resident', '2020-07-15', 18000.00),
			(3, 'Wang Fang', 'Cardiology', 'Resident', '2021-09-01', 17500.00),
			(4, 'Chen Jie', 'Pediatrics', NULL, '2019-01-20', 21000.00),
			(5, 'Liu Yang', 'Cardiology', 'Chief Physician', NULL, NULL);
	`)
	return new PgliteDataSource(db)
}
