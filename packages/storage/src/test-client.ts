/**
 * In-process stand-in for a pg client, for repository and migration tests.
 *
 * Drizzle sends every statement (including BEGIN/COMMIT/ROLLBACK when the
 * client is not a Pool) through `client.query`, so the recorded texts show
 * the full statement order of a unit of work.
 */

import { drizzle } from "drizzle-orm/node-postgres";
import type { Client } from "pg";
import type { Database } from "./db.js";
import * as schema from "./schema/index.js";

export interface RecordedQuery {
	text: string;
	params: unknown[];
}

/** Rows to return, an error to throw, or undefined for an empty result */
export type QueryResponder = (query: RecordedQuery) => Record<string, unknown>[] | Error | undefined;

export class RecordingPgClient {
	readonly queries: RecordedQuery[] = [];

	constructor(private respond: QueryResponder = () => undefined) {}

	async query(config: string | { text: string }, params: unknown[] = []) {
		const query = { text: typeof config === "string" ? config : config.text, params };
		this.queries.push(query);

		const response = this.respond(query);
		if (response instanceof Error) {
			throw response;
		}

		const rows = response ?? [];
		return { command: "", rowCount: rows.length, oid: 0, rows, fields: [] };
	}

	/** First word of each statement, lowercased */
	verbs(): string[] {
		return this.queries.map((q) => q.text.trim().split(/\s+/)[0]?.toLowerCase() ?? "");
	}
}

export function createRecordingDb(respond?: QueryResponder): { db: Database; client: RecordingPgClient } {
	const client = new RecordingPgClient(respond);
	// Drizzle only calls `query` on a non-Pool client
	const db = drizzle(client as unknown as Client, { schema });
	return { db, client };
}
