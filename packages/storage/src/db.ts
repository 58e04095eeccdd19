/**
 * Drizzle PostgreSQL Database Client
 *
 * Lazily created pg pool and drizzle instance. The first caller supplies the
 * connection string (from `JobConfig.databaseUrl`); later callers reuse the
 * same pool until `closeDb()`.
 *
 * @example
 * import { getDb, closeDb } from "@eodgex/storage";
 * const db = getDb(config.databaseUrl);
 * // ...
 * await closeDb();
 */

import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "./schema/index.js";

export type Database = NodePgDatabase<typeof schema>;
export type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

// Singleton pool and database instances
let _pool: pg.Pool | null = null;
let _db: Database | null = null;

/**
 * Get the PostgreSQL connection pool.
 *
 * @throws {Error} when no pool exists yet and no connection string is given
 */
export function getPool(connectionString?: string): pg.Pool {
	if (!_pool) {
		if (!connectionString) {
			throw new Error("DATABASE_URL not configured. Set DATABASE_URL before writing to the database.");
		}
		_pool = new pg.Pool({
			connectionString,
			max: 4,
			idleTimeoutMillis: 20_000,
			connectionTimeoutMillis: 20_000,
		});
	}
	return _pool;
}

/**
 * Get the Drizzle database instance, creating the pool on first call.
 */
export function getDb(connectionString?: string): Database {
	if (!_db) {
		_db = drizzle(getPool(connectionString), { schema });
	}
	return _db;
}

/**
 * Close the connection pool. Call on shutdown.
 */
export async function closeDb(): Promise<void> {
	if (_pool) {
		await _pool.end();
		_pool = null;
		_db = null;
	}
}

/**
 * Execute a function within a transaction. Rolls back on error.
 */
export async function withTransaction<T>(
	fn: (tx: Transaction) => Promise<T>,
	database: Database = getDb()
): Promise<T> {
	return database.transaction(fn);
}

export { schema };
