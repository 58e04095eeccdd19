/**
 * @eodgex/storage - Database storage layer
 *
 * This package provides:
 * - Drizzle ORM database client over a pg pool
 * - SQL migrations tracked in schema_migrations
 * - The strike gamma repository
 *
 * @see https://orm.drizzle.team/docs/overview
 */

// Database client (Drizzle + PostgreSQL)
export { closeDb, type Database, getDb, getPool, schema, type Transaction, withTransaction } from "./db.js";
// Migrations
export {
	type AppliedMigration,
	DEFAULT_MIGRATIONS_DIR,
	getMigrationStatus,
	loadMigrations,
	type Migration,
	MigrationError,
	type MigrationOptions,
	type MigrationResult,
	runMigrations,
} from "./migrations.js";
// Repositories
export { RepositoryError, type RepositoryErrorCode } from "./repositories/base.js";
export {
	DEFAULT_INSERT_BATCH_SIZE,
	type StrikeGammaRepositoryOptions,
	StrikeGammaRepository,
	type StrikeGammaRow,
	type StrikeGammaStore,
} from "./repositories/strike-gamma.js";
// Schema
export { GEX_BY_EXPIRATION_VIEW, optionStrikeGamma } from "./schema/strike-gamma.js";
