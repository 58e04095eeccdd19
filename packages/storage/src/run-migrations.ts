#!/usr/bin/env tsx
/**
 * Migration Runner Script
 *
 * Apply the SQL migrations under migrations/ to DATABASE_URL.
 *
 * Usage:
 *   tsx src/run-migrations.ts              # Run migrations
 *   tsx src/run-migrations.ts --status     # Show status
 *   tsx src/run-migrations.ts --dry-run    # Preview changes
 */

import { closeDb, getDb } from "./db.js";
import { log } from "./logger.js";
import { getMigrationStatus, runMigrations } from "./migrations.js";

async function main() {
	const args = process.argv.slice(2);
	const isStatus = args.includes("--status");
	const isDryRun = args.includes("--dry-run");

	const db = getDb(process.env.DATABASE_URL);

	try {
		if (isStatus) {
			const status = await getMigrationStatus(db);
			log.info(
				{
					currentVersion: status.currentVersion,
					appliedCount: status.applied.length,
					pendingCount: status.pending.length,
				},
				"Migration status"
			);

			for (const m of status.applied) {
				log.info({ version: m.version, name: m.name, appliedAt: m.appliedAt }, "Applied migration");
			}

			for (const m of status.pending) {
				log.info({ version: m.version, name: m.name }, "Pending migration");
			}
		} else {
			log.info({ dryRun: isDryRun }, "Running migrations");
			const result = await runMigrations(db, { dryRun: isDryRun });
			log.info(
				{
					appliedCount: result.applied.length,
					currentVersion: result.currentVersion,
					durationMs: result.durationMs,
				},
				"Migrations complete"
			);
		}
	} finally {
		await closeDb();
	}
}

main().catch((error) => {
	log.error({ error: error instanceof Error ? error.message : String(error) }, "Migration failed");
	process.exit(1);
});
