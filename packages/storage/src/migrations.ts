import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { sql } from "drizzle-orm";
import { z } from "zod";
import type { Database } from "./db.js";
import { log } from "./logger.js";

export interface Migration {
	version: number;
	name: string;
	filename: string;
	sql: string;
}

export interface AppliedMigration {
	version: number;
	name: string;
	appliedAt: string;
}

export interface MigrationResult {
	applied: Migration[];
	currentVersion: number;
	durationMs: number;
}

export interface MigrationOptions {
	migrationsDir?: string;
	targetVersion?: number;
	dryRun?: boolean;
	logger?: (message: string) => void;
}

export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL("../migrations", import.meta.url));

const MIGRATION_FILE_PATTERN = /^(\d{3})_(.+)\.sql$/;

const AppliedMigrationRowSchema = z.object({
	version: z.coerce.number().int(),
	name: z.string(),
	applied_at: z.union([z.string(), z.date()]).transform((value) => (typeof value === "string" ? value : value.toISOString())),
});

export async function runMigrations(db: Database, options: MigrationOptions = {}): Promise<MigrationResult> {
	const {
		migrationsDir = DEFAULT_MIGRATIONS_DIR,
		targetVersion,
		dryRun = false,
		logger = (msg: string) => log.info({}, msg),
	} = options;

	const startTime = Date.now();

	await ensureMigrationsTable(db);

	const appliedMigrations = await getAppliedMigrations(db);
	const appliedVersions = new Set(appliedMigrations.map((m) => m.version));
	const currentVersion = Math.max(0, ...appliedVersions);

	const availableMigrations = await loadMigrations(migrationsDir);

	const pendingMigrations = availableMigrations
		.filter((m) => !appliedVersions.has(m.version))
		.filter((m) => (targetVersion !== undefined ? m.version <= targetVersion : true));

	if (pendingMigrations.length === 0) {
		logger("No pending migrations");
		return {
			applied: [],
			currentVersion,
			durationMs: Date.now() - startTime,
		};
	}

	const applied: Migration[] = [];

	for (const migration of pendingMigrations) {
		logger(`Applying migration ${migration.version}: ${migration.name}`);

		if (dryRun) {
			logger(`[DRY RUN] Would apply: ${migration.filename}`);
			applied.push(migration);
			continue;
		}

		try {
			await db.transaction(async (tx) => {
				for (const statement of splitStatements(migration.sql)) {
					await tx.execute(sql.raw(statement));
				}
				await tx.execute(
					sql`INSERT INTO schema_migrations (version, name) VALUES (${migration.version}, ${migration.name})`
				);
			});
			applied.push(migration);
		} catch (error) {
			logger(`Failed to apply migration ${migration.version}: ${error instanceof Error ? error.message : String(error)}`);
			throw new MigrationError(`Migration ${migration.version} (${migration.name}) failed`, migration, error);
		}
	}

	const lastApplied = applied[applied.length - 1];
	const newVersion = lastApplied ? lastApplied.version : currentVersion;

	logger(`Applied ${applied.length} migration(s). Current version: ${newVersion}`);

	return {
		applied,
		currentVersion: newVersion,
		durationMs: Date.now() - startTime,
	};
}

export async function getMigrationStatus(
	db: Database,
	options: Pick<MigrationOptions, "migrationsDir"> = {}
): Promise<{
	currentVersion: number;
	applied: AppliedMigration[];
	pending: Migration[];
	available: Migration[];
}> {
	const { migrationsDir = DEFAULT_MIGRATIONS_DIR } = options;

	await ensureMigrationsTable(db);

	const applied = await getAppliedMigrations(db);
	const appliedVersions = new Set(applied.map((m) => m.version));
	const currentVersion = Math.max(0, ...appliedVersions);

	const available = await loadMigrations(migrationsDir);
	const pending = available.filter((m) => !appliedVersions.has(m.version));

	return {
		currentVersion,
		applied,
		pending,
		available,
	};
}

async function ensureMigrationsTable(db: Database): Promise<void> {
	await db.execute(sql`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(db: Database): Promise<AppliedMigration[]> {
	const result = await db.execute(sql`SELECT version, name, applied_at FROM schema_migrations ORDER BY version`);
	return result.rows.map((row) => {
		const parsed = AppliedMigrationRowSchema.parse(row);
		return { version: parsed.version, name: parsed.name, appliedAt: parsed.applied_at };
	});
}

export async function loadMigrations(dir: string): Promise<Migration[]> {
	const migrations: Migration[] = [];

	let files: string[];
	try {
		files = await readdir(dir);
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			throw new Error(`Migrations directory not found: ${dir}`);
		}
		throw error;
	}

	for (const file of files) {
		const match = file.match(MIGRATION_FILE_PATTERN);
		const versionStr = match?.[1];
		const name = match?.[2];
		if (versionStr === undefined || name === undefined) {
			continue;
		}

		migrations.push({
			version: Number.parseInt(versionStr, 10),
			name,
			filename: file,
			sql: await readFile(join(dir, file), "utf8"),
		});
	}

	return migrations.sort((a, b) => a.version - b.version);
}

/**
 * Split a migration file into statements. Migration files keep semicolons out
 * of string literals.
 */
export function splitStatements(source: string): string[] {
	const withoutComments = source.replace(/--[^\n]*$/gm, "").replace(/\/\*[\s\S]*?\*\//g, "");

	return withoutComments
		.split(";")
		.map((s) => s.trim())
		.filter((s) => s.length > 0);
}

export class MigrationError extends Error {
	constructor(
		message: string,
		public readonly migration: Migration,
		public override readonly cause: unknown
	) {
		super(message);
		this.name = "MigrationError";
	}
}
