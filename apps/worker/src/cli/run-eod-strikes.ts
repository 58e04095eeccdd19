#!/usr/bin/env tsx
/**
 * EOD Strike Gamma CLI
 *
 * Runs one ingestion for the configured ticker and exits with a code that
 * names the failure class.
 *
 * Usage:
 *   tsx apps/worker/src/cli/run-eod-strikes.ts [--date=YYYY-MM-DD] [--source-date=YYYY-MM-DD] [--token=...] [--dry-run]
 */

import { ConfigError, type JobConfig, loadJobConfig } from "@eodgex/config";
import { createOratsClient } from "@eodgex/marketdata";
import { closeDb, getDb, StrikeGammaRepository } from "@eodgex/storage";
import {
	createEodStrikesService,
	EXIT_CODES,
	type ExitCode,
	exitCodeFor,
	MissingTokenError,
	STORED_DATE_POLICIES,
} from "../contexts/eod-strikes/index.js";
import { log } from "../shared/logger.js";
import { type EodCliOptions, parseEodArgs, USAGE } from "./args.js";

async function runJob(options: EodCliOptions, config: JobConfig): Promise<void> {
	const token = options.token ?? config.provider.token;
	if (!token) {
		throw new MissingTokenError();
	}

	const source = createOratsClient({
		token,
		baseUrl: config.provider.baseUrl,
		probeTimeoutMs: config.provider.probeTimeoutMs,
		fetchTimeoutMs: config.provider.fetchTimeoutMs,
		dteMax: config.dteMax,
	});

	const store = options.dryRun ? null : new StrikeGammaRepository(getDb(config.databaseUrl));

	const service = createEodStrikesService(source, store, {
		ticker: config.ticker,
		carryProxyTicker: config.carryProxyTicker,
		contractMultiplier: config.contractMultiplier,
		maxLookbackDays: config.maxLookbackDays,
		timeZone: config.referenceTimeZone,
		storedDatePolicy: STORED_DATE_POLICIES[config.storedDatePolicy],
	});

	const result = await service.run({
		storedDate: options.storedDate,
		sourceDate: options.sourceDate,
		dryRun: options.dryRun,
	});

	log.info(
		{
			runId: result.runId,
			status: result.status,
			ticker: result.ticker,
			storedDate: result.storedDate,
			sourceDate: result.sourceDate,
			recordsFetched: result.recordsFetched,
			rowsWritten: result.rowsWritten,
			aggregatesRefreshed: result.aggregatesRefreshed,
		},
		"EOD strike run complete"
	);
}

async function main(): Promise<ExitCode> {
	let options: EodCliOptions;
	let config: JobConfig;

	try {
		options = parseEodArgs(process.argv.slice(2));
		if (options.help) {
			console.log(USAGE);
			return EXIT_CODES.success;
		}
		config = loadJobConfig();
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		log.error({ error: message, issues: error instanceof ConfigError ? error.issues : undefined }, "Invalid invocation");
		console.error(USAGE);
		return EXIT_CODES.unexpected;
	}

	try {
		await runJob(options, config);
		return EXIT_CODES.success;
	} catch (error) {
		const exitCode = exitCodeFor(error);
		log.error(
			{
				error: error instanceof Error ? error.message : String(error),
				errorName: error instanceof Error ? error.name : undefined,
				exitCode,
			},
			"EOD strike run failed"
		);
		return exitCode;
	} finally {
		await closeDb();
	}
}

main()
	.then(async (exitCode) => {
		await log.flush();
		process.exitCode = exitCode;
	})
	.catch((error) => {
		log.fatal({ error: error instanceof Error ? error.message : String(error) }, "EOD strike CLI crashed");
		process.exit(EXIT_CODES.unexpected);
	});
