/**
 * EOD Strikes Service
 *
 * One ingestion run for one ticker:
 * resolve dates → fetch strikes → fetch carry → build rows → replace the
 * stored-date partition → refresh the aggregate view.
 *
 * Steps run sequentially. Any fatal error surfaces before the write.
 */

import { randomUUID } from "node:crypto";
import { withRunContext } from "@eodgex/logger";
import type { StrikeDataSource } from "@eodgex/marketdata";
import type { StrikeGammaRow, StrikeGammaStore } from "@eodgex/storage";
import { log } from "../../shared/logger.js";
import type { CarryInputs, CarrySource } from "./carry-reconciler.js";
import { DEFAULT_MAX_LOOKBACK_DAYS, resolveDates, STORED_DATE_POLICIES, type StoredDatePolicy } from "./date-resolver.js";
import { buildRows } from "./row-builder.js";

export interface EodStrikesServiceConfig {
	ticker: string;
	carryProxyTicker: string;
	contractMultiplier: number;
	maxLookbackDays?: number;
	timeZone?: string;
	storedDatePolicy?: StoredDatePolicy;
}

export interface EodStrikesRunOptions {
	now?: Date;
	storedDate?: Date;
	sourceDate?: Date;
	/** Derive rows without writing */
	dryRun?: boolean;
	runId?: string;
}

/**
 * - written: partition replaced
 * - empty: provider returned no usable strikes, nothing written
 * - dry-run: rows derived, nothing written
 */
export type EodStrikesStatus = "written" | "empty" | "dry-run";

export interface EodStrikesResult {
	runId: string;
	status: EodStrikesStatus;
	ticker: string;
	storedDate: string;
	sourceDate: string;
	recordsFetched: number;
	rows: StrikeGammaRow[];
	rowsWritten: number;
	aggregatesRefreshed: boolean;
	carrySources: Record<CarrySource, number>;
}

export class EodStrikesService {
	private config: EodStrikesServiceConfig;

	constructor(
		private source: StrikeDataSource,
		private store: StrikeGammaStore | null,
		config: EodStrikesServiceConfig
	) {
		this.config = config;
	}

	async run(options: EodStrikesRunOptions = {}): Promise<EodStrikesResult> {
		const { ticker, carryProxyTicker, contractMultiplier } = this.config;
		const runId = options.runId ?? randomUUID();
		const dryRun = options.dryRun ?? false;
		let runLog = withRunContext(log, { runId, ticker });

		if (!dryRun && !this.store) {
			throw new Error("No store configured: set DATABASE_URL or use --dry-run");
		}

		const { storedDate, sourceDate, probedDates } = await resolveDates({
			ticker,
			now: options.now ?? new Date(),
			probe: (date) => this.source.probeHasData(ticker, date),
			timeZone: this.config.timeZone,
			policy: this.config.storedDatePolicy ?? STORED_DATE_POLICIES["roll-forward"],
			storedDateOverride: options.storedDate,
			sourceDateOverride: options.sourceDate,
			maxLookbackDays: this.config.maxLookbackDays ?? DEFAULT_MAX_LOOKBACK_DAYS,
		});

		runLog = withRunContext(log, { runId, ticker, storedDate, sourceDate });
		runLog.info({ probedDates }, "Resolved dates");

		const result: EodStrikesResult = {
			runId,
			status: "empty",
			ticker,
			storedDate,
			sourceDate,
			recordsFetched: 0,
			rows: [],
			rowsWritten: 0,
			aggregatesRefreshed: false,
			carrySources: { primary: 0, proxy: 0, default: 0 },
		};

		const records = await this.source.fetchStrikes(ticker, sourceDate);
		result.recordsFetched = records.length;

		if (records.length === 0) {
			runLog.warn({}, "No strike records returned, nothing to write");
			return result;
		}

		const carry: CarryInputs = {
			primary: await this.source.fetchCarryQuotes(ticker, sourceDate),
			proxy: await this.source.fetchCarryQuotes(carryProxyTicker, sourceDate),
			fallbackShortRate: await this.source.fetchFallbackRate(ticker, sourceDate),
		};

		runLog.info(
			{
				records: records.length,
				primaryExpirations: carry.primary.size,
				proxyExpirations: carry.proxy.size,
				fallbackShortRate: carry.fallbackShortRate,
			},
			"Fetched strikes and carry"
		);

		const built = buildRows(records, { ticker, storedDate, contractMultiplier, carry });
		result.rows = built.rows;
		result.carrySources = built.carrySources;

		if (built.skipped.length > 0) {
			runLog.warn(
				{ skipped: built.skipped.length, sample: built.skipped.slice(0, 3) },
				"Skipped strike records without a valid expiration date"
			);
		}

		if (built.rows.length === 0) {
			runLog.warn({}, "No rows built, nothing to write");
			return result;
		}

		if (dryRun || !this.store) {
			result.status = "dry-run";
			runLog.info({ rows: built.rows.length, carrySources: built.carrySources }, "Dry run, partition untouched");
			return result;
		}

		result.rowsWritten = await this.store.replacePartition(ticker, storedDate, built.rows);
		result.status = "written";

		try {
			await this.store.refreshAggregates();
			result.aggregatesRefreshed = true;
		} catch (error) {
			runLog.warn(
				{ error: error instanceof Error ? error.message : String(error) },
				"Aggregate refresh failed, partition write kept"
			);
		}

		runLog.info(
			{ rowsWritten: result.rowsWritten, carrySources: built.carrySources },
			"EOD strike partition replaced"
		);

		return result;
	}
}

export function createEodStrikesService(
	source: StrikeDataSource,
	store: StrikeGammaStore | null,
	config: EodStrikesServiceConfig
): EodStrikesService {
	return new EodStrikesService(source, store, config);
}
