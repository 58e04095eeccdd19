/**
 * EOD Strikes Service Tests
 */

import type { CarryQuoteMap, StrikeDataSource, StrikeRecord } from "@eodgex/marketdata";
import { FetchFailureError } from "@eodgex/marketdata";
import type { StrikeGammaRow, StrikeGammaStore } from "@eodgex/storage";
import { beforeEach, describe, expect, test } from "vitest";
import { EodStrikesService, type EodStrikesServiceConfig } from "./eod-strikes-service.js";
import { EXIT_CODES, exitCodeFor, NoSourceDateFoundError } from "./errors.js";

// ============================================
// Fakes
// ============================================

class FakeStrikeSource implements StrikeDataSource {
	readonly calls: string[] = [];
	strikeFailure: Error | null = null;

	constructor(
		private strikesByDate: Record<string, StrikeRecord[]>,
		private carryByTicker: Record<string, CarryQuoteMap> = {},
		private fallbackRate: number | null = null
	) {}

	async probeHasData(ticker: string, tradeDate: string): Promise<boolean> {
		this.calls.push(`probe ${ticker} ${tradeDate}`);
		return (this.strikesByDate[tradeDate]?.length ?? 0) > 0;
	}

	async fetchStrikes(ticker: string, tradeDate: string): Promise<StrikeRecord[]> {
		this.calls.push(`strikes ${ticker} ${tradeDate}`);
		if (this.strikeFailure) {
			throw this.strikeFailure;
		}
		return this.strikesByDate[tradeDate] ?? [];
	}

	async fetchCarryQuotes(ticker: string, tradeDate: string): Promise<CarryQuoteMap> {
		this.calls.push(`carry ${ticker} ${tradeDate}`);
		return this.carryByTicker[ticker] ?? new Map();
	}

	async fetchFallbackRate(ticker: string, tradeDate: string): Promise<number | null> {
		this.calls.push(`rate ${ticker} ${tradeDate}`);
		return this.fallbackRate;
	}
}

class InMemoryStrikeStore implements StrikeGammaStore {
	readonly partitions = new Map<string, StrikeGammaRow[]>();
	replaceCalls = 0;
	refreshCalls = 0;
	refreshFailure: Error | null = null;

	async replacePartition(ticker: string, storedDate: string, rows: readonly StrikeGammaRow[]): Promise<number> {
		this.replaceCalls++;
		if (rows.length === 0) {
			return 0;
		}
		this.partitions.set(`${ticker}|${storedDate}`, [...rows]);
		return rows.length;
	}

	async refreshAggregates(): Promise<void> {
		this.refreshCalls++;
		if (this.refreshFailure) {
			throw this.refreshFailure;
		}
	}
}

// ============================================
// Fixtures
// ============================================

// Monday 16:00 in New York
const MONDAY_AFTERNOON = new Date("2026-10-19T20:00:00Z");
const FRIDAY = "2026-10-16";

const config: EodStrikesServiceConfig = {
	ticker: "SPX",
	carryProxyTicker: "SPY",
	contractMultiplier: 100,
	maxLookbackDays: 7,
	timeZone: "America/New_York",
};

function strike(overrides: Partial<StrikeRecord> = {}): StrikeRecord {
	return {
		ticker: "SPX",
		tradeDate: FRIDAY,
		expirDate: "2026-11-20",
		dte: 35,
		strike: 4500,
		stockPrice: 4510,
		callOpenInterest: 1000,
		putOpenInterest: 800,
		gamma: 0.002,
		...overrides,
	};
}

let source: FakeStrikeSource;
let store: InMemoryStrikeStore;

beforeEach(() => {
	source = new FakeStrikeSource(
		{ [FRIDAY]: [strike(), strike({ strike: 4550, gamma: 0.0015 })] },
		{ SPY: new Map([["2026-11-20", { shortRate: null, divYield: 0.015 }]]) },
		0.05
	);
	store = new InMemoryStrikeStore();
});

// ============================================
// Tests
// ============================================

describe("EodStrikesService", () => {
	test("stores Friday's strikes under Monday with reconciled carry", async () => {
		const service = new EodStrikesService(source, store, config);

		const result = await service.run({ now: MONDAY_AFTERNOON, runId: "run-1" });

		expect(result).toMatchObject({
			runId: "run-1",
			status: "written",
			ticker: "SPX",
			storedDate: "2026-10-19",
			sourceDate: FRIDAY,
			recordsFetched: 2,
			rowsWritten: 2,
			aggregatesRefreshed: true,
			carrySources: { primary: 0, proxy: 2, default: 0 },
		});

		const rows = store.partitions.get("SPX|2026-10-19") ?? [];
		expect(rows).toHaveLength(2);
		expect(rows[0]).toMatchObject({ tradeDate: "2026-10-19", dte: 32, shortRate: 0.05, divYield: 0.015 });
		expect(rows[0]?.gexCall).toBeCloseTo(4_068_020_000, 3);
		expect(store.refreshCalls).toBe(1);
	});

	test("queries the provider in order: probe, strikes, primary carry, proxy carry, fallback rate", async () => {
		await new EodStrikesService(source, store, config).run({ now: MONDAY_AFTERNOON });

		expect(source.calls).toEqual([
			`probe SPX ${FRIDAY}`,
			`strikes SPX ${FRIDAY}`,
			`carry SPX ${FRIDAY}`,
			`carry SPY ${FRIDAY}`,
			`rate SPX ${FRIDAY}`,
		]);
	});

	test("running twice leaves the same partition", async () => {
		const service = new EodStrikesService(source, store, config);

		await service.run({ now: MONDAY_AFTERNOON });
		const first = store.partitions.get("SPX|2026-10-19");
		await service.run({ now: MONDAY_AFTERNOON });

		expect(store.partitions.size).toBe(1);
		expect(store.partitions.get("SPX|2026-10-19")).toEqual(first);
	});

	test("writes nothing when the provider returns no strikes", async () => {
		const empty = new FakeStrikeSource({});
		const service = new EodStrikesService(empty, store, config);

		const result = await service.run({ now: MONDAY_AFTERNOON, sourceDate: new Date("2026-10-16T00:00:00Z") });

		expect(result.status).toBe("empty");
		expect(result.rowsWritten).toBe(0);
		expect(store.replaceCalls).toBe(0);
		expect(empty.calls).toEqual([`strikes SPX ${FRIDAY}`]);
	});

	test("writes nothing when no record has a valid expiration", async () => {
		const bad = new FakeStrikeSource({ [FRIDAY]: [strike({ expirDate: "n/a" })] });

		const result = await new EodStrikesService(bad, store, config).run({ now: MONDAY_AFTERNOON });

		expect(result.status).toBe("empty");
		expect(store.replaceCalls).toBe(0);
	});

	test("dry run derives rows without a store", async () => {
		const service = new EodStrikesService(source, null, config);

		const result = await service.run({ now: MONDAY_AFTERNOON, dryRun: true });

		expect(result.status).toBe("dry-run");
		expect(result.rows).toHaveLength(2);
		expect(result.rowsWritten).toBe(0);
	});

	test("dry run leaves an attached store untouched", async () => {
		await new EodStrikesService(source, store, config).run({ now: MONDAY_AFTERNOON, dryRun: true });

		expect(store.replaceCalls).toBe(0);
		expect(store.refreshCalls).toBe(0);
	});

	test("refuses to run a write without a store", async () => {
		await expect(new EodStrikesService(source, null, config).run({ now: MONDAY_AFTERNOON })).rejects.toThrow(
			"No store configured: set DATABASE_URL or use --dry-run"
		);
		expect(source.calls).toEqual([]);
	});

	test("keeps the write when the aggregate refresh fails", async () => {
		store.refreshFailure = new Error("view missing");

		const result = await new EodStrikesService(source, store, config).run({ now: MONDAY_AFTERNOON });

		expect(result.status).toBe("written");
		expect(result.aggregatesRefreshed).toBe(false);
		expect(store.partitions.get("SPX|2026-10-19")).toHaveLength(2);
	});

	test("uses the given dates without probing", async () => {
		const result = await new EodStrikesService(source, store, config).run({
			now: MONDAY_AFTERNOON,
			storedDate: new Date("2026-10-17T00:00:00Z"),
			sourceDate: new Date("2026-10-16T00:00:00Z"),
		});

		expect(result.storedDate).toBe("2026-10-17");
		expect(source.calls.filter((c) => c.startsWith("probe"))).toEqual([]);
		expect(store.partitions.has("SPX|2026-10-17")).toBe(true);
	});

	test("fails before writing when no source date has data", async () => {
		const empty = new FakeStrikeSource({});

		const error = await new EodStrikesService(empty, store, config)
			.run({ now: MONDAY_AFTERNOON })
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(NoSourceDateFoundError);
		expect(exitCodeFor(error)).toBe(EXIT_CODES.noSourceDate);
		expect(store.replaceCalls).toBe(0);
	});

	test("fails before writing when the strike fetch fails", async () => {
		source.strikeFailure = new FetchFailureError("SPX", FRIDAY, 500, "upstream down");

		const error = await new EodStrikesService(source, store, config)
			.run({ now: MONDAY_AFTERNOON })
			.catch((e: unknown) => e);

		expect(exitCodeFor(error)).toBe(EXIT_CODES.fetchFailure);
		expect(store.replaceCalls).toBe(0);
	});
});
