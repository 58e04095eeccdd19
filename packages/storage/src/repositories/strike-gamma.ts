/**
 * Strike Gamma Repository (Drizzle ORM)
 *
 * Writes the derived strike rows for one (ticker, stored date) partition and
 * refreshes the per-expiration aggregate view.
 *
 * @see migrations/001_option_strike_gamma.sql
 */
import { and, eq, sql } from "drizzle-orm";
import { type Database, getDb, withTransaction } from "../db.js";
import { log } from "../logger.js";
import { GEX_BY_EXPIRATION_VIEW, optionStrikeGamma } from "../schema/strike-gamma.js";
import { RepositoryError } from "./base.js";

// ============================================
// Types
// ============================================

export interface StrikeGammaRow {
	ticker: string;
	/** Stored date (YYYY-MM-DD) */
	tradeDate: string;
	expirDate: string;
	/** Effective days to expiration from the stored date */
	dte: number | null;
	strike: number;
	stockPrice: number | null;
	callOi: number | null;
	putOi: number | null;
	gamma: number | null;
	gexCall: number;
	gexPut: number;
	shortRate: number | null;
	divYield: number | null;
	discountedLevel: number | null;
}

/**
 * Persistence operations the ingestion pipeline depends on.
 */
export interface StrikeGammaStore {
	/**
	 * Replace every row of the (ticker, storedDate) partition with `rows`.
	 * Rows sharing a primary key collapse to the last one. Returns the number
	 * of rows written; an empty `rows` is a no-op.
	 */
	replacePartition(ticker: string, storedDate: string, rows: readonly StrikeGammaRow[]): Promise<number>;
	refreshAggregates(): Promise<void>;
}

export interface StrikeGammaRepositoryOptions {
	/** Rows per INSERT statement */
	batchSize?: number;
}

export const DEFAULT_INSERT_BATCH_SIZE = 500;

const TABLE = "option_strike_gamma";

// ============================================
// Row Mapping
// ============================================

type StrikeGammaInsert = typeof optionStrikeGamma.$inferInsert;

function toInsert(row: StrikeGammaRow): StrikeGammaInsert {
	return {
		ticker: row.ticker,
		tradeDate: row.tradeDate,
		expirDate: row.expirDate,
		dte: row.dte,
		strike: String(row.strike),
		stockPrice: row.stockPrice === null ? null : String(row.stockPrice),
		callOi: row.callOi,
		putOi: row.putOi,
		gamma: row.gamma,
		gexCall: row.gexCall,
		gexPut: row.gexPut,
		shortRate: row.shortRate,
		divYield: row.divYield,
		discountedLevel: row.discountedLevel,
	};
}

/**
 * Primary-key identity of a row once the strike is stored as NUMERIC(14,4).
 */
function rowKey(row: StrikeGammaRow): string {
	return `${row.ticker}|${row.tradeDate}|${row.expirDate}|${row.strike.toFixed(4)}`;
}

/**
 * One row per primary key, the last record for a key winning. A single
 * INSERT ... ON CONFLICT DO UPDATE cannot touch the same row twice.
 */
function uniqueByKey(rows: readonly StrikeGammaRow[]): StrikeGammaRow[] {
	const byKey = new Map<string, StrikeGammaRow>();
	for (const row of rows) {
		byKey.set(rowKey(row), row);
	}
	return [...byKey.values()];
}

const UPSERT_SET = {
	dte: sql`EXCLUDED.dte`,
	stockPrice: sql`EXCLUDED.stock_price`,
	callOi: sql`EXCLUDED.call_oi`,
	putOi: sql`EXCLUDED.put_oi`,
	gamma: sql`EXCLUDED.gamma`,
	gexCall: sql`EXCLUDED.gex_call`,
	gexPut: sql`EXCLUDED.gex_put`,
	shortRate: sql`EXCLUDED.short_rate`,
	divYield: sql`EXCLUDED.div_yield`,
	discountedLevel: sql`EXCLUDED.discounted_level`,
	updatedAt: sql`now()`,
};

// ============================================
// Repository
// ============================================

export class StrikeGammaRepository implements StrikeGammaStore {
	private db: Database;
	private batchSize: number;

	constructor(db?: Database, options: StrikeGammaRepositoryOptions = {}) {
		this.db = db ?? getDb();
		this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_INSERT_BATCH_SIZE);
	}

	async replacePartition(ticker: string, storedDate: string, rows: readonly StrikeGammaRow[]): Promise<number> {
		if (rows.length === 0) {
			return 0;
		}

		const unique = uniqueByKey(rows);
		if (unique.length < rows.length) {
			log.warn(
				{ ticker, storedDate, duplicates: rows.length - unique.length },
				"Duplicate strike keys in partition, keeping the last record of each"
			);
		}
		const values = unique.map(toInsert);

		try {
			await withTransaction(async (tx) => {
				await tx
					.delete(optionStrikeGamma)
					.where(and(eq(optionStrikeGamma.ticker, ticker), eq(optionStrikeGamma.tradeDate, storedDate)));

				for (let i = 0; i < values.length; i += this.batchSize) {
					await tx
						.insert(optionStrikeGamma)
						.values(values.slice(i, i + this.batchSize))
						.onConflictDoUpdate({
							target: [
								optionStrikeGamma.ticker,
								optionStrikeGamma.tradeDate,
								optionStrikeGamma.expirDate,
								optionStrikeGamma.strike,
							],
							set: UPSERT_SET,
						});
				}
			}, this.db);
		} catch (error) {
			throw RepositoryError.fromPgError(TABLE, error);
		}

		log.debug({ ticker, storedDate, rows: values.length }, "Replaced strike gamma partition");
		return values.length;
	}

	/**
	 * Recompute the per-expiration totals view.
	 */
	async refreshAggregates(): Promise<void> {
		try {
			await this.db.execute(sql.raw(`REFRESH MATERIALIZED VIEW ${GEX_BY_EXPIRATION_VIEW}`));
		} catch (error) {
			throw RepositoryError.fromPgError(GEX_BY_EXPIRATION_VIEW, error);
		}
	}
}
