/**
 * Row Builder
 *
 * Turns provider strike records into persisted rows: gamma exposure per side,
 * days to expiration measured from the stored date, and the carry-discounted
 * strike level.
 */

import { daysBetween, parseDateOnly } from "@eodgex/domain";
import type { StrikeRecord } from "@eodgex/marketdata";
import type { StrikeGammaRow } from "@eodgex/storage";
import { type CarryInputs, type CarrySource, reconcileCarry } from "./carry-reconciler.js";

export const TRADING_DAYS_PER_YEAR = 252;

export interface RowBuildContext {
	ticker: string;
	/** YYYY-MM-DD */
	storedDate: string;
	contractMultiplier: number;
	carry: CarryInputs;
}

export interface RowBuildResult {
	rows: StrikeGammaRow[];
	/** Records dropped because their expiration date does not parse */
	skipped: StrikeRecord[];
	carrySources: Record<CarrySource, number>;
}

// ============================================
// Metrics
// ============================================

/**
 * gamma × price² × open interest × multiplier. Missing inputs count as 0.
 */
export function gammaExposure(
	gamma: number | null | undefined,
	price: number | null | undefined,
	openInterest: number | null | undefined,
	contractMultiplier: number
): number {
	const s = price ?? 0;
	return (gamma ?? 0) * s * s * (openInterest ?? 0) * contractMultiplier;
}

/**
 * Calendar days from the stored date to expiration, or the provider's raw
 * DTE when the expiration date does not parse.
 */
export function effectiveDte(
	expirDate: string,
	storedDate: string,
	rawDte: number | null | undefined
): number | null {
	const expiration = parseDateOnly(expirDate);
	const stored = parseDateOnly(storedDate);
	if (expiration && stored) {
		return daysBetween(stored, expiration);
	}
	return rawDte ?? null;
}

/**
 * strike × exp((r − q) × (dte + 1) / 252); null when any input is missing.
 */
export function discountedLevel(
	strike: number | null | undefined,
	dte: number | null | undefined,
	shortRate: number | null | undefined,
	divYield: number | null | undefined
): number | null {
	if (
		strike === null ||
		strike === undefined ||
		dte === null ||
		dte === undefined ||
		shortRate === null ||
		shortRate === undefined ||
		divYield === null ||
		divYield === undefined
	) {
		return null;
	}
	const t = (dte + 1) / TRADING_DAYS_PER_YEAR;
	return strike * Math.exp((shortRate - divYield) * t);
}

// ============================================
// Assembly
// ============================================

export function buildRow(record: StrikeRecord, context: RowBuildContext): StrikeGammaRow & { carrySource: CarrySource } {
	const carry = reconcileCarry(record.expirDate, context.carry);
	const dte = effectiveDte(record.expirDate, context.storedDate, record.dte);

	return {
		ticker: context.ticker,
		tradeDate: context.storedDate,
		expirDate: record.expirDate,
		dte,
		strike: record.strike,
		stockPrice: record.stockPrice ?? null,
		callOi: record.callOpenInterest ?? null,
		putOi: record.putOpenInterest ?? null,
		gamma: record.gamma ?? null,
		gexCall: gammaExposure(record.gamma, record.stockPrice, record.callOpenInterest, context.contractMultiplier),
		gexPut: gammaExposure(record.gamma, record.stockPrice, record.putOpenInterest, context.contractMultiplier),
		shortRate: carry.shortRate,
		divYield: carry.divYield,
		discountedLevel: discountedLevel(record.strike, dte, carry.shortRate, carry.divYield),
		carrySource: carry.carrySource,
	};
}

/**
 * Build rows for every record whose expiration is a valid date. The store
 * keys rows by expiration, so records without one cannot be written.
 */
export function buildRows(records: readonly StrikeRecord[], context: RowBuildContext): RowBuildResult {
	const rows: StrikeGammaRow[] = [];
	const skipped: StrikeRecord[] = [];
	const carrySources: Record<CarrySource, number> = { primary: 0, proxy: 0, default: 0 };

	for (const record of records) {
		if (!parseDateOnly(record.expirDate)) {
			skipped.push(record);
			continue;
		}
		const { carrySource, ...row } = buildRow(record, context);
		carrySources[carrySource]++;
		rows.push(row);
	}

	return { rows, skipped, carrySources };
}
