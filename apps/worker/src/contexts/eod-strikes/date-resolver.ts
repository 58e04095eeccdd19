/**
 * Date Resolver
 *
 * Decides the two dates of a run:
 * - stored date: the trade date rows are recorded under
 * - source date: the provider date actually queried
 *
 * The source date is found by walking back from the day before the stored
 * date and probing business days until the provider reports data.
 */

import type { StoredDatePolicyName } from "@eodgex/config";
import {
	addDays,
	DEFAULT_REFERENCE_TIMEZONE,
	formatDateOnly,
	isBusinessDay,
	nextBusinessDay,
	rollForwardToBusinessDay,
	todayInTimeZone,
} from "@eodgex/domain";
import { NoSourceDateFoundError } from "./errors.js";

// ============================================
// Stored-date policies
// ============================================

/**
 * Maps today's calendar date in the reference timezone to a stored date.
 */
export type StoredDatePolicy = (today: Date) => Date;

export const STORED_DATE_POLICIES: Record<StoredDatePolicyName, StoredDatePolicy> = {
	"roll-forward": rollForwardToBusinessDay,
	"next-business-day": nextBusinessDay,
	"calendar-today": (today) => today,
};

export const DEFAULT_MAX_LOOKBACK_DAYS = 7;

// ============================================
// Types
// ============================================

/** Whether the provider has strike data for a YYYY-MM-DD date */
export type DataProbe = (date: string) => Promise<boolean>;

export interface DateResolverOptions {
	ticker: string;
	now: Date;
	probe: DataProbe;
	timeZone?: string;
	policy?: StoredDatePolicy;
	storedDateOverride?: Date;
	sourceDateOverride?: Date;
	maxLookbackDays?: number;
}

export interface ResolvedDates {
	storedDate: string;
	sourceDate: string;
	/** Dates handed to the probe, in order */
	probedDates: string[];
}

// ============================================
// Resolution
// ============================================

export function resolveStoredDate(
	now: Date,
	timeZone: string = DEFAULT_REFERENCE_TIMEZONE,
	policy: StoredDatePolicy = STORED_DATE_POLICIES["roll-forward"],
	override?: Date
): Date {
	return override ?? policy(todayInTimeZone(now, timeZone));
}

/**
 * Most recent business day strictly before `storedDate`, within
 * `maxLookbackDays` calendar days, for which the probe reports data.
 */
export async function findSourceDate(
	storedDate: Date,
	maxLookbackDays: number,
	probe: DataProbe,
	probed: string[] = []
): Promise<Date | null> {
	for (let offset = 1; offset <= maxLookbackDays; offset++) {
		const candidate = addDays(storedDate, -offset);
		if (!isBusinessDay(candidate)) {
			continue;
		}

		const date = formatDateOnly(candidate);
		probed.push(date);
		if (await probe(date)) {
			return candidate;
		}
	}
	return null;
}

/**
 * @throws {NoSourceDateFoundError} when the lookback window has no data
 */
export async function resolveDates(options: DateResolverOptions): Promise<ResolvedDates> {
	const maxLookbackDays = options.maxLookbackDays ?? DEFAULT_MAX_LOOKBACK_DAYS;
	const stored = resolveStoredDate(options.now, options.timeZone, options.policy, options.storedDateOverride);
	const storedDate = formatDateOnly(stored);

	if (options.sourceDateOverride) {
		return { storedDate, sourceDate: formatDateOnly(options.sourceDateOverride), probedDates: [] };
	}

	const probedDates: string[] = [];
	const source = await findSourceDate(stored, maxLookbackDays, options.probe, probedDates);
	if (!source) {
		throw new NoSourceDateFoundError(options.ticker, storedDate, maxLookbackDays);
	}

	return { storedDate, sourceDate: formatDateOnly(source), probedDates };
}
