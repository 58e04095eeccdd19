/**
 * Business-Day Calendar
 *
 * Monday–Friday business days with no holiday table. A provider holiday
 * simply has no data, which the source-date search already tolerates.
 *
 * All dates are date-only values: a `Date` at UTC midnight, or a
 * `YYYY-MM-DD` string at the boundaries. UTC accessors are used throughout
 * so the host timezone never shifts a day.
 */

// ============================================
// Constants
// ============================================

const DATE_ONLY_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const DEFAULT_REFERENCE_TIMEZONE = "America/New_York";

// ============================================
// Date-only helpers
// ============================================

/**
 * Parse a `YYYY-MM-DD` string into a UTC-midnight Date.
 * Returns null for malformed strings and impossible dates (2026-02-30).
 */
export function parseDateOnly(value: string | null | undefined): Date | null {
	if (!value) {
		return null;
	}
	const match = DATE_ONLY_REGEX.exec(value.trim());
	if (!match) {
		return null;
	}
	const [, year, month, day] = match;
	const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
	if (formatDateOnly(date) !== value.trim()) {
		return null;
	}
	return date;
}

export function formatDateOnly(date: Date): string {
	return date.toISOString().slice(0, 10);
}

export function addDays(date: Date, days: number): Date {
	const result = new Date(date.getTime());
	result.setUTCDate(result.getUTCDate() + days);
	return result;
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: Date, to: Date): number {
	return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Calendar date of `now` as observed in `timeZone`, as a UTC-midnight Date.
 */
export function todayInTimeZone(now: Date, timeZone = DEFAULT_REFERENCE_TIMEZONE): Date {
	const parts = new Intl.DateTimeFormat("en-US", {
		timeZone,
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
	}).formatToParts(now);

	const part = (type: Intl.DateTimeFormatPartTypes): number =>
		Number(parts.find((p) => p.type === type)?.value);

	return new Date(Date.UTC(part("year"), part("month") - 1, part("day")));
}

// ============================================
// Business days
// ============================================

export function isBusinessDay(date: Date): boolean {
	const day = date.getUTCDay();
	return day !== 0 && day !== 6; // Sunday = 0, Saturday = 6
}

export function nextBusinessDay(date: Date): Date {
	let next = addDays(date, 1);
	while (!isBusinessDay(next)) {
		next = addDays(next, 1);
	}
	return next;
}

export function previousBusinessDay(date: Date): Date {
	let previous = addDays(date, -1);
	while (!isBusinessDay(previous)) {
		previous = addDays(previous, -1);
	}
	return previous;
}

/**
 * The date itself when it is a business day, otherwise the next one.
 */
export function rollForwardToBusinessDay(date: Date): Date {
	return isBusinessDay(date) ? date : nextBusinessDay(date);
}
