/**
 * @eodgex/domain - calendar and fallback primitives shared by every workspace
 */

export {
	addDays,
	DEFAULT_REFERENCE_TIMEZONE,
	daysBetween,
	formatDateOnly,
	isBusinessDay,
	nextBusinessDay,
	parseDateOnly,
	previousBusinessDay,
	rollForwardToBusinessDay,
	todayInTimeZone,
} from "./calendar.js";
export {
	type AsyncStrategy,
	firstMatch,
	firstMatchAsync,
	type Match,
	type Strategy,
} from "./fallback.js";
