/**
 * EOD Strikes Context
 *
 * End-of-day strike gamma ingestion.
 */

export {
	type CarryInputs,
	type CarrySource,
	type ReconciledCarry,
	reconcileCarry,
} from "./carry-reconciler.js";
export {
	type DataProbe,
	DEFAULT_MAX_LOOKBACK_DAYS,
	type DateResolverOptions,
	findSourceDate,
	type ResolvedDates,
	resolveDates,
	resolveStoredDate,
	STORED_DATE_POLICIES,
	type StoredDatePolicy,
} from "./date-resolver.js";
export {
	createEodStrikesService,
	type EodStrikesResult,
	type EodStrikesRunOptions,
	EodStrikesService,
	type EodStrikesServiceConfig,
	type EodStrikesStatus,
} from "./eod-strikes-service.js";
export {
	EXIT_CODES,
	type ExitCode,
	exitCodeFor,
	MissingTokenError,
	NoSourceDateFoundError,
	UsageError,
} from "./errors.js";
export {
	buildRow,
	buildRows,
	discountedLevel,
	effectiveDte,
	gammaExposure,
	type RowBuildContext,
	type RowBuildResult,
	TRADING_DAYS_PER_YEAR,
} from "./row-builder.js";
