/**
 * Market Data Package
 *
 * REST foundation and the ORATS adapter used by end-of-day ingestion.
 *
 * @example
 * ```ts
 * import { createOratsClient } from "@eodgex/marketdata";
 *
 * const orats = createOratsClient({ token: "test-token", dteMax: 400 });
 * if (await orats.probeHasData("SPX", "2026-10-16")) {
 *   const strikes = await orats.fetchStrikes("SPX", "2026-10-16");
 * }
 * ```
 */

// Base client
export {
	ApiError,
	type ClientConfig,
	classifyError,
	createRestClient,
	DEFAULT_RATE_LIMIT,
	DEFAULT_RETRY,
	DEFAULT_TIMEOUT_MS,
	NO_RETRY,
	type QueryParams,
	type RateLimitConfig,
	RateLimiter,
	type RequestOptions,
	RestClient,
	type RetryConfig,
} from "./client.js";
// Errors
export { AuthenticationError, FetchFailureError, MAX_ERROR_BODY_LENGTH, truncateBody } from "./errors.js";
// Providers
export {
	CARRY_FIELDS,
	type CarryQuote,
	type CarryQuoteMap,
	createOratsClient,
	DEFAULT_DTE_MAX,
	DEFAULT_FETCH_TIMEOUT_MS,
	DEFAULT_PROBE_TIMEOUT_MS,
	type MoniesRecord,
	MoniesRecordSchema,
	ORATS_BASE_URL,
	ORATS_ENDPOINTS,
	ORATS_RATE_LIMIT,
	OratsClient,
	type OratsClientConfig,
	RATE_FIELDS,
	STRIKE_FIELDS,
	type StrikeDataSource,
	type StrikeRecord,
	StrikeRecordSchema,
	type SummaryRecord,
	SummaryRecordSchema,
} from "./providers/orats.js";
