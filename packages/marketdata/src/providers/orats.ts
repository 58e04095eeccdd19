/**
 * ORATS Data API Client
 *
 * End-of-day strike snapshots and carry inputs:
 * - hist/strikes: strike-level open interest and gamma
 * - hist/monies/implied, live/monies/implied: per-expiration rate and yield
 * - hist/summaries, live/summaries: 30-day risk-free rate
 *
 * Every request carries the token both as a query parameter and as a
 * bearer header.
 *
 * @see https://docs.orats.io/datav2-api-guide/data.html
 */

import { firstMatchAsync } from "@eodgex/domain";
import { z } from "zod";
import { type ApiError, classifyError, createRestClient, NO_RETRY, type RateLimitConfig, type RestClient } from "../client.js";
import { AuthenticationError, FetchFailureError, truncateBody } from "../errors.js";
import { log } from "../logger.js";

// ============================================
// API Configuration
// ============================================

export const ORATS_BASE_URL = "https://api.orats.io/datav2";

export const ORATS_ENDPOINTS = {
	strikes: "hist/strikes",
	moniesHistorical: "hist/monies/implied",
	moniesLive: "live/monies/implied",
	summariesHistorical: "hist/summaries",
	summariesLive: "live/summaries",
} as const;

/**
 * 1000 requests per minute on standard plans.
 */
export const ORATS_RATE_LIMIT: RateLimitConfig = { maxRequests: 1000, intervalMs: 60_000 };

export const DEFAULT_PROBE_TIMEOUT_MS = 60_000;
export const DEFAULT_FETCH_TIMEOUT_MS = 180_000;
export const DEFAULT_DTE_MAX = 400;

export const STRIKE_FIELDS = [
	"ticker",
	"tradeDate",
	"expirDate",
	"dte",
	"strike",
	"stockPrice",
	"callOpenInterest",
	"putOpenInterest",
	"gamma",
] as const;

export const CARRY_FIELDS = ["ticker", "tradeDate", "expirDate", "riskFreeRate", "yieldRate"] as const;

export const RATE_FIELDS = ["ticker", "tradeDate", "riskFree30"] as const;

// ============================================
// Response Schemas
// ============================================

const nullableNumber = z.number().nullable().optional();

/**
 * One strike of one expiration on the source date.
 */
export const StrikeRecordSchema = z.object({
	ticker: z.string(),
	tradeDate: z.string(),
	expirDate: z.string(),
	dte: nullableNumber,
	strike: z.number(),
	stockPrice: nullableNumber,
	callOpenInterest: nullableNumber,
	putOpenInterest: nullableNumber,
	gamma: nullableNumber,
});
export type StrikeRecord = z.infer<typeof StrikeRecordSchema>;

export const MoniesRecordSchema = z.object({
	ticker: z.string().optional(),
	expirDate: z.string(),
	riskFreeRate: nullableNumber,
	yieldRate: nullableNumber,
});
export type MoniesRecord = z.infer<typeof MoniesRecordSchema>;

export const SummaryRecordSchema = z.object({
	ticker: z.string().optional(),
	riskFree30: nullableNumber,
});
export type SummaryRecord = z.infer<typeof SummaryRecordSchema>;

/**
 * Records are validated one by one so a single malformed row does not
 * discard the whole response.
 */
const DataEnvelopeSchema = z.object({
	data: z.array(z.unknown()).default([]),
});

// ============================================
// Carry types
// ============================================

export interface CarryQuote {
	shortRate: number | null;
	divYield: number | null;
}

/** Keyed by expiration date (YYYY-MM-DD) */
export type CarryQuoteMap = Map<string, CarryQuote>;

// ============================================
// Market-data interface
// ============================================

/**
 * What the ingestion pipeline needs from a provider.
 */
export interface StrikeDataSource {
	probeHasData(ticker: string, tradeDate: string): Promise<boolean>;
	fetchStrikes(ticker: string, tradeDate: string): Promise<StrikeRecord[]>;
	fetchCarryQuotes(ticker: string, tradeDate: string): Promise<CarryQuoteMap>;
	fetchFallbackRate(ticker: string, tradeDate: string): Promise<number | null>;
}

// ============================================
// ORATS Client
// ============================================

export interface OratsClientConfig {
	token: string;
	baseUrl?: string;
	probeTimeoutMs?: number;
	fetchTimeoutMs?: number;
	/** Records with a raw DTE above this are dropped after fetch */
	dteMax?: number;
	rateLimit?: RateLimitConfig;
}

export class OratsClient implements StrikeDataSource {
	private client: RestClient;
	private token: string;
	private probeTimeoutMs: number;
	private fetchTimeoutMs: number;
	private dteMax: number;

	constructor(config: OratsClientConfig) {
		this.token = config.token;
		this.probeTimeoutMs = config.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
		this.fetchTimeoutMs = config.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
		this.dteMax = config.dteMax ?? DEFAULT_DTE_MAX;

		this.client = createRestClient({
			baseUrl: config.baseUrl ?? ORATS_BASE_URL,
			apiKey: config.token,
			rateLimit: config.rateLimit ?? ORATS_RATE_LIMIT,
			retry: NO_RETRY,
			timeoutMs: this.fetchTimeoutMs,
		});
	}

	/**
	 * Whether the provider has at least one strike for the date.
	 * Only the ticker column is requested.
	 *
	 * @throws {AuthenticationError} on HTTP 401
	 */
	async probeHasData(ticker: string, tradeDate: string): Promise<boolean> {
		try {
			const response = await this.client.get(
				ORATS_ENDPOINTS.strikes,
				this.params(ticker, tradeDate, ["ticker"]),
				DataEnvelopeSchema,
				{ timeoutMs: this.probeTimeoutMs }
			);
			return response.data.length > 0;
		} catch (error) {
			const apiError = this.rethrowIfUnauthorized(ORATS_ENDPOINTS.strikes, error);
			log.warn(
				{ ticker, tradeDate, status: apiError.status, body: truncateBody(apiError.body ?? apiError.message) },
				"Strike probe failed"
			);
			return false;
		}
	}

	/**
	 * Full strike snapshot for the date, limited to `dteMax`.
	 *
	 * @throws {AuthenticationError} on HTTP 401
	 * @throws {FetchFailureError} on any other failure
	 */
	async fetchStrikes(ticker: string, tradeDate: string): Promise<StrikeRecord[]> {
		let rawRecords: unknown[];
		try {
			const response = await this.client.get(
				ORATS_ENDPOINTS.strikes,
				this.params(ticker, tradeDate, STRIKE_FIELDS),
				DataEnvelopeSchema,
				{ timeoutMs: this.fetchTimeoutMs }
			);
			rawRecords = response.data;
		} catch (error) {
			const apiError = this.rethrowIfUnauthorized(ORATS_ENDPOINTS.strikes, error);
			throw new FetchFailureError(
				ticker,
				tradeDate,
				apiError.status,
				truncateBody(apiError.body ?? apiError.message)
			);
		}

		const records = parseRecords(rawRecords, StrikeRecordSchema, "strike");
		return records.filter((record) => record.dte === null || record.dte === undefined || record.dte <= this.dteMax);
	}

	/**
	 * Per-expiration rate and yield, historical endpoint first, live second.
	 * An empty map means neither source had data.
	 *
	 * @throws {AuthenticationError} on HTTP 401
	 */
	async fetchCarryQuotes(ticker: string, tradeDate: string): Promise<CarryQuoteMap> {
		const match = await firstMatchAsync<CarryQuoteMap>([
			() => this.fetchCarrySource(ORATS_ENDPOINTS.moniesHistorical, ticker, tradeDate),
			() => this.fetchCarrySource(ORATS_ENDPOINTS.moniesLive, ticker),
		]);
		return match?.value ?? new Map();
	}

	/**
	 * Scalar 30-day risk-free rate, historical endpoint first, live second.
	 *
	 * @throws {AuthenticationError} on HTTP 401
	 */
	async fetchFallbackRate(ticker: string, tradeDate: string): Promise<number | null> {
		const match = await firstMatchAsync<number>([
			() => this.fetchRateSource(ORATS_ENDPOINTS.summariesHistorical, ticker, tradeDate),
			() => this.fetchRateSource(ORATS_ENDPOINTS.summariesLive, ticker),
		]);
		return match?.value ?? null;
	}

	private async fetchCarrySource(
		endpoint: string,
		ticker: string,
		tradeDate?: string
	): Promise<CarryQuoteMap | null> {
		const rawRecords = await this.fetchOptional(endpoint, ticker, tradeDate, CARRY_FIELDS);
		if (!rawRecords) {
			return null;
		}

		const quotes: CarryQuoteMap = new Map();
		for (const record of parseRecords(rawRecords, MoniesRecordSchema, "carry")) {
			if (!quotes.has(record.expirDate)) {
				quotes.set(record.expirDate, {
					shortRate: record.riskFreeRate ?? null,
					divYield: record.yieldRate ?? null,
				});
			}
		}

		return quotes.size > 0 ? quotes : null;
	}

	private async fetchRateSource(endpoint: string, ticker: string, tradeDate?: string): Promise<number | null> {
		const rawRecords = await this.fetchOptional(endpoint, ticker, tradeDate, RATE_FIELDS);
		if (!rawRecords) {
			return null;
		}

		const withRate = parseRecords(rawRecords, SummaryRecordSchema, "rate").find(
			(record) => record.riskFree30 !== null && record.riskFree30 !== undefined
		);
		return withRate?.riskFree30 ?? null;
	}

	/**
	 * Fetch from a source whose failure only means "no data here".
	 */
	private async fetchOptional(
		endpoint: string,
		ticker: string,
		tradeDate: string | undefined,
		fields: readonly string[]
	): Promise<unknown[] | null> {
		try {
			const response = await this.client.get(
				endpoint,
				this.params(ticker, tradeDate, fields),
				DataEnvelopeSchema,
				{ timeoutMs: this.probeTimeoutMs }
			);
			return response.data.length > 0 ? response.data : null;
		} catch (error) {
			const apiError = this.rethrowIfUnauthorized(endpoint, error);
			log.warn(
				{ endpoint, ticker, tradeDate, status: apiError.status, body: truncateBody(apiError.body ?? apiError.message) },
				"Carry source unavailable, trying next"
			);
			return null;
		}
	}

	private params(ticker: string, tradeDate: string | undefined, fields: readonly string[]) {
		return {
			ticker,
			tradeDate,
			fields: fields.join(","),
			token: this.token,
		};
	}

	private rethrowIfUnauthorized(endpoint: string, error: unknown): ApiError {
		const apiError = classifyError(error);
		if (apiError.isUnauthorized) {
			throw new AuthenticationError(endpoint, truncateBody(apiError.body));
		}
		return apiError;
	}
}

// ============================================
// Helpers
// ============================================

function parseRecords<S extends z.ZodTypeAny>(records: unknown[], schema: S, kind: string): z.output<S>[] {
	const parsed: z.output<S>[] = [];
	let skipped = 0;

	for (const record of records) {
		const result = schema.safeParse(record);
		if (result.success) {
			parsed.push(result.data);
		} else {
			skipped++;
			log.debug({ kind, record, issues: result.error.issues }, "Skipping malformed provider record");
		}
	}

	if (skipped > 0) {
		log.warn({ kind, skipped, kept: parsed.length }, "Skipped malformed provider records");
	}

	return parsed;
}

/**
 * Create an ORATS client.
 */
export function createOratsClient(config: OratsClientConfig): OratsClient {
	return new OratsClient(config);
}
