/**
 * Job Configuration
 *
 * Parses the process environment once, at the system boundary, into an
 * explicit `JobConfig` that is handed to every component. Nothing below the
 * CLI reads `process.env` directly, so tests build configs with
 * `loadJobConfig({ ... })` instead of mutating the environment.
 */

import { z } from "zod";

// ============================================
// Stored-date policies
// ============================================

/**
 * How "today" maps to the date a snapshot is stored under.
 *
 * - roll-forward: today, moved to Monday when it falls on a weekend
 * - next-business-day: always the business day after today
 * - calendar-today: today as-is, weekends included
 */
export const StoredDatePolicyName = z.enum(["roll-forward", "next-business-day", "calendar-today"]);
export type StoredDatePolicyName = z.infer<typeof StoredDatePolicyName>;

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

// ============================================
// Schema
// ============================================

function isValidUrl(val: string): boolean {
	try {
		new URL(val);
		return true;
	} catch {
		return false;
	}
}

/**
 * Treat empty strings as unset so `FOO=` in a .env file falls back to the default.
 */
function optionalString() {
	return z
		.string()
		.optional()
		.transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));
}

const tickerSchema = (fallback: string) =>
	optionalString().transform((val) => (val ?? fallback).toUpperCase());

const envSchema = z.object({
	ORATS_TOKEN: optionalString().describe("Market-data provider token"),
	ORATS_BASE_URL: optionalString()
		.transform((val) => val ?? "https://api.orats.io/datav2")
		.refine(isValidUrl, { message: "Invalid URL format" })
		.describe("Market-data provider base URL"),
	TICKER: tickerSchema("SPX").describe("Primary ticker"),
	CARRY_PROXY_TICKER: tickerSchema("SPY").describe("Proxy ticker for carry quotes"),
	DTE_MAX: z.coerce.number().int().positive().default(400).describe("Maximum raw days-to-expiration kept"),
	CONTRACT_MULTIPLIER: z.coerce.number().positive().default(100).describe("Contract multiplier for GEX"),
	MAX_LOOKBACK_DAYS: z.coerce
		.number()
		.int()
		.min(1)
		.max(31)
		.default(7)
		.describe("Calendar days searched backward for a source date"),
	REFERENCE_TIMEZONE: optionalString()
		.transform((val) => val ?? "America/New_York")
		.describe("Timezone used to determine today"),
	STORED_DATE_POLICY: StoredDatePolicyName.default("roll-forward").describe("Stored-date policy"),
	PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000).describe("Probe request timeout"),
	FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000).describe("Bulk request timeout"),
	DATABASE_URL: optionalString().describe("PostgreSQL connection string"),
	LOG_LEVEL: z
		.string()
		.optional()
		.transform((val) => val?.toLowerCase())
		.pipe(LogLevelSchema.default("info"))
		.describe("Log verbosity"),
});

export type RawJobEnv = z.input<typeof envSchema>;

// ============================================
// JobConfig
// ============================================

export interface JobConfig {
	provider: {
		baseUrl: string;
		token: string | undefined;
		probeTimeoutMs: number;
		fetchTimeoutMs: number;
	};
	ticker: string;
	carryProxyTicker: string;
	dteMax: number;
	contractMultiplier: number;
	maxLookbackDays: number;
	referenceTimeZone: string;
	storedDatePolicy: StoredDatePolicyName;
	databaseUrl: string | undefined;
}

export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly issues: z.ZodIssue[]
	) {
		super(message);
		this.name = "ConfigError";
	}
}

function isSupportedTimeZone(timeZone: string): boolean {
	try {
		new Intl.DateTimeFormat("en-US", { timeZone });
		return true;
	} catch {
		return false;
	}
}

/**
 * Parse and validate job configuration.
 *
 * @throws {ConfigError} listing every invalid variable
 */
export function loadJobConfig(env: Record<string, string | undefined> = process.env): JobConfig {
	const result = envSchema.safeParse({
		ORATS_TOKEN: env.ORATS_TOKEN,
		ORATS_BASE_URL: env.ORATS_BASE_URL,
		TICKER: env.TICKER,
		CARRY_PROXY_TICKER: env.CARRY_PROXY_TICKER,
		DTE_MAX: env.DTE_MAX,
		CONTRACT_MULTIPLIER: env.CONTRACT_MULTIPLIER,
		MAX_LOOKBACK_DAYS: env.MAX_LOOKBACK_DAYS,
		REFERENCE_TIMEZONE: env.REFERENCE_TIMEZONE,
		STORED_DATE_POLICY: env.STORED_DATE_POLICY,
		PROBE_TIMEOUT_MS: env.PROBE_TIMEOUT_MS,
		FETCH_TIMEOUT_MS: env.FETCH_TIMEOUT_MS,
		DATABASE_URL: env.DATABASE_URL,
		LOG_LEVEL: env.LOG_LEVEL,
	});

	if (!result.success) {
		const detail = result.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid job configuration: ${detail}`, result.error.issues);
	}

	const parsed = result.data;

	if (!isSupportedTimeZone(parsed.REFERENCE_TIMEZONE)) {
		throw new ConfigError(`Invalid job configuration: REFERENCE_TIMEZONE: unknown timezone`, []);
	}

	return {
		provider: {
			baseUrl: parsed.ORATS_BASE_URL,
			token: parsed.ORATS_TOKEN,
			probeTimeoutMs: parsed.PROBE_TIMEOUT_MS,
			fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
		},
		ticker: parsed.TICKER,
		carryProxyTicker: parsed.CARRY_PROXY_TICKER,
		dteMax: parsed.DTE_MAX,
		contractMultiplier: parsed.CONTRACT_MULTIPLIER,
		maxLookbackDays: parsed.MAX_LOOKBACK_DAYS,
		referenceTimeZone: parsed.REFERENCE_TIMEZONE,
		storedDatePolicy: parsed.STORED_DATE_POLICY,
		databaseUrl: parsed.DATABASE_URL,
	};
}
