/**
 * Job Configuration Tests
 */

import { describe, expect, test } from "vitest";
import { ConfigError, loadJobConfig } from "./env.js";

describe("loadJobConfig", () => {
	test("applies defaults for an empty environment", () => {
		const config = loadJobConfig({});

		expect(config).toEqual({
			provider: {
				baseUrl: "https://api.orats.io/datav2",
				token: undefined,
				probeTimeoutMs: 60_000,
				fetchTimeoutMs: 180_000,
			},
			ticker: "SPX",
			carryProxyTicker: "SPY",
			dteMax: 400,
			contractMultiplier: 100,
			maxLookbackDays: 7,
			referenceTimeZone: "America/New_York",
			storedDatePolicy: "roll-forward",
			databaseUrl: undefined,
		});
	});

	test("reads and coerces overrides", () => {
		const config = loadJobConfig({
			ORATS_TOKEN: " test-token ",
			TICKER: "ndx",
			CARRY_PROXY_TICKER: "qqq",
			DTE_MAX: "90",
			CONTRACT_MULTIPLIER: "10",
			MAX_LOOKBACK_DAYS: "10",
			STORED_DATE_POLICY: "next-business-day",
			LOG_LEVEL: "DEBUG",
			DATABASE_URL: "postgresql://localhost:5432/eod_test",
		});

		expect(config.provider.token).toBe("test-token");
		expect(config.ticker).toBe("NDX");
		expect(config.carryProxyTicker).toBe("QQQ");
		expect(config.dteMax).toBe(90);
		expect(config.contractMultiplier).toBe(10);
		expect(config.maxLookbackDays).toBe(10);
		expect(config.storedDatePolicy).toBe("next-business-day");
		expect(config.databaseUrl).toBe("postgresql://localhost:5432/eod_test");
	});

	test("treats blank strings as unset", () => {
		const config = loadJobConfig({ ORATS_TOKEN: "", TICKER: "  " });
		expect(config.provider.token).toBeUndefined();
		expect(config.ticker).toBe("SPX");
	});

	test("rejects invalid numbers and policies", () => {
		expect(() => loadJobConfig({ DTE_MAX: "-5" })).toThrow(ConfigError);
		expect(() => loadJobConfig({ MAX_LOOKBACK_DAYS: "0" })).toThrow(/MAX_LOOKBACK_DAYS/);
		expect(() => loadJobConfig({ STORED_DATE_POLICY: "tomorrow" })).toThrow(/STORED_DATE_POLICY/);
		expect(() => loadJobConfig({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL/);
	});

	test("rejects an invalid base URL", () => {
		expect(() => loadJobConfig({ ORATS_BASE_URL: "not a url" })).toThrow(/ORATS_BASE_URL/);
	});

	test("rejects an unknown timezone", () => {
		expect(() => loadJobConfig({ REFERENCE_TIMEZONE: "Mars/Olympus_Mons" })).toThrow(
			/REFERENCE_TIMEZONE/
		);
	});
});
