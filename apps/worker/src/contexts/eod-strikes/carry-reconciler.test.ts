import type { CarryQuote, CarryQuoteMap } from "@eodgex/marketdata";
import { describe, expect, test } from "vitest";
import { type CarryInputs, reconcileCarry } from "./carry-reconciler.js";

const EXPIRY = "2026-11-20";

function quotes(entry?: CarryQuote): CarryQuoteMap {
	return entry ? new Map([[EXPIRY, entry]]) : new Map();
}

function inputs(primary?: CarryQuote, proxy?: CarryQuote, fallbackShortRate: number | null = null): CarryInputs {
	return { primary: quotes(primary), proxy: quotes(proxy), fallbackShortRate };
}

describe("reconcileCarry", () => {
	test("uses the primary quote when its yield is non-zero", () => {
		const carry = reconcileCarry(
			EXPIRY,
			inputs({ shortRate: 0.048, divYield: 0.013 }, { shortRate: 0.05, divYield: 0.015 }, 0.047)
		);

		expect(carry).toEqual({ shortRate: 0.048, divYield: 0.013, carrySource: "primary" });
	});

	test("takes the proxy yield and the fallback rate when the primary has neither", () => {
		const carry = reconcileCarry(EXPIRY, inputs(undefined, { shortRate: null, divYield: 0.015 }, 0.05));

		expect(carry).toEqual({ shortRate: 0.05, divYield: 0.015, carrySource: "proxy" });
	});

	test("treats a zero primary yield as missing", () => {
		const carry = reconcileCarry(EXPIRY, inputs({ shortRate: 0.048, divYield: 0 }, { shortRate: 0.05, divYield: 0.015 }));

		expect(carry).toEqual({ shortRate: 0.048, divYield: 0.015, carrySource: "proxy" });
	});

	test("uses the fallback rate once no quote has a non-zero yield", () => {
		const carry = reconcileCarry(
			EXPIRY,
			inputs({ shortRate: 0.04, divYield: null }, { shortRate: 0.049, divYield: 0 }, 0.05)
		);

		expect(carry).toEqual({ shortRate: 0.05, divYield: 0, carrySource: "default" });
	});

	test("keeps the primary rate ahead of the proxy rate when the proxy supplies the yield", () => {
		const carry = reconcileCarry(
			EXPIRY,
			inputs({ shortRate: 0.046, divYield: null }, { shortRate: 0.049, divYield: 0.015 }, 0.05)
		);

		expect(carry).toEqual({ shortRate: 0.046, divYield: 0.015, carrySource: "proxy" });
	});

	test("takes the primary rate as-is when the primary yield wins", () => {
		const carry = reconcileCarry(EXPIRY, inputs({ shortRate: null, divYield: 0.013 }, undefined, 0.05));

		expect(carry).toEqual({ shortRate: null, divYield: 0.013, carrySource: "primary" });
	});

	test("defaults the yield to zero and the rate to null when nothing is known", () => {
		expect(reconcileCarry(EXPIRY, inputs())).toEqual({ shortRate: null, divYield: 0, carrySource: "default" });
	});

	test("looks quotes up by expiration", () => {
		const carry = reconcileCarry("2026-12-18", inputs({ shortRate: 0.048, divYield: 0.013 }, undefined, 0.05));

		expect(carry).toEqual({ shortRate: 0.05, divYield: 0, carrySource: "default" });
	});
});
