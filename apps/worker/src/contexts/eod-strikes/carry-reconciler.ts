/**
 * Carry-Rate Reconciler
 *
 * Resolves (shortRate, divYield) per expiration from the primary ticker's
 * quotes, the proxy ticker's quotes and a scalar fallback rate.
 */

import { firstMatch, type Strategy } from "@eodgex/domain";
import type { CarryQuoteMap } from "@eodgex/marketdata";

/** Which tier supplied the dividend yield */
export type CarrySource = "primary" | "proxy" | "default";

export interface CarryInputs {
	primary: CarryQuoteMap;
	proxy: CarryQuoteMap;
	fallbackShortRate: number | null;
}

export interface ReconciledCarry {
	shortRate: number | null;
	/** 0 when no source has a non-zero yield */
	divYield: number;
	carrySource: CarrySource;
}

function nonZero(value: number | null | undefined): number | null {
	return value === null || value === undefined || value === 0 ? null : value;
}

/**
 * The tier that supplies a non-zero yield also decides the rate:
 * - primary: the primary quote as-is
 * - proxy: primary rate, else proxy rate, else the fallback rate
 * - default: yield 0 with the fallback rate
 */
export function reconcileCarry(expirDate: string, inputs: CarryInputs): ReconciledCarry {
	const primary = inputs.primary.get(expirDate);
	const proxy = inputs.proxy.get(expirDate);

	const tiers: Strategy<ReconciledCarry>[] = [
		() => {
			const divYield = nonZero(primary?.divYield);
			if (divYield === null) {
				return null;
			}
			return { shortRate: primary?.shortRate ?? null, divYield, carrySource: "primary" };
		},
		() => {
			const divYield = nonZero(proxy?.divYield);
			if (divYield === null) {
				return null;
			}
			const rate = firstMatch<number>([
				() => primary?.shortRate,
				() => proxy?.shortRate,
				() => inputs.fallbackShortRate,
			]);
			return { shortRate: rate?.value ?? null, divYield, carrySource: "proxy" };
		},
	];

	return (
		firstMatch(tiers)?.value ?? {
			shortRate: inputs.fallbackShortRate,
			divYield: 0,
			carrySource: "default",
		}
	);
}
