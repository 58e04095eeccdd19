/**
 * First-match combinators for fallback chains.
 *
 * A chain is an ordered list of strategies, each returning a value or
 * null/undefined. The first strategy to produce a value wins and the rest
 * are not evaluated.
 */

export type Strategy<T> = () => T | null | undefined;

export type AsyncStrategy<T> = () => Promise<T | null | undefined>;

export interface Match<T> {
	value: T;
	/** Position of the winning strategy in the chain */
	index: number;
}

export function firstMatch<T>(strategies: readonly Strategy<T>[]): Match<T> | null {
	for (const [index, strategy] of strategies.entries()) {
		const value = strategy();
		if (value !== null && value !== undefined) {
			return { value, index };
		}
	}
	return null;
}

export async function firstMatchAsync<T>(
	strategies: readonly AsyncStrategy<T>[]
): Promise<Match<T> | null> {
	for (const [index, strategy] of strategies.entries()) {
		const value = await strategy();
		if (value !== null && value !== undefined) {
			return { value, index };
		}
	}
	return null;
}
