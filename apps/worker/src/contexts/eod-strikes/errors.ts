/**
 * EOD Strikes Errors
 *
 * Fatal run conditions and their process exit codes. Every one of them is
 * raised before the partition is touched.
 */

import { AuthenticationError, FetchFailureError } from "@eodgex/marketdata";

export const EXIT_CODES = {
	success: 0,
	unexpected: 1,
	authentication: 2,
	noSourceDate: 3,
	fetchFailure: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class MissingTokenError extends Error {
	readonly code = "MISSING_TOKEN";

	constructor() {
		super("ORATS_TOKEN is not set and no --token was given");
		this.name = "MissingTokenError";
	}
}

export class NoSourceDateFoundError extends Error {
	readonly code = "NO_SOURCE_DATE";

	constructor(
		public readonly ticker: string,
		public readonly storedDate: string,
		public readonly maxLookbackDays: number
	) {
		super(`No trade date with data for ${ticker} in the ${maxLookbackDays} days before ${storedDate}`);
		this.name = "NoSourceDateFoundError";
	}
}

/**
 * Bad command-line input. Exits like any unexpected error.
 */
export class UsageError extends Error {
	readonly code = "INVALID_ARGUMENTS";

	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

export function exitCodeFor(error: unknown): ExitCode {
	if (error instanceof MissingTokenError || error instanceof AuthenticationError) {
		return EXIT_CODES.authentication;
	}
	if (error instanceof NoSourceDateFoundError) {
		return EXIT_CODES.noSourceDate;
	}
	if (error instanceof FetchFailureError) {
		return EXIT_CODES.fetchFailure;
	}
	return EXIT_CODES.unexpected;
}
