/**
 * Provider failures that end a run. Carry-source failures never surface
 * here: the adapter absorbs them and moves to the next source.
 */

export const MAX_ERROR_BODY_LENGTH = 200;

export function truncateBody(body: string | undefined, maxLength = MAX_ERROR_BODY_LENGTH): string {
	if (!body) {
		return "";
	}
	return body.length > maxLength ? body.slice(0, maxLength) : body;
}

/**
 * The provider rejected the token (HTTP 401). Never retried.
 */
export class AuthenticationError extends Error {
	readonly code = "AUTHENTICATION_FAILURE";

	constructor(
		public readonly endpoint: string,
		public readonly body: string = ""
	) {
		super(`Provider rejected credentials for ${endpoint}`);
		this.name = "AuthenticationError";
	}
}

/**
 * The strikes endpoint failed with anything other than a 401.
 */
export class FetchFailureError extends Error {
	readonly code = "FETCH_FAILURE";

	constructor(
		public readonly ticker: string,
		public readonly tradeDate: string,
		/** HTTP status, or 0 for timeouts and transport errors */
		public readonly status: number,
		public readonly body: string
	) {
		super(
			`Strike fetch failed for ${ticker} ${tradeDate}: ${status === 0 ? "no response" : `HTTP ${status}`}${
				body ? ` ${body}` : ""
			}`
		);
		this.name = "FetchFailureError";
	}
}
