/**
 * Paths censored in every log line. Provider tokens travel as a query
 * parameter and as a bearer header, so both shapes are listed.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"token",
	"*.token",
	"apiKey",
	"*.apiKey",
	"authorization",
	"headers.authorization",
	"headers.Authorization",
	"*.headers.Authorization",
	"databaseUrl",
	"*.databaseUrl",
	"password",
	"*.password",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
	return [...new Set([...DEFAULT_REDACT_PATHS, ...extra])];
}

const TOKEN_QUERY_PATTERN = /([?&]token=)[^&]*/gi;

/**
 * Strip the token query parameter from a URL before it is logged.
 */
export function redactUrl(url: string): string {
	return url.replace(TOKEN_QUERY_PATTERN, "$1[REDACTED]");
}
