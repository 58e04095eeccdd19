import type { LogLevel } from "./types.js";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Case-insensitive LOG_LEVEL lookup. Unset or unknown values give `fallback`.
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
	const normalized = value?.trim().toLowerCase();
	return normalized && isLogLevel(normalized) ? normalized : fallback;
}
