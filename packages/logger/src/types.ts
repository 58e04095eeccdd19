import type { LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface NodeLoggerOptions {
	/** Service name attached to every line */
	service: string;
	level?: LogLevel;
	environment?: string;
	version?: string;
	/** Human-readable output via pino-pretty. Defaults to NODE_ENV === "development" */
	pretty?: boolean;
	/** Extra paths to censor, merged with the defaults */
	redactPaths?: string[];
	base?: Record<string, unknown>;
	pinoOptions?: Partial<LoggerOptions>;
}

/**
 * Fields bound to every line of a single job run.
 */
export interface RunContext {
	runId: string;
	ticker: string;
	storedDate?: string;
	sourceDate?: string;
}
