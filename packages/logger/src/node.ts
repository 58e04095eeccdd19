import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type { NodeLoggerOptions, RunContext } from "./types.js";

type LoggerState = "active" | "flushing" | "destroyed";

export interface LifecycleLogger extends Logger {
	flush(): Promise<void>;
	destroy(): Promise<void>;
}

const LOG_METHODS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

function wrapLoggerWithLifecycle(baseLogger: Logger): LifecycleLogger {
	let state: LoggerState = "active";
	let flushPromise: Promise<void> | null = null;

	const wrappedLogger = Object.create(baseLogger) as LifecycleLogger;

	// Lines written after destroy() are dropped instead of hitting a closed stream
	for (const method of LOG_METHODS) {
		const original = baseLogger[method].bind(baseLogger);
		(wrappedLogger as unknown as Record<string, unknown>)[method] = (...args: unknown[]) => {
			if (state === "destroyed") {
				return;
			}
			return (original as (...args: unknown[]) => void)(...args);
		};
	}

	wrappedLogger.flush = async (): Promise<void> => {
		if (state === "destroyed") {
			return;
		}
		if (flushPromise) {
			return flushPromise;
		}
		state = "flushing";
		flushPromise = new Promise<void>((resolve) => {
			baseLogger.flush(() => {
				state = "active";
				flushPromise = null;
				resolve();
			});
		});
		return flushPromise;
	};

	wrappedLogger.destroy = async (): Promise<void> => {
		if (state === "destroyed") {
			return;
		}
		await wrappedLogger.flush();
		state = "destroyed";
	};

	return wrappedLogger;
}

export function createNodeLogger(options: NodeLoggerOptions): LifecycleLogger {
	const {
		service,
		level = "info",
		environment,
		version,
		pretty,
		redactPaths,
		base = {},
		pinoOptions = {},
	} = options;

	const isPretty = pretty ?? process.env.NODE_ENV === "development";

	const loggerOptions: LoggerOptions = {
		level,
		formatters: {
			level: (label) => ({ severity: label.toUpperCase() }),
			bindings: () => ({}),
		},
		timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
		redact: {
			paths: mergeRedactPaths(redactPaths),
			censor: "[REDACTED]",
		},
		base: {
			service,
			environment,
			version,
			...base,
		},
		...pinoOptions,
	};

	const baseLogger = isPretty
		? pino(
				loggerOptions,
				pino.transport({
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "SYS:HH:MM:ss",
						ignore: "pid,hostname,service,environment,version",
						customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
						singleLine: true,
					},
				})
			)
		: pino(loggerOptions);

	return wrapLoggerWithLifecycle(baseLogger);
}

/**
 * Child logger carrying the identifiers of one ingestion run.
 */
export function withRunContext(logger: Logger, context: RunContext): Logger {
	return logger.child({
		runId: context.runId,
		ticker: context.ticker,
		storedDate: context.storedDate,
		sourceDate: context.sourceDate,
	});
}
