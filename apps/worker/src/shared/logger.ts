/**
 * Shared Logger
 *
 * Centralized logging for all worker bounded contexts.
 */

import { createNodeLogger, type LifecycleLogger, resolveLogLevel } from "@eodgex/logger";

export const log: LifecycleLogger = createNodeLogger({
	service: "worker",
	level: resolveLogLevel(process.env.LOG_LEVEL),
	environment: process.env.NODE_ENV ?? "production",
	pretty: process.env.NODE_ENV === "development",
});
