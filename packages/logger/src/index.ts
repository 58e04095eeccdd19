import pino from "pino";

export { LOG_LEVELS, resolveLogLevel } from "./level.js";
export { createNodeLogger, type LifecycleLogger, withRunContext } from "./node.js";
export * from "./redaction.js";
export * from "./types.js";

export { pino };
