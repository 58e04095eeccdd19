/**
 * Drizzle Schema Index
 *
 * @example
 * import * as schema from "./schema/index.js";
 */

export * from "./strike-gamma.js";
