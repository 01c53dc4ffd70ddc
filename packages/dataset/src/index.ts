/**
 * Dataset Package
 *
 * Model-ready assembly plus the derived trend, mean-reversion and
 * sentiment tables.
 */

export * from "./assembler.js";
export * from "./builder.js";
export * from "./derived/index.js";
export * from "./features.js";
export { log } from "./logger.js";
export type * from "./types.js";
