/**
 * Storage Package
 *
 * JSON artifact persistence for every pipeline layer.
 */

export { log } from "./logger.js";
export * from "./repositories/artifacts.js";
export * from "./repositories/base.js";
export * from "./schema/artifacts.js";
export * from "./store.js";
