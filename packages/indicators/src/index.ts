/**
 * @fxline/indicators - Technical indicator engine
 *
 * Calculators return series aligned with their input; the engine applies
 * them per gap-free run and emits IndicatorRow records.
 */

export const PACKAGE_NAME = "@fxline/indicators";
export const VERSION = "0.1.0";

export * from "./catalog.js";
export * from "./engine.js";
export * from "./momentum/index.js";
export * from "./transforms/index.js";
export * from "./trend/index.js";
export * from "./types.js";
export * from "./volatility/index.js";
