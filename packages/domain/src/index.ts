/**
 * Domain Package
 *
 * Canonical records shared by every pipeline stage: candles and gap-aware
 * series, articles and news signals, indicator and model-ready rows, plus
 * time arithmetic, the FX session calendar, the error taxonomy and the
 * per-request retry budget.
 */

export * from "./calendar.js";
export * from "./candle.js";
export * from "./clock.js";
export * from "./errors.js";
export * from "./granularity.js";
export * from "./news.js";
export * from "./report.js";
export * from "./retry.js";
export * from "./rows.js";

export const DOMAIN_VERSION = "0.1.0";
