export { calculateReturns } from "./returns.js";
export { calculateZScore, ZSCORE_DEFAULTS } from "./zscore.js";
