export * from "./alphavantage.js";
export * from "./finnhub.js";
export { barsToCandles, type RawBar } from "./normalize.js";
export * from "./types.js";
export * from "./yahoo.js";
