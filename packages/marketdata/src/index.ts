/**
 * @fxline/marketdata - Candle acquisition
 *
 * - REST client with rate limiting and error classification
 * - Provider adapters (Finnhub, Alpha Vantage, Yahoo Finance)
 * - Source orchestrator: planning, fallback, merge, gap detection
 */

export const PACKAGE_NAME = "@fxline/marketdata";
export const VERSION = "0.1.0";

export {
	type ClientConfig,
	createRestClient,
	DEFAULT_RATE_LIMIT,
	DEFAULT_TIMEOUT_MS,
	parseRetryAfter,
	type QueryParams,
	type RateLimitConfig,
	RateLimiter,
	type RequestOptions,
	RestClient,
} from "./client.js";
export { createCandleProviders, createOrchestratorFromConfig, createRetryBudget, type FactoryOptions } from "./factory.js";
export * from "./orchestrator/index.js";
export * from "./providers/index.js";
