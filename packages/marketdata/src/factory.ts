/**
 * Market Data Factory
 *
 * Builds the candle providers and the source orchestrator from resolved
 * configuration. Providers without usable credentials are left out.
 */

import type { CandleProviderId, Credentials, PipelineConfig, ProvidersConfig, RetryConfig } from "@fxline/config";
import { type Clock, RetryBudget, type Sleeper, systemClock } from "@fxline/domain";
import type { RateLimitConfig } from "./client.js";
import { log } from "./logger.js";
import { SourceOrchestrator } from "./orchestrator/orchestrator.js";
import { AlphaVantageAdapter } from "./providers/alphavantage.js";
import { FinnhubAdapter } from "./providers/finnhub.js";
import type { CandleProvider } from "./providers/types.js";
import { YahooFinanceAdapter } from "./providers/yahoo.js";

export interface FactoryOptions {
	clock?: Clock;
}

function toRateLimit(limit?: { max_requests: number; interval_ms: number }): RateLimitConfig | undefined {
	return limit ? { maxRequests: limit.max_requests, intervalMs: limit.interval_ms } : undefined;
}

/**
 * Enabled providers in priority order.
 */
export function createCandleProviders(
	config: ProvidersConfig,
	credentials: Credentials,
	options: FactoryOptions = {},
): CandleProvider[] {
	const clock = options.clock ?? systemClock;
	const providers: CandleProvider[] = [];

	for (const id of new Set<CandleProviderId>(config.priority)) {
		const settings = config[id];
		if (!settings.enabled) {
			log.info({ provider: id }, "Provider disabled in configuration");
			continue;
		}
		const common = {
			baseUrl: settings.base_url,
			rateLimit: toRateLimit(settings.rate_limit),
			timeoutMs: config.timeout_ms,
			intradayRetentionDays: settings.intraday_retention_days,
			clock,
		};

		switch (id) {
			case "finnhub": {
				const apiKey = credentials.finnhub;
				if (!apiKey) {
					log.warn({ provider: id }, "FINNHUB_API_KEY not set, skipping provider");
					continue;
				}
				providers.push(new FinnhubAdapter({ ...common, apiKey }));
				break;
			}
			case "alphavantage": {
				const apiKey = credentials.alphavantage;
				if (!apiKey) {
					log.warn({ provider: id }, "ALPHAV_API_KEY not set, skipping provider");
					continue;
				}
				providers.push(new AlphaVantageAdapter({ ...common, apiKey }));
				break;
			}
			case "yahoo":
				providers.push(new YahooFinanceAdapter(common));
				break;
		}
	}

	return providers;
}

export function createOrchestratorFromConfig(
	config: PipelineConfig,
	credentials: Credentials,
	options: FactoryOptions = {},
): SourceOrchestrator {
	return new SourceOrchestrator({
		providers: createCandleProviders(config.providers, credentials, options),
		calendar: config.general.session_calendar,
		clock: options.clock,
		timeoutMs: config.providers.timeout_ms,
	});
}

/**
 * A fresh budget for one acquisition request.
 */
export function createRetryBudget(retry: RetryConfig, sleep?: Sleeper): RetryBudget {
	return new RetryBudget({
		maxRetries: retry.max_retries,
		initialDelayMs: retry.initial_delay_ms,
		maxDelayMs: retry.max_delay_ms,
		backoffMultiplier: retry.backoff_multiplier,
		maxTotalRetries: retry.max_total_retries,
		sleep,
	});
}
