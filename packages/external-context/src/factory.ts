/**
 * News Factory
 *
 * Builds the news provider, collector and aligner from resolved
 * configuration.
 */

import type { Credentials, NewsConfig } from "@fxline/config";
import type { Clock } from "@fxline/domain";
import { NewsAligner } from "./aligner.js";
import { NewsCollector } from "./collector.js";
import { log } from "./logger.js";
import { NewsApiAdapter } from "./providers/newsapi.js";

export interface NewsFactoryOptions {
	clock?: Clock;
	timeoutMs?: number;
}

/**
 * The configured news provider, or null when news is disabled or no key
 * is available.
 */
export function createNewsProvider(
	config: NewsConfig,
	credentials: Credentials,
	options: NewsFactoryOptions = {},
): NewsApiAdapter | null {
	if (!config.enabled) {
		log.info({ provider: "newsapi" }, "News collection disabled in configuration");
		return null;
	}
	const apiKey = credentials.newsapi;
	if (!apiKey) {
		log.warn({ provider: "newsapi" }, "NEWSAPI_KEY not set, skipping news collection");
		return null;
	}
	return new NewsApiAdapter({
		apiKey,
		baseUrl: config.base_url,
		rateLimit: config.rate_limit
			? { maxRequests: config.rate_limit.max_requests, intervalMs: config.rate_limit.interval_ms }
			: undefined,
		retentionDays: config.retention_days,
		pageSize: config.page_size,
		timeoutMs: options.timeoutMs,
		clock: options.clock,
	});
}

export function createNewsCollectorFromConfig(
	config: NewsConfig,
	credentials: Credentials,
	options: NewsFactoryOptions = {},
): NewsCollector | null {
	const provider = createNewsProvider(config, credentials, options);
	if (!provider) {
		return null;
	}
	return new NewsCollector({
		provider,
		queries: config.queries,
		windowDays: config.window_days,
		clock: options.clock,
	});
}

export function createNewsAlignerFromConfig(config: NewsConfig): NewsAligner {
	return new NewsAligner({ neutralScore: config.neutral_score });
}
