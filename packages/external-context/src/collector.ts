/**
 * News Collector
 *
 * Walks `[start, end)` in fixed windows and searches each one for the
 * instrument's query. Windows the provider no longer reaches are skipped
 * and reported instead of requested. Throttling and outages are retried
 * against the RetryBudget; any other failure marks the window failed and
 * the walk goes on. Rejected credentials stop the collection.
 */

import {
	type Article,
	AuthenticationError,
	type Clock,
	DAY_MS,
	dedupeArticles,
	errorMessage,
	isProviderError,
	type ProviderError,
	RateLimitedError,
	RetryBudget,
	systemClock,
	UnavailableError,
} from "@fxline/domain";
import type { Logger } from "@fxline/logger";
import type { NormalizeResult } from "@fxline/marketdata";
import { log as defaultLog } from "./logger.js";
import type { ArticleProvider, ArticleRequest, FailedWindow, NewsCollection, NewsWindow } from "./types.js";

export interface NewsCollectorOptions {
	provider: ArticleProvider;
	/** Search query per instrument; instruments without one search "BASE QUOTE" */
	queries?: Readonly<Record<string, string>>;
	windowDays?: number;
	clock?: Clock;
	logger?: Logger;
}

export const DEFAULT_WINDOW_DAYS = 7;

/**
 * Consecutive windows of `windowDays` covering `[start, end)`; the last
 * one is cut at `end`.
 */
export function newsWindows(start: number, end: number, windowDays: number): NewsWindow[] {
	const windows: NewsWindow[] = [];
	for (let current = start; current < end; ) {
		const next = Math.min(end, current + windowDays * DAY_MS);
		windows.push({ start: current, end: next });
		current = next;
	}
	return windows;
}

export function defaultQuery(instrument: string): string {
	return `${instrument.slice(0, 3)} ${instrument.slice(3, 6)}`;
}

export class NewsCollector {
	private readonly provider: ArticleProvider;
	private readonly queries: Readonly<Record<string, string>>;
	private readonly windowDays: number;
	private readonly clock: Clock;
	private readonly log: Logger;

	constructor(options: NewsCollectorOptions) {
		this.provider = options.provider;
		this.queries = options.queries ?? {};
		this.windowDays = options.windowDays ?? DEFAULT_WINDOW_DAYS;
		this.clock = options.clock ?? systemClock;
		this.log = options.logger ?? defaultLog;
	}

	/**
	 * @throws AuthenticationError when the provider rejects the key
	 */
	async collect(
		instrument: string,
		start: number,
		end: number,
		budget: RetryBudget = new RetryBudget(),
	): Promise<NewsCollection> {
		const availableFrom = this.clock() - this.provider.capabilities.retentionDays * DAY_MS;
		const query = this.queries[instrument] ?? defaultQuery(instrument);
		const collected: Article[] = [];
		const skippedWindows: NewsWindow[] = [];
		const failedWindows: FailedWindow[] = [];
		let malformed = 0;

		for (const window of newsWindows(start, end, this.windowDays)) {
			if (window.end <= availableFrom) {
				skippedWindows.push(window);
				this.log.info(
					{ instrument, from: toIso(window.start), to: toIso(window.end) },
					"Window outside news provider retention, skipping",
				);
				continue;
			}

			const request: ArticleRequest = {
				tag: instrument,
				query,
				start: Math.max(window.start, availableFrom),
				end: window.end,
			};
			const outcome = await this.attempt(request, budget);
			if (!outcome.ok) {
				if (outcome.error instanceof AuthenticationError) {
					this.log.error({ provider: this.provider.id, error: outcome.error.message }, "News provider rejected credentials");
					throw outcome.error;
				}
				failedWindows.push({ ...window, error: outcome.error.message });
				this.log.warn(
					{ provider: this.provider.id, instrument, code: outcome.error.code, error: outcome.error.message },
					"News window failed",
				);
				continue;
			}
			malformed += outcome.result.malformed;
			collected.push(...outcome.result.records);
		}

		const { articles, duplicates } = dedupeArticles(collected.sort(compareArticles));

		this.log.info(
			{
				instrument,
				articles: articles.length,
				duplicates,
				malformed,
				skippedWindows: skippedWindows.length,
				failedWindows: failedWindows.length,
			},
			"News collection complete",
		);

		return { instrument, start, end, articles, skippedWindows, failedWindows, duplicates, malformed };
	}

	private async attempt(
		request: ArticleRequest,
		budget: RetryBudget,
	): Promise<{ ok: true; result: NormalizeResult<Article> } | { ok: false; error: ProviderError }> {
		let retries = 0;
		for (;;) {
			try {
				const raw = await this.provider.fetch(request);
				return { ok: true, result: this.provider.normalize(raw, request) };
			} catch (error) {
				const providerError = isProviderError(error)
					? error
					: new UnavailableError(this.provider.id, errorMessage(error), { cause: error });
				if (!providerError.retryable || !budget.canRetry(retries)) {
					return { ok: false, error: providerError };
				}
				const hint = providerError instanceof RateLimitedError ? providerError.retryAfterMs : undefined;
				const delayMs = await budget.wait(retries, hint);
				retries++;
				this.log.warn({ provider: this.provider.id, attempt: retries, delayMs }, "Retrying news provider after backoff");
			}
		}
	}
}

/**
 * Oldest first; ties broken by source then headline so reruns are stable.
 */
export function compareArticles(a: Article, b: Article): number {
	return a.publishedAt - b.publishedAt || compareStrings(a.source, b.source) || compareStrings(a.headline, b.headline);
}

function compareStrings(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

function toIso(timestamp: number): string {
	return new Date(timestamp).toISOString();
}
