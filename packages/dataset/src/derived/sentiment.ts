/**
 * Sentiment-aligned dataset: each article paired with the forward return
 * from the first candle at or after publication to the candle after it.
 */

import { type Article, type Gap, hasGapBetween } from "@fxline/domain";
import { createLexiconScorer, type SentimentScorer } from "@fxline/external-context";
import type { DatasetCell, DerivedTable } from "../types.js";

export interface PricePoint {
	timestamp: number;
	close: number;
}

export interface SentimentDatasetOptions {
	scorer?: SentimentScorer;
}

export const SENTIMENT_COLUMNS = [
	"published_at",
	"period_start",
	"tag",
	"source",
	"headline",
	"url",
	"sentiment_score",
	"forward_return_1",
	"label",
];

/**
 * Index of the first point with `timestamp >= at`, or `points.length`.
 */
export function firstAtOrAfter(points: readonly PricePoint[], at: number): number {
	let lo = 0;
	let hi = points.length;
	while (lo < hi) {
		const mid = (lo + hi) >>> 1;
		const point = points[mid];
		if (point && point.timestamp < at) {
			lo = mid + 1;
		} else {
			hi = mid;
		}
	}
	return lo;
}

/**
 * Articles with no candle at or after publication, or whose next candle
 * lies across a recorded gap, are left out.
 */
export function buildSentimentDataset(
	articles: readonly Article[],
	prices: readonly PricePoint[],
	gaps: readonly Gap[],
	options: SentimentDatasetOptions = {},
): DerivedTable {
	const score = options.scorer ?? createLexiconScorer();
	const table: DatasetCell[][] = [];

	for (const article of articles) {
		const index = firstAtOrAfter(prices, article.publishedAt);
		const current = prices[index];
		const next = prices[index + 1];
		if (!current || !next || hasGapBetween(current.timestamp, next.timestamp, gaps)) {
			continue;
		}
		const forwardReturn = (next.close - current.close) / current.close;
		table.push([
			new Date(article.publishedAt).toISOString(),
			new Date(current.timestamp).toISOString(),
			article.tag,
			article.source,
			article.headline,
			article.url ?? null,
			score(article),
			forwardReturn,
			forwardReturn > 0 ? 1 : 0,
		]);
	}

	return { name: "sentiment", columns: [...SENTIMENT_COLUMNS], rows: table };
}
