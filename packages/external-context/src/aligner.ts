/**
 * News Aligner
 *
 * Buckets articles onto the candle timeline of one series and emits one
 * NewsSignal per candle period:
 *
 * - bucket = floor(publishedAt / period) * period
 * - score = mean article sentiment, summed in ascending order
 * - periods without articles get the neutral score and a count of 0
 *
 * Articles whose bucket is not a candle period (market closed, inside a
 * gap, outside the range) are counted as unaligned.
 */

import { alignToPeriod, type Article, type Candle, type Granularity, type NewsSignal } from "@fxline/domain";
import type { Logger } from "@fxline/logger";
import { log as defaultLog } from "./logger.js";
import { createLexiconScorer, meanScore } from "./scoring/sentiment.js";
import type { SentimentScorer } from "./types.js";

export interface NewsAlignerOptions {
	/** Score for periods with no articles */
	neutralScore?: number;
	scorer?: SentimentScorer;
	logger?: Logger;
}

export interface AlignmentTarget {
	instrument: string;
	granularity: Granularity;
	candles: readonly Pick<Candle, "timestamp">[];
}

export interface AlignmentResult {
	signals: NewsSignal[];
	/** Articles that fell outside every candle period */
	unaligned: number;
}

export class NewsAligner {
	readonly neutralScore: number;
	private readonly scorer: SentimentScorer;
	private readonly log: Logger;

	constructor(options: NewsAlignerOptions = {}) {
		this.neutralScore = options.neutralScore ?? 0;
		this.scorer = options.scorer ?? createLexiconScorer();
		this.log = options.logger ?? defaultLog;
	}

	align(target: AlignmentTarget, articles: readonly Article[]): AlignmentResult {
		const periods = [...new Set(target.candles.map((c) => c.timestamp))].sort((a, b) => a - b);
		const buckets = new Map<number, number[]>(periods.map((p) => [p, []]));
		let unaligned = 0;

		for (const article of articles) {
			const bucket = buckets.get(alignToPeriod(article.publishedAt, target.granularity));
			if (bucket) {
				bucket.push(this.scorer(article));
			} else {
				unaligned++;
			}
		}

		const signals: NewsSignal[] = periods.map((periodStart) => {
			const scores = buckets.get(periodStart) ?? [];
			return {
				instrument: target.instrument,
				periodStart,
				score: scores.length === 0 ? this.neutralScore : meanScore(scores),
				articleCount: scores.length,
			};
		});

		this.log.info(
			{
				instrument: target.instrument,
				granularity: target.granularity,
				periods: signals.length,
				withNews: signals.filter((s) => s.articleCount > 0).length,
				articles: articles.length,
				unaligned,
			},
			"News aligned",
		);

		return { signals, unaligned };
	}
}
