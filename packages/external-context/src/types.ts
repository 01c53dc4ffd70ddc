/**
 * External Context Types
 *
 * Shared types for news collection and alignment.
 */

import type { Article } from "@fxline/domain";
import type { ProviderAdapter } from "@fxline/marketdata";

// ============================================
// Provider Contract
// ============================================

/**
 * One search over `[start, end)` for the articles about `tag`.
 */
export interface ArticleRequest {
	tag: string;
	query: string;
	start: number;
	end: number;
}

export interface ArticleCapabilities {
	/** Days of history the provider searches */
	retentionDays: number;
	/** Largest page the provider returns */
	maxPageSize: number;
}

export interface ArticleProvider extends ProviderAdapter<ArticleRequest, Article, ArticleCapabilities> {
	readonly kind: "articles";
}

// ============================================
// Collection Results
// ============================================

export interface NewsWindow {
	start: number;
	end: number;
}

export interface FailedWindow extends NewsWindow {
	error: string;
}

export interface NewsCollection {
	instrument: string;
	start: number;
	end: number;
	/** Deduplicated, oldest first */
	articles: Article[];
	/** Windows older than the provider's retention */
	skippedWindows: NewsWindow[];
	failedWindows: FailedWindow[];
	duplicates: number;
	malformed: number;
}

// ============================================
// Alignment Results
// ============================================

/**
 * Maps an article to a sentiment score in [-1, 1].
 */
export type SentimentScorer = (article: Pick<Article, "headline" | "body">) => number;
