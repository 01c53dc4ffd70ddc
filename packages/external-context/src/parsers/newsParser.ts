/**
 * News Parser
 *
 * Turns provider article payloads into canonical Article records. Rows
 * without a headline or a parseable publication time are dropped and
 * counted as malformed.
 */

import type { Article } from "@fxline/domain";
import type { NormalizeResult } from "@fxline/marketdata";
import { z } from "zod";

// ============================================
// Raw Article Schema
// ============================================

export const NewsApiArticleSchema = z.object({
	source: z
		.object({
			id: z.string().nullable().optional(),
			name: z.string().nullable().optional(),
		})
		.nullable()
		.optional(),
	author: z.string().nullable().optional(),
	title: z.string().nullable().optional(),
	description: z.string().nullable().optional(),
	url: z.string().nullable().optional(),
	publishedAt: z.string().nullable().optional(),
	content: z.string().nullable().optional(),
});
export type NewsApiArticle = z.infer<typeof NewsApiArticleSchema>;

/**
 * News parser configuration
 */
export interface NewsParserConfig {
	/** Maximum body length before truncation (default: 10000) */
	maxContentLength?: number;
}

const DEFAULT_CONFIG: Required<NewsParserConfig> = {
	maxContentLength: 10000,
};

/** Placeholder title NewsAPI serves for retracted articles */
const REMOVED_MARKER = "[Removed]";

// ============================================
// Parsing
// ============================================

/**
 * Parse raw articles. Entries that fail the schema count as malformed.
 */
export function parseNewsArticles(
	raw: readonly unknown[],
	tag: string,
	config: NewsParserConfig = {},
): NormalizeResult<Article> {
	const cfg = { ...DEFAULT_CONFIG, ...config };
	const records: Article[] = [];
	let malformed = 0;

	for (const item of raw) {
		const parsed = NewsApiArticleSchema.safeParse(item);
		const article = parsed.success ? parseNewsArticle(parsed.data, tag, cfg) : null;
		if (article) {
			records.push(article);
		} else {
			malformed++;
		}
	}

	return { records, malformed };
}

/**
 * Parse a single article, or null when it cannot be placed on the timeline
 * or has no headline.
 */
export function parseNewsArticle(
	article: NewsApiArticle,
	tag: string,
	config: Required<NewsParserConfig> = DEFAULT_CONFIG,
): Article | null {
	const headline = cleanText(article.title ?? "");
	if (!headline || headline === REMOVED_MARKER) {
		return null;
	}

	const publishedAt = parseDate(article.publishedAt);
	if (publishedAt === null) {
		return null;
	}

	let body = cleanText(stripTruncationMarker(article.description || article.content || ""));
	if (body.length > config.maxContentLength) {
		body = `${body.slice(0, config.maxContentLength)}...`;
	}

	const result: Article = {
		tag,
		publishedAt,
		headline,
		body,
		source: cleanText(article.source?.name ?? "") || "unknown",
	};
	if (article.url) {
		result.url = article.url;
	}
	return result;
}

/**
 * Parse an ISO timestamp to UTC epoch ms, or null.
 */
function parseDate(value: string | null | undefined): number | null {
	if (!value) {
		return null;
	}
	const ts = Date.parse(value);
	return Number.isNaN(ts) ? null : ts;
}

/**
 * Drop the "… [+1234 chars]" suffix NewsAPI appends to truncated content.
 */
export function stripTruncationMarker(text: string): string {
	return text.replace(/\s*(…|\.\.\.)?\s*\[\+\d+ chars\]\s*$/, "");
}

/**
 * Clean text by removing extra whitespace and HTML entities
 */
export function cleanText(text: string): string {
	return text
		.replace(/&nbsp;/g, " ")
		.replace(/&amp;/g, "&")
		.replace(/&lt;/g, "<")
		.replace(/&gt;/g, ">")
		.replace(/&quot;/g, '"')
		.replace(/&#39;/g, "'")
		.replace(/<[^>]*>/g, "") // Strip HTML tags
		.replace(/\s+/g, " ") // Normalize whitespace
		.trim();
}
