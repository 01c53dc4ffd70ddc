/**
 * Canonical article and per-period news signal records.
 */

import { z } from "zod";

export const ArticleSchema = z.object({
	/** Instrument or topic the article was collected for */
	tag: z.string().min(1),
	/** UTC epoch ms */
	publishedAt: z.number().int(),
	headline: z.string().min(1),
	body: z.string(),
	/** Publisher name */
	source: z.string().min(1),
	url: z.string().optional(),
});
export type Article = z.infer<typeof ArticleSchema>;

/**
 * Deduplication key: `(source, headline, publishedAt)`.
 */
export function articleKey(article: Pick<Article, "source" | "headline" | "publishedAt">): string {
	return JSON.stringify([article.source, article.headline, article.publishedAt]);
}

export function dedupeArticles(articles: readonly Article[]): { articles: Article[]; duplicates: number } {
	const seen = new Set<string>();
	const result: Article[] = [];
	for (const article of articles) {
		const key = articleKey(article);
		if (seen.has(key)) {
			continue;
		}
		seen.add(key);
		result.push(article);
	}
	return { articles: result, duplicates: articles.length - result.length };
}

export const NewsSignalSchema = z.object({
	instrument: z.string().min(1),
	periodStart: z.number().int(),
	score: z.number(),
	articleCount: z.number().int().nonnegative(),
});
export type NewsSignal = z.infer<typeof NewsSignalSchema>;
