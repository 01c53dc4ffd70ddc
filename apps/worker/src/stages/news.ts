/**
 * News stage: collect articles once per instrument range into raw/, then
 * align them to every candle series already acquired for that range.
 */

import type { RequestDescriptor } from "@fxline/config";
import { createRunReport, type RunReport } from "@fxline/domain";
import type { NewsCollection } from "@fxline/external-context";
import { createRetryBudget } from "@fxline/marketdata";
import type { WorkerContext } from "../shared/context.js";

/** Collections already made during this run, by instrument and range */
export type CollectionCache = Map<string, NewsCollection>;

export async function runNews(
	ctx: WorkerContext,
	request: RequestDescriptor,
	cache: CollectionCache = new Map(),
): Promise<RunReport> {
	const startedAt = ctx.clock();
	const report = createRunReport("news", request);
	const newsKey = { instrument: request.instrument, start: request.start, end: request.end };

	let collection: NewsCollection | undefined = cache.get(cacheKey(request));
	if (!collection && ctx.collector) {
		const budget = createRetryBudget(ctx.config.providers.retry, ctx.sleep);
		collection = await ctx.collector.collect(request.instrument, request.start, request.end, budget);
		await ctx.store.news.save(newsKey, collection);
		cache.set(cacheKey(request), collection);
	}
	if (!collection && (await ctx.store.news.exists(newsKey))) {
		collection = await ctx.store.news.load(newsKey);
		report.notes.push("news collection disabled; aligning previously collected articles");
	}
	if (!collection) {
		report.notes.push("news collection disabled and no collected articles found");
		report.durationMs = ctx.clock() - startedAt;
		return report;
	}

	report.malformedCount = collection.malformed;
	for (const window of collection.skippedWindows) {
		report.notes.push(`window outside news retention skipped: ${isoRange(window)}`);
	}
	for (const window of collection.failedWindows) {
		report.notes.push(`window failed: ${isoRange(window)} (${window.error})`);
	}
	report.counts = { articles: collection.articles.length, duplicates: collection.duplicates };

	if (!(await ctx.store.candles.exists(request))) {
		report.notes.push("no candle series for this range yet; run acquire before aligning news");
		report.durationMs = ctx.clock() - startedAt;
		return report;
	}

	const series = await ctx.store.candles.load(request);
	const alignment = ctx.aligner.align(series, collection.articles);
	await ctx.store.newsSignals.save(request, {
		instrument: request.instrument,
		granularity: request.granularity,
		start: request.start,
		end: request.end,
		neutralScore: ctx.aligner.neutralScore,
		unaligned: alignment.unaligned,
		signals: alignment.signals,
	});

	report.counts.signals = alignment.signals.length;
	report.counts.unaligned = alignment.unaligned;
	report.durationMs = ctx.clock() - startedAt;
	return report;
}

function cacheKey(request: RequestDescriptor): string {
	return `${request.instrument}:${request.start}:${request.end}`;
}

function isoRange(window: { start: number; end: number }): string {
	return `${new Date(window.start).toISOString()} → ${new Date(window.end).toISOString()}`;
}
