/**
 * Acquire stage: one gap-aware candle series per request, written to raw/.
 */

import type { RequestDescriptor } from "@fxline/config";
import { createRunReport, type RunReport } from "@fxline/domain";
import { createRetryBudget } from "@fxline/marketdata";
import type { WorkerContext } from "../shared/context.js";

export async function runAcquire(ctx: WorkerContext, request: RequestDescriptor): Promise<RunReport> {
	const startedAt = ctx.clock();
	const report = createRunReport("acquire", request);
	const budget = createRetryBudget(ctx.config.providers.retry, ctx.sleep);

	const result = await ctx.orchestrator.acquire(request, budget);
	const path = await ctx.store.candles.save(request, result.series);

	report.gaps = result.series.gaps;
	report.malformedCount = result.series.malformedCount;
	report.discrepancies = result.series.discrepancies;
	report.counts = { candles: result.series.candles.length, ...prefixed("source", result.series.sources) };
	if (result.failures.length > 0) {
		report.notes.push(`${result.failures.length} provider attempt(s) failed and fell back`);
	}
	if (result.retriesUsed > 0) {
		report.notes.push(`${result.retriesUsed} retr${result.retriesUsed === 1 ? "y" : "ies"} used`);
	}
	report.notes.push(`written ${path}`);
	report.durationMs = ctx.clock() - startedAt;
	return report;
}

function prefixed(prefix: string, counts: Record<string, number>): Record<string, number> {
	return Object.fromEntries(Object.entries(counts).map(([name, count]) => [`${prefix}:${name}`, count]));
}
