/**
 * Indicators stage: raw candle series in, indicator rows out to processed/.
 */

import type { RequestDescriptor } from "@fxline/config";
import { createRunReport, type RunReport } from "@fxline/domain";
import type { WorkerContext } from "../shared/context.js";

export async function runIndicators(ctx: WorkerContext, request: RequestDescriptor): Promise<RunReport> {
	const startedAt = ctx.clock();
	const report = createRunReport("indicators", request);

	const series = await ctx.store.candles.load(request);
	const result = ctx.engine.compute(series);
	await ctx.store.indicators.save(request, {
		instrument: request.instrument,
		granularity: request.granularity,
		start: request.start,
		end: request.end,
		catalog: [...ctx.engine.names],
		rows: result.rows,
		gaps: series.gaps,
	});

	report.gaps = series.gaps;
	report.counts = { rows: result.rows.length, runs: result.runs, indicators: ctx.engine.names.length };
	report.durationMs = ctx.clock() - startedAt;
	return report;
}
