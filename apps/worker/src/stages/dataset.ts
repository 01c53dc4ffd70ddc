/**
 * Dataset stage: indicator rows joined with news signals into
 * model_ready/, plus the derived training tables.
 */

import type { RequestDescriptor } from "@fxline/config";
import { buildDerivedDatasets } from "@fxline/dataset";
import { createRunReport, type NewsSignal, type RunReport } from "@fxline/domain";
import type { WorkerContext } from "../shared/context.js";

export async function runDataset(ctx: WorkerContext, request: RequestDescriptor): Promise<RunReport> {
	const startedAt = ctx.clock();
	const report = createRunReport("dataset", request);

	const indicators = await ctx.store.indicators.load(request);
	let signals: NewsSignal[] = [];
	if (await ctx.store.newsSignals.exists(request)) {
		signals = (await ctx.store.newsSignals.load(request)).signals;
	} else {
		report.notes.push("no news signals for this range; every row uses the neutral score");
	}

	const dataset = ctx.assembler.assemble(indicators, signals);
	await ctx.store.modelReady.save(request, dataset);

	const newsKey = { instrument: request.instrument, start: request.start, end: request.end };
	const articles = (await ctx.store.news.exists(newsKey)) ? (await ctx.store.news.load(newsKey)).articles : undefined;
	const tables = buildDerivedDatasets(dataset, ctx.config.dataset, { articles, logger: ctx.logger });
	for (const table of tables) {
		await ctx.store.dataset(table.name).save(request, {
			instrument: request.instrument,
			granularity: request.granularity,
			start: request.start,
			end: request.end,
			name: table.name,
			columns: table.columns,
			rows: table.rows,
		});
	}

	report.gaps = dataset.gaps;
	report.excludedPeriods = dataset.excludedInGaps + dataset.droppedIncomplete;
	report.counts = {
		rows: dataset.rows.length,
		excluded_in_gaps: dataset.excludedInGaps,
		dropped_incomplete: dataset.droppedIncomplete,
		news_filled: dataset.newsFilled,
		...Object.fromEntries(tables.map((t) => [`table:${t.name}`, t.rows.length])),
	};
	report.durationMs = ctx.clock() - startedAt;
	return report;
}
