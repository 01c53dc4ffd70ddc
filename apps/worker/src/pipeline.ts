/**
 * Pipeline Runner
 *
 * Runs one stage, or every stage in order, over the resolved request
 * descriptors. Each stage reads the previous stage's artifact, so any
 * stage can be re-run on its own.
 */

import { randomUUID } from "node:crypto";
import type { RequestDescriptor } from "@fxline/config";
import { errorMessage, type RunReport, type StageName } from "@fxline/domain";
import { withRunContext } from "@fxline/logger";
import type { WorkerContext } from "./shared/context.js";
import { type CollectionCache, runAcquire, runDataset, runIndicators, runNews } from "./stages/index.js";

export type PipelineCommand = StageName | "all";

export const STAGES: readonly StageName[] = ["acquire", "news", "indicators", "dataset"];

export const COMMANDS: readonly PipelineCommand[] = [...STAGES, "all"];

export function isPipelineCommand(value: string): value is PipelineCommand {
	return COMMANDS.some((command) => command === value);
}

export interface PipelineOptions {
	/** Called with each report as soon as it is ready */
	onReport?: (report: RunReport) => void;
	/** Attached to every log line of this run; generated when absent */
	runId?: string;
}

/**
 * @throws the first fatal error; stages after it are not run
 */
export async function runPipeline(
	ctx: WorkerContext,
	command: PipelineCommand,
	requests: readonly RequestDescriptor[],
	options: PipelineOptions = {},
): Promise<RunReport[]> {
	const stages = command === "all" ? STAGES : [command];
	const reports: RunReport[] = [];
	const newsCache: CollectionCache = new Map();
	const runId = options.runId ?? randomUUID();

	for (const stage of stages) {
		withRunContext(ctx.logger, { runId, stage }).info({ requests: requests.length }, "Stage starting");
		for (const request of requests) {
			const log = withRunContext(ctx.logger, {
				runId,
				stage,
				instrument: request.instrument,
				granularity: request.granularity,
			});
			let report: RunReport;
			try {
				report = await runStage(ctx, stage, request, newsCache);
			} catch (error) {
				log.error({ error: errorMessage(error) }, "Stage failed");
				throw error;
			}
			log.info(
				{ gaps: report.gaps.length, excluded: report.excludedPeriods, durationMs: report.durationMs },
				"Stage complete",
			);
			reports.push(report);
			options.onReport?.(report);
		}
	}
	return reports;
}

function runStage(
	ctx: WorkerContext,
	stage: StageName,
	request: RequestDescriptor,
	newsCache: CollectionCache,
): Promise<RunReport> {
	switch (stage) {
		case "acquire":
			return runAcquire(ctx, request);
		case "news":
			return runNews(ctx, request, newsCache);
		case "indicators":
			return runIndicators(ctx, request);
		case "dataset":
			return runDataset(ctx, request);
	}
}
