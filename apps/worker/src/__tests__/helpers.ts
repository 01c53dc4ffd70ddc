/**
 * Test Helpers for the Worker
 *
 * In-process providers and a context wired from them.
 */

import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type PipelineConfig, validateConfigOrThrow } from "@fxline/config";
import { DatasetAssembler } from "@fxline/dataset";
import {
	type Article,
	ArticleSchema,
	type Candle,
	CandleSchema,
	type Clock,
	expectedPeriods,
	fixedClock,
} from "@fxline/domain";
import {
	type ArticleCapabilities,
	type ArticleProvider,
	type ArticleRequest,
	NewsAligner,
	NewsCollector,
} from "@fxline/external-context";
import { IndicatorEngine } from "@fxline/indicators";
import {
	type CandleProvider,
	type CandleRequest,
	type NormalizeResult,
	type ProviderCapabilities,
	SourceOrchestrator,
} from "@fxline/marketdata";
import { createArtifactStore } from "@fxline/storage";
import type { WorkerContext } from "../shared/context.js";
import { log } from "../shared/logger.js";

export const HOUR = 3_600_000;
/** Monday 2024-01-08 00:00 UTC */
export const T0 = Date.UTC(2024, 0, 8);
export const NOW = Date.UTC(2024, 0, 13);

export async function tempDataDir(): Promise<string> {
	return mkdtemp(join(tmpdir(), "fxline-worker-"));
}

export function testConfig(dataDir: string): PipelineConfig {
	return validateConfigOrThrow({
		general: {
			instruments: ["EURUSD"],
			start_date: "2024-01-08",
			end_date: "2024-01-10",
			granularities: ["1h"],
			data_dir: dataDir,
		},
		dataset: {
			sequence_length: 3,
			forecast_horizon: 1,
			mean_reversion_horizon: 5,
			trend_features: ["close", "return_1"],
			mean_reversion_features: ["close", "return_5"],
		},
	});
}

/**
 * Serves one candle per expected period, minus the periods in `missing`,
 * or throws `error` when given.
 */
export class StubCandleProvider implements CandleProvider {
	readonly id = "stub";
	readonly kind = "candles";
	readonly capabilities: ProviderCapabilities = { granularities: ["1h", "1d"], retentionDays: {}, maxSpanMs: {} };

	constructor(private readonly options: { missing?: { start: number; end: number }; error?: Error } = {}) {}

	async fetch(request: CandleRequest): Promise<unknown> {
		if (this.options.error) {
			throw this.options.error;
		}
		const missing = this.options.missing;
		return expectedPeriods(request.start, request.end, request.granularity, "fx")
			.filter((t) => !missing || t < missing.start || t >= missing.end)
			.map((timestamp, i): Candle => {
				const close = 1.1 + ((timestamp - T0) / HOUR) * 0.0001 + (i % 2) * 0.00005;
				return {
					instrument: request.instrument,
					timestamp,
					open: close,
					high: close + 0.0005,
					low: close - 0.0005,
					close,
					volume: null,
					granularity: request.granularity,
					source: this.id,
				};
			});
	}

	normalize(raw: unknown): NormalizeResult<Candle> {
		return { records: CandleSchema.array().parse(raw), malformed: 0 };
	}
}

export class StubArticleProvider implements ArticleProvider {
	readonly id = "stub-news";
	readonly kind = "articles";
	readonly capabilities: ArticleCapabilities = { retentionDays: 30, maxPageSize: 100 };

	constructor(private readonly articles: Article[]) {}

	async fetch(request: ArticleRequest): Promise<unknown> {
		return this.articles.filter((a) => a.publishedAt >= request.start && a.publishedAt < request.end);
	}

	normalize(raw: unknown): NormalizeResult<Article> {
		return { records: ArticleSchema.array().parse(raw), malformed: 0 };
	}
}

export function article(publishedAt: number, headline: string): Article {
	return { tag: "EURUSD", publishedAt, headline, body: "", source: "Wire" };
}

export function stubContext(
	config: PipelineConfig,
	providers: { candles: CandleProvider; news?: ArticleProvider },
	clock: Clock = fixedClock(NOW),
): WorkerContext {
	return {
		config,
		store: createArtifactStore(config.general.data_dir),
		orchestrator: new SourceOrchestrator({ providers: [providers.candles], clock }),
		collector: providers.news ? new NewsCollector({ provider: providers.news, clock }) : null,
		aligner: new NewsAligner({ neutralScore: config.news.neutral_score }),
		engine: new IndicatorEngine({ catalog: config.indicators.catalog }),
		assembler: new DatasetAssembler({
			neutralScore: config.news.neutral_score,
			missingIndicators: config.dataset.missing_indicators,
		}),
		clock,
		logger: log,
		sleep: async () => {},
	};
}
