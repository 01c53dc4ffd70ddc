/**
 * Derived training tables built from one model-ready dataset.
 */

import type { DatasetConfig } from "@fxline/config";
import type { Article } from "@fxline/domain";
import type { SentimentScorer } from "@fxline/external-context";
import type { Logger } from "@fxline/logger";
import { buildMeanReversionDataset } from "./derived/meanReversion.js";
import { buildSentimentDataset } from "./derived/sentiment.js";
import { buildTrendDataset } from "./derived/trend.js";
import { resolveFeatures } from "./features.js";
import { log as defaultLog } from "./logger.js";
import type { AssembledDataset, DerivedTable } from "./types.js";

export interface DerivedBuildOptions {
	/** Articles for the sentiment table; absent skips it */
	articles?: readonly Article[];
	scorer?: SentimentScorer;
	logger?: Logger;
}

/**
 * @throws ConfigError when a configured feature is unknown
 */
export function buildDerivedDatasets(
	dataset: AssembledDataset,
	config: DatasetConfig,
	options: DerivedBuildOptions = {},
): DerivedTable[] {
	const logger = options.logger ?? defaultLog;
	const trendFeatures = resolveFeatures(config.trend_features, "dataset.trend_features");
	const meanReversionFeatures = resolveFeatures(config.mean_reversion_features, "dataset.mean_reversion_features");

	const tables = [
		buildTrendDataset(dataset.rows, dataset.gaps, {
			sequenceLength: config.sequence_length,
			horizon: config.forecast_horizon,
			features: trendFeatures,
		}),
		buildMeanReversionDataset(dataset.rows, dataset.gaps, {
			horizon: config.mean_reversion_horizon,
			features: meanReversionFeatures,
		}),
	];
	if (options.articles) {
		tables.push(buildSentimentDataset(options.articles, dataset.rows, dataset.gaps, { scorer: options.scorer }));
	}

	logger.info(
		{
			instrument: dataset.instrument,
			granularity: dataset.granularity,
			tables: Object.fromEntries(tables.map((t) => [t.name, t.rows.length])),
		},
		"Derived datasets built",
	);
	return tables;
}
