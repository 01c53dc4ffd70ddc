/**
 * Artifact repositories, one per stored kind.
 */

import type { Logger } from "@fxline/logger";
import {
	CandleSeriesPayloadSchema,
	DerivedDatasetPayloadSchema,
	encodeCandleSeries,
	encodeDerivedDataset,
	encodeIndicatorSet,
	encodeModelReady,
	encodeNewsCollection,
	encodeNewsSignalSet,
	IndicatorSetPayloadSchema,
	ModelReadyPayloadSchema,
	NewsCollectionPayloadSchema,
	NewsSignalSetPayloadSchema,
} from "../schema/artifacts.js";
import { ArtifactRepository } from "./base.js";

export type CandleRepository = ArtifactRepository<typeof CandleSeriesPayloadSchema>;
export type NewsRepository = ArtifactRepository<typeof NewsCollectionPayloadSchema>;
export type IndicatorRepository = ArtifactRepository<typeof IndicatorSetPayloadSchema>;
export type NewsSignalRepository = ArtifactRepository<typeof NewsSignalSetPayloadSchema>;
export type ModelReadyRepository = ArtifactRepository<typeof ModelReadyPayloadSchema>;
export type DerivedDatasetRepository = ArtifactRepository<typeof DerivedDatasetPayloadSchema>;

export function createCandleRepository(dataDir: string, logger?: Logger): CandleRepository {
	return new ArtifactRepository(dataDir, {
		kind: "candles",
		layer: "raw",
		payload: CandleSeriesPayloadSchema,
		encode: encodeCandleSeries,
		logger,
	});
}

export function createNewsRepository(dataDir: string, logger?: Logger): NewsRepository {
	return new ArtifactRepository(dataDir, {
		kind: "news",
		layer: "raw",
		prefix: "news_",
		payload: NewsCollectionPayloadSchema,
		encode: encodeNewsCollection,
		logger,
	});
}

export function createIndicatorRepository(dataDir: string, logger?: Logger): IndicatorRepository {
	return new ArtifactRepository(dataDir, {
		kind: "indicators",
		layer: "processed",
		payload: IndicatorSetPayloadSchema,
		encode: encodeIndicatorSet,
		logger,
	});
}

export function createNewsSignalRepository(dataDir: string, logger?: Logger): NewsSignalRepository {
	return new ArtifactRepository(dataDir, {
		kind: "news_signals",
		layer: "processed",
		prefix: "signals_",
		payload: NewsSignalSetPayloadSchema,
		encode: encodeNewsSignalSet,
		logger,
	});
}

export function createModelReadyRepository(dataDir: string, logger?: Logger): ModelReadyRepository {
	return new ArtifactRepository(dataDir, {
		kind: "model_ready",
		layer: "model_ready",
		payload: ModelReadyPayloadSchema,
		encode: encodeModelReady,
		logger,
	});
}

/**
 * Derived datasets share a directory and are told apart by `name`.
 */
export function createDerivedDatasetRepository(dataDir: string, name: string, logger?: Logger): DerivedDatasetRepository {
	return new ArtifactRepository(dataDir, {
		kind: `dataset_${name}`,
		layer: "model_ready",
		prefix: `${name}_`,
		payload: DerivedDatasetPayloadSchema,
		encode: encodeDerivedDataset,
		logger,
	});
}
