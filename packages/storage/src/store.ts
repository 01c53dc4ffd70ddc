/**
 * Artifact Store
 *
 * All repositories rooted at one data directory:
 *
 * - raw/: candle series and collected news
 * - processed/: indicator sets and news signals
 * - model_ready/: joined rows and derived datasets
 */

import type { Logger } from "@fxline/logger";
import {
	type CandleRepository,
	createCandleRepository,
	createDerivedDatasetRepository,
	createIndicatorRepository,
	createModelReadyRepository,
	createNewsRepository,
	createNewsSignalRepository,
	type DerivedDatasetRepository,
	type IndicatorRepository,
	type ModelReadyRepository,
	type NewsRepository,
	type NewsSignalRepository,
} from "./repositories/artifacts.js";

export interface ArtifactStore {
	readonly dataDir: string;
	readonly candles: CandleRepository;
	readonly news: NewsRepository;
	readonly indicators: IndicatorRepository;
	readonly newsSignals: NewsSignalRepository;
	readonly modelReady: ModelReadyRepository;
	dataset(name: string): DerivedDatasetRepository;
}

export function createArtifactStore(dataDir: string, logger?: Logger): ArtifactStore {
	const datasets = new Map<string, DerivedDatasetRepository>();
	return {
		dataDir,
		candles: createCandleRepository(dataDir, logger),
		news: createNewsRepository(dataDir, logger),
		indicators: createIndicatorRepository(dataDir, logger),
		newsSignals: createNewsSignalRepository(dataDir, logger),
		modelReady: createModelReadyRepository(dataDir, logger),
		dataset(name) {
			let repository = datasets.get(name);
			if (!repository) {
				repository = createDerivedDatasetRepository(dataDir, name, logger);
				datasets.set(name, repository);
			}
			return repository;
		},
	};
}
