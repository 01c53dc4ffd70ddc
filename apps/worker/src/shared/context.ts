/**
 * Worker Context
 *
 * Everything a stage needs for one run, built once from configuration.
 */

import type { Credentials, PipelineConfig } from "@fxline/config";
import { createDatasetAssemblerFromConfig, type DatasetAssembler } from "@fxline/dataset";
import { type Clock, type Sleeper, systemClock } from "@fxline/domain";
import {
	createNewsAlignerFromConfig,
	createNewsCollectorFromConfig,
	type NewsAligner,
	type NewsCollector,
} from "@fxline/external-context";
import { createIndicatorEngine, type IndicatorEngine } from "@fxline/indicators";
import type { Logger } from "@fxline/logger";
import { createOrchestratorFromConfig, type SourceOrchestrator } from "@fxline/marketdata";
import { type ArtifactStore, createArtifactStore } from "@fxline/storage";
import { log } from "./logger.js";

export interface WorkerContext {
	config: PipelineConfig;
	store: ArtifactStore;
	orchestrator: SourceOrchestrator;
	/** Null when news is disabled or no key is configured */
	collector: NewsCollector | null;
	aligner: NewsAligner;
	engine: IndicatorEngine;
	assembler: DatasetAssembler;
	clock: Clock;
	logger: Logger;
	/** Backoff sleeper for retry budgets */
	sleep?: Sleeper;
}

export interface ContextOptions {
	config: PipelineConfig;
	credentials: Credentials;
	clock?: Clock;
	logger?: Logger;
}

export function createWorkerContext(options: ContextOptions): WorkerContext {
	const { config, credentials } = options;
	const clock = options.clock ?? systemClock;
	const logger = options.logger ?? log;
	const factoryOptions = { clock, timeoutMs: config.providers.timeout_ms };

	return {
		config,
		store: createArtifactStore(config.general.data_dir, logger),
		orchestrator: createOrchestratorFromConfig(config, credentials, { clock }),
		collector: createNewsCollectorFromConfig(config.news, credentials, factoryOptions),
		aligner: createNewsAlignerFromConfig(config.news),
		engine: createIndicatorEngine(config.indicators, logger),
		assembler: createDatasetAssemblerFromConfig(config.dataset, config.news, logger),
		clock,
		logger,
	};
}
