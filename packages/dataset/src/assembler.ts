/**
 * Dataset Assembler
 *
 * Joins indicator rows with news signals on the exact period key into the
 * model-ready table. Rows inside a recorded gap never appear; the gap
 * periods are counted instead.
 */

import type { DatasetConfig, MissingIndicatorPolicy, NewsConfig } from "@fxline/config";
import { gapPeriodsTotal, isInGap, type ModelReadyRow, type NewsSignal } from "@fxline/domain";
import type { Logger } from "@fxline/logger";
import { log as defaultLog } from "./logger.js";
import type { AssembledDataset, IndicatorSet } from "./types.js";

export interface DatasetAssemblerOptions {
	/** Score used for periods without a signal */
	neutralScore?: number;
	missingIndicators?: MissingIndicatorPolicy;
	logger?: Logger;
}

export class DatasetAssembler {
	private readonly neutralScore: number;
	private readonly policy: MissingIndicatorPolicy;
	private readonly log: Logger;

	constructor(options: DatasetAssemblerOptions = {}) {
		this.neutralScore = options.neutralScore ?? 0;
		this.policy = options.missingIndicators ?? "keep";
		this.log = options.logger ?? defaultLog;
	}

	/**
	 * @throws RangeError on duplicate or out-of-order periods, or on signals for another instrument
	 */
	assemble(indicators: IndicatorSet, signals: readonly NewsSignal[] = []): AssembledDataset {
		const byPeriod = indexSignals(indicators.instrument, signals);
		const rows: ModelReadyRow[] = [];
		let droppedIncomplete = 0;
		let newsFilled = 0;
		let previous: number | undefined;

		for (const row of indicators.rows) {
			if (previous !== undefined && row.timestamp <= previous) {
				const kind = row.timestamp === previous ? "Duplicate period" : "Out-of-order period";
				throw new RangeError(`${kind} ${new Date(row.timestamp).toISOString()} in ${indicators.instrument}`);
			}
			previous = row.timestamp;

			if (isInGap(row.timestamp, indicators.gaps)) {
				continue;
			}
			if (this.policy === "drop" && Object.values(row.indicators).some((value) => value === null)) {
				droppedIncomplete++;
				continue;
			}

			const signal = byPeriod.get(row.timestamp);
			if (!signal) {
				newsFilled++;
			}
			rows.push({
				...row,
				newsScore: signal?.score ?? this.neutralScore,
				newsCount: signal?.articleCount ?? 0,
				newsFilled: !signal,
			});
		}

		const excludedInGaps = gapPeriodsTotal(indicators.gaps);
		this.log.info(
			{
				instrument: indicators.instrument,
				granularity: indicators.granularity,
				rows: rows.length,
				excludedInGaps,
				droppedIncomplete,
				newsFilled,
			},
			"Dataset assembled",
		);

		return {
			instrument: indicators.instrument,
			granularity: indicators.granularity,
			start: indicators.start,
			end: indicators.end,
			rows,
			gaps: indicators.gaps,
			excludedInGaps,
			droppedIncomplete,
			newsFilled,
		};
	}
}

function indexSignals(instrument: string, signals: readonly NewsSignal[]): Map<number, NewsSignal> {
	const byPeriod = new Map<number, NewsSignal>();
	for (const signal of signals) {
		if (signal.instrument !== instrument) {
			throw new RangeError(`News signal for ${signal.instrument} cannot join ${instrument}`);
		}
		if (byPeriod.has(signal.periodStart)) {
			throw new RangeError(`Duplicate news signal for ${new Date(signal.periodStart).toISOString()}`);
		}
		byPeriod.set(signal.periodStart, signal);
	}
	return byPeriod;
}

export function createDatasetAssemblerFromConfig(
	dataset: DatasetConfig,
	news: NewsConfig,
	logger?: Logger,
): DatasetAssembler {
	return new DatasetAssembler({
		neutralScore: news.neutral_score,
		missingIndicators: dataset.missing_indicators,
		logger,
	});
}
