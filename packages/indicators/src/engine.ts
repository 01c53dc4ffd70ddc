/**
 * Indicator Engine
 *
 * Turns a canonical candle series into indicator rows. Indicators are
 * computed per gap-free run: a recorded gap between two consecutive
 * candles starts a new run and every lookback starts over, so no value
 * averages across missing periods. A value at index i of a run only reads
 * indices 0..i of that run.
 */

import type { IndicatorsConfig } from "@fxline/config";
import {
	type Candle,
	type CandleSeries,
	findOrderViolation,
	type Gap,
	hasGapBetween,
	type IndicatorRow,
	type IndicatorValues,
} from "@fxline/domain";
import type { Logger } from "@fxline/logger";
import { INDICATOR_GROUPS, type IndicatorGroup, resolveCatalog } from "./catalog.js";
import { log as defaultLog } from "./logger.js";

export type IndicatorInput = Pick<CandleSeries, "instrument" | "granularity" | "candles" | "gaps">;

export interface IndicatorResult {
	rows: IndicatorRow[];
	/** Gap-free runs the series was split into */
	runs: number;
}

export interface IndicatorEngineOptions {
	/** Subset of output names; empty or absent means the full catalog */
	catalog?: readonly string[];
	logger?: Logger;
}

/**
 * Split candles wherever a recorded gap starts between two neighbours.
 */
export function splitRuns<T extends Pick<Candle, "timestamp">>(candles: readonly T[], gaps: readonly Gap[]): T[][] {
	const runs: T[][] = [];
	let current: T[] = [];
	for (const candle of candles) {
		const previous = current[current.length - 1];
		if (previous && hasGapBetween(previous.timestamp, candle.timestamp, gaps)) {
			runs.push(current);
			current = [];
		}
		current.push(candle);
	}
	if (current.length > 0) {
		runs.push(current);
	}
	return runs;
}

export class IndicatorEngine {
	readonly names: readonly string[];
	private readonly groups: readonly IndicatorGroup[];
	private readonly log: Logger;

	constructor(options: IndicatorEngineOptions = {}) {
		this.names = resolveCatalog(options.catalog);
		const selected = new Set(this.names);
		this.groups = INDICATOR_GROUPS.filter((g) => Object.keys(g.outputs).some((name) => selected.has(name)));
		this.log = options.logger ?? defaultLog;
	}

	compute(series: IndicatorInput): IndicatorResult {
		const violation = findOrderViolation(series.candles);
		if (violation >= 0) {
			throw new RangeError(`Candles are not strictly increasing at index ${violation}`);
		}

		const runs = splitRuns(series.candles, series.gaps);
		const rows = runs.flatMap((run) => this.computeRun(run));

		this.log.info(
			{
				instrument: series.instrument,
				granularity: series.granularity,
				rows: rows.length,
				runs: runs.length,
				indicators: this.names.length,
			},
			"Indicators computed",
		);

		return { rows, runs: runs.length };
	}

	private computeRun(run: readonly Candle[]): IndicatorRow[] {
		const input = { bars: run, closes: run.map((c) => c.close) };
		const columns = new Map<string, (number | null)[]>();
		for (const g of this.groups) {
			for (const [name, values] of Object.entries(g.compute(input))) {
				columns.set(name, values);
			}
		}

		return run.map((candle, i) => {
			const indicators: IndicatorValues = {};
			for (const name of this.names) {
				indicators[name] = columns.get(name)?.[i] ?? null;
			}
			return { ...candle, indicators };
		});
	}
}

export function createIndicatorEngine(config: IndicatorsConfig, logger?: Logger): IndicatorEngine {
	return new IndicatorEngine({ catalog: config.catalog, logger });
}

/**
 * Compute indicator rows with a throwaway engine.
 */
export function computeIndicators(series: IndicatorInput, catalog?: readonly string[]): IndicatorRow[] {
	return new IndicatorEngine({ catalog }).compute(series).rows;
}
