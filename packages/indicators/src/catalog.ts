/**
 * Indicator Catalog
 *
 * Every output name the engine can produce, with its lookback L: the
 * position in a gap-free run at which the value is first defined. Outputs
 * computed together (MACD, Bollinger, Stochastic) share one group.
 */

import { ConfigError } from "@fxline/domain";
import { calculateRSI } from "./momentum/rsi.js";
import { calculateStochastic } from "./momentum/stochastic.js";
import { calculateReturns } from "./transforms/returns.js";
import { calculateZScore } from "./transforms/zscore.js";
import { calculateEMA } from "./trend/ema.js";
import { calculateMACD, MACD_DEFAULTS, macdSignalLookback } from "./trend/macd.js";
import { calculateSMA } from "./trend/sma.js";
import type { IndicatorSeries, PriceBar } from "./types.js";
import { calculateATR } from "./volatility/atr.js";
import { calculateBollingerBands } from "./volatility/bollinger.js";

// ============================================
// Types
// ============================================

export interface RunInput {
	bars: readonly PriceBar[];
	closes: readonly number[];
}

export interface IndicatorGroup {
	id: string;
	/** Output name → lookback */
	outputs: Readonly<Record<string, number>>;
	compute(run: RunInput): Record<string, IndicatorSeries>;
}

function group<K extends string>(
	id: string,
	outputs: Record<K, number>,
	compute: (run: RunInput) => Record<K, IndicatorSeries>,
): IndicatorGroup {
	return { id, outputs, compute };
}

// ============================================
// Catalog
// ============================================

export const INDICATOR_GROUPS: readonly IndicatorGroup[] = [
	group("sma", { sma_20: 20 }, ({ closes }) => ({ sma_20: calculateSMA(closes, 20) })),
	group("ema", { ema_12: 12, ema_26: 26 }, ({ closes }) => ({
		ema_12: calculateEMA(closes, 12),
		ema_26: calculateEMA(closes, 26),
	})),
	group("rsi", { rsi_14: 15 }, ({ closes }) => ({ rsi_14: calculateRSI(closes, 14) })),
	group(
		"macd",
		{
			macd_line: MACD_DEFAULTS.slowPeriod,
			macd_signal: macdSignalLookback(),
			macd_histogram: macdSignalLookback(),
		},
		({ closes }) => {
			const macd = calculateMACD(closes);
			return { macd_line: macd.line, macd_signal: macd.signal, macd_histogram: macd.histogram };
		},
	),
	group("bollinger", { bb_upper: 20, bb_middle: 20, bb_lower: 20, bb_percent_b: 20 }, ({ closes }) => {
		const bands = calculateBollingerBands(closes);
		return { bb_upper: bands.upper, bb_middle: bands.middle, bb_lower: bands.lower, bb_percent_b: bands.percentB };
	}),
	group("atr", { atr_14: 15 }, ({ bars }) => ({ atr_14: calculateATR(bars, 14) })),
	group("stochastic", { stoch_k: 14, stoch_d: 16 }, ({ bars }) => {
		const stochastic = calculateStochastic(bars);
		return { stoch_k: stochastic.k, stoch_d: stochastic.d };
	}),
	group("zscore", { z_score_20: 20 }, ({ closes }) => ({ z_score_20: calculateZScore(closes, 20) })),
	group("returns", { return_1: 2, return_5: 6 }, ({ closes }) => ({
		return_1: calculateReturns(closes, 1),
		return_5: calculateReturns(closes, 5),
	})),
];

export const INDICATOR_LOOKBACKS: Readonly<Record<string, number>> = Object.fromEntries(
	INDICATOR_GROUPS.flatMap((g) => Object.entries(g.outputs)),
);

/** Catalog order */
export const INDICATOR_NAMES: readonly string[] = Object.keys(INDICATOR_LOOKBACKS);

/**
 * Validate a configured subset. An empty selection means the whole
 * catalog; the result is always in catalog order.
 *
 * @throws ConfigError listing every unknown name
 */
export function resolveCatalog(selection: readonly string[] = []): string[] {
	if (selection.length === 0) {
		return [...INDICATOR_NAMES];
	}
	const unknown = selection.filter((name) => !Object.hasOwn(INDICATOR_LOOKBACKS, name));
	if (unknown.length > 0) {
		const issues = unknown.map((name) => `indicators.catalog: unknown indicator "${name}"`);
		throw new ConfigError(`Unknown indicators: ${unknown.join(", ")}`, issues);
	}
	const selected = new Set(selection);
	return INDICATOR_NAMES.filter((name) => selected.has(name));
}
