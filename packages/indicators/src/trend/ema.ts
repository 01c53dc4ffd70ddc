/**
 * EMA (Exponential Moving Average) Indicator
 *
 * Weighted moving average giving more weight to recent prices.
 *
 * Formula:
 *   Multiplier = 2 / (period + 1)
 *   EMA = (Close - Previous EMA) * Multiplier + Previous EMA
 *   First EMA = SMA of first N periods
 *
 * @see https://www.investopedia.com/terms/e/ema.asp
 */

import { mean } from "../stats.js";
import type { IndicatorSeries } from "../types.js";

export const EMA_PERIODS = {
	MACD_FAST: 12,
	MACD_SLOW: 26,
	MACD_SIGNAL: 9,
} as const;

/**
 * Calculate EMA multiplier (smoothing factor).
 */
export function calculateMultiplier(period: number): number {
	return 2 / (period + 1);
}

/**
 * EMA of a series, seeded with the SMA of its first `period` values.
 *
 * Leading nulls are skipped; a null after that restarts the seed, so the
 * average never spans a hole in its input.
 */
export function calculateEMA(values: readonly (number | null)[], period: number): IndicatorSeries {
	const multiplier = calculateMultiplier(period);
	const result: IndicatorSeries = [];
	let seed: number[] = [];
	let ema: number | null = null;

	for (const value of values) {
		if (value === null) {
			seed = [];
			ema = null;
			result.push(null);
			continue;
		}

		if (ema === null) {
			seed.push(value);
			if (seed.length < period) {
				result.push(null);
				continue;
			}
			ema = mean(seed);
		} else {
			ema = (value - ema) * multiplier + ema;
		}
		result.push(ema);
	}

	return result;
}
