/**
 * Bollinger Bands Indicator
 *
 * Developed by John Bollinger (1980s)
 *
 * Formula:
 *   Middle Band = SMA(period)
 *   Upper Band  = Middle + (stdDev * σ)
 *   Lower Band  = Middle - (stdDev * σ)
 *   %B          = (Close - Lower) / (Upper - Lower)
 *
 * σ is the population standard deviation of the window.
 *
 * @see https://www.investopedia.com/terms/b/bollingerbands.asp
 */

import { mean, safeDivide, standardDeviation, windowAt } from "../stats.js";
import { type BollingerParams, type BollingerResult, emptySeries } from "../types.js";

export const BOLLINGER_DEFAULTS: BollingerParams = {
	period: 20,
	stdDev: 2,
};

export function calculateBollingerBands(
	closes: readonly number[],
	params: BollingerParams = BOLLINGER_DEFAULTS,
): BollingerResult {
	const { period, stdDev } = params;
	const result: BollingerResult = {
		upper: emptySeries(closes.length),
		middle: emptySeries(closes.length),
		lower: emptySeries(closes.length),
		percentB: emptySeries(closes.length),
	};

	for (let i = period - 1; i < closes.length; i++) {
		const window = windowAt(closes, i, period);
		const close = closes[i];
		if (!window || close === undefined) {
			continue;
		}
		const middle = mean(window);
		const offset = stdDev * standardDeviation(window, false);
		const upper = middle + offset;
		const lower = middle - offset;

		result.middle[i] = middle;
		result.upper[i] = upper;
		result.lower[i] = lower;
		result.percentB[i] = safeDivide(close - lower, upper - lower);
	}

	return result;
}
