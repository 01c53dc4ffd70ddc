/**
 * Stochastic Oscillator Indicator
 *
 * Developed by George Lane (1950s)
 * Compares closing price to price range over a period.
 *
 * Formula:
 *   %K = 100 * (Close - Lowest Low) / (Highest High - Lowest Low)
 *   %D = SMA of %K over D period
 *
 * Interpretation:
 *   - > 80: Overbought
 *   - < 20: Oversold
 *
 * @see https://www.investopedia.com/terms/s/stochasticoscillator.asp
 */

import { safeDivide } from "../stats.js";
import { calculateSMA } from "../trend/sma.js";
import { emptySeries, type PriceBar, type StochasticParams, type StochasticResult } from "../types.js";

export const STOCHASTIC_DEFAULTS: StochasticParams = {
	kPeriod: 14,
	dPeriod: 3,
};

export function calculateStochastic(
	bars: readonly PriceBar[],
	params: StochasticParams = STOCHASTIC_DEFAULTS,
): StochasticResult {
	const { kPeriod, dPeriod } = params;
	const k = emptySeries(bars.length);

	for (let i = kPeriod - 1; i < bars.length; i++) {
		let highestHigh = -Infinity;
		let lowestLow = Infinity;
		for (const bar of bars.slice(i - kPeriod + 1, i + 1)) {
			highestHigh = Math.max(highestHigh, bar.high);
			lowestLow = Math.min(lowestLow, bar.low);
		}

		const close = bars[i]?.close;
		if (close === undefined) {
			continue;
		}
		// Flat window: position in the range is undefined
		const position = safeDivide(close - lowestLow, highestHigh - lowestLow);
		k[i] = position === null ? null : position * 100;
	}

	return { k, d: calculateSMA(k, dPeriod) };
}
