/**
 * Z-Score Transform
 *
 * Distance of the close from its rolling mean, in rolling standard
 * deviations.
 *
 * Formula:
 *   Z = (X - μ) / σ
 *   where μ = rolling mean, σ = rolling sample standard deviation (n - 1)
 *
 * Use Cases:
 *   - Mean reversion (|Z| > 2 is a stretched price)
 *   - ML preprocessing
 *
 * @see https://en.wikipedia.org/wiki/Standard_score
 */

import { mean, safeDivide, standardDeviation, windowAt } from "../stats.js";
import { emptySeries, type IndicatorSeries } from "../types.js";

export const ZSCORE_DEFAULTS = { lookback: 20 } as const;

export function calculateZScore(values: readonly number[], lookback: number = ZSCORE_DEFAULTS.lookback): IndicatorSeries {
	const result = emptySeries(values.length);
	for (let i = lookback - 1; i < values.length; i++) {
		const window = windowAt(values, i, lookback);
		const value = values[i];
		if (!window || value === undefined) {
			continue;
		}
		result[i] = safeDivide(value - mean(window), standardDeviation(window, true));
	}
	return result;
}
