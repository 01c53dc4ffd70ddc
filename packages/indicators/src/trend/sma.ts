/**
 * SMA (Simple Moving Average) Indicator
 *
 * Arithmetic mean of closing prices over N periods.
 *
 * Formula:
 *   SMA = (P1 + P2 + ... + Pn) / n
 *
 * @see https://www.investopedia.com/terms/s/sma.asp
 */

import { mean, windowAt } from "../stats.js";
import { emptySeries, type IndicatorSeries } from "../types.js";

export const SMA_DEFAULTS = { period: 20 } as const;

/**
 * Rolling mean. A window that contains a null yields null.
 */
export function calculateSMA(values: readonly (number | null)[], period: number = SMA_DEFAULTS.period): IndicatorSeries {
	const result = emptySeries(values.length);
	for (let i = period - 1; i < values.length; i++) {
		const window = windowAt(values, i, period);
		result[i] = window ? mean(window) : null;
	}
	return result;
}
