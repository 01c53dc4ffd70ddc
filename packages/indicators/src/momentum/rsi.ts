/**
 * RSI (Relative Strength Index) Indicator
 *
 * Developed by J. Welles Wilder (1978)
 * Measures the speed and magnitude of recent price changes.
 *
 * Formula:
 *   RS = Average Gain / Average Loss
 *   RSI = 100 - (100 / (1 + RS))
 *
 * The first averages are simple means over `period` changes; later ones
 * use Wilder's smoothing:
 *   Avg = (Previous Avg * (period - 1) + Current) / period
 *
 * Interpretation:
 *   - > 70: Overbought
 *   - < 30: Oversold
 *
 * @see https://www.investopedia.com/terms/r/rsi.asp
 */

import { emptySeries, type IndicatorSeries } from "../types.js";

export const RSI_DEFAULTS = { period: 14 } as const;

/**
 * RSI from smoothed averages. Only gains gives 100; no movement at all
 * leaves RS undefined.
 */
export function rsiFromAverages(avgGain: number, avgLoss: number): number | null {
	if (avgLoss === 0) {
		return avgGain === 0 ? null : 100;
	}
	const rs = avgGain / avgLoss;
	return 100 - 100 / (1 + rs);
}

/**
 * Wilder RSI over `period` changes. The first value is at index `period`.
 */
export function calculateRSI(closes: readonly number[], period: number = RSI_DEFAULTS.period): IndicatorSeries {
	const result = emptySeries(closes.length);
	if (closes.length <= period) {
		return result;
	}

	const change = (i: number): number => (closes[i] ?? 0) - (closes[i - 1] ?? 0);

	let gainSum = 0;
	let lossSum = 0;
	for (let i = 1; i <= period; i++) {
		const c = change(i);
		gainSum += Math.max(c, 0);
		lossSum += Math.max(-c, 0);
	}
	let avgGain = gainSum / period;
	let avgLoss = lossSum / period;
	result[period] = rsiFromAverages(avgGain, avgLoss);

	for (let i = period + 1; i < closes.length; i++) {
		const c = change(i);
		avgGain = (avgGain * (period - 1) + Math.max(c, 0)) / period;
		avgLoss = (avgLoss * (period - 1) + Math.max(-c, 0)) / period;
		result[i] = rsiFromAverages(avgGain, avgLoss);
	}

	return result;
}
