/**
 * ATR (Average True Range) Indicator
 *
 * Developed by J. Welles Wilder (1978)
 * Measures market volatility (non-directional).
 *
 * Formula:
 *   True Range = max(
 *     High - Low,
 *     |High - Previous Close|,
 *     |Low - Previous Close|
 *   )
 *   First ATR = mean of the first N true ranges
 *   ATR = (Previous ATR * (N - 1) + True Range) / N
 *
 * A true range needs the previous close, so the first one is at index 1
 * and the first ATR at index N.
 *
 * @see https://www.investopedia.com/terms/a/atr.asp
 */

import { mean } from "../stats.js";
import { emptySeries, type IndicatorSeries, type PriceBar } from "../types.js";

export const ATR_DEFAULTS = { period: 14 } as const;

export function calculateTrueRange(bar: PriceBar, prevClose: number): number {
	const highLow = bar.high - bar.low;
	const highPrevClose = Math.abs(bar.high - prevClose);
	const lowPrevClose = Math.abs(bar.low - prevClose);

	return Math.max(highLow, highPrevClose, lowPrevClose);
}

export function calculateATR(bars: readonly PriceBar[], period: number = ATR_DEFAULTS.period): IndicatorSeries {
	const result = emptySeries(bars.length);
	const trueRanges: number[] = [];
	let atr: number | null = null;

	for (let i = 1; i < bars.length; i++) {
		const bar = bars[i];
		const prev = bars[i - 1];
		if (!bar || !prev) {
			continue;
		}
		const tr = calculateTrueRange(bar, prev.close);

		if (atr === null) {
			trueRanges.push(tr);
			if (trueRanges.length < period) {
				continue;
			}
			atr = mean(trueRanges);
		} else {
			atr = (atr * (period - 1) + tr) / period;
		}
		result[i] = atr;
	}

	return result;
}
