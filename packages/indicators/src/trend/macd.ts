/**
 * MACD (Moving Average Convergence Divergence)
 *
 * Formula:
 *   MACD Line = EMA(fast) - EMA(slow)
 *   Signal    = EMA(signal) of the MACD line
 *   Histogram = MACD Line - Signal
 *
 * Interpretation:
 *   - Line crossing above signal: bullish momentum
 *   - Histogram shrinking: momentum fading
 *
 * @see https://www.investopedia.com/terms/m/macd.asp
 */

import type { IndicatorSeries, MACDParams, MACDResult } from "../types.js";
import { calculateEMA, EMA_PERIODS } from "./ema.js";

export const MACD_DEFAULTS: MACDParams = {
	fastPeriod: EMA_PERIODS.MACD_FAST,
	slowPeriod: EMA_PERIODS.MACD_SLOW,
	signalPeriod: EMA_PERIODS.MACD_SIGNAL,
};

export function calculateMACD(closes: readonly number[], params: MACDParams = MACD_DEFAULTS): MACDResult {
	const fast = calculateEMA(closes, params.fastPeriod);
	const slow = calculateEMA(closes, params.slowPeriod);

	const line: IndicatorSeries = closes.map((_, i) => {
		const f = fast[i];
		const s = slow[i];
		return f == null || s == null ? null : f - s;
	});
	const signal = calculateEMA(line, params.signalPeriod);
	const histogram: IndicatorSeries = line.map((value, i) => {
		const sig = signal[i];
		return value === null || sig == null ? null : value - sig;
	});

	return { line, signal, histogram };
}

/**
 * Index + 1 of the first defined signal value.
 */
export function macdSignalLookback(params: MACDParams = MACD_DEFAULTS): number {
	return Math.max(params.fastPeriod, params.slowPeriod) + params.signalPeriod - 1;
}
