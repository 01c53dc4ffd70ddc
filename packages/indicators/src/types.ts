/**
 * Technical Indicator Types
 *
 * Every calculator returns a series aligned index-for-index with its
 * input. `null` marks a period where the lookback is not yet satisfied or
 * the value is mathematically undefined.
 */

// ============================================
// Series Types
// ============================================

export type IndicatorSeries = (number | null)[];

/**
 * Price fields the range-based indicators read.
 */
export interface PriceBar {
	high: number;
	low: number;
	close: number;
}

// ============================================
// Parameter Types
// ============================================

export interface MACDParams {
	fastPeriod: number;
	slowPeriod: number;
	signalPeriod: number;
}

export interface BollingerParams {
	period: number;
	/** Band width in population standard deviations */
	stdDev: number;
}

export interface StochasticParams {
	kPeriod: number;
	dPeriod: number;
}

// ============================================
// Result Types
// ============================================

export interface MACDResult {
	line: IndicatorSeries;
	signal: IndicatorSeries;
	histogram: IndicatorSeries;
}

export interface BollingerResult {
	upper: IndicatorSeries;
	middle: IndicatorSeries;
	lower: IndicatorSeries;
	/** Position of the close inside the bands, 0 at lower, 1 at upper */
	percentB: IndicatorSeries;
}

export interface StochasticResult {
	k: IndicatorSeries;
	d: IndicatorSeries;
}

/**
 * Series filled with `null`, one entry per input.
 */
export function emptySeries(length: number): IndicatorSeries {
	return Array.from({ length }, () => null);
}
