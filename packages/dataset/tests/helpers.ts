/**
 * Test Helpers for Dataset Package
 */

import type { IndicatorRow, IndicatorValues, ModelReadyRow } from "@fxline/domain";

export const T0 = Date.UTC(2024, 0, 8);
export const HOUR = 3_600_000;

export function indicatorRow(timestamp: number, close: number, indicators: IndicatorValues = {}): IndicatorRow {
	return {
		instrument: "EURUSD",
		timestamp,
		open: close,
		high: close + 0.001,
		low: close - 0.001,
		close,
		volume: null,
		granularity: "1h",
		source: "finnhub",
		indicators,
	};
}

export function modelRow(timestamp: number, close: number, indicators: IndicatorValues = {}): ModelReadyRow {
	return { ...indicatorRow(timestamp, close, indicators), newsScore: 0, newsCount: 0, newsFilled: true };
}

/** Hourly rows starting at T0 + offset hours */
export function hourlyRows(closes: readonly number[], offset = 0): ModelReadyRow[] {
	return closes.map((close, i) => modelRow(T0 + (offset + i) * HOUR, close));
}
