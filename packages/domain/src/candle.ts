/**
 * Canonical candle and series records.
 *
 * Candles are produced by provider adapters, merged by the source
 * orchestrator and read-only afterwards.
 */

import { z } from "zod";
import { type Granularity, GranularitySchema, isAligned } from "./granularity.js";

// ============================================
// Candle
// ============================================

export const CandleSchema = z.object({
	instrument: z.string().min(1),
	/** Period start, UTC epoch ms */
	timestamp: z.number().int(),
	open: z.number(),
	high: z.number(),
	low: z.number(),
	close: z.number(),
	/** FX providers often report no volume */
	volume: z.number().nullable(),
	granularity: GranularitySchema,
	/** Provider id */
	source: z.string().min(1),
});
export type Candle = z.infer<typeof CandleSchema>;

/**
 * Check the candle invariants. Returns a description of the first
 * violation, or null when the candle is well-formed.
 */
export function validateCandle(candle: Candle): string | null {
	const prices = [candle.open, candle.high, candle.low, candle.close];
	if (prices.some((p) => !Number.isFinite(p) || p <= 0)) {
		return "non-positive or non-finite price";
	}
	if (candle.volume !== null && (!Number.isFinite(candle.volume) || candle.volume < 0)) {
		return "invalid volume";
	}
	if (!Number.isInteger(candle.timestamp) || !isAligned(candle.timestamp, candle.granularity)) {
		return "timestamp not aligned to granularity";
	}
	const bodyHigh = Math.max(candle.open, candle.close);
	const bodyLow = Math.min(candle.open, candle.close);
	if (candle.high < bodyHigh || candle.low > bodyLow) {
		return "high/low do not bound open/close";
	}
	return null;
}

// ============================================
// Gaps
// ============================================

export const GapReasonSchema = z.enum(["provider_exhausted", "no_data"]);
export type GapReason = z.infer<typeof GapReasonSchema>;

/**
 * A run of expected periods with no candle. `[start, end)` is grid-aligned.
 */
export const GapSchema = z.object({
	start: z.number().int(),
	end: z.number().int(),
	periods: z.number().int().positive(),
	reason: GapReasonSchema,
});
export type Gap = z.infer<typeof GapSchema>;

export function isInGap(timestamp: number, gaps: readonly Gap[]): boolean {
	return gaps.some((gap) => timestamp >= gap.start && timestamp < gap.end);
}

/**
 * Whether a recorded gap starts strictly between two consecutive candles.
 */
export function hasGapBetween(previous: number, current: number, gaps: readonly Gap[]): boolean {
	return gaps.some((gap) => gap.start > previous && gap.start < current);
}

// ============================================
// Series
// ============================================

/**
 * Two providers returned the same period with different prices.
 */
export const OhlcDiscrepancySchema = z.object({
	timestamp: z.number().int(),
	kept: z.string(),
	dropped: z.string(),
	maxAbsDiff: z.number(),
});
export type OhlcDiscrepancy = z.infer<typeof OhlcDiscrepancySchema>;

export interface CandleSeries {
	instrument: string;
	granularity: Granularity;
	start: number;
	end: number;
	/** Strictly increasing by timestamp */
	candles: Candle[];
	gaps: Gap[];
	/** Candle count per provider after merge */
	sources: Record<string, number>;
	malformedCount: number;
	discrepancies: OhlcDiscrepancy[];
}

/**
 * Largest absolute difference between the OHLC fields of two candles.
 */
export function ohlcDistance(a: Candle, b: Candle): number {
	return Math.max(
		Math.abs(a.open - b.open),
		Math.abs(a.high - b.high),
		Math.abs(a.low - b.low),
		Math.abs(a.close - b.close),
	);
}

/**
 * Verify ordering and uniqueness. Returns the index of the first candle
 * that breaks strict ordering, or -1.
 */
export function findOrderViolation(candles: readonly Candle[]): number {
	for (let i = 1; i < candles.length; i++) {
		const prev = candles[i - 1];
		const curr = candles[i];
		if (prev && curr && curr.timestamp <= prev.timestamp) {
			return i;
		}
	}
	return -1;
}

export function gapPeriodsTotal(gaps: readonly Gap[]): number {
	return gaps.reduce((sum, gap) => sum + gap.periods, 0);
}
