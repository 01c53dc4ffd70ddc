/**
 * Range Planning
 *
 * Splits a request across providers by retention window. Providers are
 * walked in priority order; each takes the newest part of the still
 * unassigned range it can serve. What nobody can serve is returned as
 * an unserviceable range and becomes a gap without any network call.
 */

import { type Clock, expectedPeriods, type SessionCalendar } from "@fxline/domain";
import { availableFrom, type CandleProvider, type CandleRequest, supportsGranularity } from "../providers/types.js";

export interface TimeRange {
	start: number;
	end: number;
}

export interface PlannedSubRange extends TimeRange {
	/** Index into the provider priority list */
	primary: number;
}

export interface RangePlan {
	subRanges: PlannedSubRange[];
	unserviceable: TimeRange | null;
}

/**
 * Provider indices able to serve `range` in full, in priority order.
 */
export function providersFor(
	range: TimeRange,
	request: CandleRequest,
	providers: readonly CandleProvider[],
	now: number,
): number[] {
	const result: number[] = [];
	providers.forEach((provider, index) => {
		if (
			supportsGranularity(provider.capabilities, request.granularity) &&
			range.start >= availableFrom(provider.capabilities, request.granularity, now)
		) {
			result.push(index);
		}
	});
	return result;
}

export function planRange(
	request: CandleRequest,
	providers: readonly CandleProvider[],
	clock: Clock,
	calendar: SessionCalendar,
): RangePlan {
	const now = clock();
	const subRanges: PlannedSubRange[] = [];
	let remainingEnd = request.end;

	providers.forEach((provider, index) => {
		if (remainingEnd <= request.start || !supportsGranularity(provider.capabilities, request.granularity)) {
			return;
		}
		const from = Math.max(request.start, availableFrom(provider.capabilities, request.granularity, now));
		if (from >= remainingEnd) {
			return;
		}
		const span = provider.capabilities.maxSpanMs[request.granularity];
		for (const chunk of chunkRange({ start: from, end: remainingEnd }, span)) {
			// Chunks with nothing expected (a weekend) need no call
			if (expectedPeriods(chunk.start, chunk.end, request.granularity, calendar).length > 0) {
				subRanges.push({ ...chunk, primary: index });
			}
		}
		remainingEnd = from;
	});

	subRanges.sort((a, b) => a.start - b.start);
	return {
		subRanges,
		unserviceable: remainingEnd > request.start ? { start: request.start, end: remainingEnd } : null,
	};
}

/**
 * Consecutive chunks of at most `spanMs`, oldest first.
 */
export function chunkRange(range: TimeRange, spanMs?: number): TimeRange[] {
	if (spanMs === undefined || spanMs <= 0 || range.end - range.start <= spanMs) {
		return [range];
	}
	const chunks: TimeRange[] = [];
	for (let start = range.start; start < range.end; start += spanMs) {
		chunks.push({ start, end: Math.min(start + spanMs, range.end) });
	}
	return chunks;
}
