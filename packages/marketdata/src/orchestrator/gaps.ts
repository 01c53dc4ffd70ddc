/**
 * Gap Detection
 *
 * Expected periods without a candle, grouped into maximal runs. A market
 * closure between two missing periods does not split the run. Gaps are
 * recorded, never interpolated.
 */

import {
	type Candle,
	expectedPeriods,
	type Gap,
	type GapReason,
	type Granularity,
	granularityMs,
	type SessionCalendar,
} from "@fxline/domain";
import type { TimeRange } from "./plan.js";

export interface GapDetectionInput {
	start: number;
	end: number;
	granularity: Granularity;
	calendar: SessionCalendar;
	candles: readonly Candle[];
	/** Ranges where every provider failed */
	exhausted: readonly TimeRange[];
}

export function detectGaps(input: GapDetectionInput): Gap[] {
	const present = new Set(input.candles.map((c) => c.timestamp));
	const period = granularityMs(input.granularity);
	const gaps: Gap[] = [];
	let open: Gap | null = null;

	for (const ts of expectedPeriods(input.start, input.end, input.granularity, input.calendar)) {
		if (present.has(ts)) {
			open = null;
			continue;
		}
		const reason = reasonFor(ts, input.exhausted);
		if (open && open.reason === reason) {
			open.end = ts + period;
			open.periods++;
			continue;
		}
		open = { start: ts, end: ts + period, periods: 1, reason };
		gaps.push(open);
	}

	return gaps;
}

function reasonFor(timestamp: number, exhausted: readonly TimeRange[]): GapReason {
	return exhausted.some((r) => timestamp >= r.start && timestamp < r.end) ? "provider_exhausted" : "no_data";
}
