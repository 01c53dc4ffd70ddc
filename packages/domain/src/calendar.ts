/**
 * FX Session Calendar
 *
 * The spot FX market trades continuously from Sunday 22:00 UTC to Friday
 * 22:00 UTC. Periods that fall entirely inside the weekly close are not
 * expected to carry candles, so they never count as gaps. DST shifts of
 * the Sydney open and New York close are not modelled.
 */

import { z } from "zod";
import { type Granularity, granularityMs, periodStarts } from "./granularity.js";

export const SessionCalendarSchema = z.enum(["fx", "continuous"]);
export type SessionCalendar = z.infer<typeof SessionCalendarSchema>;

const WEEKLY_CLOSE_HOUR_UTC = 22;

const SATURDAY = 6;
const SUNDAY = 0;
const FRIDAY = 5;

/**
 * Whether the FX market is closed at this instant.
 */
export function isFxMarketClosed(timestamp: number): boolean {
	const date = new Date(timestamp);
	const day = date.getUTCDay();
	const hour = date.getUTCHours();

	if (day === SATURDAY) {
		return true;
	}
	if (day === FRIDAY) {
		return hour >= WEEKLY_CLOSE_HOUR_UTC;
	}
	if (day === SUNDAY) {
		return hour < WEEKLY_CLOSE_HOUR_UTC;
	}
	return false;
}

/**
 * Whether a period starting at `periodStart` should carry a candle.
 */
export function isExpectedPeriod(
	periodStart: number,
	granularity: Granularity,
	calendar: SessionCalendar,
): boolean {
	if (calendar === "continuous") {
		return true;
	}

	if (granularity === "1d") {
		const day = new Date(periodStart).getUTCDay();
		return day !== SATURDAY && day !== SUNDAY;
	}

	// The weekly close spans 48h, longer than any intraday period, so a
	// period lies fully inside it exactly when both its ends do.
	const lastInstant = periodStart + granularityMs(granularity) - 1;
	return !(isFxMarketClosed(periodStart) && isFxMarketClosed(lastInstant));
}

/**
 * Expected period starts inside `[start, end)`.
 */
export function expectedPeriods(
	start: number,
	end: number,
	granularity: Granularity,
	calendar: SessionCalendar,
): number[] {
	const result: number[] = [];
	for (const ts of periodStarts(start, end, granularity)) {
		if (isExpectedPeriod(ts, granularity, calendar)) {
			result.push(ts);
		}
	}
	return result;
}
