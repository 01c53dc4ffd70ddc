/**
 * Granularity and period arithmetic.
 *
 * Period starts are aligned to multiples of the period length since the
 * Unix epoch, so every `1d` period starts at UTC midnight. Ranges are
 * half-open: `[start, end)`.
 */

import { z } from "zod";

export const GranularitySchema = z.enum(["1m", "5m", "15m", "30m", "1h", "4h", "1d"]);
export type Granularity = z.infer<typeof GranularitySchema>;

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

const GRANULARITY_MINUTES: Record<Granularity, number> = {
	"1m": 1,
	"5m": 5,
	"15m": 15,
	"30m": 30,
	"1h": 60,
	"4h": 240,
	"1d": 1440,
};

export function granularityMs(granularity: Granularity): number {
	return GRANULARITY_MINUTES[granularity] * MINUTE_MS;
}

/**
 * Start of the period containing `timestamp`.
 */
export function alignToPeriod(timestamp: number, granularity: Granularity): number {
	const ms = granularityMs(granularity);
	return Math.floor(timestamp / ms) * ms;
}

/**
 * First period start at or after `timestamp`.
 */
export function ceilToPeriod(timestamp: number, granularity: Granularity): number {
	const ms = granularityMs(granularity);
	return Math.ceil(timestamp / ms) * ms;
}

export function isAligned(timestamp: number, granularity: Granularity): boolean {
	return timestamp % granularityMs(granularity) === 0;
}

/**
 * Period starts inside `[start, end)`, oldest first.
 */
export function* periodStarts(start: number, end: number, granularity: Granularity): Generator<number> {
	const step = granularityMs(granularity);
	for (let ts = ceilToPeriod(start, granularity); ts < end; ts += step) {
		yield ts;
	}
}

export function countPeriods(start: number, end: number, granularity: Granularity): number {
	if (end <= start) {
		return 0;
	}
	const first = ceilToPeriod(start, granularity);
	if (first >= end) {
		return 0;
	}
	return Math.ceil((end - first) / granularityMs(granularity));
}

/**
 * Parse a `YYYY-MM-DD` date or full ISO timestamp as UTC epoch ms.
 */
export function parseUtc(value: string): number {
	const normalized = /^\d{4}-\d{2}-\d{2}$/.test(value) ? `${value}T00:00:00.000Z` : value;
	const ts = Date.parse(normalized);
	if (Number.isNaN(ts)) {
		throw new RangeError(`Invalid timestamp: ${value}`);
	}
	return ts;
}

export function toIsoDate(timestamp: number): string {
	return new Date(timestamp).toISOString().slice(0, 10);
}
