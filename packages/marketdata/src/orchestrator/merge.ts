/**
 * Candle Merge
 *
 * Order-independent reduction keyed by timestamp. On collision the
 * candle from the higher-priority provider wins; a price difference
 * between the two is recorded as a discrepancy.
 */

import { type Candle, type OhlcDiscrepancy, ohlcDistance } from "@fxline/domain";

export interface RankedBatch {
	/** Provider priority; lower wins */
	rank: number;
	candles: readonly Candle[];
}

export interface MergeResult {
	candles: Candle[];
	discrepancies: OhlcDiscrepancy[];
	sources: Record<string, number>;
}

export function mergeCandles(batches: readonly RankedBatch[]): MergeResult {
	// Fold batches in rank order so the outcome never depends on call order
	const ordered = [...batches].sort((a, b) => a.rank - b.rank);
	const merged = new Map<number, Candle>();
	const discrepancies: OhlcDiscrepancy[] = [];

	for (const batch of ordered) {
		for (const candle of batch.candles) {
			const existing = merged.get(candle.timestamp);
			if (!existing) {
				merged.set(candle.timestamp, candle);
				continue;
			}
			const diff = ohlcDistance(existing, candle);
			if (diff > 0) {
				discrepancies.push({
					timestamp: candle.timestamp,
					kept: existing.source,
					dropped: candle.source,
					maxAbsDiff: diff,
				});
			}
		}
	}

	const candles = [...merged.values()].sort((a, b) => a.timestamp - b.timestamp);
	const sources: Record<string, number> = {};
	for (const candle of candles) {
		sources[candle.source] = (sources[candle.source] ?? 0) + 1;
	}
	discrepancies.sort((a, b) => a.timestamp - b.timestamp || a.dropped.localeCompare(b.dropped));

	return { candles, discrepancies, sources };
}
