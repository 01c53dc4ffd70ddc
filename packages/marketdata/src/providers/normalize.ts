/**
 * Shared row → Candle normalization for the candle adapters.
 */

import { type Candle, validateCandle } from "@fxline/domain";
import { log } from "../logger.js";
import type { CandleRequest, NormalizeResult } from "./types.js";

export interface RawBar {
	/** UTC epoch ms */
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number | null;
}

/**
 * Build canonical candles, dropping rows that break the candle invariants.
 * A timestamp repeated within one response keeps its last row. Output is
 * sorted by timestamp.
 */
export function barsToCandles(provider: string, request: CandleRequest, bars: readonly RawBar[]): NormalizeResult<Candle> {
	const byTimestamp = new Map<number, Candle>();
	let malformed = 0;

	for (const bar of bars) {
		const candle: Candle = {
			instrument: request.instrument,
			granularity: request.granularity,
			source: provider,
			...bar,
		};
		const violation = validateCandle(candle);
		if (violation) {
			malformed++;
			log.debug({ provider, timestamp: bar.timestamp, violation }, "Dropping malformed candle");
			continue;
		}
		byTimestamp.set(candle.timestamp, candle);
	}

	const records = [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
	return { records, malformed };
}
