import { parseUtc } from "@fxline/domain";
import { describe, expect, it } from "vitest";
import { mergeCandles } from "../src/orchestrator/merge.js";
import { makeCandle } from "./helpers.js";

const T0 = parseUtc("2024-03-04T10:00:00Z");
const T1 = parseUtc("2024-03-04T11:00:00Z");

describe("mergeCandles", () => {
	const primary = makeCandle({ timestamp: T0, source: "finnhub", close: 1.105 });
	const fallback = makeCandle({ timestamp: T0, source: "yahoo", close: 1.1075 });
	const fallbackOnly = makeCandle({ timestamp: T1, source: "yahoo" });

	it("keeps the higher-priority candle and records the discrepancy", () => {
		const result = mergeCandles([
			{ rank: 0, candles: [primary] },
			{ rank: 2, candles: [fallback, fallbackOnly] },
		]);

		expect(result.candles).toEqual([primary, fallbackOnly]);
		expect(result.sources).toEqual({ finnhub: 1, yahoo: 1 });
		expect(result.discrepancies).toHaveLength(1);
		expect(result.discrepancies[0]?.kept).toBe("finnhub");
		expect(result.discrepancies[0]?.dropped).toBe("yahoo");
		expect(result.discrepancies[0]?.maxAbsDiff).toBeCloseTo(0.0025, 10);
	});

	it("does not depend on batch order", () => {
		const forward = mergeCandles([
			{ rank: 0, candles: [primary] },
			{ rank: 2, candles: [fallback, fallbackOnly] },
		]);
		const reversed = mergeCandles([
			{ rank: 2, candles: [fallbackOnly, fallback] },
			{ rank: 0, candles: [primary] },
		]);

		expect(reversed).toEqual(forward);
	});

	it("records nothing when overlapping candles agree", () => {
		const twin = { ...primary, source: "yahoo" };
		const result = mergeCandles([
			{ rank: 1, candles: [twin] },
			{ rank: 0, candles: [primary] },
		]);

		expect(result.candles).toEqual([primary]);
		expect(result.discrepancies).toEqual([]);
	});
});
