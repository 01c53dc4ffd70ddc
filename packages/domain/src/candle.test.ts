import { describe, expect, it } from "vitest";
import { type Candle, findOrderViolation, hasGapBetween, isInGap, ohlcDistance, validateCandle } from "./candle.js";
import { parseUtc } from "./granularity.js";

function candle(overrides: Partial<Candle> = {}): Candle {
	return {
		instrument: "EURUSD",
		timestamp: parseUtc("2024-03-01T10:00:00Z"),
		open: 1.1,
		high: 1.2,
		low: 1.0,
		close: 1.15,
		volume: null,
		granularity: "1h",
		source: "finnhub",
		...overrides,
	};
}

describe("validateCandle", () => {
	it("accepts a well-formed candle", () => {
		expect(validateCandle(candle())).toBeNull();
	});

	it("rejects a high below the body", () => {
		expect(validateCandle(candle({ high: 1.12 }))).toBe("high/low do not bound open/close");
	});

	it("rejects non-positive prices", () => {
		expect(validateCandle(candle({ low: 0 }))).toBe("non-positive or non-finite price");
		expect(validateCandle(candle({ close: Number.NaN }))).toBe("non-positive or non-finite price");
	});

	it("rejects misaligned timestamps", () => {
		expect(validateCandle(candle({ timestamp: parseUtc("2024-03-01T10:30:00Z") }))).toBe(
			"timestamp not aligned to granularity",
		);
	});

	it("rejects negative volume", () => {
		expect(validateCandle(candle({ volume: -1 }))).toBe("invalid volume");
	});
});

describe("gap helpers", () => {
	const gaps = [{ start: 100, end: 200, periods: 1, reason: "no_data" as const }];

	it("tests membership with an exclusive end", () => {
		expect(isInGap(100, gaps)).toBe(true);
		expect(isInGap(199, gaps)).toBe(true);
		expect(isInGap(200, gaps)).toBe(false);
	});

	it("finds gaps between consecutive candles", () => {
		expect(hasGapBetween(0, 200, gaps)).toBe(true);
		expect(hasGapBetween(200, 300, gaps)).toBe(false);
	});
});

describe("series helpers", () => {
	it("measures OHLC distance", () => {
		expect(ohlcDistance(candle(), candle({ close: 1.18 }))).toBeCloseTo(0.03, 10);
	});

	it("finds ordering violations", () => {
		const a = candle();
		const b = candle({ timestamp: a.timestamp + 3_600_000 });
		expect(findOrderViolation([a, b])).toBe(-1);
		expect(findOrderViolation([b, a])).toBe(1);
		expect(findOrderViolation([a, a])).toBe(1);
	});
});
