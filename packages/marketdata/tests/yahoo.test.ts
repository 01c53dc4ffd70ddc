/**
 * Yahoo Finance Adapter Tests
 */

import { DAY_MS, fixedClock, HOUR_MS, MalformedResponseError, parseUtc, UnsupportedRangeError } from "@fxline/domain";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { CandleRequest } from "../src/providers/types.js";
import { roundToUtcMidnight, YahooFinanceAdapter } from "../src/providers/yahoo.js";
import { createJsonResponse, getMockCallUrl, installMockFetch } from "./helpers.js";

const NOW = parseUtc("2024-03-15T00:00:00Z");
const clock = fixedClock(NOW);

function chart(timestamps: number[], quote: Record<string, (number | null)[]>) {
	return { chart: { result: [{ timestamp: timestamps, indicators: { quote: [quote] } }], error: null } };
}

describe("YahooFinanceAdapter", () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it("requests the =X chart with period bounds in seconds", async () => {
		const mockFetch = installMockFetch(() => createJsonResponse({ chart: { result: null, error: null } }));
		const start = NOW - 2 * DAY_MS;

		await new YahooFinanceAdapter({ clock }).fetch({ instrument: "USDJPY", granularity: "1h", start, end: NOW });

		const url = getMockCallUrl(mockFetch);
		expect(url.pathname).toBe("/v8/finance/chart/USDJPY=X");
		expect(url.searchParams.get("period1")).toBe(String(start / 1000));
		expect(url.searchParams.get("period2")).toBe(String(NOW / 1000));
		expect(url.searchParams.get("interval")).toBe("60m");
	});

	it("limits 1m history to 7 days", async () => {
		installMockFetch(() => createJsonResponse({ chart: { result: null, error: null } }));
		const adapter = new YahooFinanceAdapter({ clock });

		await expect(
			adapter.fetch({ instrument: "EURUSD", granularity: "1m", start: NOW - 8 * DAY_MS, end: NOW }),
		).rejects.toBeInstanceOf(UnsupportedRangeError);
	});

	it("moves daily bars to UTC midnight and drops zero volume", () => {
		const request: CandleRequest = { instrument: "EURUSD", granularity: "1d", start: NOW - 5 * DAY_MS, end: NOW };
		const londonMidnight = parseUtc("2024-03-12T23:00:00Z") / 1000;

		const result = new YahooFinanceAdapter({ clock }).normalize(
			chart([londonMidnight, londonMidnight + 86400], {
				open: [1.09, 1.091],
				high: [1.095, 1.096],
				low: [1.085, null],
				close: [1.091, 1.092],
				volume: [0, 0],
			}),
			request,
		);

		expect(result.malformed).toBe(1);
		expect(result.records).toEqual([
			{
				instrument: "EURUSD",
				granularity: "1d",
				source: "yahoo",
				timestamp: parseUtc("2024-03-13"),
				open: 1.09,
				high: 1.095,
				low: 1.085,
				close: 1.091,
				volume: null,
			},
		]);
	});

	it("keeps intraday timestamps as sent", () => {
		const request: CandleRequest = { instrument: "EURUSD", granularity: "1h", start: NOW - DAY_MS, end: NOW };
		const ts = (NOW - 2 * HOUR_MS) / 1000;

		const result = new YahooFinanceAdapter({ clock }).normalize(
			chart([ts], { open: [1.09], high: [1.1], low: [1.08], close: [1.095], volume: [15] }),
			request,
		);

		expect(result.records.map((c) => [c.timestamp, c.volume])).toEqual([[NOW - 2 * HOUR_MS, 15]]);
	});

	it("fails on a chart error", () => {
		const request: CandleRequest = { instrument: "XXXYYY", granularity: "1d", start: NOW - DAY_MS, end: NOW };

		expect(() =>
			new YahooFinanceAdapter({ clock }).normalize(
				{ chart: { result: null, error: { code: "Not Found", description: "No data found, symbol may be delisted" } } },
				request,
			),
		).toThrow(MalformedResponseError);
	});
});

describe("roundToUtcMidnight", () => {
	it("rounds to the nearest day boundary", () => {
		expect(roundToUtcMidnight(parseUtc("2024-03-13T23:00:00Z"))).toBe(parseUtc("2024-03-14"));
		expect(roundToUtcMidnight(parseUtc("2024-03-14T05:00:00Z"))).toBe(parseUtc("2024-03-14"));
	});
});
