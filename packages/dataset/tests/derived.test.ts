/**
 * Derived Dataset Tests
 */

import { type Article, ConfigError, type Gap } from "@fxline/domain";
import { describe, expect, it } from "vitest";
import { buildDerivedDatasets } from "../src/builder.js";
import { buildMeanReversionDataset } from "../src/derived/meanReversion.js";
import { buildSentimentDataset, firstAtOrAfter } from "../src/derived/sentiment.js";
import { buildTrendDataset, trendColumns } from "../src/derived/trend.js";
import { featureValue, resolveFeatures } from "../src/features.js";
import type { AssembledDataset } from "../src/types.js";
import { HOUR, hourlyRows, modelRow, T0 } from "./helpers.js";

const iso = (timestamp: number) => new Date(timestamp).toISOString();

describe("features", () => {
	it("reads candle, news and indicator features", () => {
		const row = { ...modelRow(T0, 1.1, { rsi_14: 55 }), newsScore: 0.25 };

		expect(featureValue(row, "close")).toBe(1.1);
		expect(featureValue(row, "news_score")).toBe(0.25);
		expect(featureValue(row, "rsi_14")).toBe(55);
		expect(featureValue(row, "ema_12")).toBeNull();
		expect(featureValue(row, "volume")).toBeNull();
	});

	it("rejects unknown features", () => {
		expect(() => resolveFeatures(["close", "momentum"], "dataset.trend_features")).toThrow(
			"Unknown dataset features: momentum",
		);
		try {
			resolveFeatures(["momentum"], "dataset.trend_features");
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigError);
			if (error instanceof ConfigError) {
				expect(error.issues).toEqual(['dataset.trend_features: unknown feature "momentum"']);
			}
		}
	});
});

describe("buildTrendDataset", () => {
	it("flattens windows and labels the direction after the window end", () => {
		const rows = hourlyRows([1.0, 1.1, 1.05, 1.2, 1.3, 1.25]).map((row, i) => ({
			...row,
			indicators: { sma_20: i === 0 ? null : 1 },
		}));

		const table = buildTrendDataset(rows, [], { sequenceLength: 3, horizon: 1, features: ["close", "sma_20"] });

		expect(table.columns).toEqual([
			"timestamp",
			"t0_close",
			"t0_sma_20",
			"t1_close",
			"t1_sma_20",
			"t2_close",
			"t2_sma_20",
			"label",
		]);
		expect(table.rows).toEqual([
			[iso(T0 + 3 * HOUR), 1.1, 1, 1.05, 1, 1.2, 1, 1],
			[iso(T0 + 4 * HOUR), 1.05, 1, 1.2, 1, 1.3, 1, 0],
		]);
	});

	it("never builds a window across a recorded gap", () => {
		const rows = [...hourlyRows([1.0, 1.1, 1.2]), ...hourlyRows([1.3, 1.2, 1.25], 5)];
		const gaps: Gap[] = [{ start: T0 + 3 * HOUR, end: T0 + 5 * HOUR, periods: 2, reason: "no_data" }];

		const table = buildTrendDataset(rows, gaps, { sequenceLength: 2, horizon: 1, features: ["close"] });

		expect(table.rows).toEqual([
			[iso(T0 + HOUR), 1.0, 1.1, 1],
			[iso(T0 + 6 * HOUR), 1.3, 1.2, 1],
		]);
	});

	it("numbers window steps from the oldest row", () => {
		expect(trendColumns({ sequenceLength: 2, horizon: 1, features: ["close"] })).toEqual([
			"timestamp",
			"t0_close",
			"t1_close",
			"label",
		]);
	});
});

describe("buildMeanReversionDataset", () => {
	it("labels negative forward returns and drops rows without a forward close", () => {
		const table = buildMeanReversionDataset(hourlyRows([1.2, 1.1, 1.0, 1.3]), [], {
			horizon: 2,
			features: ["close"],
		});

		expect(table.columns).toEqual(["timestamp", "close", "forward_return_2", "label"]);
		expect(table.rows).toHaveLength(2);
		expect(table.rows[0]?.[0]).toBe(iso(T0));
		expect(table.rows[0]?.[2]).toBeCloseTo(1.0 / 1.2 - 1, 12);
		expect(table.rows[0]?.[3]).toBe(1);
		expect(table.rows[1]?.[2]).toBeCloseTo(1.3 / 1.1 - 1, 12);
		expect(table.rows[1]?.[3]).toBe(0);
	});

	it("does not look past a gap or keep rows with undefined features", () => {
		const rows = [
			modelRow(T0, 1.2, { rsi_14: 50 }),
			modelRow(T0 + HOUR, 1.1, { rsi_14: 45 }),
			modelRow(T0 + 4 * HOUR, 1.0, { rsi_14: null }),
			modelRow(T0 + 5 * HOUR, 0.9, { rsi_14: 40 }),
		];
		const gaps: Gap[] = [{ start: T0 + 2 * HOUR, end: T0 + 4 * HOUR, periods: 2, reason: "no_data" }];

		const table = buildMeanReversionDataset(rows, gaps, { horizon: 1, features: ["close", "rsi_14"] });

		expect(table.rows).toHaveLength(1);
		expect(table.rows[0]?.slice(0, 3)).toEqual([iso(T0), 1.2, 50]);
		expect(table.rows[0]?.[4]).toBe(1);
	});
});

describe("buildSentimentDataset", () => {
	const prices = [
		{ timestamp: T0, close: 1.0 },
		{ timestamp: T0 + HOUR, close: 1.02 },
		{ timestamp: T0 + 2 * HOUR, close: 0.99 },
	];

	function article(publishedAt: number, headline: string, url?: string): Article {
		return { tag: "EURUSD", publishedAt, headline, body: "", source: "Wire", ...(url ? { url } : {}) };
	}

	it("finds the first price at or after a timestamp", () => {
		expect(firstAtOrAfter(prices, T0 - 1)).toBe(0);
		expect(firstAtOrAfter(prices, T0)).toBe(0);
		expect(firstAtOrAfter(prices, T0 + 1)).toBe(1);
		expect(firstAtOrAfter(prices, T0 + 3 * HOUR)).toBe(3);
	});

	it("pairs each article with the next candle's return", () => {
		const articles = [
			article(T0, "Euro opens firm", "https://news.example.com/a"),
			article(T0 + 30 * 60_000, "Euro slips"),
			article(T0 + 2 * HOUR, "Too late for a forward return"),
			article(T0 + 5 * HOUR, "After the last candle"),
		];

		const table = buildSentimentDataset(articles, prices, [], { scorer: () => 0.5 });

		expect(table.rows).toHaveLength(2);
		const [first, second] = table.rows;
		expect(first?.slice(0, 7)).toEqual([
			iso(T0),
			iso(T0),
			"EURUSD",
			"Wire",
			"Euro opens firm",
			"https://news.example.com/a",
			0.5,
		]);
		expect(first?.[7]).toBeCloseTo(0.02, 12);
		expect(first?.[8]).toBe(1);
		expect(second?.[1]).toBe(iso(T0 + HOUR));
		expect(second?.[5]).toBeNull();
		expect(second?.[7]).toBeCloseTo((0.99 - 1.02) / 1.02, 12);
		expect(second?.[8]).toBe(0);
	});

	it("skips articles whose forward candle lies across a gap", () => {
		const gaps: Gap[] = [{ start: T0 + 30 * 60_000, end: T0 + HOUR, periods: 1, reason: "no_data" }];

		const table = buildSentimentDataset([article(T0, "Euro opens firm")], prices, gaps, { scorer: () => 0 });

		expect(table.rows).toEqual([]);
	});
});

describe("buildDerivedDatasets", () => {
	const dataset: AssembledDataset = {
		instrument: "EURUSD",
		granularity: "1h",
		start: T0,
		end: T0 + 4 * HOUR,
		rows: hourlyRows([1.0, 1.1, 1.05, 1.2]),
		gaps: [],
		excludedInGaps: 0,
		droppedIncomplete: 0,
		newsFilled: 4,
	};
	const config = {
		missing_indicators: "keep" as const,
		sequence_length: 2,
		forecast_horizon: 1,
		mean_reversion_horizon: 1,
		trend_features: ["close"],
		mean_reversion_features: ["close", "news_score"],
	};

	it("builds the sentiment table only when articles are given", () => {
		expect(buildDerivedDatasets(dataset, config).map((t) => t.name)).toEqual(["trend", "mean_reversion"]);

		const tables = buildDerivedDatasets(dataset, config, { articles: [], scorer: () => 0 });
		expect(tables.map((t) => [t.name, t.rows.length])).toEqual([
			["trend", 2],
			["mean_reversion", 3],
			["sentiment", 0],
		]);
	});

	it("rejects unknown configured features", () => {
		expect(() => buildDerivedDatasets(dataset, { ...config, trend_features: ["vwap"] })).toThrow(ConfigError);
	});
});
