/**
 * Dataset Assembler Tests
 */

import type { Gap, NewsSignal } from "@fxline/domain";
import { describe, expect, it } from "vitest";
import { DatasetAssembler } from "../src/assembler.js";
import type { IndicatorSet } from "../src/types.js";
import { HOUR, indicatorRow, T0 } from "./helpers.js";

function indicatorSet(overrides: Partial<IndicatorSet> = {}): IndicatorSet {
	return {
		instrument: "EURUSD",
		granularity: "1h",
		start: T0,
		end: T0 + 4 * 24 * HOUR,
		rows: [],
		gaps: [],
		...overrides,
	};
}

function signal(periodStart: number, score: number, articleCount: number): NewsSignal {
	return { instrument: "EURUSD", periodStart, score, articleCount };
}

describe("DatasetAssembler", () => {
	it("joins signals on the period and fills missing ones with the neutral score", () => {
		const assembler = new DatasetAssembler({ neutralScore: 0.1 });
		const rows = [indicatorRow(T0, 1.1), indicatorRow(T0 + HOUR, 1.2), indicatorRow(T0 + 2 * HOUR, 1.3)];

		const result = assembler.assemble(indicatorSet({ rows }), [signal(T0 + HOUR, 0.5, 2)]);

		expect(result.rows.map((r) => [r.newsScore, r.newsCount, r.newsFilled])).toEqual([
			[0.1, 0, true],
			[0.5, 2, false],
			[0.1, 0, true],
		]);
		expect(result.newsFilled).toBe(2);
		expect(result.rows[1]?.close).toBe(1.2);
	});

	it("treats a zero-article signal as present", () => {
		const assembler = new DatasetAssembler();
		const result = assembler.assemble(indicatorSet({ rows: [indicatorRow(T0, 1.1)] }), [signal(T0, 0, 0)]);

		expect(result.rows[0]?.newsFilled).toBe(false);
		expect(result.newsFilled).toBe(0);
	});

	it("excludes every period of a three-day gap and reports the gap periods", () => {
		// Mon 00:00-11:00, gap Mon 12:00 to Thu 12:00, Thu 12:00-23:00
		const before = Array.from({ length: 12 }, (_, i) => indicatorRow(T0 + i * HOUR, 1.1));
		const after = Array.from({ length: 12 }, (_, i) => indicatorRow(T0 + (84 + i) * HOUR, 1.2));
		const stale = indicatorRow(T0 + 36 * HOUR, 1.15);
		const gap: Gap = { start: T0 + 12 * HOUR, end: T0 + 84 * HOUR, periods: 72, reason: "provider_exhausted" };

		const result = new DatasetAssembler().assemble(indicatorSet({ rows: [...before, stale, ...after], gaps: [gap] }));

		expect(result.rows).toHaveLength(24);
		expect(result.rows.filter((r) => r.timestamp >= gap.start && r.timestamp < gap.end)).toHaveLength(0);
		expect(result.excludedInGaps).toBe(72);
		expect(result.gaps).toEqual([gap]);
	});

	it("keeps null indicators under the keep policy", () => {
		const rows = [indicatorRow(T0, 1.1, { sma_20: null }), indicatorRow(T0 + HOUR, 1.2, { sma_20: 1.15 })];

		const result = new DatasetAssembler({ missingIndicators: "keep" }).assemble(indicatorSet({ rows }));

		expect(result.rows).toHaveLength(2);
		expect(result.rows[0]?.indicators).toEqual({ sma_20: null });
		expect(result.droppedIncomplete).toBe(0);
	});

	it("drops rows with any null indicator under the drop policy", () => {
		const rows = [
			indicatorRow(T0, 1.1, { sma_20: null, return_1: null }),
			indicatorRow(T0 + HOUR, 1.2, { sma_20: null, return_1: 0.09 }),
			indicatorRow(T0 + 2 * HOUR, 1.3, { sma_20: 1.2, return_1: 0.08 }),
		];

		const result = new DatasetAssembler({ missingIndicators: "drop" }).assemble(indicatorSet({ rows }));

		expect(result.rows.map((r) => r.timestamp)).toEqual([T0 + 2 * HOUR]);
		expect(result.droppedIncomplete).toBe(2);
	});

	it("rejects duplicate periods", () => {
		const rows = [indicatorRow(T0, 1.1), indicatorRow(T0, 1.2)];

		expect(() => new DatasetAssembler().assemble(indicatorSet({ rows }))).toThrow(
			"Duplicate period 2024-01-08T00:00:00.000Z in EURUSD",
		);
	});

	it("rejects out-of-order periods", () => {
		const rows = [indicatorRow(T0 + HOUR, 1.1), indicatorRow(T0, 1.2)];

		expect(() => new DatasetAssembler().assemble(indicatorSet({ rows }))).toThrow(RangeError);
	});

	it("rejects duplicate signals and signals for another instrument", () => {
		const set = indicatorSet({ rows: [indicatorRow(T0, 1.1)] });
		const assembler = new DatasetAssembler();

		expect(() => assembler.assemble(set, [signal(T0, 0.1, 1), signal(T0, 0.2, 1)])).toThrow(
			"Duplicate news signal for 2024-01-08T00:00:00.000Z",
		);
		expect(() => assembler.assemble(set, [{ ...signal(T0, 0.1, 1), instrument: "GBPUSD" }])).toThrow(
			"News signal for GBPUSD cannot join EURUSD",
		);
	});
});
