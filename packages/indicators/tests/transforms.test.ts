/**
 * Transform Tests
 *
 * Tests for the rolling z-score and simple returns.
 */

import { describe, expect, it } from "vitest";
import { calculateReturns } from "../src/transforms/returns.js";
import { calculateZScore } from "../src/transforms/zscore.js";

describe("calculateZScore", () => {
	it("divides by the sample standard deviation", () => {
		// mean 2, sample std 1
		expect(calculateZScore([1, 2, 3], 3)).toEqual([null, null, 1]);
	});

	it("leaves a flat window undefined", () => {
		expect(calculateZScore([5, 5, 5], 3)).toEqual([null, null, null]);
	});

	it.each([0.6543, 1.0853, 1.1, 0.91234, 151.23])("leaves 20 flat closes at %s undefined", (price) => {
		const z = calculateZScore(Array<number>(20).fill(price), 20);

		expect(z[19]).toBeNull();
	});
});

describe("calculateReturns", () => {
	it("computes n-period simple returns", () => {
		const one = calculateReturns([100, 110, 121], 1);
		const two = calculateReturns([100, 110, 121], 2);

		expect(one[0]).toBeNull();
		expect(one[1]).toBeCloseTo(0.1, 10);
		expect(one[2]).toBeCloseTo(0.1, 10);
		expect(two.slice(0, 2)).toEqual([null, null]);
		expect(two[2]).toBeCloseTo(0.21, 10);
	});
});
