/**
 * Simple Returns Transform
 *
 * Formula:
 *   R(n) = P(t) / P(t - n) - 1
 */

import { safeDivide } from "../stats.js";
import { emptySeries, type IndicatorSeries } from "../types.js";

export function calculateReturns(values: readonly number[], period = 1): IndicatorSeries {
	const result = emptySeries(values.length);
	for (let i = period; i < values.length; i++) {
		const current = values[i];
		const previous = values[i - period];
		if (current === undefined || previous === undefined) {
			continue;
		}
		const ratio = safeDivide(current, previous);
		result[i] = ratio === null ? null : ratio - 1;
	}
	return result;
}
