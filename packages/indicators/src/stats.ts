/**
 * Window statistics shared by the calculators.
 */

export function mean(values: readonly number[]): number {
	return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Standard deviation with divisor n (`sample = false`) or n - 1. Exactly 0
 * for a constant window, where the rounded mean would leave a residue.
 */
export function standardDeviation(values: readonly number[], sample: boolean): number {
	const divisor = sample ? values.length - 1 : values.length;
	if (divisor <= 0) {
		return Number.NaN;
	}
	if (values.every((v) => v === values[0])) {
		return 0;
	}
	const m = mean(values);
	const squares = values.reduce((sum, v) => sum + (v - m) ** 2, 0);
	return Math.sqrt(squares / divisor);
}

/**
 * The `period` values ending at `index`, or null when the window is short
 * or holds a null.
 */
export function windowAt(
	values: readonly (number | null)[],
	index: number,
	period: number,
): number[] | null {
	if (index < period - 1) {
		return null;
	}
	const window: number[] = [];
	for (let i = index - period + 1; i <= index; i++) {
		const value = values[i];
		if (value === null || value === undefined) {
			return null;
		}
		window.push(value);
	}
	return window;
}

/**
 * `numerator / denominator`, or null when the denominator is zero.
 */
export function safeDivide(numerator: number, denominator: number): number | null {
	return denominator === 0 ? null : numerator / denominator;
}
