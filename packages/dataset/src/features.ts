/**
 * Feature lookup over model-ready rows.
 *
 * A feature is a candle field, a news field, or an indicator name.
 */

import { ConfigError, type ModelReadyRow } from "@fxline/domain";
import { INDICATOR_NAMES } from "@fxline/indicators";

const ROW_FEATURES = {
	open: (row: ModelReadyRow) => row.open,
	high: (row: ModelReadyRow) => row.high,
	low: (row: ModelReadyRow) => row.low,
	close: (row: ModelReadyRow) => row.close,
	volume: (row: ModelReadyRow) => row.volume,
	news_score: (row: ModelReadyRow) => row.newsScore,
	news_count: (row: ModelReadyRow) => row.newsCount,
} satisfies Record<string, (row: ModelReadyRow) => number | null>;

function isRowFeature(name: string): name is keyof typeof ROW_FEATURES {
	return Object.hasOwn(ROW_FEATURES, name);
}

export const FEATURE_NAMES: readonly string[] = [...Object.keys(ROW_FEATURES), ...INDICATOR_NAMES];

/**
 * @throws ConfigError listing every unknown feature
 */
export function resolveFeatures(names: readonly string[], setting = "dataset.features"): string[] {
	const known = new Set(FEATURE_NAMES);
	const unknown = names.filter((name) => !known.has(name));
	if (unknown.length > 0) {
		throw new ConfigError(
			`Unknown dataset features: ${unknown.join(", ")}`,
			unknown.map((name) => `${setting}: unknown feature "${name}"`),
		);
	}
	return [...names];
}

/**
 * Value of one feature, or null when undefined for this row.
 */
export function featureValue(row: ModelReadyRow, name: string): number | null {
	if (isRowFeature(name)) {
		return ROW_FEATURES[name](row);
	}
	return row.indicators[name] ?? null;
}

/**
 * Values of every feature, or null when any of them is undefined.
 */
export function completeFeatures(row: ModelReadyRow, names: readonly string[]): number[] | null {
	const values: number[] = [];
	for (const name of names) {
		const value = featureValue(row, name);
		if (value === null) {
			return null;
		}
		values.push(value);
	}
	return values;
}
