/**
 * Trend dataset: sliding windows of consecutive rows, flattened, labelled
 * with the direction of the close `horizon` rows after the window end.
 */

import type { Gap, ModelReadyRow } from "@fxline/domain";
import { splitRuns } from "@fxline/indicators";
import { completeFeatures } from "../features.js";
import type { DatasetCell, DerivedTable } from "../types.js";

export interface TrendOptions {
	sequenceLength: number;
	horizon: number;
	features: readonly string[];
}

export function trendColumns(options: TrendOptions): string[] {
	const columns = ["timestamp"];
	for (let t = 0; t < options.sequenceLength; t++) {
		for (const feature of options.features) {
			columns.push(`t${t}_${feature}`);
		}
	}
	columns.push("label");
	return columns;
}

/**
 * One row per window end `e` with `e + horizon` in the same gap-free run.
 * Windows holding a row with an undefined feature are skipped.
 */
export function buildTrendDataset(rows: readonly ModelReadyRow[], gaps: readonly Gap[], options: TrendOptions): DerivedTable {
	const { sequenceLength, horizon, features } = options;
	const table: DatasetCell[][] = [];

	for (const run of splitRuns(rows, gaps)) {
		const values = run.map((row) => completeFeatures(row, features));
		for (let end = sequenceLength - 1; end + horizon < run.length; end++) {
			const current = run[end];
			const future = run[end + horizon];
			if (!current || !future) {
				continue;
			}
			const window = values.slice(end - sequenceLength + 1, end + 1);
			const cells: DatasetCell[] = [new Date(current.timestamp).toISOString()];
			let complete = true;
			for (const step of window) {
				if (!step) {
					complete = false;
					break;
				}
				cells.push(...step);
			}
			if (!complete) {
				continue;
			}
			cells.push(future.close > current.close ? 1 : 0);
			table.push(cells);
		}
	}

	return { name: "trend", columns: trendColumns(options), rows: table };
}
