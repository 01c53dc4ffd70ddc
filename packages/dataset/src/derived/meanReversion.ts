/**
 * Mean-reversion dataset: per-row features, labelled 1 when the forward
 * return over `horizon` rows is negative.
 */

import type { Gap, ModelReadyRow } from "@fxline/domain";
import { splitRuns } from "@fxline/indicators";
import { completeFeatures } from "../features.js";
import type { DatasetCell, DerivedTable } from "../types.js";

export interface MeanReversionOptions {
	horizon: number;
	features: readonly string[];
}

export function buildMeanReversionDataset(
	rows: readonly ModelReadyRow[],
	gaps: readonly Gap[],
	options: MeanReversionOptions,
): DerivedTable {
	const { horizon, features } = options;
	const table: DatasetCell[][] = [];

	for (const run of splitRuns(rows, gaps)) {
		run.forEach((row, index) => {
			const future = run[index + horizon];
			const values = completeFeatures(row, features);
			if (!future || !values) {
				return;
			}
			const forwardReturn = future.close / row.close - 1;
			table.push([new Date(row.timestamp).toISOString(), ...values, forwardReturn, forwardReturn < 0 ? 1 : 0]);
		});
	}

	return {
		name: "mean_reversion",
		columns: ["timestamp", ...features, `forward_return_${horizon}`, "label"],
		rows: table,
	};
}
