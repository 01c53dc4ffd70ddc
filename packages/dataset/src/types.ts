import type { Gap, Granularity, IndicatorRow, ModelReadyRow, NewsSignal } from "@fxline/domain";

export interface IndicatorSet {
	instrument: string;
	granularity: Granularity;
	start: number;
	end: number;
	rows: IndicatorRow[];
	gaps: Gap[];
}

export interface AssembledDataset {
	instrument: string;
	granularity: Granularity;
	start: number;
	end: number;
	/** Strictly increasing by period */
	rows: ModelReadyRow[];
	/** Gap set of the source series */
	gaps: Gap[];
	/** Gap periods inside the assembled range */
	excludedInGaps: number;
	/** Rows removed by the `drop` missing-indicator policy */
	droppedIncomplete: number;
	/** Rows that had no signal and took the neutral default */
	newsFilled: number;
}

export interface SignalSet {
	instrument: string;
	signals: readonly NewsSignal[];
}

export type DatasetCell = number | string | null;

/**
 * A flat training table. Every row has one cell per column.
 */
export interface DerivedTable {
	name: string;
	columns: string[];
	rows: DatasetCell[][];
}
