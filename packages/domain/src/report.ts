/**
 * Per instrument/range run report. Printed by the command surface so a
 * partial dataset is never silent.
 */

import type { Gap, OhlcDiscrepancy } from "./candle.js";

export type StageName = "acquire" | "news" | "indicators" | "dataset";

export interface RunReport {
	stage: StageName;
	instrument: string;
	granularity: string;
	start: number;
	end: number;
	gaps: Gap[];
	malformedCount: number;
	excludedPeriods: number;
	discrepancies: OhlcDiscrepancy[];
	/** Record count per provider or output */
	counts: Record<string, number>;
	notes: string[];
	durationMs: number;
}

export function createRunReport(
	stage: StageName,
	key: { instrument: string; granularity: string; start: number; end: number },
): RunReport {
	return {
		stage,
		...key,
		gaps: [],
		malformedCount: 0,
		excludedPeriods: 0,
		discrepancies: [],
		counts: {},
		notes: [],
		durationMs: 0,
	};
}

export function formatRunReport(report: RunReport): string {
	const range = `${new Date(report.start).toISOString()} → ${new Date(report.end).toISOString()}`;
	const lines = [
		`[${report.stage}] ${report.instrument} ${report.granularity} ${range}`,
		`  gaps: ${report.gaps.length}`,
	];
	for (const gap of report.gaps) {
		lines.push(
			`    ${new Date(gap.start).toISOString()} → ${new Date(gap.end).toISOString()} (${gap.periods} periods, ${gap.reason})`,
		);
	}
	lines.push(`  malformed records dropped: ${report.malformedCount}`);
	lines.push(`  periods excluded: ${report.excludedPeriods}`);
	if (report.discrepancies.length > 0) {
		lines.push(`  provider discrepancies: ${report.discrepancies.length}`);
	}
	const counts = Object.entries(report.counts)
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([name, count]) => `${name}=${count}`)
		.join(", ");
	if (counts) {
		lines.push(`  counts: ${counts}`);
	}
	for (const note of report.notes) {
		lines.push(`  note: ${note}`);
	}
	lines.push(`  duration: ${report.durationMs}ms`);
	return lines.join("\n");
}
