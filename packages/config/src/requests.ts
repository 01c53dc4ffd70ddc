/**
 * Request Descriptor Resolution
 *
 * Turns the configuration into fully-resolved acquisition requests. Stages
 * never read configuration themselves; they receive these descriptors.
 */

import {
	alignToPeriod,
	ConfigError,
	type Clock,
	type Granularity,
	parseUtc,
	systemClock,
} from "@fxline/domain";
import type { PipelineConfig } from "./validate.js";

export interface RequestDescriptor {
	instrument: string;
	granularity: Granularity;
	/** Inclusive, UTC epoch ms */
	start: number;
	/** Exclusive, UTC epoch ms */
	end: number;
}

export interface ResolveOptions {
	/** Restrict to these instruments (must be configured) */
	instruments?: string[];
	granularities?: Granularity[];
	clock?: Clock;
}

export function resolveRequests(config: PipelineConfig, options: ResolveOptions = {}): RequestDescriptor[] {
	const clock = options.clock ?? systemClock;
	const instruments = selectInstruments(config.general.instruments, options.instruments);
	const granularities = options.granularities ?? config.general.granularities;

	const start = parseUtc(config.general.start_date);
	const requests: RequestDescriptor[] = [];

	for (const granularity of granularities) {
		// Without an explicit end, stop before the period still in progress
		const end =
			config.general.end_date === null
				? alignToPeriod(clock(), granularity)
				: parseUtc(config.general.end_date);

		if (end <= start) {
			throw new ConfigError(
				`Empty range for ${granularity}: start ${config.general.start_date} is not before end`,
			);
		}

		for (const instrument of instruments) {
			requests.push({ instrument, granularity, start, end });
		}
	}

	return requests;
}

function selectInstruments(configured: string[], requested?: string[]): string[] {
	if (!requested || requested.length === 0) {
		return configured;
	}
	const normalized = requested.map((s) => s.trim().toUpperCase());
	const unknown = normalized.filter((s) => !configured.includes(s));
	if (unknown.length > 0) {
		throw new ConfigError(`Instruments not configured: ${unknown.join(", ")}`, unknown);
	}
	return normalized;
}
