/**
 * Provider Adapter contract
 *
 * Each external source is one adapter. Adapters translate a request into
 * the provider's wire format and its response into canonical records. They
 * hold no cross-provider logic and keep no state beyond their HTTP client.
 */

import {
	type Candle,
	type Clock,
	DAY_MS,
	type Granularity,
	UnsupportedRangeError,
	ceilToPeriod,
} from "@fxline/domain";

export type ProviderKind = "candles" | "articles";

export interface ProviderCapabilities {
	granularities: readonly Granularity[];
	/** Days of history served per granularity; absent means unlimited */
	retentionDays: Partial<Record<Granularity, number>>;
	/** Longest span one call may cover, per granularity; absent means unlimited */
	maxSpanMs: Partial<Record<Granularity, number>>;
}

/**
 * Result of normalizing one raw response. Rows that violate the record
 * invariants are dropped and counted, never repaired.
 */
export interface NormalizeResult<T> {
	records: T[];
	malformed: number;
}

export interface ProviderAdapter<TRequest, TRecord, TCapabilities = ProviderCapabilities> {
	readonly id: string;
	readonly kind: ProviderKind;
	readonly capabilities: TCapabilities;
	fetch(request: TRequest, signal?: AbortSignal): Promise<unknown>;
	normalize(raw: unknown, request: TRequest): NormalizeResult<TRecord>;
}

/**
 * `[start, end)` in UTC epoch ms.
 */
export interface CandleRequest {
	instrument: string;
	granularity: Granularity;
	start: number;
	end: number;
	/** Instant retention is judged against; the adapter's clock when absent */
	asOf?: number;
}

export interface CandleProvider extends ProviderAdapter<CandleRequest, Candle> {
	readonly kind: "candles";
}

// ============================================
// Capability helpers
// ============================================

export function supportsGranularity(capabilities: ProviderCapabilities, granularity: Granularity): boolean {
	return capabilities.granularities.includes(granularity);
}

/**
 * Earliest period start the provider can serve at `now`.
 */
export function availableFrom(
	capabilities: ProviderCapabilities,
	granularity: Granularity,
	now: number,
): number {
	const days = capabilities.retentionDays[granularity];
	if (days === undefined) {
		return Number.NEGATIVE_INFINITY;
	}
	return ceilToPeriod(now - days * DAY_MS, granularity);
}

/**
 * Reject requests the provider cannot serve before any network call.
 *
 * @throws UnsupportedRangeError
 */
export function assertServable(
	provider: string,
	capabilities: ProviderCapabilities,
	request: CandleRequest,
	clock: Clock,
): void {
	if (request.start > request.end) {
		throw new UnsupportedRangeError(provider, "start is after end");
	}
	if (!supportsGranularity(capabilities, request.granularity)) {
		throw new UnsupportedRangeError(provider, `granularity ${request.granularity} not supported`);
	}
	const from = availableFrom(capabilities, request.granularity, request.asOf ?? clock());
	if (request.start < from) {
		throw new UnsupportedRangeError(
			provider,
			`${request.granularity} history starts at ${new Date(from).toISOString()}`,
		);
	}
}

/**
 * Split a currency pair into base and quote (EURUSD → EUR, USD).
 */
export function splitPair(instrument: string): [string, string] {
	return [instrument.slice(0, 3), instrument.slice(3, 6)];
}
