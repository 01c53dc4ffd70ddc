/**
 * Yahoo Finance Chart Adapter
 *
 * Last-resort fallback. Unauthenticated; intraday lookback depends on the
 * interval and 4h bars are not offered.
 */

import {
	type Candle,
	type Clock,
	DAY_MS,
	type Granularity,
	MalformedResponseError,
	systemClock,
} from "@fxline/domain";
import { z } from "zod";
import { createRestClient, type RateLimitConfig, type RestClient } from "../client.js";
import { barsToCandles, type RawBar } from "./normalize.js";
import {
	assertServable,
	type CandleProvider,
	type CandleRequest,
	type NormalizeResult,
	type ProviderCapabilities,
} from "./types.js";

// ============================================
// API Configuration
// ============================================

export const YAHOO_BASE_URL = "https://query1.finance.yahoo.com";

export const YAHOO_RATE_LIMIT: RateLimitConfig = { maxRequests: 30, intervalMs: 60000 };

const INTERVALS: Partial<Record<Granularity, string>> = {
	"1m": "1m",
	"5m": "5m",
	"15m": "15m",
	"30m": "30m",
	"1h": "60m",
	"1d": "1d",
};

export const YAHOO_CAPABILITIES: ProviderCapabilities = {
	granularities: ["1m", "5m", "15m", "30m", "1h", "1d"],
	retentionDays: { "1m": 7, "5m": 60, "15m": 60, "30m": 60, "1h": 730 },
	maxSpanMs: { "1m": 7 * DAY_MS },
};

// ============================================
// Response Schemas
// ============================================

const NullableNumbers = z.array(z.number().nullable());

const ChartResultSchema = z.object({
	timestamp: z.array(z.number()).optional(),
	indicators: z.object({
		quote: z
			.array(
				z.object({
					open: NullableNumbers.optional(),
					high: NullableNumbers.optional(),
					low: NullableNumbers.optional(),
					close: NullableNumbers.optional(),
					volume: NullableNumbers.optional(),
				}),
			)
			.min(1),
	}),
});

export const YahooChartResponseSchema = z.object({
	chart: z.object({
		result: z.array(ChartResultSchema).nullable(),
		error: z.object({ code: z.string(), description: z.string().nullable().optional() }).nullable(),
	}),
});
export type YahooChartResponse = z.infer<typeof YahooChartResponseSchema>;

// ============================================
// Adapter
// ============================================

export interface YahooAdapterConfig {
	baseUrl?: string;
	rateLimit?: RateLimitConfig;
	/** Replaces the per-interval intraday lookback for every intraday granularity */
	intradayRetentionDays?: number;
	timeoutMs?: number;
	clock?: Clock;
}

export class YahooFinanceAdapter implements CandleProvider {
	readonly id = "yahoo";
	readonly kind = "candles";
	readonly capabilities: ProviderCapabilities;
	private client: RestClient;
	private clock: Clock;

	constructor(config: YahooAdapterConfig = {}) {
		this.clock = config.clock ?? systemClock;
		const retention = config.intradayRetentionDays;
		this.capabilities =
			retention === undefined
				? YAHOO_CAPABILITIES
				: {
						...YAHOO_CAPABILITIES,
						retentionDays: { "1m": retention, "5m": retention, "15m": retention, "30m": retention, "1h": retention },
					};
		this.client = createRestClient({
			provider: this.id,
			baseUrl: config.baseUrl ?? YAHOO_BASE_URL,
			rateLimit: config.rateLimit ?? YAHOO_RATE_LIMIT,
			timeoutMs: config.timeoutMs,
			headers: { "User-Agent": "Mozilla/5.0 (compatible; fxline)" },
		});
	}

	async fetch(request: CandleRequest, signal?: AbortSignal): Promise<YahooChartResponse> {
		assertServable(this.id, this.capabilities, request, this.clock);

		return this.client.get(`/v8/finance/chart/${request.instrument}=X`, YahooChartResponseSchema, {
			params: {
				period1: Math.floor(request.start / 1000),
				period2: Math.floor(request.end / 1000),
				interval: INTERVALS[request.granularity],
			},
			signal,
		});
	}

	normalize(raw: unknown, request: CandleRequest): NormalizeResult<Candle> {
		const parsed = YahooChartResponseSchema.safeParse(raw);
		if (!parsed.success) {
			throw new MalformedResponseError(this.id, "Unexpected chart response", parsed.error);
		}
		const { result, error } = parsed.data.chart;
		if (error) {
			throw new MalformedResponseError(this.id, `${error.code}: ${error.description ?? ""}`.trim());
		}

		const chart = result?.[0];
		const timestamps = chart?.timestamp ?? [];
		const quote = chart?.indicators.quote[0];
		if (!quote || timestamps.length === 0) {
			return { records: [], malformed: 0 };
		}

		let malformed = 0;
		const bars: RawBar[] = [];
		for (let i = 0; i < timestamps.length; i++) {
			const ts = timestamps[i];
			const open = quote.open?.[i];
			const high = quote.high?.[i];
			const low = quote.low?.[i];
			const close = quote.close?.[i];
			if (ts === undefined || open == null || high == null || low == null || close == null) {
				malformed++;
				continue;
			}
			const ms = ts * 1000;
			bars.push({
				timestamp: request.granularity === "1d" ? roundToUtcMidnight(ms) : ms,
				open,
				high,
				low,
				close,
				// FX volume is always reported as 0
				volume: quote.volume?.[i] || null,
			});
		}

		const normalized = barsToCandles(this.id, request, bars);
		return { records: normalized.records, malformed: normalized.malformed + malformed };
	}
}

/**
 * Daily FX bars are stamped at the London or New York midnight; move them
 * to the nearest UTC midnight.
 */
export function roundToUtcMidnight(timestamp: number): number {
	return Math.round(timestamp / DAY_MS) * DAY_MS;
}
