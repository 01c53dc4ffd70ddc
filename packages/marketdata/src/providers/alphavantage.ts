/**
 * Alpha Vantage FX Adapter
 *
 * Secondary intraday provider (FX_INTRADAY) and daily history (FX_DAILY).
 * Throttling and errors arrive as HTTP 200 bodies with a "Note",
 * "Information" or "Error Message" key instead of a time series.
 *
 * @see https://www.alphavantage.co/documentation/#fx
 */

import {
	AuthenticationError,
	type Candle,
	type Clock,
	type Granularity,
	MalformedResponseError,
	RateLimitedError,
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
	splitPair,
} from "./types.js";

// ============================================
// API Configuration
// ============================================

export const ALPHA_VANTAGE_BASE_URL = "https://www.alphavantage.co";

/**
 * Alpha Vantage rate limits.
 */
export const ALPHA_VANTAGE_RATE_LIMITS: Record<"free" | "premium", RateLimitConfig> = {
	free: { maxRequests: 5, intervalMs: 60000 },
	premium: { maxRequests: 75, intervalMs: 60000 },
};

const INTRADAY_INTERVALS: Partial<Record<Granularity, string>> = {
	"1m": "1min",
	"5m": "5min",
	"15m": "15min",
	"30m": "30min",
	"1h": "60min",
};

// ============================================
// Response Schemas
// ============================================

export const AlphaVantageBarSchema = z.object({
	"1. open": z.string(),
	"2. high": z.string(),
	"3. low": z.string(),
	"4. close": z.string(),
});
export type AlphaVantageBar = z.infer<typeof AlphaVantageBarSchema>;

/**
 * Top-level body: one "Time Series FX (...)" key, or a message key.
 */
export const AlphaVantageResponseSchema = z.record(z.string(), z.unknown());

const TimeSeriesSchema = z.record(z.string(), z.unknown());

// ============================================
// Adapter
// ============================================

export interface AlphaVantageAdapterConfig {
	apiKey: string;
	baseUrl?: string;
	/** Subscription tier for rate limiting */
	tier?: "free" | "premium";
	rateLimit?: RateLimitConfig;
	intradayRetentionDays?: number;
	timeoutMs?: number;
	clock?: Clock;
}

export class AlphaVantageAdapter implements CandleProvider {
	readonly id = "alphavantage";
	readonly kind = "candles";
	readonly capabilities: ProviderCapabilities;
	private client: RestClient;
	private apiKey: string;
	private clock: Clock;

	constructor(config: AlphaVantageAdapterConfig) {
		this.apiKey = config.apiKey;
		this.clock = config.clock ?? systemClock;
		this.client = createRestClient({
			provider: this.id,
			baseUrl: config.baseUrl ?? ALPHA_VANTAGE_BASE_URL,
			rateLimit: config.rateLimit ?? ALPHA_VANTAGE_RATE_LIMITS[config.tier ?? "free"],
			timeoutMs: config.timeoutMs,
		});

		const retention = config.intradayRetentionDays ?? 30;
		this.capabilities = {
			granularities: ["1m", "5m", "15m", "30m", "1h", "1d"],
			retentionDays: { "1m": retention, "5m": retention, "15m": retention, "30m": retention, "1h": retention },
			maxSpanMs: {},
		};
	}

	async fetch(request: CandleRequest, signal?: AbortSignal): Promise<Record<string, unknown>> {
		assertServable(this.id, this.capabilities, request, this.clock);

		const [base, quote] = splitPair(request.instrument);
		const interval = INTRADAY_INTERVALS[request.granularity];
		const params =
			interval === undefined
				? { function: "FX_DAILY", from_symbol: base, to_symbol: quote, outputsize: "full", apikey: this.apiKey }
				: {
						function: "FX_INTRADAY",
						from_symbol: base,
						to_symbol: quote,
						interval,
						outputsize: "full",
						apikey: this.apiKey,
					};

		const body = await this.client.get("/query", AlphaVantageResponseSchema, { params, signal });
		this.checkMessages(body);
		return body;
	}

	normalize(raw: unknown, request: CandleRequest): NormalizeResult<Candle> {
		const parsed = AlphaVantageResponseSchema.safeParse(raw);
		if (!parsed.success) {
			throw new MalformedResponseError(this.id, "Response is not an object", parsed.error);
		}
		this.checkMessages(parsed.data);

		const seriesKey = Object.keys(parsed.data).find((key) => key.startsWith("Time Series FX"));
		if (seriesKey === undefined) {
			throw new MalformedResponseError(this.id, "No time series in response");
		}
		const series = TimeSeriesSchema.safeParse(parsed.data[seriesKey]);
		if (!series.success) {
			throw new MalformedResponseError(this.id, `"${seriesKey}" is not an object`, series.error);
		}

		let malformed = 0;
		const bars: RawBar[] = [];
		for (const [time, value] of Object.entries(series.data)) {
			const bar = AlphaVantageBarSchema.safeParse(value);
			const timestamp = parseAlphaVantageTime(time);
			if (!bar.success || timestamp === null) {
				malformed++;
				continue;
			}
			bars.push({
				timestamp,
				open: Number(bar.data["1. open"]),
				high: Number(bar.data["2. high"]),
				low: Number(bar.data["3. low"]),
				close: Number(bar.data["4. close"]),
				volume: null,
			});
		}

		const result = barsToCandles(this.id, request, bars);
		return { records: result.records, malformed: result.malformed + malformed };
	}

	/**
	 * @throws RateLimitedError on "Note" / "Information"
	 * @throws AuthenticationError when the error message names the API key
	 * @throws MalformedResponseError on any other "Error Message"
	 */
	private checkMessages(body: Record<string, unknown>): void {
		const note = body.Note ?? body.Information;
		if (typeof note === "string") {
			throw new RateLimitedError(this.id, note);
		}
		const error = body["Error Message"];
		if (typeof error === "string") {
			if (/api ?key/i.test(error)) {
				throw new AuthenticationError(this.id, error);
			}
			throw new MalformedResponseError(this.id, error);
		}
	}
}

/**
 * "2024-01-05 21:55:00" or "2024-01-05", both UTC.
 */
export function parseAlphaVantageTime(value: string): number | null {
	const match = /^(\d{4}-\d{2}-\d{2})(?: (\d{2}:\d{2}(?::\d{2})?))?$/.exec(value);
	if (!match) {
		return null;
	}
	const iso = `${match[1]}T${match[2] ?? "00:00:00"}Z`;
	const ts = Date.parse(iso);
	return Number.isNaN(ts) ? null : ts;
}
