/**
 * Finnhub Forex Candles Adapter
 *
 * Primary provider. OANDA-routed symbols (OANDA:EUR_USD); intraday history
 * on the free tier is limited to the last 30 days.
 *
 * @see https://finnhub.io/docs/api/forex-candles
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
	splitPair,
} from "./types.js";

// ============================================
// API Configuration
// ============================================

export const FINNHUB_BASE_URL = "https://finnhub.io";

export const FINNHUB_RATE_LIMIT: RateLimitConfig = { maxRequests: 55, intervalMs: 60000 };

const RESOLUTIONS: Partial<Record<Granularity, string>> = {
	"1m": "1",
	"5m": "5",
	"15m": "15",
	"30m": "30",
	"1h": "60",
	"1d": "D",
};

// ============================================
// Response Schemas
// ============================================

const NumberArray = z.array(z.number().nullable());

/**
 * Column-oriented candle response. `s` is "ok" or "no_data".
 */
export const FinnhubCandleResponseSchema = z.object({
	s: z.string(),
	t: NumberArray.optional(),
	o: NumberArray.optional(),
	h: NumberArray.optional(),
	l: NumberArray.optional(),
	c: NumberArray.optional(),
	v: NumberArray.optional(),
});
export type FinnhubCandleResponse = z.infer<typeof FinnhubCandleResponseSchema>;

// ============================================
// Adapter
// ============================================

export interface FinnhubAdapterConfig {
	apiKey: string;
	baseUrl?: string;
	rateLimit?: RateLimitConfig;
	/** Intraday history window in days */
	intradayRetentionDays?: number;
	timeoutMs?: number;
	clock?: Clock;
}

export class FinnhubAdapter implements CandleProvider {
	readonly id = "finnhub";
	readonly kind = "candles";
	readonly capabilities: ProviderCapabilities;
	private client: RestClient;
	private apiKey: string;
	private clock: Clock;

	constructor(config: FinnhubAdapterConfig) {
		this.apiKey = config.apiKey;
		this.clock = config.clock ?? systemClock;
		this.client = createRestClient({
			provider: this.id,
			baseUrl: config.baseUrl ?? FINNHUB_BASE_URL,
			rateLimit: config.rateLimit ?? FINNHUB_RATE_LIMIT,
			timeoutMs: config.timeoutMs,
		});

		const retention = config.intradayRetentionDays ?? 30;
		this.capabilities = {
			granularities: ["1m", "5m", "15m", "30m", "1h", "1d"],
			retentionDays: { "1m": retention, "5m": retention, "15m": retention, "30m": retention, "1h": retention },
			maxSpanMs: { "1m": 7 * DAY_MS },
		};
	}

	async fetch(request: CandleRequest, signal?: AbortSignal): Promise<FinnhubCandleResponse> {
		assertServable(this.id, this.capabilities, request, this.clock);

		const [base, quote] = splitPair(request.instrument);
		return this.client.get("/api/v1/forex/candle", FinnhubCandleResponseSchema, {
			params: {
				symbol: `OANDA:${base}_${quote}`,
				resolution: RESOLUTIONS[request.granularity],
				from: Math.floor(request.start / 1000),
				// `to` is inclusive on Finnhub's side
				to: Math.floor((request.end - 1) / 1000),
				token: this.apiKey,
			},
			signal,
		});
	}

	normalize(raw: unknown, request: CandleRequest): NormalizeResult<Candle> {
		const parsed = FinnhubCandleResponseSchema.safeParse(raw);
		if (!parsed.success) {
			throw new MalformedResponseError(this.id, "Unexpected candle response", parsed.error);
		}
		const data = parsed.data;

		if (data.s === "no_data") {
			return { records: [], malformed: 0 };
		}
		if (data.s !== "ok") {
			throw new MalformedResponseError(this.id, `Unexpected status "${data.s}"`);
		}

		const t = data.t ?? [];
		const { o = [], h = [], l = [], c = [], v } = data;
		if ([o, h, l, c].some((column) => column.length !== t.length)) {
			throw new MalformedResponseError(this.id, "Candle columns differ in length");
		}

		let malformed = 0;
		const bars: RawBar[] = [];
		for (let i = 0; i < t.length; i++) {
			const ts = t[i];
			const open = o[i];
			const high = h[i];
			const low = l[i];
			const close = c[i];
			if (ts == null || open == null || high == null || low == null || close == null) {
				malformed++;
				continue;
			}
			bars.push({ timestamp: ts * 1000, open, high, low, close, volume: v?.[i] ?? null });
		}

		const result = barsToCandles(this.id, request, bars);
		return { records: result.records, malformed: result.malformed + malformed };
	}
}
