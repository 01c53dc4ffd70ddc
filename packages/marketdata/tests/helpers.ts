/**
 * Test Helpers for Marketdata Package
 */

import {
	type Candle,
	CandleSchema,
	type Clock,
	expectedPeriods,
	type Granularity,
	type SessionCalendar,
} from "@fxline/domain";
import { type Mock, vi } from "vitest";
import {
	assertServable,
	type CandleProvider,
	type CandleRequest,
	type NormalizeResult,
	type ProviderCapabilities,
} from "../src/providers/types.js";

// ============================================
// fetch mocking
// ============================================

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type MockFetch = Mock<FetchFn>;

/**
 * Replace global fetch for the current test. Undo with vi.unstubAllGlobals().
 */
export function installMockFetch(implementation: (url: string) => Promise<Response> | Response): MockFetch {
	const mockFetch = vi.fn<FetchFn>(async (input) => implementation(String(input)));
	vi.stubGlobal("fetch", mockFetch);
	return mockFetch;
}

/**
 * Create a mock JSON response.
 */
export function createJsonResponse(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
	return new Response(JSON.stringify(data), {
		status,
		headers: { "Content-Type": "application/json", ...headers },
	});
}

/**
 * Get the URL from a mock fetch call.
 * Throws if the call doesn't exist.
 */
export function getMockCallUrl(mockFetch: MockFetch, callIndex = 0): URL {
	const call = mockFetch.mock.calls[callIndex];
	if (!call) {
		throw new Error(`Expected mock fetch to have call at index ${callIndex}`);
	}
	return new URL(String(call[0]));
}

// ============================================
// Fake providers
// ============================================

export function makeCandle(overrides: Partial<Candle> & Pick<Candle, "timestamp">): Candle {
	return {
		instrument: "EURUSD",
		granularity: "1h",
		open: 1.1,
		high: 1.11,
		low: 1.09,
		close: 1.105,
		volume: null,
		source: "test",
		...overrides,
	};
}

/**
 * One candle per expected period of the request.
 */
export function generateCandles(
	request: CandleRequest,
	source: string,
	calendar: SessionCalendar = "fx",
	price = 1.1,
): Candle[] {
	return expectedPeriods(request.start, request.end, request.granularity, calendar).map((timestamp) =>
		makeCandle({
			instrument: request.instrument,
			granularity: request.granularity,
			timestamp,
			open: price,
			high: price + 0.001,
			low: price - 0.001,
			close: price,
			source,
		}),
	);
}

export type FakeBehavior = (request: CandleRequest, call: number) => Candle[] | Error | undefined;

export interface FakeProviderOptions {
	id: string;
	clock: Clock;
	/** Intraday history window; absent means unlimited */
	retentionDays?: number;
	granularities?: Granularity[];
	maxSpanMs?: number;
	/** Returned candles (undefined = one per expected period) or an error to throw */
	behavior?: FakeBehavior;
	/** Malformed rows reported by every normalize call */
	malformedPerCall?: number;
	price?: number;
}

/**
 * In-process candle provider with the adapter contract and retention checks.
 */
export class FakeCandleProvider implements CandleProvider {
	readonly kind = "candles";
	readonly id: string;
	readonly capabilities: ProviderCapabilities;
	readonly calls: CandleRequest[] = [];

	constructor(private readonly options: FakeProviderOptions) {
		this.id = options.id;
		const granularities: Granularity[] = options.granularities ?? ["1m", "5m", "15m", "30m", "1h", "1d"];
		const retentionDays: Partial<Record<Granularity, number>> = {};
		const maxSpanMs: Partial<Record<Granularity, number>> = {};
		for (const g of granularities) {
			if (options.retentionDays !== undefined && g !== "1d") {
				retentionDays[g] = options.retentionDays;
			}
			if (options.maxSpanMs !== undefined) {
				maxSpanMs[g] = options.maxSpanMs;
			}
		}
		this.capabilities = { granularities, retentionDays, maxSpanMs };
	}

	async fetch(request: CandleRequest): Promise<unknown> {
		assertServable(this.id, this.capabilities, request, this.options.clock);
		const call = this.calls.length;
		this.calls.push(request);
		const result = this.options.behavior?.(request, call);
		if (result instanceof Error) {
			throw result;
		}
		return result ?? generateCandles(request, this.id, "fx", this.options.price);
	}

	normalize(raw: unknown): NormalizeResult<Candle> {
		return { records: CandleSchema.array().parse(raw), malformed: this.options.malformedPerCall ?? 0 };
	}
}
