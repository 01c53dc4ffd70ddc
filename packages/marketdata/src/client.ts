/**
 * Base REST Client with Rate Limiting and Error Classification
 *
 * HTTP foundation for every provider adapter.
 * - Rate limiting (token bucket, one per client instance)
 * - Bounded timeout per call
 * - Failures mapped onto the pipeline error taxonomy
 *
 * Retries are not done here. The source orchestrator owns retry and
 * fallback decisions through the per-request RetryBudget.
 */

import {
	AuthenticationError,
	errorMessage,
	MalformedResponseError,
	RateLimitedError,
	UnavailableError,
} from "@fxline/domain";
import { redactUrl } from "@fxline/logger";
import { z } from "zod";
import { log } from "./logger.js";

// ============================================
// Types
// ============================================

/**
 * Rate limiter configuration.
 */
export interface RateLimitConfig {
	/** Maximum requests per interval */
	maxRequests: number;
	/** Interval in milliseconds */
	intervalMs: number;
}

/**
 * Client configuration.
 */
export interface ClientConfig {
	/** Provider id used in error messages and logs */
	provider: string;
	/** Base URL for the API */
	baseUrl: string;
	/** Rate limiting configuration */
	rateLimit?: RateLimitConfig;
	/** Request timeout in milliseconds */
	timeoutMs?: number;
	/** Additional headers */
	headers?: Record<string, string>;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Request options.
 */
export interface RequestOptions {
	/** Query parameters */
	params?: QueryParams;
	/** Additional headers */
	headers?: Record<string, string>;
	/** Override timeout */
	timeoutMs?: number;
	/** Caller cancellation, combined with the timeout */
	signal?: AbortSignal;
}

// ============================================
// Default Configuration
// ============================================

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
	maxRequests: 60,
	intervalMs: 60000,
};

export const DEFAULT_TIMEOUT_MS = 20000;

// ============================================
// Rate Limiter
// ============================================

/**
 * Token bucket rate limiter.
 */
export class RateLimiter {
	private tokens: number;
	private lastRefill: number;

	constructor(private config: RateLimitConfig) {
		this.tokens = config.maxRequests;
		this.lastRefill = Date.now();
	}

	/**
	 * Acquire a token for making a request.
	 * Returns immediately if tokens are available, otherwise waits.
	 */
	async acquire(): Promise<void> {
		this.refill();

		if (this.tokens > 0) {
			this.tokens--;
			return;
		}

		// Wait until next refill
		const waitTime = this.config.intervalMs - (Date.now() - this.lastRefill);
		if (waitTime > 0) {
			log.debug({ waitMs: waitTime }, "Rate limiter waiting for refill");
			await this.sleep(waitTime);
		}
		this.refill();

		this.tokens--;
	}

	private refill(): void {
		const now = Date.now();
		const elapsed = now - this.lastRefill;

		if (elapsed >= this.config.intervalMs) {
			this.tokens = this.config.maxRequests;
			this.lastRefill = now;
		}
	}

	private sleep(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}
}

// ============================================
// Base REST Client
// ============================================

/**
 * Base REST client. Every failure surfaces as a ProviderError subclass.
 */
export class RestClient {
	readonly provider: string;
	private rateLimiter?: RateLimiter;
	private config: Required<Pick<ClientConfig, "baseUrl" | "timeoutMs">> & ClientConfig;

	constructor(config: ClientConfig) {
		this.provider = config.provider;
		this.config = {
			...config,
			timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
		};

		if (config.rateLimit) {
			this.rateLimiter = new RateLimiter(config.rateLimit);
		}
	}

	/**
	 * GET a JSON document and validate it against a schema.
	 *
	 * @throws RateLimitedError on HTTP 429
	 * @throws AuthenticationError on HTTP 401/403
	 * @throws UnavailableError on 5xx, other HTTP errors, network failure or timeout
	 * @throws MalformedResponseError when the body is not JSON or fails the schema
	 */
	async get<S extends z.ZodTypeAny>(path: string, schema: S, options: RequestOptions = {}): Promise<z.output<S>> {
		const data = await this.getJson(path, options);
		const result = schema.safeParse(data);
		if (!result.success) {
			throw new MalformedResponseError(
				this.provider,
				`Unexpected response shape: ${result.error.issues[0]?.message ?? "invalid"}`,
				result.error,
			);
		}
		return result.data;
	}

	/**
	 * GET a JSON document without validation.
	 */
	async getJson(path: string, options: RequestOptions = {}): Promise<unknown> {
		const url = this.buildUrl(path, options.params);
		const headers = this.buildHeaders(options.headers);
		const timeout = options.timeoutMs ?? this.config.timeoutMs;

		if (this.rateLimiter) {
			await this.rateLimiter.acquire();
		}

		const startTime = Date.now();
		log.debug({ provider: this.provider, url: redactUrl(url), timeout }, "Provider API request");

		const response = await this.executeRequest(url, headers, timeout, options.signal);

		let data: unknown;
		try {
			data = await response.json();
		} catch (error) {
			throw new MalformedResponseError(this.provider, "Response body is not JSON", error);
		}

		log.debug(
			{ provider: this.provider, status: response.status, latencyMs: Date.now() - startTime },
			"Provider API response",
		);
		return data;
	}

	/**
	 * Execute the actual HTTP request.
	 */
	private async executeRequest(
		url: string,
		headers: Record<string, string>,
		timeout: number,
		signal?: AbortSignal,
	): Promise<Response> {
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), timeout);
		const onAbort = () => controller.abort();
		signal?.addEventListener("abort", onAbort, { once: true });

		try {
			let response: Response;
			try {
				response = await fetch(url, {
					method: "GET",
					headers,
					signal: controller.signal,
				});
			} catch (error) {
				throw this.classifyNetworkError(error);
			}

			if (!response.ok) {
				const body = await response.text().catch(() => "");
				throw this.classifyHttpError(response, body);
			}

			return response;
		} finally {
			clearTimeout(timeoutId);
			signal?.removeEventListener("abort", onAbort);
		}
	}

	/**
	 * Build the full URL with query parameters.
	 */
	private buildUrl(path: string, params?: QueryParams): string {
		const url = new URL(path, this.config.baseUrl);

		if (params) {
			for (const [key, value] of Object.entries(params)) {
				if (value !== undefined) {
					url.searchParams.set(key, String(value));
				}
			}
		}

		return url.toString();
	}

	/**
	 * Build request headers.
	 */
	private buildHeaders(additional?: Record<string, string>): Record<string, string> {
		return {
			Accept: "application/json",
			...this.config.headers,
			...additional,
		};
	}

	private classifyNetworkError(error: unknown): UnavailableError {
		if (error instanceof Error && error.name === "AbortError") {
			return new UnavailableError(this.provider, "Request timed out", { cause: error });
		}
		return new UnavailableError(this.provider, `Network error: ${errorMessage(error)}`, { cause: error });
	}

	private classifyHttpError(response: Response, body: string): Error {
		const status = response.status;
		const detail = body.slice(0, 200) || response.statusText;

		if (status === 429) {
			return new RateLimitedError(this.provider, `HTTP 429: ${detail}`, parseRetryAfter(response));
		}
		if (status === 401 || status === 403) {
			return new AuthenticationError(this.provider, `HTTP ${status}: ${detail}`);
		}
		return new UnavailableError(this.provider, `HTTP ${status}: ${detail}`, { status });
	}
}

/**
 * Retry-After in milliseconds (delta-seconds form only).
 */
export function parseRetryAfter(response: Response): number | undefined {
	const header = response.headers.get("retry-after");
	if (!header) {
		return undefined;
	}
	const seconds = Number(header);
	return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a REST client with configuration.
 */
export function createRestClient(config: ClientConfig): RestClient {
	return new RestClient(config);
}
