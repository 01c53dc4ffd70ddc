/**
 * NewsAPI Adapter
 *
 * Searches the `everything` endpoint for one window at a time. The free
 * plan only reaches back 30 days and caps a page at 100 articles.
 *
 * @see https://newsapi.org/docs/endpoints/everything
 */

import {
	type Article,
	AuthenticationError,
	type Clock,
	DAY_MS,
	MalformedResponseError,
	RateLimitedError,
	systemClock,
	UnavailableError,
	UnsupportedRangeError,
} from "@fxline/domain";
import { createRestClient, type NormalizeResult, type RateLimitConfig, type RestClient } from "@fxline/marketdata";
import { z } from "zod";
import { parseNewsArticles } from "../parsers/newsParser.js";
import type { ArticleCapabilities, ArticleProvider, ArticleRequest } from "../types.js";

// ============================================
// API Configuration
// ============================================

export const NEWSAPI_BASE_URL = "https://newsapi.org";

export const NEWSAPI_RATE_LIMIT: RateLimitConfig = { maxRequests: 1, intervalMs: 1000 };

export const NEWSAPI_CAPABILITIES: ArticleCapabilities = {
	retentionDays: 30,
	maxPageSize: 100,
};

const AUTH_ERROR_CODES = new Set(["apiKeyDisabled", "apiKeyExhausted", "apiKeyInvalid", "apiKeyMissing"]);

// ============================================
// Response Schemas
// ============================================

export const NewsApiResponseSchema = z.object({
	status: z.string(),
	totalResults: z.number().optional(),
	articles: z.array(z.unknown()).optional(),
	code: z.string().optional(),
	message: z.string().optional(),
});
export type NewsApiResponse = z.infer<typeof NewsApiResponseSchema>;

// ============================================
// Adapter
// ============================================

export interface NewsApiAdapterConfig {
	apiKey: string;
	baseUrl?: string;
	rateLimit?: RateLimitConfig;
	retentionDays?: number;
	pageSize?: number;
	timeoutMs?: number;
	clock?: Clock;
}

export class NewsApiAdapter implements ArticleProvider {
	readonly id = "newsapi";
	readonly kind = "articles";
	readonly capabilities: ArticleCapabilities;
	private client: RestClient;
	private clock: Clock;
	private pageSize: number;

	constructor(config: NewsApiAdapterConfig) {
		this.clock = config.clock ?? systemClock;
		this.capabilities = {
			...NEWSAPI_CAPABILITIES,
			retentionDays: config.retentionDays ?? NEWSAPI_CAPABILITIES.retentionDays,
		};
		this.pageSize = Math.min(config.pageSize ?? NEWSAPI_CAPABILITIES.maxPageSize, this.capabilities.maxPageSize);
		this.client = createRestClient({
			provider: this.id,
			baseUrl: config.baseUrl ?? NEWSAPI_BASE_URL,
			rateLimit: config.rateLimit ?? NEWSAPI_RATE_LIMIT,
			timeoutMs: config.timeoutMs,
			headers: { "X-Api-Key": config.apiKey },
		});
	}

	/**
	 * Earliest instant the provider still searches.
	 */
	availableFrom(): number {
		return this.clock() - this.capabilities.retentionDays * DAY_MS;
	}

	async fetch(request: ArticleRequest, signal?: AbortSignal): Promise<NewsApiResponse> {
		if (request.start >= request.end) {
			throw new UnsupportedRangeError(this.id, "start is not before end");
		}
		const from = this.availableFrom();
		if (request.end <= from) {
			throw new UnsupportedRangeError(this.id, `history starts at ${new Date(from).toISOString()}`);
		}

		const body = await this.client.get("/v2/everything", NewsApiResponseSchema, {
			params: {
				q: request.query,
				// A window straddling the retention edge is searched from the edge
				from: new Date(Math.max(request.start, from)).toISOString(),
				to: new Date(request.end).toISOString(),
				language: "en",
				sortBy: "relevancy",
				page: 1,
				pageSize: this.pageSize,
			},
			signal,
		});
		this.checkStatus(body);
		return body;
	}

	normalize(raw: unknown, request: ArticleRequest): NormalizeResult<Article> {
		const parsed = NewsApiResponseSchema.safeParse(raw);
		if (!parsed.success) {
			throw new MalformedResponseError(this.id, "Unexpected search response", parsed.error);
		}
		this.checkStatus(parsed.data);

		const result = parseNewsArticles(parsed.data.articles ?? [], request.tag);
		// `to` is inclusive on the provider side
		const records = result.records.filter((a) => a.publishedAt >= request.start && a.publishedAt < request.end);
		return { records, malformed: result.malformed };
	}

	private checkStatus(body: NewsApiResponse): void {
		if (body.status === "ok") {
			return;
		}
		const code = body.code ?? "unknown";
		const message = body.message ?? code;
		if (AUTH_ERROR_CODES.has(code)) {
			throw new AuthenticationError(this.id, message);
		}
		if (code === "rateLimited") {
			throw new RateLimitedError(this.id, message);
		}
		if (code === "unexpectedError") {
			throw new UnavailableError(this.id, message);
		}
		throw new MalformedResponseError(this.id, `${code}: ${message}`);
	}
}
