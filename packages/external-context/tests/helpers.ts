/**
 * Test Helpers for External Context Package
 */

import { type Article, ArticleSchema } from "@fxline/domain";
import type { NormalizeResult } from "@fxline/marketdata";
import { type Mock, vi } from "vitest";
import type { ArticleCapabilities, ArticleProvider, ArticleRequest } from "../src/types.js";

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

export function createJsonResponse(data: unknown, status = 200): Response {
	return new Response(JSON.stringify(data), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

export function makeArticle(overrides: Partial<Article> & Pick<Article, "publishedAt">): Article {
	return {
		tag: "EURUSD",
		headline: "Euro steady",
		body: "",
		source: "Reuters",
		...overrides,
	};
}

export type ArticleBehavior = (request: ArticleRequest, call: number) => Article[] | Error;

/**
 * In-process article provider recording every request.
 */
export class FakeArticleProvider implements ArticleProvider {
	readonly id = "fake";
	readonly kind = "articles";
	readonly capabilities: ArticleCapabilities = { retentionDays: 30, maxPageSize: 100 };
	readonly calls: ArticleRequest[] = [];

	constructor(private readonly behavior: ArticleBehavior = () => []) {}

	async fetch(request: ArticleRequest): Promise<unknown> {
		const call = this.calls.length;
		this.calls.push(request);
		const result = this.behavior(request, call);
		if (result instanceof Error) {
			throw result;
		}
		return result;
	}

	normalize(raw: unknown): NormalizeResult<Article> {
		return { records: ArticleSchema.array().parse(raw), malformed: 0 };
	}
}
