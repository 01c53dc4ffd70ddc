/**
 * Base REST Client Tests
 */

import {
	AuthenticationError,
	MalformedResponseError,
	RateLimitedError,
	UnavailableError,
} from "@fxline/domain";
import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createRestClient, RateLimiter } from "../src/client.js";
import { createJsonResponse, getMockCallUrl, installMockFetch } from "./helpers.js";

// ============================================
// Tests
// ============================================

describe("RateLimiter", () => {
	it("allows requests within limit", async () => {
		const limiter = new RateLimiter({ maxRequests: 5, intervalMs: 1000 });
		const startTime = Date.now();

		for (let i = 0; i < 5; i++) {
			await limiter.acquire();
		}

		expect(Date.now() - startTime).toBeLessThan(500);
	});

	it("blocks when limit exceeded", async () => {
		const limiter = new RateLimiter({ maxRequests: 2, intervalMs: 100 });
		const startTime = Date.now();

		await limiter.acquire();
		await limiter.acquire();
		// Third should wait for the refill
		await limiter.acquire();

		expect(Date.now() - startTime).toBeGreaterThanOrEqual(90);
	});
});

describe("RestClient", () => {
	const schema = z.object({ value: z.number() });
	const client = createRestClient({ provider: "test", baseUrl: "https://api.example.com" });

	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it("builds the URL and validates the body", async () => {
		const mockFetch = installMockFetch(() => createJsonResponse({ value: 42 }));

		const result = await client.get("/v1/data", schema, { params: { a: "x", b: 2, skip: undefined } });

		expect(result).toEqual({ value: 42 });
		const url = getMockCallUrl(mockFetch);
		expect(url.pathname).toBe("/v1/data");
		expect(url.searchParams.get("a")).toBe("x");
		expect(url.searchParams.get("b")).toBe("2");
		expect(url.searchParams.has("skip")).toBe(false);
	});

	it("maps HTTP 429 to RateLimitedError with the Retry-After hint", async () => {
		installMockFetch(() => createJsonResponse({ error: "slow down" }, 429, { "Retry-After": "2" }));

		const error = await client.get("/v1/data", schema).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(RateLimitedError);
		if (error instanceof RateLimitedError) {
			expect(error.retryAfterMs).toBe(2000);
			expect(error.provider).toBe("test");
		}
	});

	it("maps HTTP 401 and 403 to AuthenticationError", async () => {
		installMockFetch(() => new Response("Invalid API key", { status: 401 }));
		await expect(client.get("/v1/data", schema)).rejects.toBeInstanceOf(AuthenticationError);

		installMockFetch(() => new Response("Forbidden", { status: 403 }));
		await expect(client.get("/v1/data", schema)).rejects.toThrow("[test] HTTP 403: Forbidden");
	});

	it("maps server errors to UnavailableError", async () => {
		installMockFetch(() => new Response("upstream down", { status: 503 }));

		const error = await client.get("/v1/data", schema).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(UnavailableError);
		if (error instanceof UnavailableError) {
			expect(error.status).toBe(503);
			expect(error.retryable).toBe(true);
		}
	});

	it("maps network failures to UnavailableError", async () => {
		installMockFetch(() => Promise.reject(new TypeError("fetch failed")));

		await expect(client.get("/v1/data", schema)).rejects.toThrow("[test] Network error: fetch failed");
	});

	it("maps a timeout to UnavailableError", async () => {
		vi.stubGlobal(
			"fetch",
			vi.fn(
				(_input: string, init?: RequestInit) =>
					new Promise<Response>((_, reject) => {
						init?.signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")));
					}),
			),
		);

		await expect(client.get("/v1/data", schema, { timeoutMs: 10 })).rejects.toThrow("[test] Request timed out");
	});

	it("rejects bodies that fail the schema or are not JSON", async () => {
		installMockFetch(() => createJsonResponse({ value: "nope" }));
		await expect(client.get("/v1/data", schema)).rejects.toBeInstanceOf(MalformedResponseError);

		installMockFetch(() => new Response("<html>", { status: 200 }));
		await expect(client.get("/v1/data", schema)).rejects.toThrow("[test] Response body is not JSON");
	});
});
