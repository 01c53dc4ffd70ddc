import { describe, expect, it } from "vitest";
import {
	AllProvidersFailedError,
	AuthenticationError,
	ConfigError,
	isFatalError,
	isProviderError,
	MalformedResponseError,
	RateLimitedError,
	UnavailableError,
	UnsupportedRangeError,
} from "./errors.js";

describe("provider errors", () => {
	it("carries provider, code and retryability", () => {
		const error = new RateLimitedError("finnhub", "429 Too Many Requests", 2000);
		expect(error.provider).toBe("finnhub");
		expect(error.code).toBe("RATE_LIMITED");
		expect(error.retryable).toBe(true);
		expect(error.retryAfterMs).toBe(2000);
		expect(error.message).toBe("[finnhub] 429 Too Many Requests");
		expect(error.name).toBe("RateLimitedError");
	});

	it("marks range and shape failures as non-retryable", () => {
		expect(new UnsupportedRangeError("yahoo", "too old").retryable).toBe(false);
		expect(new MalformedResponseError("yahoo", "bad").retryable).toBe(false);
		expect(new UnavailableError("yahoo", "timeout").retryable).toBe(true);
	});

	it("serializes to JSON with the provider", () => {
		expect(new AuthenticationError("newsapi").toJSON()).toEqual({
			name: "AuthenticationError",
			message: "[newsapi] Authentication failed",
			code: "AUTHENTICATION_FAILURE",
			retryable: false,
			provider: "newsapi",
		});
	});
});

describe("isFatalError", () => {
	it("treats authentication, exhaustion and config errors as fatal", () => {
		expect(isFatalError(new AuthenticationError("finnhub"))).toBe(true);
		expect(isFatalError(new AllProvidersFailedError("none left", []))).toBe(true);
		expect(isFatalError(new ConfigError("bad config"))).toBe(true);
	});

	it("treats recoverable provider errors as non-fatal", () => {
		expect(isFatalError(new RateLimitedError("finnhub"))).toBe(false);
		expect(isFatalError(new Error("boom"))).toBe(false);
	});

	it("recognizes provider errors", () => {
		expect(isProviderError(new UnavailableError("x", "down"))).toBe(true);
		expect(isProviderError(new ConfigError("x"))).toBe(false);
	});
});
