import { describe, expect, it } from "vitest";
import {
	createNodeLogger,
	DEFAULT_REDACT_PATHS,
	levelFromEnv,
	mergeRedactPaths,
	pino,
	redactUrl,
	withRunContext,
} from "../src/index.js";

describe("mergeRedactPaths", () => {
	it("keeps defaults and appends extra paths once", () => {
		const paths = mergeRedactPaths(["custom.field", "apiKey"]);
		expect(paths.length).toBe(DEFAULT_REDACT_PATHS.length + 1);
		expect(paths).toContain("custom.field");
		expect(paths.filter((p) => p === "apiKey")).toHaveLength(1);
	});
});

describe("redactUrl", () => {
	it("masks credential query parameters", () => {
		const url = redactUrl("https://finnhub.io/api/v1/forex/candle?symbol=X&token=test-secret");
		expect(url).toBe("https://finnhub.io/api/v1/forex/candle?symbol=X&token=%5BREDACTED%5D");
	});

	it("leaves urls without secrets untouched", () => {
		expect(redactUrl("https://example.com/a?b=1")).toBe("https://example.com/a?b=1");
	});

	it("returns unparsable input as-is", () => {
		expect(redactUrl("not a url")).toBe("not a url");
	});
});

describe("levelFromEnv", () => {
	it("accepts known levels", () => {
		expect(levelFromEnv("debug")).toBe("debug");
		expect(levelFromEnv("warn")).toBe("warn");
		expect(levelFromEnv("silent")).toBe("silent");
	});

	it("falls back to info", () => {
		expect(levelFromEnv("")).toBe("info");
		expect(levelFromEnv("verbose")).toBe("info");
	});
});

describe("withRunContext", () => {
	it("binds the run fields to every line", () => {
		const lines: string[] = [];
		const base = pino({ base: null, timestamp: false }, { write: (line: string) => lines.push(line) });

		withRunContext(base, { runId: "run-1", stage: "acquire", instrument: "EURUSD", granularity: "1h" }).info(
			"Stage complete",
		);

		expect(JSON.parse(lines[0] ?? "{}")).toEqual({
			level: 30,
			runId: "run-1",
			stage: "acquire",
			instrument: "EURUSD",
			granularity: "1h",
			msg: "Stage complete",
		});
	});
});

describe("createNodeLogger", () => {
	it("resolves flush once the destination has drained", async () => {
		const logger = createNodeLogger({ service: "test", level: "silent", pretty: false });

		await expect(logger.flush()).resolves.toBeUndefined();
	});
});
