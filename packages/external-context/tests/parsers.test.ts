/**
 * Parser Tests
 */

import { describe, expect, it } from "vitest";
import { cleanText, parseNewsArticles, stripTruncationMarker } from "../src/parsers/index.js";

describe("News Parser", () => {
	it("should parse a NewsAPI article into an Article", () => {
		const result = parseNewsArticles(
			[
				{
					source: { id: null, name: "Reuters" },
					author: null,
					title: "ECB holds &amp; signals <b>caution</b>",
					description: "Rates   unchanged… [+1200 chars]",
					url: "https://example.com/ecb",
					publishedAt: "2024-03-14T10:15:00Z",
					content: null,
				},
			],
			"EURUSD",
		);

		expect(result).toEqual({
			records: [
				{
					tag: "EURUSD",
					publishedAt: Date.UTC(2024, 2, 14, 10, 15),
					headline: "ECB holds & signals caution",
					body: "Rates unchanged",
					source: "Reuters",
					url: "https://example.com/ecb",
				},
			],
			malformed: 0,
		});
	});

	it("should fall back to content and an unknown source", () => {
		const { records } = parseNewsArticles(
			[{ title: "Yen slides", description: "", content: "BoJ keeps policy loose", publishedAt: "2024-03-14T00:00:00Z" }],
			"USDJPY",
		);

		expect(records[0]?.body).toBe("BoJ keeps policy loose");
		expect(records[0]?.source).toBe("unknown");
		expect(records[0]?.url).toBeUndefined();
	});

	it("should count removed, undated and invalid entries as malformed", () => {
		const result = parseNewsArticles(
			[
				{ title: "[Removed]", publishedAt: "2024-03-14T00:00:00Z" },
				{ title: "Cable climbs", publishedAt: "not a date" },
				{ title: "Cable climbs", publishedAt: null },
				42,
			],
			"GBPUSD",
		);

		expect(result).toEqual({ records: [], malformed: 4 });
	});

	it("should truncate long bodies", () => {
		const { records } = parseNewsArticles(
			[{ title: "Long read", description: "x".repeat(20), publishedAt: "2024-03-14T00:00:00Z" }],
			"EURUSD",
			{ maxContentLength: 5 },
		);

		expect(records[0]?.body).toBe("xxxxx...");
	});
});

describe("Text cleaning", () => {
	it("should decode entities, strip tags and collapse whitespace", () => {
		expect(cleanText("  A&nbsp;&quot;b&quot;\n<i>c</i>  ")).toBe('A "b" c');
	});

	it("should strip the truncation suffix", () => {
		expect(stripTruncationMarker("Markets wait... [+42 chars]")).toBe("Markets wait");
		expect(stripTruncationMarker("No suffix")).toBe("No suffix");
	});
});
