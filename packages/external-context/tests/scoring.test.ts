/**
 * Sentiment Scoring Tests
 */

import { describe, expect, it } from "vitest";
import { createLexiconScorer, loadDefaultLexicon, meanScore, scoreText, tokenize } from "../src/scoring/index.js";

describe("tokenize", () => {
	it("should lowercase and keep contractions", () => {
		expect(tokenize("The Euro's rally isn't over")).toEqual(["the", "euro's", "rally", "isn't", "over"]);
	});
});

describe("scoreText", () => {
	it("should score only-positive text as 1", () => {
		expect(scoreText("Dollar rallies as yields rise")).toBe(1);
	});

	it("should balance positive and negative hits", () => {
		expect(scoreText("Euro falls but recovery hopes rise")).toBeCloseTo(1 / 3, 10);
	});

	it("should flip a hit preceded by a negator", () => {
		expect(scoreText("Sterling does not weaken")).toBe(1);
		expect(scoreText("Franc won't strengthen")).toBe(-1);
	});

	it("should return 0 without lexicon hits", () => {
		expect(scoreText("Central bank meets on Thursday")).toBe(0);
		expect(scoreText("")).toBe(0);
	});

	it("should accept a custom lexicon", () => {
		const lexicon = { positive: ["up"], negative: ["down"], negators: [] };
		expect(scoreText("up up down", lexicon)).toBeCloseTo(1 / 3, 10);
	});
});

describe("createLexiconScorer", () => {
	it("should score headline and body together", () => {
		const score = createLexiconScorer();
		expect(score({ headline: "Yen slumps", body: "Losses deepen" })).toBe(-1);
	});

	it("should load the bundled lexicon", () => {
		const lexicon = loadDefaultLexicon();
		expect(lexicon.positive).toContain("rally");
		expect(lexicon.negative).toContain("recession");
	});
});

describe("meanScore", () => {
	it("should not depend on input order", () => {
		expect(meanScore([0.7, 0.1, 0.2])).toBe(meanScore([0.1, 0.2, 0.7]));
		expect(meanScore([0.5, -1, 1])).toBeCloseTo(0.5 / 3, 10);
	});

	it("should return 0 for no scores", () => {
		expect(meanScore([])).toBe(0);
	});
});
