/**
 * Sentiment Scoring
 *
 * Keyword sentiment over a finance lexicon. Each positive hit counts +1
 * and each negative hit -1; a negator up to two words before a hit flips
 * it. The article score is (positive - negative) / (positive + negative),
 * so it always lies in [-1, 1] and is 0 when nothing matched.
 */

import { readFileSync } from "node:fs";
import type { Article } from "@fxline/domain";
import { z } from "zod";
import type { SentimentScorer } from "../types.js";

// ============================================
// Lexicon
// ============================================

export const SentimentLexiconSchema = z.object({
	positive: z.array(z.string().min(1)),
	negative: z.array(z.string().min(1)),
	negators: z.array(z.string().min(1)),
});
export type SentimentLexicon = z.infer<typeof SentimentLexiconSchema>;

const LEXICON_PATH = new URL("./lexicon.json", import.meta.url);

let defaultLexicon: SentimentLexicon | undefined;

/**
 * The bundled lexicon, read once.
 */
export function loadDefaultLexicon(): SentimentLexicon {
	defaultLexicon ??= SentimentLexiconSchema.parse(JSON.parse(readFileSync(LEXICON_PATH, "utf8")));
	return defaultLexicon;
}

/** Words a negator reaches forward */
const NEGATION_REACH = 2;

// ============================================
// Scoring
// ============================================

export function tokenize(text: string): string[] {
	return text.toLowerCase().match(/[a-z]+(?:'[a-z]+)?/g) ?? [];
}

export interface SentimentCounts {
	positive: number;
	negative: number;
}

export function countSentimentHits(tokens: readonly string[], lexicon: SentimentLexicon): SentimentCounts {
	const positive = new Set(lexicon.positive);
	const negative = new Set(lexicon.negative);
	const negators = new Set(lexicon.negators);
	const isNegator = (token: string | undefined): boolean =>
		token !== undefined && (negators.has(token) || token.endsWith("n't"));

	const counts: SentimentCounts = { positive: 0, negative: 0 };
	tokens.forEach((token, i) => {
		const polarity = positive.has(token) ? 1 : negative.has(token) ? -1 : 0;
		if (polarity === 0) {
			return;
		}
		let negated = false;
		for (let back = 1; back <= NEGATION_REACH; back++) {
			if (isNegator(tokens[i - back])) {
				negated = true;
				break;
			}
		}
		if ((polarity > 0) !== negated) {
			counts.positive++;
		} else {
			counts.negative++;
		}
	});
	return counts;
}

/**
 * Score text in [-1, 1].
 */
export function scoreText(text: string, lexicon: SentimentLexicon = loadDefaultLexicon()): number {
	const { positive, negative } = countSentimentHits(tokenize(text), lexicon);
	const total = positive + negative;
	return total === 0 ? 0 : (positive - negative) / total;
}

export function createLexiconScorer(lexicon: SentimentLexicon = loadDefaultLexicon()): SentimentScorer {
	return (article: Pick<Article, "headline" | "body">) => scoreText(`${article.headline} ${article.body}`, lexicon);
}

/**
 * Mean of scores, summed in ascending order so the result does not
 * depend on the order articles arrived in.
 */
export function meanScore(scores: readonly number[]): number {
	if (scores.length === 0) {
		return 0;
	}
	const sorted = [...scores].sort((a, b) => a - b);
	return sorted.reduce((sum, s) => sum + s, 0) / sorted.length;
}
