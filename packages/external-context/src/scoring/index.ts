export {
	countSentimentHits,
	createLexiconScorer,
	loadDefaultLexicon,
	meanScore,
	type SentimentCounts,
	type SentimentLexicon,
	SentimentLexiconSchema,
	scoreText,
	tokenize,
} from "./sentiment.js";
