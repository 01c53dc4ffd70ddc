export {
	cleanText,
	type NewsApiArticle,
	NewsApiArticleSchema,
	type NewsParserConfig,
	parseNewsArticle,
	parseNewsArticles,
	stripTruncationMarker,
} from "./newsParser.js";
