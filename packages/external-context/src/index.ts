/**
 * @fxline/external-context - News collection and alignment
 *
 * - NewsAPI adapter on the shared provider contract
 * - Article parsing, cleaning and deduplication
 * - Lexicon sentiment scoring
 * - Windowed news collection within provider retention
 * - News Aligner onto the candle timeline
 */

export const PACKAGE_NAME = "@fxline/external-context";
export const VERSION = "0.1.0";

export * from "./aligner.js";
export * from "./collector.js";
export * from "./factory.js";
export * from "./parsers/index.js";
export * from "./providers/newsapi.js";
export * from "./scoring/index.js";
export type * from "./types.js";
