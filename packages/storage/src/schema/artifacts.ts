/**
 * Artifact Schemas
 *
 * In memory every timestamp is UTC epoch ms; on disk it is an ISO-8601
 * string. Each stored schema decodes the ISO form back to epoch ms, and
 * the matching encoder produces the stored form.
 */

import {
	type Article,
	ArticleSchema,
	type Candle,
	CandleSchema,
	type Gap,
	GapSchema,
	GranularitySchema,
	type IndicatorRow,
	IndicatorRowSchema,
	type ModelReadyRow,
	ModelReadyRowSchema,
	type NewsSignal,
	NewsSignalSchema,
	type OhlcDiscrepancy,
	OhlcDiscrepancySchema,
} from "@fxline/domain";
import { z } from "zod";

// ============================================
// Timestamps
// ============================================

export const IsoTimestampSchema = z
	.string()
	.datetime()
	.transform((value) => Date.parse(value));

export function toIso(timestamp: number): string {
	return new Date(timestamp).toISOString();
}

// ============================================
// Records
// ============================================

export const StoredCandleSchema = CandleSchema.extend({ timestamp: IsoTimestampSchema });
export const StoredGapSchema = GapSchema.extend({ start: IsoTimestampSchema, end: IsoTimestampSchema });
export const StoredDiscrepancySchema = OhlcDiscrepancySchema.extend({ timestamp: IsoTimestampSchema });
export const StoredArticleSchema = ArticleSchema.extend({ publishedAt: IsoTimestampSchema });
export const StoredNewsSignalSchema = NewsSignalSchema.extend({ periodStart: IsoTimestampSchema });
export const StoredIndicatorRowSchema = IndicatorRowSchema.extend({ timestamp: IsoTimestampSchema });
export const StoredModelReadyRowSchema = ModelReadyRowSchema.extend({ timestamp: IsoTimestampSchema });
export const StoredWindowSchema = z.object({ start: IsoTimestampSchema, end: IsoTimestampSchema });

/** Candle, indicator row or model-ready row with its period start as ISO */
export function encodeRow<T extends Candle | IndicatorRow | ModelReadyRow>(
	row: T,
): Omit<T, "timestamp"> & { timestamp: string } {
	const { timestamp, ...rest } = row;
	return { ...rest, timestamp: toIso(timestamp) };
}

export function encodeGap(gap: Gap): z.input<typeof StoredGapSchema> {
	return { ...gap, start: toIso(gap.start), end: toIso(gap.end) };
}

export function encodeDiscrepancy(d: OhlcDiscrepancy): z.input<typeof StoredDiscrepancySchema> {
	return { ...d, timestamp: toIso(d.timestamp) };
}

export function encodeArticle(article: Article): z.input<typeof StoredArticleSchema> {
	return { ...article, publishedAt: toIso(article.publishedAt) };
}

export function encodeSignal(signal: NewsSignal): z.input<typeof StoredNewsSignalSchema> {
	return { ...signal, periodStart: toIso(signal.periodStart) };
}

// ============================================
// Payloads
// ============================================

const RangeFields = {
	instrument: z.string().min(1),
	start: IsoTimestampSchema,
	end: IsoTimestampSchema,
};

const SeriesFields = { ...RangeFields, granularity: GranularitySchema };

/** Raw layer: merged candle series with its gap set */
export const CandleSeriesPayloadSchema = z.object({
	...SeriesFields,
	candles: z.array(StoredCandleSchema),
	gaps: z.array(StoredGapSchema),
	sources: z.record(z.string(), z.number().int().nonnegative()),
	malformedCount: z.number().int().nonnegative(),
	discrepancies: z.array(StoredDiscrepancySchema),
});

/** Raw layer: collected articles */
export const NewsCollectionPayloadSchema = z.object({
	...RangeFields,
	articles: z.array(StoredArticleSchema),
	skippedWindows: z.array(StoredWindowSchema),
	failedWindows: z.array(StoredWindowSchema.extend({ error: z.string() })),
	duplicates: z.number().int().nonnegative(),
	malformed: z.number().int().nonnegative(),
});

/** Processed layer: indicator rows plus the gap set they were computed against */
export const IndicatorSetPayloadSchema = z.object({
	...SeriesFields,
	catalog: z.array(z.string()),
	rows: z.array(StoredIndicatorRowSchema),
	gaps: z.array(StoredGapSchema),
});

/** Processed layer: news signals per candle period */
export const NewsSignalSetPayloadSchema = z.object({
	...SeriesFields,
	neutralScore: z.number(),
	unaligned: z.number().int().nonnegative(),
	signals: z.array(StoredNewsSignalSchema),
});

/** Model-ready layer: joined rows */
export const ModelReadyPayloadSchema = z.object({
	...SeriesFields,
	rows: z.array(StoredModelReadyRowSchema),
	gaps: z.array(StoredGapSchema),
	excludedInGaps: z.number().int().nonnegative(),
	droppedIncomplete: z.number().int().nonnegative(),
	newsFilled: z.number().int().nonnegative(),
});

export const DatasetCellSchema = z.union([z.number(), z.string(), z.null()]);
export type DatasetCell = z.infer<typeof DatasetCellSchema>;

/** Model-ready layer: a derived training table, one array per row aligned with `columns` */
export const DerivedDatasetPayloadSchema = z
	.object({
		...SeriesFields,
		name: z.string().min(1),
		columns: z.array(z.string().min(1)),
		rows: z.array(z.array(DatasetCellSchema)),
	})
	.refine((d) => d.rows.every((row) => row.length === d.columns.length), {
		message: "every row must have one cell per column",
		path: ["rows"],
	});

export type CandleSeriesPayload = z.output<typeof CandleSeriesPayloadSchema>;
export type NewsCollectionPayload = z.output<typeof NewsCollectionPayloadSchema>;
export type IndicatorSetPayload = z.output<typeof IndicatorSetPayloadSchema>;
export type NewsSignalSetPayload = z.output<typeof NewsSignalSetPayloadSchema>;
export type ModelReadyPayload = z.output<typeof ModelReadyPayloadSchema>;
export type DerivedDatasetPayload = z.output<typeof DerivedDatasetPayloadSchema>;

// ============================================
// Encoders
// ============================================

export function encodeCandleSeries(p: CandleSeriesPayload): z.input<typeof CandleSeriesPayloadSchema> {
	return {
		...p,
		start: toIso(p.start),
		end: toIso(p.end),
		candles: p.candles.map(encodeRow),
		gaps: p.gaps.map(encodeGap),
		discrepancies: p.discrepancies.map(encodeDiscrepancy),
	};
}

export function encodeNewsCollection(p: NewsCollectionPayload): z.input<typeof NewsCollectionPayloadSchema> {
	return {
		...p,
		start: toIso(p.start),
		end: toIso(p.end),
		articles: p.articles.map(encodeArticle),
		skippedWindows: p.skippedWindows.map((w) => ({ start: toIso(w.start), end: toIso(w.end) })),
		failedWindows: p.failedWindows.map((w) => ({ ...w, start: toIso(w.start), end: toIso(w.end) })),
	};
}

export function encodeIndicatorSet(p: IndicatorSetPayload): z.input<typeof IndicatorSetPayloadSchema> {
	return {
		...p,
		start: toIso(p.start),
		end: toIso(p.end),
		rows: p.rows.map(encodeRow),
		gaps: p.gaps.map(encodeGap),
	};
}

export function encodeNewsSignalSet(p: NewsSignalSetPayload): z.input<typeof NewsSignalSetPayloadSchema> {
	return { ...p, start: toIso(p.start), end: toIso(p.end), signals: p.signals.map(encodeSignal) };
}

export function encodeModelReady(p: ModelReadyPayload): z.input<typeof ModelReadyPayloadSchema> {
	return { ...p, start: toIso(p.start), end: toIso(p.end), rows: p.rows.map(encodeRow), gaps: p.gaps.map(encodeGap) };
}

export function encodeDerivedDataset(p: DerivedDatasetPayload): z.input<typeof DerivedDatasetPayloadSchema> {
	return { ...p, start: toIso(p.start), end: toIso(p.end) };
}
