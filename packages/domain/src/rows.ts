/**
 * Indicator and model-ready rows.
 */

import { z } from "zod";
import { CandleSchema } from "./candle.js";

/**
 * Indicator name → value. `null` marks "insufficient data for this
 * period" and is never replaced by a number.
 */
export const IndicatorValuesSchema = z.record(z.string(), z.number().nullable());
export type IndicatorValues = z.infer<typeof IndicatorValuesSchema>;

export const IndicatorRowSchema = CandleSchema.extend({
	indicators: IndicatorValuesSchema,
});
export type IndicatorRow = z.infer<typeof IndicatorRowSchema>;

export const ModelReadyRowSchema = IndicatorRowSchema.extend({
	newsScore: z.number(),
	newsCount: z.number().int().nonnegative(),
	/** True when no signal existed and the neutral default was used */
	newsFilled: z.boolean(),
});
export type ModelReadyRow = z.infer<typeof ModelReadyRowSchema>;
