import { z } from "zod";

/** keep: null indicators stay in the row; drop: such rows are removed and counted */
export const MissingIndicatorPolicySchema = z.enum(["keep", "drop"]);
export type MissingIndicatorPolicy = z.infer<typeof MissingIndicatorPolicySchema>;

export const DatasetConfigSchema = z.object({
	missing_indicators: MissingIndicatorPolicySchema.default("keep"),
	/** Rows per sliding window in the trend dataset */
	sequence_length: z.number().int().positive().default(60),
	forecast_horizon: z.number().int().positive().default(1),
	mean_reversion_horizon: z.number().int().positive().default(5),
	trend_features: z
		.array(z.string().min(1))
		.min(1)
		.default(["close", "rsi_14", "ema_12", "ema_26", "macd_line", "atr_14", "bb_percent_b", "z_score_20", "return_1"]),
	mean_reversion_features: z
		.array(z.string().min(1))
		.min(1)
		.default(["close", "rsi_14", "bb_percent_b", "z_score_20", "atr_14", "return_1", "return_5"]),
});
export type DatasetConfig = z.infer<typeof DatasetConfigSchema>;
