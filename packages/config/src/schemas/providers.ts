/**
 * Market data provider settings. Credentials never live here; they come
 * from the environment (see secrets.ts).
 */

import { z } from "zod";

export const CandleProviderIdSchema = z.enum(["finnhub", "alphavantage", "yahoo"]);
export type CandleProviderId = z.infer<typeof CandleProviderIdSchema>;

export const RateLimitSchema = z.object({
	max_requests: z.number().int().positive(),
	interval_ms: z.number().int().positive(),
});

export const ProviderSettingsSchema = z.object({
	enabled: z.boolean().default(true),
	rate_limit: RateLimitSchema.optional(),
	/** Overrides the adapter's intraday retention window */
	intraday_retention_days: z.number().int().positive().optional(),
	base_url: z.string().url().optional(),
});
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;

export const RetryConfigSchema = z.object({
	max_retries: z.number().int().nonnegative().default(3),
	initial_delay_ms: z.number().int().nonnegative().default(1000),
	max_delay_ms: z.number().int().nonnegative().default(8000),
	backoff_multiplier: z.number().min(1).default(2),
	/** Cap across one acquisition request */
	max_total_retries: z.number().int().nonnegative().default(50),
});
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const ProvidersConfigSchema = z.object({
	/** Highest priority first; the first entry is the primary provider */
	priority: z.array(CandleProviderIdSchema).min(1).default(["finnhub", "alphavantage", "yahoo"]),
	timeout_ms: z.number().int().positive().default(20000),
	finnhub: ProviderSettingsSchema.default({}),
	alphavantage: ProviderSettingsSchema.default({}),
	yahoo: ProviderSettingsSchema.default({}),
	retry: RetryConfigSchema.default({}),
});
export type ProvidersConfig = z.infer<typeof ProvidersConfigSchema>;
