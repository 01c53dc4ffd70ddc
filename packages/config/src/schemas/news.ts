import { z } from "zod";
import { RateLimitSchema } from "./providers.js";

export const NewsConfigSchema = z.object({
	enabled: z.boolean().default(true),
	/** Query window per request */
	window_days: z.number().int().positive().default(7),
	/** How far back the news provider serves articles */
	retention_days: z.number().int().positive().default(30),
	page_size: z.number().int().min(1).max(100).default(100),
	/** Score assigned to periods with no articles */
	neutral_score: z.number().min(-1).max(1).default(0),
	rate_limit: RateLimitSchema.optional(),
	base_url: z.string().url().optional(),
	/** Search query per instrument */
	queries: z.record(z.string(), z.string().min(1)).default({}),
});
export type NewsConfig = z.infer<typeof NewsConfigSchema>;
