import { z } from "zod";

/**
 * Subset of the indicator catalog to compute. Names are checked against
 * the catalog when the engine is built; an empty list means "all".
 */
export const IndicatorsConfigSchema = z.object({
	catalog: z.array(z.string().min(1)).default([]),
});
export type IndicatorsConfig = z.infer<typeof IndicatorsConfigSchema>;
