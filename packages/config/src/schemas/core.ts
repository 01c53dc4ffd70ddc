/**
 * General run settings: instruments, date range, granularities.
 */

import { GranularitySchema, SessionCalendarSchema } from "@fxline/domain";
import { z } from "zod";

/** Six-letter currency pair, base then quote (EURUSD) */
export const InstrumentSchema = z
	.string()
	.regex(/^[A-Z]{6}$/, "instrument must be a six-letter currency pair such as EURUSD");

const IsoDateSchema = z
	.string()
	.regex(/^\d{4}-\d{2}-\d{2}(T[\d:.]+Z)?$/, "expected YYYY-MM-DD or a UTC ISO timestamp");

export const GeneralConfigSchema = z
	.object({
		instruments: z.array(InstrumentSchema).min(1),
		/** Inclusive start of the requested range */
		start_date: IsoDateSchema,
		/** Exclusive end; null means "now", aligned down to the granularity */
		end_date: IsoDateSchema.nullable().default(null),
		granularities: z.array(GranularitySchema).min(1).default(["1d", "1h"]),
		session_calendar: SessionCalendarSchema.default("fx"),
		data_dir: z.string().min(1).default("data"),
	})
	.refine((cfg) => cfg.end_date === null || cfg.start_date < cfg.end_date, {
		message: "start_date must be before end_date",
		path: ["end_date"],
	});
export type GeneralConfig = z.infer<typeof GeneralConfigSchema>;
