/**
 * Configuration Validation
 *
 * Combines the section schemas into one pipeline configuration schema.
 */

import { ConfigError } from "@fxline/domain";
import { z } from "zod";
import {
	DatasetConfigSchema,
	GeneralConfigSchema,
	IndicatorsConfigSchema,
	NewsConfigSchema,
	ProvidersConfigSchema,
} from "./schemas/index.js";

export const PipelineConfigSchema = z.object({
	general: GeneralConfigSchema,
	providers: ProvidersConfigSchema.default({}),
	news: NewsConfigSchema.default({}),
	indicators: IndicatorsConfigSchema.default({}),
	dataset: DatasetConfigSchema.default({}),
});
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export interface ValidationResult {
	success: boolean;
	data?: PipelineConfig;
	errors: string[];
}

export function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

/**
 * Validate configuration without throwing.
 */
export function validateConfig(config: unknown): ValidationResult {
	const result = PipelineConfigSchema.safeParse(config);

	if (result.success) {
		return {
			success: true,
			data: result.data,
			errors: [],
		};
	}

	return {
		success: false,
		errors: formatIssues(result.error),
	};
}

/**
 * Validate configuration and throw a ConfigError listing every issue.
 */
export function validateConfigOrThrow(config: unknown): PipelineConfig {
	const result = validateConfig(config);
	if (!result.success || !result.data) {
		throw new ConfigError(`Invalid configuration: ${result.errors.join("; ")}`, result.errors);
	}
	return result.data;
}
