/**
 * Configuration Loader
 *
 * Loads and merges YAML configuration files with environment-specific overrides.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError, errorMessage } from "@fxline/domain";
import { deepmergeCustom } from "deepmerge-ts";
import { parse } from "yaml";
import { log } from "./logger.js";
import { type PipelineConfig, validateConfigOrThrow } from "./validate.js";

export type ConfigEnvironment = "development" | "production";

/** Override wins; arrays in the override replace the defaults instead of appending */
const mergeConfig = deepmergeCustom({ mergeArrays: false });

/**
 * Load and parse a YAML file
 *
 * @throws ConfigError if the file cannot be read or parsed
 */
async function loadYaml(path: string, options: { optional?: boolean } = {}): Promise<unknown> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (options.optional && isMissingFile(error)) {
			return undefined;
		}
		throw new ConfigError(`Failed to load YAML from ${path}: ${errorMessage(error)}`);
	}
	try {
		return parse(content);
	} catch (error) {
		throw new ConfigError(`Failed to parse YAML from ${path}: ${errorMessage(error)}`);
	}
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load configuration with environment-specific overrides
 *
 * Loads base configuration from default.yaml, then merges with
 * development.yaml or production.yaml when present.
 */
export async function loadConfig(
	environment: ConfigEnvironment,
	configDir = "configs",
): Promise<PipelineConfig> {
	const base = await loadYaml(join(configDir, "default.yaml"));
	if (!isRecord(base)) {
		throw new ConfigError(`${join(configDir, "default.yaml")} must contain a mapping`);
	}

	const loaded = await loadYaml(join(configDir, `${environment}.yaml`), { optional: true });
	if (loaded === undefined) {
		log.warn({ environment, configDir }, "No environment override found, using defaults only");
	}
	const override = isRecord(loaded) ? loaded : {};

	const merged: unknown = mergeConfig(base, override);
	return validateConfigOrThrow(merged);
}

/**
 * Load configuration from a specific file
 */
export async function loadConfigFromFile(path: string): Promise<PipelineConfig> {
	return validateConfigOrThrow(await loadYaml(path));
}

/**
 * Pick the environment from FXLINE_ENV, then NODE_ENV.
 */
export function resolveEnvironment(env: NodeJS.ProcessEnv = process.env): ConfigEnvironment {
	const value = env.FXLINE_ENV ?? env.NODE_ENV;
	return value === "production" ? "production" : "development";
}
