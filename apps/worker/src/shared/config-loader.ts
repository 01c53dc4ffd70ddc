/**
 * Configuration Loader
 *
 * Resolves the environment, loads the YAML configuration and reads
 * provider credentials from the process environment.
 */

import {
	type ConfigEnvironment,
	type Credentials,
	loadConfig,
	type PipelineConfig,
	resolveCredentials,
	resolveEnvironment,
} from "@fxline/config";
import { log } from "./logger.js";

export interface LoadedConfig {
	environment: ConfigEnvironment;
	config: PipelineConfig;
	credentials: Credentials;
}

export interface LoadOptions {
	configDir?: string;
	environment?: ConfigEnvironment;
	env?: NodeJS.ProcessEnv;
}

export async function loadWorkerConfig(options: LoadOptions = {}): Promise<LoadedConfig> {
	const env = options.env ?? process.env;
	const environment = options.environment ?? resolveEnvironment(env);
	const configDir = options.configDir ?? "configs";
	const config = await loadConfig(environment, configDir);
	const credentials = resolveCredentials(env);

	log.info(
		{
			environment,
			configDir,
			instruments: config.general.instruments,
			granularities: config.general.granularities,
			credentials: Object.keys(credentials).sort(),
		},
		"Configuration loaded",
	);
	return { environment, config, credentials };
}
