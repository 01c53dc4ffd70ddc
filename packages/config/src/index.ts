/**
 * @fxline/config - Configuration schemas and loaders
 *
 * - Zod schemas for every configuration section
 * - YAML loading with environment overrides
 * - Credentials from the environment
 * - Resolution of request descriptors for the pipeline stages
 */

export const PACKAGE_NAME = "@fxline/config";
export const VERSION = "0.1.0";

export {
	type ConfigEnvironment,
	loadConfig,
	loadConfigFromFile,
	resolveEnvironment,
} from "./loader.js";
export { type RequestDescriptor, type ResolveOptions, resolveRequests } from "./requests.js";
export * from "./schemas/index.js";
export {
	CREDENTIAL_ENV_VARS,
	type CredentialName,
	type Credentials,
	isPlaceholder,
	resolveCredentials,
} from "./secrets.js";
export {
	formatIssues,
	type PipelineConfig,
	PipelineConfigSchema,
	type ValidationResult,
	validateConfig,
	validateConfigOrThrow,
} from "./validate.js";
