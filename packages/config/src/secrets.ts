/**
 * Provider Credentials
 *
 * API keys come from environment variables only. Template values copied
 * from an example .env ("your_finnhub_key", "REPLACE_ME") count as absent,
 * which disables that provider instead of failing authentication later.
 */

export type CredentialName = "finnhub" | "alphavantage" | "newsapi";

export const CREDENTIAL_ENV_VARS: Record<CredentialName, string> = {
	finnhub: "FINNHUB_API_KEY",
	alphavantage: "ALPHAV_API_KEY",
	newsapi: "NEWSAPI_KEY",
};

export type Credentials = Partial<Record<CredentialName, string>>;

export function isPlaceholder(value: string | undefined | null): boolean {
	if (!value || value.trim() === "") {
		return true;
	}
	const lower = value.trim().toLowerCase();
	return lower.startsWith("your_") || lower.includes("replace");
}

/**
 * Read every known credential from the environment, dropping placeholders.
 */
export function resolveCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
	const credentials: Credentials = {};
	for (const [name, variable] of Object.entries(CREDENTIAL_ENV_VARS) as [CredentialName, string][]) {
		const value = env[variable];
		if (value !== undefined && !isPlaceholder(value)) {
			credentials[name] = value.trim();
		}
	}
	return credentials;
}
