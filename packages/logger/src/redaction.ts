/**
 * Paths that never reach a log line. Provider credentials travel as query
 * parameters and config fields, so both shapes are covered.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"apiKey",
	"apikey",
	"token",
	"password",
	"secret",
	"*.apiKey",
	"*.apikey",
	"*.token",
	"*.secret",
	"credentials.*",
	"headers.Authorization",
	"headers['X-Api-Key']",
	"params.token",
	"params.apikey",
	"params.apiKey",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
	return [...new Set([...DEFAULT_REDACT_PATHS, ...extra])];
}

const SECRET_QUERY_PARAMS = ["token", "apikey", "apiKey"];

/**
 * Mask credential query parameters in a URL before it is logged.
 */
export function redactUrl(url: string): string {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		return url;
	}
	for (const param of SECRET_QUERY_PARAMS) {
		if (parsed.searchParams.has(param)) {
			parsed.searchParams.set(param, "[REDACTED]");
		}
	}
	return parsed.toString();
}
