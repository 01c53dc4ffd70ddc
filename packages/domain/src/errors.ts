/**
 * Pipeline Error Taxonomy
 *
 * Typed errors raised by provider adapters and pipeline stages. The source
 * orchestrator absorbs provider errors into fallbacks and gaps; only the
 * fatal kinds propagate to the command surface.
 *
 * | Error class              | Code                    | Retryable | Fatal |
 * |--------------------------|-------------------------|-----------|-------|
 * | RateLimitedError         | RATE_LIMITED            | Yes       | No    |
 * | UnavailableError         | UNAVAILABLE             | Yes       | No    |
 * | UnsupportedRangeError    | UNSUPPORTED_RANGE       | No        | No    |
 * | MalformedResponseError   | MALFORMED               | No        | No    |
 * | AuthenticationError      | AUTHENTICATION_FAILURE  | No        | Yes   |
 * | AllProvidersFailedError  | ALL_PROVIDERS_FAILED    | No        | Yes   |
 * | ConfigError              | CONFIG_INVALID          | No        | Yes   |
 * | ArtifactError            | ARTIFACT_INVALID        | No        | Yes   |
 */

export type ProviderErrorCode =
	| "RATE_LIMITED"
	| "UNSUPPORTED_RANGE"
	| "MALFORMED"
	| "UNAVAILABLE"
	| "AUTHENTICATION_FAILURE";

export type PipelineErrorCode =
	| ProviderErrorCode
	| "ALL_PROVIDERS_FAILED"
	| "CONFIG_INVALID"
	| "ARTIFACT_INVALID";

// ============================================
// Base Error Class
// ============================================

export class PipelineError extends Error {
	readonly code: PipelineErrorCode;
	readonly retryable: boolean;

	constructor(
		message: string,
		code: PipelineErrorCode,
		options: { retryable?: boolean; cause?: unknown } = {},
	) {
		super(message, { cause: options.cause });
		this.name = this.constructor.name;
		this.code = code;
		this.retryable = options.retryable ?? false;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			retryable: this.retryable,
		};
	}
}

/**
 * Failure reported by one provider adapter.
 */
export class ProviderError extends PipelineError {
	readonly provider: string;
	declare readonly code: ProviderErrorCode;

	constructor(
		provider: string,
		message: string,
		code: ProviderErrorCode,
		options: { retryable?: boolean; cause?: unknown } = {},
	) {
		super(`[${provider}] ${message}`, code, options);
		this.provider = provider;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), provider: this.provider };
	}
}

// ============================================
// Specific Error Classes
// ============================================

/**
 * Provider signalled throttling. Back off before retrying.
 */
export class RateLimitedError extends ProviderError {
	/** Server-suggested wait, when the provider sends one */
	readonly retryAfterMs?: number;

	constructor(provider: string, message = "Rate limit exceeded", retryAfterMs?: number) {
		super(provider, message, "RATE_LIMITED", { retryable: true });
		this.retryAfterMs = retryAfterMs;
	}
}

/**
 * The provider cannot serve this range or granularity (retention window,
 * unsupported resolution). Route the range elsewhere.
 */
export class UnsupportedRangeError extends ProviderError {
	constructor(provider: string, message: string) {
		super(provider, message, "UNSUPPORTED_RANGE", { retryable: false });
	}
}

/**
 * The response cannot be normalized as a whole.
 */
export class MalformedResponseError extends ProviderError {
	constructor(provider: string, message: string, cause?: unknown) {
		super(provider, message, "MALFORMED", { retryable: false, cause });
	}
}

/**
 * Network failure, timeout or server error.
 */
export class UnavailableError extends ProviderError {
	readonly status?: number;

	constructor(provider: string, message: string, options: { status?: number; cause?: unknown } = {}) {
		super(provider, message, "UNAVAILABLE", { retryable: true, cause: options.cause });
		this.status = options.status;
	}
}

/**
 * Credentials were rejected. No retry can work around it.
 */
export class AuthenticationError extends ProviderError {
	constructor(provider: string, message = "Authentication failed") {
		super(provider, message, "AUTHENTICATION_FAILURE", { retryable: false });
	}
}

export class AllProvidersFailedError extends PipelineError {
	readonly failures: readonly ProviderError[];

	constructor(message: string, failures: readonly ProviderError[]) {
		super(message, "ALL_PROVIDERS_FAILED");
		this.failures = failures;
	}
}

export class ConfigError extends PipelineError {
	readonly issues: readonly string[];

	constructor(message: string, issues: readonly string[] = []) {
		super(message, "CONFIG_INVALID");
		this.issues = issues;
	}
}

export class ArtifactError extends PipelineError {
	readonly path: string;

	constructor(path: string, message: string, cause?: unknown) {
		super(`${message}: ${path}`, "ARTIFACT_INVALID", { cause });
		this.path = path;
	}
}

// ============================================
// Guards
// ============================================

export function isProviderError(error: unknown): error is ProviderError {
	return error instanceof ProviderError;
}

/**
 * Whether a stage must stop (non-zero exit) on this error.
 */
export function isFatalError(error: unknown): boolean {
	return (
		error instanceof AuthenticationError ||
		error instanceof AllProvidersFailedError ||
		error instanceof ConfigError ||
		error instanceof ArtifactError
	);
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
