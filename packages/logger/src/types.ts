import type { LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface NodeLoggerOptions {
	/** Service name attached to every line */
	service: string;
	level?: LogLevel;
	/** Deployment environment (development, production, test) */
	environment?: string;
	version?: string;
	/** Pretty-print through pino-pretty instead of JSON lines */
	pretty?: boolean;
	/** Extra paths to redact on top of the defaults */
	redactPaths?: string[];
	base?: Record<string, unknown>;
	pinoOptions?: Partial<LoggerOptions>;
}

/**
 * Identifies one pipeline run so that lines from different stages can be
 * correlated.
 */
export interface RunContext {
	runId: string;
	stage?: string;
	instrument?: string;
	granularity?: string;
}
