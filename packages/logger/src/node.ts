import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type { NodeLoggerOptions, RunContext } from "./types.js";

/**
 * A pino logger whose `flush` resolves once buffered lines are written.
 */
export interface LifecycleLogger extends Logger {
	flush(): Promise<void>;
}

function withAsyncFlush(baseLogger: Logger): LifecycleLogger {
	const flush = (): Promise<void> =>
		new Promise<void>((resolve, reject) => {
			baseLogger.flush((error) => (error ? reject(error) : resolve()));
		});
	const wrapped: Logger = Object.create(baseLogger);
	return Object.assign(wrapped, { flush });
}

export function createNodeLogger(options: NodeLoggerOptions): LifecycleLogger {
	const {
		service,
		level = "info",
		environment,
		version,
		pretty,
		redactPaths,
		base = {},
		pinoOptions = {},
	} = options;

	const isPretty = pretty ?? process.env.NODE_ENV === "development";

	const loggerOptions: LoggerOptions = {
		level,
		formatters: {
			level: (label) => ({ severity: label.toUpperCase() }),
			bindings: () => ({}), // Remove pid, hostname
		},
		timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
		redact: {
			paths: mergeRedactPaths(redactPaths),
			censor: "[REDACTED]",
		},
		base: {
			service,
			environment,
			version,
			...base,
		},
		...pinoOptions,
	};

	let baseLogger: Logger;

	if (isPretty) {
		baseLogger = pino(
			loggerOptions,
			pino.transport({
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:HH:MM:ss",
					ignore: "pid,hostname,service,environment,version",
					customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
					singleLine: true,
				},
			}),
		);
	} else {
		baseLogger = pino(loggerOptions);
	}

	return withAsyncFlush(baseLogger);
}

/**
 * Resolve the level from LOG_LEVEL, falling back to info.
 */
export function levelFromEnv(value = process.env.LOG_LEVEL): NodeLoggerOptions["level"] {
	switch (value) {
		case "trace":
		case "debug":
		case "info":
		case "warn":
		case "error":
		case "fatal":
		case "silent":
			return value;
		default:
			return "info";
	}
}

export function withRunContext(logger: Logger, context: RunContext): Logger {
	return logger.child({
		runId: context.runId,
		stage: context.stage,
		instrument: context.instrument,
		granularity: context.granularity,
	});
}
