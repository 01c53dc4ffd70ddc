/**
 * Command entry: parse, load configuration, run, print reports.
 *
 * Exit codes: 0 success, 1 fatal pipeline error, 2 usage error.
 */

import { resolveRequests } from "@fxline/config";
import { type Clock, errorMessage, formatRunReport, isFatalError, systemClock } from "@fxline/domain";
import type { LifecycleLogger } from "@fxline/logger";
import { runPipeline } from "../pipeline.js";
import { loadWorkerConfig } from "../shared/config-loader.js";
import { createWorkerContext, type WorkerContext } from "../shared/context.js";
import { log } from "../shared/logger.js";
import { parseArgs, USAGE } from "./args.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
	out: (text: string) => void;
	err: (text: string) => void;
	env?: NodeJS.ProcessEnv;
	clock?: Clock;
	/** Replaces the context built from configuration */
	createContext?: typeof createWorkerContext;
}

const consoleIO: CliIO = {
	out: (text) => console.log(text),
	err: (text) => console.error(text),
};

export async function runCli(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
	const parsed = parseArgs(argv);
	if (!parsed.ok) {
		if (parsed.error) {
			io.err(parsed.error);
		}
		io.err(USAGE);
		return parsed.help ? EXIT_OK : EXIT_USAGE;
	}
	const { options } = parsed;
	const clock = io.clock ?? systemClock;

	try {
		const { config, credentials } = await loadWorkerConfig({
			configDir: options.configDir,
			environment: options.environment,
			env: io.env,
		});
		const requests = resolveRequests(config, { instruments: options.instruments, clock });
		const createContext = io.createContext ?? createWorkerContext;
		const ctx: WorkerContext = createContext({ config, credentials, clock });

		await runPipeline(ctx, options.command, requests, {
			onReport: (report) => io.out(formatRunReport(report)),
		});
		return EXIT_OK;
	} catch (error) {
		const fatal = isFatalError(error);
		log.error({ error: errorMessage(error), fatal }, "Pipeline aborted");
		io.err(`${fatal ? "Fatal" : "Unexpected"} error: ${errorMessage(error)}`);
		return EXIT_FATAL;
	}
}

/**
 * Process entry: runs the CLI and flushes the worker logger before the
 * exit code is returned, whether the run finished or crashed.
 */
export async function main(
	argv: readonly string[],
	io: CliIO = consoleIO,
	logger: Pick<LifecycleLogger, "error" | "flush"> = log,
): Promise<number> {
	try {
		return await runCli(argv, io);
	} catch (error) {
		logger.error({ error: errorMessage(error) }, "Worker crashed");
		return EXIT_FATAL;
	} finally {
		await logger.flush();
	}
}
