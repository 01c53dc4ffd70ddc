/**
 * CLI Parsing
 */

import type { ConfigEnvironment } from "@fxline/config";
import { isPipelineCommand, type PipelineCommand } from "../pipeline.js";

export interface CliOptions {
	command: PipelineCommand;
	instruments: string[];
	configDir: string;
	environment?: ConfigEnvironment;
}

export type ParseResult = { ok: true; options: CliOptions } | { ok: false; help: boolean; error?: string };

export const USAGE = `
FX dataset pipeline

Usage:
  fxline <command> [options]

Commands:
  acquire      Fetch candles from the configured providers into raw/
  news         Collect articles and align them to acquired candles
  indicators   Compute indicator rows into processed/
  dataset      Assemble model-ready rows and derived tables
  all          Run every stage in order

Options:
  --instruments=EURUSD,GBPUSD  Restrict to configured instruments
  --config-dir=configs         Directory holding default.yaml
  --env=development            development or production (default: FXLINE_ENV / NODE_ENV)

Credentials come from FINNHUB_API_KEY, ALPHAV_API_KEY and NEWSAPI_KEY.
`;

export function parseArgs(argv: readonly string[]): ParseResult {
	const [command, ...rest] = argv;
	if (!command || command === "--help" || command === "-h") {
		return { ok: false, help: true };
	}
	if (!isPipelineCommand(command)) {
		return { ok: false, help: false, error: `Unknown command: ${command}` };
	}

	const options: CliOptions = { command, instruments: [], configDir: "configs" };
	for (const arg of rest) {
		if (arg.startsWith("--instruments=")) {
			options.instruments = arg
				.slice("--instruments=".length)
				.split(",")
				.map((s) => s.trim())
				.filter((s) => s.length > 0);
		} else if (arg.startsWith("--config-dir=")) {
			options.configDir = arg.slice("--config-dir=".length);
		} else if (arg.startsWith("--env=")) {
			const env = arg.slice("--env=".length);
			if (env !== "development" && env !== "production") {
				return { ok: false, help: false, error: `Unknown environment: ${env}` };
			}
			options.environment = env;
		} else {
			return { ok: false, help: false, error: `Unknown option: ${arg}` };
		}
	}
	return { ok: true, options };
}
