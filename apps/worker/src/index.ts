#!/usr/bin/env -S node --import tsx
/**
 * fxline command line.
 */

import { main } from "./cli/run.js";

main(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error(error);
		process.exitCode = 1;
	},
);
