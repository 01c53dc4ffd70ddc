/**
 * Shared Logger
 *
 * Centralized logging for every pipeline stage run by the worker.
 */

import { createNodeLogger, type LifecycleLogger, levelFromEnv } from "@fxline/logger";

export const log: LifecycleLogger = createNodeLogger({
	service: "worker",
	level: levelFromEnv(),
	environment: process.env.FXLINE_ENV ?? process.env.NODE_ENV ?? "development",
	pretty: process.env.NODE_ENV === "development",
});
