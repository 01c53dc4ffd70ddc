import { createNodeLogger, type LifecycleLogger, levelFromEnv } from "@fxline/logger";

export const log: LifecycleLogger = createNodeLogger({
	service: "external-context",
	level: levelFromEnv(),
	environment: process.env.FXLINE_ENV ?? process.env.NODE_ENV ?? "development",
	pretty: process.env.NODE_ENV === "development",
});
