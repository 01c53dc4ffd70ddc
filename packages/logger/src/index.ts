import pino from "pino";

export type { Logger } from "pino";

export { createNodeLogger, type LifecycleLogger, levelFromEnv, withRunContext } from "./node.js";
export * from "./redaction.js";
export * from "./types.js";

export { pino };
