export * from "./core.js";
export * from "./dataset.js";
export * from "./indicators.js";
export * from "./news.js";
export * from "./providers.js";
