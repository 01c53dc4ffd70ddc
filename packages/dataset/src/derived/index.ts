export * from "./meanReversion.js";
export * from "./sentiment.js";
export * from "./trend.js";
