export { runAcquire } from "./acquire.js";
export { runDataset } from "./dataset.js";
export { runIndicators } from "./indicators.js";
export { type CollectionCache, runNews } from "./news.js";
