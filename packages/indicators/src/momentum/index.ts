export { calculateRSI, RSI_DEFAULTS, rsiFromAverages } from "./rsi.js";
export { calculateStochastic, STOCHASTIC_DEFAULTS } from "./stochastic.js";
