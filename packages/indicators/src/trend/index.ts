export { calculateEMA, calculateMultiplier, EMA_PERIODS } from "./ema.js";
export { calculateMACD, MACD_DEFAULTS, macdSignalLookback } from "./macd.js";
export { calculateSMA, SMA_DEFAULTS } from "./sma.js";
