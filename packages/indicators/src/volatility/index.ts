export { ATR_DEFAULTS, calculateATR, calculateTrueRange } from "./atr.js";
export { BOLLINGER_DEFAULTS, calculateBollingerBands } from "./bollinger.js";
