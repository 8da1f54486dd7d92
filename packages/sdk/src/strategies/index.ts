export * as bollingerBands from "./bollinger_bands.js";
export * as fundingRate from "./funding_rate.js";
export * as goldenCross from "./golden_cross.js";
export * as indicators from "./indicators.js";
export * as simulation from "./simulation.js";
export * as supertrend from "./supertrend.js";
