// Shared shapes for market data, strategy signals and validation helpers.

import {
  MarketRowSchema,
  MarketTableSchema,
  OhlcvCandleSchema,
  TimeframeSchema,
  TradeSignalSchema,
} from "./market.js";

/** Namespaced access to the primary schemas. */
export const Schemas = {
  MarketRow: MarketRowSchema,
  MarketTable: MarketTableSchema,
  OhlcvCandle: OhlcvCandleSchema,
  Timeframe: TimeframeSchema,
  TradeSignal: TradeSignalSchema,
};

export * from "./market.js";
export * from "./chart.js";
export * from "./strategies/types.js";
export * as strategies from "./strategies/index.js";
export {
  createStrategy,
  isStrategyKey,
  strategyConfigs,
  strategyKeys,
  strategyList,
  type StrategyConfig,
  type StrategyKey,
} from "./strategies/config.js";
export {
  FundingRateStrategy,
  type FundingRateParams,
  type FundingRateRow,
} from "./strategies/funding_rate.js";
export { BollingerBandsStrategy, type BollingerBandsRow } from "./strategies/bollinger_bands.js";
export { GoldenCrossStrategy, type GoldenCrossRow } from "./strategies/golden_cross.js";
export { SupertrendStrategy, type SupertrendRow } from "./strategies/supertrend.js";
