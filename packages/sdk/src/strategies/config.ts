import type { z } from "zod";

import { assertValid } from "../market.js";
import * as bollingerBands from "./bollinger_bands.js";
import * as fundingRate from "./funding_rate.js";
import * as goldenCross from "./golden_cross.js";
import * as supertrend from "./supertrend.js";
import type { StrategyOptions, TradingStrategy } from "./types.js";

export const strategyKeys = [
  supertrend.name,
  goldenCross.name,
  bollingerBands.name,
  fundingRate.name,
] as const;

export type StrategyKey = (typeof strategyKeys)[number];

export interface StrategyConfig {
  readonly key: StrategyKey;
  readonly title: string;
  readonly description: string;
  /** Validates untyped params, fills defaults and builds the strategy. */
  readonly create: (params: Record<string, unknown>, options: StrategyOptions) => TradingStrategy;
}

const defineStrategy = <P>(
  key: StrategyKey,
  title: string,
  description: string,
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  factory: (params: P, options: StrategyOptions) => TradingStrategy,
): StrategyConfig => ({
  key,
  title,
  description,
  create: (params, options) => factory(assertValid(schema, params, `${key} params`), options),
});

export const strategyConfigs: Record<StrategyKey, StrategyConfig> = {
  [supertrend.name]: defineStrategy(
    supertrend.name,
    supertrend.DISPLAY_NAME,
    "Trend following on ATR bands; signals when the trend flips.",
    supertrend.schema,
    supertrend.factory,
  ),
  [goldenCross.name]: defineStrategy(
    goldenCross.name,
    goldenCross.DISPLAY_NAME,
    "Short moving average crossing the long one.",
    goldenCross.schema,
    goldenCross.factory,
  ),
  [bollingerBands.name]: defineStrategy(
    bollingerBands.name,
    bollingerBands.DISPLAY_NAME,
    "Price returning inside the bands after leaving them.",
    bollingerBands.schema,
    bollingerBands.factory,
  ),
  [fundingRate.name]: defineStrategy(
    fundingRate.name,
    fundingRate.DISPLAY_NAME,
    "Contrarian signal when perpetual funding leaves its threshold band.",
    fundingRate.schema,
    fundingRate.factory,
  ),
};

export const strategyList: ReadonlyArray<StrategyConfig> = strategyKeys.map(
  (key) => strategyConfigs[key],
);

export const isStrategyKey = (key: string): key is StrategyKey =>
  Object.prototype.hasOwnProperty.call(strategyConfigs, key);

/**
 * Builds a strategy from its key and untyped parameters. The strategy
 * starts inactive.
 *
 * @throws Error for unknown keys or parameters the strategy schema rejects.
 */
export const createStrategy = (
  key: string,
  params: Record<string, unknown> = {},
  options: StrategyOptions = {},
): TradingStrategy => {
  if (!isStrategyKey(key)) {
    throw new Error(`Unknown strategy: ${key}`);
  }
  return strategyConfigs[key].create(params, options);
};
