import { join } from "node:path";

import { createLogger, type Logger } from "@perpsignal/logger";
import { ChartRecorder, writeChartDocument } from "@perpsignal/report";
import {
  FundingRateStrategy,
  createStrategy,
  type StrategyKey,
  type TradeSignal,
  type TradingStrategy,
} from "@perpsignal/sdk";

import { TradingBot } from "./bot.js";
import type { BotConfig } from "./config.js";
import type { MarketExchange } from "./types.js";

/** A bot wired with the configured strategies, all active. */
export interface BotSession {
  readonly exchange: MarketExchange;
  readonly bot: TradingBot;
  readonly strategies: ReadonlyArray<TradingStrategy>;
  /** Source of the live funding rate lookup; null when not configured. */
  readonly fundingRate: FundingRateStrategy | null;
  readonly logger: Logger;
}

export interface CycleResult {
  readonly signals: Readonly<Record<string, TradeSignal>>;
  readonly combined: TradeSignal;
  readonly orderPlaced: boolean;
  /** Live exchange funding rate, logged for reference only. */
  readonly liveFundingRate: number | null;
  readonly charts: ReadonlyArray<string>;
}

const slugify = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");

const paramsFor = (key: StrategyKey, config: BotConfig): Record<string, unknown> =>
  key === "funding_rate" ? { threshold: config.fundingThreshold } : {};

const isFundingRateStrategy = (strategy: TradingStrategy): strategy is FundingRateStrategy =>
  strategy instanceof FundingRateStrategy;

export const createBotSession = (
  exchange: MarketExchange,
  config: BotConfig,
  logger: Logger = createLogger("engine/cycle"),
): BotSession => {
  const strategies = config.strategies.map((key) => {
    const strategy = createStrategy(key, paramsFor(key, config), { logger });
    strategy.isActive = true;
    return strategy;
  });
  const bot = new TradingBot(exchange, { strategies, logger });
  const fundingRate = strategies.find(isFundingRateStrategy) ?? null;
  return { exchange, bot, strategies, fundingRate, logger };
};

/**
 * One fetch/analyse/trade pass. Reuse the same {@link BotSession} across
 * passes to carry its paper position forward.
 *
 * @returns null when no market data could be loaded.
 */
export const runCycle = async (
  { exchange, bot, fundingRate, logger }: BotSession,
  config: BotConfig,
): Promise<CycleResult | null> => {
  const data = await bot.fetchData(config.symbol, config.timeframe, config.candleLimit);
  if (data === null) {
    return null;
  }

  let liveFundingRate: number | null = null;
  if (fundingRate !== null) {
    liveFundingRate = await fundingRate.fetchFundingRate(exchange, config.symbol);
    logger.info("Live funding rate", { symbol: config.symbol, fundingRate: liveFundingRate });
  }

  const runs = bot.runStrategies();
  const combined = bot.getCombinedSignal(config.combineMode);
  const orderPlaced = bot.executeOrder(config.symbol, combined, config.orderQuantity);
  logger.info(`Analysis completed. Combined signal: ${combined.toUpperCase()}`, {
    symbol: config.symbol,
  });

  const charts: string[] = [];
  if (config.chartDir !== undefined) {
    for (const [name, run] of Object.entries(runs)) {
      const recorder = new ChartRecorder();
      run.strategy.plot(run.table, recorder);
      const dir = join(config.chartDir, slugify(config.symbol), slugify(name));
      charts.push(await writeChartDocument(dir, recorder.toDocument()));
    }
  }

  return { signals: bot.signals, combined, orderPlaced, liveFundingRate, charts };
};
