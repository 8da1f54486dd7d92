import { z } from "zod";

import { createLogger, type Logger } from "@perpsignal/logger";
import {
  OhlcvCandleSchema,
  assertValid,
  type MarketRow,
  type MarketTable,
  type Timeframe,
  type TradeSignal,
  type TradingStrategy,
} from "@perpsignal/sdk";

import type { CombineMode, MarketExchange, StrategyRun } from "./types.js";

export const DEFAULT_CANDLE_LIMIT = 100;
export const DEFAULT_ORDER_QUANTITY = 0.001;

const CandlesSchema = z.array(OhlcvCandleSchema);

export interface TradingBotOptions {
  readonly strategies?: ReadonlyArray<TradingStrategy>;
  readonly logger?: Logger;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Pulls candles from an exchange, runs the active strategies over them and
 * keeps a paper position driven by the combined signal.
 */
export class TradingBot {
  private readonly strategies: TradingStrategy[];
  private readonly logger: Logger;
  private data: MarketTable | null = null;
  private inPosition = false;
  private currentSignals: Record<string, TradeSignal> = {};

  public constructor(
    private readonly exchange: MarketExchange,
    options: TradingBotOptions = {},
  ) {
    this.strategies = [...(options.strategies ?? [])];
    this.logger = options.logger ?? createLogger("engine/bot");
  }

  public get marketData(): MarketTable | null {
    return this.data;
  }

  public get signals(): Readonly<Record<string, TradeSignal>> {
    return { ...this.currentSignals };
  }

  public get isInPosition(): boolean {
    return this.inPosition;
  }

  public addStrategy(strategy: TradingStrategy): void {
    this.strategies.push(strategy);
  }

  /**
   * Loads the latest closed candles. The newest candle is still forming and
   * is dropped. Resolves null (and logs) when the exchange call fails.
   */
  public async fetchData(
    symbol: string,
    timeframe: Timeframe,
    limit = DEFAULT_CANDLE_LIMIT,
  ): Promise<MarketTable | null> {
    try {
      this.logger.info(`Fetching data for ${symbol} on ${timeframe} timeframe`, { symbol, limit });
      const response: unknown = await this.exchange.fetchOHLCV(symbol, timeframe, undefined, limit);
      const candles = assertValid(CandlesSchema, response, "OHLCV response");

      const rows: MarketRow[] = candles.slice(0, -1).map(([ms, open, high, low, close, volume]) => ({
        timestamp: new Date(ms).toISOString(),
        open,
        high,
        low,
        close,
        volume,
      }));

      this.data = rows;
      return rows;
    } catch (error) {
      this.logger.error(`Error fetching data: ${describeError(error)}`, { symbol });
      return null;
    }
  }

  /**
   * Runs every active strategy over the loaded table. A failing strategy is
   * logged and left out of the results.
   */
  public runStrategies(): Record<string, StrategyRun> {
    const data = this.data;
    if (data === null) {
      this.logger.warn("No data available to run strategies");
      return {};
    }

    const results: Record<string, StrategyRun> = {};
    for (const strategy of this.strategies) {
      if (!strategy.isActive) {
        continue;
      }
      try {
        const table = strategy.calculate(data);
        const signal = strategy.getSignal(table);
        results[strategy.name] = { strategy, table, signal };
        this.logger.info(`Strategy ${strategy.name} returned signal: ${signal}`);
      } catch (error) {
        this.logger.error(`Error running strategy ${strategy.name}: ${describeError(error)}`);
      }
    }

    this.currentSignals = Object.fromEntries(
      Object.entries(results).map(([name, run]) => [name, run.signal]),
    );
    return results;
  }

  public getCombinedSignal(mode: CombineMode = "majority"): TradeSignal {
    const signals = Object.values(this.currentSignals);
    if (signals.length === 0) {
      return "hold";
    }

    switch (mode) {
      case "majority": {
        const count = (target: TradeSignal) => signals.filter((signal) => signal === target).length;
        const buys = count("buy");
        const sells = count("sell");
        const holds = count("hold");
        if (buys > sells && buys > holds) {
          return "buy";
        }
        if (sells > buys && sells > holds) {
          return "sell";
        }
        return "hold";
      }
      case "consensus":
        if (signals.every((signal) => signal === "buy")) {
          return "buy";
        }
        if (signals.every((signal) => signal === "sell")) {
          return "sell";
        }
        return "hold";
      case "any":
        if (signals.includes("buy")) {
          return "buy";
        }
        if (signals.includes("sell")) {
          return "sell";
        }
        return "hold";
      default:
        return "hold";
    }
  }

  /**
   * Paper execution: buys only when flat, sells only when holding.
   *
   * @returns Whether the position changed.
   */
  public executeOrder(symbol: string, signal: TradeSignal, quantity = DEFAULT_ORDER_QUANTITY): boolean {
    if (signal === "buy" && !this.inPosition) {
      this.logger.info(`Executing BUY order for ${symbol}, quantity: ${quantity}`, { symbol });
      this.inPosition = true;
      return true;
    }
    if (signal === "sell" && this.inPosition) {
      this.logger.info(`Executing SELL order for ${symbol}, quantity: ${quantity}`, { symbol });
      this.inPosition = false;
      return true;
    }
    return false;
  }
}
