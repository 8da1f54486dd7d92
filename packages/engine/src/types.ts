import type { FundingRateExchange, MarketTable, TradeSignal, TradingStrategy } from "@perpsignal/sdk";

/**
 * Exchange surface the bot needs. Matches the call shape of common
 * exchange clients: `fetchOHLCV(symbol, timeframe, since, limit)` returning
 * `[timestampMs, open, high, low, close, volume]` candles.
 */
export interface MarketExchange extends FundingRateExchange {
  fetchOHLCV(symbol: string, timeframe?: string, since?: number, limit?: number): unknown;
}

/** How per-strategy signals are reduced to one action. */
export type CombineMode = "majority" | "consensus" | "any";

/**
 * Outcome of running one active strategy over the bot's current table.
 */
export interface StrategyRun {
  readonly strategy: TradingStrategy;
  readonly table: MarketTable;
  readonly signal: TradeSignal;
}
