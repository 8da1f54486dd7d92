import type { Logger } from "@perpsignal/logger";

import type { ChartSurface } from "../chart.js";
import type { MarketRow, MarketTable, TradeSignal } from "../market.js";

/**
 * Capability every strategy exposes to the bot. `calculate` derives a new
 * table from the caller's rows; `getSignal` and `plot` consume that table.
 */
export interface TradingStrategy<
  TRow extends MarketRow = MarketRow,
  TParams extends Record<string, unknown> = Record<string, unknown>,
> {
  readonly name: string;
  /** Only active strategies are run by the bot. */
  isActive: boolean;
  readonly params: Readonly<TParams>;
  calculate(table: MarketTable): MarketTable<TRow>;
  plot(table: MarketTable<TRow>, surface: ChartSurface): void;
  getSignal(table: MarketTable<TRow>): TradeSignal;
  /**
   * Updates known parameters, `isActive` included; unknown keys are ignored.
   */
  setParameters(params: Record<string, unknown>): void;
}

/** Minimal exchange surface a strategy may query for derivatives data. */
export interface FundingRateExchange {
  fetchFundingRates?: (symbols: string[]) => unknown;
}

/** Collaborators handed to strategy factories. */
export interface StrategyOptions {
  /** Used by strategies that report exchange failures. */
  readonly logger?: Logger;
}
