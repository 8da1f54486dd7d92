import { z } from "zod";

import { createLogger, type Logger } from "@perpsignal/logger";

import type { ChartSurface } from "../chart.js";
import { assertValid, type MarketRow, type MarketTable, type TradeSignal } from "../market.js";
import { createGaussianSimulator, type FundingRateSimulator } from "./simulation.js";
import type { FundingRateExchange, StrategyOptions, TradingStrategy } from "./types.js";

export const name = "funding_rate" as const;

export const DISPLAY_NAME = "Funding Rate";

export const DEFAULT_THRESHOLD = 0.001;

// No positivity check: a threshold <= 0 is accepted and buy/sell may overlap.
const thresholdSchema = z.number().finite();

export const schema = z.object({
  threshold: thresholdSchema.default(DEFAULT_THRESHOLD),
});

const updateSchema = z.object({ threshold: thresholdSchema, isActive: z.boolean() }).partial();

export type FundingRateParams = z.infer<typeof schema>;

/** Market row annotated with the funding rate and its threshold signals. */
export type FundingRateRow<R extends MarketRow = MarketRow> = R & {
  readonly funding_rate: number;
  readonly fr_buy_signal: boolean;
  readonly fr_sell_signal: boolean;
};

const fundingEntrySchema = z
  .object({
    fundingRate: z.number().optional(),
    funding_rate: z.number().optional(),
  })
  .passthrough();

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

/**
 * Applies the threshold rule to one funding rate per row. Rows are copied,
 * never mutated.
 */
export const annotateFundingSignals = <R extends MarketRow>(
  table: MarketTable<R>,
  rates: ReadonlyArray<number>,
  threshold: number,
): FundingRateRow<R>[] => {
  if (rates.length !== table.length) {
    throw new RangeError(
      `Expected ${table.length} funding rates, received ${rates.length}`,
    );
  }
  return table.map((row, index) => {
    const fundingRate = rates[index] ?? Number.NaN;
    return {
      ...row,
      funding_rate: fundingRate,
      fr_buy_signal: fundingRate < -threshold,
      fr_sell_signal: fundingRate > threshold,
    };
  });
};

export interface FundingRateStrategyOptions {
  readonly threshold?: number;
  readonly logger?: Logger;
  readonly simulator?: FundingRateSimulator;
}

/**
 * Contrarian signal on perpetual funding: deeply negative funding (shorts
 * paying longs) reads as a buy, strongly positive funding as a sell.
 *
 * Funding rates are simulated per row from N(0, 0.0005); the exchange
 * lookup in {@link FundingRateStrategy.fetchFundingRate} is not wired into
 * `calculate`.
 */
export class FundingRateStrategy implements TradingStrategy<FundingRateRow, FundingRateParams> {
  public readonly name = DISPLAY_NAME;
  public isActive = false;

  private threshold: number;
  private readonly logger: Logger;
  private readonly simulator: FundingRateSimulator;

  public constructor(options: FundingRateStrategyOptions = {}) {
    const params = assertValid(schema, { threshold: options.threshold }, "funding rate params");
    this.threshold = params.threshold;
    this.logger = options.logger ?? createLogger("strategies/funding-rate");
    this.simulator = options.simulator ?? createGaussianSimulator();
  }

  public get params(): Readonly<FundingRateParams> {
    return { threshold: this.threshold };
  }

  /**
   * Current funding rate for `symbol`, or null when the exchange cannot
   * provide one. Never rejects; failures are logged.
   */
  public async fetchFundingRate(
    exchange: FundingRateExchange | null | undefined,
    symbol: string,
  ): Promise<number | null> {
    const fetchFundingRates = exchange?.fetchFundingRates;
    if (typeof fetchFundingRates !== "function") {
      return null;
    }

    try {
      const response: unknown = await fetchFundingRates.call(exchange, [symbol]);
      if (!isRecord(response)) {
        throw new Error(`unexpected funding rates response (${typeof response})`);
      }
      const entry = fundingEntrySchema.safeParse(response[symbol]);
      if (!entry.success) {
        return null;
      }
      return entry.data.fundingRate ?? entry.data.funding_rate ?? null;
    } catch (error) {
      const description = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error fetching funding rates: ${description}`, { symbol });
      return null;
    }
  }

  public calculate(table: MarketTable): FundingRateRow[] {
    const rates = this.simulator.sample(table.length);
    return annotateFundingSignals(table, rates, this.threshold);
  }

  public getSignal(table: MarketTable<FundingRateRow>): TradeSignal {
    const last = table[table.length - 1];
    if (last === undefined) {
      throw new RangeError("Cannot resolve a funding rate signal from an empty table");
    }
    if (last.fr_buy_signal) {
      return "buy";
    }
    if (last.fr_sell_signal) {
      return "sell";
    }
    return "hold";
  }

  public plot(table: MarketTable<FundingRateRow>, surface: ChartSurface): void {
    const x = table.map((row) => row.timestamp);
    const rates = table.map((row) => row.funding_rate);
    const fundingAxis = surface.twin();

    surface.primary.plotLine(
      x,
      table.map((row) => row.close),
      { label: "Price", color: "black" },
    );

    fundingAxis.plotLine(x, rates, { label: "Funding Rate", color: "purple" });
    fundingAxis.horizontalLine(this.threshold, { color: "red", dash: "dashed", opacity: 0.5 });
    fundingAxis.horizontalLine(-this.threshold, { color: "green", dash: "dashed", opacity: 0.5 });
    fundingAxis.fillBetween(
      x,
      rates,
      0,
      rates.map((rate) => rate > this.threshold),
      { color: "red", opacity: 0.3 },
    );
    fundingAxis.fillBetween(
      x,
      rates,
      0,
      rates.map((rate) => rate < -this.threshold),
      { color: "green", opacity: 0.3 },
    );

    surface.setTitle("Funding Rate Analysis");
    fundingAxis.setLabel("Funding Rate");
    surface.legend("upper-left");
  }

  public setParameters(params: Record<string, unknown>): void {
    const update = assertValid(updateSchema, params, "funding rate params");
    if (update.threshold !== undefined) {
      this.threshold = update.threshold;
    }
    if (update.isActive !== undefined) {
      this.isActive = update.isActive;
    }
  }
}

export const factory = (
  params: FundingRateParams,
  options: StrategyOptions = {},
): FundingRateStrategy => new FundingRateStrategy({ threshold: params.threshold, logger: options.logger });
