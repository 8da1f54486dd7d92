import { z } from "zod";

import type { ChartSurface } from "../chart.js";
import { assertValid, type MarketRow, type MarketTable, type TradeSignal } from "../market.js";
import { markersWhere, rollingMean, rollingStd } from "./indicators.js";
import type { TradingStrategy } from "./types.js";

export const name = "bollinger_bands" as const;

export const DISPLAY_NAME = "Bollinger Bands";

const fields = {
  period: z.number().int().min(2),
  numStd: z.number().positive(),
};

export const schema = z.object({
  period: fields.period.default(20),
  numStd: fields.numStd.default(2),
});

const updateSchema = z.object({ ...fields, isActive: z.boolean() }).partial();

export type BollingerBandsParams = z.infer<typeof schema>;

export type BollingerBandsRow<R extends MarketRow = MarketRow> = R & {
  readonly bb_middle: number | null;
  readonly bb_std: number | null;
  readonly bb_upper: number | null;
  readonly bb_lower: number | null;
  readonly above_upper: boolean;
  readonly below_lower: boolean;
  readonly bb_buy_signal: boolean;
  readonly bb_sell_signal: boolean;
};

/**
 * Mean reversion on Bollinger Bands. A close returning inside the bands
 * after a row below the lower band is a buy; after a row above the upper
 * band, a sell.
 */
export class BollingerBandsStrategy
  implements TradingStrategy<BollingerBandsRow, BollingerBandsParams>
{
  public readonly name = DISPLAY_NAME;
  public isActive = false;

  private current: BollingerBandsParams;

  public constructor(params: Partial<BollingerBandsParams> = {}) {
    this.current = assertValid(schema, params, "bollinger bands params");
  }

  public get params(): Readonly<BollingerBandsParams> {
    return { ...this.current };
  }

  public calculate(table: MarketTable): BollingerBandsRow[] {
    const { period, numStd } = this.current;
    const closes = table.map((row) => row.close);
    const middle = rollingMean(closes, period);
    const deviation = rollingStd(closes, period);

    const bands = table.map((row, index) => {
      const bbMiddle = middle[index] ?? null;
      const bbStd = deviation[index] ?? null;
      const bbUpper = bbMiddle === null || bbStd === null ? null : bbMiddle + bbStd * numStd;
      const bbLower = bbMiddle === null || bbStd === null ? null : bbMiddle - bbStd * numStd;
      return {
        bbMiddle,
        bbStd,
        bbUpper,
        bbLower,
        above: bbUpper !== null && row.close > bbUpper,
        below: bbLower !== null && row.close < bbLower,
      };
    });

    return table.map((row, index) => {
      const band = bands[index];
      const previous = bands[index - 1];
      const above = band?.above ?? false;
      const below = band?.below ?? false;
      return {
        ...row,
        bb_middle: band?.bbMiddle ?? null,
        bb_std: band?.bbStd ?? null,
        bb_upper: band?.bbUpper ?? null,
        bb_lower: band?.bbLower ?? null,
        above_upper: above,
        below_lower: below,
        bb_buy_signal: previous?.below === true && !below,
        bb_sell_signal: previous?.above === true && !above,
      };
    });
  }

  public getSignal(table: MarketTable<BollingerBandsRow>): TradeSignal {
    const last = table[table.length - 1];
    if (last === undefined) {
      throw new RangeError("Cannot resolve a Bollinger Bands signal from an empty table");
    }
    if (last.bb_buy_signal) {
      return "buy";
    }
    if (last.bb_sell_signal) {
      return "sell";
    }
    return "hold";
  }

  public plot(table: MarketTable<BollingerBandsRow>, surface: ChartSurface): void {
    const x = table.map((row) => row.timestamp);
    const axis = surface.primary;

    axis.plotLine(
      x,
      table.map((row) => row.close),
      { label: "Price", color: "black" },
    );
    axis.plotLine(
      x,
      table.map((row) => row.bb_upper),
      { label: "Upper Band", color: "red", dash: "dashed" },
    );
    axis.plotLine(
      x,
      table.map((row) => row.bb_middle),
      { label: "Middle Band", color: "blue" },
    );
    axis.plotLine(
      x,
      table.map((row) => row.bb_lower),
      { label: "Lower Band", color: "green", dash: "dashed" },
    );

    const buys = markersWhere(table, (row) => row.bb_buy_signal);
    axis.scatter(buys.x, buys.y, {
      label: "Buy Signal",
      color: "green",
      marker: "triangle-up",
      size: 100,
    });
    const sells = markersWhere(table, (row) => row.bb_sell_signal);
    axis.scatter(sells.x, sells.y, {
      label: "Sell Signal",
      color: "red",
      marker: "triangle-down",
      size: 100,
    });

    surface.setTitle(
      `Bollinger Bands (Period=${this.current.period}, StdDev=${this.current.numStd})`,
    );
    surface.legend("upper-left");
  }

  public setParameters(params: Record<string, unknown>): void {
    const { isActive, ...update } = assertValid(updateSchema, params, "bollinger bands params");
    this.current = assertValid(schema, { ...this.current, ...update }, "bollinger bands params");
    if (isActive !== undefined) {
      this.isActive = isActive;
    }
  }
}

export const factory = (params: BollingerBandsParams): BollingerBandsStrategy =>
  new BollingerBandsStrategy(params);
