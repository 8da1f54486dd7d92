import { z } from "zod";

import type { ChartSurface } from "../chart.js";
import { assertValid, type MarketRow, type MarketTable, type TradeSignal } from "../market.js";
import { markersWhere, rollingMean } from "./indicators.js";
import type { TradingStrategy } from "./types.js";

export const name = "supertrend" as const;

export const DISPLAY_NAME = "Supertrend";

const fields = {
  period: z.number().int().min(1),
  multiplier: z.number().positive(),
};

export const schema = z.object({
  period: fields.period.default(10),
  multiplier: fields.multiplier.default(3),
});

const updateSchema = z.object({ ...fields, isActive: z.boolean() }).partial();

export type SupertrendParams = z.infer<typeof schema>;

export type SupertrendRow<R extends MarketRow = MarketRow> = R & {
  readonly atr: number | null;
  readonly upper_band: number | null;
  readonly lower_band: number | null;
  readonly in_uptrend: boolean;
};

/**
 * True range per row. The first row has no previous close, so only its
 * high-low span counts. Rows without high/low fall back to the close.
 */
export const trueRange = (table: MarketTable): number[] =>
  table.map((row, index) => {
    const high = row.high ?? row.close;
    const low = row.low ?? row.close;
    const previous = table[index - 1];
    if (previous === undefined) {
      return Math.abs(high - low);
    }
    return Math.max(
      Math.abs(high - low),
      Math.abs(high - previous.close),
      Math.abs(low - previous.close),
    );
  });

/**
 * ATR bands around the high/low midpoint. The trend flips up when a close
 * breaks the previous upper band and down when it breaks the previous
 * lower band; otherwise it carries over and the active band only tightens.
 */
export class SupertrendStrategy implements TradingStrategy<SupertrendRow, SupertrendParams> {
  public readonly name = DISPLAY_NAME;
  public isActive = false;

  private current: SupertrendParams;

  public constructor(params: Partial<SupertrendParams> = {}) {
    this.current = assertValid(schema, params, "supertrend params");
  }

  public get params(): Readonly<SupertrendParams> {
    return { ...this.current };
  }

  public calculate(table: MarketTable): SupertrendRow[] {
    const { period, multiplier } = this.current;
    const atr = rollingMean(trueRange(table), period);
    const upper: Array<number | null> = [];
    const lower: Array<number | null> = [];
    const uptrend: boolean[] = [];

    table.forEach((row, index) => {
      const range = atr[index] ?? null;
      const midpoint = ((row.high ?? row.close) + (row.low ?? row.close)) / 2;
      upper.push(range === null ? null : midpoint + multiplier * range);
      lower.push(range === null ? null : midpoint - multiplier * range);

      if (index === 0) {
        uptrend.push(true);
        return;
      }
      const prevUpper = upper[index - 1] ?? null;
      const prevLower = lower[index - 1] ?? null;
      if (prevUpper !== null && row.close > prevUpper) {
        uptrend.push(true);
        return;
      }
      if (prevLower !== null && row.close < prevLower) {
        uptrend.push(false);
        return;
      }

      const trending = uptrend[index - 1] ?? true;
      uptrend.push(trending);
      const curLower = lower[index] ?? null;
      const curUpper = upper[index] ?? null;
      if (trending && curLower !== null && prevLower !== null && curLower < prevLower) {
        lower[index] = prevLower;
      }
      if (!trending && curUpper !== null && prevUpper !== null && curUpper > prevUpper) {
        upper[index] = prevUpper;
      }
    });

    return table.map((row, index) => ({
      ...row,
      atr: atr[index] ?? null,
      upper_band: upper[index] ?? null,
      lower_band: lower[index] ?? null,
      in_uptrend: uptrend[index] ?? true,
    }));
  }

  /** Buy on a flip into an uptrend, sell on a flip out of one. */
  public getSignal(table: MarketTable<SupertrendRow>): TradeSignal {
    const last = table[table.length - 1];
    const previous = table[table.length - 2];
    if (last === undefined || previous === undefined) {
      return "hold";
    }
    if (!previous.in_uptrend && last.in_uptrend) {
      return "buy";
    }
    if (previous.in_uptrend && !last.in_uptrend) {
      return "sell";
    }
    return "hold";
  }

  public plot(table: MarketTable<SupertrendRow>, surface: ChartSurface): void {
    const x = table.map((row) => row.timestamp);
    const axis = surface.primary;

    axis.plotLine(
      x,
      table.map((row) => row.close),
      { label: "Price", color: "black" },
    );
    axis.plotLine(
      x,
      table.map((row) => row.upper_band),
      { label: "Upper Band", color: "green", dash: "dashed" },
    );
    axis.plotLine(
      x,
      table.map((row) => row.lower_band),
      { label: "Lower Band", color: "red", dash: "dashed" },
    );

    const up = markersWhere(table, (row) => row.in_uptrend);
    axis.scatter(up.x, up.y, { label: "Uptrend", color: "green", marker: "circle" });
    const down = markersWhere(table, (row) => !row.in_uptrend);
    axis.scatter(down.x, down.y, { label: "Downtrend", color: "red", marker: "circle" });

    surface.setTitle(
      `Supertrend (Period=${this.current.period}, Mult=${this.current.multiplier})`,
    );
    surface.legend("upper-left");
  }

  public setParameters(params: Record<string, unknown>): void {
    const { isActive, ...update } = assertValid(updateSchema, params, "supertrend params");
    this.current = assertValid(schema, { ...this.current, ...update }, "supertrend params");
    if (isActive !== undefined) {
      this.isActive = isActive;
    }
  }
}

export const factory = (params: SupertrendParams): SupertrendStrategy =>
  new SupertrendStrategy(params);
