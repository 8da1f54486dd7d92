import { z } from "zod";

import type { ChartSurface } from "../chart.js";
import { assertValid, type MarketRow, type MarketTable, type TradeSignal } from "../market.js";
import { markersWhere, rollingMean } from "./indicators.js";
import type { TradingStrategy } from "./types.js";

export const name = "golden_cross" as const;

export const DISPLAY_NAME = "Golden Cross";

const fields = {
  shortPeriod: z.number().int().min(1),
  longPeriod: z.number().int().min(2),
};

export const schema = z
  .object({
    shortPeriod: fields.shortPeriod.default(50),
    longPeriod: fields.longPeriod.default(200),
  })
  .superRefine((value, ctx) => {
    if (value.shortPeriod >= value.longPeriod) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "shortPeriod must be less than longPeriod",
        path: ["shortPeriod"],
      });
    }
  });

const updateSchema = z.object({ ...fields, isActive: z.boolean() }).partial();

export type GoldenCrossParams = z.infer<typeof schema>;

export type GoldenCrossRow<R extends MarketRow = MarketRow> = R & {
  readonly ma_short: number | null;
  readonly ma_long: number | null;
  readonly golden_cross: boolean;
  readonly death_cross: boolean;
};

/**
 * Moving-average crossover: the short average crossing above the long one
 * is a golden cross (buy), crossing below a death cross (sell).
 */
export class GoldenCrossStrategy implements TradingStrategy<GoldenCrossRow, GoldenCrossParams> {
  public readonly name = DISPLAY_NAME;
  public isActive = false;

  private current: GoldenCrossParams;

  public constructor(params: Partial<GoldenCrossParams> = {}) {
    this.current = assertValid(schema, params, "golden cross params");
  }

  public get params(): Readonly<GoldenCrossParams> {
    return { ...this.current };
  }

  public calculate(table: MarketTable): GoldenCrossRow[] {
    const closes = table.map((row) => row.close);
    const short = rollingMean(closes, this.current.shortPeriod);
    const long = rollingMean(closes, this.current.longPeriod);

    return table.map((row, index) => {
      const prevShort = short[index - 1] ?? null;
      const prevLong = long[index - 1] ?? null;
      const curShort = short[index] ?? null;
      const curLong = long[index] ?? null;
      const comparable =
        prevShort !== null && prevLong !== null && curShort !== null && curLong !== null;

      return {
        ...row,
        ma_short: curShort,
        ma_long: curLong,
        golden_cross: comparable && prevShort <= prevLong && curShort > curLong,
        death_cross: comparable && prevShort >= prevLong && curShort < curLong,
      };
    });
  }

  public getSignal(table: MarketTable<GoldenCrossRow>): TradeSignal {
    const last = table[table.length - 1];
    if (last === undefined) {
      throw new RangeError("Cannot resolve a crossover signal from an empty table");
    }
    if (last.golden_cross) {
      return "buy";
    }
    if (last.death_cross) {
      return "sell";
    }
    return "hold";
  }

  public plot(table: MarketTable<GoldenCrossRow>, surface: ChartSurface): void {
    const { shortPeriod, longPeriod } = this.current;
    const x = table.map((row) => row.timestamp);
    const axis = surface.primary;

    axis.plotLine(
      x,
      table.map((row) => row.close),
      { label: "Price", color: "black", opacity: 0.5 },
    );
    axis.plotLine(
      x,
      table.map((row) => row.ma_short),
      { label: `${shortPeriod}-period MA`, color: "blue" },
    );
    axis.plotLine(
      x,
      table.map((row) => row.ma_long),
      { label: `${longPeriod}-period MA`, color: "orange" },
    );

    const golden = markersWhere(table, (row) => row.golden_cross);
    axis.scatter(golden.x, golden.y, {
      label: "Golden Cross",
      color: "green",
      marker: "triangle-up",
      size: 100,
    });
    const death = markersWhere(table, (row) => row.death_cross);
    axis.scatter(death.x, death.y, {
      label: "Death Cross",
      color: "red",
      marker: "triangle-down",
      size: 100,
    });

    surface.setTitle(`Moving Average Crossover (${shortPeriod}/${longPeriod})`);
    surface.legend("upper-left");
  }

  public setParameters(params: Record<string, unknown>): void {
    const { isActive, ...update } = assertValid(updateSchema, params, "golden cross params");
    this.current = assertValid(schema, { ...this.current, ...update }, "golden cross params");
    if (isActive !== undefined) {
      this.isActive = isActive;
    }
  }
}

export const factory = (params: GoldenCrossParams): GoldenCrossStrategy =>
  new GoldenCrossStrategy(params);
