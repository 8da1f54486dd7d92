import { z } from "zod";

/** -----------------------------------------------------------------------
 *  Shared enums & primitives
 *  -------------------------------------------------------------------- */

/** ISO-8601 timestamp string (UTC). */
export type ISODate = string;

/** Candle intervals the bot requests from exchanges. */
export type Timeframe = "1m" | "5m" | "15m" | "1h" | "4h" | "1d";

/** Action recommended by a strategy for the most recent observation. */
export type TradeSignal = "buy" | "sell" | "hold";

export const TimeframeSchema = z.enum(["1m", "5m", "15m", "1h", "4h", "1d"]);

export const TradeSignalSchema = z.enum(["buy", "sell", "hold"]);

/** -----------------------------------------------------------------------
 *  Market data
 *  -------------------------------------------------------------------- */

/**
 * One observation of an instrument. `timestamp` and `close` are required;
 * OHLCV and any extra columns are carried through strategies untouched.
 */
export interface MarketRow {
  readonly timestamp: ISODate;
  readonly close: number;
  readonly open?: number;
  readonly high?: number;
  readonly low?: number;
  readonly volume?: number;
  readonly [column: string]: unknown;
}

/** Rows ordered by ascending timestamp; array order is time order. */
export type MarketTable<R extends MarketRow = MarketRow> = ReadonlyArray<R>;

/** Runtime validator for {@link MarketRow}. */
export const MarketRowSchema = z
  .object({
    timestamp: z.string().datetime(),
    close: z.number().positive(),
    open: z.number().optional(),
    high: z.number().optional(),
    low: z.number().optional(),
    volume: z.number().nonnegative().optional(),
  })
  .passthrough();

/** Runtime validator for {@link MarketTable}; rejects out-of-order rows. */
export const MarketTableSchema = z.array(MarketRowSchema).superRefine((rows, ctx) => {
  for (let i = 1; i < rows.length; i++) {
    const prev = rows[i - 1];
    const curr = rows[i];
    if (prev && curr && Date.parse(curr.timestamp) < Date.parse(prev.timestamp)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, "timestamp"],
        message: "rows must be ordered by ascending timestamp",
      });
    }
  }
});

/**
 * Raw exchange candle: `[timestampMs, open, high, low, close, volume]`.
 */
export const OhlcvCandleSchema = z.tuple([
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
]);

export type OhlcvCandle = z.infer<typeof OhlcvCandleSchema>;

/** -----------------------------------------------------------------------
 *  Helper: runtime assertion using zod
 *  -------------------------------------------------------------------- */

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param label - Descriptive label for error reporting.
 * @throws Error when validation fails.
 */
export function assertValid<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  label = "payload",
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new Error(`Invalid ${label}: ${issues.join("; ")}`);
  }
  return parsed.data;
}
