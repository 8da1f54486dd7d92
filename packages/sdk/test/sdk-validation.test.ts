import { strict as assert } from "node:assert";
import test from "node:test";
import {
  MarketRowSchema,
  MarketTableSchema,
  OhlcvCandleSchema,
  TimeframeSchema,
  TradeSignalSchema,
  assertValid,
  type MarketRow,
} from "../src/index.js";

// ============================================================================
// MarketRow validation tests
// ============================================================================

test("MarketRowSchema accepts a full OHLCV row", () => {
  const row: MarketRow = {
    timestamp: "2024-01-01T00:00:00.000Z",
    open: 100,
    high: 102,
    low: 99,
    close: 101,
    volume: 12.5,
  };
  assert.ok(MarketRowSchema.safeParse(row).success);
});

test("MarketRowSchema keeps extra columns", () => {
  const parsed = MarketRowSchema.parse({
    timestamp: "2024-01-01T00:00:00.000Z",
    close: 101,
    vwap: 100.5,
  });
  assert.equal(parsed.vwap, 100.5);
});

test("MarketRowSchema rejects a non-positive close", () => {
  const result = MarketRowSchema.safeParse({ timestamp: "2024-01-01T00:00:00.000Z", close: 0 });
  assert.equal(result.success, false);
});

test("MarketRowSchema rejects a non-ISO timestamp", () => {
  const result = MarketRowSchema.safeParse({ timestamp: "yesterday", close: 100 });
  assert.equal(result.success, false);
});

// ============================================================================
// MarketTable validation tests
// ============================================================================

test("MarketTableSchema accepts ascending and equal timestamps", () => {
  const result = MarketTableSchema.safeParse([
    { timestamp: "2024-01-01T00:00:00.000Z", close: 100 },
    { timestamp: "2024-01-01T00:00:00.000Z", close: 100 },
    { timestamp: "2024-01-02T00:00:00.000Z", close: 101 },
  ]);
  assert.ok(result.success);
});

test("MarketTableSchema accepts an empty table", () => {
  assert.ok(MarketTableSchema.safeParse([]).success);
});

test("MarketTableSchema reports the first out-of-order row", () => {
  assert.throws(
    () =>
      assertValid(
        MarketTableSchema,
        [
          { timestamp: "2024-01-02T00:00:00.000Z", close: 100 },
          { timestamp: "2024-01-01T00:00:00.000Z", close: 101 },
        ],
        "market table",
      ),
    /^Error: Invalid market table: 1\.timestamp: rows must be ordered by ascending timestamp$/,
  );
});

// ============================================================================
// Primitive schemas
// ============================================================================

test("OhlcvCandleSchema requires six numbers", () => {
  assert.ok(OhlcvCandleSchema.safeParse([1704067200000, 1, 2, 0.5, 1.5, 10]).success);
  assert.equal(OhlcvCandleSchema.safeParse([1704067200000, 1, 2, 0.5, 1.5]).success, false);
});

test("TimeframeSchema and TradeSignalSchema reject unknown values", () => {
  assert.ok(TimeframeSchema.safeParse("4h").success);
  assert.equal(TimeframeSchema.safeParse("2h").success, false);
  assert.ok(TradeSignalSchema.safeParse("hold").success);
  assert.equal(TradeSignalSchema.safeParse("short").success, false);
});

// ============================================================================
// assertValid
// ============================================================================

test("assertValid returns parsed data", () => {
  const signal = assertValid(TradeSignalSchema, "buy", "signal");
  assert.equal(signal, "buy");
});

test("assertValid labels root-level issues", () => {
  assert.throws(
    () => assertValid(TradeSignalSchema, 5, "signal"),
    (error: unknown) =>
      error instanceof Error && error.message.startsWith("Invalid signal: (root): "),
  );
});

test("assertValid defaults the label to payload", () => {
  assert.throws(() => assertValid(MarketRowSchema, {}), /^Error: Invalid payload: /);
});
