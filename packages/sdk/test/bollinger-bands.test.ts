import { strict as assert } from "node:assert";
import test from "node:test";

import type { ChartAxis, ChartSurface } from "../src/chart.js";
import { BollingerBandsStrategy, type MarketRow } from "../src/index.js";

const buildRows = (closes: number[]): MarketRow[] =>
  closes.map((close, idx) => ({
    timestamp: new Date(Date.UTC(2024, 0, idx + 1)).toISOString(),
    close,
  }));

// closes leave the bands below at row 2 and above at rows 3 and 5
const CLOSES = [10, 10, 8, 9, 9, 12, 12];

test("bollinger bands default to a 20 period, 2 deviation band", () => {
  const strategy = new BollingerBandsStrategy();
  assert.equal(strategy.name, "Bollinger Bands");
  assert.deepEqual(strategy.params, { period: 20, numStd: 2 });
});

test("calculate derives the middle band and deviation per window", () => {
  const strategy = new BollingerBandsStrategy({ period: 2, numStd: 0.5 });
  const rows = strategy.calculate(buildRows(CLOSES));

  assert.deepEqual(
    rows.map((row) => row.bb_middle),
    [null, 10, 9, 8.5, 9, 10.5, 12],
  );
  assert.equal(rows[0]?.bb_std, null);
  assert.equal(rows[0]?.bb_upper, null);
  assert.equal(rows[1]?.bb_std, 0);
  assert.equal(rows[2]?.bb_std, Math.SQRT2);
});

test("calculate signals when price returns inside the bands", () => {
  const strategy = new BollingerBandsStrategy({ period: 2, numStd: 0.5 });
  const rows = strategy.calculate(buildRows(CLOSES));

  assert.deepEqual(
    rows.map((row) => [row.below_lower, row.above_upper]),
    [
      [false, false],
      [false, false],
      [true, false],
      [false, true],
      [false, false],
      [false, true],
      [false, false],
    ],
  );
  assert.deepEqual(
    rows.map((row) => [row.bb_buy_signal, row.bb_sell_signal]),
    [
      [false, false],
      [false, false],
      [false, false],
      [true, false],
      [false, true],
      [false, false],
      [false, true],
    ],
  );
});

test("getSignal reads the last row", () => {
  const strategy = new BollingerBandsStrategy({ period: 2, numStd: 0.5 });
  const rows = strategy.calculate(buildRows(CLOSES));

  assert.equal(strategy.getSignal(rows.slice(0, 3)), "hold");
  assert.equal(strategy.getSignal(rows.slice(0, 4)), "buy");
  assert.equal(strategy.getSignal(rows), "sell");
  assert.throws(() => strategy.getSignal([]), RangeError);
});

test("setParameters rejects a non-positive deviation multiplier", () => {
  const strategy = new BollingerBandsStrategy();
  assert.throws(
    () => strategy.setParameters({ numStd: 0 }),
    /Invalid bollinger bands params: numStd: Number must be greater than 0/,
  );
  strategy.setParameters({ period: 5, isActive: true });
  assert.deepEqual(strategy.params, { period: 5, numStd: 2 });
  assert.equal(strategy.isActive, true);
});

test("plot draws the three bands and the signal markers", () => {
  const strategy = new BollingerBandsStrategy({ period: 2, numStd: 0.5 });
  const rows = strategy.calculate(buildRows(CLOSES));
  const calls: Array<readonly [string, unknown]> = [];
  const axis: ChartAxis = {
    plotLine: (_x, _y, style) => calls.push(["plotLine", style?.label]),
    scatter: (x, _y, style) => calls.push(["scatter", [style?.label, ...x]]),
    horizontalLine: () => calls.push(["horizontalLine", null]),
    fillBetween: () => calls.push(["fillBetween", null]),
    setLabel: (label) => calls.push(["setLabel", label]),
  };
  const surface: ChartSurface = {
    primary: axis,
    twin: () => axis,
    setTitle: (title) => calls.push(["setTitle", title]),
    legend: (position) => calls.push(["legend", position]),
  };

  strategy.plot(rows, surface);

  assert.deepEqual(calls, [
    ["plotLine", "Price"],
    ["plotLine", "Upper Band"],
    ["plotLine", "Middle Band"],
    ["plotLine", "Lower Band"],
    ["scatter", ["Buy Signal", "2024-01-04T00:00:00.000Z"]],
    ["scatter", ["Sell Signal", "2024-01-05T00:00:00.000Z", "2024-01-07T00:00:00.000Z"]],
    ["setTitle", "Bollinger Bands (Period=2, StdDev=0.5)"],
    ["legend", "upper-left"],
  ]);
});
