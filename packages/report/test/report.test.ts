import { strict as assert } from "node:assert";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import { strategies } from "@perpsignal/sdk";

import { ChartRecorder, writeChartDocument, type ChartDocument } from "../src/index.js";

const T1 = "2024-01-01T00:00:00.000Z";
const T2 = "2024-01-01T01:00:00.000Z";
const T3 = "2024-01-01T02:00:00.000Z";

test("a fresh recorder has no title, one empty axis and no legend", () => {
  const document = new ChartRecorder().toDocument();
  assert.deepEqual(document, {
    title: null,
    axes: [{ id: "y", label: null, primitives: [] }],
    legend: null,
  });
});

test("twin axes get sequential ids", () => {
  const recorder = new ChartRecorder();
  recorder.twin().setLabel("second");
  recorder.twin().setLabel("third");

  assert.deepEqual(
    recorder.toDocument().axes.map((axis) => [axis.id, axis.label]),
    [
      ["y", null],
      ["y2", "second"],
      ["y3", "third"],
    ],
  );
});

test("plotLine pairs timestamps with values", () => {
  const recorder = new ChartRecorder();
  recorder.primary.plotLine([T1, T2], [100, 101], { label: "Price", color: "black" });

  assert.deepEqual(recorder.toDocument().axes[0]?.primitives, [
    {
      kind: "line",
      points: [
        { time: T1, value: 100 },
        { time: T2, value: 101 },
      ],
      style: { label: "Price", color: "black" },
    },
  ]);
});

test("plotLine records null values as gaps", () => {
  const recorder = new ChartRecorder();
  recorder.primary.plotLine([T1, T2], [null, 10.5], { label: "20-period MA" });

  assert.deepEqual(recorder.toDocument().axes[0]?.primitives, [
    {
      kind: "line",
      points: [
        { time: T1, value: null },
        { time: T2, value: 10.5 },
      ],
      style: { label: "20-period MA" },
    },
  ]);
});

test("scatter records markers and joins the legend", () => {
  const recorder = new ChartRecorder();
  recorder.primary.scatter([T3], [102], {
    label: "Golden Cross",
    color: "green",
    marker: "triangle-up",
    size: 100,
  });
  recorder.legend("upper-left");
  const document = recorder.toDocument();

  assert.deepEqual(document.axes[0]?.primitives, [
    {
      kind: "markers",
      points: [{ time: T3, value: 102 }],
      style: { label: "Golden Cross", color: "green", marker: "triangle-up", size: 100 },
    },
  ]);
  assert.deepEqual(document.legend?.entries, [{ axis: "y", label: "Golden Cross", color: "green" }]);
  assert.throws(() => recorder.primary.scatter([T1, T2], [1]), /scatter: x has 2 points but y has 1/);
});

test("plotLine rejects series of different lengths", () => {
  const recorder = new ChartRecorder();
  assert.throws(
    () => recorder.primary.plotLine([T1, T2], [100]),
    /plotLine: x has 2 points but y has 1/,
  );
});

test("fillBetween keeps only the masked points", () => {
  const recorder = new ChartRecorder();
  recorder.primary.fillBetween([T1, T2, T3], [0.002, 0, 0.003], 0, [true, false, true], {
    color: "red",
    opacity: 0.3,
  });

  assert.deepEqual(recorder.toDocument().axes[0]?.primitives, [
    {
      kind: "fill",
      baseline: 0,
      points: [
        { time: T1, value: 0.002 },
        { time: T3, value: 0.003 },
      ],
      style: { color: "red", opacity: 0.3 },
    },
  ]);
});

test("fillBetween rejects a mask of the wrong length", () => {
  const recorder = new ChartRecorder();
  assert.throws(
    () => recorder.primary.fillBetween([T1, T2], [1, 2], 0, [true]),
    /fillBetween mask: x has 2 points but y has 1/,
  );
});

test("legend combines labeled primitives from every axis", () => {
  const recorder = new ChartRecorder();
  const twin = recorder.twin();
  recorder.primary.plotLine([T1], [100], { label: "Price", color: "black" });
  twin.plotLine([T1], [0.0001], { label: "Funding Rate" });
  twin.horizontalLine(0.001, { color: "red" });
  recorder.legend("upper-left");

  assert.deepEqual(recorder.toDocument().legend, {
    position: "upper-left",
    entries: [
      { axis: "y", label: "Price", color: "black" },
      { axis: "y2", label: "Funding Rate", color: null },
    ],
  });
});

test("recording a funding rate plot yields a two-axis chart", () => {
  const strategy = new strategies.fundingRate.FundingRateStrategy({
    simulator: strategies.simulation.createFixedSimulator([0.0004, -0.0025]),
  });
  const rows = strategy.calculate([
    { timestamp: T1, close: 100 },
    { timestamp: T2, close: 101 },
  ]);
  const recorder = new ChartRecorder();

  strategy.plot(rows, recorder);
  const document = recorder.toDocument();

  assert.equal(document.title, "Funding Rate Analysis");
  assert.equal(document.axes.length, 2);
  assert.equal(document.axes[1]?.label, "Funding Rate");
  assert.deepEqual(
    document.axes[1]?.primitives.map((primitive) => primitive.kind),
    ["line", "reference", "reference", "fill", "fill"],
  );
  const greenFill = document.axes[1]?.primitives[4];
  assert.deepEqual(greenFill?.kind === "fill" ? greenFill.points : null, [
    { time: T2, value: -0.0025 },
  ]);
  assert.deepEqual(
    document.legend?.entries.map((entry) => entry.label),
    ["Price", "Funding Rate"],
  );
});

test("writeChartDocument writes chart.json into the output directory", async (t) => {
  const root = await mkdtemp(join(tmpdir(), "perpsignal-report-"));
  t.after(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const document: ChartDocument = { title: "Empty", axes: [], legend: null };
  const written = await writeChartDocument(join(root, "charts", "btc"), document);

  assert.equal(written, join(root, "charts", "btc", "chart.json"));
  const contents = await readFile(written, "utf-8");
  assert.deepEqual(JSON.parse(contents), document);
  assert.ok(contents.endsWith("}\n"));
});
