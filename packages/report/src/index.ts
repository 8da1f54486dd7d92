import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type {
  ChartAxis,
  ChartSurface,
  FillStyle,
  ISODate,
  LegendPosition,
  LineStyle,
  MarkerStyle,
} from "@perpsignal/sdk";

export interface LineSeries {
  readonly kind: "line";
  /** null values are gaps in the line. */
  readonly points: ReadonlyArray<{ readonly time: ISODate; readonly value: number | null }>;
  readonly style: LineStyle;
}

export interface MarkerSeries {
  readonly kind: "markers";
  readonly points: ReadonlyArray<{ readonly time: ISODate; readonly value: number }>;
  readonly style: MarkerStyle;
}

export interface ReferenceLine {
  readonly kind: "reference";
  readonly value: number;
  readonly style: LineStyle;
}

export interface FillRegion {
  readonly kind: "fill";
  readonly baseline: number;
  /** Only the points where the fill condition held. */
  readonly points: ReadonlyArray<{ readonly time: ISODate; readonly value: number }>;
  readonly style: FillStyle;
}

export type ChartPrimitive = LineSeries | MarkerSeries | ReferenceLine | FillRegion;

export interface AxisDocument {
  readonly id: string;
  readonly label: string | null;
  readonly primitives: ReadonlyArray<ChartPrimitive>;
}

export interface LegendEntry {
  readonly axis: string;
  readonly label: string;
  readonly color: string | null;
}

/**
 * Serialisable chart produced by {@link ChartRecorder}, ready for a
 * front end to draw.
 */
export interface ChartDocument {
  readonly title: string | null;
  readonly axes: ReadonlyArray<AxisDocument>;
  readonly legend: {
    readonly position: LegendPosition;
    readonly entries: ReadonlyArray<LegendEntry>;
  } | null;
}

const assertSameLength = (what: string, x: ReadonlyArray<unknown>, y: ReadonlyArray<unknown>) => {
  if (x.length !== y.length) {
    throw new RangeError(`${what}: x has ${x.length} points but y has ${y.length}`);
  }
};

class RecordedAxis implements ChartAxis {
  public label: string | null = null;
  public readonly primitives: ChartPrimitive[] = [];

  public constructor(public readonly id: string) {}

  public plotLine(
    x: ReadonlyArray<ISODate>,
    y: ReadonlyArray<number | null>,
    style: LineStyle = {},
  ): void {
    assertSameLength("plotLine", x, y);
    this.primitives.push({
      kind: "line",
      points: x.map((time, index) => ({ time, value: y[index] ?? null })),
      style,
    });
  }

  public scatter(x: ReadonlyArray<ISODate>, y: ReadonlyArray<number>, style: MarkerStyle = {}): void {
    assertSameLength("scatter", x, y);
    this.primitives.push({
      kind: "markers",
      points: x.map((time, index) => ({ time, value: y[index] ?? Number.NaN })),
      style,
    });
  }

  public horizontalLine(y: number, style: LineStyle = {}): void {
    this.primitives.push({ kind: "reference", value: y, style });
  }

  public fillBetween(
    x: ReadonlyArray<ISODate>,
    y: ReadonlyArray<number>,
    baseline: number,
    where: ReadonlyArray<boolean>,
    style: FillStyle = {},
  ): void {
    assertSameLength("fillBetween", x, y);
    assertSameLength("fillBetween mask", x, where);
    const points: Array<{ time: ISODate; value: number }> = [];
    x.forEach((time, index) => {
      const value = y[index];
      if (where[index] === true && value !== undefined) {
        points.push({ time, value });
      }
    });
    this.primitives.push({ kind: "fill", baseline, points, style });
  }

  public setLabel(label: string): void {
    this.label = label;
  }

  public toDocument(): AxisDocument {
    return { id: this.id, label: this.label, primitives: [...this.primitives] };
  }
}

/**
 * {@link ChartSurface} that records drawing calls instead of rendering.
 */
export class ChartRecorder implements ChartSurface {
  public readonly primary: ChartAxis;
  private readonly axes: RecordedAxis[];
  private title: string | null = null;
  private legendPosition: LegendPosition | null = null;

  public constructor() {
    const primary = new RecordedAxis("y");
    this.primary = primary;
    this.axes = [primary];
  }

  public twin(): ChartAxis {
    const axis = new RecordedAxis(`y${this.axes.length + 1}`);
    this.axes.push(axis);
    return axis;
  }

  public setTitle(title: string): void {
    this.title = title;
  }

  public legend(position: LegendPosition): void {
    this.legendPosition = position;
  }

  public toDocument(): ChartDocument {
    const axes = this.axes.map((axis) => axis.toDocument());
    const position = this.legendPosition;
    return {
      title: this.title,
      axes,
      legend:
        position === null
          ? null
          : {
              position,
              entries: axes.flatMap((axis) =>
                axis.primitives.flatMap((primitive) =>
                  primitive.style.label === undefined
                    ? []
                    : [
                        {
                          axis: axis.id,
                          label: primitive.style.label,
                          color: primitive.style.color ?? null,
                        },
                      ],
                ),
              ),
            },
    };
  }
}

/**
 * Writes `chart.json` into `outputDir`, creating it if needed.
 *
 * @returns The path written.
 */
export const writeChartDocument = async (
  outputDir: string,
  document: ChartDocument,
): Promise<string> => {
  await mkdir(outputDir, { recursive: true });
  const chartPath = join(outputDir, "chart.json");
  await writeFile(chartPath, `${JSON.stringify(document, null, 2)}\n`, { encoding: "utf-8" });
  return chartPath;
};
