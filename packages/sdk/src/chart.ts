import type { ISODate } from "./market.js";

export type LegendPosition = "upper-left" | "upper-right" | "lower-left" | "lower-right";

export interface LineStyle {
  /** Legend entry; unlabeled primitives stay out of the legend. */
  readonly label?: string;
  readonly color?: string;
  readonly dash?: "solid" | "dashed";
  readonly opacity?: number;
}

export type MarkerShape = "circle" | "triangle-up" | "triangle-down";

export interface MarkerStyle {
  readonly label?: string;
  readonly color?: string;
  readonly marker?: MarkerShape;
  readonly size?: number;
}

export interface FillStyle {
  readonly label?: string;
  readonly color?: string;
  readonly opacity?: number;
}

/**
 * A y-axis sharing the chart's time x-axis. All series are keyed by the
 * same ISO timestamps; a null value is a gap (e.g. an indicator warm-up).
 */
export interface ChartAxis {
  plotLine(x: ReadonlyArray<ISODate>, y: ReadonlyArray<number | null>, style?: LineStyle): void;
  /** Unconnected markers, typically at signal rows. */
  scatter(x: ReadonlyArray<ISODate>, y: ReadonlyArray<number>, style?: MarkerStyle): void;
  horizontalLine(y: number, style?: LineStyle): void;
  /**
   * Shades between `y` and `baseline` at the points where `where` is true.
   */
  fillBetween(
    x: ReadonlyArray<ISODate>,
    y: ReadonlyArray<number>,
    baseline: number,
    where: ReadonlyArray<boolean>,
    style?: FillStyle,
  ): void;
  setLabel(label: string): void;
}

/** Drawing target handed to {@link TradingStrategy.plot}. */
export interface ChartSurface {
  readonly primary: ChartAxis;
  /** Adds an independent y-axis over the same x-axis. */
  twin(): ChartAxis;
  setTitle(title: string): void;
  /** Shows one legend combining labeled primitives of every axis. */
  legend(position: LegendPosition): void;
}
