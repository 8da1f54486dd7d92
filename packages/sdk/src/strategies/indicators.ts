/**
 * Trailing-window statistics over a column. Rows before the window fills
 * (and windows containing a gap) yield null.
 */

const windowAt = (
  values: ReadonlyArray<number | null>,
  end: number,
  period: number,
): number[] | null => {
  if (end + 1 < period) {
    return null;
  }
  const window: number[] = [];
  for (let index = end + 1 - period; index <= end; index += 1) {
    const value = values[index];
    if (value === null || value === undefined) {
      return null;
    }
    window.push(value);
  }
  return window;
};

const mean = (window: ReadonlyArray<number>): number =>
  window.reduce((acc, value) => acc + value, 0) / window.length;

export const rollingMean = (
  values: ReadonlyArray<number | null>,
  period: number,
): Array<number | null> =>
  values.map((_, index) => {
    const window = windowAt(values, index, period);
    return window === null ? null : mean(window);
  });

/** Sample standard deviation (n - 1); a one-row window has none. */
export const rollingStd = (
  values: ReadonlyArray<number | null>,
  period: number,
): Array<number | null> =>
  values.map((_, index) => {
    const window = windowAt(values, index, period);
    if (window === null || window.length < 2) {
      return null;
    }
    const average = mean(window);
    const variance =
      window.reduce((acc, value) => {
        const diff = value - average;
        return acc + diff * diff;
      }, 0) /
      (window.length - 1);
    return Math.sqrt(variance);
  });

/** Points of `table` where `flag` holds, as x/y pairs for a marker series. */
export const markersWhere = <R extends { readonly timestamp: string; readonly close: number }>(
  table: ReadonlyArray<R>,
  flag: (row: R) => boolean,
): { x: string[]; y: number[] } => {
  const picked = table.filter(flag);
  return { x: picked.map((row) => row.timestamp), y: picked.map((row) => row.close) };
};
