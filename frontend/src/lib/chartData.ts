import type { CostSeries } from "./calc";
import type { Interval } from "./schemas";

export type ChartRow = { month: number } & Record<string, number | null>;

export interface ChartRowOptions {
  highlight: string;
  interval: Interval;
  /** Subtract each bracket's value at `interval.start`, so care begins at 0. */
  offsetFromStart?: boolean;
}

export const windowKey = (bracket: string) => `${bracket}:window`;

export function buildChartRows(series: CostSeries, options: ChartRowOptions): ChartRow[] {
  const { highlight, interval, offsetFromStart = false } = options;
  const origin = series.points.find((point) => point.month === interval.start);

  return series.points.map(({ month, values }) => {
    const row: ChartRow = { month };
    for (const bracket of series.brackets) {
      const base = offsetFromStart && origin ? origin.values[bracket] : 0;
      row[bracket] = values[bracket] - base;
    }
    const inside = month >= interval.start && month <= interval.end;
    row[windowKey(highlight)] = inside ? row[highlight] : null;
    return row;
  });
}

export interface IntervalMarker {
  month: number;
  value: number;
}

export function intervalMarkers(rows: ChartRow[], bracket: string, interval: Interval): IntervalMarker[] {
  return [interval.start, interval.end].flatMap((month) => {
    const value = rows.find((row) => row.month === month)?.[bracket];
    return typeof value === "number" ? [{ month, value }] : [];
  });
}
