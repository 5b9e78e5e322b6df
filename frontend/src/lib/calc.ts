import { resolveAgeBand, validateAgeBands } from "./ageBands";
import { ConfigurationError, DomainError, LookupError } from "./errors";
import {
  defaultAgeBands,
  type AgeBand,
  type CostMultipliers,
  type Interval,
  type TuitionTable,
} from "./schemas";

export type BracketValues = Record<string, number>;

export interface SeriesPoint {
  month: number;
  values: BracketValues;
}

export interface CostSeries {
  brackets: string[];
  points: SeriesPoint[];
}

export type MonthlySeries = CostSeries;
export type CumulativeSeries = CostSeries;

export interface AgeRange {
  minAge: number;
  maxAge: number;
}

export interface ProjectionInput {
  tuition: TuitionTable;
  multipliers: CostMultipliers;
  range: AgeRange;
  step: number;
  bands?: AgeBand[];
}

export interface IntervalSummary {
  totalCost: number;
  avgMonthlyCost: number;
  durationMonths: number;
}

const PRECISION = 1e6;

/** Truncates toward zero after dropping floating-point noise below 1e-6. */
export function truncateCurrency(value: number): number {
  return Math.trunc(Math.round(value * PRECISION) / PRECISION);
}

/** Month index over [minAge, maxAge] by `step`; maxAge is always the last point. */
export function monthIndex({ minAge, maxAge }: AgeRange, step: number): number[] {
  const months: number[] = [];
  for (let month = minAge; month <= maxAge; month += step) {
    months.push(month);
  }
  if (months[months.length - 1] !== maxAge) {
    months.push(maxAge);
  }
  return months;
}

function assertProjectionInput({ tuition, multipliers, range, step, bands = defaultAgeBands }: ProjectionInput) {
  const { minAge, maxAge } = range;
  if (!Number.isInteger(minAge) || !Number.isInteger(maxAge) || minAge < 0) {
    throw new ConfigurationError(`Age range must be non-negative whole months, got ${minAge}–${maxAge}.`);
  }
  if (minAge > maxAge) {
    throw new ConfigurationError(`Minimum age ${minAge} is greater than maximum age ${maxAge}.`);
  }
  if (!Number.isInteger(step) || step <= 0) {
    throw new ConfigurationError(`Step must be a positive whole number of months, got ${step}.`);
  }

  const entries = Object.entries(multipliers);
  if (!entries.length) {
    throw new ConfigurationError("At least one cost bracket is required.");
  }
  for (const [bracket, factor] of entries) {
    if (!Number.isFinite(factor) || factor <= 0) {
      throw new ConfigurationError(`Multiplier for "${bracket}" must be positive, got ${factor}.`);
    }
  }
  for (const [band, annual] of Object.entries(tuition)) {
    if (!Number.isFinite(annual) || annual < 0) {
      throw new ConfigurationError(`Annual tuition for "${band}" must be non-negative, got ${annual}.`);
    }
  }
  validateAgeBands(bands, maxAge);
}

export function projectMonthlyCosts(input: ProjectionInput): MonthlySeries {
  assertProjectionInput(input);
  const { tuition, multipliers, range, step, bands = defaultAgeBands } = input;
  const brackets = Object.keys(multipliers);

  const points = monthIndex(range, step).map((month) => {
    const band = resolveAgeBand(month, { bands, ...range });
    if (!Object.hasOwn(tuition, band.name)) {
      throw new LookupError(band.name, `No tuition figure for age band "${band.name}".`);
    }
    const annual = tuition[band.name];

    const values: BracketValues = {};
    for (const bracket of brackets) {
      values[bracket] = truncateCurrency((annual * multipliers[bracket]) / 12);
    }
    return { month, values };
  });

  return { brackets, points };
}

export function accumulate(series: MonthlySeries): CumulativeSeries {
  const running: BracketValues = Object.fromEntries(series.brackets.map((bracket) => [bracket, 0]));

  const points = series.points.map(({ month, values }) => {
    const totals: BracketValues = {};
    for (const bracket of series.brackets) {
      running[bracket] += values[bracket] ?? 0;
      totals[bracket] = running[bracket];
    }
    return { month, values: totals };
  });

  return { brackets: [...series.brackets], points };
}

/** Inverse of `accumulate`. */
export function differentiate(series: CumulativeSeries): MonthlySeries {
  const points = series.points.map(({ month, values }, index) => {
    const previous = series.points[index - 1];
    const monthly: BracketValues = {};
    for (const bracket of series.brackets) {
      monthly[bracket] = values[bracket] - (previous ? previous.values[bracket] : 0);
    }
    return { month, values: monthly };
  });
  return { brackets: [...series.brackets], points };
}

function pointAt(series: CostSeries, month: number): SeriesPoint {
  const point = series.points.find((candidate) => candidate.month === month);
  if (!point) {
    const first = series.points[0]?.month;
    const last = series.points[series.points.length - 1]?.month;
    const span = first === undefined ? "an empty series" : `months ${first}–${last}`;
    throw new LookupError(String(month), `Month ${month} is not a point of ${span}.`);
  }
  return point;
}

export function summarizeInterval(
  cumulative: CumulativeSeries,
  bracket: string,
  interval: Interval,
): IntervalSummary {
  if (!cumulative.brackets.includes(bracket)) {
    throw new LookupError(bracket, `Unknown cost bracket "${bracket}".`);
  }
  const { start, end } = interval;
  if (start > end) {
    throw new DomainError(`Interval start ${start} is after its end ${end}.`);
  }

  const startPoint = pointAt(cumulative, start);
  const endPoint = pointAt(cumulative, end);

  const inWindow = differentiate(cumulative).points.filter(
    (point) => point.month >= start && point.month <= end,
  );
  const windowTotal = inWindow.reduce((sum, point) => sum + point.values[bracket], 0);

  return {
    totalCost: endPoint.values[bracket] - startPoint.values[bracket],
    avgMonthlyCost: Math.round(windowTotal / inWindow.length),
    durationMonths: end - start,
  };
}

export function adjustTuition(tuition: TuitionTable, multiplier: number): TuitionTable {
  return Object.fromEntries(
    Object.entries(tuition).map(([band, annual]) => [band, annual * multiplier]),
  );
}

export function formatCurrency(value: number) {
  return new Intl.NumberFormat(undefined, {
    style: "currency",
    currency: "USD",
    maximumFractionDigits: 0,
  }).format(value);
}
