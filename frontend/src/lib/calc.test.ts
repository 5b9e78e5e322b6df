import { describe, expect, it } from "vitest";

import {
  accumulate,
  adjustTuition,
  differentiate,
  monthIndex,
  projectMonthlyCosts,
  summarizeInterval,
  truncateCurrency,
  type ProjectionInput,
} from "./calc";
import { ConfigurationError, DomainError, LookupError } from "./errors";

const tuition = { Infant: 12000, Toddler: 9600, Preschool: 8400 };

const baseInput: ProjectionInput = {
  tuition,
  multipliers: { Average: 1 },
  range: { minAge: 0, maxAge: 60 },
  step: 1,
};

const valueAt = (series: ReturnType<typeof projectMonthlyCosts>, month: number, bracket: string) =>
  series.points.find((point) => point.month === month)?.values[bracket];

describe("monthIndex", () => {
  it("keeps the last month when the step does not divide the range", () => {
    expect(monthIndex({ minAge: 0, maxAge: 10 }, 3)).toEqual([0, 3, 6, 9, 10]);
  });

  it("does not repeat the last month when the step divides the range", () => {
    expect(monthIndex({ minAge: 0, maxAge: 12 }, 6)).toEqual([0, 6, 12]);
  });

  it("yields a single point for an empty span", () => {
    expect(monthIndex({ minAge: 5, maxAge: 5 }, 1)).toEqual([5]);
  });
});

describe("projectMonthlyCosts", () => {
  it("divides each band's annual tuition into monthly costs", () => {
    const monthly = projectMonthlyCosts(baseInput);

    expect(monthly.brackets).toEqual(["Average"]);
    expect(monthly.points).toHaveLength(61);
    expect(valueAt(monthly, 0, "Average")).toBe(1000);
    expect(valueAt(monthly, 11, "Average")).toBe(1000);
    expect(valueAt(monthly, 12, "Average")).toBe(800);
    expect(valueAt(monthly, 48, "Average")).toBe(700);
    expect(valueAt(monthly, 60, "Average")).toBe(700);
  });

  it("produces one column per bracket in multiplier order", () => {
    const monthly = projectMonthlyCosts({ ...baseInput, multipliers: { Low: 0.8, Average: 1, High: 1.25 } });

    expect(monthly.brackets).toEqual(["Low", "Average", "High"]);
    expect(monthly.points[0].values).toEqual({ Low: 800, Average: 1000, High: 1250 });
    expect(valueAt(monthly, 12, "Low")).toBe(640);
    expect(valueAt(monthly, 12, "High")).toBe(1000);
    expect(valueAt(monthly, 48, "Low")).toBe(560);
    expect(valueAt(monthly, 48, "High")).toBe(875);
  });

  it("truncates toward zero after applying the multiplier", () => {
    const monthly = projectMonthlyCosts({
      ...baseInput,
      tuition: { Infant: 1000, Toddler: 1000, Preschool: 1000 },
      multipliers: { Average: 1, High: 1.3 },
      range: { minAge: 0, maxAge: 0 },
    });

    // 1000 / 12 = 83.33; 1300 / 12 = 108.33
    expect(monthly.points[0].values).toEqual({ Average: 83, High: 108 });
  });

  it("samples by step and always includes the last month", () => {
    const monthly = projectMonthlyCosts({ ...baseInput, range: { minAge: 0, maxAge: 10 }, step: 3 });
    expect(monthly.points.map((point) => point.month)).toEqual([0, 3, 6, 9, 10]);
  });

  it("returns identical output for identical input and leaves the input untouched", () => {
    const input = structuredClone(baseInput);
    const first = projectMonthlyCosts(input);
    const second = projectMonthlyCosts(input);

    expect(second).toEqual(first);
    expect(input).toEqual(baseInput);
  });

  it("rejects an inverted range", () => {
    expect(() => projectMonthlyCosts({ ...baseInput, range: { minAge: 10, maxAge: 5 } })).toThrow(
      "Minimum age 10 is greater than maximum age 5.",
    );
  });

  it("rejects non-positive multipliers", () => {
    expect(() => projectMonthlyCosts({ ...baseInput, multipliers: { Free: 0 } })).toThrow(ConfigurationError);
    expect(() => projectMonthlyCosts({ ...baseInput, multipliers: { Odd: -1 } })).toThrow(
      'Multiplier for "Odd" must be positive, got -1.',
    );
  });

  it("rejects invalid steps, empty brackets and negative tuition", () => {
    expect(() => projectMonthlyCosts({ ...baseInput, step: 0 })).toThrow(ConfigurationError);
    expect(() => projectMonthlyCosts({ ...baseInput, step: 1.5 })).toThrow(ConfigurationError);
    expect(() => projectMonthlyCosts({ ...baseInput, multipliers: {} })).toThrow(
      "At least one cost bracket is required.",
    );
    expect(() => projectMonthlyCosts({ ...baseInput, tuition: { ...tuition, Toddler: -1 } })).toThrow(
      ConfigurationError,
    );
  });

  it("fails with a lookup error when a band has no tuition figure", () => {
    expect(() =>
      projectMonthlyCosts({ ...baseInput, tuition: { Infant: 12000 }, range: { minAge: 0, maxAge: 24 } }),
    ).toThrow(LookupError);
  });

  it("does not treat inherited object properties as tuition figures", () => {
    try {
      projectMonthlyCosts({ ...baseInput, bands: [{ name: "toString", fromMonth: 0 }] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LookupError);
      expect(error).toMatchObject({ key: "toString" });
    }
  });

  it("rejects overlapping age bands", () => {
    const bands = [
      { name: "Infant", fromMonth: 0, toMonth: 12 },
      { name: "Toddler", fromMonth: 6 },
    ];
    expect(() => projectMonthlyCosts({ ...baseInput, tuition: { Infant: 1200, Toddler: 2400 }, bands })).toThrow(
      'Overlap between "Infant" (ends 12) and "Toddler" (starts 6).',
    );
  });

  it("rejects age bands with a gap as a configuration error", () => {
    const bands = [
      { name: "Infant", fromMonth: 0, toMonth: 12 },
      { name: "Toddler", fromMonth: 18 },
    ];
    expect(() => projectMonthlyCosts({ ...baseInput, tuition: { Infant: 1200, Toddler: 2400 }, bands })).toThrow(
      ConfigurationError,
    );
  });

  it("rejects age bands that stop before the end of the range", () => {
    const bands = [
      { name: "Infant", fromMonth: 0, toMonth: 12 },
      { name: "Toddler", fromMonth: 12, toMonth: 48 },
    ];
    expect(() => projectMonthlyCosts({ ...baseInput, tuition: { Infant: 1200, Toddler: 2400 }, bands })).toThrow(
      "Age bands end at month 48 but the supported range runs to 60.",
    );
  });
});

describe("truncateCurrency", () => {
  it("drops the fractional part toward zero", () => {
    expect(truncateCurrency(83.9)).toBe(83);
    expect(truncateCurrency(-2.5)).toBe(-2);
  });

  it("ignores floating-point noise just below a whole unit", () => {
    expect(truncateCurrency(769.9999999999)).toBe(770);
  });
});

describe("accumulate", () => {
  it("is the prefix sum of the monthly series for every bracket", () => {
    const monthly = projectMonthlyCosts({ ...baseInput, multipliers: { Low: 0.8, Average: 1, High: 1.25 } });
    const cumulative = accumulate(monthly);

    for (const bracket of monthly.brackets) {
      let running = 0;
      monthly.points.forEach((point, index) => {
        running += point.values[bracket];
        expect(cumulative.points[index].month).toBe(point.month);
        expect(cumulative.points[index].values[bracket]).toBe(running);
      });
    }
  });

  it("matches the twelve infant months plus the first toddler month", () => {
    const cumulative = accumulate(projectMonthlyCosts(baseInput));
    expect(cumulative.points[12].values.Average).toBe(12800);
  });

  it("keeps brackets independent", () => {
    const cumulative = accumulate({
      brackets: ["A", "B"],
      points: [
        { month: 0, values: { A: 1, B: 10 } },
        { month: 1, values: { A: 2, B: 20 } },
      ],
    });
    expect(cumulative.points[1].values).toEqual({ A: 3, B: 30 });
  });

  it("returns an empty series for an empty input", () => {
    expect(accumulate({ brackets: ["A"], points: [] })).toEqual({ brackets: ["A"], points: [] });
  });

  it("is undone by differentiate", () => {
    const monthly = projectMonthlyCosts({ ...baseInput, step: 7 });
    expect(differentiate(accumulate(monthly))).toEqual(monthly);
  });
});

describe("summarizeInterval", () => {
  const cumulative = accumulate(projectMonthlyCosts(baseInput));

  it("reports total, average and duration over the interval", () => {
    const summary = summarizeInterval(cumulative, "Average", { start: 6, end: 54 });

    // C[54] = 12 * 1000 + 36 * 800 + 7 * 700 = 45700, C[6] = 7000
    expect(summary.totalCost).toBe(45700 - 7000);
    expect(summary.durationMonths).toBe(48);
    // months 6..54 inclusive: (6 * 1000 + 36 * 800 + 7 * 700) / 49 = 810.2
    expect(summary.avgMonthlyCost).toBe(810);
  });

  it("scales with the tuition table and keeps the duration", () => {
    const doubled = accumulate(
      projectMonthlyCosts({ ...baseInput, tuition: { Infant: 24000, Toddler: 19200, Preschool: 16800 } }),
    );
    const base = summarizeInterval(cumulative, "Average", { start: 6, end: 54 });
    const scaled = summarizeInterval(doubled, "Average", { start: 6, end: 54 });

    expect(scaled.totalCost).toBe(base.totalCost * 2);
    expect(scaled.avgMonthlyCost).toBe(base.avgMonthlyCost * 2);
    expect(scaled.durationMonths).toBe(base.durationMonths);
  });

  it("handles a zero-length interval", () => {
    expect(summarizeInterval(cumulative, "Average", { start: 12, end: 12 })).toEqual({
      totalCost: 0,
      avgMonthlyCost: 800,
      durationMonths: 0,
    });
  });

  it("rejects unknown brackets", () => {
    expect(() => summarizeInterval(cumulative, "Premium", { start: 0, end: 12 })).toThrow(
      'Unknown cost bracket "Premium".',
    );
  });

  it("rejects interval ends outside the series", () => {
    expect(() => summarizeInterval(cumulative, "Average", { start: 0, end: 61 })).toThrow(
      "Month 61 is not a point of months 0–60.",
    );
  });

  it("rejects interval ends that fall between sampled months", () => {
    const sampled = accumulate(projectMonthlyCosts({ ...baseInput, range: { minAge: 0, maxAge: 10 }, step: 3 }));
    expect(() => summarizeInterval(sampled, "Average", { start: 4, end: 10 })).toThrow(LookupError);
  });

  it("rejects a reversed interval", () => {
    expect(() => summarizeInterval(cumulative, "Average", { start: 20, end: 10 })).toThrow(DomainError);
  });

  it("rejects any interval over an empty series", () => {
    expect(() => summarizeInterval({ brackets: ["Average"], points: [] }, "Average", { start: 0, end: 0 })).toThrow(
      "Month 0 is not a point of an empty series.",
    );
  });
});

describe("adjustTuition", () => {
  it("scales every band by the multiplier", () => {
    expect(adjustTuition({ Infant: 12000, Toddler: 9600 }, 1.25)).toEqual({ Infant: 15000, Toddler: 12000 });
  });
});
