import { describe, expect, it } from "vitest";

import { ConfigurationError, DomainError } from "./errors";
import { layoutTicks } from "./ticks";

describe("layoutTicks", () => {
  it("merges the interval ends into the base ticks and emphasizes them", () => {
    const ticks = layoutTicks({ min: 0, max: 72, stride: 10, left: 6, right: 60 });

    expect(ticks.map((tick) => tick.value)).toEqual([0, 6, 10, 20, 30, 40, 50, 60, 70]);
    expect(ticks.filter((tick) => tick.emphasized).map((tick) => tick.value)).toEqual([6, 60]);
    expect(ticks[0].label).toBe("0 months");
    expect(ticks[1].label).toBe("6");
  });

  it("drops base ticks that crowd an emphasized tick", () => {
    const ticks = layoutTicks({ min: 0, max: 72, stride: 10, left: 6, right: 60, minGap: 5 });
    expect(ticks.map((tick) => tick.value)).toEqual([0, 6, 20, 30, 40, 50, 60, 70]);
  });

  it("does not duplicate ends that sit on the base grid", () => {
    const ticks = layoutTicks({ min: 0, max: 30, stride: 10, left: 0, right: 30 });

    expect(ticks).toEqual([
      { value: 0, label: "0 months", emphasized: true },
      { value: 10, label: "10", emphasized: false },
      { value: 20, label: "20", emphasized: false },
      { value: 30, label: "30", emphasized: true },
    ]);
  });

  it("emphasizes a single tick for a zero-length interval", () => {
    const ticks = layoutTicks({ min: 0, max: 20, stride: 10, left: 15, right: 15 });

    expect(ticks.map((tick) => tick.value)).toEqual([0, 10, 15, 20]);
    expect(ticks.filter((tick) => tick.emphasized)).toEqual([{ value: 15, label: "15", emphasized: true }]);
  });

  it("rejects a non-positive stride or an inverted axis", () => {
    expect(() => layoutTicks({ min: 0, max: 10, stride: 0, left: 0, right: 10 })).toThrow(ConfigurationError);
    expect(() => layoutTicks({ min: 10, max: 0, stride: 1, left: 0, right: 10 })).toThrow(ConfigurationError);
  });

  it("rejects intervals that are reversed or off the axis", () => {
    expect(() => layoutTicks({ min: 0, max: 10, stride: 5, left: 8, right: 2 })).toThrow(DomainError);
    expect(() => layoutTicks({ min: 0, max: 10, stride: 5, left: 2, right: 11 })).toThrow(
      "Highlighted interval 2–11 is outside the axis 0–10.",
    );
  });
});
