import { ConfigurationError, DomainError } from "./errors";

export interface TickLayoutOptions {
  min: number;
  max: number;
  stride: number;
  left: number;
  right: number;
  /** Base ticks closer than this to `left` or `right` are dropped. */
  minGap?: number;
}

export interface Tick {
  value: number;
  label: string;
  emphasized: boolean;
}

export function layoutTicks({ min, max, stride, left, right, minGap = 0 }: TickLayoutOptions): Tick[] {
  if (!(stride > 0)) {
    throw new ConfigurationError(`Tick stride must be positive, got ${stride}.`);
  }
  if (min > max) {
    throw new ConfigurationError(`Axis minimum ${min} is greater than maximum ${max}.`);
  }
  if (left > right) {
    throw new DomainError(`Highlighted interval ${left}–${right} is reversed.`);
  }
  if (left < min || right > max) {
    throw new DomainError(`Highlighted interval ${left}–${right} is outside the axis ${min}–${max}.`);
  }

  const emphasized = new Set([left, right]);
  const values = new Set<number>(emphasized);
  for (let value = min; value <= max; value += stride) {
    const crowded = [...emphasized].some((mark) => value !== mark && Math.abs(value - mark) < minGap);
    if (!crowded) values.add(value);
  }

  return [...values]
    .sort((a, b) => a - b)
    .map((value, index) => ({
      value,
      label: index === 0 ? `${value} months` : String(value),
      emphasized: emphasized.has(value),
    }));
}
