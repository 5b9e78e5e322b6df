import type { ChangeEvent } from "react";

import type { AgesConfig } from "../lib/config";
import { formatMonths } from "../lib/number-format";
import type { Interval } from "../lib/schemas";

interface DurationSliderProps {
  interval: Interval;
  ages: AgesConfig;
  highlightColor: string;
  disabled?: boolean;
  onChange: (interval: Interval) => void;
}

export function DurationSlider({ interval, ages, highlightColor, disabled, onChange }: DurationSliderProps) {
  const { minAge, maxAge, step } = ages;
  const span = Math.max(maxAge - minAge, 1);
  const leftPercent = ((interval.start - minAge) / span) * 100;
  const rightPercent = 100 - ((interval.end - minAge) / span) * 100;

  const handleStart = (event: ChangeEvent<HTMLInputElement>) => {
    const value = Number(event.target.value);
    if (Number.isNaN(value)) return;
    onChange({ start: clamp(value, minAge, interval.end), end: interval.end });
  };

  const handleEnd = (event: ChangeEvent<HTMLInputElement>) => {
    const value = Number(event.target.value);
    if (Number.isNaN(value)) return;
    onChange({ start: interval.start, end: clamp(value, interval.start, maxAge) });
  };

  return (
    <section className="rounded-3xl border border-slate-300 bg-white px-4 py-4 text-slate-600 shadow-sm sm:px-6">
      <div className="flex flex-wrap items-center justify-between gap-2 text-xs font-semibold text-slate-500">
        <span className="uppercase tracking-tight">Time in daycare</span>
        <span className="text-slate-800">
          {interval.start} – {interval.end} months
        </span>
      </div>
      <p className="mt-2 text-sm text-slate-700">
        I expect my child to be in daycare from{" "}
        <strong style={{ color: highlightColor }}>{formatMonths(interval.start)}</strong> to{" "}
        <strong style={{ color: highlightColor }}>{formatMonths(interval.end)}</strong> of age.
      </p>
      <div className="mt-3">
        <div className="relative h-9">
          <div className="pointer-events-none absolute left-0 right-0 top-1/2 h-0.5 -translate-y-1/2 rounded-full bg-slate-200" />
          <div
            className="pointer-events-none absolute top-1/2 h-1 -translate-y-1/2 rounded-full"
            style={{ left: `${leftPercent}%`, right: `${rightPercent}%`, backgroundColor: highlightColor }}
          />
          <input
            type="range"
            aria-label="Care starts at month"
            min={minAge}
            max={maxAge}
            step={step}
            value={interval.start}
            onChange={handleStart}
            disabled={disabled}
            className="range-input absolute inset-0 m-0 h-9 w-full cursor-pointer"
          />
          <input
            type="range"
            aria-label="Care ends at month"
            min={minAge}
            max={maxAge}
            step={step}
            value={interval.end}
            onChange={handleEnd}
            disabled={disabled}
            className="range-input absolute inset-0 m-0 h-9 w-full cursor-pointer"
          />
        </div>
        <div className="mt-3 flex items-center justify-between gap-4 text-[11px] font-medium text-slate-500">
          <span>{formatMonths(minAge)}</span>
          <span>{formatMonths(maxAge)}</span>
        </div>
      </div>
    </section>
  );
}

function clamp(value: number, min: number, max: number): number {
  if (min >= max) return min;
  return Math.min(Math.max(value, min), max);
}
