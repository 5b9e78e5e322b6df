import {
  accumulate,
  projectMonthlyCosts,
  summarizeInterval,
  type CumulativeSeries,
  type IntervalSummary,
  type MonthlySeries,
  type ProjectionInput,
} from "./calc";
import type { Interval } from "./schemas";

export interface ProjectionRequest extends ProjectionInput {
  bracket: string;
  interval: Interval;
}

export interface ProjectionResult {
  monthly: MonthlySeries;
  cumulative: CumulativeSeries;
  summary: IntervalSummary;
}

export function computeProjection(request: ProjectionRequest): ProjectionResult {
  const monthly = projectMonthlyCosts(request);
  const cumulative = accumulate(monthly);
  const summary = summarizeInterval(cumulative, request.bracket, request.interval);
  return { monthly, cumulative, summary };
}

/** Stable across key order, so equal requests built differently share a key. */
export function requestKey(request: ProjectionRequest): string {
  return JSON.stringify(request, (_key, value: unknown) => {
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return Object.fromEntries(
        Object.entries(value).sort(([a], [b]) => a.localeCompare(b)),
      );
    }
    return value;
  });
}

/**
 * Remembers the last request and its result. Multiplier order decides column
 * order, so it is part of the key.
 */
export function createProjectionCache(compute: (request: ProjectionRequest) => ProjectionResult = computeProjection) {
  let last: { key: string; result: ProjectionResult } | null = null;

  return (request: ProjectionRequest): ProjectionResult => {
    const key = `${requestKey(request)}|${Object.keys(request.multipliers).join(",")}`;
    if (last && last.key === key) {
      return last.result;
    }
    const result = compute(request);
    last = { key, result };
    return result;
  };
}
