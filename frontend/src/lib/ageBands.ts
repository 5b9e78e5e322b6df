import { ConfigurationError, DomainError } from "./errors";
import { defaultAgeBands, type AgeBand } from "./schemas";

export interface ResolveOptions {
  bands?: AgeBand[];
  minAge?: number;
  maxAge?: number;
}

export interface BandIssue {
  index: number;
  message: string;
}

/**
 * Checks that a band partition starts at month 0, has no gaps or overlaps,
 * and that only the last band is open-ended.
 */
export function findBandIssues(bands: AgeBand[]): BandIssue[] {
  const issues: BandIssue[] = [];
  if (!bands.length) {
    return [{ index: 0, message: "At least one age band is required." }];
  }

  const names = new Set<string>();
  bands.forEach((band, index) => {
    const previous = bands[index - 1];
    const isLast = index === bands.length - 1;

    if (names.has(band.name)) {
      issues.push({ index, message: `Duplicate age band "${band.name}".` });
    }
    names.add(band.name);

    if (!previous && band.fromMonth !== 0) {
      issues.push({ index, message: `First age band must start at month 0, not ${band.fromMonth}.` });
    }
    if (previous && previous.toMonth !== undefined && band.fromMonth !== previous.toMonth) {
      const kind = band.fromMonth > previous.toMonth ? "Gap" : "Overlap";
      issues.push({
        index,
        message: `${kind} between "${previous.name}" (ends ${previous.toMonth}) and "${band.name}" (starts ${band.fromMonth}).`,
      });
    }
    if (band.toMonth === undefined && !isLast) {
      issues.push({ index, message: `Only the last age band may be open-ended ("${band.name}").` });
    }
    if (band.toMonth !== undefined && band.toMonth <= band.fromMonth) {
      issues.push({ index, message: `Age band "${band.name}" is empty.` });
    }
  });

  return issues;
}

export function validateAgeBands(bands: AgeBand[], maxAge?: number): void {
  const issues = findBandIssues(bands);
  if (issues.length) {
    throw new ConfigurationError(issues.map((issue) => issue.message).join(" "));
  }
  const last = bands[bands.length - 1];
  if (maxAge !== undefined && last.toMonth !== undefined && maxAge >= last.toMonth) {
    throw new ConfigurationError(
      `Age bands end at month ${last.toMonth} but the supported range runs to ${maxAge}.`,
    );
  }
}

/** Upper bounds are exclusive: month 12 belongs to the band starting at 12. */
export function resolveAgeBand(month: number, options: ResolveOptions = {}): AgeBand {
  const { bands = defaultAgeBands, minAge = 0, maxAge = Number.POSITIVE_INFINITY } = options;

  if (!Number.isInteger(month) || month < 0) {
    throw new DomainError(`Month must be a non-negative integer, got ${month}.`);
  }
  if (month < minAge || month > maxAge) {
    throw new DomainError(`Month ${month} is outside the supported range ${minAge}–${maxAge}.`);
  }

  const band = bands.find(
    (candidate) =>
      month >= candidate.fromMonth && (candidate.toMonth === undefined || month < candidate.toMonth),
  );
  if (!band) {
    throw new DomainError(`No age band covers month ${month}.`);
  }
  return band;
}

export function bandLabel(band: AgeBand): string {
  if (band.toMonth === undefined) {
    return `${band.name} (${band.fromMonth}+ months)`;
  }
  return `${band.name} (${band.fromMonth}–${band.toMonth} months)`;
}
