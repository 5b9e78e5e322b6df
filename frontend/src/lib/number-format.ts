import { DomainError } from "./errors";

export function formatPercentage(value: number, options: Intl.NumberFormatOptions = {}) {
  return new Intl.NumberFormat(undefined, {
    style: "percent",
    maximumFractionDigits: 1,
    ...options,
  }).format(value);
}

const plural = (count: number, unit: string) => `${count} ${unit}${count === 1 ? "" : "s"}`;

/** 30 → "2 years 6 months", 12 → "1 year", 0 → "0 months". */
export function formatMonths(total: number): string {
  if (!Number.isInteger(total) || total < 0) {
    throw new DomainError(`Cannot format ${total} as a number of months.`);
  }
  const years = Math.floor(total / 12);
  const months = total % 12;

  if (years === 0) return plural(months, "month");
  if (months === 0) return plural(years, "year");
  return `${plural(years, "year")} ${plural(months, "month")}`;
}
