import { bandLabel } from "../lib/ageBands";
import { formatCurrency } from "../lib/calc";
import type { AgeBand, TuitionTable } from "../lib/schemas";

interface TuitionMetricsProps {
  bands: AgeBand[];
  adjustedTuition: TuitionTable;
  bracket: string;
  region: string;
  highlightColor: string;
}

export function TuitionMetrics({ bands, adjustedTuition, bracket, region, highlightColor }: TuitionMetricsProps) {
  return (
    <section className="rounded-3xl border border-slate-300 bg-white p-5 shadow-sm">
      <p className="text-sm text-slate-600">
        We&apos;re assuming the <strong style={{ color: highlightColor }}>{bracket}</strong> tuition cost per age group in{" "}
        <strong style={{ color: highlightColor }}>{region}</strong> is:
      </p>
      <dl className="mt-4 grid gap-3 sm:grid-cols-3">
        {bands.map((band) => (
          <div key={band.name} className="rounded-2xl border border-slate-200 bg-slate-50 px-4 py-3">
            <dt className="text-xs font-medium text-slate-500">{bandLabel(band)}</dt>
            <dd className="mt-1 text-xl font-semibold text-slate-900">
              {formatCurrency(adjustedTuition[band.name] ?? 0)}
              <span className="ml-1 text-xs font-normal text-slate-500">/ yr</span>
            </dd>
          </div>
        ))}
      </dl>
    </section>
  );
}
