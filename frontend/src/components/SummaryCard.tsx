import { formatCurrency, type IntervalSummary } from "../lib/calc";

interface SummaryCardProps {
  summary: IntervalSummary | null;
  region: string;
  bracket: string;
  careType: string;
}

export function SummaryCard({ summary, region, bracket, careType }: SummaryCardProps) {
  if (!summary) return null;

  const metrics: Array<{ label: string; value: string; help?: string }> = [
    { label: "Total Cost", value: formatCurrency(summary.totalCost) },
    { label: "Avg. Monthly Cost", value: formatCurrency(summary.avgMonthlyCost) },
    { label: "Duration", value: `${summary.durationMonths} months` },
    { label: "Cost Bracket", value: bracket, help: "Based on your expectations" },
    { label: "Region", value: region },
    { label: "Care Type", value: careType },
  ];

  return (
    <section className="rounded-3xl border border-slate-300 bg-white p-5 shadow-sm">
      <h3 className="text-base font-semibold text-slate-800">Summary</h3>
      <dl className="mt-4 grid gap-3 sm:grid-cols-2">
        {metrics.map((metric) => (
          <div key={metric.label} className="rounded-2xl border border-slate-200 px-4 py-3" title={metric.help}>
            <dt className="text-xs font-medium text-slate-500">{metric.label}</dt>
            <dd className="mt-1 text-lg font-semibold text-slate-900">{metric.value}</dd>
          </div>
        ))}
      </dl>
    </section>
  );
}
