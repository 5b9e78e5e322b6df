import type { ChangeEvent, ReactNode } from "react";

import { formatPercentage } from "../lib/number-format";
import { CARE_TYPE_LABELS, careTypeSchema, type CareType, type CostMultipliers } from "../lib/schemas";

export type DataSource = "averages" | "own";

export interface CareInputs {
  region: string;
  careType: CareType;
  bracket: string;
  dataSource: DataSource;
}

interface InputWizardProps {
  inputs: CareInputs;
  regions: string[];
  multipliers: CostMultipliers;
  onInputsChange: (updater: (inputs: CareInputs) => CareInputs) => void;
  onEditOwnData: () => void;
  disabled?: boolean;
}

export function InputWizard({
  inputs,
  regions,
  multipliers,
  onInputsChange,
  onEditOwnData,
  disabled = false,
}: InputWizardProps) {
  const handleSelect =
    (field: "region" | "bracket") =>
    (event: ChangeEvent<HTMLSelectElement>) => {
      const value = event.target.value;
      onInputsChange((current) => ({ ...current, [field]: value }));
    };

  const handleCareType = (event: ChangeEvent<HTMLSelectElement>) => {
    const parsed = careTypeSchema.safeParse(event.target.value);
    if (!parsed.success) return;
    onInputsChange((current) => ({ ...current, careType: parsed.data }));
  };

  const handleDataSource = (event: ChangeEvent<HTMLSelectElement>) => {
    const dataSource: DataSource = event.target.value === "own" ? "own" : "averages";
    onInputsChange((current) => ({ ...current, dataSource }));
  };

  const usingAverages = inputs.dataSource === "averages";

  return (
    <div className="grid gap-4">
      <SectionCard title="Where and what kind of care">
        <Field label="I live in:">
          <select
            className={inputClassName}
            value={inputs.region}
            onChange={handleSelect("region")}
            disabled={disabled || !regions.length}
          >
            {regions.map((region) => (
              <option key={region} value={region}>
                {region}
              </option>
            ))}
          </select>
        </Field>

        <Field label="The type of daycare I'm interested in is:">
          <select className={inputClassName} value={inputs.careType} onChange={handleCareType} disabled={disabled}>
            {careTypeSchema.options.map((careType) => (
              <option key={careType} value={careType}>
                {CARE_TYPE_LABELS[careType]}
              </option>
            ))}
          </select>
        </Field>

        <Field label={`Compared with all of ${inputs.region || "my region"}, I expect my cost to be:`}>
          <select
            className={inputClassName}
            value={inputs.bracket}
            onChange={handleSelect("bracket")}
            disabled={disabled || !usingAverages}
          >
            {Object.entries(multipliers).map(([bracket, factor]) => (
              <option key={bracket} value={bracket}>
                {bracket} ({formatPercentage(factor, { maximumFractionDigits: 0 })} of average)
              </option>
            ))}
          </select>
        </Field>
      </SectionCard>

      <SectionCard title="Tuition figures">
        <Field label="Do you want to use regional averages or input your own data?">
          <select className={inputClassName} value={inputs.dataSource} onChange={handleDataSource} disabled={disabled}>
            <option value="averages">Use regional averages</option>
            <option value="own">Input my own data</option>
          </select>
        </Field>

        {usingAverages ? (
          <p className="rounded-2xl bg-slate-50 px-4 py-3 text-xs text-slate-600">
            Regional averages are scaled by your cost bracket. Every bracket is still drawn on the chart for comparison.
          </p>
        ) : (
          <button
            type="button"
            className="w-full rounded-2xl border border-slate-300 px-4 py-3 text-left text-sm font-semibold text-slate-800 transition hover:border-slate-400 hover:text-slate-900 disabled:opacity-60"
            onClick={onEditOwnData}
            disabled={disabled}
          >
            Edit my annual tuition figures
          </button>
        )}
      </SectionCard>
    </div>
  );
}

const inputClassName =
  "w-full rounded-xl border border-slate-300 bg-slate-100 px-3 py-2 text-sm transition focus:border-slate-500 focus:outline-none focus:ring-2 focus:ring-slate-400/60";

interface FieldProps {
  label: string;
  children: ReactNode;
}

function Field({ label, children }: FieldProps) {
  return (
    <label className="grid gap-1 text-sm">
      <span className="font-medium text-slate-700">{label}</span>
      {children}
    </label>
  );
}

interface SectionCardProps {
  title: string;
  children: ReactNode;
}

function SectionCard({ title, children }: SectionCardProps) {
  return (
    <section className="rounded-3xl border border-slate-300 bg-white p-5 shadow-sm">
      <details open className="group space-y-3">
        <summary className="flex cursor-pointer list-none items-center justify-between text-base font-semibold text-slate-800">
          <span>{title}</span>
          <span className="rounded-full border border-slate-300 px-3 py-1 text-xs uppercase tracking-wide text-slate-500 transition group-open:rotate-180">
            ▼
          </span>
        </summary>
        <div className="space-y-3">{children}</div>
      </details>
    </section>
  );
}
