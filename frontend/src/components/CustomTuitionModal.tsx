import { useState } from "react";

import { bandLabel } from "../lib/ageBands";
import { formatCurrency } from "../lib/calc";
import { tuitionTableSchema, type AgeBand, type TuitionTable } from "../lib/schemas";

import { ModalShell } from "./modal/ModalShell";

interface CustomTuitionModalProps {
  bands: AgeBand[];
  tuition: TuitionTable;
  onClose: () => void;
  onSave: (tuition: TuitionTable) => void;
}

type DraftTable = Record<string, string>;

export function CustomTuitionModal({ bands, tuition, onClose, onSave }: CustomTuitionModalProps) {
  const [draft, setDraft] = useState<DraftTable>(() =>
    Object.fromEntries(bands.map((band) => [band.name, String(tuition[band.name] ?? 0)])),
  );
  const [formError, setFormError] = useState<string | null>(null);

  const handleSave = () => {
    setFormError(null);
    const parsed = tuitionTableSchema.safeParse(
      Object.fromEntries(Object.entries(draft).map(([band, value]) => [band, value.trim() === "" ? NaN : Number(value)])),
    );
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const band = issue.path.join(".");
      setFormError(`${band || "Tuition"}: enter a non-negative annual amount.`);
      return;
    }
    onSave(parsed.data);
  };

  const annualTotal = Object.values(draft).reduce((sum, value) => {
    const amount = Number(value);
    return Number.isFinite(amount) ? sum + amount : sum;
  }, 0);

  return (
    <ModalShell
      title="Enter your cost data"
      description="Annual tuition you expect to pay for each age group."
      onClose={onClose}
      onSubmit={handleSave}
      error={formError}
    >
      <div className="grid gap-3">
        {bands.map((band) => (
          <label key={band.name} className="grid gap-1 text-sm">
            <span className="font-medium text-slate-700">{bandLabel(band)} care cost (annual)</span>
            <input
              className="w-full rounded-xl border border-slate-300 bg-slate-100 px-3 py-2 text-sm"
              type="number"
              min="0"
              step="100"
              value={draft[band.name] ?? ""}
              onChange={(event) => {
                const value = event.target.value;
                setDraft((current) => ({ ...current, [band.name]: value }));
              }}
            />
          </label>
        ))}
      </div>

      <p className="mt-4 rounded-2xl border border-slate-200 bg-slate-50 px-4 py-3 text-xs text-slate-600">
        One year in every age group would cost {formatCurrency(annualTotal)}. Your figures are used as entered, with no
        cost bracket applied.
      </p>
    </ModalShell>
  );
}
