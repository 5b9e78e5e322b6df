import { useMemo, useState } from "react";

import { exportProjectionToExcel, type ExportSnapshot } from "../lib/exportExcel";

interface ExportCardProps {
  snapshot: ExportSnapshot | null;
  loading?: boolean;
}

export function ExportCard({ snapshot, loading }: ExportCardProps) {
  const [exportError, setExportError] = useState<string | null>(null);
  const disabled = loading || !snapshot;
  const helperText = useMemo(() => {
    if (loading) return "Loading tuition data… export will unlock when ready.";
    if (!snapshot) return "Choose your inputs to enable export.";
    return "Download every month of the estimate as an Excel file.";
  }, [loading, snapshot]);

  const handleExport = () => {
    if (!snapshot) return;
    setExportError(null);
    try {
      exportProjectionToExcel(snapshot);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(err);
      setExportError(err instanceof Error ? err.message : "Export failed.");
    }
  };

  return (
    <section className="rounded-3xl border border-slate-300 bg-white p-5 shadow-sm">
      <div className="flex items-center justify-between gap-3">
        <div>
          <h3 className="text-sm font-semibold text-slate-800">Export</h3>
          <p className="text-xs text-slate-500">{helperText}</p>
        </div>
        <button
          type="button"
          onClick={handleExport}
          disabled={disabled}
          className="rounded-2xl bg-emerald-600 px-3 py-2 text-xs font-semibold text-white shadow hover:bg-emerald-500 disabled:cursor-not-allowed disabled:bg-slate-300"
        >
          Export to Excel
        </button>
      </div>
      {exportError ? <p className="mt-3 text-xs text-red-600">{exportError}</p> : null}
    </section>
  );
}
