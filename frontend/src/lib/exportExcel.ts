import { formatCurrency } from "./calc";
import { formatMonths } from "./number-format";
import type { ProjectionResult } from "./projection";
import type { Interval, TuitionTable } from "./schemas";

export interface ExportSnapshot {
  region: string;
  careType: string;
  bracket: string;
  interval: Interval;
  adjustedTuition: TuitionTable;
  result: ProjectionResult;
}

function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function makeTable(headers: string[], rows: Array<Array<string | number>>): string {
  const headerRow = `<tr>${headers.map((h) => `<th>${escapeHtml(h)}</th>`).join("")}</tr>`;
  const bodyRows = rows
    .map(
      (cells) =>
        `<tr>${cells
          .map((cell) => `<td>${typeof cell === "number" ? cell : escapeHtml(cell)}</td>`)
          .join("")}</tr>`,
    )
    .join("");
  return `<table>${headerRow}${bodyRows}</table>`;
}

export function makeProjectionTable({ monthly, cumulative }: ProjectionResult): string {
  const headers = [
    "Month",
    ...monthly.brackets.map((bracket) => `Monthly (${bracket})`),
    ...cumulative.brackets.map((bracket) => `Cumulative (${bracket})`),
  ];

  const body = monthly.points.map((point, index) => [
    point.month,
    ...monthly.brackets.map((bracket) => point.values[bracket]),
    ...cumulative.brackets.map((bracket) => cumulative.points[index].values[bracket]),
  ]);

  return makeTable(headers, body);
}

export function buildExportHtml(snapshot: ExportSnapshot): string {
  const { region, careType, bracket, interval, adjustedTuition, result } = snapshot;

  const inputs = makeTable(
    ["Inputs", "Value"],
    [
      ["Region", region],
      ["Care Type", careType],
      ["Cost Bracket", bracket],
      ["Care Starts", formatMonths(interval.start)],
      ["Care Ends", formatMonths(interval.end)],
    ],
  );

  const tuition = makeTable(
    ["Age Band", "Annual Tuition"],
    Object.entries(adjustedTuition).map(([band, annual]) => [band, formatCurrency(annual)]),
  );

  const summary = makeTable(
    ["Summary", "Value"],
    [
      ["Total Cost", formatCurrency(result.summary.totalCost)],
      ["Avg. Monthly Cost", formatCurrency(result.summary.avgMonthlyCost)],
      ["Duration", `${result.summary.durationMonths} months`],
    ],
  );

  return `
<html>
  <head>
    <meta charset="UTF-8" />
    <title>Childcare Projection Export</title>
    <style>
      body { font-size: 10pt; }
      table { border-collapse: collapse; margin: 8px 0; }
      th, td { padding: 2px 4px; }
    </style>
  </head>
  <body>
    <div>Childcare Cost Estimate Export</div>
    ${inputs}
    ${tuition}
    ${summary}
    <div>Full Projection (every month)</div>
    ${makeProjectionTable(result)}
  </body>
</html>
  `;
}

export function exportProjectionToExcel(snapshot: ExportSnapshot): void {
  if (!snapshot.result.monthly.points.length) {
    throw new Error("No projection data to export. Choose your inputs first.");
  }

  const html = buildExportHtml(snapshot);
  const blob = new Blob([html], { type: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet" });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = "childcare-projection.xlsx";
  document.body.appendChild(link);
  link.click();
  document.body.removeChild(link);
  URL.revokeObjectURL(url);
}
