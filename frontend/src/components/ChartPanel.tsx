import { useMemo, useState } from "react";

import {
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  ReferenceArea,
  ReferenceDot,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";

import { formatCurrency } from "../lib/calc";
import { buildChartRows, intervalMarkers, windowKey } from "../lib/chartData";
import type { AgesConfig, AppConfig, ThemeConfig } from "../lib/config";
import type { ProjectionResult } from "../lib/projection";
import type { Interval } from "../lib/schemas";
import { layoutTicks, type Tick } from "../lib/ticks";

interface ChartPanelProps {
  result: ProjectionResult | null;
  highlight: string;
  interval: Interval;
  ages: AgesConfig;
  chart: AppConfig["chart"];
  theme: ThemeConfig;
  loading?: boolean;
  error?: string | null;
}

type DisplayMode = "cumulative" | "monthly";

export function ChartPanel({ result, highlight, interval, ages, chart, theme, loading = false, error }: ChartPanelProps) {
  const [mode, setMode] = useState<DisplayMode>("cumulative");

  const rows = useMemo(() => {
    if (!result) return [];
    const series = mode === "cumulative" ? result.cumulative : result.monthly;
    return buildChartRows(series, { highlight, interval, offsetFromStart: mode === "cumulative" });
  }, [result, mode, highlight, interval]);

  const ticks = useMemo(
    () =>
      layoutTicks({
        min: ages.minAge,
        max: ages.maxAge,
        stride: chart.tickStride,
        left: interval.start,
        right: interval.end,
        minGap: chart.tickMinGap,
      }),
    [ages.minAge, ages.maxAge, chart.tickStride, chart.tickMinGap, interval.start, interval.end],
  );

  const markers = useMemo(() => intervalMarkers(rows, highlight, interval), [rows, highlight, interval]);
  const brackets = result?.monthly.brackets ?? [];
  const hasData = rows.length > 0;

  return (
    <section className="relative flex flex-col gap-6 rounded-3xl border border-slate-300 bg-white p-6 pb-4 text-slate-500 shadow-sm">
      <header className="mb-4 flex flex-wrap items-center justify-between gap-4">
        <div>
          <h2 className="text-lg font-semibold text-slate-800">Cost estimate over time</h2>
          <p className="text-xs text-slate-500">
            Every cost bracket is drawn for comparison; <strong style={{ color: theme.highlightColor }}>{highlight}</strong>{" "}
            is highlighted while your child is in care.
          </p>
        </div>
        <Toggle mode={mode} onChange={setMode} disabled={!hasData || loading} />
      </header>

      <div className="relative">
        {!hasData && !loading ? (
          <EmptyState />
        ) : (
          <ResponsiveContainer width="100%" height={360}>
            <LineChart data={rows} margin={{ top: 24, right: 24, left: 0, bottom: 0 }}>
              <CartesianGrid strokeDasharray="4 4" stroke="#e2e8f0" vertical={false} />
              <ReferenceArea x1={interval.start} x2={interval.end} fill={theme.highlightColor} fillOpacity={0.04} />
              <XAxis
                dataKey="month"
                type="number"
                domain={[ages.minAge, ages.maxAge]}
                ticks={ticks.map((tick) => tick.value)}
                interval={0}
                tick={(props: AxisTickProps) => <AxisTick {...props} ticks={ticks} theme={theme} />}
              />
              <YAxis
                tickFormatter={(value: number) => formatCurrency(value)}
                tick={{ fontSize: 12, fill: "#475569" }}
                width={100}
              />
              <Tooltip
                formatter={(value) => (typeof value === "number" ? formatCurrency(value) : value)}
                labelFormatter={(label) => `Month ${label}`}
              />
              <Legend verticalAlign="top" height={36} />
              {brackets.map((bracket) => (
                <Line
                  key={bracket}
                  type={mode === "monthly" ? "stepAfter" : "monotone"}
                  dataKey={bracket}
                  name={bracket}
                  stroke={bracket === highlight ? theme.highlightColor : theme.mutedColor}
                  strokeOpacity={bracket === highlight ? theme.fadedOpacity : 1}
                  strokeWidth={2}
                  dot={false}
                  isAnimationActive={!loading}
                />
              ))}
              {brackets.includes(highlight) ? (
                <Line
                  type={mode === "monthly" ? "stepAfter" : "monotone"}
                  dataKey={windowKey(highlight)}
                  stroke={theme.highlightColor}
                  strokeWidth={2.5}
                  dot={false}
                  legendType="none"
                  tooltipType="none"
                  connectNulls={false}
                  isAnimationActive={!loading}
                />
              ) : null}
              {markers.map((marker) => (
                <ReferenceDot
                  key={`${marker.month}-${marker.value}`}
                  x={marker.month}
                  y={marker.value}
                  r={4}
                  fill={theme.highlightColor}
                  stroke="white"
                  label={{ value: formatCurrency(marker.value), position: "top", fill: theme.highlightColor, fontSize: 14 }}
                />
              ))}
            </LineChart>
          </ResponsiveContainer>
        )}

        {loading && (
          <div className="absolute inset-0 grid place-items-center bg-white/60 text-xs font-medium uppercase tracking-wide text-slate-500 backdrop-blur">
            Loading tuition data…
          </div>
        )}
      </div>

      {error ? <p className="mt-4 text-sm text-red-600">{error}</p> : null}
    </section>
  );
}

interface AxisTickProps {
  x?: number;
  y?: number;
  payload?: { value: number };
}

function AxisTick({ x = 0, y = 0, payload, ticks, theme }: AxisTickProps & { ticks: Tick[]; theme: ThemeConfig }) {
  const tick = ticks.find((candidate) => candidate.value === payload?.value);
  if (!tick) return <g />;
  return (
    <text
      x={x}
      y={y + 14}
      textAnchor="middle"
      fontSize={tick.emphasized ? 13 : 12}
      fontWeight={tick.emphasized ? 700 : 400}
      fill={tick.emphasized ? theme.highlightColor : "#475569"}
    >
      {tick.label}
    </text>
  );
}

function Toggle({
  mode,
  onChange,
  disabled,
}: {
  mode: DisplayMode;
  onChange: (mode: DisplayMode) => void;
  disabled?: boolean;
}) {
  return (
    <div className="inline-flex rounded-full border border-slate-300 bg-slate-100 p-1 text-xs font-semibold text-slate-600">
      {(["cumulative", "monthly"] as const).map((option) => (
        <button
          key={option}
          type="button"
          className={`rounded-full px-3 py-1 capitalize transition ${
            mode === option ? "bg-white text-slate-900 shadow-sm" : "text-slate-500 hover:text-slate-700"
          }`}
          onClick={() => onChange(option)}
          disabled={disabled}
        >
          {option}
        </button>
      ))}
    </div>
  );
}

function EmptyState() {
  return (
    <div className="grid h-full place-items-center rounded-2xl border border-dashed border-slate-300 py-16 text-center text-sm text-slate-500">
      <div>
        <p className="font-medium text-slate-600">No estimate yet</p>
        <p>Pick a region and care type on the left to see the cost over time.</p>
      </div>
    </div>
  );
}
