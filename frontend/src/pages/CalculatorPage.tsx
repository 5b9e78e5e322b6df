import { useEffect, useMemo, useState } from "react";

import { ChartPanel } from "../components/ChartPanel";
import { CustomTuitionModal } from "../components/CustomTuitionModal";
import { DurationSlider } from "../components/DurationSlider";
import { ExportCard } from "../components/ExportCard";
import { InputWizard, type CareInputs } from "../components/InputWizard";
import { SavingsCard } from "../components/SavingsCard";
import { SummaryCard } from "../components/SummaryCard";
import { TuitionMetrics } from "../components/TuitionMetrics";
import { describeLoadError, listRegions, loadTuitionReference, resolveTuitionTable } from "../lib/api";
import { DATA_CONFIG_ERROR } from "../lib/apiBase";
import { adjustTuition } from "../lib/calc";
import type { AppConfig } from "../lib/config";
import { isEstimatorError } from "../lib/errors";
import type { ExportSnapshot } from "../lib/exportExcel";
import { createProjectionCache, type ProjectionResult } from "../lib/projection";
import {
  CARE_TYPE_LABELS,
  USER_DATA_BRACKET,
  type CostMultipliers,
  type Interval,
  type TuitionReference,
  type TuitionTable,
} from "../lib/schemas";

interface CalculatorPageProps {
  config: AppConfig;
}

interface ProjectionState {
  tuition: TuitionTable | null;
  result: ProjectionResult | null;
  error: string | null;
}

const normalizeInputs = (inputs: CareInputs, reference: TuitionReference | null): CareInputs => {
  if (!reference) return inputs;
  const regions = listRegions(reference, inputs.careType);
  if (regions.includes(inputs.region)) return inputs;
  return { ...inputs, region: regions[0] ?? "" };
};

export function CalculatorPage({ config }: CalculatorPageProps) {
  const { ages, ageBands, theme } = config;

  const [reference, setReference] = useState<TuitionReference | null>(null);
  const [loading, setLoading] = useState(DATA_CONFIG_ERROR === null);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [inputs, setInputs] = useState<CareInputs>({
    region: "",
    careType: "center-based",
    bracket: config.defaultBracket,
    dataSource: "averages",
  });
  const [ownTuition, setOwnTuition] = useState<TuitionTable>(() =>
    Object.fromEntries(ageBands.map((band) => [band.name, 0])),
  );
  const [careInterval, setCareInterval] = useState<Interval>({ start: ages.defaultStart, end: ages.defaultEnd });
  const [showOwnDataModal, setShowOwnDataModal] = useState(false);
  const [project] = useState(() => createProjectionCache());

  useEffect(() => {
    if (DATA_CONFIG_ERROR) return;
    let cancelled = false;

    loadTuitionReference()
      .then((loaded) => {
        if (cancelled) return;
        setReference(loaded);
        setInputs((current) => normalizeInputs(current, loaded));
      })
      .catch((err) => {
        if (cancelled) return;
        // eslint-disable-next-line no-console
        console.error(err);
        setLoadError(describeLoadError(err));
      })
      .finally(() => {
        if (cancelled) return;
        setLoading(false);
      });

    return () => {
      cancelled = true;
    };
  }, []);

  const updateInputs = (updater: (current: CareInputs) => CareInputs) => {
    setInputs((previous) => normalizeInputs(updater(previous), reference));
  };

  const regions = useMemo(
    () => (reference ? listRegions(reference, inputs.careType) : []),
    [reference, inputs.careType],
  );

  const usingOwnData = inputs.dataSource === "own";
  const bracket = usingOwnData ? USER_DATA_BRACKET : inputs.bracket;
  const multipliers = useMemo<CostMultipliers>(
    () => (usingOwnData ? { [USER_DATA_BRACKET]: 1 } : config.costMultipliers),
    [usingOwnData, config.costMultipliers],
  );

  const projection = useMemo<ProjectionState>(() => {
    if (!reference && !usingOwnData) {
      return { tuition: null, result: null, error: null };
    }
    try {
      const tuition =
        usingOwnData || !reference ? ownTuition : resolveTuitionTable(reference, inputs.careType, inputs.region);
      const result = project({
        tuition,
        multipliers,
        range: { minAge: ages.minAge, maxAge: ages.maxAge },
        step: ages.step,
        bands: ageBands,
        bracket,
        interval: careInterval,
      });
      return { tuition, result, error: null };
    } catch (err) {
      if (isEstimatorError(err)) {
        return { tuition: null, result: null, error: err.message };
      }
      throw err;
    }
  }, [reference, usingOwnData, ownTuition, inputs.careType, inputs.region, multipliers, ages, ageBands, bracket, careInterval, project]);

  const adjustedTuition = useMemo(
    () => (projection.tuition ? adjustTuition(projection.tuition, multipliers[bracket] ?? 1) : null),
    [projection.tuition, multipliers, bracket],
  );

  const regionLabel = usingOwnData ? "your area" : inputs.region;
  const careTypeLabel = CARE_TYPE_LABELS[inputs.careType];

  const snapshot = useMemo<ExportSnapshot | null>(() => {
    if (!projection.result || !adjustedTuition) return null;
    return {
      region: regionLabel,
      careType: careTypeLabel,
      bracket,
      interval: careInterval,
      adjustedTuition,
      result: projection.result,
    };
  }, [projection.result, adjustedTuition, regionLabel, careTypeLabel, bracket, careInterval]);

  if (DATA_CONFIG_ERROR) {
    return (
      <div className="mx-auto max-w-3xl px-6 py-10">
        <h1 className="text-2xl font-semibold text-red-700">Configuration error</h1>
        <p className="mt-3 text-sm text-slate-700">{DATA_CONFIG_ERROR}</p>
      </div>
    );
  }

  return (
    <>
      <div className="mt-10 grid gap-8 lg:grid-cols-[380px,1fr] lg:items-start">
        <div className="space-y-6">
          <InputWizard
            inputs={inputs}
            regions={regions}
            multipliers={config.costMultipliers}
            onInputsChange={updateInputs}
            onEditOwnData={() => setShowOwnDataModal(true)}
            disabled={loading}
          />
          <ExportCard snapshot={snapshot} loading={loading} />
        </div>

        <div className="space-y-6">
          {adjustedTuition ? (
            <TuitionMetrics
              bands={ageBands}
              adjustedTuition={adjustedTuition}
              bracket={bracket}
              region={regionLabel}
              highlightColor={theme.highlightColor}
            />
          ) : null}
          <DurationSlider
            interval={careInterval}
            ages={ages}
            highlightColor={theme.highlightColor}
            disabled={loading}
            onChange={setCareInterval}
          />
          <ChartPanel
            result={projection.result}
            highlight={bracket}
            interval={careInterval}
            ages={ages}
            chart={config.chart}
            theme={theme}
            loading={loading}
            error={loadError ?? projection.error}
          />
          <SummaryCard
            summary={projection.result?.summary ?? null}
            region={regionLabel}
            bracket={bracket}
            careType={careTypeLabel}
          />
          <SavingsCard />
        </div>
      </div>

      {showOwnDataModal ? (
        <CustomTuitionModal
          bands={ageBands}
          tuition={ownTuition}
          onClose={() => setShowOwnDataModal(false)}
          onSave={(tuition) => {
            setOwnTuition(tuition);
            setShowOwnDataModal(false);
          }}
        />
      ) : null}

      <footer className="mt-12 text-xs text-slate-500">
        <p>Illustrative estimate only. Always do your own research before making financial decisions.</p>
      </footer>
    </>
  );
}

export default CalculatorPage;
