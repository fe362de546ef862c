"use client";

import { useMemo, useState } from "react";
import { Download } from "lucide-react";
import type { AdvanceResult } from "@/lib/calculations";
import { buildChartSeries } from "@/lib/charts";
import { EMPIRICAL_MODEL_REFERENCE } from "@/lib/equations";
import { formatSummary, RESULTS_CSV_CONTENT_TYPE, RESULTS_CSV_FILENAME, toResultsCsv } from "@/lib/export";
import { DEFAULT_PARAMETERS, PARAMETER_NAMES, type ParameterName } from "@/lib/parameters";
import { AdvanceChart } from "./advance-chart";
import { AppSidebar } from "./app-sidebar";
import { computeFromForm, type FormValues, type ModelChoice } from "./calculate";

function initialValues(): FormValues {
  const values: FormValues = { emitterFlow: "", emitterSpacing: "", lateralLength: "", internalDiameter: "" };
  for (const name of PARAMETER_NAMES) {
    values[name] = String(DEFAULT_PARAMETERS[name]);
  }
  return values;
}

function Metric({ label, value }: { label: string; value: string }) {
  return (
    <div className="rounded border p-4">
      <div className="text-sm text-neutral-500">{label}</div>
      <div className="text-2xl font-semibold">{value}</div>
    </div>
  );
}

export function AdvanceDashboard() {
  const [values, setValues] = useState<FormValues>(initialValues);
  const [choice, setChoice] = useState<ModelChoice>({ model: "segmented", segmentation: "outlet" });

  const state = useMemo(() => computeFromForm(values, choice), [values, choice]);

  const handleValueChange = (name: ParameterName, value: string) => {
    setValues((prev) => ({ ...prev, [name]: value }));
  };

  const handleDownloadCsv = () => {
    if (state.status !== "ok") return;

    const blob = new Blob([toResultsCsv(state.result)], { type: RESULTS_CSV_CONTENT_TYPE });
    const url = URL.createObjectURL(blob);
    const link = document.createElement("a");
    link.href = url;
    link.download = RESULTS_CSV_FILENAME;
    document.body.appendChild(link);
    link.click();
    document.body.removeChild(link);
    URL.revokeObjectURL(url);
  };

  const invalidField = state.status === "invalid" ? state.field : null;

  return (
    <div className="flex min-h-screen">
      <AppSidebar
        values={values}
        choice={choice}
        invalidField={invalidField}
        onValueChange={handleValueChange}
        onChoiceChange={setChoice}
      />

      <main className="flex-1 p-6 space-y-6">
        <h1 className="text-3xl font-bold">Hydraulic Advance Analysis for Driplines</h1>
        <p className="text-sm text-neutral-600">
          Empirical model reference: DOI{" "}
          <a className="underline" href={EMPIRICAL_MODEL_REFERENCE.url} target="_blank" rel="noreferrer">
            {EMPIRICAL_MODEL_REFERENCE.doi}
          </a>
        </p>

        {state.status === "invalid" ? (
          <div className="rounded border border-red-500 p-4 text-red-600">{state.message}</div>
        ) : (
          <Results result={state.result} onDownload={handleDownloadCsv} />
        )}

        <footer className="text-sm text-neutral-500">
          {EMPIRICAL_MODEL_REFERENCE.authors} ({EMPIRICAL_MODEL_REFERENCE.year})
        </footer>
      </main>
    </div>
  );
}

function Results({
  result,
  onDownload,
}: {
  result: AdvanceResult;
  onDownload: () => void;
}) {
  const metrics = formatSummary(result.summary);
  const charts = useMemo(() => buildChartSeries(result), [result]);

  return (
    <>
      <section className="grid grid-cols-3 gap-4">
        <Metric label="Travel Time (100%) [min]" value={metrics.travelTimeFull} />
        <Metric label="Travel Time (95%) [min]" value={metrics.travelTime95} />
        <Metric label="Total Head Loss [m]" value={metrics.totalHeadloss} />
      </section>

      <section className="grid grid-cols-3 gap-4">
        {result.segments.length > 0 && (
          <>
            <AdvanceChart
              title="(A)"
              xLabel="Length of pipe (m)"
              left={charts.headloss}
              leftDashed
              right={charts.travelTime}
              rightScatter
            />
            <AdvanceChart
              title="(B)"
              xLabel="Length of pipe (m)"
              left={charts.velocity}
              leftDashed
              right={charts.travelTime}
              rightScatter
            />
          </>
        )}
        <AdvanceChart
          title="(C)"
          xLabel="Relative advance time"
          left={charts.reference.frequency}
          right={charts.reference.cumulativeLength}
        />
      </section>

      <button
        type="button"
        className="inline-flex items-center gap-2 rounded border px-4 py-2 disabled:opacity-50"
        onClick={onDownload}
        disabled={result.segments.length === 0}
      >
        <Download className="h-4 w-4" />
        Download Results CSV
      </button>
    </>
  );
}
