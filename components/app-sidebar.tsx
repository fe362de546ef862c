"use client";

import { SlidersHorizontal } from "lucide-react";
import { MODEL_KINDS, type ModelKind, type Segmentation } from "@/lib/calculations";
import { PARAMETER_LIMITS, PARAMETER_NAMES, type ParameterName } from "@/lib/parameters";
import type { FormValues, ModelChoice } from "./calculate";

const MODEL_LABELS: Record<ModelKind, string> = {
  segmented: "Empirical + segment model",
  empirical: "Empirical only",
  exponential: "Exponential advance curve",
};

type AppSidebarProps = {
  values: FormValues;
  choice: ModelChoice;
  invalidField: string | null;
  onValueChange: (name: ParameterName, value: string) => void;
  onChoiceChange: (choice: ModelChoice) => void;
};

export function AppSidebar({ values, choice, invalidField, onValueChange, onChoiceChange }: AppSidebarProps) {
  return (
    <aside className="w-72 shrink-0 border-r p-4 space-y-4">
      <h2 className="flex items-center gap-2 text-lg font-semibold">
        <SlidersHorizontal className="h-4 w-4" />
        Input Parameters
      </h2>

      {PARAMETER_NAMES.map((name) => {
        const limit = PARAMETER_LIMITS[name];
        return (
          <label key={name} className="block space-y-1">
            <span className="text-sm">
              {limit.label} ({limit.unit})
            </span>
            <input
              type="number"
              className={`w-full rounded border px-2 py-1 ${invalidField === name ? "border-red-500" : ""}`}
              min={limit.min}
              max={limit.max}
              step={limit.step}
              value={values[name]}
              onChange={(e) => onValueChange(name, e.target.value)}
            />
          </label>
        );
      })}

      <label className="block space-y-1">
        <span className="text-sm">Model</span>
        <select
          className="w-full rounded border px-2 py-1"
          value={choice.model}
          onChange={(e) => {
            const model = e.target.value;
            if (model === "segmented" || model === "empirical" || model === "exponential") {
              onChoiceChange({ ...choice, model });
            }
          }}
        >
          {MODEL_KINDS.map((kind) => (
            <option key={kind} value={kind}>
              {MODEL_LABELS[kind]}
            </option>
          ))}
        </select>
      </label>

      {choice.model === "segmented" && (
        <label className="block space-y-1">
          <span className="text-sm">Segmentation</span>
          <select
            className="w-full rounded border px-2 py-1"
            value={choice.segmentation}
            onChange={(e) => {
              const segmentation: Segmentation = e.target.value === "fixed" ? "fixed" : "outlet";
              onChoiceChange({ ...choice, segmentation });
            }}
          >
            <option value="outlet">One segment per emitter</option>
            <option value="fixed">100 evenly spaced points</option>
          </select>
        </label>
      )}
    </aside>
  );
}
