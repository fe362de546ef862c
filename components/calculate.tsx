"use client";

import {
  computeAdvance,
  type AdvanceModelOptions,
  type AdvanceResult,
  type ModelKind,
  type Segmentation,
} from "@/lib/calculations";
import { isInvalidParameterError } from "@/lib/errors";
import { parseParameters, type ParameterName } from "@/lib/parameters";

// Raw field values as typed into the sidebar.
export type FormValues = Record<ParameterName, string>;

export type ModelChoice = {
  model: ModelKind;
  segmentation: Segmentation;
};

export type CalculationState =
  | { status: "ok"; result: AdvanceResult }
  | { status: "invalid"; field: string; message: string };

function toOptions(choice: ModelChoice): AdvanceModelOptions {
  switch (choice.model) {
    case "segmented":
      return { model: "segmented", segmentation: choice.segmentation };
    case "empirical":
      return { model: "empirical" };
    case "exponential":
      return { model: "exponential" };
  }
}

// Shared helper: validate the sidebar values and run the selected model. An
// invalid field blocks the computation and is reported back to the form.
export function computeFromForm(values: FormValues, choice: ModelChoice): CalculationState {
  try {
    const inputs = parseParameters(values);
    return { status: "ok", result: computeAdvance(inputs, toOptions(choice)) };
  } catch (err) {
    if (isInvalidParameterError(err)) {
      return { status: "invalid", field: err.field, message: err.message };
    }
    throw err;
  }
}
