import { InvalidParameterError } from "./errors";

/** The four scalars that describe a lateral. */
export type InputParameters = {
  emitterFlow: number; // L/h
  emitterSpacing: number; // m
  lateralLength: number; // m
  internalDiameter: number; // mm
};

export type ParameterName = keyof InputParameters;

export type ParameterLimit = {
  label: string;
  unit: string;
  min: number;
  max: number;
  step: number;
  default: number;
};

export const PARAMETER_LIMITS: Record<ParameterName, ParameterLimit> = {
  emitterFlow: { label: "Emitter flow rate", unit: "L/h", min: 0.1, max: 10, step: 0.1, default: 1.0 },
  emitterSpacing: { label: "Emitter spacing", unit: "m", min: 0.05, max: 2.0, step: 0.05, default: 0.5 },
  lateralLength: { label: "Dripline length", unit: "m", min: 1, max: 1000, step: 1, default: 150 },
  internalDiameter: { label: "Internal diameter", unit: "mm", min: 8, max: 40, step: 0.1, default: 20.2 },
};

export const PARAMETER_NAMES: readonly ParameterName[] = [
  "emitterFlow",
  "emitterSpacing",
  "lateralLength",
  "internalDiameter",
];

export const DEFAULT_PARAMETERS: InputParameters = {
  emitterFlow: PARAMETER_LIMITS.emitterFlow.default,
  emitterSpacing: PARAMETER_LIMITS.emitterSpacing.default,
  lateralLength: PARAMETER_LIMITS.lateralLength.default,
  internalDiameter: PARAMETER_LIMITS.internalDiameter.default,
};

/**
 * Domain check used by every model before it computes anything: all four
 * values finite and strictly positive, and at least one emitter on the lateral.
 */
export function assertValidInputs(inputs: InputParameters): void {
  for (const name of PARAMETER_NAMES) {
    const value = inputs[name];
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidParameterError(name, "a finite number greater than 0", value);
    }
  }

  if (inputs.lateralLength < inputs.emitterSpacing) {
    throw new InvalidParameterError(
      "lateralLength",
      `at least the emitter spacing (${inputs.emitterSpacing} m)`,
      inputs.lateralLength,
    );
  }
}

/**
 * Stricter check for user-supplied values: the domain check plus the
 * documented input ranges.
 */
export function validateParameters(inputs: InputParameters): InputParameters {
  assertValidInputs(inputs);

  for (const name of PARAMETER_NAMES) {
    const { min, max, unit } = PARAMETER_LIMITS[name];
    const value = inputs[name];
    if (value < min || value > max) {
      throw new InvalidParameterError(name, `between ${min} and ${max} ${unit}`, value);
    }
  }

  return Object.freeze({ ...inputs });
}

/**
 * Build InputParameters from loosely typed values (query strings, JSON
 * bodies, form fields). Missing or empty entries take their defaults.
 */
export function parseParameters(raw: Partial<Record<ParameterName, unknown>>): InputParameters {
  const parsed = { ...DEFAULT_PARAMETERS };

  for (const name of PARAMETER_NAMES) {
    const value = raw[name];
    if (value == null || value === "") continue;

    const num = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : NaN;
    if (Number.isNaN(num)) {
      throw new InvalidParameterError(name, "a number", value);
    }
    parsed[name] = num;
  }

  return validateParameters(parsed);
}
