import { assertValidInputs, type InputParameters } from "./parameters";

export type EmpiricalTravelTime = {
  travelTimeFull: number; // min
  travelTime95: number; // min
};

// Regression fitted against field measurements of dripline advance.
export const EMPIRICAL_COEFFICIENT = 0.0912;
export const EMPIRICAL_SPACING_EXPONENT = 0.7824;
export const EMPIRICAL_LENGTH_EXPONENT = 0.1928;

export const EMPIRICAL_MODEL_REFERENCE = {
  doi: "10.4236/as.2025.1612082",
  url: "https://www.scirp.org/journal/paperinformation?paperid=148372",
  authors: "Guevara Rodríguez, G. and Watson Hernandez, F.",
  year: 2026,
} as const;

// Hazen-Williams, metric form: Q in m^3/h, L in m, D in mm, hf in m.
export const HAZEN_WILLIAMS_K = 1.131e9;
export const HAZEN_WILLIAMS_FLOW_EXPONENT = 1.852;
export const HAZEN_WILLIAMS_DIAMETER_EXPONENT = -4.872;
export const DEFAULT_ROUGHNESS_C = 140; // polyethylene

/**
 * Closed-form advance time of the whole lateral, in minutes.
 *
 * The 95% figure is the fixed half-of-total approximation that accompanies
 * the regression; it is not a solve at 0.95 * length.
 */
export function empiricalTravelTime(inputs: InputParameters): EmpiricalTravelTime {
  assertValidInputs(inputs);
  const { emitterFlow: q, emitterSpacing: S, lateralLength: L, internalDiameter: dia } = inputs;

  const travelTimeFull =
    (EMPIRICAL_COEFFICIENT *
      (Math.pow(S, EMPIRICAL_SPACING_EXPONENT) * Math.pow(L, EMPIRICAL_LENGTH_EXPONENT) * dia * dia)) /
    q;

  return { travelTimeFull, travelTime95: travelTimeFull / 2 };
}

// di_mm: internal diameter in millimetres, result in m^2
export function pipeArea(di_mm: number): number {
  const r = di_mm / 2000; // metres
  return Math.PI * r * r;
}

// Q_lph: flow in L/h, area in m^2, result in m/s
export function velocity(Q_lph: number, area: number): number {
  if (area <= 0) return 0;
  const Q_m3s = Q_lph / 1000 / 3600;
  return Q_m3s / area;
}

/**
 * Friction loss over a run of pipe carrying a constant flow.
 *
 * Q_lph: flow in L/h (converted to m^3/h for the formula), L: length in
 * metres, di_mm: internal diameter in millimetres. Result in metres of water.
 */
export function hazenWilliamsHeadloss(
  Q_lph: number,
  L: number,
  di_mm: number,
  C: number = DEFAULT_ROUGHNESS_C,
): number {
  if (Q_lph <= 0 || L <= 0 || di_mm <= 0) return 0;
  const Q_m3h = Q_lph / 1000;
  return (
    HAZEN_WILLIAMS_K *
    Math.pow(Q_m3h / C, HAZEN_WILLIAMS_FLOW_EXPONENT) *
    L *
    Math.pow(di_mm, HAZEN_WILLIAMS_DIAMETER_EXPONENT)
  );
}
