import { InvalidParameterError } from "./errors";
import {
  DEFAULT_ROUGHNESS_C,
  empiricalTravelTime,
  hazenWilliamsHeadloss,
  pipeArea,
  velocity,
} from "./equations";
import { assertValidInputs, type InputParameters } from "./parameters";

export type ModelKind = "segmented" | "empirical" | "exponential";

/**
 * `outlet`: one segment per emitter, step = spacing.
 * `fixed`: a fixed number of evenly spaced points, step = length / N.
 */
export type Segmentation = "outlet" | "fixed";

export type Segment = {
  index: number; // 1-based, ascending from the inlet
  cumulativeLength: number; // m
  segmentFlow: number; // L/h, flow carried downstream of this segment
  velocity: number; // m/s
  segmentHeadloss: number; // m
  segmentTravelTime: number; // s
  cumulativeTravelTime: number; // min
  cumulativeHeadloss: number; // m
};

export type ResultSummary = {
  travelTimeFull: number; // min
  travelTime95: number; // min
  /** null for model paths that do not compute head loss. */
  totalHeadloss: number | null; // m
};

export type Reconciliation = {
  hydraulicTravelTime: number; // min, raw segmented total
  empiricalTravelTime: number; // min
  scaleFactor: number;
};

export type AdvanceResult = {
  model: ModelKind;
  inputs: Readonly<InputParameters>;
  segments: readonly Readonly<Segment>[];
  summary: Readonly<ResultSummary>;
  reconciliation: Readonly<Reconciliation> | null;
};

export interface AdvanceModel {
  readonly kind: ModelKind;
  compute(inputs: InputParameters): AdvanceResult;
}

export const DEFAULT_RESOLUTION = 100;
export const MAX_RESOLUTION = 10000;
export const MAX_OUTLETS = 100_000;
export const DEFAULT_MIN_VELOCITY = 1e-6; // m/s
export const TRAVEL_TIME_95_FRACTION = 0.95;

// Guards floor(length / spacing) against ratios such as 0.6 / 0.2.
const OUTLET_COUNT_EPSILON = 1e-9;

export function outletCount(inputs: InputParameters): number {
  return Math.floor(inputs.lateralLength / inputs.emitterSpacing + OUTLET_COUNT_EPSILON);
}

function checkOutletCount(inputs: InputParameters): number {
  const n = outletCount(inputs);
  if (n > MAX_OUTLETS) {
    throw new InvalidParameterError(
      "emitterSpacing",
      `at least lateralLength / ${MAX_OUTLETS} (${inputs.lateralLength / MAX_OUTLETS} m)`,
      inputs.emitterSpacing,
    );
  }
  return n;
}

/**
 * 1-based index of the segment used for the 95% travel time: nearest rank,
 * no interpolation. A single-segment table uses its only segment.
 */
export function index95(segmentCount: number): number {
  return Math.max(1, Math.floor(segmentCount * TRAVEL_TIME_95_FRACTION));
}

/** Headline metrics read off a completed segment sequence. */
export function summarizeSegments(segments: readonly Segment[]): ResultSummary {
  const last = segments[segments.length - 1];
  if (!last) {
    throw new Error("Cannot summarize an empty segment sequence");
  }

  return {
    travelTimeFull: last.cumulativeTravelTime,
    travelTime95: segments[index95(segments.length) - 1].cumulativeTravelTime,
    totalHeadloss: last.cumulativeHeadloss,
  };
}

function checkResolution(resolution: number): number {
  if (!Number.isInteger(resolution) || resolution < 1 || resolution > MAX_RESOLUTION) {
    throw new InvalidParameterError("resolution", `an integer between 1 and ${MAX_RESOLUTION}`, resolution);
  }
  return resolution;
}

function freezeResult(result: AdvanceResult): AdvanceResult {
  return Object.freeze({
    ...result,
    inputs: Object.freeze({ ...result.inputs }),
    segments: Object.freeze(result.segments.map((s) => Object.freeze(s))),
    summary: Object.freeze(result.summary),
    reconciliation: result.reconciliation ? Object.freeze(result.reconciliation) : null,
  });
}

// --- Segmented hydraulic model ---------------------------------------------

export type SegmentedModelOptions = {
  segmentation?: Segmentation;
  /** Number of points for the `fixed` segmentation; ignored for `outlet`. */
  resolution?: number;
  /** Scale segment times so the total matches the empirical prediction. */
  reconcile?: boolean;
  /** Velocity floor for the `fixed` segmentation, m/s. */
  minVelocity?: number;
  /** Hazen-Williams roughness coefficient. */
  roughness?: number;
};

export class SegmentedHydraulicModel implements AdvanceModel {
  readonly kind = "segmented" as const;

  private readonly segmentation: Segmentation;
  private readonly resolution: number;
  private readonly reconcile: boolean;
  private readonly minVelocity: number;
  private readonly roughness: number;

  constructor(options: SegmentedModelOptions = {}) {
    this.segmentation = options.segmentation ?? "outlet";
    this.resolution =
      this.segmentation === "fixed" ? checkResolution(options.resolution ?? DEFAULT_RESOLUTION) : DEFAULT_RESOLUTION;
    this.reconcile = options.reconcile ?? true;
    this.minVelocity = options.minVelocity ?? DEFAULT_MIN_VELOCITY;
    this.roughness = options.roughness ?? DEFAULT_ROUGHNESS_C;

    if (!(this.minVelocity > 0)) {
      throw new InvalidParameterError("minVelocity", "greater than 0", this.minVelocity);
    }
    if (!(this.roughness > 0)) {
      throw new InvalidParameterError("roughness", "greater than 0", this.roughness);
    }
  }

  compute(inputs: InputParameters): AdvanceResult {
    assertValidInputs(inputs);
    const { emitterFlow: q, emitterSpacing: S, lateralLength: L, internalDiameter: dia } = inputs;

    const n = this.segmentation === "outlet" ? checkOutletCount(inputs) : this.resolution;
    const step = this.segmentation === "outlet" ? S : L / n;
    const area = pipeArea(dia);

    // --- Pass 1: flow, velocity and raw travel time per segment -------------
    const flows: number[] = new Array(n).fill(0);
    const velocities: number[] = new Array(n).fill(0);
    const rawTimes: number[] = new Array(n).fill(0);
    const totalFlow = n * q;
    let lastVelocity: number | null = null;

    for (let i = 1; i <= n; i++) {
      let Q: number;
      let V: number;

      if (this.segmentation === "outlet") {
        Q = totalFlow - i * q;
        V = velocity(Q, area);
        if (V === 0) {
          // Fill forward; a lone segment falls back to its own inlet flow.
          V = lastVelocity ?? velocity(Q + q, area);
        } else {
          lastVelocity = V;
        }
      } else {
        const emittersRemaining = Math.max(0, (L - i * step) / S);
        Q = emittersRemaining * q;
        V = Math.max(velocity(Q, area), this.minVelocity);
      }

      flows[i - 1] = Q;
      velocities[i - 1] = V;
      rawTimes[i - 1] = step / V;
    }

    // --- Pass 2: reconcile magnitude against the empirical total ------------
    const hydraulicTravelTime = rawTimes.reduce((sum, t) => sum + t, 0) / 60;
    const empirical = empiricalTravelTime(inputs).travelTimeFull;
    const scaleFactor = this.reconcile ? empirical / hydraulicTravelTime : 1;

    // --- Pass 3: accumulate --------------------------------------------------
    const segments: Segment[] = [];
    let timeSeconds = 0;
    let headloss = 0;

    for (let i = 1; i <= n; i++) {
      const segmentTravelTime = rawTimes[i - 1] * scaleFactor;
      const segmentHeadloss = hazenWilliamsHeadloss(flows[i - 1], step, dia, this.roughness);
      timeSeconds += segmentTravelTime;
      headloss += segmentHeadloss;

      segments.push({
        index: i,
        cumulativeLength: i * step,
        segmentFlow: flows[i - 1],
        velocity: velocities[i - 1],
        segmentHeadloss,
        segmentTravelTime,
        cumulativeTravelTime: timeSeconds / 60,
        cumulativeHeadloss: headloss,
      });
    }

    return freezeResult({
      model: this.kind,
      inputs,
      segments,
      summary: summarizeSegments(segments),
      reconciliation: this.reconcile
        ? { hydraulicTravelTime, empiricalTravelTime: empirical, scaleFactor }
        : null,
    });
  }
}

// --- Empirical-only model --------------------------------------------------

export class EmpiricalOnlyModel implements AdvanceModel {
  readonly kind = "empirical" as const;

  compute(inputs: InputParameters): AdvanceResult {
    const { travelTimeFull, travelTime95 } = empiricalTravelTime(inputs);
    return freezeResult({
      model: this.kind,
      inputs,
      segments: [],
      summary: { travelTimeFull, travelTime95, totalHeadloss: null },
      reconciliation: null,
    });
  }
}

// --- Exponential synthetic advance curve -----------------------------------

export type SyntheticHeadloss = "synthetic" | "none";

export type ExponentialModelOptions = {
  resolution?: number;
  /** k in t(x) = T * (1 - exp(-k x / L)). */
  advanceDecay?: number;
  headloss?: SyntheticHeadloss;
  /** k_h in H(x) = F * hf * (1 - exp(-k_h x / L)). */
  headlossDecay?: number;
  /** Christiansen reduction factor F applied to the full-flow pipe loss. */
  frictionFactor?: number;
  roughness?: number;
};

export const DEFAULT_ADVANCE_DECAY = 4;
export const DEFAULT_HEADLOSS_DECAY = 3;
export const DEFAULT_FRICTION_FACTOR = 0.36;

/**
 * Draws the advance curve straight from the empirical total, assuming the
 * wetted fraction saturates exponentially with time. It is a plotting
 * convenience; there is no raw hydraulic time here, so nothing is reconciled.
 */
export class ExponentialSyntheticModel implements AdvanceModel {
  readonly kind = "exponential" as const;

  private readonly resolution: number;
  private readonly advanceDecay: number;
  private readonly headloss: SyntheticHeadloss;
  private readonly headlossDecay: number;
  private readonly frictionFactor: number;
  private readonly roughness: number;

  constructor(options: ExponentialModelOptions = {}) {
    this.resolution = checkResolution(options.resolution ?? DEFAULT_RESOLUTION);
    this.advanceDecay = options.advanceDecay ?? DEFAULT_ADVANCE_DECAY;
    this.headloss = options.headloss ?? "synthetic";
    this.headlossDecay = options.headlossDecay ?? DEFAULT_HEADLOSS_DECAY;
    this.frictionFactor = options.frictionFactor ?? DEFAULT_FRICTION_FACTOR;
    this.roughness = options.roughness ?? DEFAULT_ROUGHNESS_C;

    if (!(this.advanceDecay > 0)) {
      throw new InvalidParameterError("advanceDecay", "greater than 0", this.advanceDecay);
    }
    if (!(this.headlossDecay > 0)) {
      throw new InvalidParameterError("headlossDecay", "greater than 0", this.headlossDecay);
    }
    if (!(this.frictionFactor > 0)) {
      throw new InvalidParameterError("frictionFactor", "greater than 0", this.frictionFactor);
    }
    if (!(this.roughness > 0)) {
      throw new InvalidParameterError("roughness", "greater than 0", this.roughness);
    }
  }

  compute(inputs: InputParameters): AdvanceResult {
    const { travelTimeFull } = empiricalTravelTime(inputs);
    const { emitterFlow: q, emitterSpacing: S, lateralLength: L, internalDiameter: dia } = inputs;

    const n = this.resolution;
    const step = L / n;
    const fullFlow = (L / S) * q;
    const pipeLoss =
      this.headloss === "synthetic"
        ? this.frictionFactor * hazenWilliamsHeadloss(fullFlow, L, dia, this.roughness)
        : 0;

    const segments: Segment[] = [];
    let prevTime = 0;
    let prevHeadloss = 0;

    for (let i = 1; i <= n; i++) {
      const rel = i / n;
      const cumulativeTravelTime = travelTimeFull * (1 - Math.exp(-this.advanceDecay * rel));
      const cumulativeHeadloss = pipeLoss * (1 - Math.exp(-this.headlossDecay * rel));
      const segmentTravelTime = (cumulativeTravelTime - prevTime) * 60;

      segments.push({
        index: i,
        cumulativeLength: i * step,
        segmentFlow: Math.max(0, (L - i * step) / S) * q,
        // speed of the wetting front across this step
        velocity: step / segmentTravelTime,
        segmentHeadloss: cumulativeHeadloss - prevHeadloss,
        segmentTravelTime,
        cumulativeTravelTime,
        cumulativeHeadloss,
      });

      prevTime = cumulativeTravelTime;
      prevHeadloss = cumulativeHeadloss;
    }

    return freezeResult({
      model: this.kind,
      inputs,
      segments,
      summary: {
        travelTimeFull,
        travelTime95: segments[index95(n) - 1].cumulativeTravelTime,
        totalHeadloss: this.headloss === "synthetic" ? prevHeadloss : null,
      },
      reconciliation: null,
    });
  }
}

// --- Selection ---------------------------------------------------------------

export type AdvanceModelOptions =
  | ({ model: "segmented" } & SegmentedModelOptions)
  | { model: "empirical" }
  | ({ model: "exponential" } & ExponentialModelOptions);

export const MODEL_KINDS: readonly ModelKind[] = ["segmented", "empirical", "exponential"];

export function createAdvanceModel(options: AdvanceModelOptions): AdvanceModel {
  switch (options.model) {
    case "segmented":
      return new SegmentedHydraulicModel(options);
    case "empirical":
      return new EmpiricalOnlyModel();
    case "exponential":
      return new ExponentialSyntheticModel(options);
  }
}

export function computeAdvance(
  inputs: InputParameters,
  options: AdvanceModelOptions = { model: "segmented" },
): AdvanceResult {
  return createAdvanceModel(options).compute(inputs);
}
