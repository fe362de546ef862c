import {
  DEFAULT_RESOLUTION,
  MAX_RESOLUTION,
  MODEL_KINDS,
  type ModelKind,
  type Segmentation,
} from "./calculations";

// Server-side defaults for the advance route. Every setting is optional; a bad
// value is reported and replaced by the built-in default rather than failing
// the request.
//
//   ADVANCE_MODEL         segmented | empirical | exponential
//   ADVANCE_SEGMENTATION  outlet | fixed
//   ADVANCE_RESOLUTION    integer, points for fixed/exponential curves

export type AdvanceConfig = {
  model: ModelKind;
  segmentation: Segmentation;
  resolution: number;
};

export const DEFAULT_CONFIG: AdvanceConfig = {
  model: "segmented",
  segmentation: "outlet",
  resolution: DEFAULT_RESOLUTION,
};

const SEGMENTATIONS: readonly Segmentation[] = ["outlet", "fixed"];

export function isModelKind(value: unknown): value is ModelKind {
  return MODEL_KINDS.some((kind) => kind === value);
}

export function isSegmentation(value: unknown): value is Segmentation {
  return SEGMENTATIONS.some((segmentation) => segmentation === value);
}

export function loadAdvanceConfig(env: Record<string, string | undefined> = process.env): AdvanceConfig {
  const config: AdvanceConfig = { ...DEFAULT_CONFIG };

  const model = env.ADVANCE_MODEL;
  if (model) {
    if (isModelKind(model)) {
      config.model = model;
    } else {
      console.warn(`ADVANCE_MODEL="${model}" is not one of ${MODEL_KINDS.join(", ")}; using "${config.model}".`);
    }
  }

  const segmentation = env.ADVANCE_SEGMENTATION;
  if (segmentation) {
    if (isSegmentation(segmentation)) {
      config.segmentation = segmentation;
    } else {
      console.warn(
        `ADVANCE_SEGMENTATION="${segmentation}" is not one of ${SEGMENTATIONS.join(", ")}; using "${config.segmentation}".`,
      );
    }
  }

  const resolution = env.ADVANCE_RESOLUTION;
  if (resolution) {
    const parsed = Number(resolution);
    if (Number.isInteger(parsed) && parsed >= 1 && parsed <= MAX_RESOLUTION) {
      config.resolution = parsed;
    } else {
      console.warn(
        `ADVANCE_RESOLUTION="${resolution}" must be an integer between 1 and ${MAX_RESOLUTION}; using ${config.resolution}.`,
      );
    }
  }

  return config;
}
