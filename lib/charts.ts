import type { AdvanceResult } from "./calculations";

export type ChartPoint = { x: number; y: number };

export type ChartSeries = {
  label: string;
  unit: string;
  points: ChartPoint[];
};

export type AdvanceCharts = {
  /** (A) accumulated head loss and travel time along the pipe. */
  headloss: ChartSeries;
  travelTime: ChartSeries;
  /** (B) segment velocity along the pipe. */
  velocity: ChartSeries;
  /** (C) dimensionless reference advance curve. */
  reference: { frequency: ChartSeries; cumulativeLength: ChartSeries };
};

// Measured relative-advance distribution for driplines. Independent of the
// inputs; drawn alongside every result.
const RELATIVE_ADVANCE_TIME = [0.0, 0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1.0];
const ADVANCE_FREQUENCY = [0.0, 0.47, 0.25, 0.13, 0.07, 0.04, 0.02, 0.01, 0.01, 0.0, 0.0];
const CUMULATIVE_RELATIVE_LENGTH = [0, 0.47, 0.71, 0.85, 0.92, 0.96, 0.98, 0.99, 0.99, 1, 1];

function zip(xs: readonly number[], ys: readonly number[]): ChartPoint[] {
  return xs.map((x, i) => ({ x, y: ys[i] }));
}

export const REFERENCE_ADVANCE_CURVE = {
  frequency: {
    label: "Frequency",
    unit: "",
    points: zip(RELATIVE_ADVANCE_TIME, ADVANCE_FREQUENCY),
  },
  cumulativeLength: {
    label: "Cumulative relative length",
    unit: "",
    points: zip(RELATIVE_ADVANCE_TIME, CUMULATIVE_RELATIVE_LENGTH),
  },
} satisfies AdvanceCharts["reference"];

export function buildChartSeries(result: AdvanceResult): AdvanceCharts {
  const { segments } = result;

  return {
    headloss: {
      label: "Accumulated headloss",
      unit: "m",
      points: segments.map((s) => ({ x: s.cumulativeLength, y: s.cumulativeHeadloss })),
    },
    travelTime: {
      label: "Travel time",
      unit: "min",
      points: segments.map((s) => ({ x: s.cumulativeLength, y: s.cumulativeTravelTime })),
    },
    velocity: {
      label: "Velocity",
      unit: "m/s",
      points: segments.map((s) => ({ x: s.cumulativeLength, y: s.velocity })),
    },
    reference: REFERENCE_ADVANCE_CURVE,
  };
}

export type DualAxisRow = { x: number; left: number; right?: number };

// Rows for a chart with one y axis per series. Both series are sampled at the
// left series' x values; a right series that runs short leaves `right` unset.
export function toDualAxisRows(left: ChartSeries, right: ChartSeries): DualAxisRow[] {
  return left.points.map((p, i) => {
    const r = right.points[i];
    return r === undefined ? { x: p.x, left: p.y } : { x: p.x, left: p.y, right: r.y };
  });
}
