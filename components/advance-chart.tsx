"use client";

import {
  CartesianGrid,
  ComposedChart,
  Line,
  ResponsiveContainer,
  Scatter,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import { toDualAxisRows, type ChartSeries } from "@/lib/charts";

const LEFT_COLOR = "#d62728"; // tab:red
const RIGHT_COLOR = "#1f77b4"; // tab:blue

type AdvanceChartProps = {
  title: string;
  xLabel: string;
  left: ChartSeries;
  leftDashed?: boolean;
  right: ChartSeries;
  /** Draw the right-hand series as dots instead of a line. */
  rightScatter?: boolean;
};

function label(series: ChartSeries): string {
  return series.unit ? `${series.label} (${series.unit})` : series.label;
}

function formatTick(value: number): string {
  return String(Number(value.toPrecision(3)));
}

export function AdvanceChart({ title, xLabel, left, leftDashed, right, rightScatter }: AdvanceChartProps) {
  const rows = toDualAxisRows(left, right);

  return (
    <figure className="space-y-1">
      <figcaption className="text-center text-sm">{title}</figcaption>
      <ResponsiveContainer width="100%" height={300}>
        <ComposedChart data={rows} margin={{ top: 10, right: 20, left: 10, bottom: 20 }}>
          <CartesianGrid horizontal={false} vertical={false} />
          <XAxis
            dataKey="x"
            type="number"
            domain={["dataMin", "dataMax"]}
            tickFormatter={formatTick}
            label={{ value: xLabel, position: "insideBottom", offset: -10 }}
          />
          <YAxis
            yAxisId="left"
            stroke={LEFT_COLOR}
            tickFormatter={formatTick}
            label={{ value: label(left), angle: -90, position: "insideLeft", fill: LEFT_COLOR }}
          />
          <YAxis
            yAxisId="right"
            orientation="right"
            stroke={RIGHT_COLOR}
            tickFormatter={formatTick}
            label={{ value: label(right), angle: 90, position: "insideRight", fill: RIGHT_COLOR }}
          />
          <Tooltip />
          <Line
            yAxisId="left"
            type="linear"
            dataKey="left"
            name={left.label}
            stroke={LEFT_COLOR}
            strokeDasharray={leftDashed ? "6 4" : undefined}
            dot={false}
            isAnimationActive={false}
          />
          {rightScatter ? (
            <Scatter yAxisId="right" dataKey="right" name={right.label} fill={RIGHT_COLOR} isAnimationActive={false} />
          ) : (
            <Line
              yAxisId="right"
              type="linear"
              dataKey="right"
              name={right.label}
              stroke={RIGHT_COLOR}
              dot={false}
              isAnimationActive={false}
            />
          )}
        </ComposedChart>
      </ResponsiveContainer>
    </figure>
  );
}
