import { read, utils as XLSXUtils, write as writeXLSX } from "xlsx";
import type { AdvanceResult, ResultSummary } from "./calculations";

export const RESULTS_CSV_FILENAME = "hydraulic_advance_results.csv";
export const RESULTS_CSV_CONTENT_TYPE = "text/csv";
export const RESULTS_XLSX_FILENAME = "hydraulic_advance_results.xlsx";
export const RESULTS_XLSX_CONTENT_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

/** Row shape used for tabular export (CSV/Excel). */
export type ResultRow = {
  segment: number;
  cumulative_length_m: number;
  segment_flow_lph: number;
  velocity_m_s: number;
  segment_travel_time_s: number;
  cumulative_travel_time_min: number;
  segment_headloss_m: number;
  cumulative_headloss_m: number;
};

export const RESULT_COLUMNS = [
  "segment",
  "cumulative_length_m",
  "segment_flow_lph",
  "velocity_m_s",
  "segment_travel_time_s",
  "cumulative_travel_time_min",
  "segment_headloss_m",
  "cumulative_headloss_m",
] as const satisfies readonly (keyof ResultRow)[];

export type FormattedSummary = {
  travelTimeFull: string;
  travelTime95: string;
  totalHeadloss: string;
};

export function toResultRows(result: AdvanceResult): ResultRow[] {
  return result.segments.map<ResultRow>((s) => ({
    segment: s.index,
    cumulative_length_m: s.cumulativeLength,
    segment_flow_lph: s.segmentFlow,
    velocity_m_s: s.velocity,
    segment_travel_time_s: s.segmentTravelTime,
    cumulative_travel_time_min: s.cumulativeTravelTime,
    segment_headloss_m: s.segmentHeadloss,
    cumulative_headloss_m: s.cumulativeHeadloss,
  }));
}

function toSheetData(rows: ResultRow[]): (string | number)[][] {
  // Header row first, then one row per segment; no index column.
  const sheetData: (string | number)[][] = [[...RESULT_COLUMNS]];
  for (const row of rows) {
    sheetData.push(RESULT_COLUMNS.map((key) => row[key]));
  }
  return sheetData;
}

/**
 * Comma-separated table, one line per segment. Numbers are written at full
 * precision so a re-parse reproduces the computed values.
 */
export function toResultsCsv(result: AdvanceResult): string {
  const worksheet = XLSXUtils.aoa_to_sheet(toSheetData(toResultRows(result)));
  return XLSXUtils.sheet_to_csv(worksheet, { rawNumbers: true });
}

export function parseResultsCsv(text: string): ResultRow[] {
  const workbook = read(text, { type: "string" });
  const sheet = workbook.Sheets[workbook.SheetNames[0]];
  if (!sheet) return [];

  const records = XLSXUtils.sheet_to_json<Record<string, unknown>>(sheet, { raw: true });

  return records.map((record, i) => {
    const row: ResultRow = {
      segment: 0,
      cumulative_length_m: 0,
      segment_flow_lph: 0,
      velocity_m_s: 0,
      segment_travel_time_s: 0,
      cumulative_travel_time_min: 0,
      segment_headloss_m: 0,
      cumulative_headloss_m: 0,
    };
    for (const key of RESULT_COLUMNS) {
      const value = record[key];
      const num = typeof value === "number" ? value : Number(value);
      if (value == null || value === "" || !Number.isFinite(num)) {
        throw new Error(`Row ${i + 1}: column "${key}" is not a number`);
      }
      row[key] = num;
    }
    return row;
  });
}

export function formatSummary(summary: ResultSummary): FormattedSummary {
  return {
    travelTimeFull: summary.travelTimeFull.toFixed(3),
    travelTime95: summary.travelTime95.toFixed(3),
    totalHeadloss: summary.totalHeadloss == null ? "n/a" : summary.totalHeadloss.toFixed(3),
  };
}

/** Workbook with the segment table and the headline metrics. */
export function toResultsWorkbook(result: AdvanceResult): ArrayBuffer {
  const workbook = XLSXUtils.book_new();

  XLSXUtils.book_append_sheet(workbook, XLSXUtils.aoa_to_sheet(toSheetData(toResultRows(result))), "Results");

  const { summary, inputs } = result;
  const summarySheet = XLSXUtils.aoa_to_sheet([
    ["metric", "value"],
    ["model", result.model],
    ["emitter_flow_lph", inputs.emitterFlow],
    ["emitter_spacing_m", inputs.emitterSpacing],
    ["lateral_length_m", inputs.lateralLength],
    ["internal_diameter_mm", inputs.internalDiameter],
    ["travel_time_full_min", summary.travelTimeFull],
    ["travel_time_95_min", summary.travelTime95],
    ["total_headloss_m", summary.totalHeadloss ?? ""],
  ]);
  XLSXUtils.book_append_sheet(workbook, summarySheet, "Summary");

  const out: ArrayBuffer = writeXLSX(workbook, { type: "array", bookType: "xlsx" });
  return out;
}
