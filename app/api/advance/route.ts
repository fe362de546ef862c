import { NextResponse } from "next/server";
import { computeAdvance, MODEL_KINDS, type AdvanceModelOptions } from "@/lib/calculations";
import { buildChartSeries } from "@/lib/charts";
import { isModelKind, isSegmentation, loadAdvanceConfig, type AdvanceConfig } from "@/lib/config";
import { InvalidParameterError, isInvalidParameterError } from "@/lib/errors";
import {
  formatSummary,
  RESULTS_CSV_CONTENT_TYPE,
  RESULTS_CSV_FILENAME,
  RESULTS_XLSX_CONTENT_TYPE,
  RESULTS_XLSX_FILENAME,
  toResultsCsv,
  toResultsWorkbook,
} from "@/lib/export";
import { parseParameters, type ParameterName } from "@/lib/parameters";

type OutputFormat = "json" | "csv" | "xlsx";

type RequestField = ParameterName | "model" | "segmentation" | "resolution" | "reconcile" | "format";

type AdvanceRequest = Partial<Record<RequestField, unknown>>;

const config = loadAdvanceConfig();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  return value != null && value !== "";
}

function parseReconcile(value: unknown): boolean {
  if (!isPresent(value)) return true;
  if (value === true || value === "true") return true;
  if (value === false || value === "false") return false;
  throw new InvalidParameterError("reconcile", "true or false", value);
}

function modelOptions(raw: AdvanceRequest, defaults: AdvanceConfig): AdvanceModelOptions {
  const model = isPresent(raw.model) ? raw.model : defaults.model;
  if (!isModelKind(model)) {
    throw new InvalidParameterError("model", `one of ${MODEL_KINDS.join(", ")}`, model);
  }

  const segmentation = isPresent(raw.segmentation) ? raw.segmentation : defaults.segmentation;
  if (!isSegmentation(segmentation)) {
    throw new InvalidParameterError("segmentation", "one of outlet, fixed", segmentation);
  }

  // The model constructors validate the resolution where it is used.
  const resolution = isPresent(raw.resolution) ? Number(raw.resolution) : defaults.resolution;
  const reconcile = parseReconcile(raw.reconcile);

  switch (model) {
    case "segmented":
      return segmentation === "fixed"
        ? { model, segmentation, resolution, reconcile }
        : { model, segmentation, reconcile };
    case "empirical":
      return { model };
    case "exponential":
      return { model, resolution };
  }
}

function outputFormat(raw: AdvanceRequest): OutputFormat {
  const format = isPresent(raw.format) ? raw.format : "json";
  if (format === "json" || format === "csv" || format === "xlsx") return format;
  throw new InvalidParameterError("format", "one of json, csv, xlsx", format);
}

function respond(raw: AdvanceRequest) {
  try {
    const inputs = parseParameters(raw);
    const format = outputFormat(raw);
    const result = computeAdvance(inputs, modelOptions(raw, config));

    if (format === "csv") {
      return new NextResponse(toResultsCsv(result), {
        status: 200,
        headers: {
          "Content-Type": RESULTS_CSV_CONTENT_TYPE,
          "Content-Disposition": `attachment; filename="${RESULTS_CSV_FILENAME}"`,
        },
      });
    }

    if (format === "xlsx") {
      return new NextResponse(toResultsWorkbook(result), {
        status: 200,
        headers: {
          "Content-Type": RESULTS_XLSX_CONTENT_TYPE,
          "Content-Disposition": `attachment; filename="${RESULTS_XLSX_FILENAME}"`,
        },
      });
    }

    return NextResponse.json({
      ...result,
      formatted: formatSummary(result.summary),
      charts: buildChartSeries(result),
    });
  } catch (err) {
    if (isInvalidParameterError(err)) {
      return NextResponse.json(
        { error: err.message, field: err.field, constraint: err.constraint },
        { status: 400 },
      );
    }
    console.error("Error computing hydraulic advance", err);
    return NextResponse.json({ error: "Failed to compute hydraulic advance" }, { status: 500 });
  }
}

export async function GET(req: Request) {
  const { searchParams } = new URL(req.url);
  return respond(Object.fromEntries(searchParams.entries()));
}

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: "Request body must be valid JSON" }, { status: 400 });
  }

  if (!isRecord(body)) {
    return NextResponse.json({ error: "Request body must be a JSON object" }, { status: 400 });
  }

  return respond(body);
}
