import { describe, it, expect } from "vitest";
import { GET, POST } from "./route";

function get(query = "") {
  return GET(new Request(`http://localhost/api/advance${query}`));
}

function post(body: string) {
  return POST(
    new Request("http://localhost/api/advance", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    }),
  );
}

describe("GET /api/advance", () => {
  it("computes the segmented model with default parameters", async () => {
    const res = await get();

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.model).toBe("segmented");
    expect(body.inputs).toEqual({ emitterFlow: 1, emitterSpacing: 0.5, lateralLength: 150, internalDiameter: 20.2 });
    expect(body.segments).toHaveLength(300);
    expect(body.formatted).toEqual({ travelTimeFull: "56.849", travelTime95: "23.646", totalHeadloss: "0.295" });
    expect(body.charts.reference.frequency.points).toHaveLength(11);
  });

  it("switches model from the query string", async () => {
    const res = await get("?model=empirical&lateralLength=150");

    const body = await res.json();
    expect(body.segments).toEqual([]);
    expect(body.summary.totalHeadloss).toBeNull();
    expect(body.formatted.travelTime95).toBe("28.424");
  });

  it("downloads the table as CSV", async () => {
    const res = await get("?lateralLength=5&format=csv");

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/csv");
    expect(res.headers.get("Content-Disposition")).toBe('attachment; filename="hydraulic_advance_results.csv"');

    const lines = (await res.text()).split("\n");
    expect(lines).toHaveLength(11);
    expect(lines[0].startsWith("segment,cumulative_length_m,")).toBe(true);
  });

  it("downloads the table as a workbook", async () => {
    const res = await get("?format=xlsx");

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Disposition")).toBe('attachment; filename="hydraulic_advance_results.xlsx"');
    expect((await res.arrayBuffer()).byteLength).toBeGreaterThan(0);
  });

  it("returns 400 naming the invalid field", async () => {
    const res = await get("?internalDiameter=50");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid internalDiameter: must be between 8 and 40 mm (got 50)",
      field: "internalDiameter",
      constraint: "between 8 and 40 mm",
    });
  });

  it("returns 400 for an unknown model or format", async () => {
    const model = await get("?model=kinematic");
    expect(model.status).toBe(400);
    expect((await model.json()).field).toBe("model");

    const format = await get("?format=pdf");
    expect(format.status).toBe(400);
    expect((await format.json()).field).toBe("format");
  });

  it("ignores the resolution under outlet segmentation", async () => {
    const res = await get("?lateralLength=5&resolution=0");

    expect(res.status).toBe(200);
    expect((await res.json()).segments).toHaveLength(10);
  });

  it("reads reconcile=false from the query string", async () => {
    const res = await get("?lateralLength=5&reconcile=false");

    expect(res.status).toBe(200);
    expect((await res.json()).reconciliation).toBeNull();
  });

  it("returns 400 for a reconcile flag that is not true or false", async () => {
    const res = await get("?reconcile=no");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid reconcile: must be true or false (got no)",
      field: "reconcile",
      constraint: "true or false",
    });
  });
});

describe("POST /api/advance", () => {
  it("accepts parameters as JSON", async () => {
    const res = await post(JSON.stringify({ emitterFlow: 2, model: "exponential", resolution: 50 }));

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.model).toBe("exponential");
    expect(body.segments).toHaveLength(50);
    expect(body.inputs.emitterFlow).toBe(2);
  });

  it("can skip reconciliation", async () => {
    const res = await post(JSON.stringify({ lateralLength: 5, reconcile: false }));

    const body = await res.json();
    expect(body.reconciliation).toBeNull();
  });

  it("rejects a reconcile flag of the wrong type", async () => {
    const res = await post(JSON.stringify({ reconcile: 0 }));

    expect(res.status).toBe(400);
    expect((await res.json()).field).toBe("reconcile");
  });

  it("rejects a bad resolution", async () => {
    const res = await post(JSON.stringify({ segmentation: "fixed", resolution: 0 }));

    expect(res.status).toBe(400);
    expect((await res.json()).field).toBe("resolution");
  });

  it("returns 400 for malformed JSON", async () => {
    const res = await post("{not json");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be valid JSON" });
  });

  it("returns 400 when the body is not an object", async () => {
    const res = await post("[1, 2]");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be a JSON object" });
  });
});
