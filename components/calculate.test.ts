import { describe, it, expect } from "vitest";
import { computeFromForm, type FormValues } from "./calculate";

const values: FormValues = {
  emitterFlow: "1",
  emitterSpacing: "0.5",
  lateralLength: "150",
  internalDiameter: "20.2",
};

describe("computeFromForm", () => {
  it("runs the selected model on valid fields", () => {
    const state = computeFromForm(values, { model: "segmented", segmentation: "fixed" });

    expect(state.status).toBe("ok");
    if (state.status === "ok") {
      expect(state.result.model).toBe("segmented");
      expect(state.result.segments).toHaveLength(100);
    }
  });

  it("reports the offending field instead of computing", () => {
    const state = computeFromForm({ ...values, emitterSpacing: "0" }, { model: "empirical", segmentation: "outlet" });

    expect(state).toEqual({
      status: "invalid",
      field: "emitterSpacing",
      message: "Invalid emitterSpacing: must be a finite number greater than 0 (got 0)",
    });
  });
});
