import { afterEach, describe, it, expect, vi } from "vitest";
import { DEFAULT_CONFIG, loadAdvanceConfig } from "./config";

describe("loadAdvanceConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses the built-in defaults when nothing is set", () => {
    expect(loadAdvanceConfig({})).toEqual({ model: "segmented", segmentation: "outlet", resolution: 100 });
  });

  it("reads the model, segmentation and resolution", () => {
    expect(
      loadAdvanceConfig({ ADVANCE_MODEL: "exponential", ADVANCE_SEGMENTATION: "fixed", ADVANCE_RESOLUTION: "250" }),
    ).toEqual({ model: "exponential", segmentation: "fixed", resolution: 250 });
  });

  it("warns and keeps the default for unknown values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const config = loadAdvanceConfig({ ADVANCE_MODEL: "kinematic", ADVANCE_RESOLUTION: "0" });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn.mock.calls[0][0]).toBe(
      'ADVANCE_MODEL="kinematic" is not one of segmented, empirical, exponential; using "segmented".',
    );
  });
});
