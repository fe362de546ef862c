import { describe, it, expect } from "vitest";
import {
  EMPIRICAL_MODEL_REFERENCE,
  empiricalTravelTime,
  hazenWilliamsHeadloss,
  pipeArea,
  velocity,
} from "./equations";
import { InvalidParameterError } from "./errors";

const base = { emitterFlow: 1.0, emitterSpacing: 0.5, lateralLength: 150, internalDiameter: 20.2 };

describe("empiricalTravelTime", () => {
  it("evaluates the regression for a 150 m lateral", () => {
    const { travelTimeFull } = empiricalTravelTime(base);
    expect(travelTimeFull).toBeCloseTo(56.8489, 4);
  });

  it("uses half of the full time for the 95% point", () => {
    const { travelTimeFull, travelTime95 } = empiricalTravelTime(base);
    expect(travelTime95).toBe(travelTimeFull / 2);
  });

  it("scales inversely with emitter flow", () => {
    const one = empiricalTravelTime(base).travelTimeFull;
    const two = empiricalTravelTime({ ...base, emitterFlow: 2 }).travelTimeFull;
    expect(two).toBeCloseTo(one / 2, 10);
  });

  it("rejects non-positive inputs", () => {
    expect(() => empiricalTravelTime({ ...base, emitterFlow: 0 })).toThrow(InvalidParameterError);
    expect(() => empiricalTravelTime({ ...base, internalDiameter: -1 })).toThrow(/internalDiameter/);
  });

  it("links the published regression through its DOI", () => {
    expect(EMPIRICAL_MODEL_REFERENCE.doi).toBe("10.4236/as.2025.1612082");
    expect(EMPIRICAL_MODEL_REFERENCE.url).toBe("https://www.scirp.org/journal/paperinformation?paperid=148372");
  });
});

describe("pipe primitives", () => {
  it("computes the bore area from a diameter in millimetres", () => {
    expect(pipeArea(20.2)).toBeCloseTo(3.204738665926948e-4, 15);
  });

  it("converts L/h to a mean velocity in m/s", () => {
    expect(velocity(300, pipeArea(20.2))).toBeCloseTo(0.2600316032609472, 12);
    expect(velocity(300, 0)).toBe(0);
  });

  it("computes Hazen-Williams loss with flow converted to m3/h", () => {
    expect(hazenWilliamsHeadloss(300, 0.5, 20.2)).toBeCloseTo(0.002816827026447198, 12);
    expect(hazenWilliamsHeadloss(300, 150, 20.2)).toBeCloseTo(0.8450481079341595, 10);
  });

  it("returns zero loss without flow", () => {
    expect(hazenWilliamsHeadloss(0, 0.5, 20.2)).toBe(0);
  });
});
