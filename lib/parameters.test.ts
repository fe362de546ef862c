import { describe, it, expect } from "vitest";
import { InvalidParameterError } from "./errors";
import { assertValidInputs, DEFAULT_PARAMETERS, parseParameters, validateParameters } from "./parameters";

describe("parseParameters", () => {
  it("falls back to the defaults for missing or empty values", () => {
    expect(parseParameters({})).toEqual({
      emitterFlow: 1.0,
      emitterSpacing: 0.5,
      lateralLength: 150,
      internalDiameter: 20.2,
    });
    expect(parseParameters({ emitterFlow: "" }).emitterFlow).toBe(1.0);
  });

  it("reads numeric strings and numbers", () => {
    expect(parseParameters({ emitterFlow: " 1.6 ", lateralLength: 200 })).toEqual({
      ...DEFAULT_PARAMETERS,
      emitterFlow: 1.6,
      lateralLength: 200,
    });
  });

  it("names the field and its constraint when out of range", () => {
    try {
      parseParameters({ internalDiameter: "50" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidParameterError);
      if (err instanceof InvalidParameterError) {
        expect(err.field).toBe("internalDiameter");
        expect(err.constraint).toBe("between 8 and 40 mm");
        expect(err.message).toBe("Invalid internalDiameter: must be between 8 and 40 mm (got 50)");
      }
    }
  });

  it("rejects text that is not a number", () => {
    expect(() => parseParameters({ emitterSpacing: "wide" })).toThrow("Invalid emitterSpacing: must be a number (got wide)");
  });
});

describe("validateParameters", () => {
  it("returns a frozen copy", () => {
    const validated = validateParameters(DEFAULT_PARAMETERS);
    expect(validated).toEqual(DEFAULT_PARAMETERS);
    expect(Object.isFrozen(validated)).toBe(true);
  });

  it("requires the lateral to be at least one spacing long", () => {
    expect(() => validateParameters({ ...DEFAULT_PARAMETERS, lateralLength: 1, emitterSpacing: 1.5 })).toThrow(
      /lateralLength/,
    );
  });
});

describe("assertValidInputs", () => {
  it("accepts any positive values outside the form ranges", () => {
    expect(() => assertValidInputs({ ...DEFAULT_PARAMETERS, emitterFlow: 25 })).not.toThrow();
  });

  it("rejects zero and infinity", () => {
    expect(() => assertValidInputs({ ...DEFAULT_PARAMETERS, emitterFlow: 0 })).toThrow(InvalidParameterError);
    expect(() => assertValidInputs({ ...DEFAULT_PARAMETERS, lateralLength: Infinity })).toThrow(/lateralLength/);
  });
});
