import {
  InsufficientDataError,
  InvalidParameterError,
  MalformedInputError,
  NumericInstabilityError,
  SimulationError,
  requireNonNegative,
  requirePositive,
} from "@/errors/SimulationError";
import { describe, expect, it } from "vitest";

describe("SimulationError", () => {
  it("should carry a code and the subclass name", () => {
    const error = new MalformedInputError("bad row");

    expect(error).toBeInstanceOf(SimulationError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("MALFORMED_INPUT");
    expect(error.name).toBe("MalformedInputError");
    expect(error.message).toBe("bad row");
  });

  it("should map each subclass to its code", () => {
    expect(new InvalidParameterError("").code).toBe("INVALID_PARAMETER");
    expect(new InsufficientDataError("").code).toBe("INSUFFICIENT_DATA");
    expect(new NumericInstabilityError("").code).toBe("NUMERIC_INSTABILITY");
  });

  describe("requirePositive", () => {
    it("should accept positive finite values", () => {
      expect(() => requirePositive("dt", 1e-12)).not.toThrow();
    });

    it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])("should reject %s", (value) => {
      expect(() => requirePositive("dt", value)).toThrow(InvalidParameterError);
    });

    it("should name the parameter in the message", () => {
      expect(() => requirePositive("mass", -2)).toThrow("mass must be a finite number > 0, got -2");
    });
  });

  describe("requireNonNegative", () => {
    it("should accept zero", () => {
      expect(() => requireNonNegative("temperature", 0)).not.toThrow();
    });

    it("should reject negative values", () => {
      expect(() => requireNonNegative("temperature", -0.5)).toThrow(InvalidParameterError);
    });
  });
});
