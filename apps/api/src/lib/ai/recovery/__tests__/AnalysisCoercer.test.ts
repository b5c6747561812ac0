import { describe, it, expect, jest } from "@jest/globals";
import {
  coerceAnalysisRecord,
  coerceBoundedNumber,
  coerceCoordinates,
  coerceNumber,
  coerceStringList,
  coerceText,
  FieldRejected,
} from "../AnalysisCoercer";
import {
  ANALYSIS_DEFAULTS,
  createAnalysisRecord,
} from "../../../../domain/analysis/AnalysisRecord";

describe("AnalysisCoercer", () => {
  describe("coerceText", () => {
    it("should keep strings and stringify scalars", () => {
      expect(coerceText("", "d")).toBe("");
      expect(coerceText(42, "d")).toBe("42");
      expect(coerceText(true, "d")).toBe("true");
    });

    it("should serialize arrays and objects as JSON", () => {
      expect(coerceText({ a: 1 }, "d")).toBe('{"a":1}');
      expect(coerceText(["x"], "d")).toBe('["x"]');
    });

    it("should use the fallback for absent values", () => {
      expect(coerceText(null, "d")).toBe("d");
      expect(coerceText(undefined, "d")).toBe("d");
    });
  });

  describe("coerceNumber", () => {
    it("should parse trimmed decimal strings", () => {
      expect(coerceNumber("  0.5 ")).toBe(0.5);
      expect(coerceNumber(".5")).toBe(0.5);
      expect(coerceNumber("1e-1")).toBe(0.1);
    });

    it("should reject non-numeric and non-finite values", () => {
      expect(coerceNumber("")).toBeUndefined();
      expect(coerceNumber("abc")).toBeUndefined();
      expect(coerceNumber(Number.NaN)).toBeUndefined();
      expect(coerceNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
      expect(coerceNumber(true)).toBeUndefined();
    });
  });

  describe("coerceBoundedNumber", () => {
    it("should clamp into the unit interval", () => {
      expect(coerceBoundedNumber(-0.3)).toBe(0);
      expect(coerceBoundedNumber(1.8)).toBe(1);
      expect(coerceBoundedNumber("0.42")).toBe(0.42);
    });

    it("should default unusable values to zero", () => {
      expect(coerceBoundedNumber("high")).toBe(0);
      expect(coerceBoundedNumber(undefined)).toBe(0);
    });
  });

  describe("coerceCoordinates", () => {
    it("should default anything shorter than a pair", () => {
      expect(coerceCoordinates([0.5])).toEqual([0, 0]);
      expect(coerceCoordinates("0.1")).toEqual([0, 0]);
      expect(coerceCoordinates({ x: 1, y: 2 })).toEqual([0, 0]);
    });

    it("should read a pair written as text", () => {
      expect(coerceCoordinates("0.3, -0.2")).toEqual([0.3, -0.2]);
      expect(coerceCoordinates("[0.1, 0.2]")).toEqual([0.1, 0.2]);
    });

    it("should coerce each axis and ignore extra elements", () => {
      expect(coerceCoordinates([0.1, "x"])).toEqual([0.1, 0]);
      expect(coerceCoordinates(["0.3", "-0.4", 9])).toEqual([0.3, -0.4]);
    });
  });

  describe("coerceStringList", () => {
    it("should convert array elements to text and drop nulls", () => {
      expect(coerceStringList(["a", null, 3])).toEqual(["a", "3"]);
    });

    it("should decode a bracketed literal before splitting", () => {
      expect(coerceStringList('["x", "y"]')).toEqual(["x", "y"]);
      expect(coerceStringList("[x, y]")).toEqual(["x", "y"]);
    });

    it("should split comma lists and strip quotes", () => {
      expect(coerceStringList(`a, 'b', "c"`)).toEqual(["a", "b", "c"]);
    });

    it("should return an empty list for empty values", () => {
      expect(coerceStringList("")).toEqual([]);
      expect(coerceStringList(null)).toEqual([]);
      expect(coerceStringList({})).toEqual([]);
    });

    it("should wrap a lone scalar", () => {
      expect(coerceStringList(7)).toEqual(["7"]);
    });
  });

  describe("coerceAnalysisRecord", () => {
    it("should read the nested analysis object and top-level response", () => {
      const record = coerceAnalysisRecord({
        internal_chs_analysis: {
          primaryEmotion: "Guilt",
          complexEmotion: "Shame",
          coordinates: [0.55, -0.18],
          intensity: 0.8,
          instability: "0.7",
          collapseRisk: 0.6,
          keyIndicators: ["for no reason"],
          responseStrategy: "Validate",
          riskFactors: "self-blame, isolation",
        },
        user_facing_response: "That sounds painful.",
      });

      expect(record).toEqual(
        createAnalysisRecord({
          primaryEmotion: "Guilt",
          complexEmotion: "Shame",
          coordinates: [0.55, -0.18],
          intensity: 0.8,
          instability: 0.7,
          collapseRisk: 0.6,
          keyIndicators: ["for no reason"],
          responseStrategy: "Validate",
          riskFactors: ["self-blame", "isolation"],
          userFacingResponse: "That sounds painful.",
        }),
      );
    });

    it("should read a flat object with a camelCase response", () => {
      const record = coerceAnalysisRecord({
        primaryEmotion: "Joy",
        userFacingResponse: "Glad to hear it!",
      });

      expect(record.primaryEmotion).toBe("Joy");
      expect(record.userFacingResponse).toBe("Glad to hear it!");
      expect(record.complexEmotion).toBe("Unknown");
    });

    it("should return the default record for non-object input", () => {
      expect(coerceAnalysisRecord("text")).toEqual(ANALYSIS_DEFAULTS);
      expect(coerceAnalysisRecord([1, 2])).toEqual(ANALYSIS_DEFAULTS);
    });

    it("should report numeric and coordinate values it had to discard", () => {
      const onRejected = jest.fn<FieldRejected>();

      coerceAnalysisRecord(
        { internal_chs_analysis: { intensity: "very", coordinates: [1] } },
        onRejected,
      );

      expect(onRejected.mock.calls).toEqual([
        ["coordinates", [1]],
        ["intensity", "very"],
      ]);
    });

    it("should not report absent or blank values", () => {
      const onRejected = jest.fn<FieldRejected>();

      coerceAnalysisRecord({ intensity: " ", collapseRisk: null }, onRejected);

      expect(onRejected).not.toHaveBeenCalled();
    });
  });
});
