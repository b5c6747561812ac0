import { describe, it, expect } from "@jest/globals";
import {
  collapseRepeatedCommas,
  convertSingleQuotes,
  quoteBareKeys,
  removeTrailingCommas,
  repairJson,
  retokenizeArrays,
} from "../JsonRepairer";

describe("JsonRepairer", () => {
  describe("quoteBareKeys", () => {
    it("should quote unquoted identifier keys", () => {
      expect(quoteBareKeys('{primaryEmotion: "Joy", intensity: 0.5}')).toBe(
        '{"primaryEmotion": "Joy", "intensity": 0.5}',
      );
    });

    it("should not touch text inside strings", () => {
      expect(quoteBareKeys('{"note": "time: now"}')).toBe(
        '{"note": "time: now"}',
      );
    });
  });

  describe("convertSingleQuotes", () => {
    it("should convert single-quoted keys and values", () => {
      expect(convertSingleQuotes("{'primaryEmotion': 'Joy'}")).toBe(
        '{"primaryEmotion": "Joy"}',
      );
    });

    it("should unescape apostrophes and escape double quotes", () => {
      expect(convertSingleQuotes(String.raw`{"a": 'it\'s "x"'}`)).toBe(
        String.raw`{"a": "it's \"x\""}`,
      );
    });

    it("should leave apostrophes inside double-quoted strings", () => {
      expect(convertSingleQuotes(`{"a": "don't", "b": 'x'}`)).toBe(
        `{"a": "don't", "b": "x"}`,
      );
    });
  });

  describe("retokenizeArrays", () => {
    it("should quote bare words and drop the trailing empty element", () => {
      expect(retokenizeArrays('{"riskFactors": [burnout, "fatigue",]}')).toBe(
        '{"riskFactors": ["burnout", "fatigue"]}',
      );
    });

    it("should keep literals and nested structures", () => {
      expect(
        retokenizeArrays(`[1, -2.5, TRUE, null, 'a b', {"k": 1}, [x]]`),
      ).toBe(`[1, -2.5, true, null, "a b", {"k": 1}, [x]]`);
    });

    it("should leave a truncated array as written", () => {
      expect(retokenizeArrays('{"a": [x, y')).toBe('{"a": [x, y');
    });
  });

  describe("removeTrailingCommas", () => {
    it("should drop commas before closing brackets and braces", () => {
      expect(removeTrailingCommas('{"a": [1, 2,], "b": 3,}')).toBe(
        '{"a": [1, 2], "b": 3}',
      );
    });

    it("should treat a run of trailing commas as one", () => {
      expect(removeTrailingCommas("[1, , ,]")).toBe("[1]");
    });

    it("should not touch commas inside strings", () => {
      expect(removeTrailingCommas('{"a": "x,}"}')).toBe('{"a": "x,}"}');
    });

    it("should handle a long comma run before another key in linear time", () => {
      const text = '{"a": 1' + ",".repeat(40000) + ' "b": 2}';
      const started = Date.now();

      expect(removeTrailingCommas(text)).toBe(text);
      expect(Date.now() - started).toBeLessThan(1000);
    });
  });

  describe("collapseRepeatedCommas", () => {
    it("should collapse runs of commas into one", () => {
      expect(collapseRepeatedCommas("[1,, 2 , ,3]")).toBe("[1, 2 ,3]");
    });

    it("should not touch commas inside strings", () => {
      expect(collapseRepeatedCommas('["a,,b"]')).toBe('["a,,b"]');
    });
  });

  describe("repairJson", () => {
    it("should fix bare keys and single-quoted values together", () => {
      const repaired = repairJson(
        "{primaryEmotion: 'Joy', coordinates: [0.0, -0.2]}",
      );

      expect(repaired).toBe(
        '{"primaryEmotion": "Joy", "coordinates": [0.0, -0.2]}',
      );
      expect(JSON.parse(repaired)).toEqual({
        primaryEmotion: "Joy",
        coordinates: [0, -0.2],
      });
    });

    it("should preserve the content of already valid JSON", () => {
      const valid = '{"a": [1,2], "b": {"c": "d, e"}}';

      expect(JSON.parse(repairJson(valid))).toEqual(JSON.parse(valid));
    });
  });
});
