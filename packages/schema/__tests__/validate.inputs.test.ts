import { describe, it, expect } from "vitest";
import { parseRawRecords, parseTolerance, ToleranceSchema } from "../src/validate.js";

describe("tolerance validation", () => {
  it("accepts positive finite percentages", () => {
    expect(parseTolerance(30)).toBe(30);
    expect(parseTolerance(12.5)).toBe(12.5);
  });

  it("rejects zero, negatives, non-finite values and strings", () => {
    for (const bad of [0, -5, Number.NaN, Number.POSITIVE_INFINITY, "30", null]) {
      expect(ToleranceSchema.safeParse(bad).success).toBe(false);
    }
    expect(() => parseTolerance(0)).toThrow();
  });
});

describe("raw record validation", () => {
  it("accepts arrays of flat rows with scalar or null cells", () => {
    const rows = parseRawRecords([{ Material: "A-1", QTY: 3, Active: true, Vendor: null }]);
    expect(rows).toEqual([{ Material: "A-1", QTY: 3, Active: true, Vendor: null }]);
  });

  it("rejects non-arrays and nested values", () => {
    expect(() => parseRawRecords({ Material: "A-1" })).toThrow();
    expect(() => parseRawRecords([{ Material: { code: "A-1" } }])).toThrow();
    expect(() => parseRawRecords([["A-1", 3]])).toThrow();
  });
});
