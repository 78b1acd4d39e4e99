import { describe, it, expect } from "vitest";
import { histogram, inferType, pearson, profileTable, summarize } from "./stats";

describe("inferType", () => {
  it("picks the dominant kind of value", () => {
    expect(inferType([1, 2, "x", null])).toBe("number");
    expect(inferType([new Date(0), new Date(1), 3])).toBe("date");
    expect(inferType(["a", "b", 1])).toBe("string");
    expect(inferType([null, null])).toBe("unknown");
  });
});

describe("summarize", () => {
  it("computes quartiles by interpolation", () => {
    const s = summarize([4, 1, 3, 2]);
    expect(s).toMatchObject({ n: 4, mean: 2.5, median: 2.5, min: 1, max: 4, q1: 1.75, q3: 3.25, iqr: 1.5, outliersIqr: 0 });
  });

  it("flags IQR outliers", () => {
    expect(summarize([1, 2, 3, 4, 100])?.outliersIqr).toBe(1);
  });

  it("is null for no values", () => {
    expect(summarize([])).toBeNull();
  });
});

describe("profileTable", () => {
  it("reports missing share, distinct count and numeric summary", () => {
    const [a, b] = profileTable({
      columns: ["a", "b"],
      rows: [{ a: 1, b: "x" }, { a: 2, b: "x" }, { a: 3, b: null }, { a: null, b: "y" }],
    });
    expect(a).toMatchObject({ name: "a", type: "number", missingPct: 25, distinct: 3 });
    expect(a.numeric).toMatchObject({ n: 3, mean: 2, median: 2 });
    expect(b).toEqual({ name: "b", type: "string", missingPct: 25, distinct: 2, numeric: null });
  });
});

describe("pearson", () => {
  it("needs at least two points", () => {
    expect(pearson([1], [2])).toBeNaN();
  });
});

describe("histogram", () => {
  it("puts everything in one bin for a constant series", () => {
    expect(histogram([3, 3, 3], 4).counts).toEqual([3, 0, 0, 0]);
  });
});
