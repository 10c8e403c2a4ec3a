import { describe, expect, it } from "vitest";
import { combineData, compareValues, listAndAdd, stripChars, valuesEqual } from "../src/values.js";

describe("data values", () => {
  it("concatenates values as lists", () => {
    expect(listAndAdd(1, 2)).toEqual([1, 2]);
    expect(listAndAdd([1, 2], "a")).toEqual([1, 2, "a"]);
  });

  it("combines maps, accumulating shared keys", () => {
    expect(combineData({ a: 1, gr: 40 }, { b: true, gr: [50, 60] })).toEqual({ a: 1, gr: [40, 50, 60], b: true });
  });

  it("orders booleans, numbers, strings, then lists", () => {
    const sorted = ["b", 2, [1], true, "a", 1].sort(compareValues);
    expect(sorted).toEqual([true, 1, 2, "a", "b", [1]]);
  });

  it("treats NaN as equal to itself", () => {
    expect(valuesEqual(NaN, NaN)).toBe(true);
    expect(valuesEqual([1, "a"], [1, "a"])).toBe(true);
    expect(valuesEqual([1], 1)).toBe(false);
  });

  it("strips characters from both ends", () => {
    expect(stripChars(" .Sand, grey. ", " .,")).toBe("Sand, grey");
    expect(stripChars("...", ".")).toBe("");
  });
});
