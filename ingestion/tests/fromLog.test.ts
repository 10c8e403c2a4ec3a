import { describe, expect, it } from "vitest";
import { Component, StriplogError } from "striplog-engine";
import { digitize, runsOf, striplogFromLog } from "../src/fromLog.js";

const sand = new Component({ lithology: "sandstone" });
const shale = new Component({ lithology: "shale" });

describe("log digitizing", () => {
  it("counts the cutoffs below a value", () => {
    expect(digitize(0.5, [0.2, 0.5])).toBe(2);
    expect(digitize(0.5, [0.2, 0.5], true)).toBe(1);
    expect(digitize(0.1, [0.2, 0.5])).toBe(0);
    expect(digitize(NaN, [0.2])).toBeNaN();
  });

  it("finds runs of equal samples", () => {
    expect(runsOf([3, 3, 4, 3])).toEqual([
      { index: 0, value: 3 },
      { index: 2, value: 4 },
      { index: 3, value: 3 },
    ]);
    expect(runsOf([NaN, NaN, 1])).toEqual([
      { index: 0, value: NaN },
      { index: 2, value: 1 },
    ]);
  });
});

describe("striplog from a log", () => {
  it("stores each run's value in the field", () => {
    const strip = striplogFromLog([1, 1, 2, 2, 2, 1], { basis: [0, 1, 2, 3, 4, 5], field: "gr" });
    expect([...strip].map((iv) => [iv.top.z, iv.base.z, iv.data.gr])).toEqual([
      [0, 2, 1],
      [2, 5, 2],
      [5, 5, 1],
    ]);
    expect(strip.source).toBe("Log");
  });

  it("bins against a cutoff", () => {
    const strip = striplogFromLog([0.1, 0.5, 0.9, 0.5], {
      basis: [10, 11, 12, 13],
      cutoff: 0.5,
      components: [sand, shale],
    });
    expect([...strip].map((iv) => [iv.top.z, iv.base.z, iv.primary?.get("lithology")])).toEqual([
      [10, 11, "sandstone"],
      [11, 13, "shale"],
    ]);
  });

  it("sends values on a cutoff to the lower bin with right", () => {
    const strip = striplogFromLog([0.1, 0.5, 0.9, 0.5], {
      basis: [10, 11, 12, 13],
      cutoff: [0.5],
      components: [sand, shale],
      right: true,
    });
    expect([...strip].map((iv) => [iv.top.z, iv.base.z, iv.primary?.get("lithology")])).toEqual([
      [10, 12, "sandstone"],
      [12, 13, "shale"],
      [13, 13, "sandstone"],
    ]);
  });

  it("leaves null components empty", () => {
    const strip = striplogFromLog([0, 1], { basis: [0, 1], cutoff: 0.5, components: [null, shale] });
    expect(strip.at(0)?.components).toEqual([]);
    expect(strip.at(1)?.primary?.get("lithology")).toBe("shale");
  });

  it("skips NaN runs", () => {
    const strip = striplogFromLog([1, NaN, NaN, 1], { basis: [0, 1, 2, 3], field: "v" });
    expect([...strip].map((iv) => [iv.top.z, iv.base.z])).toEqual([
      [0, 1],
      [3, 3],
    ]);
  });

  it("follows an elevation basis", () => {
    const strip = striplogFromLog([1, 1, 2], { basis: [100, 99, 98], field: "v" });
    expect(strip.order).toBe("elevation");
    expect([...strip].map((iv) => [iv.top.z, iv.base.z])).toEqual([
      [100, 98],
      [98, 98],
    ]);
  });

  it("checks its inputs", () => {
    expect(() => striplogFromLog([1, 2], { basis: [0, 1] })).toThrow(
      "You must provide a list of components, or a field."
    );
    expect(() => striplogFromLog([1, 2], { field: "v" })).toThrow("You must provide a depth or elevation basis.");
    expect(() => striplogFromLog([1, 2, 3], { basis: [0, 1], field: "v" })).toThrow(
      "The log and its basis must have the same length."
    );
    expect(() => striplogFromLog([1, 2], { basis: [0, 1], cutoff: [1, 2], components: [sand, shale] })).toThrow(
      "For n cutoffs, you need to provide at least n+1 components."
    );
    expect(() => striplogFromLog([1, 2], { basis: [0, 1], field: "" })).toThrow(StriplogError);
  });
});
