import { describe, expect, it } from "vitest";
import { Component } from "../src/component.js";
import { Interval } from "../src/interval.js";
import { formatSummary, summarizeStriplog } from "../src/report.js";
import { Striplog } from "../src/striplog.js";

const sand = new Component({ lithology: "sandstone" });
const shale = new Component({ lithology: "shale" });

const strip = new Striplog(
  [
    new Interval(0, 10, { components: [sand] }),
    new Interval(10, 15, { components: [shale] }),
    new Interval(20, 30, { components: [sand] }),
  ],
  { source: "well A" }
);

describe("striplog report", () => {
  it("summarizes extent, thickness and incongruities", () => {
    const summary = summarizeStriplog(strip);
    expect(summary.intervalCount).toBe(3);
    expect([summary.start, summary.stop]).toEqual([0, 30]);
    expect(summary.totalThickness).toBe(25);
    expect(summary.gapCount).toBe(1);
    expect(summary.overlapCount).toBe(0);
    expect(summary.components).toEqual([
      { summary: "Sandstone", thickness: 20, fraction: 0.8 },
      { summary: "Shale", thickness: 5, fraction: 0.2 },
    ]);
  });

  it("formats printable lines", () => {
    expect(formatSummary(summarizeStriplog(strip))).toEqual([
      "Striplog summary (well A)",
      "",
      "Order: depth",
      "Intervals: 3",
      "Extent: 0 to 30 m",
      "Total thickness: 25.00 m",
      "Mean thickness: 8.33 m",
      "Gaps: 1",
      "Overlaps: 0",
      "",
      "Components:",
      "- Sandstone: 20.00 m (80.0%)",
      "- Shale: 5.00 m (20.0%)",
    ]);
  });

  it("labels intervals without components", () => {
    const bare = summarizeStriplog(new Striplog([new Interval(0, 1)]));
    expect(bare.components).toEqual([{ summary: "(no components)", thickness: 1, fraction: 1 }]);
    expect(formatSummary(bare)[0]).toBe("Striplog summary");
  });
});
