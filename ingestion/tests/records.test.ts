import { describe, expect, it } from "vitest";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { StriplogError } from "striplog-engine";
import { buildIntervals, striplogFromRecords } from "../src/records.js";

const fixturePath = fileURLToPath(new URL("../../fixtures/sample_log.json", import.meta.url));

function extents(intervals: Iterable<{ top: { z: number }; base: { z: number } }>): number[][] {
  return [...intervals].map((iv) => [iv.top.z, iv.base.z]);
}

describe("interval records", () => {
  it("sorts by top and fills missing bases from the next top", () => {
    const intervals = buildIntervals([{ top: 20, description: "b" }, { top: 10, base: 15, description: "a" }], {
      stop: 30,
    });
    expect(intervals.map((iv) => iv.description)).toEqual(["a", "b"]);
    expect(extents(intervals)).toEqual([
      [10, 15],
      [20, 30],
    ]);
  });

  it("gives the last interval one unit of thickness without a stop", () => {
    expect(extents(buildIntervals([{ top: 0 }, { top: 5 }]))).toEqual([
      [0, 5],
      [5, 6],
    ]);
  });

  it("keeps points when asked", () => {
    const intervals = buildIntervals([{ top: 0 }, { top: 5 }], { points: true });
    expect(intervals.map((iv) => iv.thickness)).toEqual([0, 0]);
  });

  it("gathers flat component keys into one component and the rest into data", () => {
    const [iv] = buildIntervals([
      { top: 0, base: 1, "component lithology": "sand", "comp colour": "grey", porosity: 0.2, note: null },
    ]);
    expect(iv.components).toHaveLength(1);
    expect(iv.primary?.toJSON()).toEqual({ lithology: "sand", colour: "grey" });
    expect(iv.data).toEqual({ porosity: 0.2 });
  });

  it("places flat components after explicit ones", () => {
    const [iv] = buildIntervals([
      { top: 0, base: 1, components: [{ lithology: "shale" }], "component lithology": "sand" },
    ]);
    expect(iv.components.map((c) => c.get("lithology"))).toEqual(["shale", "sand"]);
  });

  it("filters records with include and exclude", () => {
    const records = [
      { top: 0, base: 1, porosity: 0.2 },
      { top: 1, base: 2, porosity: 0.05 },
      { top: 2, base: 3 },
    ];
    const porous = (v: unknown): boolean => typeof v === "number" && v > 0.1;
    expect(extents(buildIntervals(records, { include: { porosity: porous } }))).toEqual([
      [0, 1],
      [2, 3],
    ]);
    expect(extents(buildIntervals(records, { exclude: { porosity: porous } }))).toEqual([
      [1, 2],
      [2, 3],
    ]);
  });

  it("leaves ignored fields out", () => {
    const [iv] = buildIntervals([{ top: 0, base: 1, description: "x", porosity: 0.2, data: { gr: 40 } }], {
      ignore: ["porosity", "description"],
    });
    expect(iv.data).toEqual({ gr: 40 });
    expect(iv.description).toBe("");
  });

  it("reports invalid records by index and path", () => {
    try {
      buildIntervals([{ top: 0 }, { base: 2 }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StriplogError);
      if (error instanceof StriplogError) {
        expect(error.message.startsWith("Invalid interval record at index 1")).toBe(true);
        expect(error.issues[0]).toMatch(/^top:/);
      }
    }
  });

  it("validates data maps with the engine value schema", () => {
    try {
      buildIntervals([{ top: 0, base: 1, data: { gr: { api: 40 } } }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StriplogError);
      if (error instanceof StriplogError) expect(error.issues[0]).toMatch(/^data\.gr: /);
    }
    const [iv] = buildIntervals([{ top: 0, base: 1, data: { gr: [40, 42], cored: true, note: null } }]);
    expect(iv.data).toEqual({ gr: [40, 42], cored: true });
  });

  it("builds a striplog from the sample file", () => {
    const records: unknown = JSON.parse(readFileSync(fixturePath, "utf-8"));
    if (!Array.isArray(records)) throw new Error("fixture must be an array");
    const strip = striplogFromRecords(records, { stop: 150, source: "sample" });

    expect(strip.length).toBe(5);
    expect(strip.source).toBe("sample");
    expect(strip.order).toBe("depth");
    expect(extents(strip)).toEqual([
      [100, 112.5],
      [112.5, 118],
      [118, 130],
      [132, 140],
      [140, 150],
    ]);
    expect(strip.findGapIndices()).toEqual([2]);
    expect(strip.at(0)?.primary?.toJSON()).toEqual({ lithology: "sandstone", colour: "grey" });
    expect(strip.at(3)?.data).toEqual({});
  });
});
