import { describe, expect, it } from "vitest";
import { Component, componentListsEqual, uniqueComponents } from "../src/component.js";

describe("Component", () => {
  it("coerces numeric strings and skips nulls", () => {
    const c = new Component({ lithology: "sandstone", grainsize: "0.25", colour: null, porous: true });
    expect(c.get("grainsize")).toBe(0.25);
    expect(c.has("colour")).toBe(false);
    expect(c.get("porous")).toBe(true);
    expect(c.keys()).toEqual(["lithology", "grainsize", "porous"]);
  });

  it("compares strings case-insensitively and ignores numbers", () => {
    const a = new Component({ lithology: "Sandstone", colour: "grey", porosity: 0.2 });
    const b = new Component({ LITHOLOGY: "sandstone", colour: "GREY", porosity: 0.3 });
    expect(a.equals(b)).toBe(true);
    expect(a.equals(new Component({ lithology: "sandstone", colour: "red" }))).toBe(false);
  });

  it("ignores empty values when comparing", () => {
    const a = new Component({ lithology: "shale", colour: "", fractured: false });
    expect(a.equals(new Component({ lithology: "shale" }))).toBe(true);
    expect(a.equals(null)).toBe(false);
  });

  it("summarizes every property by default", () => {
    const c = new Component({ colour: "grey", lithology: "sandstone" });
    expect(c.summary()).toBe("Grey, sandstone");
    expect(c.summary({ initial: false })).toBe("grey, sandstone");
  });

  it("formats fields with conversions", () => {
    const c = new Component({ lithology: "sandstone", colour: "grey", name: "red beds", values: [1, 2, 3] });
    expect(c.summary({ fmt: "{lithology!u} ({colour})" })).toBe("SANDSTONE (grey)");
    expect(c.summary({ fmt: "{name!t}" })).toBe("Red Beds");
    expect(c.summary({ fmt: "{name!c}" })).toBe("Red beds");
    expect(c.summary({ fmt: "{values!m} {values!+}" })).toBe("2 6");
    expect(c.summary({ fmt: "{lithology} {grainsize}" })).toBe("sandstone _");
  });

  it("falls back for empty components and empty formats", () => {
    expect(new Component().summary({ fallback: "none" })).toBe("none");
    expect(new Component().summary()).toBe("");
    expect(new Component({ lithology: "shale" }).summary({ fmt: "", fallback: "n/a" })).toBe("n/a");
  });

  it("picks a subset of keys", () => {
    const c = new Component({ lithology: "shale", colour: "black" });
    expect(c.pick(["lithology"]).toJSON()).toEqual({ lithology: "shale" });
  });

  it("deduplicates in order of discovery", () => {
    const a = new Component({ lithology: "sandstone" });
    const b = new Component({ lithology: "shale" });
    const unique = uniqueComponents([a, new Component({ lithology: "SANDSTONE" }), b]);
    expect(unique).toHaveLength(2);
    expect(unique[0]).toBe(a);
    expect(unique[1]).toBe(b);
  });

  it("compares lists element by element", () => {
    const a = [new Component({ lithology: "sandstone" })];
    expect(componentListsEqual(a, [new Component({ lithology: "sandstone" })])).toBe(true);
    expect(componentListsEqual(a, [])).toBe(false);
  });
});
