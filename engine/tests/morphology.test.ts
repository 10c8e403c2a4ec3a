import { describe, expect, it } from "vitest";
import { applyMorphology, dilate, erode } from "../src/morphology.js";

describe("binary morphology on sampled logs", () => {
  it("leaves a log alone with a one-sample element", () => {
    expect(erode([1, 1, 1, 1, 0], 1)).toEqual([1, 1, 1, 1, 0]);
    expect(dilate([0, 1, 0], 1)).toEqual([0, 1, 0]);
  });

  it("grows set samples by half the element each way", () => {
    expect(dilate([0, 0, 1, 0, 0], 3)).toEqual([0, 1, 1, 1, 0]);
  });

  it("leans upwards with an even element", () => {
    expect(dilate([0, 1, 0, 0], 2)).toEqual([0, 1, 1, 0]);
  });

  it("fills a one-sample hole by closing", () => {
    expect(applyMorphology([1, 1, 0, 1, 1], "closing", 3)).toEqual([1, 1, 1, 1, 1]);
  });

  it("removes a lone sample by opening", () => {
    expect(applyMorphology([0, 0, 1, 0, 0], "opening", 3)).toEqual([0, 0, 0, 0, 0]);
  });

  it("passes undefined samples through", () => {
    expect(applyMorphology([1, -1, 1], "dilation", 3)).toEqual([1, -1, 1]);
  });
});
