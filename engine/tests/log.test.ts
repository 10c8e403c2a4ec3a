import { describe, expect, it } from "vitest";
import { linspace, resolveLogOptions } from "../src/log.js";
import { ceilIndex } from "../src/order.js";
import { StriplogError } from "../src/errors.js";

describe("linspace", () => {
  it("spaces samples evenly and ends exactly on stop", () => {
    expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
    expect(linspace(3, 3, 1)).toEqual([3]);
  });
});

describe("ceilIndex", () => {
  it("absorbs float noise before taking the ceiling", () => {
    expect(ceilIndex(1.1, 0.1, 1e-9)).toBe(11);
    expect(ceilIndex(0.25, 0.1, 1e-9)).toBe(3);
    expect(ceilIndex(0, 0.5, 1e-9)).toBe(0);
  });
});

describe("resolveLogOptions", () => {
  it("fills in defaults from the engine and the extent", () => {
    const opts = resolveLogOptions({}, { start: 0, stop: 10 });
    expect(opts.step).toBe(1);
    expect(opts.basis).toHaveLength(11);
    expect(opts.undefinedValue).toBe(0);
    expect(opts.bins).toBe(true);
    expect(opts.sortTable).toBe(false);
  });

  it("stretches the basis when the step does not divide the range", () => {
    const opts = resolveLogOptions({ step: 3 }, { start: 0, stop: 10 });
    expect(opts.basis).toEqual([0, 2.5, 5, 7.5, 10]);
    expect(opts.step).toBe(3);
  });

  it("derives everything from an explicit basis", () => {
    const opts = resolveLogOptions({ basis: [2, 4, 6], start: 100 }, { start: 0, stop: 10 });
    expect([opts.start, opts.stop, opts.step]).toEqual([2, 6, 2]);
  });

  it("accepts NaN as the undefined value", () => {
    expect(resolveLogOptions({ undefinedValue: NaN }, { start: 0, stop: 1 }).undefinedValue).toBeNaN();
  });

  it("reports invalid options", () => {
    expect(() => resolveLogOptions({ start: 10, stop: 0 }, { start: 0, stop: 1 })).toThrow(StriplogError);
    expect(() => resolveLogOptions({ basis: [4, 2] }, { start: 0, stop: 1 })).toThrow("The basis must increase.");
    try {
      resolveLogOptions({ step: 0 }, { start: 0, stop: 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StriplogError);
      if (error instanceof StriplogError) expect(error.issues[0]).toMatch(/^step: /);
    }
  });
});
