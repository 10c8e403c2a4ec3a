import { describe, expect, it } from "vitest";
import { StriplogError } from "striplog-engine";
import { striplogFromTops } from "../src/tops.js";

describe("formation tops", () => {
  it("runs each formation down to the next top", () => {
    const strip = striplogFromTops({ Lower: 200, Upper: 100 }, "tops");
    expect([...strip].map((iv) => [iv.primary?.get("formation"), iv.top.z, iv.base.z])).toEqual([
      ["Upper", 100, 200],
      ["Lower", 200, 201],
    ]);
    expect(strip.source).toBe("tops");
  });

  it("rejects non-finite tops", () => {
    expect(() => striplogFromTops({ Upper: Number.POSITIVE_INFINITY })).toThrow(StriplogError);
  });

  it("rejects an empty dictionary", () => {
    expect(() => striplogFromTops({})).toThrow("Cannot create an empty Striplog.");
  });
});
