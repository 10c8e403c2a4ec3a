import { z } from "zod";
import { Component, Interval, Striplog, StriplogError, formatIssues } from "striplog-engine";

export const TopsSchema = z.record(z.string().min(1), z.number().finite());

export type Tops = z.infer<typeof TopsSchema>;

/**
 * A striplog of formations from a name-to-top dictionary. Each formation runs
 * down to the next top; the deepest one is given a thickness of one unit.
 */
export function striplogFromTops(tops: Tops, source = ""): Striplog {
  const parsed = TopsSchema.safeParse(tops);
  if (!parsed.success) {
    throw new StriplogError("Invalid tops", formatIssues(parsed.error));
  }
  const sorted = Object.entries(parsed.data).sort((a, b) => a[1] - b[1]);
  const intervals = sorted.map(([name, top], i) => {
    const next = sorted[i + 1];
    const base = next ? next[1] : top + 1;
    return new Interval(top, base, { components: [new Component({ formation: name })] });
  });
  return new Striplog(intervals, { source });
}
