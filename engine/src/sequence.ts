import type { Component } from "./component.js";
import { StriplogError } from "./errors.js";
import type { Interval } from "./interval.js";
import { toDepthLike } from "./order.js";
import type { Order, Value } from "./types.js";
import { valuesEqual } from "./values.js";

export type Incongruity = "gap" | "overlap";

/** Infer the order of a list of intervals from their tops and bases. */
export function detectOrder(intervals: readonly Interval[]): Order {
  if (intervals.every((iv) => iv.base.z === iv.top.z)) return "none";
  if (intervals.every((iv) => iv.base.z >= iv.top.z)) return "depth";
  if (intervals.every((iv) => iv.base.z <= iv.top.z)) return "elevation";
  throw new StriplogError("Could not determine order from tops and bases.");
}

/** Throw unless every interval agrees with the declared order. */
export function validateOrder(intervals: readonly Interval[], order: Order): void {
  if (order === "none" && intervals.some((iv) => iv.base.z !== iv.top.z)) {
    throw new StriplogError("'None' order specified but tops != bases.");
  }
  if (order === "depth" && intervals.some((iv) => iv.base.z < iv.top.z)) {
    throw new StriplogError("Depth order specified but base above top.");
  }
  if (order === "elevation" && intervals.some((iv) => iv.base.z > iv.top.z)) {
    throw new StriplogError("Elevation order specified but base below top.");
  }
}

/** Stable sort by top then base, shallowest first for the order. */
export function arrange(intervals: readonly Interval[], order: Order): Interval[] {
  return [...intervals].sort((a, b) => {
    const byTop = toDepthLike(a.top.z, order) - toDepthLike(b.top.z, order);
    if (byTop !== 0) return byTop;
    return toDepthLike(a.base.z, order) - toDepthLike(b.base.z, order);
  });
}

/**
 * Indices `i` where interval `i` and `i + 1` leave a gap, or overlap.
 * Assumes the list is already arranged. A log of points has neither.
 */
export function incongruityIndices(intervals: readonly Interval[], order: Order, kind: Incongruity): number[] {
  const hits: number[] = [];
  if (order === "none") return hits;
  for (let i = 0; i < intervals.length - 1; i++) {
    const base = toDepthLike(intervals[i].base.z, order);
    const nextTop = toDepthLike(intervals[i + 1].top.z, order);
    if (kind === "gap" ? base < nextTop : base > nextTop) hits.push(i);
  }
  return hits;
}

function indicesByThickness(intervals: readonly Interval[]): number[] {
  return intervals.map((_, i) => i).sort((a, b) => intervals[a].thickness - intervals[b].thickness);
}

export function thinnestIndices(intervals: readonly Interval[], n: number): number[] {
  if (n <= 0) return [];
  return indicesByThickness(intervals).slice(0, n);
}

export function thickestIndices(intervals: readonly Interval[], n: number): number[] {
  if (n <= 0) return [];
  return indicesByThickness(intervals).slice(-n);
}

/**
 * Cumulative thickness per distinct primary component, thickest first.
 * Intervals without components are pooled under `null`.
 */
export function uniqueByThickness(intervals: readonly Interval[]): [Component | null, number][] {
  const rows: [Component | null, number][] = [];
  for (const iv of intervals) {
    const primary = iv.primary;
    const row = rows.find(([c]) => (c === null ? primary === null : c.equals(primary)));
    if (row) {
      row[1] += iv.thickness;
    } else {
      rows.push([primary, iv.thickness]);
    }
  }
  return rows.sort((a, b) => b[1] - a[1]);
}

/**
 * Cumulative thickness per value of the primaries' `attr`, thickest first.
 * Intervals lacking it are pooled under `null`.
 */
export function thicknessByAttribute(intervals: readonly Interval[], attr: string): [Value | null, number][] {
  const rows: [Value | null, number][] = [];
  for (const iv of intervals) {
    const key = iv.primary?.get(attr) ?? null;
    const row = rows.find(([k]) => (k === null || key === null ? k === key : valuesEqual(k, key)));
    if (row) {
      row[1] += iv.thickness;
    } else {
      rows.push([key, iv.thickness]);
    }
  }
  return rows.sort((a, b) => b[1] - a[1]);
}
