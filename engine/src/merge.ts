import { StriplogError } from "./errors.js";
import type { Interval } from "./interval.js";
import { fromDepthLike, toDepthLike } from "./order.js";
import { Position } from "./position.js";
import type { BoundaryEvent, Order, Value } from "./types.js";
import { compareValues } from "./values.js";

function priorityOf(iv: Interval, index: number, attr: string): Value {
  const value = iv.data[attr] ?? iv.primary?.get(attr);
  if (value === undefined) {
    throw new StriplogError(`Interval ${index} has no value for '${attr}'.`);
  }
  return value;
}

/** Every top then base, in generation order, stably sorted down the log. */
export function boundaryEvents(intervals: readonly Interval[], order: Order): BoundaryEvent[] {
  const events: BoundaryEvent[] = [];
  intervals.forEach((iv, index) => {
    events.push({ kind: "top", z: toDepthLike(iv.top.z, order), index });
    events.push({ kind: "base", z: toDepthLike(iv.base.z, order), index });
  });
  return events.sort((a, b) => a.z - b.z);
}

/**
 * Sweep the boundary events keeping a stack of open intervals sorted by
 * priority; the last entry is on top. Returns the emitted events, which
 * alternate top and base.
 */
export function sweep(intervals: readonly Interval[], order: Order, attr: string, reverse = false): BoundaryEvent[] {
  const priorities = intervals.map((iv, i) => priorityOf(iv, i, attr));
  const rank = (a: number, b: number): number => {
    const c = compareValues(priorities[a], priorities[b]);
    return reverse ? -c : c;
  };

  let stack: number[] = [];
  const out: BoundaryEvent[] = [];
  const current = (): number | undefined => stack[stack.length - 1];

  for (const event of boundaryEvents(intervals, order)) {
    if (event.kind === "top") {
      const onTop = current();
      if (onTop === undefined || rank(event.index, onTop) >= 0) {
        if (onTop !== undefined) out.push({ kind: "base", z: event.z, index: onTop });
        out.push(event);
      }
      // Ties keep insertion order, so the newcomer stays on top of an equal.
      stack = [...stack, event.index].sort(rank);
    } else {
      const wasOnTop = current() === event.index;
      if (wasOnTop) out.push(event);
      stack = stack.filter((i) => i !== event.index);
      const next = current();
      if (wasOnTop && next !== undefined) out.push({ kind: "top", z: event.z, index: next });
    }
  }
  return out;
}

/**
 * Composite overlapping intervals so that, at every depth, the interval with
 * the highest `attr` (lowest when `reverse`) shows through.
 */
export function priorityMerge(intervals: readonly Interval[], order: Order, attr: string, reverse = false): Interval[] {
  const events = sweep(intervals, order, attr, reverse);
  const result: Interval[] = [];
  for (let i = 0; i + 1 < events.length; i += 2) {
    const top = events[i];
    const base = events[i + 1];
    if (top.z === base.z) continue;
    const source = intervals[top.index];
    const iv = source.copy();
    iv.top = new Position({ middle: fromDepthLike(top.z, order), units: source.top.units });
    iv.base = new Position({ middle: fromDepthLike(base.z, order), units: source.base.units });
    result.push(iv);
  }
  return result;
}
