import type { Order } from "./types.js";

/**
 * Map a coordinate into depth-like space, where values grow away from the datum
 * whatever the order. Elevation logs are negated; depth and point logs are not.
 */
export function toDepthLike(z: number, order: Order): number {
  return order === "elevation" ? -z : z;
}

export function fromDepthLike(d: number, order: Order): number {
  return order === "elevation" ? -d : d;
}

/** True when `a` lies strictly above `b` for the given order. */
export function isAbove(a: number, b: number, order: Order): boolean {
  return toDepthLike(a, order) < toDepthLike(b, order);
}

/** Round values within `tolerance` of an integer onto it before taking the ceiling. */
export function ceilIndex(offset: number, step: number, tolerance: number): number {
  const q = offset / step;
  const r = Math.round(q);
  if (Math.abs(q - r) < tolerance) return r;
  return Math.ceil(q);
}
