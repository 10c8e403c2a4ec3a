import { Component, componentListsEqual, uniqueComponents } from "./component.js";
import { IntervalError } from "./errors.js";
import { isAbove, toDepthLike } from "./order.js";
import { Position } from "./position.js";
import type {
  CopyOption,
  DataMap,
  IntervalInit,
  IntervalKind,
  IntervalOrder,
  Relationship,
  SummaryOptions,
} from "./types.js";
import { cloneData, combineData, stripChars } from "./values.js";

const OVERLAPS: readonly Relationship[] = ["partially", "contains", "containedby"];

/**
 * A lithologic or stratigraphic interval between a top and a base, or a single
 * point (a sample location) when the two coincide.
 */
export class Interval {
  private _top: Position;
  private _base: Position;
  description: string;
  components: Component[];
  data: DataMap;

  constructor(top: number | Position, base?: number | Position | null, init: IntervalInit = {}) {
    this._top = Position.from(top);
    this._base = base === undefined || base === null ? this._top.copy() : Position.from(base);
    this.description = init.description ?? "";
    this.components = init.components ? [...init.components] : [];
    this.data = init.data ? cloneData(init.data) : {};
  }

  get top(): Position {
    return this._top;
  }

  set top(value: number | Position) {
    this._top = Position.from(value);
  }

  get base(): Position {
    return this._base;
  }

  set base(value: number | Position) {
    this._base = Position.from(value);
  }

  /** The first component, or null when there are none. */
  get primary(): Component | null {
    return this.components[0] ?? null;
  }

  get middle(): number {
    return (this.base.z + this.top.z) / 2;
  }

  get thickness(): number {
    return Math.abs(this.base.z - this.top.z);
  }

  /** Smallest thickness allowed by the uncertainty of the top and base. */
  get minThickness(): number {
    return Math.abs(this.base.upper - this.top.lower);
  }

  get maxThickness(): number {
    return Math.abs(this.base.lower - this.top.upper);
  }

  get kind(): IntervalKind {
    return this.thickness === 0 ? "point" : "interval";
  }

  get order(): IntervalOrder {
    return this.top.z > this.base.z ? "elevation" : "depth";
  }

  get isEmpty(): boolean {
    return this.components.length === 0 && Object.keys(this.data).length === 0;
  }

  /** Ordering by top only: shallower first for depth, higher first for elevation. */
  static compare(a: Interval, b: Interval): number {
    const order = commonOrder(a, b);
    return toDepthLike(a.top.z, order) - toDepthLike(b.top.z, order);
  }

  /** Tops coincide. Content is not compared. */
  equals(other: Interval): boolean {
    return this.top.equals(other.top);
  }

  copy(): Interval {
    const iv = new Interval(this.top.copy(), this.base.copy(), {
      description: this.description,
      components: this.components.map((c) => c.copy()),
      data: this.data,
    });
    return iv;
  }

  summary(options: SummaryOptions = {}): string | null {
    const { fmt, initial = false } = options;
    const text = this.components.map((c) => c.summary({ fmt, initial })).join(" with ");
    const what = text || this.description;
    if (!what) return null;
    return `${this.thickness.toFixed(2)} ${this.top.units} of ${what}`;
  }

  /**
   * Flip between depth and elevation order by swapping top and base and
   * inverting both positions. In place unless `copy` is set.
   */
  invert(options: CopyOption & { copy: true }): Interval;
  invert(options?: CopyOption): Interval | undefined;
  invert(options: CopyOption = {}): Interval | undefined {
    const target = options.copy ? this.copy() : this;
    target.top.invert();
    target.base.invert();
    const oldBase = target._base;
    target._base = target._top;
    target._top = oldBase;
    return options.copy ? target : undefined;
  }

  /** Add an interval (a union) or a component (appended to this one's content). */
  add(other: Interval | Component): Interval {
    if (other instanceof Interval) return this.union(other);
    if (other instanceof Component) {
      return new Interval(this.top.copy(), this.base.copy(), {
        description: `${this.description} with ${other.summary()}`,
        components: [...this.components, other],
        data: this.data,
      });
    }
    throw new IntervalError("You can only add components or intervals.");
  }

  relationship(other: Interval): Relationship | null {
    const order = commonOrder(this, other);
    const [at, ab] = depthExtent(this, order);
    const [bt, bb] = depthExtent(other, order);

    if (at < bt && bb < ab) return "contains";
    if (bt < at && ab < bb) return "containedby";
    if (Math.min(ab, bb) - Math.max(at, bt) > 0) return "partially";
    if (at === bb || ab === bt) return "touches";
    return null;
  }

  anyOverlaps(other: Interval): boolean {
    const rel = this.relationship(other);
    return rel !== null && OVERLAPS.includes(rel);
  }

  partiallyOverlaps(other: Interval): boolean {
    return this.relationship(other) === "partially";
  }

  completelyContains(other: Interval): boolean {
    return this.relationship(other) === "contains";
  }

  isContainedBy(other: Interval): boolean {
    return this.relationship(other) === "containedby";
  }

  touches(other: Interval): boolean {
    return this.relationship(other) === "touches";
  }

  /** Whether `d` lies within the interval, boundaries included. */
  spans(d: number): boolean {
    const order = this.order;
    return !isAbove(d, this.top.z, order) && !isAbove(this.base.z, d, order);
  }

  /** Split at `d` into [upper, lower]; both halves keep all content. */
  splitAt(d: number): [Interval, Interval] {
    if (!this.spans(d)) {
      throw new IntervalError(`d = ${d} must be within interval ${this.top.z}-${this.base.z}`);
    }
    const upper = this.copy();
    const lower = this.copy();
    upper.base = new Position({ middle: d, units: this.base.units });
    lower.top = new Position({ middle: d, units: this.top.units });
    return [upper, lower];
  }

  intersect(other: Interval, blend = true): Interval {
    if (!this.anyOverlaps(other)) {
      throw new IntervalError("self must at least partially overlap other");
    }
    const [, middle] = explode(this, other);
    return middle.withContentOf(this, other, blend);
  }

  /**
   * Non-overlapping pieces covering both intervals, shallowest first. The
   * overlap is combined as in `intersect`; zero-thickness tails are dropped.
   */
  merge(other: Interval, blend = true): Interval[] {
    if (!this.anyOverlaps(other)) {
      throw new IntervalError("self must at least partially overlap other");
    }
    const [upper, middle, lower] = explode(this, other);
    const [uppermost] = arrange(this, other, commonOrder(this, other));

    let pieces: Interval[];
    if (this.partiallyOverlaps(other) && !blend) {
      pieces = uppermost === this ? [upper, other.copy()] : [other.copy(), lower];
    } else {
      pieces = [upper, middle.withContentOf(this, other, blend), lower];
    }
    return pieces.filter((p) => p.thickness > 0 || (p !== upper && p !== lower));
  }

  /** One interval from the shallowest top to the deepest base, content combined. */
  union(other: Interval, blend = true): Interval {
    if (!(this.touches(other) || this.anyOverlaps(other))) {
      throw new IntervalError("self must at least touch or partially overlap other");
    }
    const order = commonOrder(this, other);
    const result = this.copy();
    result.top = (isAbove(other.top.z, this.top.z, order) ? other.top : this.top).copy();
    result.base = (isAbove(this.base.z, other.base.z, order) ? other.base : this.base).copy();
    return result.withContentOf(this, other, blend);
  }

  /**
   * What is left of this interval once `other` is removed: itself when they do
   * not overlap, two tails when it contains `other`, one tail for a partial
   * overlap, or null when nothing survives.
   */
  difference(other: Interval): Interval | [Interval, Interval] | null {
    if (this.kind === "interval" && this.top.z === other.top.z && this.base.z === other.base.z) {
      return null;
    }
    if (this.touches(other) || !this.anyOverlaps(other)) return this;
    if (this.completelyContains(other)) {
      const [upper, , lower] = explode(this, other);
      return [upper, lower];
    }
    if (this.isContainedBy(other)) return null;

    const order = commonOrder(this, other);
    const [at, ab] = depthExtent(this, order);
    const [bt, bb] = depthExtent(other, order);
    if (at < bt) {
      const survivor = this.copy();
      survivor.base = other.top.copy();
      return survivor;
    }
    if (ab > bb) {
      const survivor = this.copy();
      survivor.top = other.base.copy();
      return survivor;
    }
    return null;
  }

  /** A copy of this geometry carrying the blended or replaced content of `a` and `b`. */
  private withContentOf(a: Interval, b: Interval, blend: boolean): Interval {
    if (blend) {
      this.components = uniqueComponents([...a.components, ...b.components]);
      this.description = blendDescriptions(a, b);
      this.data = combineData(a.data, b.data);
    } else {
      this.components = b.components.map((c) => c.copy());
      this.description = b.description;
      this.data = cloneData(b.data);
    }
    return this;
  }

  toString(): string {
    return `Interval(${this.top.z}-${this.base.z}${this.description ? `, ${this.description}` : ""})`;
  }
}

/**
 * The order two intervals share. A point takes the order of its partner;
 * two thick intervals of different order are an error.
 */
function commonOrder(a: Interval, b: Interval): IntervalOrder {
  if (a.kind === "point") return b.order;
  if (b.kind === "point") return a.order;
  if (a.order !== b.order) {
    throw new IntervalError("Both intervals must have the same order.");
  }
  return a.order;
}

function depthExtent(iv: Interval, order: IntervalOrder): [number, number] {
  const t = toDepthLike(iv.top.z, order);
  const b = toDepthLike(iv.base.z, order);
  return t <= b ? [t, b] : [b, t];
}

/** [uppermost, lowermost] by top; ties go to the shallower base, then to `a`. */
function arrange(a: Interval, b: Interval, order: IntervalOrder): [Interval, Interval] {
  const [at, ab] = depthExtent(a, order);
  const [bt, bb] = depthExtent(b, order);
  if (bt < at || (bt === at && bb < ab)) return [b, a];
  return [a, b];
}

/**
 * Partition the combined extent of two overlapping intervals into
 * [upper, middle, lower]. `middle` carries the lowermost interval's content.
 */
function explode(a: Interval, b: Interval): [Interval, Interval, Interval] {
  const order = commonOrder(a, b);
  const [uppermost, lowermost] = arrange(a, b, order);
  const ub = toDepthLike(uppermost.base.z, order);
  const lb = toDepthLike(lowermost.base.z, order);

  if (ub > lb) {
    const upper = uppermost.copy();
    upper.base = lowermost.top.copy();
    const lower = uppermost.copy();
    lower.top = lowermost.base.copy();
    return [upper, lowermost.copy(), lower];
  }

  const upper = uppermost.copy();
  upper.base = lowermost.top.copy();
  const middle = lowermost.copy();
  middle.base = uppermost.base.copy();
  const lower = lowermost.copy();
  lower.top = uppermost.base.copy();
  return [upper, middle, lower];
}

/**
 * "{p}% {thick} with {q}% {thin}", percentages of the combined thickness, each
 * text falling back to the interval summary when its description is empty.
 */
export function blendDescriptions(a: Interval, b: Interval): string {
  if (componentListsEqual(a.components, b.components)) {
    return stripChars(a.description, " .,");
  }
  const [thin, thick] = b.thickness < a.thickness ? [b, a] : [a, b];
  const total = thin.thickness + thick.thickness;
  const prop = total === 0 ? 50 : (100 * thick.thickness) / total;

  const d1 = stripChars(thick.description, " .,") || thick.summary() || "";
  const d2 = stripChars(thin.description, " .,") || thin.summary() || "";
  if (!d1) return "";
  return `${prop.toFixed(1)}% ${d1} with ${(100 - prop).toFixed(1)}% ${d2}`;
}
