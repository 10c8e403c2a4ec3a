import { z } from "zod";
import { Component, componentListsEqual } from "./component.js";
import { getEngineDefaults } from "./defaults.js";
import { StriplogError } from "./errors.js";
import { Interval } from "./interval.js";
import { paint, rasterize, resolveLogOptions, runsOf } from "./log.js";
import { priorityMerge } from "./merge.js";
import { applyMorphology } from "./morphology.js";
import type { MorphologyOperation } from "./morphology.js";
import { toDepthLike } from "./order.js";
import { Position } from "./position.js";
import {
  arrange,
  detectOrder,
  incongruityIndices,
  thickestIndices,
  thicknessByAttribute,
  thinnestIndices,
  uniqueByThickness,
  validateOrder,
} from "./sequence.js";
import type { Incongruity } from "./sequence.js";
import type {
  AnnealMode,
  CopyOption,
  CropExtent,
  GetDataOptions,
  LogOptions,
  Order,
  PruneOptions,
  RasterizedLog,
  ShiftOptions,
  StriplogOptions,
  Value,
} from "./types.js";
import { formatIssues } from "./values.js";

const PruneOptionsSchema = z
  .object({
    limit: z.number().optional(),
    n: z.number().int().nonnegative().optional(),
    percentile: z.number().min(0).max(100).optional(),
    keepEnds: z.boolean().optional(),
  })
  .refine((o) => [o.limit, o.n, o.percentile].filter((v) => v !== undefined).length === 1, {
    message: "You must provide exactly one of limit, n or percentile.",
  });

const MorphologySchema = z.object({
  operation: z.enum(["erosion", "dilation", "opening", "closing"]),
  step: z.number().positive().optional(),
  p: z.number().int().positive().optional(),
});

function translate(p: Position, delta: number): Position {
  return new Position({
    middle: p.middle === undefined ? undefined : p.middle + delta,
    upper: p.upper + delta,
    lower: p.lower + delta,
    x: p.x,
    y: p.y,
    units: p.units,
    meta: p.meta,
  });
}

function searchPattern(term: string | RegExp): RegExp {
  if (typeof term !== "string") return new RegExp(term.source, term.flags.replace(/[gy]/g, ""));
  try {
    return new RegExp(term, "i");
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new StriplogError(`Invalid search pattern '${term}'.`, [error.message]);
    }
    throw error;
  }
}

/**
 * An ordered sequence of intervals. The order (depth, elevation or none for a
 * log of points) is fixed at construction and every mutation keeps the
 * intervals sorted and consistent with it.
 */
export class Striplog implements Iterable<Interval> {
  private list: Interval[];
  private _order: Order;
  source: string;

  constructor(intervals: readonly Interval[], options: StriplogOptions = {}) {
    if (intervals.length === 0) {
      throw new StriplogError("Cannot create an empty Striplog.");
    }
    const copies = intervals.map((iv) => iv.copy());
    const requested = options.order ?? "auto";
    const order = requested === "auto" ? detectOrder(copies) : requested;
    validateOrder(copies, order);
    this._order = order;
    this.list = arrange(copies, order);
    this.source = options.source ?? "";
  }

  get order(): Order {
    return this._order;
  }

  get length(): number {
    return this.list.length;
  }

  /** Iterates over copies; edit through the mutators. */
  [Symbol.iterator](): Iterator<Interval> {
    return this.toArray()[Symbol.iterator]();
  }

  /** The shallowest position: the smallest top for depth, the smallest base otherwise. */
  get start(): Position {
    const ends = this.order === "depth" ? this.list.map((iv) => iv.top) : this.list.map((iv) => iv.base);
    return ends.reduce((a, b) => (b.z < a.z ? b : a)).copy();
  }

  get stop(): Position {
    const ends = this.order === "depth" ? this.list.map((iv) => iv.base) : this.list.map((iv) => iv.top);
    return ends.reduce((a, b) => (b.z > a.z ? b : a)).copy();
  }

  /** Total thickness. */
  get cum(): number {
    return this.list.reduce((sum, iv) => sum + iv.thickness, 0);
  }

  get mean(): number {
    return this.cum / this.length;
  }

  /** [primary component, cumulative thickness] rows, thickest first. */
  get unique(): [Component | null, number][] {
    return uniqueByThickness(this.list);
  }

  /**
   * Cumulative thickness per primary component, thickest first, or lumped by
   * the value of one of the primaries' attributes.
   */
  histogram(): [Component | null, number][];
  histogram(lumping: string): [Value | null, number][];
  histogram(lumping?: string): [Component | null, number][] | [Value | null, number][] {
    return lumping === undefined ? this.unique : thicknessByAttribute(this.list, lumping);
  }

  get components(): Component[] {
    return this.unique.map(([c]) => c).filter((c): c is Component => c !== null);
  }

  at(index: number): Interval | undefined {
    return this.list.at(index)?.copy();
  }

  toArray(): Interval[] {
    return this.list.map((iv) => iv.copy());
  }

  reversed(): Interval[] {
    return this.toArray().reverse();
  }

  copy(): Striplog {
    return new Striplog(this.list, { order: this.order, source: this.source });
  }

  contains(component: Component): boolean {
    return this.list.some((iv) => iv.components.some((c) => c.equals(component)));
  }

  slice(start?: number, end?: number): Striplog | null {
    return this.fromSubset(this.list.slice(start, end));
  }

  select(indices: readonly number[]): Striplog | null {
    return this.fromSubset(indices.map((i) => this.list[this.normalizeIndex(i)]));
  }

  /** A new striplog holding both sets of intervals, its order detected afresh. */
  concat(other: Striplog | Interval): Striplog {
    const extra = other instanceof Striplog ? other.list : [other];
    return new Striplog([...this.list, ...extra], { source: this.source });
  }

  set(indices: number | readonly number[], intervals: Interval | readonly Interval[]): void {
    const ixs = typeof indices === "number" ? [indices] : indices;
    const ivs = intervals instanceof Interval ? [intervals] : intervals;
    if (ixs.length !== ivs.length) {
      throw new StriplogError("There must be one Interval for each index.");
    }
    const candidate = [...this.list];
    ixs.forEach((i, k) => {
      candidate[this.normalizeIndex(i)] = ivs[k].copy();
    });
    this.commit(candidate);
  }

  delete(indices: number | readonly number[]): void {
    const doomed = new Set((typeof indices === "number" ? [indices] : indices).map((i) => this.normalizeIndex(i)));
    this.commit(this.list.filter((_, i) => !doomed.has(i)));
  }

  insert(index: number, item: Interval | Striplog): void {
    const candidate = [...this.list];
    const items = item instanceof Striplog ? item.list : [item];
    candidate.splice(index, 0, ...items.map((iv) => iv.copy()));
    this.commit(candidate);
  }

  append(item: Interval): void {
    this.commit([...this.list, item.copy()]);
  }

  extend(items: Striplog | readonly Interval[]): void {
    const extra = items instanceof Striplog ? items.list : items;
    this.commit([...this.list, ...extra.map((iv) => iv.copy())]);
  }

  pop(index = -1): Interval {
    const ix = this.normalizeIndex(index);
    const removed = this.list[ix];
    this.commit(this.list.filter((_, i) => i !== ix));
    return removed;
  }

  findGaps(): Striplog | null {
    return this.incongruities("gap");
  }

  findOverlaps(): Striplog | null {
    return this.incongruities("overlap");
  }

  /** Index of the interval above each gap. */
  findGapIndices(): number[] {
    return incongruityIndices(this.list, this.order, "gap");
  }

  findOverlapIndices(): number[] {
    return incongruityIndices(this.list, this.order, "overlap");
  }

  /** Resolve every overlap by merging the pair, until none remain. In place. */
  mergeOverlaps(): void {
    let list = this.list;
    for (;;) {
      const overlaps = incongruityIndices(list, this.order, "overlap");
      if (overlaps.length === 0) break;
      const i = overlaps[0];
      const pieces = list[i].merge(list[i + 1]);
      list = arrange([...list.slice(0, i), ...pieces, ...list.slice(i + 2)], this.order);
    }
    this.commit(list);
  }

  /**
   * Close every gap by moving the neighbouring boundaries. Moved boundaries
   * become plain positions; their uncertainty and metadata are lost.
   */
  anneal(mode: AnnealMode = getEngineDefaults().annealMode): void {
    const list = this.list.map((iv) => iv.copy());
    for (const i of incongruityIndices(list, this.order, "gap")) {
      const before = list[i];
      const after = list[i + 1];
      let z: number;
      if (mode === "down") z = after.top.z;
      else if (mode === "up") z = before.base.z;
      else z = (before.base.z + after.top.z) / 2;
      before.base = new Position({ middle: z, units: before.base.units });
      after.top = new Position({ middle: z, units: after.top.units });
    }
    this.commit(list);
  }

  /**
   * Remove thin intervals: those thinner than `limit`, the `n` thinnest, or
   * the thinnest `percentile` percent. In place.
   */
  prune(options: PruneOptions): void {
    const parsed = PruneOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new StriplogError("Invalid prune options", formatIssues(parsed.error));
    }
    const { limit, n, percentile, keepEnds = false } = parsed.data;
    let doomed: number[];
    if (limit !== undefined) {
      doomed = this.list.flatMap((iv, i) => (iv.thickness < limit ? [i] : []));
    } else if (n !== undefined) {
      doomed = thinnestIndices(this.list, n);
    } else {
      doomed = thinnestIndices(this.list, Math.floor((this.length * (percentile ?? 0)) / 100));
    }
    if (keepEnds) doomed = doomed.filter((i) => i !== 0 && i !== this.length - 1);

    const kept = this.list.filter((_, i) => !doomed.includes(i));
    if (kept.length === 0) {
      throw new StriplogError("Pruning would remove every interval.");
    }
    this.commit(kept);
  }

  /**
   * Union touching neighbours whose components match: every component when
   * `strict`, else just the primary.
   */
  mergeNeighbours(strict = true): Striplog {
    const merged: Interval[] = [this.list[0].copy()];
    for (const lower of this.list.slice(1)) {
      const last = merged[merged.length - 1];
      const similar = strict
        ? componentListsEqual(last.components, lower.components)
        : last.primary === null
          ? lower.primary === null
          : last.primary.equals(lower.primary);
      if (last.touches(lower) && similar) {
        merged[merged.length - 1] = last.union(lower);
      } else {
        merged.push(lower.copy());
      }
    }
    return new Striplog(merged, { order: this.order, source: this.source });
  }

  /**
   * Composite overlapping intervals by priority: wherever intervals overlap
   * the one with the highest `attr` wins (the lowest when `reverse`).
   */
  merge(attr: string, reverse = false): Striplog {
    return new Striplog(priorityMerge(this.list, this.order, attr, reverse), {
      order: this.order,
      source: this.source,
    });
  }

  toLog(options: LogOptions = {}): number[] {
    return this.toLogWithMeta(options).log;
  }

  /** The sampled log with its depth basis and lookup table. */
  toLogWithMeta(options: LogOptions = {}): RasterizedLog {
    const opts = resolveLogOptions(options, { start: this.start.z, stop: this.stop.z });
    const { log, table } = rasterize(this.list, opts);
    return { log, basis: opts.basis, table };
  }

  toFlag(options: LogOptions = {}): boolean[] {
    return this.toLog(options).map((v) => v !== 0);
  }

  /** Whether `attr` (or, without one, the first property) of every primary is a boolean. */
  isBinary(attr?: string): boolean {
    return this.list.every((iv) => {
      const primary = iv.primary;
      if (!primary) return false;
      const key = attr ?? primary.keys()[0];
      return key !== undefined && typeof primary.get(key) === "boolean";
    });
  }

  /** 1 where the primary's `attr` is true, 0 where false, -1 elsewhere. */
  toBinaryLog(attr: string, step?: number): RasterizedLog {
    const opts = resolveLogOptions({ step, undefinedValue: -1 }, { start: this.start.z, stop: this.stop.z });
    const log = paint(this.list, opts, (iv) => {
      const v = iv.primary?.get(attr);
      if (v === true) return 1;
      if (v === false) return 0;
      return -1;
    });
    return { log, basis: opts.basis, table: [false, true] };
  }

  /**
   * Erode, dilate, open or close the boolean `attr` of the primaries, working
   * on a binary log sampled every `step` with an element of `p` samples, and
   * rebuild a striplog from the result.
   */
  binaryMorphology(attr: string, operation: MorphologyOperation, options: { step?: number; p?: number } = {}): Striplog {
    const parsed = MorphologySchema.safeParse({ operation, ...options });
    if (!parsed.success) {
      throw new StriplogError("Invalid morphology options", formatIssues(parsed.error));
    }
    if (!this.isBinary(attr)) {
      throw new StriplogError("Cannot interpret striplog as binary.");
    }
    const { step, p = 3 } = parsed.data;
    const { log, basis } = this.toBinaryLog(attr, step);
    const runs = runsOf(applyMorphology(log, parsed.data.operation, p));

    const intervals = runs.flatMap((run, i) => {
      if (run.value < 0) return [];
      const next = runs[i + 1];
      const lo = basis[run.index];
      const hi = next ? basis[next.index] : basis[basis.length - 1];
      const [top, base] = this.order === "elevation" ? [hi, lo] : [lo, hi];
      return [new Interval(top, base, { components: [new Component({ [attr]: run.value === 1 })] })];
    });
    return new Striplog(intervals, { source: this.source });
  }

  /**
   * Cut the striplog down to `[start, stop]`; null keeps the current end.
   * Every interval is clipped to the extent and those outside it are dropped.
   * The extent must fall inside the striplog.
   */
  crop(extent: CropExtent, options: CopyOption & { copy: true }): Striplog;
  crop(extent: CropExtent, options?: CopyOption): Striplog | undefined;
  crop(extent: CropExtent, options: CopyOption = {}): Striplog | undefined {
    const a = extent[0] ?? this.start.z;
    const b = extent[1] ?? this.stop.z;
    const lo = Math.min(a, b);
    const hi = Math.max(a, b);
    if (lo === hi) {
      throw new StriplogError("Crop extent must have non-zero thickness.");
    }
    const ends = [this.start.z, this.stop.z];
    if (lo < Math.min(...ends) || hi > Math.max(...ends)) {
      throw new StriplogError(`Crop extent ${a}-${b} must lie within the striplog.`);
    }

    const [shallow, deep] = this.order === "elevation" ? [hi, lo] : [lo, hi];
    const from = toDepthLike(shallow, this.order);
    const to = toDepthLike(deep, this.order);
    const cropped = this.list.flatMap((iv) => {
      const t = toDepthLike(iv.top.z, this.order);
      const bt = toDepthLike(iv.base.z, this.order);
      const inside = iv.kind === "point" ? t >= from && t <= to : bt > from && t < to;
      if (!inside) return [];
      let piece = iv.copy();
      if (t < from) piece = piece.splitAt(shallow)[1];
      if (bt > to) piece = piece.splitAt(deep)[0];
      return [piece];
    });
    if (cropped.length === 0) {
      throw new StriplogError(`Crop extent ${a}-${b} holds no intervals.`);
    }

    if (options.copy) return new Striplog(cropped, { order: this.order, source: this.source });
    this.commit(cropped);
    return undefined;
  }

  /** Flip between depth and elevation. In place unless `copy` is set. */
  invert(options: CopyOption & { copy: true }): Striplog;
  invert(options?: CopyOption): Striplog | undefined;
  invert(options: CopyOption = {}): Striplog | undefined {
    if (options.copy) {
      return new Striplog(
        this.list.map((iv) => iv.invert({ copy: true })),
        { source: this.source },
      );
    }
    for (const iv of this.list) iv.invert();
    if (this.order === "depth") this._order = "elevation";
    else if (this.order === "elevation") this._order = "depth";
    this.commit(this.list);
    return undefined;
  }

  /** A copy moved by `delta`, or moved so that it starts at `start`. */
  shift(options: ShiftOptions): Striplog {
    const delta = options.start !== undefined ? options.start - this.start.z : options.delta ?? 0;
    const moved = this.list.map((iv) => {
      const copy = iv.copy();
      copy.top = translate(iv.top, delta);
      copy.base = translate(iv.base, delta);
      return copy;
    });
    return new Striplog(moved, { order: this.order, source: this.source });
  }

  /** The first interval spanning `d`, or null. */
  readAt(d: number): Interval | null {
    return this.list.find((iv) => iv.spans(d))?.copy() ?? null;
  }

  readIndexAt(d: number): number | null {
    const ix = this.list.findIndex((iv) => iv.spans(d));
    return ix < 0 ? null : ix;
  }

  /**
   * Intervals whose description (or, lacking one, primary summary) matches a
   * case-insensitive pattern, or whose components include a given component.
   */
  find(term: string | RegExp | Component): Striplog | null {
    const hits = this.findIndices(term);
    return hits.length ? this.select(hits) : null;
  }

  findIndices(term: string | RegExp | Component): number[] {
    if (term instanceof Component) {
      return this.list.flatMap((iv, i) => (iv.components.some((c) => c.equals(term)) ? [i] : []));
    }
    const pattern = searchPattern(term);
    return this.list.flatMap((iv, i) => {
      const text = iv.description || iv.primary?.summary() || "";
      return pattern.test(text) ? [i] : [];
    });
  }

  /** A copy with every gap filled by an interval holding `component`, if given. */
  fill(component?: Component): Striplog {
    const gaps = this.findGaps();
    if (!gaps) return this.copy();
    const fillers = gaps.toArray().map((iv) => {
      iv.components = component ? [component.copy()] : [];
      return iv;
    });
    return new Striplog([...this.list, ...fillers], { source: this.source });
  }

  /** Each interval unioned with every interval of `other` it overlaps. */
  union(other: Striplog): Striplog {
    const result = this.list.map((start) => {
      let iv = start.copy();
      for (const jv of other) {
        if (iv.anyOverlaps(jv)) iv = iv.union(jv);
      }
      return iv;
    });
    return new Striplog(result, { source: this.source });
  }

  /** Every pairwise intersection, or null when nothing overlaps. */
  intersect(other: Striplog): Striplog | null {
    const result: Interval[] = [];
    for (const iv of this.list) {
      for (const jv of other) {
        if (iv.anyOverlaps(jv)) result.push(iv.intersect(jv));
      }
    }
    return result.length ? new Striplog(result, { source: this.source }) : null;
  }

  thickestIndices(n = 1): number[] {
    return thickestIndices(this.list, n);
  }

  thinnestIndices(n = 1): number[] {
    return thinnestIndices(this.list, n);
  }

  thickest(n = 1): Striplog | null {
    return this.select(this.thickestIndices(n));
  }

  thinnest(n = 1): Striplog | null {
    return this.select(this.thinnestIndices(n));
  }

  /** Thickness of intervals whose primary has `attr` set to true, over the total. */
  netToGross(attr: string): number {
    const total = this.cum;
    if (total === 0) return 0;
    const net = this.list.reduce((sum, iv) => sum + (iv.primary?.get(attr) === true ? iv.thickness : 0), 0);
    return net / total;
  }

  /** `data[field]` of every interval; missing values take the fallback, else NaN. */
  getData(field: string, options: GetDataOptions = {}): Value[] {
    return this.list.map((iv) => {
      const value = iv.data[field] ?? options.fallback ?? NaN;
      return options.transform ? options.transform(value) : value;
    });
  }

  /**
   * A copy in which each interval's `data[name]` holds the log samples that
   * fall inside it, reduced by `reduce` when given.
   */
  extract(log: readonly number[], basis: readonly number[], name: string, reduce?: (values: number[]) => Value): Striplog {
    if (log.length !== basis.length) {
      throw new StriplogError("The log and its basis must have the same length.");
    }
    const samples = new Map<number, number[]>();
    basis.forEach((z, i) => {
      const ix = this.readIndexAt(z);
      if (ix === null) return;
      const bucket = samples.get(ix) ?? [];
      bucket.push(log[i]);
      samples.set(ix, bucket);
    });

    const copy = this.copy();
    for (const [ix, values] of samples) {
      copy.list[ix].data[name] = reduce ? reduce(values) : values;
    }
    return copy;
  }

  toString(): string {
    return `Striplog(${this.length} Intervals, start=${this.start.z}, stop=${this.stop.z})`;
  }

  private incongruities(kind: Incongruity): Striplog | null {
    const hits = incongruityIndices(this.list, this.order, kind);
    if (hits.length === 0) return null;
    const intervals = hits.map((i) => {
      const before = this.list[i];
      const after = this.list[i + 1];
      return kind === "gap"
        ? new Interval(before.base.copy(), after.top.copy())
        : new Interval(after.top.copy(), before.base.copy());
    });
    return new Striplog(intervals, { order: this.order, source: this.source });
  }

  private fromSubset(intervals: Interval[]): Striplog | null {
    if (intervals.length === 0) return null;
    return new Striplog(intervals, { order: this.order, source: this.source });
  }

  private normalizeIndex(index: number): number {
    const ix = index < 0 ? index + this.length : index;
    if (!Number.isInteger(ix) || ix < 0 || ix >= this.length) {
      throw new StriplogError(`Index ${index} is out of range.`);
    }
    return ix;
  }

  /** Sort and validate a candidate list, then make it the contents. */
  private commit(candidate: Interval[]): void {
    if (candidate.length === 0) {
      throw new StriplogError("Cannot create an empty Striplog.");
    }
    validateOrder(candidate, this.order);
    this.list = arrange(candidate, this.order);
  }
}
