import { z } from "zod";
import { Component, uniqueComponents } from "./component.js";
import { getEngineDefaults } from "./defaults.js";
import { StriplogError } from "./errors.js";
import type { Interval } from "./interval.js";
import { ceilIndex } from "./order.js";
import { uniqueByThickness } from "./sequence.js";
import type { LogOptions, TableEntry, Value } from "./types.js";
import { compareValues, formatIssues, valuesEqual } from "./values.js";

const LogOptionsSchema = z.object({
  step: z.number().positive().optional(),
  start: z.number().optional(),
  stop: z.number().optional(),
  basis: z.array(z.number()).optional(),
  field: z.string().min(1).optional(),
  bins: z.boolean().optional(),
  sortTable: z.boolean().optional(),
  matchOnly: z.array(z.string()).optional(),
  undefinedValue: z.union([z.number(), z.nan()]).optional(),
});

export interface ResolvedLogOptions {
  start: number;
  stop: number;
  step: number;
  basis: number[];
  undefinedValue: number;
  bins: boolean;
  sortTable: boolean;
  field?: string;
  fieldFunction?: (value: Value) => Value;
  matchOnly?: string[];
  table?: TableEntry[];
}

/** `count` evenly spaced samples from `start` to `stop`, both included. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 1) return [start];
  const delta = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + i * delta));
}

/**
 * Validate rasterization options and fill them in from the engine defaults and
 * the striplog's own extent.
 */
export function resolveLogOptions(options: LogOptions, extent: { start: number; stop: number }): ResolvedLogOptions {
  const parsed = LogOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new StriplogError("Invalid log options", formatIssues(parsed.error));
  }
  const opts = parsed.data;
  const defaults = getEngineDefaults();

  let start = opts.start ?? extent.start;
  let stop = opts.stop ?? extent.stop;
  let step = opts.step ?? defaults.step;
  let basis: number[];
  if (opts.basis) {
    if (opts.basis.length < 2) throw new StriplogError("A basis needs at least two samples.");
    basis = [...opts.basis];
    start = basis[0];
    stop = basis[basis.length - 1];
    step = basis[1] - basis[0];
    if (step <= 0) throw new StriplogError("The basis must increase.");
  } else {
    if (stop < start) throw new StriplogError(`stop (${stop}) must not be less than start (${start}).`);
    basis = linspace(start, stop, Math.ceil((stop - start) / step) + 1);
  }

  return {
    start,
    stop,
    step,
    basis,
    undefinedValue: opts.undefinedValue ?? defaults.undefinedValue,
    bins: opts.bins ?? true,
    sortTable: opts.sortTable ?? false,
    field: opts.field,
    fieldFunction: options.fieldFunction,
    matchOnly: opts.matchOnly,
    table: options.table,
  };
}

function fieldValue(iv: Interval, opts: ResolvedLogOptions): Value | undefined {
  if (!opts.field) return undefined;
  const raw = iv.data[opts.field];
  if (raw === undefined) return undefined;
  return opts.fieldFunction ? opts.fieldFunction(raw) : raw;
}

function project(component: Component | null, matchOnly: string[] | undefined): Component | null {
  if (!component || !matchOnly) return component;
  return component.pick(matchOnly);
}

function entriesEqual(a: TableEntry, b: TableEntry): boolean {
  if (a instanceof Component || b instanceof Component) {
    return a instanceof Component && b instanceof Component && a.equals(b);
  }
  return valuesEqual(a, b);
}

function compareEntries(a: TableEntry, b: TableEntry): number {
  if (a instanceof Component && b instanceof Component) {
    const sa = a.summary();
    const sb = b.summary();
    return sa < sb ? -1 : sa > sb ? 1 : 0;
  }
  if (a instanceof Component) return 1;
  if (b instanceof Component) return -1;
  return compareValues(a, b);
}

/** The lookup table: given, else distinct field values, else primaries by prevalence. */
export function buildTable(intervals: readonly Interval[], opts: ResolvedLogOptions): TableEntry[] {
  let table: TableEntry[];
  if (opts.table) {
    table = [...opts.table];
  } else if (opts.field) {
    table = [];
    for (const iv of intervals) {
      const v = fieldValue(iv, opts);
      if (v !== undefined && !table.some((t) => entriesEqual(t, v))) table.push(v);
    }
  } else {
    table = uniqueByThickness(intervals)
      .map(([c]) => c)
      .filter((c): c is Component => c !== null);
  }

  if (opts.matchOnly) {
    const keys = opts.matchOnly;
    const projected = table.filter((t): t is Component => t instanceof Component).map((c) => c.pick(keys));
    table = uniqueComponents(projected);
  }
  if (opts.sortTable) table.sort(compareEntries);
  return table;
}

function keyFor(iv: Interval, table: readonly TableEntry[], opts: ResolvedLogOptions): number {
  if (opts.field) {
    const v = fieldValue(iv, opts);
    if (v === undefined) return opts.undefinedValue;
    if (!opts.bins) return typeof v === "number" ? v : opts.undefinedValue;
    const ix = table.findIndex((t) => entriesEqual(t, v));
    return ix < 0 ? opts.undefinedValue : ix + 1;
  }
  const c = project(iv.primary, opts.matchOnly);
  if (!c) return opts.undefinedValue;
  const ix = table.findIndex((t) => entriesEqual(t, c));
  return ix < 0 ? opts.undefinedValue : ix + 1;
}

/**
 * Paint one key per interval onto the basis. Each interval fills the closed
 * index range between its boundaries, so a sample on a shared boundary takes
 * the key of the later interval.
 */
export function paint(
  intervals: readonly Interval[],
  opts: ResolvedLogOptions,
  keyOf: (iv: Interval) => number,
): number[] {
  const { tolerance } = getEngineDefaults();
  const log = new Array<number>(opts.basis.length).fill(opts.undefinedValue);
  const last = opts.basis.length - 1;

  for (const iv of intervals) {
    const lo = Math.min(iv.top.z, iv.base.z);
    const hi = Math.max(iv.top.z, iv.base.z);
    if (hi < opts.start || lo > opts.stop) continue;
    const from = Math.max(0, ceilIndex(Math.max(lo, opts.start) - opts.start, opts.step, tolerance));
    const to = Math.min(last, ceilIndex(Math.min(hi, opts.stop) - opts.start, opts.step, tolerance));
    const key = keyOf(iv);
    for (let i = from; i <= to; i++) log[i] = key;
  }
  return log;
}

export function rasterize(intervals: readonly Interval[], opts: ResolvedLogOptions): { log: number[]; table: TableEntry[] } {
  const table = buildTable(intervals, opts);
  const log = paint(intervals, opts, (iv) => keyFor(iv, table, opts));
  return { log, table };
}

function sameSample(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/** Start index and value of every run of equal samples. */
export function runsOf(samples: readonly number[]): Array<{ index: number; value: number }> {
  const runs: Array<{ index: number; value: number }> = [];
  samples.forEach((value, index) => {
    if (index === 0 || !sameSample(value, samples[index - 1])) runs.push({ index, value });
  });
  return runs;
}
