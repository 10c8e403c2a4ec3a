import { z } from "zod";
import { Interval, Striplog, StriplogError, formatIssues, runsOf } from "striplog-engine";
import type { Component, DataMap } from "striplog-engine";

export { runsOf };

const SamplesSchema = z.array(z.union([z.number(), z.nan()]));

const FromLogSchema = z.object({
  log: SamplesSchema,
  basis: z.array(z.number().finite()).min(2).optional(),
  cutoff: z.union([z.number(), z.array(z.number())]).optional(),
  field: z.string().min(1).optional(),
  right: z.boolean().optional(),
  source: z.string().optional(),
});

export interface FromLogOptions {
  /** Depth or elevation of every log sample. */
  basis?: readonly number[];
  /** Lookup from (digitized) log value to component; null leaves the interval empty. */
  components?: readonly (Component | null)[];
  cutoff?: number | readonly number[];
  /** Store each run's value in `data[field]`. */
  field?: string;
  /** Send values equal to a cutoff to the upper bin. */
  right?: boolean;
  source?: string;
}

/** Bin index of `value` among ascending cutoffs. NaN stays NaN. */
export function digitize(value: number, cutoffs: readonly number[], right = false): number {
  if (Number.isNaN(value)) return NaN;
  return cutoffs.filter((c) => (right ? c < value : c <= value)).length;
}

/**
 * Turn a sampled log into a striplog: optionally bin it against cutoffs, find
 * the runs of equal values, place them on the basis, and label each run with
 * `components[value]` and/or `data[field]`. NaN runs are skipped.
 */
export function striplogFromLog(log: readonly number[], options: FromLogOptions = {}): Striplog {
  const { components } = options;
  const parsed = FromLogSchema.safeParse({
    log,
    basis: options.basis,
    cutoff: options.cutoff,
    field: options.field,
    right: options.right,
    source: options.source,
  });
  if (!parsed.success) {
    throw new StriplogError("Invalid log input", formatIssues(parsed.error));
  }
  const { basis, cutoff, field, right = false, source = "Log" } = parsed.data;

  if (components === undefined && field === undefined) {
    throw new StriplogError("You must provide a list of components, or a field.");
  }
  if (basis === undefined) {
    throw new StriplogError("You must provide a depth or elevation basis.");
  }
  if (basis.length !== log.length) {
    throw new StriplogError("The log and its basis must have the same length.");
  }

  let samples = parsed.data.log;
  if (cutoff !== undefined) {
    const cutoffs = (typeof cutoff === "number" ? [cutoff] : [...cutoff]).sort((a, b) => a - b);
    if (components !== undefined && components.length < cutoffs.length + 1) {
      throw new StriplogError("For n cutoffs, you need to provide at least n+1 components.");
    }
    samples = samples.map((v) => digitize(v, cutoffs, right));
  }

  const start = basis[0];
  const stop = basis[basis.length - 1];
  const scale = (index: number): number => start + (index / (basis.length - 1)) * (stop - start);

  const runs = runsOf(samples);
  const intervals: Interval[] = [];
  runs.forEach((run, i) => {
    if (Number.isNaN(run.value)) return;
    const next = runs[i + 1];
    const data: DataMap = field ? { [field]: run.value } : {};
    const component = components?.[Math.trunc(run.value)] ?? null;
    intervals.push(
      new Interval(scale(run.index), next ? scale(next.index) : stop, {
        data,
        components: component ? [component.copy()] : [],
      })
    );
  });

  return new Striplog(intervals, { source });
}
