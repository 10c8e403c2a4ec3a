import { z } from "zod";
import { Component, Interval, Striplog, StriplogError, ValueSchema, formatIssues } from "striplog-engine";
import type { DataMap, Order, Value } from "striplog-engine";

// Flat "component lithology" / "comp colour" keys feed a single component.
const COMPONENT_KEY = /^comp(?:onent)? /i;

const NullableValue = ValueSchema.nullable();

export const IntervalRecordSchema = z
  .object({
    top: z.number().finite(),
    base: z.number().finite().nullable().optional(),
    description: z.string().optional(),
    components: z.array(z.record(z.string(), NullableValue)).optional(),
    data: z.record(z.string(), NullableValue).optional(),
  })
  .passthrough();

export type IntervalRecord = z.input<typeof IntervalRecordSchema>;

export type FieldPredicate = (value: Value | null) => boolean;

export interface BuildOptions {
  /** Where the last interval ends when it has no base. */
  stop?: number;
  /** Keep missing bases empty, making point intervals. */
  points?: boolean;
  /** Keep a record only if every predicate passes for the fields it has. */
  include?: Record<string, FieldPredicate>;
  /** Drop a record if any predicate passes for the fields it has. */
  exclude?: Record<string, FieldPredicate>;
  /** Fields to leave out of the built intervals. */
  ignore?: string[];
}

export interface StriplogFromRecordsOptions extends BuildOptions {
  source?: string;
  order?: Order | "auto";
}

interface NormalizedRecord {
  top: number;
  base: number | null;
  description: string;
  components: Component[];
  data: DataMap;
  /** Every field by its flat name, for include/exclude. */
  fields: Record<string, Value | null>;
}

function parseRecord(raw: unknown, index: number, ignore: readonly string[]): NormalizedRecord {
  const parsed = IntervalRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StriplogError(`Invalid interval record at index ${index}`, formatIssues(parsed.error));
  }
  const { top, base, description, components, data, ...rest } = parsed.data;
  const kept = (key: string): boolean => !ignore.includes(key);

  const fields: Record<string, Value | null> = { top, base: base ?? null };
  if (description !== undefined) fields.description = description;

  const flatComponent: Record<string, Value | null> = {};
  const dataMap: DataMap = {};
  for (const [key, value] of Object.entries(data ?? {})) {
    fields[key] = value;
    if (value !== null && kept(key)) dataMap[key] = value;
  }
  for (const [key, rawValue] of Object.entries(rest)) {
    const value = NullableValue.safeParse(rawValue);
    if (!value.success) {
      throw new StriplogError(
        `Invalid interval record at index ${index}`,
        formatIssues(value.error).map((message) => `${key}: ${message}`)
      );
    }
    fields[key] = value.data;
    if (!kept(key)) continue;
    if (COMPONENT_KEY.test(key)) {
      flatComponent[key.replace(COMPONENT_KEY, "")] = value.data;
    } else if (value.data !== null) {
      dataMap[key] = value.data;
    }
  }

  const built = (components ?? [])
    .map((props) => new Component(props))
    .map((c) => c.pick(c.keys().filter(kept)))
    .filter((c) => !c.isEmpty);
  if (Object.keys(flatComponent).length > 0) built.push(new Component(flatComponent));

  return {
    top,
    base: base ?? null,
    description: description !== undefined && kept("description") ? description : "",
    components: built,
    data: dataMap,
    fields,
  };
}

function wanted(record: NormalizedRecord, options: BuildOptions): boolean {
  for (const [key, predicate] of Object.entries(options.include ?? {})) {
    if (key in record.fields && !predicate(record.fields[key])) return false;
  }
  for (const [key, predicate] of Object.entries(options.exclude ?? {})) {
    if (key in record.fields && predicate(record.fields[key])) return false;
  }
  return true;
}

/**
 * Validate tabular records and turn them into intervals, sorted by top. A
 * missing base is taken from the next record's top; the last record runs to
 * `stop`, or is one unit thick.
 */
export function buildIntervals(records: readonly unknown[], options: BuildOptions = {}): Interval[] {
  const ignore = options.ignore ?? [];
  const rows = records
    .map((raw, i) => parseRecord(raw, i, ignore))
    .sort((a, b) => a.top - b.top)
    .filter((row) => wanted(row, options));

  if (!options.points) {
    rows.forEach((row, i) => {
      if (row.base !== null) return;
      const next = rows[i + 1];
      if (next) row.base = next.top;
      else row.base = options.stop ?? row.top + 1;
    });
  }

  return rows.map(
    (row) =>
      new Interval(row.top, row.base, {
        description: row.description,
        components: row.components,
        data: row.data,
      })
  );
}

export function striplogFromRecords(records: readonly unknown[], options: StriplogFromRecordsOptions = {}): Striplog {
  const { source, order, ...build } = options;
  return new Striplog(buildIntervals(records, build), { source, order });
}
