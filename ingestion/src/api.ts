import type { Striplog } from "striplog-engine";
import { striplogFromLog, type FromLogOptions } from "./fromLog.js";
import { striplogFromRecords, type StriplogFromRecordsOptions } from "./records.js";
import { striplogFromTops, type Tops } from "./tops.js";

export type StriplogInput =
  | { kind: "records"; records: readonly unknown[]; options?: StriplogFromRecordsOptions }
  | { kind: "tops"; tops: Tops; source?: string }
  | { kind: "log"; log: readonly number[]; options: FromLogOptions };

/**
 * Single entry point for the boundary builders. Callers hand over rows from a
 * tabular adapter, a tops dictionary or a decoded log; file formats are read
 * elsewhere.
 */
export function loadStriplog(input: StriplogInput): Striplog {
  switch (input.kind) {
    case "records":
      return striplogFromRecords(input.records, input.options);
    case "tops":
      return striplogFromTops(input.tops, input.source);
    case "log":
      return striplogFromLog(input.log, input.options);
  }
}

export { IntervalRecordSchema, buildIntervals, striplogFromRecords } from "./records.js";
export type { BuildOptions, FieldPredicate, IntervalRecord, StriplogFromRecordsOptions } from "./records.js";
export { TopsSchema, striplogFromTops } from "./tops.js";
export type { Tops } from "./tops.js";
export { digitize, runsOf, striplogFromLog } from "./fromLog.js";
export type { FromLogOptions } from "./fromLog.js";
