import type { Component } from "./component.js";

/** Scalar or list payload stored in components, data maps and position metadata. */
export type Value = number | boolean | string | Value[];

export type DataMap = Record<string, Value>;

/** Direction in which positions increase along the log. */
export type Order = "depth" | "elevation" | "none";

/** Order of a single interval; a point reports "depth". */
export type IntervalOrder = Exclude<Order, "none">;

export type IntervalKind = "point" | "interval";

export type Relationship = "contains" | "containedby" | "partially" | "touches";

export type AnnealMode = "middle" | "down" | "up";

export interface PositionInit {
  middle?: number;
  upper?: number;
  lower?: number;
  x?: number;
  y?: number;
  units?: string;
  meta?: Record<string, Value | null | undefined>;
}

export interface IntervalInit {
  description?: string;
  components?: Component[];
  data?: DataMap;
}

export interface SummaryOptions {
  fmt?: string;
  initial?: boolean;
}

export interface ComponentSummaryOptions extends SummaryOptions {
  fallback?: string;
}

export interface StriplogOptions {
  source?: string;
  order?: Order | "auto";
}

export type PruneOptions =
  | { limit: number; n?: undefined; percentile?: undefined; keepEnds?: boolean }
  | { n: number; limit?: undefined; percentile?: undefined; keepEnds?: boolean }
  | { percentile: number; limit?: undefined; n?: undefined; keepEnds?: boolean };

export type ShiftOptions = { delta: number; start?: undefined } | { start: number; delta?: undefined };

/** Start and stop of a crop; null keeps the existing end. */
export type CropExtent = [number | null, number | null];

export interface CopyOption {
  copy?: boolean;
}

export interface GetDataOptions {
  transform?: (value: Value) => Value;
  fallback?: Value;
}

/** An entry of a rasterization lookup table: a component or a raw data value. */
export type TableEntry = Component | Value;

export interface LogOptions {
  step?: number;
  start?: number;
  stop?: number;
  basis?: number[];
  field?: string;
  fieldFunction?: (value: Value) => Value;
  bins?: boolean;
  table?: TableEntry[];
  sortTable?: boolean;
  matchOnly?: string[];
  undefinedValue?: number;
}

export interface RasterizedLog {
  log: number[];
  basis: number[];
  table: TableEntry[];
}

export type BoundaryKind = "top" | "base";

/** One row of the priority-compositing event table. */
export interface BoundaryEvent {
  kind: BoundaryKind;
  z: number;
  index: number;
}
