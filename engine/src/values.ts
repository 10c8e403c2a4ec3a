import { z } from "zod";
import type { DataMap, Value } from "./types.js";

export const ValueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([z.number(), z.boolean(), z.string(), z.array(ValueSchema)])
);

/** Render zod issues as "path: message" strings for error reporting. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function cloneValue(value: Value): Value {
  return Array.isArray(value) ? value.map(cloneValue) : value;
}

export function cloneData(data: DataMap): DataMap {
  const out: DataMap = {};
  for (const [key, value] of Object.entries(data)) out[key] = cloneValue(value);
  return out;
}

/** Coerce both operands to lists and concatenate them. */
export function listAndAdd(a: Value, b: Value): Value[] {
  const left = Array.isArray(a) ? a : [a];
  const right = Array.isArray(b) ? b : [b];
  return [...left.map(cloneValue), ...right.map(cloneValue)];
}

/** Merge two data maps; keys present in both accumulate into a list. */
export function combineData(a: DataMap, b: DataMap): DataMap {
  const out = cloneData(a);
  for (const [key, value] of Object.entries(b)) {
    out[key] = key in out ? listAndAdd(out[key], value) : cloneValue(value);
  }
  return out;
}

export function valuesEqual(a: Value, b: Value): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (typeof a === "number" && typeof b === "number" && Number.isNaN(a) && Number.isNaN(b)) return true;
  return a === b;
}

function rank(value: Value): number {
  if (typeof value === "boolean") return 0;
  if (typeof value === "number") return 1;
  if (typeof value === "string") return 2;
  return 3;
}

/** Total order over values: booleans, then numbers, then strings, then lists. */
export function compareValues(a: Value, b: Value): number {
  const ra = rank(a);
  const rb = rank(b);
  if (ra !== rb) return ra - rb;
  if (Array.isArray(a) && Array.isArray(b)) {
    for (let i = 0; i < Math.min(a.length, b.length); i++) {
      const c = compareValues(a[i], b[i]);
      if (c !== 0) return c;
    }
    return a.length - b.length;
  }
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  return Number(a === true) - Number(b === true);
}

export function isNumericString(value: string): boolean {
  return value.trim() !== "" && Number.isFinite(Number(value));
}

/** Trim the given characters from both ends of a string. */
export function stripChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && chars.includes(text[start])) start++;
  while (end > start && chars.includes(text[end - 1])) end--;
  return text.slice(start, end);
}
