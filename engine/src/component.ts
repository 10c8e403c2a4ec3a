import type { ComponentSummaryOptions, Value } from "./types.js";
import { cloneValue, isNumericString, valuesEqual } from "./values.js";

export type ComponentProperties = Record<string, Value | null | undefined>;

const FIELD_PATTERN = /\{([^{}!]+)(?:!([^{}]))?\}/g;

function asText(value: Value): string {
  if (Array.isArray(value)) return `[${value.map(asText).join(", ")}]`;
  return String(value);
}

function numbersOf(value: Value): number[] {
  const list = Array.isArray(value) ? value : [value];
  return list.filter((v): v is number => typeof v === "number");
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

const CONVERSIONS: Record<string, (value: Value) => string> = {
  s: asText,
  u: (v) => asText(v).toUpperCase(),
  l: (v) => asText(v).toLowerCase(),
  c: (v) => capitalize(asText(v)),
  t: (v) => asText(v).split(/(\s+)/).map((w) => (w.trim() ? capitalize(w) : w)).join(""),
  m: (v) => {
    const nums = numbersOf(v);
    return String(nums.length ? nums.reduce((a, b) => a + b, 0) / nums.length : NaN);
  },
  "+": (v) => String(numbersOf(v).reduce((a, b) => a + b, 0)),
};

/** Significant entries for equality: keys lower-cased, numbers and empties dropped. */
function comparable(properties: Record<string, Value>): Map<string, Value> {
  const out = new Map<string, Value>();
  for (const [key, value] of Object.entries(properties)) {
    if (typeof value === "string") {
      if (value) out.set(key.toLowerCase(), value.toLowerCase());
    } else if (typeof value === "boolean") {
      if (value) out.set(key.toLowerCase(), value);
    } else if (Array.isArray(value) && value.length > 0) {
      out.set(key.toLowerCase(), value);
    }
  }
  return out;
}

/**
 * A bag of properties describing interval content, e.g. lithology, colour or
 * grain size. Numeric strings are stored as numbers; null entries are skipped.
 */
export class Component {
  private readonly properties: Record<string, Value>;

  constructor(properties: ComponentProperties = {}) {
    this.properties = {};
    for (const [key, value] of Object.entries(properties)) {
      if (value === null || value === undefined) continue;
      if (typeof value === "string" && isNumericString(value)) {
        this.properties[key] = Number(value);
      } else {
        this.properties[key] = cloneValue(value);
      }
    }
  }

  get(key: string): Value | undefined {
    return this.properties[key];
  }

  has(key: string): boolean {
    return key in this.properties;
  }

  keys(): string[] {
    return Object.keys(this.properties);
  }

  entries(): [string, Value][] {
    return Object.entries(this.properties);
  }

  get size(): number {
    return this.keys().length;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  copy(): Component {
    return new Component(this.properties);
  }

  /** A component holding only the listed keys. */
  pick(keys: readonly string[]): Component {
    const picked: ComponentProperties = {};
    for (const key of keys) picked[key] = this.properties[key];
    return new Component(picked);
  }

  /**
   * Case-insensitive comparison of string and boolean properties. Numeric
   * fields are ignored, as are empty strings, false and empty lists.
   */
  equals(other: Component | null | undefined): boolean {
    if (!(other instanceof Component)) return false;
    const mine = comparable(this.properties);
    const theirs = comparable(other.properties);
    if (mine.size !== theirs.size) return false;
    for (const [key, value] of mine) {
      const match = theirs.get(key);
      if (match === undefined || !valuesEqual(value, match)) return false;
    }
    return true;
  }

  /**
   * Summary text from a format string such as "{colour} {lithology!u}".
   * Without a format the non-empty properties are joined with commas.
   */
  summary(options: ComponentSummaryOptions = {}): string {
    const { fmt, initial = true, fallback = "" } = options;
    if (fallback && this.isEmpty) return fallback;
    if (fmt === "") return fallback;

    const keys = this.keys().filter((k) => this.properties[k] !== "");
    const template = fmt ?? keys.map((k) => `{${k}}`).join(", ");
    const summary = template.replace(FIELD_PATTERN, (_match, key: string, conversion?: string) => {
      const value = this.properties[key.trim()];
      if (value === undefined) return "_";
      const convert = (conversion && CONVERSIONS[conversion]) || asText;
      return convert(value);
    });

    if (summary && initial && !fmt) {
      return summary.charAt(0).toUpperCase() + summary.slice(1);
    }
    return summary;
  }

  toJSON(): Record<string, Value> {
    const out: Record<string, Value> = {};
    for (const [key, value] of this.entries()) out[key] = cloneValue(value);
    return out;
  }

  toString(): string {
    return `Component(${JSON.stringify(this.properties)})`;
  }
}

/** Set-union by component equality, keeping the order of discovery. */
export function uniqueComponents(components: Iterable<Component>): Component[] {
  const out: Component[] = [];
  for (const c of components) {
    if (!out.some((existing) => existing.equals(c))) out.push(c);
  }
  return out;
}

/** Element-wise equality of two component lists. */
export function componentListsEqual(a: readonly Component[], b: readonly Component[]): boolean {
  return a.length === b.length && a.every((c, i) => c.equals(b[i]));
}
