import { getEngineDefaults } from "./defaults.js";
import { PositionError } from "./errors.js";
import type { PositionInit, Value } from "./types.js";
import { cloneValue } from "./values.js";

function isFilled(value: Value | null | undefined): value is Value {
  if (value === null || value === undefined || value === false || value === "" || value === 0) return false;
  return !(Array.isArray(value) && value.length === 0);
}

/**
 * A point on the depth or elevation axis, optionally with upper and lower
 * uncertainty bounds and a map location.
 */
export class Position {
  readonly middle?: number;
  upper: number;
  lower: number;
  readonly x?: number;
  readonly y?: number;
  readonly units: string;
  readonly meta: Record<string, Value>;

  constructor(init: PositionInit) {
    const { middle, upper, lower, x, y } = init;
    if (middle === undefined && (upper === undefined || lower === undefined)) {
      throw new PositionError("You must provide middle, or upper and lower.");
    }
    if ((x === undefined) !== (y === undefined)) {
      throw new PositionError("You must provide x and y.");
    }
    this.middle = middle;
    this.upper = upper ?? middle ?? 0;
    this.lower = lower ?? middle ?? 0;
    this.x = x;
    this.y = y;
    this.units = init.units ?? getEngineDefaults().units;
    this.meta = {};
    for (const [key, value] of Object.entries(init.meta ?? {})) {
      if (key && isFilled(value)) this.meta[key] = cloneValue(value);
    }
  }

  /** Coerce a raw coordinate into a Position; Positions pass through unchanged. */
  static from(value: number | Position, units?: string): Position {
    if (value instanceof Position) return value;
    return new Position({ middle: value, units });
  }

  /** The middle if one was given, else the midpoint of the bounds. */
  get z(): number {
    return this.middle ?? (this.upper + this.lower) / 2;
  }

  get uncertainty(): number {
    return Math.abs(this.upper - this.lower);
  }

  /** [lower, upper] */
  get span(): [number, number] {
    return [this.lower, this.upper];
  }

  /** Swap upper and lower in place, for flipping between depth and elevation. */
  invert(): void {
    const oldLower = this.lower;
    this.lower = this.upper;
    this.upper = oldLower;
  }

  copy(): Position {
    return new Position({
      middle: this.middle,
      upper: this.upper,
      lower: this.lower,
      x: this.x,
      y: this.y,
      units: this.units,
      meta: this.meta,
    });
  }

  equals(other: Position): boolean {
    return this.z === other.z;
  }

  compare(other: Position): number {
    return this.z - other.z;
  }

  toString(): string {
    const parts = [`z=${this.z}`];
    if (this.uncertainty > 0) parts.push(`upper=${this.upper}`, `lower=${this.lower}`);
    if (this.x !== undefined) parts.push(`x=${this.x}`, `y=${this.y}`);
    return `Position(${parts.join(", ")} ${this.units})`;
  }
}
