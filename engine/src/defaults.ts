import type { AnnealMode } from "./types.js";

export interface EngineDefaults {
  units: string;
  step: number;
  undefinedValue: number;
  annealMode: AnnealMode;
  tolerance: number;
}

const BASE_DEFAULTS: Readonly<EngineDefaults> = Object.freeze<EngineDefaults>({
  units: "m",
  step: 1,
  undefinedValue: 0,
  annealMode: "middle",
  tolerance: 1e-9,
});

function envUnits(): string | undefined {
  if (typeof process === "undefined") return undefined;
  const units = process.env?.STRIPLOG_DEFAULT_UNITS?.trim();
  return units ? units : undefined;
}

/** Engine defaults, with STRIPLOG_DEFAULT_UNITS overriding the units when set. */
export function getEngineDefaults(): EngineDefaults {
  const units = envUnits();
  return units ? { ...BASE_DEFAULTS, units } : BASE_DEFAULTS;
}

export { BASE_DEFAULTS };
