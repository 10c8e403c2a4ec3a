export * from "./types.js";
export * from "./errors.js";
export { BASE_DEFAULTS, getEngineDefaults } from "./defaults.js";
export type { EngineDefaults } from "./defaults.js";
export {
  ValueSchema,
  cloneData,
  combineData,
  compareValues,
  formatIssues,
  listAndAdd,
  valuesEqual,
} from "./values.js";
export { fromDepthLike, isAbove, toDepthLike } from "./order.js";
export { Position } from "./position.js";
export { Component, componentListsEqual, uniqueComponents } from "./component.js";
export type { ComponentProperties } from "./component.js";
export { Interval, blendDescriptions } from "./interval.js";
export { Striplog } from "./striplog.js";
export { boundaryEvents, priorityMerge, sweep } from "./merge.js";
export { linspace, resolveLogOptions, runsOf } from "./log.js";
export type { ResolvedLogOptions } from "./log.js";
export { detectOrder } from "./sequence.js";
export { applyMorphology, dilate, erode } from "./morphology.js";
export type { MorphologyOperation } from "./morphology.js";
export { formatSummary, summarizeStriplog } from "./report.js";
export type { ComponentShare, StriplogSummary } from "./report.js";
