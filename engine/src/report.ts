import type { Striplog } from "./striplog.js";
import type { Order } from "./types.js";

export interface ComponentShare {
  summary: string;
  thickness: number;
  fraction: number;
}

export interface StriplogSummary {
  source: string;
  order: Order;
  intervalCount: number;
  start: number;
  stop: number;
  units: string;
  totalThickness: number;
  meanThickness: number;
  gapCount: number;
  overlapCount: number;
  components: ComponentShare[];
}

const UNLABELLED = "(no components)";

function formatPercent(numerator: number, denominator: number): string {
  if (denominator === 0) return "0%";
  return ((numerator / denominator) * 100).toFixed(1) + "%";
}

export function summarizeStriplog(strip: Striplog): StriplogSummary {
  const total = strip.cum;
  return {
    source: strip.source,
    order: strip.order,
    intervalCount: strip.length,
    start: strip.start.z,
    stop: strip.stop.z,
    units: strip.start.units,
    totalThickness: total,
    meanThickness: strip.mean,
    gapCount: strip.findGapIndices().length,
    overlapCount: strip.findOverlapIndices().length,
    components: strip.unique.map(([component, thickness]) => ({
      summary: component ? component.summary() : UNLABELLED,
      thickness,
      fraction: total === 0 ? 0 : thickness / total,
    })),
  };
}

/** Lines of a plain-text report, ready for console output. */
export function formatSummary(summary: StriplogSummary): string[] {
  const lines = [
    `Striplog summary${summary.source ? ` (${summary.source})` : ""}`,
    "",
    `Order: ${summary.order}`,
    `Intervals: ${summary.intervalCount}`,
    `Extent: ${summary.start} to ${summary.stop} ${summary.units}`,
    `Total thickness: ${summary.totalThickness.toFixed(2)} ${summary.units}`,
    `Mean thickness: ${summary.meanThickness.toFixed(2)} ${summary.units}`,
    `Gaps: ${summary.gapCount}`,
    `Overlaps: ${summary.overlapCount}`,
  ];

  if (summary.components.length > 0) {
    lines.push("", "Components:");
    for (const share of summary.components) {
      lines.push(
        `- ${share.summary}: ${share.thickness.toFixed(2)} ${summary.units} (${formatPercent(
          share.thickness,
          summary.totalThickness
        )})`
      );
    }
  }
  return lines;
}
