/**
 * Threshold sweep: rerun the analysis of one pack over a grid of critical
 * rise and rate values and tabulate the outcomes.
 */

import type { ThresholdConfig } from "../shared/thresholds.js";
import type { RunSummary } from "../shared/types.js";
import { analyzeSeries } from "./analyze.js";
import type { LoadedPack } from "./types.js";

export interface SweepGrid {
  riseCritical: readonly number[];
  rateCritical: readonly number[];
}

export interface SweepTrial {
  /** Spreadsheet-style label: A, B, ..., Z, AA, AB, ... */
  name: string;
  riseCritical: number;
  rateCritical: number;
  truePositives: number;
  falsePositives: number;
  falseNegatives: number;
  /** Lead times in minutes, ascending */
  notificationTimes: number[];
  summary: RunSummary;
}

export function trialName(index: number): string {
  let name = "";
  let n = index + 1;
  while (n > 0) {
    const rem = (n - 1) % 26;
    name = String.fromCharCode(65 + rem) + name;
    n = Math.floor((n - 1) / 26);
  }
  return name;
}

/**
 * One independent analysis per (rise, rate) pair, rise-major. Debounce,
 * window radius and floor come from `base`.
 */
export function runThresholdSweep(
  pack: LoadedPack,
  grid: SweepGrid,
  base: ThresholdConfig
): SweepTrial[] {
  const trials: SweepTrial[] = [];

  for (const riseCritical of grid.riseCritical) {
    for (const rateCritical of grid.rateCritical) {
      const thresholds: ThresholdConfig = { ...base, riseCritical, rateCritical };
      const { summary } = analyzeSeries(pack.series, pack.catalog, thresholds);
      trials.push({
        name: trialName(trials.length),
        riseCritical,
        rateCritical,
        truePositives: summary.truePositives,
        falsePositives: summary.falsePositives,
        falseNegatives: summary.falseNegatives,
        notificationTimes: Object.values(summary.notificationTimes).sort((a, b) => a - b),
        summary,
      });
    }
  }

  return trials;
}

export const SWEEP_TABLE_HEADER = "Trial\tR_C\tM_C\tTP\tFP\tFN\tNotification Times";

/**
 * Tab-separated results table, one line per trial.
 */
export function formatSweepTable(trials: readonly SweepTrial[]): string {
  const rows = trials.map((t) =>
    [
      t.name,
      t.riseCritical,
      t.rateCritical,
      t.truePositives,
      t.falsePositives,
      t.falseNegatives,
      `[${t.notificationTimes.join(", ")}]`,
    ].join("\t")
  );
  return [SWEEP_TABLE_HEADER, ...rows].join("\n") + "\n";
}
