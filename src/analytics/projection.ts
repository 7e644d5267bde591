import { criticalSpanHours } from "../shared/thresholds.js";
import type { ThresholdConfig } from "../shared/thresholds.js";
import type { ProjectionDirection, Reading, ReadingSeries } from "../shared/types.js";
import { MS_PER_HOUR, MS_PER_MINUTE } from "./readings.js";

/** Default horizon (forward) or look-back (backward) of a projection. */
export const DEFAULT_PROJECTION_HOURS = 12;

export interface ProjectionOptions {
  direction: ProjectionDirection;
  stepMinutes?: number;
  /** Number of projected timestamps; defaults to 12 hours' worth of steps. */
  count?: number;
  /** Defaults to the timestamp of the last reading. */
  anchorTime?: Date;
}

/** Index of the first reading at or after `ms`. */
function lowerBound(series: ReadingSeries, ms: number): number {
  let lo = 0;
  let hi = series.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (series[mid].timestamp.getTime() < ms) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Readings with timestamp in [fromMs, toMs). */
function readingsBetween(series: ReadingSeries, fromMs: number, toMs: number): ReadingSeries {
  return series.slice(lowerBound(series, fromMs), lowerBound(series, toMs));
}

/**
 * Lowest height at the end of `window` that would be critical: the total
 * rise floor (min + riseCritical), raised if needed so the average rate since
 * the first reading of the window reaches rateCritical.
 */
export function minimalCriticalHeight(
  window: ReadingSeries,
  thresholds: ThresholdConfig
): number {
  const spanHours = criticalSpanHours(thresholds);
  const first = window[0].height;
  let height = Math.min(...window.map((r) => r.height)) + thresholds.riseCritical;

  const avgRate = (height - first) / spanHours;
  if (avgRate < thresholds.rateCritical) {
    height = first + spanHours * thresholds.rateCritical;
  }
  return height;
}

/**
 * Project the critical-height curve.
 *
 * Forward: `count` timestamps after the anchor. Each projected reading joins
 * the pool of predecessors for the ones after it.
 * Backward: the `count` timestamps ending at the anchor, against real
 * readings only ("how close did it get").
 *
 * Timestamps with no reading in the preceding critical span are skipped.
 */
export function projectThresholds(
  series: ReadingSeries,
  thresholds: ThresholdConfig,
  options: ProjectionOptions
): Reading[] {
  if (series.length === 0) return [];

  const stepMinutes = options.stepMinutes ?? 15;
  if (!(stepMinutes > 0)) {
    throw new RangeError(`stepMinutes must be positive; got ${stepMinutes}`);
  }
  const count = options.count ?? Math.floor((DEFAULT_PROJECTION_HOURS * 60) / stepMinutes);
  const anchorMs = (options.anchorTime ?? series[series.length - 1].timestamp).getTime();
  const stepMs = stepMinutes * MS_PER_MINUTE;
  const spanMs = criticalSpanHours(thresholds) * MS_PER_HOUR;

  const known = series.slice(0, lowerBound(series, anchorMs + 1));
  const projected: Reading[] = [];

  for (let k = 0; k < count; k++) {
    const t =
      options.direction === "forward"
        ? anchorMs + (k + 1) * stepMs
        : anchorMs - (count - 1 - k) * stepMs;

    const window: Reading[] = [...readingsBetween(known, t - spanMs, t)];
    if (options.direction === "forward") {
      window.push(...readingsBetween(projected, t - spanMs, t));
    }
    if (window.length === 0) continue;

    projected.push({
      timestamp: new Date(t),
      height: minimalCriticalHeight(window, thresholds),
    });
  }

  return projected;
}
