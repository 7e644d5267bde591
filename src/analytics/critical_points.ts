import type { ThresholdConfig } from "../shared/thresholds.js";
import type { CriticalPointScan, Reading, ReadingSeries } from "../shared/types.js";
import { InsufficientDataError } from "../shared/errors.js";
import {
  MS_PER_HOUR,
  assertUniformSampling,
  inferReadingRate,
  riseBetween,
  slopeBetween,
} from "./readings.js";

/**
 * Number of prior readings that can hold a qualifying interval: the longest
 * a critical rise can take at the critical rate, in samples.
 */
export function lookbackSamples(thresholds: ThresholdConfig, readingsPerHour: number): number {
  return Math.ceil(thresholds.riseCritical / thresholds.rateCritical) * readingsPerHour;
}

/**
 * A reading is critical when some reading among the `lookback` before it is
 * at least riseCritical lower and the rise happened faster than rateCritical.
 * The first qualifying predecessor (oldest first) settles it.
 */
export function findCriticalPoints(
  series: ReadingSeries,
  thresholds: ThresholdConfig
): { readingsPerHour: number; lookback: number; criticalPoints: Reading[] } {
  const readingsPerHour = inferReadingRate(series);
  assertUniformSampling(series);

  const lookback = lookbackSamples(thresholds, readingsPerHour);
  if (series.length <= lookback) {
    throw new InsufficientDataError(
      `Series of ${series.length} readings is too short for a lookback of ${lookback} readings`,
      series.length,
      lookback + 1
    );
  }

  const { riseCritical, rateCritical, floorHeight } = thresholds;
  const criticalPoints: Reading[] = [];

  for (let i = lookback; i < series.length; i++) {
    const reading = series[i];
    if (floorHeight !== undefined && reading.height < floorHeight + riseCritical) {
      continue;
    }

    for (let j = i - lookback; j < i; j++) {
      const prior = series[j];
      if (
        riseBetween(reading, prior) >= riseCritical &&
        slopeBetween(reading, prior) > rateCritical
      ) {
        criticalPoints.push(reading);
        break;
      }
    }
  }

  return { readingsPerHour, lookback, criticalPoints };
}

/**
 * Collapse clusters of critical points into notifications: a point is kept
 * only if it falls more than `debounceHours` after the last kept point.
 */
export function debounceCriticalPoints(
  criticalPoints: readonly Reading[],
  debounceHours: number
): Reading[] {
  const spacingMs = debounceHours * MS_PER_HOUR;
  const accepted: Reading[] = [];
  let last: Reading | undefined;

  for (const point of criticalPoints) {
    if (!last || point.timestamp.getTime() - last.timestamp.getTime() > spacingMs) {
      accepted.push(point);
      last = point;
    }
  }
  return accepted;
}

/**
 * Full scan: every critical point plus the debounced first critical points.
 */
export function scanCriticalPoints(
  series: ReadingSeries,
  thresholds: ThresholdConfig
): CriticalPointScan {
  const { readingsPerHour, lookback, criticalPoints } = findCriticalPoints(series, thresholds);
  return {
    readingsPerHour,
    lookback,
    criticalPoints,
    firstCriticalPoints: debounceCriticalPoints(criticalPoints, thresholds.debounceHours),
  };
}

/**
 * First critical points of a series, one per notification.
 */
export function detectCriticalPoints(
  series: ReadingSeries,
  thresholds: ThresholdConfig
): Reading[] {
  return scanCriticalPoints(series, thresholds).firstCriticalPoints;
}
