import { AnchorNotFoundError } from "../shared/errors.js";
import type { Reading, ReadingSeries, ReadingWindow, TimeRange } from "../shared/types.js";
import { indexOfReading, inferReadingRate } from "./readings.js";

/**
 * Slice `radiusHours` of readings either side of `anchor`. Near either end of
 * the series the window is truncated to what exists.
 */
export function extractWindow(
  anchor: Reading,
  series: ReadingSeries,
  radiusHours: number = 24
): ReadingWindow {
  const anchorIndex = indexOfReading(series, anchor);
  if (anchorIndex === -1) {
    throw new AnchorNotFoundError(
      `Anchor reading ${anchor.timestamp.toISOString()} (${anchor.height}) is not part of the series`,
      anchor.timestamp.toISOString()
    );
  }

  const offset = Math.max(1, Math.floor(radiusHours * inferReadingRate(series)));
  const startIndex = Math.max(0, anchorIndex - offset);
  const endIndex = Math.min(series.length, anchorIndex + offset);
  const readings = series.slice(startIndex, endIndex);

  return {
    anchor: series[anchorIndex],
    anchorIndex,
    startIndex,
    endIndex,
    start: readings[0].timestamp,
    end: readings[readings.length - 1].timestamp,
    readings,
  };
}

/**
 * Window around the reading nearest to `instant`, e.g. to plot an event
 * that no critical point announced. Null when the instant is outside the series.
 */
export function extractAroundInstant(
  instant: Date,
  series: ReadingSeries,
  radiusHours: number = 24
): ReadingWindow | null {
  if (series.length < 2) return null;
  const t = instant.getTime();
  const first = series[0].timestamp.getTime();
  const last = series[series.length - 1].timestamp.getTime();
  if (t < first || t > last) return null;

  let lo = 0;
  let hi = series.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >>> 1;
    if (series[mid].timestamp.getTime() <= t) lo = mid;
    else hi = mid;
  }
  const nearest =
    t - series[lo].timestamp.getTime() <= series[hi].timestamp.getTime() - t
      ? series[lo]
      : series[hi];

  return extractWindow(nearest, series, radiusHours);
}

export function windowContains(window: TimeRange, instant: Date): boolean {
  const t = instant.getTime();
  return window.start.getTime() <= t && t <= window.end.getTime();
}

/** Critical points that fall inside a window, for plot markers. */
export function pointsInWindow(window: TimeRange, points: readonly Reading[]): Reading[] {
  return points.filter((p) => windowContains(window, p.timestamp));
}
