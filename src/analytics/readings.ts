import {
  InsufficientDataError,
  InvalidSeriesError,
  NonUniformSamplingError,
} from "../shared/errors.js";
import type { Reading, ReadingSeries, ReadingSummary } from "../shared/types.js";

export const MS_PER_MINUTE = 60_000;
export const MS_PER_HOUR = 3_600_000;

/** Height gained from `earlier` to `later` (negative when falling). */
export function riseBetween(later: Reading, earlier: Reading): number {
  return later.height - earlier.height;
}

export function hoursBetween(later: Reading, earlier: Reading): number {
  return (later.timestamp.getTime() - earlier.timestamp.getTime()) / MS_PER_HOUR;
}

/** Absolute rate of change in ft/hr. */
export function slopeBetween(later: Reading, earlier: Reading): number {
  return Math.abs(riseBetween(later, earlier) / hoursBetween(later, earlier));
}

/**
 * Sampling interval in whole minutes, taken from the first two readings.
 */
export function samplingIntervalMinutes(series: ReadingSeries): number {
  if (series.length < 2) {
    throw new InsufficientDataError(
      `At least two readings are needed to infer the sampling rate; got ${series.length}`,
      series.length,
      2
    );
  }
  const gapMs = series[1].timestamp.getTime() - series[0].timestamp.getTime();
  if (gapMs <= 0) {
    throw new InvalidSeriesError(
      `Readings are not in ascending order at index 1 (${series[1].timestamp.toISOString()})`,
      1
    );
  }
  const minutes = Math.floor(gapMs / MS_PER_MINUTE);
  if (minutes === 0) {
    throw new InvalidSeriesError(
      `Sampling interval of ${gapMs / 1000} s at index 1 is shorter than a minute`,
      1
    );
  }
  return minutes;
}

/**
 * Readings per hour, inferred from the gap between the first two readings.
 * Typically 4 (15-minute data) or 1 (hourly data).
 */
export function inferReadingRate(series: ReadingSeries): number {
  const minutes = samplingIntervalMinutes(series);
  if (60 % minutes !== 0) {
    throw new NonUniformSamplingError(
      `Sampling interval of ${minutes} min does not divide an hour evenly`,
      1,
      60,
      minutes
    );
  }
  return 60 / minutes;
}

/**
 * Check that every reading follows its predecessor by the same interval as
 * the first pair. Returns the interval in minutes.
 */
export function assertUniformSampling(series: ReadingSeries): number {
  const minutes = samplingIntervalMinutes(series);
  const expected = series[1].timestamp.getTime() - series[0].timestamp.getTime();

  for (let i = 2; i < series.length; i++) {
    const gap = series[i].timestamp.getTime() - series[i - 1].timestamp.getTime();
    if (gap !== expected) {
      throw new NonUniformSamplingError(
        `Reading ${i} at ${series[i].timestamp.toISOString()} follows the previous reading by ` +
          `${gap / MS_PER_MINUTE} min; expected ${expected / MS_PER_MINUTE} min`,
        i,
        expected / MS_PER_MINUTE,
        gap / MS_PER_MINUTE
      );
    }
  }
  return minutes;
}

/**
 * Sort readings chronologically and reject duplicate timestamps.
 */
export function buildReadingSeries(readings: Iterable<Reading>): ReadingSeries {
  const sorted = [...readings]
    .map((r) => Object.freeze({ timestamp: new Date(r.timestamp.getTime()), height: r.height }))
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].timestamp.getTime() === sorted[i - 1].timestamp.getTime()) {
      throw new InvalidSeriesError(
        `Duplicate reading timestamp ${sorted[i].timestamp.toISOString()}`,
        i
      );
    }
  }
  return Object.freeze(sorted);
}

/**
 * Split a series into runs of constant sampling interval. A gap (outage) or
 * a change of interval starts a new segment. A lone reading before a gap
 * stays on its own rather than pairing with the first reading after it.
 */
export function splitAtGaps(series: ReadingSeries): ReadingSeries[] {
  const segments: ReadingSeries[] = [];
  let start = 0;

  while (start < series.length) {
    if (start === series.length - 1) {
      segments.push(series.slice(start));
      break;
    }
    const interval =
      series[start + 1].timestamp.getTime() - series[start].timestamp.getTime();
    let end = start + 1;
    while (
      end + 1 < series.length &&
      series[end + 1].timestamp.getTime() - series[end].timestamp.getTime() === interval
    ) {
      end++;
    }
    if (end === start + 1 && end + 1 < series.length) {
      segments.push(series.slice(start, start + 1));
      start++;
      continue;
    }
    segments.push(series.slice(start, end + 1));
    start = end + 1;
  }

  return segments;
}

/**
 * Position of `reading` in a chronologically sorted series, or -1.
 * Both timestamp and height must match.
 */
export function indexOfReading(series: ReadingSeries, reading: Reading): number {
  const target = reading.timestamp.getTime();
  let lo = 0;
  let hi = series.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const t = series[mid].timestamp.getTime();
    if (t === target) {
      return series[mid].height === reading.height ? mid : -1;
    }
    if (t < target) lo = mid + 1;
    else hi = mid - 1;
  }
  return -1;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** "MM/DD/YYYY HH:MM:SS - height", in UTC. */
export function formatReading(reading: Reading): string {
  const d = reading.timestamp;
  const date = `${pad(d.getUTCMonth() + 1)}/${pad(d.getUTCDate())}/${d.getUTCFullYear()}`;
  const time = `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
  return `${date} ${time} - ${reading.height}`;
}

export function toReadingSummary(reading: Reading): ReadingSummary {
  return { timestamp: reading.timestamp.toISOString(), height: reading.height };
}
