import { KnownEventSchema } from "../src/evidence/schemas.js";
import type { KnownEvent } from "../src/evidence/schemas.js";
import type { Reading } from "../src/shared/types.js";
import type { LoadedSeries } from "../src/packs/types.js";

export const MINUTE = 60_000;
export const HOUR = 60 * MINUTE;

/** Readings at a fixed interval starting at `startIso`. */
export function makeSeries(startIso: string, heights: readonly number[], stepMinutes = 15): Reading[] {
  const start = Date.parse(startIso);
  return heights.map((height, i) => ({
    timestamp: new Date(start + i * stepMinutes * MINUTE),
    height,
  }));
}

export function flat(count: number, height: number): number[] {
  return Array.from({ length: count }, () => height);
}

export function makeEvent(id: string, timestampIso: string, name = id): KnownEvent {
  return KnownEventSchema.parse({ id, timestamp: timestampIso, name });
}

/**
 * Ten days of 15-minute readings on a 20 ft baseline with a 3 ft rise over
 * 3 hours starting at each of `rampStarts` (reading indices): 0.25 ft per
 * step, a 6 hour crest at 23 ft, then a 6 hour recession.
 */
export function tenDayHeights(rampStarts: readonly number[]): number[] {
  return Array.from({ length: 960 }, (_, i) => {
    for (const base of rampStarts) {
      const k = i - base;
      if (k >= 0 && k <= 12) return 20 + 0.25 * k;
      if (k > 12 && k <= 35) return 23;
      if (k > 35 && k <= 59) return 23 - 0.125 * (k - 35);
    }
    return 20;
  });
}

export function loadedSeries(id: string, readings: Reading[]): LoadedSeries {
  return {
    id,
    filename: `${id}.csv`,
    format: "readings_csv",
    sha256: "0".repeat(64),
    readings,
    rejectedRows: 0,
  };
}
