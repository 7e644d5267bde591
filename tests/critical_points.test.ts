import { describe, it, expect } from "vitest";
import {
  debounceCriticalPoints,
  detectCriticalPoints,
  findCriticalPoints,
  lookbackSamples,
  scanCriticalPoints,
} from "../src/analytics/critical_points.js";
import { DEFAULT_THRESHOLDS } from "../src/shared/thresholds.js";
import { InsufficientDataError } from "../src/shared/errors.js";
import { HOUR, flat, makeSeries } from "./helpers.js";

// 20 ft through index 40, then +17/128 ft (0.53125 ft/hr) per 15-minute step.
const rampHeights = Array.from({ length: 80 }, (_, i) =>
  i <= 40 ? 20 : 20 + 0.1328125 * (i - 40)
);
const ramp = makeSeries("2020-03-01T00:00:00Z", rampHeights);

describe("lookbackSamples", () => {
  it("is ceil(rise / rate) hours of readings", () => {
    expect(lookbackSamples(DEFAULT_THRESHOLDS, 4)).toBe(20);
    expect(lookbackSamples({ ...DEFAULT_THRESHOLDS, riseCritical: 2.6 }, 1)).toBe(6);
  });
});

describe("findCriticalPoints", () => {
  it("first flags the ramp at index 59", () => {
    const { readingsPerHour, lookback, criticalPoints } = findCriticalPoints(
      ramp,
      DEFAULT_THRESHOLDS
    );
    expect(readingsPerHour).toBe(4);
    expect(lookback).toBe(20);
    expect(criticalPoints[0]).toBe(ramp[59]);
    expect(criticalPoints).toHaveLength(21);
  });

  it("finds nothing in a flat series", () => {
    const series = makeSeries("2020-03-01T00:00:00Z", flat(100, 20));
    expect(findCriticalPoints(series, DEFAULT_THRESHOLDS).criticalPoints).toEqual([]);
  });

  it("ignores falling water", () => {
    const falling = makeSeries("2020-03-01T00:00:00Z", [...rampHeights].reverse());
    expect(findCriticalPoints(falling, DEFAULT_THRESHOLDS).criticalPoints).toEqual([]);
  });

  it("requires the rate to exceed rateCritical strictly", () => {
    // Exactly 0.5 ft/hr: 0.125 ft per 15 minutes.
    const heights = Array.from({ length: 60 }, (_, i) => 20 + 0.125 * i);
    const series = makeSeries("2020-03-01T00:00:00Z", heights);
    expect(findCriticalPoints(series, DEFAULT_THRESHOLDS).criticalPoints).toEqual([]);
  });

  it("skips readings below floorHeight + riseCritical", () => {
    const { criticalPoints } = findCriticalPoints(ramp, { ...DEFAULT_THRESHOLDS, floorHeight: 20.1 });
    expect(criticalPoints[0]).toBe(ramp[60]);
  });

  it("throws when the series is not longer than the lookback", () => {
    const short = makeSeries("2020-03-01T00:00:00Z", flat(20, 20));
    try {
      findCriticalPoints(short, DEFAULT_THRESHOLDS);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientDataError);
      if (err instanceof InsufficientDataError) {
        expect(err.readingCount).toBe(20);
        expect(err.required).toBe(21);
      }
    }
  });
});

describe("debounceCriticalPoints", () => {
  const at = (hours: number) => ({
    timestamp: new Date(Date.UTC(2020, 2, 1) + hours * HOUR),
    height: 23,
  });

  it("collapses points 5 hours apart into one notification", () => {
    expect(debounceCriticalPoints([at(0), at(5)], 12)).toHaveLength(1);
  });

  it("keeps points 13 hours apart", () => {
    expect(debounceCriticalPoints([at(0), at(13)], 12)).toHaveLength(2);
  });

  it("needs strictly more than the debounce interval", () => {
    expect(debounceCriticalPoints([at(0), at(12)], 12)).toHaveLength(1);
  });

  it("measures from the last accepted point", () => {
    const accepted = debounceCriticalPoints([at(0), at(8), at(13), at(20)], 12);
    expect(accepted.map((p) => p.timestamp.getTime())).toEqual([at(0), at(13)].map((p) => p.timestamp.getTime()));
  });
});

describe("scanCriticalPoints", () => {
  it("reports all and first critical points", () => {
    const scan = scanCriticalPoints(ramp, DEFAULT_THRESHOLDS);
    expect(scan.criticalPoints).toHaveLength(21);
    expect(scan.firstCriticalPoints).toEqual([ramp[59]]);
    expect(detectCriticalPoints(ramp, DEFAULT_THRESHOLDS)).toEqual([ramp[59]]);
  });

  it("is unaffected by a sweep running other thresholds first", () => {
    scanCriticalPoints(ramp, { ...DEFAULT_THRESHOLDS, riseCritical: 1 });
    expect(detectCriticalPoints(ramp, DEFAULT_THRESHOLDS)).toEqual([ramp[59]]);
  });
});
