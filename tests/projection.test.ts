import { describe, it, expect } from "vitest";
import { minimalCriticalHeight, projectThresholds } from "../src/analytics/projection.js";
import { DEFAULT_THRESHOLDS } from "../src/shared/thresholds.js";
import { flat, makeSeries, MINUTE } from "./helpers.js";

describe("minimalCriticalHeight", () => {
  it("adds the critical rise to the window minimum", () => {
    const window = makeSeries("2020-10-01T00:00:00Z", flat(20, 20.5));
    expect(minimalCriticalHeight(window, DEFAULT_THRESHOLDS)).toBe(23);
  });

  it("raises the height until the average rate is critical", () => {
    // min + rise = 22.5, only 0.3 ft/hr above the first reading of 21.
    const window = makeSeries("2020-10-01T00:00:00Z", [21, 20, 20, 20]);
    expect(minimalCriticalHeight(window, DEFAULT_THRESHOLDS)).toBe(23.5);
  });
});

describe("projectThresholds", () => {
  it("projects forward, feeding projected values back in", () => {
    const series = makeSeries("2020-10-01T00:00:00Z", flat(48, 20.5));
    const projection = projectThresholds(series, DEFAULT_THRESHOLDS, { direction: "forward" });

    expect(projection).toHaveLength(48);
    expect(projection[0].timestamp.getTime()).toBe(
      series[47].timestamp.getTime() + 15 * MINUTE
    );
    expect(projection.slice(0, 20).every((r) => r.height === 23)).toBe(true);
    // After five hours only projected values remain in the look-back.
    expect(projection[20].height).toBe(25.5);
  });

  it("honours count and step", () => {
    const series = makeSeries("2020-10-01T00:00:00Z", flat(12, 20), 60);
    const projection = projectThresholds(series, DEFAULT_THRESHOLDS, {
      direction: "forward",
      stepMinutes: 60,
      count: 3,
    });
    expect(projection.map((r) => r.timestamp.toISOString())).toEqual([
      "2020-10-01T12:00:00.000Z",
      "2020-10-01T13:00:00.000Z",
      "2020-10-01T14:00:00.000Z",
    ]);
  });

  it("projects backward against real readings only", () => {
    const series = makeSeries("2020-10-01T00:00:00Z", flat(100, 20));
    const projection = projectThresholds(series, DEFAULT_THRESHOLDS, {
      direction: "backward",
      count: 4,
    });
    expect(projection).toEqual(
      series.slice(96).map((r) => ({ timestamp: r.timestamp, height: 22.5 }))
    );
  });

  it("returns nothing backward from the first reading", () => {
    const series = makeSeries("2020-10-01T00:00:00Z", flat(100, 20));
    const projection = projectThresholds(series, DEFAULT_THRESHOLDS, {
      direction: "backward",
      count: 4,
      anchorTime: series[0].timestamp,
    });
    expect(projection).toEqual([]);
  });

  it("returns nothing for an empty series", () => {
    expect(projectThresholds([], DEFAULT_THRESHOLDS, { direction: "forward" })).toEqual([]);
  });

  it("rejects a non-positive step", () => {
    const series = makeSeries("2020-10-01T00:00:00Z", flat(4, 20));
    expect(() =>
      projectThresholds(series, DEFAULT_THRESHOLDS, { direction: "forward", stepMinutes: 0 })
    ).toThrow(RangeError);
  });
});
