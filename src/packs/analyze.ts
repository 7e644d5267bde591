/**
 * Analysis steps shared by the pack pipeline and the threshold sweep.
 *
 * Each step is a plain function of its inputs and the thresholds, so a sweep
 * can run any number of configurations over one loaded pack.
 */

import type { KnownEvent } from "../evidence/schemas.js";
import { ResultsAggregator } from "../analytics/aggregator.js";
import { classifyWindows } from "../analytics/classifier.js";
import { scanCriticalPoints } from "../analytics/critical_points.js";
import { splitAtGaps } from "../analytics/readings.js";
import { extractWindow } from "../analytics/windows.js";
import { InsufficientDataError, NonUniformSamplingError } from "../shared/errors.js";
import type { ThresholdConfig } from "../shared/thresholds.js";
import type {
  CriticalPointScan,
  ReadingSeries,
  ReadingWindow,
  RunSummary,
  WindowClassification,
} from "../shared/types.js";
import type { LoadedSeries } from "./types.js";

/** A uniformly sampled run of readings within one series. */
export interface SeriesSegment {
  seriesId: string;
  segmentIndex: number;
  readings: ReadingSeries;
}

export interface SegmentScan extends SeriesSegment {
  scan: CriticalPointScan;
}

export interface SeriesWindow {
  seriesId: string;
  segmentIndex: number;
  readingsPerHour: number;
  /** The segment the window was cut from */
  segment: ReadingSeries;
  window: ReadingWindow;
}

export interface SeriesClassification {
  seriesId: string;
  pass: WindowClassification;
}

export interface PackAnalysis {
  segments: SeriesSegment[];
  scans: SegmentScan[];
  windows: SeriesWindow[];
  classifications: SeriesClassification[];
  summary: RunSummary;
  warnings: string[];
}

/**
 * Split every series at sampling gaps.
 */
export function segmentSeries(series: readonly LoadedSeries[]): {
  segments: SeriesSegment[];
  warnings: string[];
} {
  const segments: SeriesSegment[] = [];
  const warnings: string[] = [];

  for (const s of series) {
    const parts = splitAtGaps(s.readings);
    if (parts.length > 1) {
      warnings.push(`${s.id}: split into ${parts.length} segments at sampling gaps`);
    }
    parts.forEach((readings, segmentIndex) => {
      segments.push({ seriesId: s.id, segmentIndex, readings });
    });
  }

  return { segments, warnings };
}

/**
 * Scan each segment for critical points. Segments too short for the
 * lookback, or sampled at a rate that does not divide an hour, are skipped
 * with a warning.
 */
export function detectInSegments(
  segments: readonly SeriesSegment[],
  thresholds: ThresholdConfig
): { scans: SegmentScan[]; warnings: string[] } {
  const scans: SegmentScan[] = [];
  const warnings: string[] = [];

  for (const segment of segments) {
    try {
      scans.push({ ...segment, scan: scanCriticalPoints(segment.readings, thresholds) });
    } catch (err) {
      if (err instanceof InsufficientDataError || err instanceof NonUniformSamplingError) {
        warnings.push(`${segment.seriesId} segment ${segment.segmentIndex} skipped: ${err.message}`);
        continue;
      }
      throw err;
    }
  }

  return { scans, warnings };
}

/**
 * One window per first critical point.
 */
export function extractSegmentWindows(
  scans: readonly SegmentScan[],
  thresholds: ThresholdConfig
): SeriesWindow[] {
  return scans.flatMap((s) =>
    s.scan.firstCriticalPoints.map((point) => ({
      seriesId: s.seriesId,
      segmentIndex: s.segmentIndex,
      readingsPerHour: s.scan.readingsPerHour,
      segment: s.readings,
      window: extractWindow(point, s.readings, thresholds.windowRadiusHours),
    }))
  );
}

/**
 * True/false positive pass per series. Series are independent: an event
 * can be claimed once in each.
 */
export function classifySeries(
  seriesIds: readonly string[],
  windows: readonly SeriesWindow[],
  catalog: readonly KnownEvent[]
): SeriesClassification[] {
  return seriesIds.map((seriesId) => ({
    seriesId,
    pass: classifyWindows(
      windows.filter((w) => w.seriesId === seriesId).map((w) => w.window),
      catalog
    ),
  }));
}

export function aggregateRun(
  series: readonly LoadedSeries[],
  classifications: readonly SeriesClassification[],
  catalog: readonly KnownEvent[]
): RunSummary {
  const aggregator = new ResultsAggregator(catalog);
  for (const s of series) aggregator.observeSeries(s.readings);
  for (const c of classifications) aggregator.accumulate(c.pass);
  return aggregator.summarize();
}

/**
 * Every analysis step in order, without side effects.
 */
export function analyzeSeries(
  series: readonly LoadedSeries[],
  catalog: readonly KnownEvent[],
  thresholds: ThresholdConfig
): PackAnalysis {
  const segmented = segmentSeries(series);
  const detected = detectInSegments(segmented.segments, thresholds);
  const windows = extractSegmentWindows(detected.scans, thresholds);
  const classifications = classifySeries(
    series.map((s) => s.id),
    windows,
    catalog
  );

  return {
    segments: segmented.segments,
    scans: detected.scans,
    windows,
    classifications,
    summary: aggregateRun(series, classifications, catalog),
    warnings: [...segmented.warnings, ...detected.warnings],
  };
}
