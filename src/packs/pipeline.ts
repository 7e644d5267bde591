/**
 * Pack Pipeline: critical point analysis of one gauge pack.
 *
 * Steps:
 * 1. Load catalog and series from the pack
 * 2. Split series at sampling gaps
 * 3. Detect critical points
 * 4. Extract event windows
 * 5. Classify windows against known events
 * 6. Aggregate the run summary
 * 7. Window missed events and project critical heights
 * 8. Render report, audit trail and bundle
 */

import { v4 as uuidv4 } from "uuid";
import { mkdirSync, writeFileSync } from "fs";
import path from "path";

import { loadPack } from "./loader.js";
import type { LoadedPack } from "./types.js";
import {
  classifySeries,
  detectInSegments,
  extractSegmentWindows,
  segmentSeries,
  aggregateRun,
} from "./analyze.js";
import type { SeriesWindow } from "./analyze.js";
import { projectThresholds } from "../analytics/projection.js";
import { extractAroundInstant, pointsInWindow } from "../analytics/windows.js";
import { toReadingSummary } from "../analytics/readings.js";
import { resolveThresholds } from "../shared/thresholds.js";
import type { ThresholdConfig, ThresholdInput } from "../shared/thresholds.js";
import { contentHash } from "../shared/hash.js";
import type {
  DTRRecord,
  OutcomeKind,
  Reading,
  ReadingSummary,
  ReadingWindow,
  RunSummary,
} from "../shared/types.js";
import { DTRRecorder } from "../trace/dtr.js";
import { exportJSONL, generateAuditSummaryMd } from "../trace/exporters.js";
import { renderAnalysisReport } from "../exports/docx.js";
import type { ReportChart } from "../exports/docx.js";
import { generateWindowChart } from "../exports/chart.js";
import { createCaseBundle } from "../exports/bundle.js";
import type { BundleFile } from "../exports/bundle.js";

export interface PackPipelineInput {
  packDir: string;
  caseId?: string;
  /** Outputs are written only when set */
  outputDir?: string;
  /** Command-line threshold overrides */
  thresholds?: ThresholdInput;
  /** Environment consulted for threshold overrides */
  env?: Record<string, string | undefined>;
  /** Render window charts through QuickChart (network) */
  charts?: boolean;
  log?: (step: string, message: string) => void;
}

export interface WindowProjection {
  seriesId: string;
  window: ReadingWindow;
  criticalPoints: Reading[];
  backward: Reading[];
  forward: Reading[];
}

export interface MissedEventWindow {
  eventId: string;
  seriesId: string;
  window: ReadingWindow;
}

export interface AnalysisSummaryFile {
  caseId: string;
  packName: string;
  gauge: { name: string; stationId?: string; units: string };
  thresholds: ThresholdConfig;
  fingerprint: string;
  summary: RunSummary;
}

export interface PackPipelineOutput {
  caseId: string;
  pack: LoadedPack;
  thresholds: ThresholdConfig;
  summary: RunSummary;
  /** Content hash of the summary; equal across runs with the same inputs */
  fingerprint: string;
  windows: SeriesWindow[];
  projections: WindowProjection[];
  missedEventWindows: MissedEventWindow[];
  dtrRecorder: DTRRecorder;
  warnings: string[];
  outputDir: string | null;
}

interface OutcomeRecord {
  kind: OutcomeKind;
  seriesId: string | null;
  criticalPoint: ReadingSummary | null;
  eventId: string | null;
  leadTimeMinutes: number | null;
}

function describeWindow(w: ReadingWindow): Record<string, unknown> {
  return {
    anchor: toReadingSummary(w.anchor),
    start: w.start.toISOString(),
    end: w.end.toISOString(),
    startIndex: w.startIndex,
    endIndex: w.endIndex,
    readingCount: w.readings.length,
  };
}

function chartFileName(seriesId: string, anchor: Reading): string {
  const stamp = anchor.timestamp.toISOString().slice(0, 16).replace(/[-:]/g, "");
  return `${seriesId}_${stamp}.png`.replace(/[^A-Za-z0-9_.-]/g, "_");
}

export async function runPackPipeline(input: PackPipelineInput): Promise<PackPipelineOutput> {
  const caseId = input.caseId ?? uuidv4();
  const recorder = new DTRRecorder(caseId);
  const log: NonNullable<PackPipelineInput["log"]> = input.log ?? (() => undefined);
  const warnings: string[] = [];

  // ═══════════════════════════════════════════════════════════════════
  // PHASE 1: Load pack
  // ═══════════════════════════════════════════════════════════════════
  const t0 = new Date();
  const pack = loadPack(input.packDir);
  const { manifest, catalog } = pack;
  warnings.push(...pack.warnings);

  const thresholds = resolveThresholds(input.thresholds, input.env, manifest.thresholds);
  const parameters = { ...thresholds };

  const primarySources: DTRRecord["inputLineage"]["primarySources"] = [
    { sourceId: manifest.catalog, sourceHash: pack.catalogHash, sourceType: "event_catalog" },
    ...pack.series.map((s) => ({
      sourceId: s.id,
      sourceHash: s.sha256,
      sourceType: s.format,
    })),
  ];

  recorder.record({
    traceType: "SERIES_INGEST",
    initiatedAt: t0,
    completedAt: new Date(),
    inputLineage: { primarySources },
    parameters,
    reasoningChain: {
      steps: [
        {
          stepNumber: 1,
          action: "load_catalog",
          detail: `${catalog.length} known events from ${manifest.catalog}`,
        },
        ...pack.series.map((s, i) => ({
          stepNumber: i + 2,
          action: "load_series",
          detail: `${s.id}: ${s.readings.length} readings (${s.rejectedRows} rejected) from ${s.filename}`,
        })),
      ],
    },
    outputContent: {
      packName: manifest.packName,
      events: catalog.length,
      series: pack.series.map((s) => ({ id: s.id, readings: s.readings.length })),
    },
    validationResults: { pass: pack.warnings.length === 0, messages: [...pack.warnings] },
  });
  log("Load", `${pack.series.length} series, ${catalog.length} known events`);

  // ═══════════════════════════════════════════════════════════════════
  // PHASE 2: Sampling validation
  // ═══════════════════════════════════════════════════════════════════
  const t1 = new Date();
  const segmented = segmentSeries(pack.series);
  warnings.push(...segmented.warnings);

  recorder.record({
    traceType: "SAMPLING_VALIDATION",
    initiatedAt: t1,
    completedAt: new Date(),
    inputLineage: { primarySources },
    parameters,
    outputContent: {
      segments: segmented.segments.map((s) => ({
        seriesId: s.seriesId,
        segmentIndex: s.segmentIndex,
        readings: s.readings.length,
      })),
    },
    validationResults: {
      pass: segmented.warnings.length === 0,
      messages: segmented.warnings,
    },
  });
  log("Sampling", `${segmented.segments.length} uniformly sampled segment(s)`);

  // ═══════════════════════════════════════════════════════════════════
  // PHASE 3: Critical point detection
  // ═══════════════════════════════════════════════════════════════════
  const t2 = new Date();
  const detected = detectInSegments(segmented.segments, thresholds);
  warnings.push(...detected.warnings);
  const firstCount = detected.scans.reduce((n, s) => n + s.scan.firstCriticalPoints.length, 0);

  recorder.record({
    traceType: "CRITICAL_POINT_DETECTION",
    initiatedAt: t2,
    completedAt: new Date(),
    inputLineage: { primarySources },
    parameters,
    reasoningChain: {
      steps: detected.scans.map((s, i) => ({
        stepNumber: i + 1,
        action: "scan_segment",
        detail: `${s.seriesId}#${s.segmentIndex}: ${s.scan.readingsPerHour} readings/hr, lookback ${s.scan.lookback}, ${s.scan.criticalPoints.length} critical, ${s.scan.firstCriticalPoints.length} first critical`,
      })),
    },
    outputContent: {
      firstCriticalPoints: detected.scans.flatMap((s) =>
        s.scan.firstCriticalPoints.map((p) => ({ seriesId: s.seriesId, ...toReadingSummary(p) }))
      ),
    },
    validationResults: { pass: detected.warnings.length === 0, messages: detected.warnings },
  });
  log("Detect", `${firstCount} notification(s)`);

  // ═══════════════════════════════════════════════════════════════════
  // PHASE 4: Window extraction
  // ═══════════════════════════════════════════════════════════════════
  const t3 = new Date();
  const windows = extractSegmentWindows(detected.scans, thresholds);

  recorder.record({
    traceType: "WINDOW_EXTRACTION",
    initiatedAt: t3,
    completedAt: new Date(),
    inputLineage: { primarySources },
    parameters,
    outputContent: {
      windows: windows.map((w) => ({ seriesId: w.seriesId, ...describeWindow(w.window) })),
    },
  });

  // ═══════════════════════════════════════════════════════════════════
  // PHASE 5: Classification
  // ═══════════════════════════════════════════════════════════════════
  const t4 = new Date();
  const classifications = classifySeries(
    pack.series.map((s) => s.id),
    windows,
    catalog
  );

  recorder.record({
    traceType: "EVENT_CLASSIFICATION",
    initiatedAt: t4,
    completedAt: new Date(),
    inputLineage: { primarySources },
    parameters,
    reasoningChain: {
      steps: classifications.map((c, i) => ({
        stepNumber: i + 1,
        action: "classify_series",
        detail: `${c.seriesId}: ${c.pass.truePositives.length} TP, ${c.pass.falsePositives.length} FP`,
      })),
    },
    outputContent: {
      claimed: classifications.map((c) => ({
        seriesId: c.seriesId,
        eventIds: c.pass.claimedEventIds,
      })),
    },
  });

  // ═══════════════════════════════════════════════════════════════════
  // PHASE 6: Run summary
  // ═══════════════════════════════════════════════════════════════════
  const t5 = new Date();
  const summary = aggregateRun(pack.series, classifications, catalog);
  const fingerprint = contentHash(summary);

  const summaryMessages = summary.unclaimedEventsInAssociatedWindows.map(
    (e) => `Event "${e.id}" fell inside an associated window but was not claimed`
  );
  warnings.push(...summaryMessages);

  recorder.record({
    traceType: "RUN_SUMMARY",
    initiatedAt: t5,
    completedAt: new Date(),
    inputLineage: { primarySources },
    parameters,
    outputContent: {
      fingerprint,
      truePositives: summary.truePositives,
      falsePositives: summary.falsePositives,
      falseNegatives: summary.falseNegatives,
      outOfRange: summary.outOfRangeEvents.length,
      precision: summary.precision,
      recall: summary.recall,
    },
    validationResults: { pass: summaryMessages.length === 0, messages: summaryMessages },
  });
  log(
    "Summary",
    `TP ${summary.truePositives} | FP ${summary.falsePositives} | FN ${summary.falseNegatives}`
  );

  // ═══════════════════════════════════════════════════════════════════
  // PHASE 7: Missed-event windows and threshold projections
  // ═══════════════════════════════════════════════════════════════════
  const t6 = new Date();
  const eventsById = new Map(catalog.map((e) => [e.id, e]));

  const missedEventWindows: MissedEventWindow[] = [];
  for (const fn of summary.falseNegativeEvents) {
    const event = eventsById.get(fn.id);
    if (!event) continue;
    for (const segment of segmented.segments) {
      const window = extractAroundInstant(
        event.timestamp,
        segment.readings,
        thresholds.windowRadiusHours
      );
      if (window) {
        missedEventWindows.push({ eventId: event.id, seriesId: segment.seriesId, window });
      }
    }
  }

  const criticalBySegment = new Map(
    detected.scans.map((s) => [`${s.seriesId}#${s.segmentIndex}`, s.scan.criticalPoints])
  );
  const projections: WindowProjection[] = windows.map((w) => {
    const stepMinutes = 60 / w.readingsPerHour;
    const options = { stepMinutes, anchorTime: w.window.end };
    return {
      seriesId: w.seriesId,
      window: w.window,
      criticalPoints: pointsInWindow(
        w.window,
        criticalBySegment.get(`${w.seriesId}#${w.segmentIndex}`) ?? []
      ),
      backward: projectThresholds(w.segment, thresholds, { ...options, direction: "backward" }),
      forward: projectThresholds(w.segment, thresholds, { ...options, direction: "forward" }),
    };
  });

  recorder.record({
    traceType: "THRESHOLD_PROJECTION",
    initiatedAt: t6,
    completedAt: new Date(),
    inputLineage: { primarySources },
    parameters,
    outputContent: {
      projections: projections.map((p) => ({
        seriesId: p.seriesId,
        anchor: toReadingSummary(p.window.anchor),
        backward: p.backward.length,
        forward: p.forward.length,
      })),
      missedEventWindows: missedEventWindows.map((m) => ({
        eventId: m.eventId,
        seriesId: m.seriesId,
        start: m.window.start.toISOString(),
        end: m.window.end.toISOString(),
      })),
    },
  });

  const output: PackPipelineOutput = {
    caseId,
    pack,
    thresholds,
    summary,
    fingerprint,
    windows,
    projections,
    missedEventWindows,
    dtrRecorder: recorder,
    warnings,
    outputDir: null,
  };

  if (!input.outputDir) return output;

  // ═══════════════════════════════════════════════════════════════════
  // PHASE 8: Render and write outputs
  // ═══════════════════════════════════════════════════════════════════
  const t7 = new Date();
  const outDir = input.outputDir;

  const charts: Array<ReportChart & { fileName: string }> = [];
  if (input.charts) {
    for (const p of projections) {
      const title = `${p.seriesId}: critical point ${p.window.anchor.timestamp.toISOString()}`;
      try {
        const image = await generateWindowChart({
          window: p.window,
          criticalPoints: p.criticalPoints,
          projection: p.backward,
          events: catalog,
          title,
        });
        charts.push({ title, image, fileName: chartFileName(p.seriesId, p.window.anchor) });
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        warnings.push(`Chart for ${title} not rendered: ${reason}`);
      }
    }
    log("Charts", `${charts.length}/${projections.length} rendered`);
  }

  const summaryFile: AnalysisSummaryFile = {
    caseId,
    packName: manifest.packName,
    gauge: manifest.gauge,
    thresholds,
    fingerprint,
    summary,
  };

  const outcomes: OutcomeRecord[] = [
    ...classifications.flatMap((c) => [
      ...c.pass.truePositives.map(
        (tp): OutcomeRecord => ({
          kind: tp.kind,
          seriesId: c.seriesId,
          criticalPoint: toReadingSummary(tp.criticalPoint),
          eventId: tp.event.id,
          leadTimeMinutes: tp.leadTimeMinutes,
        })
      ),
      ...c.pass.falsePositives.map(
        (fp): OutcomeRecord => ({
          kind: fp.kind,
          seriesId: c.seriesId,
          criticalPoint: toReadingSummary(fp.criticalPoint),
          eventId: null,
          leadTimeMinutes: null,
        })
      ),
    ]),
  ].sort(
    (a, b) =>
      (a.criticalPoint?.timestamp ?? "").localeCompare(b.criticalPoint?.timestamp ?? "") ||
      (a.seriesId ?? "").localeCompare(b.seriesId ?? "")
  );
  outcomes.push(
    ...summary.falseNegativeEvents.map(
      (e): OutcomeRecord => ({
        kind: "FALSE_NEGATIVE",
        seriesId: null,
        criticalPoint: null,
        eventId: e.id,
        leadTimeMinutes: null,
      })
    )
  );

  const windowsFile = {
    windows: projections.map((p) => ({
      seriesId: p.seriesId,
      ...describeWindow(p.window),
      criticalPoints: p.criticalPoints.map(toReadingSummary),
      backwardProjection: p.backward.map(toReadingSummary),
      forwardProjection: p.forward.map(toReadingSummary),
    })),
    missedEvents: missedEventWindows.map((m) => ({
      eventId: m.eventId,
      seriesId: m.seriesId,
      ...describeWindow(m.window),
    })),
  };

  const reportDocx = await renderAnalysisReport(
    summary,
    catalog,
    {
      packName: manifest.packName,
      gaugeName: manifest.gauge.name,
      stationId: manifest.gauge.stationId,
      caseId,
      thresholds,
      seriesIds: pack.series.map((s) => s.id),
    },
    charts
  );

  const files: BundleFile[] = [
    { name: "summary.json", content: JSON.stringify(summaryFile, null, 2) },
    { name: "outcomes.json", content: JSON.stringify(outcomes, null, 2) },
    { name: "windows.json", content: JSON.stringify(windowsFile, null, 2) },
    { name: "report.docx", content: reportDocx },
    ...charts.map((c) => ({ name: `charts/${c.fileName}`, content: c.image })),
  ];

  recorder.record({
    traceType: "EXPORT_GENERATION",
    initiatedAt: t7,
    completedAt: new Date(),
    inputLineage: { primarySources },
    parameters,
    reasoningChain: {
      steps: files.map((f, i) => ({
        stepNumber: i + 1,
        action: "render",
        detail: `${f.name}: ${Buffer.byteLength(f.content)} bytes`,
      })),
    },
    outputContent: { files: files.map((f) => f.name), charts: charts.length },
  });

  const chain = recorder.getChain();
  files.push(
    { name: "audit/trace.jsonl", content: exportJSONL(chain) },
    { name: "audit/audit_summary.md", content: generateAuditSummaryMd(chain, caseId) }
  );
  const zipBuffer = await createCaseBundle(files, { caseId, generatedAt: t7, fingerprint });

  for (const file of files) {
    const target = path.join(outDir, file.name);
    mkdirSync(path.dirname(target), { recursive: true });
    writeFileSync(target, file.content);
  }
  writeFileSync(path.join(outDir, "bundle.zip"), zipBuffer);
  log("Export", `${files.length + 1} files written to ${outDir}`);

  return { ...output, outputDir: outDir };
}
