export * from "./shared/types.js";
export * from "./shared/errors.js";
export * from "./shared/thresholds.js";
export { contentHash, canonicalJsonStringify, sha256Bytes } from "./shared/hash.js";

export * from "./analytics/readings.js";
export * from "./analytics/critical_points.js";
export * from "./analytics/windows.js";
export * from "./analytics/classifier.js";
export * from "./analytics/projection.js";
export { ResultsAggregator } from "./analytics/aggregator.js";

export * from "./evidence/schemas.js";
export * from "./evidence/catalog.js";
export * from "./evidence/gauge_formats.js";

export * from "./packs/types.js";
export { loadManifest, loadPack, loadSeriesFile, findRawFile } from "./packs/loader.js";
export * from "./packs/analyze.js";
export { runPackPipeline } from "./packs/pipeline.js";
export type {
  PackPipelineInput,
  PackPipelineOutput,
  WindowProjection,
  MissedEventWindow,
  AnalysisSummaryFile,
} from "./packs/pipeline.js";
export * from "./packs/sweep.js";

export { DTRRecorder, validateChain } from "./trace/dtr.js";
export { exportJSONL, generateAuditSummaryMd } from "./trace/exporters.js";
export { renderAnalysisReport } from "./exports/docx.js";
export type { ReportMeta, ReportChart } from "./exports/docx.js";
export { buildWindowChartConfig, generateWindowChart } from "./exports/chart.js";
export { buildBundleManifest, createCaseBundle } from "./exports/bundle.js";
export type { BundleFile, BundleManifest, BundleMeta } from "./exports/bundle.js";
