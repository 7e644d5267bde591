import type { KnownEvent } from "../evidence/schemas.js";

/** Direction of a threshold projection relative to its anchor time */
export type ProjectionDirection = "forward" | "backward";

/** Classification outcome kinds */
export type OutcomeKind = "TRUE_POSITIVE" | "FALSE_POSITIVE" | "FALSE_NEGATIVE";

/** Supported raw gauge file formats */
export type GaugeFileFormat = "readings_csv" | "historical_csv" | "usgs_rdb";

/** DTR types */
export type DTRType =
  | "SERIES_INGEST"
  | "SAMPLING_VALIDATION"
  | "CRITICAL_POINT_DETECTION"
  | "WINDOW_EXTRACTION"
  | "EVENT_CLASSIFICATION"
  | "THRESHOLD_PROJECTION"
  | "RUN_SUMMARY"
  | "EXPORT_GENERATION";

/** A single gauge reading. Heights are in feet. */
export interface Reading {
  readonly timestamp: Date;
  readonly height: number;
}

/** Readings in strictly ascending timestamp order */
export type ReadingSeries = readonly Reading[];

/** Closed instant range [start, end] */
export interface TimeRange {
  start: Date;
  end: Date;
}

/**
 * Contiguous slice of a series around an anchor reading.
 * Indices refer to the source series; `endIndex` is exclusive.
 */
export interface ReadingWindow {
  anchor: Reading;
  anchorIndex: number;
  startIndex: number;
  endIndex: number;
  start: Date;
  end: Date;
  readings: ReadingSeries;
}

/** Result of scanning one uniformly sampled series */
export interface CriticalPointScan {
  readingsPerHour: number;
  lookback: number;
  criticalPoints: Reading[];
  firstCriticalPoints: Reading[];
}

export interface TruePositiveOutcome {
  kind: "TRUE_POSITIVE";
  criticalPoint: Reading;
  event: KnownEvent;
  leadTimeMinutes: number;
  /** Lead time is negative: the event preceded its critical point. */
  detectedAfterEvent: boolean;
}

export interface FalsePositiveOutcome {
  kind: "FALSE_POSITIVE";
  criticalPoint: Reading;
}

export interface FalseNegativeOutcome {
  kind: "FALSE_NEGATIVE";
  event: KnownEvent;
}

export type ClassificationOutcome =
  | TruePositiveOutcome
  | FalsePositiveOutcome
  | FalseNegativeOutcome;

/** Event that fell inside an already-associated window without being claimed */
export interface UnclaimedWindowEvent {
  event: KnownEvent;
  windowAnchor: Reading;
}

/** TP/FP pass over the windows of one series */
export interface WindowClassification {
  truePositives: TruePositiveOutcome[];
  falsePositives: FalsePositiveOutcome[];
  unclaimedInAssociatedWindows: UnclaimedWindowEvent[];
  claimedEventIds: string[];
}

/** Full classification of a batch of windows against the catalog */
export interface ClassificationResult {
  outcomes: ClassificationOutcome[];
  outOfRange: KnownEvent[];
  unclaimedInAssociatedWindows: UnclaimedWindowEvent[];
}

// ── Serializable summary ───────────────────────────────────────────

export interface ReadingSummary {
  timestamp: string;
  height: number;
}

export interface EventSummary {
  id: string;
  name: string;
  timestamp: string;
  location: string;
}

export interface TruePositiveSummary {
  event: EventSummary;
  criticalPoint: ReadingSummary;
  leadTimeMinutes: number;
  detectedAfterEvent: boolean;
}

export interface LeadTimeStats {
  min: number;
  max: number;
  mean: number;
  median: number;
}

/** Final report of an analysis run */
export interface RunSummary {
  notificationsIssued: number;
  associatedNotifications: number;
  unassociatedNotifications: number;
  truePositives: number;
  falsePositives: number;
  falseNegatives: number;
  precision: number | null;
  recall: number | null;
  truePositiveDetails: TruePositiveSummary[];
  unassociatedNotificationPoints: ReadingSummary[];
  falseNegativeEvents: EventSummary[];
  outOfRangeEvents: EventSummary[];
  unclaimedEventsInAssociatedWindows: EventSummary[];
  /** Event id → lead time in minutes */
  notificationTimes: Record<string, number>;
  leadTimeStats: LeadTimeStats | null;
  earliestReading: string | null;
  latestReading: string | null;
}

// ── Decision trace ─────────────────────────────────────────────────

export interface DTRRecord {
  traceId: string;
  caseId: string;
  traceType: DTRType;
  chainPosition: number;
  initiatedAt: string;
  completedAt: string;
  durationMs: number;
  inputLineage: {
    primarySources: Array<{
      sourceId: string;
      sourceHash: string;
      sourceType: string;
    }>;
  };
  parameters?: Record<string, unknown>;
  reasoningChain?: {
    steps: Array<{
      stepNumber: number;
      action: string;
      detail: string;
    }>;
  };
  outputContent?: Record<string, unknown>;
  validationResults?: {
    pass: boolean;
    messages: string[];
  };
  hashChain: {
    contentHash: string;
    previousHash: string | null;
    merkleRoot: string;
  };
}
