/**
 * ResultsAggregator: the one mutable accumulator of an analysis run.
 *
 * Series observations and classification passes are appended as they are
 * produced; `summarize()` finalizes the run and resolves false negatives
 * against the overall reading range. Nothing reads partial state: the only
 * output is the summary.
 */

import type { KnownEvent } from "../evidence/schemas.js";
import { sortEvents, toEventSummary } from "../evidence/catalog.js";
import type {
  FalsePositiveOutcome,
  ReadingSeries,
  RunSummary,
  TruePositiveOutcome,
  UnclaimedWindowEvent,
  WindowClassification,
} from "../shared/types.js";
import { resolveUnclaimedEvents } from "./classifier.js";
import { toReadingSummary } from "./readings.js";
import { mean, median, ratio, round } from "./stats.js";

export class ResultsAggregator {
  private readonly events: KnownEvent[];
  private readonly catalogIds: Set<string>;
  private notificationsIssued = 0;
  private truePositives: TruePositiveOutcome[] = [];
  private falsePositives: FalsePositiveOutcome[] = [];
  private unclaimedInWindows: UnclaimedWindowEvent[] = [];
  private claimed = new Map<string, boolean>();
  private earliest: Date | null = null;
  private latest: Date | null = null;
  private summary: RunSummary | null = null;

  constructor(events: readonly KnownEvent[]) {
    this.events = sortEvents(events);
    this.catalogIds = new Set(this.events.map((e) => e.id));
    for (const event of this.events) {
      this.claimed.set(event.id, false);
    }
  }

  private assertOpen(operation: string): void {
    if (this.summary) {
      throw new Error(`ResultsAggregator: cannot ${operation} after summarize()`);
    }
  }

  /** Widen the analyzed range to cover a processed series. */
  observeSeries(series: ReadingSeries): void {
    this.assertOpen("observe a series");
    if (series.length === 0) return;
    this.widenRange(series[0].timestamp, series[series.length - 1].timestamp);
  }

  private widenRange(first: Date, last: Date): void {
    if (!this.earliest || first.getTime() < this.earliest.getTime()) {
      this.earliest = first;
    }
    if (!this.latest || last.getTime() > this.latest.getTime()) {
      this.latest = last;
    }
  }

  /** Record the TP/FP pass of one series. */
  accumulate(pass: WindowClassification): void {
    this.assertOpen("accumulate");
    for (const tp of pass.truePositives) {
      if (!this.catalogIds.has(tp.event.id)) {
        throw new Error(
          `ResultsAggregator: true positive refers to event "${tp.event.id}" outside the catalog`
        );
      }
    }

    this.notificationsIssued += pass.truePositives.length + pass.falsePositives.length;
    this.truePositives.push(...pass.truePositives);
    this.falsePositives.push(...pass.falsePositives);
    this.unclaimedInWindows.push(...pass.unclaimedInAssociatedWindows);
    for (const tp of pass.truePositives) {
      this.claimed.set(tp.event.id, true);
    }
  }

  /** Fold another worker's aggregator (same catalog) into this one. */
  merge(other: ResultsAggregator): void {
    this.assertOpen("merge");
    const sameCatalog =
      other.catalogIds.size === this.catalogIds.size &&
      [...other.catalogIds].every((id) => this.catalogIds.has(id));
    if (!sameCatalog) {
      throw new Error("ResultsAggregator: cannot merge aggregators built on different catalogs");
    }

    this.notificationsIssued += other.notificationsIssued;
    this.truePositives.push(...other.truePositives);
    this.falsePositives.push(...other.falsePositives);
    this.unclaimedInWindows.push(...other.unclaimedInWindows);
    for (const [id, isClaimed] of other.claimed) {
      if (isClaimed) this.claimed.set(id, true);
    }
    if (other.earliest && other.latest) {
      this.widenRange(other.earliest, other.latest);
    }
  }

  /**
   * Finalize the run. Lists are ordered chronologically so the result does
   * not depend on the order series were processed or merged.
   */
  summarize(): RunSummary {
    if (this.summary) return this.summary;

    const claimedIds = new Set(
      [...this.claimed.entries()].filter(([, isClaimed]) => isClaimed).map(([id]) => id)
    );
    const range =
      this.earliest && this.latest ? { start: this.earliest, end: this.latest } : null;
    const { falseNegatives, outOfRange } = resolveUnclaimedEvents(this.events, claimedIds, range);

    const truePositives = [...this.truePositives].sort(
      (a, b) =>
        a.criticalPoint.timestamp.getTime() - b.criticalPoint.timestamp.getTime() ||
        a.event.id.localeCompare(b.event.id)
    );
    const falsePositives = [...this.falsePositives].sort(
      (a, b) => a.criticalPoint.timestamp.getTime() - b.criticalPoint.timestamp.getTime()
    );

    // The first (earliest) notification associated with an event sets its lead time.
    const notificationTimes: Record<string, number> = {};
    for (const tp of truePositives) {
      if (!(tp.event.id in notificationTimes)) {
        notificationTimes[tp.event.id] = tp.leadTimeMinutes;
      }
    }

    const unclaimed = new Map<string, KnownEvent>();
    for (const u of this.unclaimedInWindows) {
      if (!claimedIds.has(u.event.id)) unclaimed.set(u.event.id, u.event);
    }

    const leadTimes = truePositives.map((tp) => tp.leadTimeMinutes);
    const eventsFound = claimedIds.size;

    this.summary = {
      notificationsIssued: this.notificationsIssued,
      associatedNotifications: truePositives.length,
      unassociatedNotifications: falsePositives.length,
      truePositives: truePositives.length,
      falsePositives: falsePositives.length,
      falseNegatives: falseNegatives.length,
      precision: ratio(truePositives.length, truePositives.length + falsePositives.length),
      recall: ratio(eventsFound, eventsFound + falseNegatives.length),
      truePositiveDetails: truePositives.map((tp) => ({
        event: toEventSummary(tp.event),
        criticalPoint: toReadingSummary(tp.criticalPoint),
        leadTimeMinutes: tp.leadTimeMinutes,
        detectedAfterEvent: tp.detectedAfterEvent,
      })),
      unassociatedNotificationPoints: falsePositives.map((fp) =>
        toReadingSummary(fp.criticalPoint)
      ),
      falseNegativeEvents: falseNegatives.map((fn) => toEventSummary(fn.event)),
      outOfRangeEvents: outOfRange.map(toEventSummary),
      unclaimedEventsInAssociatedWindows: sortEvents([...unclaimed.values()]).map(
        toEventSummary
      ),
      notificationTimes,
      leadTimeStats:
        leadTimes.length > 0
          ? {
              min: Math.min(...leadTimes),
              max: Math.max(...leadTimes),
              mean: round(mean(leadTimes), 2),
              median: median(leadTimes),
            }
          : null,
      earliestReading: this.earliest ? this.earliest.toISOString() : null,
      latestReading: this.latest ? this.latest.toISOString() : null,
    };
    return this.summary;
  }
}
