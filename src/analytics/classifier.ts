import type { KnownEvent } from "../evidence/schemas.js";
import { sortEvents } from "../evidence/catalog.js";
import type {
  ClassificationOutcome,
  ClassificationResult,
  FalseNegativeOutcome,
  FalsePositiveOutcome,
  Reading,
  ReadingWindow,
  TimeRange,
  TruePositiveOutcome,
  UnclaimedWindowEvent,
  WindowClassification,
} from "../shared/types.js";
import { MS_PER_MINUTE } from "./readings.js";
import { windowContains } from "./windows.js";

/**
 * Minutes from the critical point to the event, truncated toward zero.
 * Negative when the event came first.
 */
export function leadTimeMinutes(event: KnownEvent, criticalPoint: Reading): number {
  return Math.trunc(
    (event.timestamp.getTime() - criticalPoint.timestamp.getTime()) / MS_PER_MINUTE
  );
}

/**
 * True/false positive pass over the windows of one series.
 *
 * Each window claims at most one event: the earliest unclaimed event inside
 * [window.start, window.end]. Any further unclaimed events inside that window
 * are reported in `unclaimedInAssociatedWindows` rather than dropped.
 */
export function classifyWindows(
  windows: readonly ReadingWindow[],
  events: readonly KnownEvent[],
  alreadyClaimed: ReadonlySet<string> = new Set()
): WindowClassification {
  const ordered = sortEvents(events);
  const claimed = new Map<string, boolean>(
    ordered.map((e) => [e.id, alreadyClaimed.has(e.id)])
  );
  const sortedWindows = [...windows].sort(
    (a, b) => a.anchor.timestamp.getTime() - b.anchor.timestamp.getTime()
  );

  const truePositives: TruePositiveOutcome[] = [];
  const falsePositives: FalsePositiveOutcome[] = [];
  const unclaimedInAssociatedWindows: UnclaimedWindowEvent[] = [];
  const claimedEventIds: string[] = [];

  for (const window of sortedWindows) {
    const candidates = ordered.filter(
      (e) => claimed.get(e.id) === false && windowContains(window, e.timestamp)
    );

    if (candidates.length === 0) {
      falsePositives.push({ kind: "FALSE_POSITIVE", criticalPoint: window.anchor });
      continue;
    }

    const [event, ...others] = candidates;
    const leadTime = leadTimeMinutes(event, window.anchor);
    truePositives.push({
      kind: "TRUE_POSITIVE",
      criticalPoint: window.anchor,
      event,
      leadTimeMinutes: leadTime,
      detectedAfterEvent: leadTime < 0,
    });
    claimed.set(event.id, true);
    claimedEventIds.push(event.id);

    for (const other of others) {
      unclaimedInAssociatedWindows.push({ event: other, windowAnchor: window.anchor });
    }
  }

  return { truePositives, falsePositives, unclaimedInAssociatedWindows, claimedEventIds };
}

/**
 * Events never claimed by a window: false negatives when inside the analyzed
 * range, otherwise out of range and left unscored.
 */
export function resolveUnclaimedEvents(
  events: readonly KnownEvent[],
  claimedEventIds: ReadonlySet<string>,
  analyzedRange: TimeRange | null
): { falseNegatives: FalseNegativeOutcome[]; outOfRange: KnownEvent[] } {
  const falseNegatives: FalseNegativeOutcome[] = [];
  const outOfRange: KnownEvent[] = [];

  for (const event of sortEvents(events)) {
    if (claimedEventIds.has(event.id)) continue;
    if (analyzedRange && windowContains(analyzedRange, event.timestamp)) {
      falseNegatives.push({ kind: "FALSE_NEGATIVE", event });
    } else {
      outOfRange.push(event);
    }
  }

  return { falseNegatives, outOfRange };
}

/**
 * Classify critical-point windows against the known events.
 */
export function classify(
  windows: readonly ReadingWindow[],
  events: readonly KnownEvent[],
  analyzedRange: TimeRange | null
): ClassificationResult {
  const pass = classifyWindows(windows, events);
  const claimedIds = new Set(pass.claimedEventIds);
  const { falseNegatives, outOfRange } = resolveUnclaimedEvents(events, claimedIds, analyzedRange);

  const positives: Array<TruePositiveOutcome | FalsePositiveOutcome> = [
    ...pass.truePositives,
    ...pass.falsePositives,
  ].sort(
    (a, b) => a.criticalPoint.timestamp.getTime() - b.criticalPoint.timestamp.getTime()
  );
  const outcomes: ClassificationOutcome[] = [...positives, ...falseNegatives];

  return {
    outcomes,
    outOfRange,
    unclaimedInAssociatedWindows: pass.unclaimedInAssociatedWindows.filter(
      (u) => !claimedIds.has(u.event.id)
    ),
  };
}
