/**
 * Known event catalog: strict loading of landslide (or other hazard) events.
 *
 * Every record must match KnownEventSchema; unknown keys are rejected rather
 * than attached to the event.
 */

import { readFileSync, existsSync } from "fs";
import { CatalogValidationError } from "../shared/errors.js";
import { KnownEventCatalogSchema } from "./schemas.js";
import type { KnownEvent } from "./schemas.js";
import type { EventSummary } from "../shared/types.js";

/**
 * Validate a parsed JSON catalog. Returns events in chronological order
 * (ties broken by id).
 */
export function parseEventCatalog(raw: unknown): KnownEvent[] {
  const result = KnownEventCatalogSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new CatalogValidationError(
      `Event catalog failed validation with ${issues.length} issue(s): ${issues.join("; ")}`,
      issues
    );
  }
  return sortEvents(result.data);
}

/**
 * Load and validate a catalog JSON file.
 */
export function loadEventCatalog(filePath: string): KnownEvent[] {
  if (!existsSync(filePath)) {
    throw new Error(`Event catalog not found: ${filePath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogValidationError(`Event catalog is not valid JSON: ${filePath}`, [reason]);
  }
  return parseEventCatalog(raw);
}

export function sortEvents(events: readonly KnownEvent[]): KnownEvent[] {
  return [...events].sort(
    (a, b) =>
      a.timestamp.getTime() - b.timestamp.getTime() || a.id.localeCompare(b.id)
  );
}

export function toEventSummary(event: KnownEvent): EventSummary {
  return {
    id: event.id,
    name: event.name,
    timestamp: event.timestamp.toISOString(),
    location: event.location,
  };
}
