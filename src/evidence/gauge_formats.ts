/**
 * Gauge file parsers.
 *
 * - readings_csv:   "timestamp,height" with ISO-8601 timestamps.
 * - historical_csv: "Date,Type Source,Stage" export; timestamps in UTC.
 *                   Preamble lines and 0000-00-00 placeholder rows are ignored.
 * - usgs_rdb:       USGS archival tab-delimited rows, local Alaska time
 *                   (AKST/AKDT) converted to UTC.
 */

import { parse } from "csv-parse/sync";
import type { GaugeFileFormat, Reading } from "../shared/types.js";
import { ReadingRowSchema, validateRecords } from "./schemas.js";

export interface ParsedReadings {
  readings: Reading[];
  errors: Array<{ index: number; issues: string[] }>;
}

/** UTC offsets of the time zone codes found in USGS exports. */
export const USGS_TIME_ZONE_OFFSETS: Record<string, string> = {
  AKST: "-09:00",
  AKDT: "-08:00",
  PST: "-08:00",
  PDT: "-07:00",
  UTC: "+00:00",
  GMT: "+00:00",
};

const HISTORICAL_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;
const USGS_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/;

interface Candidate {
  /** Row number in the source file, for error reporting */
  row: number;
  timestamp: string;
  height: string | undefined;
}

function toCells(row: unknown): string[] {
  return Array.isArray(row) ? row.map((cell) => String(cell).trim()) : [];
}

function validateCandidates(
  candidates: Candidate[],
  rowErrors: ParsedReadings["errors"]
): ParsedReadings {
  const { valid, errors } = validateRecords(
    candidates.map(({ timestamp, height }) => ({ timestamp, height })),
    ReadingRowSchema
  );
  const remapped = errors.map((e) => ({ index: candidates[e.index].row, issues: e.issues }));
  return {
    readings: valid,
    errors: [...rowErrors, ...remapped].sort((a, b) => a.index - b.index),
  };
}

export function parseReadingsCsv(content: string): ParsedReadings {
  const records: unknown[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  const { valid, errors } = validateRecords(records, ReadingRowSchema);
  return { readings: valid, errors };
}

export function parseHistoricalCsv(content: string): ParsedReadings {
  const rows: unknown[] = parse(content, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });

  const candidates: Candidate[] = [];
  rows.map(toCells).forEach((row, index) => {
    const stamp = row[0] ?? "";
    if (!HISTORICAL_TIMESTAMP.test(stamp) || stamp.startsWith("0000")) return;
    candidates.push({ row: index, timestamp: `${stamp}+00:00`, height: row[2] });
  });

  return validateCandidates(candidates, []);
}

/**
 * Normalise a USGS data row. Some exports are space-aligned instead of
 * tab-delimited, in which case the whole row arrives as one cell.
 */
function usgsFields(cells: string[]): string[] {
  if (cells.length > 1) return cells;
  const tokens = (cells[0] ?? "").trim().split(/\s+/);
  if (tokens.length < 6) return tokens;
  return [tokens[0], tokens[1], `${tokens[2]} ${tokens[3]}`, ...tokens.slice(4)];
}

export function parseUsgsRdb(content: string): ParsedReadings {
  const rows: unknown[] = parse(content, {
    delimiter: "\t",
    comment: "#",
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });

  const candidates: Candidate[] = [];
  const errors: ParsedReadings["errors"] = [];

  rows.map(toCells).forEach((cells, index) => {
    const fields = usgsFields(cells);
    if (fields[0] !== "USGS") return;

    const [, , stamp = "", zone = "", stage] = fields;
    const offset = USGS_TIME_ZONE_OFFSETS[zone];
    if (!USGS_TIMESTAMP.test(stamp) || offset === undefined) {
      errors.push({ index, issues: [`timestamp: unrecognised "${stamp}" ${zone}`] });
      return;
    }
    candidates.push({ row: index, timestamp: `${stamp}:00${offset}`, height: stage });
  });

  return validateCandidates(candidates, errors);
}

export function parseGaugeFile(content: string, format: GaugeFileFormat): ParsedReadings {
  switch (format) {
    case "readings_csv":
      return parseReadingsCsv(content);
    case "historical_csv":
      return parseHistoricalCsv(content);
    case "usgs_rdb":
      return parseUsgsRdb(content);
  }
}
