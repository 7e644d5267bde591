/**
 * Pack Loader: reads the pack manifest, the known event catalog and every
 * gauge series named in it.
 *
 * Missing or unusable required inputs throw. Recoverable problems (rows that
 * fail validation) are collected as warnings.
 */

import { readFileSync, existsSync } from "fs";
import path from "path";

import { PackManifestSchema } from "./types.js";
import type { LoadedPack, LoadedSeries, PackManifest, SeriesDescriptor } from "./types.js";
import { parseEventCatalog } from "../evidence/catalog.js";
import { parseGaugeFile } from "../evidence/gauge_formats.js";
import { buildReadingSeries } from "../analytics/readings.js";
import { CatalogValidationError } from "../shared/errors.js";
import { sha256Bytes } from "../shared/hash.js";

export const MANIFEST_FILENAME = "pack.manifest.json";

/**
 * Load a pack manifest from the pack directory.
 */
export function loadManifest(packDir: string): PackManifest {
  const manifestPath = path.join(packDir, MANIFEST_FILENAME);
  if (!existsSync(manifestPath)) {
    throw new Error(`Pack manifest not found: ${manifestPath}`);
  }
  const raw: unknown = JSON.parse(readFileSync(manifestPath, "utf-8"));
  return PackManifestSchema.parse(raw);
}

/**
 * Find the raw file path within the pack directory.
 * Checks both /raw/ subdirectory and pack root.
 */
export function findRawFile(packDir: string, filename: string): string {
  const rawPath = path.join(packDir, "raw", filename);
  if (existsSync(rawPath)) return rawPath;
  const rootPath = path.join(packDir, filename);
  if (existsSync(rootPath)) return rootPath;
  throw new Error(`Raw file not found: ${filename} (checked raw/ and pack root)`);
}

/**
 * Read, parse and validate one gauge series file.
 */
export function loadSeriesFile(
  packDir: string,
  desc: SeriesDescriptor
): { series: LoadedSeries; warnings: string[] } {
  const buffer = readFileSync(findRawFile(packDir, desc.filename));
  const { readings, errors } = parseGaugeFile(buffer.toString("utf-8"), desc.format);
  const warnings: string[] = [];

  if (errors.length > 0) {
    const first = errors[0];
    warnings.push(
      `${desc.filename}: ${errors.length} row(s) rejected (first at row ${first.index}: ${first.issues.join(", ")})`
    );
  }
  if (readings.length === 0) {
    throw new Error(`Series "${desc.id}" has no valid readings: ${desc.filename}`);
  }

  return {
    series: {
      id: desc.id,
      filename: desc.filename,
      format: desc.format,
      sha256: sha256Bytes(buffer),
      readings: buildReadingSeries(readings),
      rejectedRows: errors.length,
    },
    warnings,
  };
}

/**
 * Load everything a pipeline run needs from a pack directory.
 */
export function loadPack(packDir: string): LoadedPack {
  const manifest = loadManifest(packDir);
  const warnings: string[] = [];

  const catalogBuffer = readFileSync(findRawFile(packDir, manifest.catalog));
  let rawCatalog: unknown;
  try {
    rawCatalog = JSON.parse(catalogBuffer.toString("utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogValidationError(`Event catalog is not valid JSON: ${manifest.catalog}`, [
      reason,
    ]);
  }
  const catalog = parseEventCatalog(rawCatalog);

  const series: LoadedSeries[] = [];
  for (const desc of manifest.series) {
    const loaded = loadSeriesFile(packDir, desc);
    series.push(loaded.series);
    warnings.push(...loaded.warnings);
  }

  return {
    packDir,
    manifest,
    catalog,
    catalogHash: sha256Bytes(catalogBuffer),
    series,
    warnings,
  };
}
