/**
 * Analysis Pack Types: manifest and loaded-pack definitions.
 */
import { z } from "zod";
import type { KnownEvent } from "../evidence/schemas.js";
import { ThresholdOverridesSchema } from "../shared/thresholds.js";
import type { GaugeFileFormat, ReadingSeries } from "../shared/types.js";

// ── Pack Manifest ────────────────────────────────────────────────────

export const GaugeFileFormatSchema = z.enum(["readings_csv", "historical_csv", "usgs_rdb"]);

export const SeriesDescriptorSchema = z.object({
  id: z.string().min(1),
  filename: z.string().min(1),
  format: GaugeFileFormatSchema.default("readings_csv"),
  notes: z.string().optional(),
});

export const PackManifestSchema = z.object({
  packName: z.string().min(1),
  gauge: z.object({
    name: z.string().min(1),
    stationId: z.string().optional(),
    units: z.string().default("ft"),
  }),
  catalog: z.string().min(1).default("known_events.json"),
  series: z
    .array(SeriesDescriptorSchema)
    .min(1)
    .superRefine((series, ctx) => {
      const seen = new Set<string>();
      for (const s of series) {
        if (seen.has(s.id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate series id "${s.id}"` });
        }
        seen.add(s.id);
      }
    }),
  thresholds: ThresholdOverridesSchema.optional(),
});

export type PackManifest = z.infer<typeof PackManifestSchema>;
export type SeriesDescriptor = z.infer<typeof SeriesDescriptorSchema>;

// ── Loaded Pack ──────────────────────────────────────────────────────

export interface LoadedSeries {
  id: string;
  filename: string;
  format: GaugeFileFormat;
  sha256: string;
  readings: ReadingSeries;
  /** Rows that failed parsing or validation */
  rejectedRows: number;
}

export interface LoadedPack {
  packDir: string;
  manifest: PackManifest;
  catalog: KnownEvent[];
  catalogHash: string;
  series: LoadedSeries[];
  warnings: string[];
}
