/**
 * Threshold Configuration
 *
 * Critical rise (ft) and critical rate (ft/hr) drive every detection and
 * projection. They are passed explicitly to each call so that parameter
 * sweeps can run side by side.
 *
 * Resolution order: CLI flag > environment variable > pack manifest > default.
 */

import { z } from "zod";

export const ThresholdConfigSchema = z.object({
  riseCritical: z.number().positive(),
  rateCritical: z.number().positive(),
  debounceHours: z.number().nonnegative().default(12),
  windowRadiusHours: z.number().positive().default(24),
  /** Readings below floorHeight + riseCritical are not scanned. */
  floorHeight: z.number().optional(),
});

export type ThresholdConfig = z.infer<typeof ThresholdConfigSchema>;

export const DEFAULT_THRESHOLDS: ThresholdConfig = {
  riseCritical: 2.5,
  rateCritical: 0.5,
  debounceHours: 12,
  windowRadiusHours: 24,
};

const THRESHOLD_KEYS = [
  "riseCritical",
  "rateCritical",
  "debounceHours",
  "windowRadiusHours",
  "floorHeight",
] as const;

type ThresholdKey = (typeof THRESHOLD_KEYS)[number];

/** Raw threshold values as they arrive from argv, env or JSON. */
export type ThresholdInput = Partial<Record<ThresholdKey, string | number | undefined>>;

const numeric = (schema: z.ZodNumber) =>
  z.preprocess((v) => (typeof v === "string" ? Number(v.trim()) : v), schema);

export const ThresholdOverridesSchema = z.object({
  riseCritical: numeric(z.number().positive()).optional(),
  rateCritical: numeric(z.number().positive()).optional(),
  debounceHours: numeric(z.number().nonnegative()).optional(),
  windowRadiusHours: numeric(z.number().positive()).optional(),
  floorHeight: numeric(z.number()).optional(),
});

export type ThresholdOverrides = z.infer<typeof ThresholdOverridesSchema>;

/** Environment variable carrying each threshold. */
export const THRESHOLD_ENV_VARS: Record<ThresholdKey, string> = {
  riseCritical: "RISE_CRITICAL",
  rateCritical: "RATE_CRITICAL",
  debounceHours: "DEBOUNCE_HOURS",
  windowRadiusHours: "WINDOW_RADIUS_HOURS",
  floorHeight: "FLOOR_HEIGHT",
};

function parseOverrides(input: ThresholdInput, origin: string): ThresholdOverrides {
  const raw: Record<string, string | number> = {};
  for (const key of THRESHOLD_KEYS) {
    const value = input[key];
    if (value === undefined || value === "") continue;
    raw[key] = value;
  }

  const result = ThresholdOverridesSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new Error(`Invalid ${origin} thresholds: ${issues.join("; ")}`);
  }
  return result.data;
}

/**
 * Read threshold overrides from environment variables.
 */
export function thresholdsFromEnv(env: Record<string, string | undefined>): ThresholdInput {
  const input: ThresholdInput = {};
  for (const key of THRESHOLD_KEYS) {
    input[key] = env[THRESHOLD_ENV_VARS[key]];
  }
  return input;
}

/**
 * Merge threshold sources into one validated configuration.
 */
export function resolveThresholds(
  cli: ThresholdInput = {},
  env: Record<string, string | undefined> = {},
  manifest: ThresholdInput = {}
): ThresholdConfig {
  const merged = {
    ...DEFAULT_THRESHOLDS,
    ...parseOverrides(manifest, "pack manifest"),
    ...parseOverrides(thresholdsFromEnv(env), "environment"),
    ...parseOverrides(cli, "command-line"),
  };
  return ThresholdConfigSchema.parse(merged);
}

/**
 * Hours over which a critical rise at exactly the critical rate accumulates.
 */
export function criticalSpanHours(thresholds: ThresholdConfig): number {
  return thresholds.riseCritical / thresholds.rateCritical;
}
