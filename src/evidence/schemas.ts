import { z } from "zod";

// ── Instants ───────────────────────────────────────────────────────
// ISO-8601 with an explicit offset. "YYYY-MM-DD HH:MM:SS+00:00" (space
// separator) is accepted as well.
export const InstantSchema = z
  .preprocess(
    (v) => (typeof v === "string" ? v.trim().replace(/^(\d{4}-\d{2}-\d{2}) /, "$1T") : v),
    z.string().datetime({ offset: true })
  )
  .transform((s) => new Date(s));

const numberFromText = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
  z.number().finite()
);

// ── Known Event ────────────────────────────────────────────────────
export const KnownEventSchema = z
  .object({
    id: z.string().min(1),
    timestamp: InstantSchema,
    name: z.string().min(1),
    location: z.string().default(""),
    fatalities: z.number().int().nonnegative().nullable().optional(),
    powerOutage: z.boolean().nullable().optional(),
    gpsLocation: z.string().nullable().optional(),
    notes: z.string().optional(),
    urls: z.array(z.string().url()).default([]),
  })
  .strict();

export type KnownEvent = z.output<typeof KnownEventSchema>;

export const KnownEventCatalogSchema = z
  .array(KnownEventSchema)
  .superRefine((events, ctx) => {
    const seen = new Set<string>();
    events.forEach((event, index) => {
      if (seen.has(event.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "id"],
          message: `Duplicate event id "${event.id}"`,
        });
      }
      seen.add(event.id);
    });
  });

// ── Reading Rows ───────────────────────────────────────────────────
export const ReadingRowSchema = z.object({
  timestamp: InstantSchema,
  height: numberFromText,
});

/**
 * Validate an array of records against a schema.
 * Returns validated records and errors.
 */
export function validateRecords<T>(
  records: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { valid: T[]; errors: Array<{ index: number; issues: string[] }> } {
  const valid: T[] = [];
  const errors: Array<{ index: number; issues: string[] }> = [];

  for (let i = 0; i < records.length; i++) {
    const result = schema.safeParse(records[i]);
    if (result.success) {
      valid.push(result.data);
    } else {
      errors.push({
        index: i,
        issues: result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`
        ),
      });
    }
  }

  return { valid, errors };
}
