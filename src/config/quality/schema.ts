/**
 * Data-quality configuration schema.
 *
 * The validation engine, the staleness sweep and the change detector all
 * read their thresholds from this one object. It is validated once when
 * a process starts and then frozen, so every verdict in a run is made
 * against the same numbers.
 */

import { z } from "zod";

/**
 * Plausible range for one dimension. Either side may be open.
 */
export const BoundsSchema = z
  .object({
    min: z.number().optional(),
    max: z.number().optional(),
  })
  .strict()
  .refine((b) => b.min === undefined || b.max === undefined || b.min <= b.max, {
    message: "min must not exceed max",
  });

export type Bounds = z.infer<typeof BoundsSchema>;

export const SignificanceSchema = z
  .object({
    /** Percent change above which a change is significant */
    defaultThresholdPercent: z.number().min(0),
    /** Per-dimension overrides of the default threshold */
    thresholds: z.record(z.number().min(0)),
  })
  .strict();

export type Significance = z.infer<typeof SignificanceSchema>;

export const ChangeDetectionSchema = z
  .object({
    /** Compare against an outdated point when a period has no validated one */
    includeOutdatedFallback: z.boolean(),
  })
  .strict();

export const QualityConfigSchema = z
  .object({
    /** Earliest acceptable data year */
    minYear: z.number().int().min(1900),
    /** Years past the current year still accepted (forecasts) */
    futureYearAllowance: z.number().int().min(0).max(10),
    /** Data older than this many years draws a recency warning */
    recencyYears: z.number().int().min(0),
    /** Validated data older than this many years is swept to outdated */
    stalenessYears: z.number().int().min(0),
    /** Keyed by dimension name; dimensions without an entry are exempt */
    bounds: z.record(BoundsSchema),
    significance: SignificanceSchema,
    changeDetection: ChangeDetectionSchema,
  })
  .strict();

export type QualityConfig = z.infer<typeof QualityConfigSchema>;
