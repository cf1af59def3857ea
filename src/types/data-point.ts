/**
 * Data point types and producer-facing schemas.
 *
 * The input schemas describe what a producer may submit. Structural
 * problems (zero or several subjects, unknown keys, bad enum values) are
 * caught here; the repository adds the checks that need the database
 * (dimension kind, existence of references).
 */

import { z } from "zod";
import { ConfidenceLevel, SourceType, ValidationStatus, type ValueKind } from "./enums.js";
import { SubjectRefSchema, type Subject, type SubjectRef } from "./subject.js";

// ═══════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * Structured categorical value: a list of labels or a labelled object.
 */
export type StructuredValue = JsonValue[] | { [key: string]: JsonValue };

/**
 * A data point value. Which shape is legal depends on the dimension:
 *   numeric     → number
 *   text        → string
 *   categorical → string label or structured value
 * `null` is accepted at insert and reported by the validation engine.
 */
export type PointValue = number | string | StructuredValue | null;

export const PointValueSchema: z.ZodType<PointValue> = z.union([
  z.number(),
  z.string(),
  z.array(JsonValueSchema),
  z.record(JsonValueSchema),
  z.null(),
]);

/**
 * Whether a value is legal for a value kind.
 */
export function valueMatchesKind(value: PointValue, kind: ValueKind): boolean {
  if (value === null) return true;
  switch (kind) {
    case "numeric":
      return typeof value === "number";
    case "text":
      return typeof value === "string";
    case "categorical":
      return typeof value === "string" || typeof value === "object";
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SOURCES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * New provenance record. Matched to an existing source by URL when one is given.
 */
export const SourceInputSchema = z
  .object({
    name: z.string().min(1),
    url: z.string().url().optional(),
    sourceType: SourceType.default("research_report"),
    reliabilityScore: z.number().min(0).max(1).default(0.5),
    retrievedAt: z.string().datetime({ offset: true }).optional(),
  })
  .strict();
export type SourceInput = z.input<typeof SourceInputSchema>;

/**
 * Either an existing source id or a description of a new source.
 */
export const SourceRefSchema = z.union([
  z.object({ id: z.number().int().positive() }).strict(),
  SourceInputSchema,
]);
export type SourceRef = z.input<typeof SourceRefSchema>;

export interface SourceSummary {
  readonly id: number;
  readonly name: string;
  readonly url: string | null;
  readonly sourceType: string | null;
  readonly reliabilityScore: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// INPUTS
// ═══════════════════════════════════════════════════════════════════════════

const year = z.number().int().nullable().optional();
const quarter = z.number().int().min(1).max(4).nullable().optional();
const month = z.number().int().min(1).max(12).nullable().optional();

/**
 * Candidate data point as submitted by a producer.
 */
export const DataPointInputSchema = z
  .object({
    dimension: z.string().min(1),
    subject: SubjectRefSchema,
    value: PointValueSchema,
    year,
    quarter,
    month,
    confidence: ConfidenceLevel.default("medium"),
    source: SourceRefSchema.nullable().optional(),
    notes: z.string().nullable().optional(),
    metadata: z.record(JsonValueSchema).nullable().optional(),
  })
  .strict();
export type DataPointInput = z.input<typeof DataPointInputSchema>;
export type ParsedDataPointInput = z.infer<typeof DataPointInputSchema>;

/**
 * Partial correction of a stored data point.
 * Omitted fields are left untouched; `null` clears a nullable field.
 */
export const DataPointPatchSchema = z
  .object({
    value: PointValueSchema.optional(),
    year,
    quarter,
    month,
    confidence: ConfidenceLevel.optional(),
    source: SourceRefSchema.nullable().optional(),
    notes: z.string().nullable().optional(),
    metadata: z.record(JsonValueSchema).nullable().optional(),
  })
  .strict();
export type DataPointPatch = z.input<typeof DataPointPatchSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// STORED RECORDS
// ═══════════════════════════════════════════════════════════════════════════

export interface DimensionSummary {
  readonly id: number;
  readonly name: string;
  readonly unit: string | null;
  readonly kind: ValueKind;
}

export interface DataPointRecord {
  readonly id: number;
  readonly dimension: DimensionSummary;
  readonly subject: Subject;
  readonly value: PointValue;
  readonly year: number | null;
  readonly quarter: number | null;
  readonly month: number | null;
  readonly confidence: ConfidenceLevel;
  readonly status: ValidationStatus;
  readonly source: SourceSummary | null;
  readonly validatedBy: string | null;
  readonly validatedAt: string | null;
  readonly notes: string | null;
  readonly metadata: { [key: string]: JsonValue } | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * Query filters for data points. All filters are AND-combined.
 */
export interface DataPointFilter {
  dimension?: string;
  /** Sector subjects plus the subcategories under that sector */
  sector?: string;
  /** Exact subject match */
  subject?: SubjectRef;
  company?: string;
  technology?: string;
  year?: number;
  /** `null` selects points without a quarter */
  quarter?: number | null;
  /** `null` selects points without a month */
  month?: number | null;
  status?: ValidationStatus | readonly ValidationStatus[];
  confidence?: ConfidenceLevel;
  limit?: number;
}
