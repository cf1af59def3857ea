/**
 * Parsing helpers shared by the repository.
 *
 * Payloads from producers and JSON read back from the database both pass
 * through zod here. Producer failures become `SchemaViolation`s; a stored
 * value that no longer parses is a corrupt database and throws as is.
 */

import { z, type ZodIssue } from "zod";
import { SchemaViolation, type SchemaIssue } from "../errors.js";
import { ConfidenceLevel, ValidationStatus } from "../types/enums.js";
import { SubjectRefSchema } from "../types/subject.js";
import { JsonValueSchema, PointValueSchema, type StructuredValue } from "../types/data-point.js";
import type { DataPointSnapshot } from "../types/audit.js";

export function toSchemaIssues(issues: readonly ZodIssue[]): SchemaIssue[] {
  return issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
}

/**
 * Parse a producer payload or throw `SchemaViolation`.
 */
export function parseOrViolation<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = toSchemaIssues(result.error.issues);
    throw new SchemaViolation(`Invalid ${what}: ${issues.length} issue(s)`, issues);
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════
// STORED JSON
// ═══════════════════════════════════════════════════════════════════════════

export const StructuredValueSchema: z.ZodType<StructuredValue> = z.union([
  z.array(JsonValueSchema),
  z.record(JsonValueSchema),
]);

export const MetadataSchema = z.record(JsonValueSchema);

export const DataPointSnapshotSchema: z.ZodType<DataPointSnapshot> = z.object({
  dimension: z.string(),
  subject: SubjectRefSchema,
  value: PointValueSchema,
  year: z.number().int().nullable(),
  quarter: z.number().int().nullable(),
  month: z.number().int().nullable(),
  confidence: ConfidenceLevel,
  status: ValidationStatus,
  sourceId: z.number().int().nullable(),
  validatedBy: z.string().nullable(),
  validatedAt: z.string().nullable(),
  notes: z.string().nullable(),
  metadata: MetadataSchema.nullable(),
  updatedAt: z.string(),
});

export const ChangedFieldsSchema = z.array(z.string());

export const StringListSchema = z.array(z.string());

export function parseStoredJson<T>(schema: z.ZodType<T>, text: string): T {
  return schema.parse(JSON.parse(text));
}
