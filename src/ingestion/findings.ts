/**
 * Research findings: the payload external collaborators hand to ingestion.
 *
 * A finding names its dimension directly or through a research type
 * ("growth_rate", "pricing", ...). Its subject defaults to the target
 * being researched. Confidence labels outside the known set are kept as
 * `unverified` with a note instead of failing the finding.
 */

import { z } from "zod";
import { SchemaViolation } from "../errors.js";
import { parseOrViolation } from "../repository/schema.js";
import { PointValueSchema, type DataPointInput, type SourceInput } from "../types/data-point.js";
import { ConfidenceLevel } from "../types/enums.js";
import { SubjectRefSchema, type SubjectRef } from "../types/subject.js";

/**
 * Research type → dimension name.
 */
export const RESEARCH_TYPE_DIMENSIONS: Readonly<Record<string, string>> = {
  market_size: "market_size",
  growth_rate: "market_growth_rate",
  unit_shipments: "unit_shipments",
  pricing: "average_selling_price",
  adoption: "adoption_rate",
  roi: "roi_payback_period",
  funding: "funding_raised",
};

export const FindingSchema = z
  .object({
    dimension: z.string().min(1).optional(),
    researchType: z.string().min(1).optional(),
    value: PointValueSchema,
    subject: SubjectRefSchema.optional(),
    year: z.number().int().nullable().optional(),
    quarter: z.number().int().min(1).max(4).nullable().optional(),
    month: z.number().int().min(1).max(12).nullable().optional(),
    confidence: z.string().optional(),
    source: z
      .object({
        name: z.string().min(1).optional(),
        url: z.string().url().optional(),
      })
      .nullable()
      .optional(),
    notes: z.string().nullable().optional(),
  })
  .refine((f) => f.dimension !== undefined || f.researchType !== undefined, {
    message: "A finding needs a dimension or a researchType",
    path: ["dimension"],
  });

export type Finding = z.infer<typeof FindingSchema>;

export type ResearchTargetType = "sector" | "company" | "technology";

/**
 * What a research session is about.
 */
export interface ResearchTarget {
  type: ResearchTargetType;
  name: string;
  /** Year findings default to when they carry none */
  year: number;
}

export function parseFinding(raw: unknown): Finding {
  return parseOrViolation(FindingSchema, raw, "finding");
}

export function resolveDimension(finding: Finding): string {
  if (finding.dimension !== undefined) return finding.dimension;
  const researchType = finding.researchType ?? "";
  const dimension = RESEARCH_TYPE_DIMENSIONS[researchType];
  if (dimension === undefined) {
    throw SchemaViolation.single("researchType", `Unknown research type '${researchType}'`);
  }
  return dimension;
}

function resolveConfidence(label: string | undefined): { level: ConfidenceLevel; note: string | null } {
  if (label === undefined) return { level: "medium", note: null };
  const parsed = ConfidenceLevel.safeParse(label.trim().toLowerCase());
  if (parsed.success) return { level: parsed.data, note: null };
  return { level: "unverified", note: `reported confidence '${label}' not recognised` };
}

function resolveSource(source: Finding["source"]): SourceInput | null {
  if (source == null || (source.name === undefined && source.url === undefined)) {
    return null;
  }
  return {
    name: source.name ?? "Web Source",
    url: source.url,
    sourceType: "research_report",
  };
}

/**
 * Candidate data point for a parsed finding.
 */
export function findingToInput(finding: Finding, target: ResearchTarget): DataPointInput {
  const subject: SubjectRef = finding.subject ?? { type: target.type, name: target.name };
  const confidence = resolveConfidence(finding.confidence);
  const notes = [finding.notes, confidence.note].filter(
    (n): n is string => typeof n === "string" && n.length > 0
  );

  return {
    dimension: resolveDimension(finding),
    subject,
    value: finding.value,
    year: finding.year === undefined ? target.year : finding.year,
    quarter: finding.quarter ?? null,
    month: finding.month ?? null,
    confidence: confidence.level,
    source: resolveSource(finding.source),
    notes: notes.length > 0 ? notes.join("; ") : null,
    metadata: {
      researchType: finding.researchType ?? null,
      reportedConfidence: finding.confidence ?? null,
    },
  };
}
