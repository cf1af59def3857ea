/**
 * Recover findings from analyzer output.
 *
 * Language-model analyzers answer with JSON, usually wrapped in prose or a
 * code fence, and with snake_case keys (`source_url`, `source_name`,
 * `research_type`). The outermost object or array is cut out of the text
 * and each record is reshaped into the finding payload `FindingSchema`
 * parses. Records are not validated here; that happens per finding.
 *
 * Accepted shapes:
 *   [ {finding}, ... ]
 *   { "dimension": "...", "data_points": [ ... ] }
 *   { "findings": [ ... ] }
 */

import { z } from "zod";
import { SchemaViolation } from "../errors.js";
import { toSchemaIssues } from "../repository/schema.js";

const JSON_BLOCK = /(\{[\s\S]*\}|\[[\s\S]*\])/;

const EnvelopeSchema = z.union([
  z.array(z.unknown()),
  z.object({
    dimension: z.string().optional(),
    researchType: z.string().optional(),
    data_points: z.array(z.unknown()).optional(),
    findings: z.array(z.unknown()).optional(),
  }),
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The JSON value embedded in `text`.
 *
 * @throws SchemaViolation when no parseable JSON is found
 */
export function extractJson(text: string): unknown {
  const match = JSON_BLOCK.exec(text);
  if (match === null) {
    throw SchemaViolation.single("", "Analyzer output contains no JSON object or array");
  }
  try {
    return JSON.parse(match[1]);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw SchemaViolation.single("", `Analyzer output is not valid JSON: ${detail}`);
  }
}

function normalizeRecord(
  record: Record<string, unknown>,
  defaults: { dimension?: string; researchType?: string }
): Record<string, unknown> {
  const { source_url, source_name, research_type, ...rest } = record;
  const out: Record<string, unknown> = { ...rest };

  if (out.researchType === undefined && typeof research_type === "string") {
    out.researchType = research_type;
  }
  if (out.dimension === undefined && out.researchType === undefined) {
    if (defaults.dimension !== undefined) out.dimension = defaults.dimension;
    else if (defaults.researchType !== undefined) out.researchType = defaults.researchType;
  }

  if (out.source === undefined) {
    const source: Record<string, string> = {};
    if (typeof source_name === "string" && source_name.length > 0) source.name = source_name;
    if (typeof source_url === "string" && source_url.length > 0) source.url = source_url;
    if (Object.keys(source).length > 0) out.source = source;
  }

  // Analyzers write null for anything they could not find
  for (const key of ["confidence", "subject", "source"]) {
    if (out[key] === null) delete out[key];
  }
  return out;
}

/**
 * Raw findings contained in analyzer output.
 *
 * @throws SchemaViolation when the text holds no JSON or an unexpected shape
 */
export function parseAnalyzerOutput(text: string): unknown[] {
  const parsed = EnvelopeSchema.safeParse(extractJson(text));
  if (!parsed.success) {
    throw new SchemaViolation("Unexpected analyzer output shape", toSchemaIssues(parsed.error.issues));
  }

  const envelope = parsed.data;
  if (Array.isArray(envelope)) {
    return envelope.map((item) => (isRecord(item) ? normalizeRecord(item, {}) : item));
  }

  const items = envelope.data_points ?? envelope.findings ?? [];
  const defaults = { dimension: envelope.dimension, researchType: envelope.researchType };
  return items.map((item) => (isRecord(item) ? normalizeRecord(item, defaults) : item));
}
