/**
 * ═══════════════════════════════════════════════════════════════════════════
 * MANUAL INGESTION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Analyst-entered data points and expert interviews, one at a time or as
 * a batch file. Entries are flat records:
 *
 *   { "dimension": "market_size", "sector": "Mobile Robotics", "value": 45.2,
 *     "year": 2025, "sourceName": "Example Research", "sourceUrl": "https://..." }
 *
 * A batch is tracked as one `manual_entry` research session. Rejected
 * entries are counted and reported individually; the rest of the batch
 * continues. Any other error fails the session and is rethrown.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { z } from "zod";

import { IntegrityError, SchemaViolation } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { IntelligenceRepository } from "../repository/repository.js";
import { parseOrViolation } from "../repository/schema.js";
import { PointValueSchema, type DataPointInput, type SourceInput } from "../types/data-point.js";
import { ConfidenceLevel } from "../types/enums.js";
import { InterviewInputSchema } from "../types/interview.js";
import type { SubjectRef } from "../types/subject.js";
import type { FindingRejection } from "./session.js";

const MANUAL_SOURCE_NAME = "Manual Entry";

const name = z.string().trim().min(1);

export const ManualEntrySchema = z
  .object({
    dimension: name,
    value: PointValueSchema,
    sector: name.optional(),
    subcategory: name.optional(),
    company: name.optional(),
    technology: name.optional(),
    year: z.number().int().nullable().optional(),
    quarter: z.number().int().min(1).max(4).nullable().optional(),
    month: z.number().int().min(1).max(12).nullable().optional(),
    confidence: ConfidenceLevel.default("medium"),
    sourceName: name.optional(),
    sourceUrl: z.string().url().optional(),
    notes: z.string().nullable().optional(),
  })
  .strict();

export type ManualEntry = z.infer<typeof ManualEntrySchema>;

/**
 * A batch file holds a list of data point entries, or an object with
 * `dataPoints` and `interviews` lists.
 */
export const ManualBatchSchema = z.union([
  z.array(z.unknown()).transform((dataPoints) => ({ dataPoints, interviews: [] })),
  z
    .object({
      dataPoints: z.array(z.unknown()).default([]),
      interviews: z.array(z.unknown()).default([]),
    })
    .strict(),
]);

export type ManualBatch = z.output<typeof ManualBatchSchema>;

export type ManualItemKind = "data_point" | "interview";

export interface ManualRejection extends FindingRejection {
  kind: ManualItemKind;
}

export interface ManualIngestionResult {
  sessionId: number;
  /** Batch label, usually the file name */
  label: string;
  received: number;
  dataPointIds: number[];
  interviewIds: number[];
  rejected: ManualRejection[];
}

export interface ManualIngestionOptions {
  logger?: Logger;
  /** Recorded in the audit log as `manual:<analyst>` */
  analyst?: string;
}

function subjectOf(entry: ManualEntry): SubjectRef {
  if (entry.subcategory !== undefined && entry.sector === undefined) {
    throw SchemaViolation.single("subcategory", "A subcategory needs its sector");
  }
  const subjects: SubjectRef[] = [];
  if (entry.sector !== undefined) {
    subjects.push(
      entry.subcategory !== undefined
        ? { type: "subcategory", sector: entry.sector, name: entry.subcategory }
        : { type: "sector", name: entry.sector }
    );
  }
  if (entry.company !== undefined) subjects.push({ type: "company", name: entry.company });
  if (entry.technology !== undefined) subjects.push({ type: "technology", name: entry.technology });

  const [subject] = subjects;
  if (subjects.length !== 1 || subject === undefined) {
    throw SchemaViolation.single("sector", "An entry names exactly one of sector, company or technology");
  }
  return subject;
}

function sourceOf(entry: ManualEntry): SourceInput | null {
  if (entry.sourceName === undefined && entry.sourceUrl === undefined) return null;
  return {
    name: entry.sourceName ?? MANUAL_SOURCE_NAME,
    url: entry.sourceUrl,
    sourceType: "manual",
  };
}

/**
 * Candidate data point for a parsed manual entry.
 */
export function entryToInput(entry: ManualEntry): DataPointInput {
  return {
    dimension: entry.dimension,
    subject: subjectOf(entry),
    value: entry.value,
    year: entry.year ?? null,
    quarter: entry.quarter ?? null,
    month: entry.month ?? null,
    confidence: entry.confidence,
    source: sourceOf(entry),
    notes: entry.notes ?? null,
  };
}

export function parseManualBatch(raw: unknown): ManualBatch {
  return parseOrViolation(ManualBatchSchema, raw, "batch");
}

/**
 * @throws SchemaViolation when the file is not JSON or not a batch
 */
export async function loadManualBatch(path: string): Promise<ManualBatch> {
  const text = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw SchemaViolation.single("", `${path} is not valid JSON: ${detail}`);
  }
  return parseManualBatch(raw);
}

function isRejection(err: unknown): err is IntegrityError | SchemaViolation {
  return err instanceof IntegrityError || err instanceof SchemaViolation;
}

export class ManualIngestion {
  private readonly repo: IntelligenceRepository;
  private readonly actor: string;
  private readonly log: Logger;

  constructor(repo: IntelligenceRepository, options: ManualIngestionOptions = {}) {
    this.repo = repo;
    this.actor = `manual:${options.analyst ?? "analyst"}`;
    this.log = (options.logger ?? silentLogger).child({ component: "ingestion", collaborator: "manual" });
  }

  /**
   * Store one entry as a pending data point.
   *
   * @throws SchemaViolation for a malformed entry
   * @throws IntegrityError for an unknown dimension or subject
   */
  ingestDataPoint(raw: unknown, reason = "manual entry"): number {
    const entry = parseOrViolation(ManualEntrySchema, raw, "manual entry");
    return this.repo.createDataPoint(entryToInput(entry), { actor: this.actor, reason });
  }

  /**
   * @throws SchemaViolation for a malformed interview
   */
  ingestInterview(raw: unknown): number {
    return this.repo.addInterview(parseOrViolation(InterviewInputSchema, raw, "interview"));
  }

  /**
   * Store every entry of a batch, data points first.
   */
  ingestBatch(batch: ManualBatch, label: string): ManualIngestionResult {
    const sessionId = this.repo.startResearchSession("manual_entry", label);
    const log = this.log.child({ sessionId });
    const received = batch.dataPoints.length + batch.interviews.length;
    log.info("Manual batch started", { label, received });

    const dataPointIds: number[] = [];
    const interviewIds: number[] = [];
    const rejected: ManualRejection[] = [];

    const each = (
      items: readonly unknown[],
      kind: ManualItemKind,
      store: (item: unknown) => number,
      ids: number[]
    ): void => {
      items.forEach((item, index) => {
        try {
          ids.push(store(item));
        } catch (err) {
          if (!isRejection(err)) throw err;
          rejected.push({ kind, index, code: err.code, message: err.message });
          log.warn("Manual entry rejected", { kind, index, code: err.code, error: err.message });
        }
      });
    };

    try {
      each(
        batch.dataPoints,
        "data_point",
        (item) => this.ingestDataPoint(item, `manual batch #${sessionId}`),
        dataPointIds
      );
      each(batch.interviews, "interview", (item) => this.ingestInterview(item), interviewIds);
    } catch (err) {
      this.repo.finishResearchSession(sessionId, {
        status: "failed",
        findingsReceived: received,
        dataPointsCreated: dataPointIds.length,
        findingsRejected: rejected.length,
        errorMessage: err instanceof Error ? err.message : String(err),
      });
      log.error("Manual batch failed", { error: err });
      throw err;
    }

    this.repo.finishResearchSession(sessionId, {
      status: "completed",
      findingsReceived: received,
      dataPointsCreated: dataPointIds.length,
      findingsRejected: rejected.length,
    });
    log.info("Manual batch completed", {
      dataPointsCreated: dataPointIds.length,
      interviewsCreated: interviewIds.length,
      rejected: rejected.length,
    });

    return { sessionId, label, received, dataPointIds, interviewIds, rejected };
  }

  async ingestFile(path: string): Promise<ManualIngestionResult> {
    return this.ingestBatch(await loadManualBatch(path), basename(path));
  }
}
