/**
 * Audit ledger types.
 *
 * Every data point write appends one entry. Entries are never updated or
 * deleted; the ledger is the authority on who changed what and why.
 */

import type { ConfidenceLevel, ValidationStatus } from "./enums.js";
import type { JsonValue, PointValue } from "./data-point.js";
import type { SubjectRef } from "./subject.js";

export type ChangeType = "insert" | "update" | "status";

/**
 * Full state of a data point at one moment, as written to the ledger.
 */
export interface DataPointSnapshot {
  dimension: string;
  subject: SubjectRef;
  value: PointValue;
  year: number | null;
  quarter: number | null;
  month: number | null;
  confidence: ConfidenceLevel;
  status: ValidationStatus;
  sourceId: number | null;
  validatedBy: string | null;
  validatedAt: string | null;
  notes: string | null;
  metadata: { [key: string]: JsonValue } | null;
  updatedAt: string;
}

/**
 * Snapshot fields a patch may change.
 */
export type SnapshotField = keyof Omit<DataPointSnapshot, "dimension" | "subject" | "updatedAt">;

export interface ChangesLogEntry {
  readonly id: number;
  readonly table: string;
  readonly recordId: number;
  readonly changeType: ChangeType;
  /** `null` only for inserts */
  readonly before: DataPointSnapshot | null;
  readonly after: DataPointSnapshot;
  readonly fields: readonly string[];
  readonly actor: string;
  readonly reason: string | null;
  readonly timestamp: string;
}

export interface ChangesFilter {
  recordId?: number;
  changeType?: ChangeType;
  /** ISO timestamp; entries at or after it */
  since?: string;
  limit?: number;
}

/**
 * Status change requested by the workflow.
 */
export interface StatusChange {
  to: ValidationStatus;
  actor: string;
  reason?: string | null;
  /** Stamp the actor and time as validated-by/at */
  recordValidation?: boolean;
  notes?: string | null;
}
