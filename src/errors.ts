/**
 * Error taxonomy for the data-quality core.
 *
 * Every failure raised by the repository, the validation workflow or the
 * change detector is one of these classes. They carry the identifiers a
 * caller needs to act on the failure (entity, id, rule names, statuses)
 * and render a multi-line description through `format()`.
 */

import type { ValidationStatus } from "./types/enums.js";

export type ErrorCode =
  | "INTEGRITY_ERROR"
  | "SCHEMA_VIOLATION"
  | "VALIDATION_FAILED"
  | "INVALID_TRANSITION"
  | "MISSING_REASON"
  | "NOT_FOUND";

/**
 * Base class for all core errors.
 */
export abstract class IntelligenceError extends Error {
  public abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Format the error for display.
   */
  format(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Kinds of entity a data point may reference.
 */
export type ReferencedEntity =
  | "sector"
  | "subcategory"
  | "dimension"
  | "source"
  | "company"
  | "technology";

/**
 * A referenced sector, dimension, source or subject does not exist.
 */
export class IntegrityError extends IntelligenceError {
  public readonly code = "INTEGRITY_ERROR" as const;
  public readonly entity: ReferencedEntity;
  public readonly reference: string | number;

  constructor(entity: ReferencedEntity, reference: string | number, message?: string) {
    super(message ?? `Unknown ${entity}: ${String(reference)}`);
    this.entity = entity;
    this.reference = reference;
  }
}

/**
 * Single schema problem found in a data point payload.
 */
export interface SchemaIssue {
  /** Dotted path to the offending field, empty for the whole payload */
  path: string;
  message: string;
}

/**
 * Value-kind mismatch, bad subject reference or inconsistent temporal fields.
 */
export class SchemaViolation extends IntelligenceError {
  public readonly code = "SCHEMA_VIOLATION" as const;
  public readonly issues: SchemaIssue[];

  constructor(message: string, issues: SchemaIssue[] = []) {
    super(message);
    this.issues = issues;
  }

  static single(path: string, message: string): SchemaViolation {
    return new SchemaViolation(message, [{ path, message }]);
  }

  format(): string {
    const lines = [`[${this.code}] ${this.message}`];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path === "" ? "(root)" : issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Reason reported by a failed validation rule.
 */
export interface FailedRule {
  rule: string;
  reason: string;
}

/**
 * The validation engine refused a transition to `validated`.
 * Recoverable: correct the data point and resubmit.
 */
export class ValidationFailed extends IntelligenceError {
  public readonly code = "VALIDATION_FAILED" as const;
  public readonly dataPointId: number;
  public readonly reasons: FailedRule[];

  constructor(dataPointId: number, reasons: FailedRule[]) {
    super(
      `Data point #${dataPointId} failed ${reasons.length} validation rule(s): ` +
        reasons.map((r) => r.rule).join(", ")
    );
    this.dataPointId = dataPointId;
    this.reasons = reasons;
  }

  format(): string {
    const lines = [`[${this.code}] ${this.message}`];
    for (const { rule, reason } of this.reasons) {
      lines.push(`  - ${rule}: ${reason}`);
    }
    return lines.join("\n");
  }
}

/**
 * Workflow state machine violation.
 */
export class InvalidTransition extends IntelligenceError {
  public readonly code = "INVALID_TRANSITION" as const;
  public readonly dataPointId: number;
  public readonly from: ValidationStatus;
  public readonly to: ValidationStatus;

  constructor(dataPointId: number, from: ValidationStatus, to: ValidationStatus) {
    super(`Data point #${dataPointId} cannot move from '${from}' to '${to}'`);
    this.dataPointId = dataPointId;
    this.from = from;
    this.to = to;
  }
}

/**
 * Rejection attempted without a reason.
 */
export class MissingReason extends IntelligenceError {
  public readonly code = "MISSING_REASON" as const;
  public readonly dataPointId: number;

  constructor(dataPointId: number) {
    super(`Rejecting data point #${dataPointId} requires a non-blank reason`);
    this.dataPointId = dataPointId;
  }
}

/**
 * An operation referenced a record that does not exist.
 */
export class NotFound extends IntelligenceError {
  public readonly code = "NOT_FOUND" as const;
  public readonly entity: string;
  public readonly id: string | number;

  constructor(entity: string, id: string | number) {
    super(`${entity} not found: ${String(id)}`);
    this.entity = entity;
    this.id = id;
  }
}
