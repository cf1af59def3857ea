/**
 * ═══════════════════════════════════════════════════════════════════════════
 * VALIDATION WORKFLOW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Drives data points through the review state machine. Every operation
 * checks the transition table first, then (for validation) the engine,
 * and writes through the repository so each status change lands in the
 * audit ledger.
 *
 * Validating a point supersedes any validated peer for the same
 * dimension, subject and period: the peers become `outdated` in the same
 * transaction.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { QualityConfig } from "../config/quality/schema.js";
import { DEFAULT_QUALITY_CONFIG } from "../config/quality/defaults.js";
import { IntelligenceError, MissingReason, ValidationFailed } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { IntelligenceRepository } from "../repository/repository.js";
import type { DataPointRecord } from "../types/data-point.js";
import { ValidationStatus } from "../types/enums.js";
import { ValidationEngine, toFailedRules, type ValidationVerdict } from "./engine.js";
import { assertTransition } from "./transitions.js";

export interface ValidationWorkflowOptions {
  engine?: ValidationEngine;
  config?: Readonly<QualityConfig>;
  now?: () => Date;
  logger?: Logger;
}

export interface ValidateOutcome {
  record: DataPointRecord;
  verdict: ValidationVerdict;
  /** Ids of peers moved to `outdated` */
  superseded: number[];
}

export type BatchItemOutcome =
  | { id: number; ok: true; superseded: number[] }
  | { id: number; ok: false; error: IntelligenceError };

export interface AutoValidateOutcome {
  validated: number[];
  leftInReview: number[];
}

export interface ValidationStats {
  total: number;
  byStatus: Record<ValidationStatus, number>;
  /** Share of points validated, in percent with one decimal */
  validatedPercent: number;
}

export interface SweepOptions {
  olderThanYears?: number;
  actor?: string;
}

export class ValidationWorkflow {
  private readonly repo: IntelligenceRepository;
  private readonly engine: ValidationEngine;
  private readonly config: Readonly<QualityConfig>;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(repo: IntelligenceRepository, options: ValidationWorkflowOptions = {}) {
    this.repo = repo;
    this.config = options.config ?? DEFAULT_QUALITY_CONFIG;
    this.now = options.now ?? (() => new Date());
    this.engine = options.engine ?? new ValidationEngine({ config: this.config, now: this.now });
    this.log = (options.logger ?? silentLogger).child({ component: "workflow" });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TRANSITIONS
  // ═══════════════════════════════════════════════════════════════════════

  claimForReview(id: number, analyst: string): DataPointRecord {
    return this.repo.transaction(() => {
      const record = this.repo.requireDataPoint(id);
      assertTransition(id, record.status, "in_review");
      return this.repo.transitionStatus(id, {
        to: "in_review",
        actor: analyst,
        reason: "claimed for review",
      });
    });
  }

  /**
   * Confirm an item under review.
   *
   * @throws InvalidTransition unless the item is `in_review`
   * @throws ValidationFailed when any error-severity rule fails
   */
  validateItem(id: number, analyst: string, notes?: string): ValidateOutcome {
    return this.repo.transaction(() => {
      const record = this.repo.requireDataPoint(id);
      assertTransition(id, record.status, "validated");

      const verdict = this.engine.evaluateRecord(record);
      if (!verdict.passed) {
        throw new ValidationFailed(id, toFailedRules(verdict.failures));
      }

      const validated = this.repo.transitionStatus(id, {
        to: "validated",
        actor: analyst,
        reason: "validated",
        recordValidation: true,
        notes: notes ?? null,
      });

      const superseded: number[] = [];
      for (const peer of this.repo.findValidatedPeers(validated)) {
        this.repo.transitionStatus(peer.id, {
          to: "outdated",
          actor: analyst,
          reason: `superseded by data point #${id}`,
        });
        superseded.push(peer.id);
      }

      this.log.info("Data point validated", { id, analyst, superseded });
      return { record: validated, verdict, superseded };
    });
  }

  /**
   * @throws MissingReason when the reason is blank
   */
  rejectItem(id: number, analyst: string, reason: string): DataPointRecord {
    if (reason.trim() === "") {
      throw new MissingReason(id);
    }
    return this.repo.transaction(() => {
      const record = this.repo.requireDataPoint(id);
      assertTransition(id, record.status, "rejected");
      return this.repo.transitionStatus(id, { to: "rejected", actor: analyst, reason: reason.trim() });
    });
  }

  markOutdated(id: number, actor: string, reason: string): DataPointRecord {
    return this.repo.transaction(() => {
      const record = this.repo.requireDataPoint(id);
      assertTransition(id, record.status, "outdated");
      return this.repo.transitionStatus(id, { to: "outdated", actor, reason });
    });
  }

  /**
   * Move validated items whose year is older than the staleness window
   * to `outdated`.
   *
   * @returns ids of the items swept
   */
  sweepStale(options: SweepOptions = {}): number[] {
    const years = options.olderThanYears ?? this.config.stalenessYears;
    const actor = options.actor ?? "staleness-sweep";
    const cutoff = this.now().getUTCFullYear() - years;

    const swept = this.repo.transaction(() => {
      const stale = this.repo
        .getDataPoints({ status: "validated" })
        .filter((p) => p.year !== null && p.year < cutoff);
      for (const point of stale) {
        this.repo.transitionStatus(point.id, {
          to: "outdated",
          actor,
          reason: `older than ${years} years`,
        });
      }
      return stale.map((p) => p.id);
    });

    this.log.info("Staleness sweep finished", { cutoff, swept: swept.length });
    return swept;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // QUEUES & CHECKS
  // ═══════════════════════════════════════════════════════════════════════

  getPendingItems(limit?: number): DataPointRecord[] {
    return this.repo.getReviewQueue("pending", limit);
  }

  getInReviewItems(limit?: number): DataPointRecord[] {
    return this.repo.getReviewQueue("in_review", limit);
  }

  /**
   * Dry run of the engine against a stored item.
   */
  checkItem(id: number): ValidationVerdict {
    return this.engine.evaluateRecord(this.repo.requireDataPoint(id));
  }

  /**
   * Validate several items independently. A failure on one item is
   * reported in its outcome and does not stop the rest.
   */
  batchValidate(ids: readonly number[], analyst: string): BatchItemOutcome[] {
    return ids.map((id): BatchItemOutcome => {
      try {
        const { superseded } = this.validateItem(id, analyst);
        return { id, ok: true, superseded };
      } catch (err) {
        if (err instanceof IntelligenceError) {
          this.log.warn("Batch item not validated", { id, code: err.code, error: err.message });
          return { id, ok: false, error: err };
        }
        throw err;
      }
    });
  }

  /**
   * Claim every pending high-confidence item and validate those that pass
   * the engine. The rest stay in review for an analyst.
   */
  autoValidateHighConfidence(actor = "auto-validator"): AutoValidateOutcome {
    const outcome: AutoValidateOutcome = { validated: [], leftInReview: [] };
    const candidates = this.repo.getReviewQueue("pending").filter((p) => p.confidence === "high");

    for (const point of candidates) {
      this.claimForReview(point.id, actor);
      if (this.checkItem(point.id).passed) {
        this.validateItem(point.id, actor, "auto-validated: high confidence");
        outcome.validated.push(point.id);
      } else {
        outcome.leftInReview.push(point.id);
      }
    }

    this.log.info("Auto-validation finished", {
      validated: outcome.validated.length,
      leftInReview: outcome.leftInReview.length,
    });
    return outcome;
  }

  getValidationStats(): ValidationStats {
    const breakdown = this.repo.getStatistics().validationBreakdown;
    const byStatus: Record<ValidationStatus, number> = {
      pending: 0,
      in_review: 0,
      validated: 0,
      rejected: 0,
      outdated: 0,
    };
    for (const status of ValidationStatus.options) {
      byStatus[status] = breakdown[status] ?? 0;
    }
    const total = Object.values(byStatus).reduce((sum, n) => sum + n, 0);
    return {
      total,
      byStatus,
      validatedPercent: total === 0 ? 0 : Math.round((byStatus.validated / total) * 1000) / 10,
    };
  }
}
