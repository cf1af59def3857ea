/**
 * ═══════════════════════════════════════════════════════════════════════════
 * CHANGE DETECTOR
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Read-only comparison of numeric data points between two periods.
 *
 * For every (dimension, subject) key present in either period one point
 * represents each side:
 *   1. validated points first, outdated ones only as a fallback
 *   2. highest confidence
 *   3. most recently updated
 *   4. highest id
 *
 * The percentage change divides by |old|; an old value of zero yields a
 * null percentage, never a division.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { QualityConfig } from "../config/quality/schema.js";
import { DEFAULT_QUALITY_CONFIG } from "../config/quality/defaults.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { IntelligenceRepository } from "../repository/repository.js";
import type { DataPointRecord } from "../types/data-point.js";
import { CONFIDENCE_RANK, type ValidationStatus } from "../types/enums.js";
import { subjectKey, subjectLabel, type Subject } from "../types/subject.js";
import {
  monthPeriod,
  periodFilter,
  periodLabel,
  previousPeriod,
  quarterPeriod,
  yearPeriod,
  type ReportingPeriod,
} from "./periods.js";

export type ChangeDirection = "increase" | "decrease" | "unchanged" | "new-key" | "removed-key";

export type SignificanceLevel = "significant" | "minor";

export interface ChangeRecord {
  dimension: string;
  unit: string | null;
  subject: Subject;
  subjectLabel: string;
  oldValue: number | null;
  newValue: number | null;
  delta: number | null;
  percentDelta: number | null;
  changeType: ChangeDirection;
  significance: SignificanceLevel;
  periodOld: string;
  periodNew: string;
  oldDataPointId: number | null;
  newDataPointId: number | null;
  /** Which sides were represented by an outdated point */
  fromOutdated: { old: boolean; new: boolean };
}

export interface ChangeScope {
  dimension?: string;
  sector?: string;
}

export interface ChangeDetectorOptions {
  config?: Readonly<QualityConfig>;
  logger?: Logger;
}

interface NumericPoint {
  record: DataPointRecord;
  value: number;
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Whether `a` should represent its key over `b`.
 */
function outranks(a: DataPointRecord, b: DataPointRecord): boolean {
  const aValidated = a.status === "validated";
  const bValidated = b.status === "validated";
  if (aValidated !== bValidated) return aValidated;

  const byConfidence = CONFIDENCE_RANK[a.confidence] - CONFIDENCE_RANK[b.confidence];
  if (byConfidence !== 0) return byConfidence > 0;

  if (a.updatedAt !== b.updatedAt) return a.updatedAt > b.updatedAt;
  return a.id > b.id;
}

function compareChanges(a: ChangeRecord, b: ChangeRecord): number {
  if (a.percentDelta === null || b.percentDelta === null) {
    if (a.percentDelta !== b.percentDelta) return a.percentDelta === null ? -1 : 1;
  } else {
    const byMagnitude = Math.abs(b.percentDelta) - Math.abs(a.percentDelta);
    if (byMagnitude !== 0) return byMagnitude;
  }
  if (a.dimension !== b.dimension) return a.dimension < b.dimension ? -1 : 1;
  if (a.subjectLabel !== b.subjectLabel) return a.subjectLabel < b.subjectLabel ? -1 : 1;
  return 0;
}

export class ChangeDetector {
  private readonly repo: IntelligenceRepository;
  private readonly config: Readonly<QualityConfig>;
  private readonly log: Logger;

  constructor(repo: IntelligenceRepository, options: ChangeDetectorOptions = {}) {
    this.repo = repo;
    this.config = options.config ?? DEFAULT_QUALITY_CONFIG;
    this.log = (options.logger ?? silentLogger).child({ component: "changes" });
  }

  thresholdFor(dimension: string): number {
    return this.config.significance.thresholds[dimension] ?? this.config.significance.defaultThresholdPercent;
  }

  /**
   * Compare `periodNew` against `periodOld` (by default the period just
   * before it).
   */
  detectChanges(
    periodNew: ReportingPeriod,
    periodOld: ReportingPeriod = previousPeriod(periodNew),
    scope: ChangeScope = {}
  ): ChangeRecord[] {
    const oldPoints = this.representatives(periodOld, scope);
    const newPoints = this.representatives(periodNew, scope);
    const keys = new Set([...oldPoints.keys(), ...newPoints.keys()]);

    const changes: ChangeRecord[] = [];
    for (const key of keys) {
      changes.push(
        this.compare(oldPoints.get(key), newPoints.get(key), periodLabel(periodOld), periodLabel(periodNew))
      );
    }
    changes.sort(compareChanges);

    this.log.debug("Changes detected", {
      periodOld: periodLabel(periodOld),
      periodNew: periodLabel(periodNew),
      keys: changes.length,
    });
    return changes;
  }

  detectYearOverYear(year: number, scope?: ChangeScope): ChangeRecord[] {
    return this.detectChanges(yearPeriod(year), undefined, scope);
  }

  detectQuarterOverQuarter(year: number, quarter: number, scope?: ChangeScope): ChangeRecord[] {
    return this.detectChanges(quarterPeriod(year, quarter), undefined, scope);
  }

  detectMonthOverMonth(year: number, month: number, scope?: ChangeScope): ChangeRecord[] {
    return this.detectChanges(monthPeriod(year, month), undefined, scope);
  }

  /**
   * One representative numeric point per (dimension, subject) key.
   */
  private representatives(period: ReportingPeriod, scope: ChangeScope): Map<string, NumericPoint> {
    const statuses: ValidationStatus[] = this.config.changeDetection.includeOutdatedFallback
      ? ["validated", "outdated"]
      : ["validated"];

    const points = this.repo.getDataPoints({
      ...periodFilter(period),
      status: statuses,
      dimension: scope.dimension,
      sector: scope.sector,
    });

    const chosen = new Map<string, NumericPoint>();
    for (const record of points) {
      if (record.dimension.kind !== "numeric" || typeof record.value !== "number") continue;
      if (!Number.isFinite(record.value)) continue;

      const key = `${record.dimension.name}|${subjectKey(record.subject)}`;
      const current = chosen.get(key);
      if (current === undefined || outranks(record, current.record)) {
        chosen.set(key, { record, value: record.value });
      }
    }
    return chosen;
  }

  private compare(
    oldPoint: NumericPoint | undefined,
    newPoint: NumericPoint | undefined,
    periodOld: string,
    periodNew: string
  ): ChangeRecord {
    // Keys come from the union of both sides, so at least one is present
    const basis = newPoint ?? oldPoint;
    if (basis === undefined) {
      throw new Error("compare called without data points");
    }
    const { record } = basis;

    const oldValue = oldPoint?.value ?? null;
    const newValue = newPoint?.value ?? null;

    let delta: number | null = null;
    let percentDelta: number | null = null;
    let changeType: ChangeDirection;
    let significance: SignificanceLevel;

    if (oldValue === null) {
      changeType = "new-key";
      significance = "significant";
    } else if (newValue === null) {
      changeType = "removed-key";
      significance = "significant";
    } else {
      const raw = newValue - oldValue;
      delta = round(raw, 6);
      changeType = delta > 0 ? "increase" : delta < 0 ? "decrease" : "unchanged";
      if (oldValue === 0) {
        significance = newValue !== 0 ? "significant" : "minor";
      } else {
        percentDelta = round((raw / Math.abs(oldValue)) * 100, 4);
        significance =
          Math.abs(percentDelta) > this.thresholdFor(record.dimension.name) ? "significant" : "minor";
      }
    }

    return {
      dimension: record.dimension.name,
      unit: record.dimension.unit,
      subject: record.subject,
      subjectLabel: subjectLabel(record.subject),
      oldValue,
      newValue,
      delta,
      percentDelta,
      changeType,
      significance,
      periodOld,
      periodNew,
      oldDataPointId: oldPoint?.record.id ?? null,
      newDataPointId: newPoint?.record.id ?? null,
      fromOutdated: {
        old: oldPoint?.record.status === "outdated",
        new: newPoint?.record.status === "outdated",
      },
    };
  }
}
