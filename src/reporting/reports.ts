/**
 * ═══════════════════════════════════════════════════════════════════════════
 * REPORT GENERATOR
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Read-only views over the repository. Every report carries a
 * `reportType` and a `generatedAt` timestamp so exporters can name files
 * after it.
 *
 * Reports never write. Missing sectors and dimensions raise `NotFound`.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { NotFound } from "../errors.js";
import { ChangeDetector, type ChangeScope } from "../changes/detector.js";
import { periodLabel, previousPeriod, type ReportingPeriod } from "../changes/periods.js";
import { buildChangeReport, type ChangeReport } from "../changes/report.js";
import type { IntelligenceRepository } from "../repository/repository.js";
import type { DataPointRecord, PointValue } from "../types/data-point.js";
import type { ConfidenceLevel, ValidationStatus, ValueKind } from "../types/enums.js";
import type { Interview, InterviewFilter } from "../types/interview.js";
import type { DatabaseStatistics } from "../types/reference.js";
import { subjectLabel } from "../types/subject.js";
import { ValidationWorkflow, type ValidationStats } from "../validation/workflow.js";

export type ReportType =
  | "sector_intelligence"
  | "full_database"
  | "dimension_analysis"
  | "time_series"
  | "validation_status"
  | "changes"
  | "by_dimension"
  | "interview_intelligence";

export interface BaseReport {
  reportType: ReportType;
  generatedAt: string;
}

export interface PointSummary {
  id: number;
  dimension: string;
  subject: string;
  value: PointValue;
  year: number | null;
  quarter: number | null;
  month: number | null;
  source: string | null;
  sourceUrl: string | null;
  confidence: ConfidenceLevel;
  status: ValidationStatus;
  notes: string | null;
}

export interface LatestValue {
  value: PointValue;
  year: number | null;
  source: string | null;
}

export interface SectorReport extends BaseReport {
  reportType: "sector_intelligence";
  sector: string;
  description: string | null;
  subcategories: string[];
  dataPointsCount: number;
  dimensions: Record<string, PointSummary[]>;
  summary: {
    dimensionsCovered: string[];
    totalDataPoints: number;
    latestMarketSize: LatestValue | null;
    latestGrowthRate: LatestValue | null;
  };
}

export interface FullExport extends BaseReport {
  reportType: "full_database";
  version: string;
  statistics: DatabaseStatistics;
  schema: {
    sectors: Array<{ name: string; description: string | null; subcategories: string[] }>;
    dimensions: Array<{ name: string; unit: string | null; description: string | null; kind: ValueKind }>;
    technologies: Array<{ name: string; category: string | null; sectors: string[] }>;
  };
  /** Validated points by sector, then dimension */
  data: Record<string, Record<string, PointSummary[]>>;
}

export interface Aggregates {
  count: number;
  min: number;
  max: number;
  average: number;
}

export interface DimensionReport extends BaseReport {
  reportType: "dimension_analysis";
  dimension: string;
  unit: string | null;
  description: string | null;
  yearFilter: number | null;
  dataPointsCount: number;
  bySector: Record<string, PointSummary[]>;
  /** Over numeric values only; null when there are none */
  aggregates: Aggregates | null;
}

export interface TimeSeriesEntry {
  year: number | null;
  quarter: number | null;
  month: number | null;
  value: PointValue;
  source: string | null;
  confidence: ConfidenceLevel;
  status: ValidationStatus;
}

export interface TimeSeriesReport extends BaseReport {
  reportType: "time_series";
  sector: string;
  dimension: string;
  dataPointsCount: number;
  timeSeries: TimeSeriesEntry[];
}

export interface QueueItem {
  id: number;
  subject: string;
  dimension: string;
  value: PointValue;
  createdAt: string;
}

export interface ValidationReport extends BaseReport {
  reportType: "validation_status";
  statistics: ValidationStats;
  pendingItems: QueueItem[];
  inReviewItems: QueueItem[];
}

export interface ChangesReport extends BaseReport, Omit<ChangeReport, "periodOld" | "periodNew"> {
  reportType: "changes";
  periodOld: string;
  periodNew: string;
}

export interface DimensionExportEntry {
  value: PointValue;
  year: number | null;
  source: string | null;
  confidence: ConfidenceLevel;
  validation_status: ValidationStatus;
}

export interface ByDimensionExport extends BaseReport {
  reportType: "by_dimension";
  dimensions: Record<string, DimensionExportEntry[]>;
}

export interface InterviewSummary {
  id: number;
  expertName: string;
  expertTitle: string | null;
  expertCompany: string | null;
  interviewDate: string | null;
  topics: readonly string[];
  keyInsights: readonly string[];
  summary: string | null;
  validation_status: ValidationStatus;
}

export interface InterviewReport extends BaseReport {
  reportType: "interview_intelligence";
  totalInterviews: number;
  /** Interview count per topic, topics as first written */
  topics: Record<string, number>;
  interviews: InterviewSummary[];
}

export type Report =
  | SectorReport
  | FullExport
  | DimensionReport
  | TimeSeriesReport
  | ValidationReport
  | ChangesReport
  | ByDimensionExport
  | InterviewReport;

export interface ReportGeneratorOptions {
  now?: () => Date;
  detector?: ChangeDetector;
  workflow?: ValidationWorkflow;
}

const QUEUE_LIMIT = 100;
const UNCLASSIFIED = "unclassified";

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function toInterviewSummary(interview: Interview): InterviewSummary {
  return {
    id: interview.id,
    expertName: interview.expertName,
    expertTitle: interview.expertTitle,
    expertCompany: interview.expertCompany,
    interviewDate: interview.interviewDate,
    topics: interview.topics,
    keyInsights: interview.keyInsights,
    summary: interview.summary,
    validation_status: interview.status,
  };
}

function summarize(record: DataPointRecord): PointSummary {
  return {
    id: record.id,
    dimension: record.dimension.name,
    subject: subjectLabel(record.subject),
    value: record.value,
    year: record.year,
    quarter: record.quarter,
    month: record.month,
    source: record.source?.name ?? null,
    sourceUrl: record.source?.url ?? null,
    confidence: record.confidence,
    status: record.status,
    notes: record.notes,
  };
}

/**
 * Sector a point files under: its own for sector and subcategory
 * subjects, "unclassified" for companies and technologies.
 */
export function sectorOf(record: DataPointRecord): string {
  switch (record.subject.type) {
    case "sector":
      return record.subject.name;
    case "subcategory":
      return record.subject.sector;
    case "company":
    case "technology":
      return UNCLASSIFIED;
  }
}

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Record<string, T[]> {
  const groups: Record<string, T[]> = {};
  for (const item of items) {
    (groups[keyOf(item)] ??= []).push(item);
  }
  return groups;
}

function mapValues<T, U>(record: Record<string, T>, fn: (value: T) => U): Record<string, U> {
  const out: Record<string, U> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = fn(value);
  }
  return out;
}

/**
 * The summary with the greatest year; the first one wins a tie.
 */
function latestOf(points: readonly PointSummary[] | undefined): LatestValue | null {
  let latest: PointSummary | null = null;
  for (const point of points ?? []) {
    if (latest === null || (point.year ?? 0) > (latest.year ?? 0)) latest = point;
  }
  return latest === null ? null : { value: latest.value, year: latest.year, source: latest.source };
}

export function aggregate(values: readonly PointValue[]): Aggregates | null {
  const numbers = values.filter((v): v is number => typeof v === "number" && Number.isFinite(v));
  if (numbers.length === 0) return null;
  const sum = numbers.reduce((acc, n) => acc + n, 0);
  return {
    count: numbers.length,
    min: Math.min(...numbers),
    max: Math.max(...numbers),
    average: sum / numbers.length,
  };
}

function toQueueItem(record: DataPointRecord): QueueItem {
  return {
    id: record.id,
    subject: subjectLabel(record.subject),
    dimension: record.dimension.name,
    value: record.value,
    createdAt: record.createdAt,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// GENERATOR
// ═══════════════════════════════════════════════════════════════════════════

export class ReportGenerator {
  private readonly repo: IntelligenceRepository;
  private readonly now: () => Date;
  private readonly detector: ChangeDetector;
  private readonly workflow: ValidationWorkflow;

  constructor(repo: IntelligenceRepository, options: ReportGeneratorOptions = {}) {
    this.repo = repo;
    this.now = options.now ?? (() => new Date());
    this.detector = options.detector ?? new ChangeDetector(repo);
    this.workflow = options.workflow ?? new ValidationWorkflow(repo, { now: this.now });
  }

  private generatedAt(): string {
    return this.now().toISOString();
  }

  /**
   * Points for one sector and its subcategories, grouped by dimension.
   * Rejected and outdated points are left out; with `includePending`
   * false only validated points remain.
   *
   * @throws NotFound when the sector does not exist
   */
  generateSectorReport(name: string, options: { includePending?: boolean } = {}): SectorReport {
    const sector = this.repo.getSectorByName(name);
    if (sector === null) {
      throw new NotFound("sector", name);
    }

    const status: ValidationStatus[] =
      (options.includePending ?? true) ? ["pending", "in_review", "validated"] : ["validated"];
    const points = this.repo.getDataPoints({ sector: name, status }).map(summarize);
    const byDimension = groupBy(points, (p) => p.dimension);

    return {
      reportType: "sector_intelligence",
      generatedAt: this.generatedAt(),
      sector: sector.name,
      description: sector.description,
      subcategories: sector.subcategories.map((sc) => sc.name),
      dataPointsCount: points.length,
      dimensions: byDimension,
      summary: {
        dimensionsCovered: Object.keys(byDimension),
        totalDataPoints: points.length,
        latestMarketSize: latestOf(byDimension.market_size),
        latestGrowthRate: latestOf(byDimension.market_growth_rate),
      },
    };
  }

  /**
   * Reference data, statistics and every validated point.
   */
  generateFullExport(): FullExport {
    const validated = this.repo.getDataPoints({ status: "validated" });
    const bySector = groupBy(validated, sectorOf);

    return {
      reportType: "full_database",
      generatedAt: this.generatedAt(),
      version: "1.0",
      statistics: this.repo.getStatistics(),
      schema: {
        sectors: this.repo.getSectors().map((s) => ({
          name: s.name,
          description: s.description,
          subcategories: s.subcategories.map((sc) => sc.name),
        })),
        dimensions: this.repo.getDimensions().map((d) => ({
          name: d.name,
          unit: d.unit,
          description: d.description,
          kind: d.kind,
        })),
        technologies: this.repo.getTechnologies().map((t) => ({
          name: t.name,
          category: t.category,
          sectors: t.sectors.map((link) => link.sector),
        })),
      },
      data: mapValues(bySector, (records) =>
        mapValues(
          groupBy(records, (r) => r.dimension.name),
          (group) => group.map(summarize)
        )
      ),
    };
  }

  /**
   * One dimension across all subjects, with aggregates over its numeric
   * values.
   *
   * @throws NotFound when the dimension does not exist
   */
  generateDimensionReport(name: string, year?: number): DimensionReport {
    const dimension = this.repo.getDimensionByName(name);
    if (dimension === null) {
      throw new NotFound("dimension", name);
    }

    const records = this.repo.getDataPoints({
      dimension: name,
      year,
      status: ["pending", "in_review", "validated"],
    });

    return {
      reportType: "dimension_analysis",
      generatedAt: this.generatedAt(),
      dimension: dimension.name,
      unit: dimension.unit,
      description: dimension.description,
      yearFilter: year ?? null,
      dataPointsCount: records.length,
      bySector: mapValues(groupBy(records, sectorOf), (group) => group.map(summarize)),
      aggregates: aggregate(records.map((r) => r.value)),
    };
  }

  /**
   * Chronological series for a sector and dimension, oldest first.
   * Undated parts sort before dated ones.
   */
  generateTimeSeries(sector: string, dimension: string): TimeSeriesReport {
    const records = this.repo
      .getDataPoints({ sector, dimension, status: ["pending", "in_review", "validated"] })
      .sort(
        (a, b) =>
          (a.year ?? 0) - (b.year ?? 0) ||
          (a.quarter ?? 0) - (b.quarter ?? 0) ||
          (a.month ?? 0) - (b.month ?? 0) ||
          a.id - b.id
      );

    return {
      reportType: "time_series",
      generatedAt: this.generatedAt(),
      sector,
      dimension,
      dataPointsCount: records.length,
      timeSeries: records.map((r) => ({
        year: r.year,
        quarter: r.quarter,
        month: r.month,
        value: r.value,
        source: r.source?.name ?? null,
        confidence: r.confidence,
        status: r.status,
      })),
    };
  }

  generateValidationReport(): ValidationReport {
    return {
      reportType: "validation_status",
      generatedAt: this.generatedAt(),
      statistics: this.workflow.getValidationStats(),
      pendingItems: this.workflow.getPendingItems(QUEUE_LIMIT).map(toQueueItem),
      inReviewItems: this.workflow.getInReviewItems(QUEUE_LIMIT).map(toQueueItem),
    };
  }

  /**
   * Changes from the period before `period` to `period`.
   */
  generateChangesReport(period: ReportingPeriod, scope?: ChangeScope): ChangesReport {
    const previous = previousPeriod(period);
    const report = buildChangeReport(this.detector.detectChanges(period, previous, scope));
    return {
      ...report,
      reportType: "changes",
      generatedAt: this.generatedAt(),
      periodOld: periodLabel(previous),
      periodNew: periodLabel(period),
    };
  }

  /**
   * Every non-rejected point grouped by dimension name, latest period
   * first.
   */
  generateByDimensionExport(): ByDimensionExport {
    const records = this.repo.getDataPoints({ status: ["pending", "in_review", "validated", "outdated"] });
    return {
      reportType: "by_dimension",
      generatedAt: this.generatedAt(),
      dimensions: mapValues(
        groupBy(records, (r) => r.dimension.name),
        (group) =>
          group.map((r) => ({
            value: r.value,
            year: r.year,
            source: r.source?.name ?? null,
            confidence: r.confidence,
            validation_status: r.status,
          }))
      ),
    };
  }

  /**
   * Expert interviews, newest first. Rejected interviews are left out
   * unless a status filter asks for them.
   */
  generateInterviewReport(filters: InterviewFilter = {}): InterviewReport {
    const interviews = this.repo
      .getInterviews(filters)
      .filter((i) => filters.status !== undefined || i.status !== "rejected");

    const topics: Record<string, number> = {};
    const spelling = new Map<string, string>();
    for (const interview of interviews) {
      for (const topic of new Set(interview.topics.map((t) => t.toLowerCase()))) {
        const label = spelling.get(topic) ?? interview.topics.find((t) => t.toLowerCase() === topic) ?? topic;
        spelling.set(topic, label);
        topics[label] = (topics[label] ?? 0) + 1;
      }
    }

    return {
      reportType: "interview_intelligence",
      generatedAt: this.generatedAt(),
      totalInterviews: interviews.length,
      topics,
      interviews: interviews.map(toInterviewSummary),
    };
  }
}
