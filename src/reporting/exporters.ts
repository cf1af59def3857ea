/**
 * File exporters for reports (JSON) and data point tables (CSV).
 *
 * Files land in the export directory unless an explicit path is given.
 * Default file names carry the report type and a UTC timestamp, e.g.
 * `validation_status_20260615_120000.json`.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { stringify } from "csv-stringify/sync";

import { silentLogger, type Logger } from "../logging/logger.js";
import type { DataPointRecord } from "../types/data-point.js";
import type { Report } from "./reports.js";

export interface ExporterOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * `YYYYMMDD_HHMMSS` in UTC.
 */
export function fileTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replaceAll("-", "")}_${iso.slice(11, 19).replaceAll(":", "")}`;
}

/**
 * "Mobile Robotics" → "mobile_robotics".
 */
export function safeFileName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

function writeFile(path: string, content: string): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, "utf-8");
  return path;
}

// ═══════════════════════════════════════════════════════════════════════════
// JSON
// ═══════════════════════════════════════════════════════════════════════════

export class JsonExporter {
  private readonly exportDir: string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(exportDir: string, options: ExporterOptions = {}) {
    this.exportDir = exportDir;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? silentLogger).child({ component: "export" });
  }

  defaultFileName(report: Report): string {
    return `${report.reportType}_${fileTimestamp(this.now())}.json`;
  }

  /**
   * Write a report as indented JSON.
   *
   * @param fileName - name inside the export directory; an absolute path is used as is
   * @returns path of the written file
   */
  exportReport(report: Report, fileName = this.defaultFileName(report)): string {
    const path = writeFile(resolve(this.exportDir, fileName), `${JSON.stringify(report, null, 2)}\n`);
    this.log.info("Report exported", { reportType: report.reportType, path });
    return path;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CSV
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Spreadsheet-friendly data point columns.
 */
export const CSV_COLUMNS = [
  "id",
  "sector",
  "subcategory",
  "dimension",
  "dimension_unit",
  "value_numeric",
  "value_text",
  "year",
  "quarter",
  "month",
  "source_name",
  "source_url",
  "confidence",
  "validation_status",
  "validated_by",
  "validated_at",
  "notes",
  "created_at",
  "updated_at",
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export type CsvRow = Record<CsvColumn, string | number | null>;

export const SUMMARY_COLUMNS = [
  "sector",
  "dimension",
  "count",
  "min_value",
  "max_value",
  "avg_value",
  "year_range",
  "source_count",
  "high_confidence",
  "medium_confidence",
  "low_confidence",
] as const;

export type SummaryColumn = (typeof SUMMARY_COLUMNS)[number];

export type SummaryRow = Record<SummaryColumn, string | number | null>;

/**
 * Sector and subcategory cells for a record. Company and technology
 * subjects leave both blank.
 */
function taxonomyCells(record: DataPointRecord): { sector: string | null; subcategory: string | null } {
  switch (record.subject.type) {
    case "sector":
      return { sector: record.subject.name, subcategory: null };
    case "subcategory":
      return { sector: record.subject.sector, subcategory: record.subject.name };
    case "company":
    case "technology":
      return { sector: null, subcategory: null };
  }
}

export function toCsvRow(record: DataPointRecord): CsvRow {
  const { value } = record;
  return {
    id: record.id,
    ...taxonomyCells(record),
    dimension: record.dimension.name,
    dimension_unit: record.dimension.unit,
    value_numeric: typeof value === "number" ? value : null,
    value_text:
      typeof value === "string" ? value : value !== null && typeof value === "object" ? JSON.stringify(value) : null,
    year: record.year,
    quarter: record.quarter,
    month: record.month,
    source_name: record.source?.name ?? null,
    source_url: record.source?.url ?? null,
    confidence: record.confidence,
    validation_status: record.status,
    validated_by: record.validatedBy,
    validated_at: record.validatedAt,
    notes: record.notes,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}

/**
 * One row per (sector, dimension) with value range and confidence mix,
 * ordered by sector then dimension.
 */
export function summarizeForCsv(records: readonly DataPointRecord[]): SummaryRow[] {
  interface Bucket {
    sector: string;
    dimension: string;
    count: number;
    values: number[];
    years: number[];
    sources: Set<string>;
    confidence: { high: number; medium: number; low: number };
  }

  const buckets = new Map<string, Bucket>();
  for (const record of records) {
    const sector = taxonomyCells(record).sector ?? "unclassified";
    const key = `${sector}|${record.dimension.name}`;
    let bucket = buckets.get(key);
    if (bucket === undefined) {
      bucket = {
        sector,
        dimension: record.dimension.name,
        count: 0,
        values: [],
        years: [],
        sources: new Set(),
        confidence: { high: 0, medium: 0, low: 0 },
      };
      buckets.set(key, bucket);
    }

    bucket.count += 1;
    if (typeof record.value === "number" && Number.isFinite(record.value)) bucket.values.push(record.value);
    if (record.year !== null) bucket.years.push(record.year);
    if (record.source !== null) bucket.sources.add(record.source.name);
    if (record.confidence !== "unverified") bucket.confidence[record.confidence] += 1;
  }

  return [...buckets.values()]
    .sort((a, b) => a.sector.localeCompare(b.sector) || a.dimension.localeCompare(b.dimension))
    .map((b) => ({
      sector: b.sector,
      dimension: b.dimension,
      count: b.count,
      min_value: b.values.length > 0 ? Math.min(...b.values) : null,
      max_value: b.values.length > 0 ? Math.max(...b.values) : null,
      avg_value:
        b.values.length > 0
          ? Math.round((b.values.reduce((sum, v) => sum + v, 0) / b.values.length) * 100) / 100
          : null,
      year_range: b.years.length > 0 ? `${Math.min(...b.years)}-${Math.max(...b.years)}` : "",
      source_count: b.sources.size,
      high_confidence: b.confidence.high,
      medium_confidence: b.confidence.medium,
      low_confidence: b.confidence.low,
    }));
}

// ═══════════════════════════════════════════════════════════════════════════
// DIMENSION TABLES
// ═══════════════════════════════════════════════════════════════════════════

export const GROWTH_RATE_COLUMNS = [
  "sector",
  "cagr_percent",
  "forecast_year",
  "source_name",
  "source_url",
  "confidence",
  "notes",
] as const;

export type GrowthRateRow = Record<(typeof GROWTH_RATE_COLUMNS)[number], string | number | null>;

export const MARKET_SIZE_COLUMNS = [
  "sector",
  "market_size_usd_billions",
  "year",
  "source_name",
  "source_url",
  "confidence",
  "notes",
] as const;

export type MarketSizeRow = Record<(typeof MARKET_SIZE_COLUMNS)[number], string | number | null>;

interface NumericPoint {
  record: DataPointRecord;
  sector: string;
  value: number;
}

/**
 * Points of one dimension that hold a number. Points outside the sector
 * taxonomy sort under an empty sector.
 */
function numericPoints(records: readonly DataPointRecord[], dimension: string): NumericPoint[] {
  const points: NumericPoint[] = [];
  for (const record of records) {
    if (record.dimension.name !== dimension || typeof record.value !== "number") continue;
    points.push({ record, sector: taxonomyCells(record).sector ?? "", value: record.value });
  }
  return points;
}

function provenanceCells(record: DataPointRecord) {
  return {
    source_name: record.source?.name ?? null,
    source_url: record.source?.url ?? null,
    confidence: record.confidence,
    notes: record.notes,
  };
}

/**
 * Growth rates by sector, highest rate first within a sector.
 */
export function toGrowthRateRows(records: readonly DataPointRecord[]): GrowthRateRow[] {
  return numericPoints(records, "market_growth_rate")
    .sort((a, b) => a.sector.localeCompare(b.sector) || b.value - a.value)
    .map(({ record, sector, value }) => ({
      sector,
      cagr_percent: value,
      forecast_year: record.year,
      ...provenanceCells(record),
    }));
}

/**
 * Market sizes by sector, oldest year first within a sector.
 */
export function toMarketSizeRows(records: readonly DataPointRecord[]): MarketSizeRow[] {
  return numericPoints(records, "market_size")
    .sort((a, b) => a.sector.localeCompare(b.sector) || (a.record.year ?? 0) - (b.record.year ?? 0))
    .map(({ record, sector, value }) => ({
      sector,
      market_size_usd_billions: value,
      year: record.year,
      ...provenanceCells(record),
    }));
}

export class CsvExporter {
  private readonly exportDir: string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(exportDir: string, options: ExporterOptions = {}) {
    this.exportDir = exportDir;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? silentLogger).child({ component: "export" });
  }

  toCsv(records: readonly DataPointRecord[]): string {
    return stringify(records.map(toCsvRow), { header: true, columns: [...CSV_COLUMNS] });
  }

  summaryCsv(records: readonly DataPointRecord[]): string {
    return stringify(summarizeForCsv(records), { header: true, columns: [...SUMMARY_COLUMNS] });
  }

  /**
   * @returns path of the written file
   */
  exportDataPoints(records: readonly DataPointRecord[], path?: string): string {
    const target = path ?? join(this.exportDir, `robotics_data_${fileTimestamp(this.now())}.csv`);
    writeFile(target, this.toCsv(records));
    this.log.info("Data points exported", { rows: records.length, path: target });
    return target;
  }

  exportSummary(records: readonly DataPointRecord[], path?: string): string {
    const target = path ?? join(this.exportDir, `robotics_summary_${fileTimestamp(this.now())}.csv`);
    writeFile(target, this.summaryCsv(records));
    this.log.info("Summary exported", { path: target });
    return target;
  }

  growthRatesCsv(records: readonly DataPointRecord[]): string {
    return stringify(toGrowthRateRows(records), { header: true, columns: [...GROWTH_RATE_COLUMNS] });
  }

  marketSizesCsv(records: readonly DataPointRecord[]): string {
    return stringify(toMarketSizeRows(records), { header: true, columns: [...MARKET_SIZE_COLUMNS] });
  }

  /**
   * @returns path of the written file, or null when no point holds a growth rate
   */
  exportGrowthRates(records: readonly DataPointRecord[], path?: string): string | null {
    const rows = toGrowthRateRows(records);
    if (rows.length === 0) {
      this.log.warn("No growth rate data to export");
      return null;
    }
    const target = path ?? join(this.exportDir, `growth_rates_${fileTimestamp(this.now())}.csv`);
    writeFile(target, stringify(rows, { header: true, columns: [...GROWTH_RATE_COLUMNS] }));
    this.log.info("Growth rates exported", { rows: rows.length, path: target });
    return target;
  }

  /**
   * @returns path of the written file, or null when no point holds a market size
   */
  exportMarketSizes(records: readonly DataPointRecord[], path?: string): string | null {
    const rows = toMarketSizeRows(records);
    if (rows.length === 0) {
      this.log.warn("No market size data to export");
      return null;
    }
    const target = path ?? join(this.exportDir, `market_sizes_${fileTimestamp(this.now())}.csv`);
    writeFile(target, stringify(rows, { header: true, columns: [...MARKET_SIZE_COLUMNS] }));
    this.log.info("Market sizes exported", { rows: rows.length, path: target });
    return target;
  }
}
