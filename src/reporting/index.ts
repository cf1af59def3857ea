/**
 * Read-only reports and file export.
 */

export {
  ReportGenerator,
  aggregate,
  sectorOf,
  type Aggregates,
  type BaseReport,
  type ByDimensionExport,
  type ChangesReport,
  type DimensionExportEntry,
  type DimensionReport,
  type FullExport,
  type InterviewReport,
  type InterviewSummary,
  type LatestValue,
  type PointSummary,
  type QueueItem,
  type Report,
  type ReportGeneratorOptions,
  type ReportType,
  type SectorReport,
  type TimeSeriesEntry,
  type TimeSeriesReport,
  type ValidationReport,
} from "./reports.js";
export {
  CSV_COLUMNS,
  CsvExporter,
  GROWTH_RATE_COLUMNS,
  JsonExporter,
  MARKET_SIZE_COLUMNS,
  SUMMARY_COLUMNS,
  fileTimestamp,
  safeFileName,
  summarizeForCsv,
  toCsvRow,
  toGrowthRateRows,
  toMarketSizeRows,
  type CsvColumn,
  type CsvRow,
  type ExporterOptions,
  type GrowthRateRow,
  type MarketSizeRow,
  type SummaryColumn,
  type SummaryRow,
} from "./exporters.js";
