/**
 * Period-over-period change detection.
 */

export {
  monthPeriod,
  periodFilter,
  periodFromParts,
  periodLabel,
  previousPeriod,
  quarterPeriod,
  yearPeriod,
  type Granularity,
  type ReportingPeriod,
} from "./periods.js";
export {
  ChangeDetector,
  type ChangeDetectorOptions,
  type ChangeRecord,
  type ChangeScope,
  type ChangeDirection,
  type SignificanceLevel,
} from "./detector.js";
export { buildChangeReport, formatChangesAsText, type ChangeReport, type ChangeSummary } from "./report.js";
