/**
 * Reporting periods for period-over-period comparison.
 *
 * A period selects data points at exactly its granularity: a year period
 * matches annual points only (no quarter, no month), a quarter period
 * matches quarterly points without a month.
 */

export type ReportingPeriod =
  | { readonly kind: "year"; readonly year: number }
  | { readonly kind: "quarter"; readonly year: number; readonly quarter: number }
  | { readonly kind: "month"; readonly year: number; readonly month: number };

export type Granularity = ReportingPeriod["kind"];

export function yearPeriod(year: number): ReportingPeriod {
  return { kind: "year", year };
}

export function quarterPeriod(year: number, quarter: number): ReportingPeriod {
  if (!Number.isInteger(quarter) || quarter < 1 || quarter > 4) {
    throw new RangeError(`Quarter must be 1-4, got ${quarter}`);
  }
  return { kind: "quarter", year, quarter };
}

export function monthPeriod(year: number, month: number): ReportingPeriod {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Month must be 1-12, got ${month}`);
  }
  return { kind: "month", year, month };
}

/**
 * Period from optional parts; the finest part given wins.
 */
export function periodFromParts(year: number, quarter?: number, month?: number): ReportingPeriod {
  if (month !== undefined) return monthPeriod(year, month);
  if (quarter !== undefined) return quarterPeriod(year, quarter);
  return yearPeriod(year);
}

/**
 * The period one unit earlier. January steps back to December of the
 * previous year, Q1 to Q4.
 */
export function previousPeriod(period: ReportingPeriod): ReportingPeriod {
  switch (period.kind) {
    case "year":
      return yearPeriod(period.year - 1);
    case "quarter":
      return period.quarter === 1
        ? quarterPeriod(period.year - 1, 4)
        : quarterPeriod(period.year, period.quarter - 1);
    case "month":
      return period.month === 1
        ? monthPeriod(period.year - 1, 12)
        : monthPeriod(period.year, period.month - 1);
  }
}

/**
 * "2025", "2025-Q2" or "2025-05".
 */
export function periodLabel(period: ReportingPeriod): string {
  switch (period.kind) {
    case "year":
      return String(period.year);
    case "quarter":
      return `${period.year}-Q${period.quarter}`;
    case "month":
      return `${period.year}-${String(period.month).padStart(2, "0")}`;
  }
}

/**
 * Repository filter selecting points at exactly this period.
 */
export function periodFilter(period: ReportingPeriod): {
  year: number;
  quarter: number | null;
  month: number | null;
} {
  switch (period.kind) {
    case "year":
      return { year: period.year, quarter: null, month: null };
    case "quarter":
      return { year: period.year, quarter: period.quarter, month: null };
    case "month":
      return { year: period.year, quarter: Math.ceil(period.month / 3), month: period.month };
  }
}
