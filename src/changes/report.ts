/**
 * Summaries and plain-text rendering of detected changes.
 */

import type { ChangeRecord, ChangeDirection, SignificanceLevel } from "./detector.js";

export interface ChangeSummary {
  total: number;
  significant: number;
  minor: number;
  byType: Record<ChangeDirection, number>;
}

export interface ChangeReport {
  periodOld: string | null;
  periodNew: string | null;
  summary: ChangeSummary;
  bySignificance: Record<SignificanceLevel, ChangeRecord[]>;
  /** Keyed by subject label, in the order subjects first appear */
  bySubject: Record<string, ChangeRecord[]>;
  changes: ChangeRecord[];
}

export function buildChangeReport(changes: readonly ChangeRecord[]): ChangeReport {
  const byType: Record<ChangeDirection, number> = {
    increase: 0,
    decrease: 0,
    unchanged: 0,
    "new-key": 0,
    "removed-key": 0,
  };
  const bySignificance: Record<SignificanceLevel, ChangeRecord[]> = { significant: [], minor: [] };
  const bySubject: Record<string, ChangeRecord[]> = {};

  for (const change of changes) {
    byType[change.changeType] += 1;
    bySignificance[change.significance].push(change);
    (bySubject[change.subjectLabel] ??= []).push(change);
  }

  const first = changes[0];
  return {
    periodOld: first?.periodOld ?? null,
    periodNew: first?.periodNew ?? null,
    summary: {
      total: changes.length,
      significant: bySignificance.significant.length,
      minor: bySignificance.minor.length,
      byType,
    },
    bySignificance,
    bySubject,
    changes: [...changes],
  };
}

function formatValue(value: number, unit: string | null): string {
  return unit !== null ? `${value} ${unit}` : String(value);
}

function formatPercent(percent: number | null): string {
  if (percent === null) return "n/a";
  const sign = percent > 0 ? "+" : "";
  return `${sign}${percent.toFixed(1)}%`;
}

function describeChange(change: ChangeRecord): string {
  const { oldValue, newValue, unit } = change;
  if (oldValue === null && newValue !== null) {
    return `new: ${formatValue(newValue, unit)}`;
  }
  if (newValue === null && oldValue !== null) {
    return `removed (was ${formatValue(oldValue, unit)})`;
  }
  if (oldValue !== null && newValue !== null) {
    return `${oldValue} -> ${formatValue(newValue, unit)} (${formatPercent(change.percentDelta)})`;
  }
  return "no data";
}

/**
 * One line per change, significant ones flagged:
 *
 *   [SIG] Mobile Robotics - market_size: 40 -> 45.2 USD billions (+13.0%)
 */
export function formatChangesAsText(changes: readonly ChangeRecord[]): string {
  if (changes.length === 0) {
    return "No changes detected.";
  }

  const first = changes[0];
  const lines = [`Changes ${first.periodOld} -> ${first.periodNew}`, ""];
  for (const change of changes) {
    const flag = change.significance === "significant" ? "[SIG]" : "     ";
    const outdated = change.fromOutdated.old || change.fromOutdated.new ? " [outdated source]" : "";
    lines.push(
      `${flag} ${change.subjectLabel} - ${change.dimension}: ${describeChange(change)}${outdated}`
    );
  }
  return lines.join("\n");
}
