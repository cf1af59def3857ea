/**
 * Shared terminal output for the CLIs: colors, headers, record lines and
 * error rendering.
 */

import { ConfigError } from "../config/env.js";
import { QualityConfigError } from "../config/quality/loader.js";
import { periodFromParts, periodLabel } from "../changes/periods.js";
import { IntelligenceError } from "../errors.js";
import type { DataPointRecord, PointValue } from "../types/data-point.js";
import { ValidationStatus } from "../types/enums.js";
import { subjectLabel } from "../types/subject.js";
import { RULE_NAMES, isRuleName, type RuleName } from "../validation/rules.js";

/**
 * Bad command line. Printed with the usage hint, exit code 1.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// ============================================================
// Colors
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

export function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

export function printHeader(title: string): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", ` ${title}`));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
}

// ============================================================
// Records
// ============================================================

export function formatValue(value: PointValue, unit: string | null): string {
  if (value === null) return "(no value)";
  const text = typeof value === "object" ? JSON.stringify(value) : String(value);
  return unit !== null && typeof value === "number" ? `${text} ${unit}` : text;
}

export function recordPeriod(record: DataPointRecord): string {
  if (record.year === null) return "undated";
  return periodLabel(periodFromParts(record.year, record.quarter ?? undefined, record.month ?? undefined));
}

/**
 * `#12 [pending] Mobile Robotics - market_size 2025: 45.2 USD billions (medium, Example Research)`
 */
export function describeRecord(record: DataPointRecord): string {
  const source = record.source?.name ?? "no source";
  return (
    `#${record.id} [${record.status}] ${subjectLabel(record.subject)} - ${record.dimension.name} ` +
    `${recordPeriod(record)}: ${formatValue(record.value, record.dimension.unit)} ` +
    `(${record.confidence}, ${source})`
  );
}

// ============================================================
// Arguments
// ============================================================

/**
 * Parse an integer option; undefined passes through.
 */
export function intOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new UsageError(`--${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

export function statusOption(value: string | undefined): ValidationStatus | undefined {
  if (value === undefined) return undefined;
  const parsed = ValidationStatus.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(`--status must be one of ${ValidationStatus.options.join(", ")}, got '${value}'`);
  }
  return parsed.data;
}

/**
 * Comma-separated rule names; undefined means every rule.
 */
export function ruleList(value: string | undefined): RuleName[] | undefined {
  if (value === undefined) return undefined;
  const names = value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name !== "");
  const rules: RuleName[] = [];
  for (const name of names) {
    if (!isRuleName(name)) {
      throw new UsageError(`Unknown rule '${name}'. Rules: ${RULE_NAMES.join(", ")}`);
    }
    rules.push(name);
  }
  if (rules.length === 0) {
    throw new UsageError("--rules names no rule");
  }
  return rules;
}

export function requirePositional(positionals: readonly string[], index: number, what: string): string {
  const value = positionals[index];
  if (value === undefined || value.trim() === "") {
    throw new UsageError(`Missing ${what}`);
  }
  return value;
}

export function idArgument(positionals: readonly string[]): number {
  const raw = requirePositional(positionals, 1, "data point id");
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new UsageError(`Data point id must be a positive integer, got '${raw}'`);
  }
  return id;
}

// ============================================================
// Errors
// ============================================================

export function printError(err: unknown, usage: string): void {
  if (err instanceof UsageError) {
    console.error(c("red", `Error: ${err.message}`));
    console.error(`  ${usage}`);
  } else if (err instanceof IntelligenceError || err instanceof QualityConfigError) {
    console.error(c("red", err.format()));
  } else if (err instanceof ConfigError) {
    console.error(c("red", `Configuration error: ${err.message}`));
  } else {
    console.error("Unexpected error:", err);
  }
}

/**
 * Run a CLI entry point and exit with its code; any error exits 1.
 */
export function runCli(main: () => Promise<number>, usage: string): void {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      printError(err, usage);
      process.exit(1);
    });
}
