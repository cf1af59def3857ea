/**
 * Data-quality configuration loader and validator.
 *
 * Responsible for:
 * - Overlaying a partial JSON file on the defaults
 * - Validating against the schema with fail-fast behavior
 * - Freezing configuration to enforce immutability
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { QualityConfigSchema, type QualityConfig } from "./schema.js";
import { DEFAULT_QUALITY_CONFIG } from "./defaults.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for quality configuration.
 */
export class QualityConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[] = []) {
    super(message);
    this.name = "QualityConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Overlay `override` on `base`, merging nested objects key by key.
 * Arrays and scalars in the override replace the base value.
 */
function overlay(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value) ? overlay(current, value) : value;
  }
  return merged;
}

/**
 * Validate and load quality configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen QualityConfig
 * @throws QualityConfigError if validation fails
 */
export function loadQualityConfig(input: unknown = DEFAULT_QUALITY_CONFIG): Readonly<QualityConfig> {
  const result = QualityConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new QualityConfigError(
      `Invalid quality configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Load quality configuration from a JSON file layered over the defaults.
 * Only the keys present in the file are overridden; `bounds` and
 * `significance.thresholds` merge per dimension.
 */
export function loadQualityConfigFile(path: string): Readonly<QualityConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new QualityConfigError(`Cannot read quality configuration ${path}: ${detail}`);
  }

  if (!isPlainObject(raw)) {
    throw new QualityConfigError(`Quality configuration ${path} must be a JSON object`);
  }

  return loadQualityConfig(overlay({ ...DEFAULT_QUALITY_CONFIG }, raw));
}
