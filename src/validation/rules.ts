/**
 * ═══════════════════════════════════════════════════════════════════════════
 * VALIDATION RULES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Each rule inspects one aspect of a candidate data point and returns a
 * failure reason, or null when it passes. Rules are pure: the current
 * year and the quality thresholds arrive through the context.
 *
 * Severity:
 *   error   → blocks the transition to `validated`
 *   warning → shapes the recommendation only
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { QualityConfig } from "../config/quality/schema.js";
import { ConfidenceLevel, type ValueKind } from "../types/enums.js";
import type { PointValue } from "../types/data-point.js";

/**
 * Subset of a data point the rules look at. `confidence` is a plain
 * string so unchecked producer input can be evaluated too.
 */
export interface ValidationCandidate {
  dimension: string;
  kind: ValueKind;
  value: PointValue;
  year: number | null;
  confidence: string;
  hasSource: boolean;
}

export interface RuleContext {
  currentYear: number;
  config: Readonly<QualityConfig>;
}

export type RuleSeverity = "error" | "warning";

export const RULE_NAMES = [
  "has_source",
  "has_year",
  "value_not_null",
  "reasonable_bounds",
  "recent_year",
  "valid_confidence",
] as const;

export type RuleName = (typeof RULE_NAMES)[number];

export interface ValidationRule {
  readonly name: RuleName;
  readonly severity: RuleSeverity;
  readonly description: string;
  check(candidate: ValidationCandidate, ctx: RuleContext): string | null;
}

export function isRuleName(value: string): value is RuleName {
  return RULE_NAMES.some((name) => name === value);
}

// ═══════════════════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════════════════

const hasSource: ValidationRule = {
  name: "has_source",
  severity: "error",
  description: "Data point cites a source unless marked unverified",
  check(c) {
    if (c.hasSource || c.confidence === "unverified") return null;
    return "No source recorded";
  },
};

const hasYear: ValidationRule = {
  name: "has_year",
  severity: "error",
  description: "Year is present and plausible",
  check(c, { currentYear, config }) {
    if (c.year === null) return "Year is missing";
    if (!Number.isInteger(c.year)) return `Year ${c.year} is not a whole number`;
    const max = currentYear + config.futureYearAllowance;
    if (c.year < config.minYear || c.year > max) {
      return `Year ${c.year} is outside [${config.minYear}, ${max}]`;
    }
    return null;
  },
};

const valueNotNull: ValidationRule = {
  name: "value_not_null",
  severity: "error",
  description: "Value is present and usable",
  check(c) {
    const { value } = c;
    if (value === null) return "Value is missing";
    if (typeof value === "string") {
      return value.trim() === "" ? "Value is blank" : null;
    }
    if (typeof value === "number") {
      return Number.isFinite(value) ? null : `Value ${value} is not a finite number`;
    }
    if (Array.isArray(value)) {
      return value.length === 0 ? "Value is an empty list" : null;
    }
    return Object.keys(value).length === 0 ? "Value is an empty object" : null;
  },
};

const reasonableBounds: ValidationRule = {
  name: "reasonable_bounds",
  severity: "error",
  description: "Numeric value lies within the dimension's plausible range",
  check(c, { config }) {
    if (typeof c.value !== "number" || !Number.isFinite(c.value)) return null;
    const bounds = config.bounds[c.dimension];
    if (bounds === undefined) return null;
    if (bounds.min !== undefined && c.value < bounds.min) {
      return `${c.value} is below the minimum of ${bounds.min} for ${c.dimension}`;
    }
    if (bounds.max !== undefined && c.value > bounds.max) {
      return `${c.value} is above the maximum of ${bounds.max} for ${c.dimension}`;
    }
    return null;
  },
};

const recentYear: ValidationRule = {
  name: "recent_year",
  severity: "warning",
  description: "Data is recent",
  check(c, { currentYear, config }) {
    if (c.year === null) return null;
    const oldest = currentYear - config.recencyYears;
    if (c.year < oldest) {
      return `Data from ${c.year} is more than ${config.recencyYears} years old`;
    }
    return null;
  },
};

const validConfidence: ValidationRule = {
  name: "valid_confidence",
  severity: "error",
  description: "Confidence is a known level",
  check(c) {
    if (ConfidenceLevel.safeParse(c.confidence).success) return null;
    return `Unknown confidence level '${c.confidence}'`;
  },
};

export const DEFAULT_RULES: readonly ValidationRule[] = [
  hasSource,
  hasYear,
  valueNotNull,
  reasonableBounds,
  recentYear,
  validConfidence,
];
