/**
 * Validation engine.
 *
 * Stateless evaluation of the rule set against one candidate. Every
 * selected rule runs; the verdict collects all failures rather than
 * stopping at the first.
 */

import type { QualityConfig } from "../config/quality/schema.js";
import { DEFAULT_QUALITY_CONFIG } from "../config/quality/defaults.js";
import type { DataPointRecord } from "../types/data-point.js";
import type { ValueKind } from "../types/enums.js";
import type { FailedRule } from "../errors.js";
import {
  DEFAULT_RULES,
  type RuleName,
  type RuleSeverity,
  type ValidationCandidate,
  type ValidationRule,
} from "./rules.js";

export interface RuleResult {
  rule: RuleName;
  severity: RuleSeverity;
  passed: boolean;
  reason: string | null;
}

export type Recommendation = "validate" | "review" | "reject";

export interface ValidationVerdict {
  /** No error-severity rule failed */
  passed: boolean;
  results: RuleResult[];
  /** Failed error-severity rules */
  failures: RuleResult[];
  /** Failed warning-severity rules */
  warnings: RuleResult[];
  recommendation: Recommendation;
}

export interface ValidationEngineOptions {
  config?: Readonly<QualityConfig>;
  now?: () => Date;
  rules?: readonly ValidationRule[];
}

export function candidateFromRecord(record: DataPointRecord): ValidationCandidate {
  return {
    dimension: record.dimension.name,
    kind: record.dimension.kind,
    value: record.value,
    year: record.year,
    confidence: record.confidence,
    hasSource: record.source !== null,
  };
}

/**
 * Candidate for a payload that has not been stored yet.
 */
export function candidateFromInput(
  input: {
    dimension: string;
    value: ValidationCandidate["value"];
    year?: number | null;
    confidence?: string;
    source?: unknown;
  },
  kind: ValueKind
): ValidationCandidate {
  return {
    dimension: input.dimension,
    kind,
    value: input.value,
    year: input.year ?? null,
    confidence: input.confidence ?? "medium",
    hasSource: input.source !== undefined && input.source !== null,
  };
}

export function toFailedRules(results: readonly RuleResult[]): FailedRule[] {
  return results.map((r) => ({ rule: r.rule, reason: r.reason ?? "failed" }));
}

export class ValidationEngine {
  private readonly config: Readonly<QualityConfig>;
  private readonly now: () => Date;
  private readonly rules: ReadonlyMap<RuleName, ValidationRule>;

  constructor(options: ValidationEngineOptions = {}) {
    this.config = options.config ?? DEFAULT_QUALITY_CONFIG;
    this.now = options.now ?? (() => new Date());
    this.rules = new Map((options.rules ?? DEFAULT_RULES).map((rule) => [rule.name, rule]));
  }

  get ruleNames(): RuleName[] {
    return [...this.rules.keys()];
  }

  /**
   * Run one rule by name.
   */
  runRule(name: RuleName, candidate: ValidationCandidate): RuleResult {
    const rule = this.rules.get(name);
    if (rule === undefined) {
      throw new Error(`Rule not registered: ${name}`);
    }
    const reason = rule.check(candidate, {
      currentYear: this.now().getUTCFullYear(),
      config: this.config,
    });
    return { rule: rule.name, severity: rule.severity, passed: reason === null, reason };
  }

  /**
   * Run the selected rules (all by default) and derive a recommendation.
   */
  evaluate(candidate: ValidationCandidate, only?: readonly RuleName[]): ValidationVerdict {
    const names = only ?? this.ruleNames;
    const results = names.map((name) => this.runRule(name, candidate));
    const failures = results.filter((r) => !r.passed && r.severity === "error");
    const warnings = results.filter((r) => !r.passed && r.severity === "warning");

    return {
      passed: failures.length === 0,
      results,
      failures,
      warnings,
      recommendation: recommend(failures, warnings),
    };
  }

  evaluateRecord(record: DataPointRecord): ValidationVerdict {
    return this.evaluate(candidateFromRecord(record));
  }
}

function recommend(failures: readonly RuleResult[], warnings: readonly RuleResult[]): Recommendation {
  if (failures.some((f) => f.rule === "value_not_null") || failures.length >= 2) {
    return "reject";
  }
  if (failures.length > 0 || warnings.length > 0) {
    return "review";
  }
  return "validate";
}
