/**
 * Validation engine and review workflow.
 */

export {
  DEFAULT_RULES,
  RULE_NAMES,
  isRuleName,
  type RuleName,
  type RuleSeverity,
  type RuleContext,
  type ValidationCandidate,
  type ValidationRule,
} from "./rules.js";
export {
  ValidationEngine,
  candidateFromInput,
  candidateFromRecord,
  type Recommendation,
  type RuleResult,
  type ValidationVerdict,
} from "./engine.js";
export { TRANSITIONS, canTransition, isTerminal, assertTransition } from "./transitions.js";
export {
  ValidationWorkflow,
  type AutoValidateOutcome,
  type BatchItemOutcome,
  type SweepOptions,
  type ValidateOutcome,
  type ValidationStats,
} from "./workflow.js";
