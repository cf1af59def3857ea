/**
 * Domain enumerations.
 *
 * These are closed sets: the validation state machine, the confidence
 * ladder and the value kinds are checked exhaustively wherever a
 * `Record<Enum, ...>` or a `switch` consumes them.
 */

import { z } from "zod";

/**
 * Position of a data point in the quality-assurance workflow.
 *
 * pending    → ingested, awaiting a reviewer
 * in_review  → claimed by an analyst
 * validated  → confirmed (may later become outdated)
 * rejected   → terminal
 * outdated   → terminal; superseded or aged out
 */
export const ValidationStatus = z.enum([
  "pending",
  "in_review",
  "validated",
  "rejected",
  "outdated",
]);
export type ValidationStatus = z.infer<typeof ValidationStatus>;

/**
 * Analyst-assigned reliability tag.
 * Ordered strongest first.
 */
export const ConfidenceLevel = z.enum(["high", "medium", "low", "unverified"]);
export type ConfidenceLevel = z.infer<typeof ConfidenceLevel>;

/**
 * Rank used when choosing between data points of the same period.
 * Higher is stronger.
 */
export const CONFIDENCE_RANK: Record<ConfidenceLevel, number> = {
  high: 3,
  medium: 2,
  low: 1,
  unverified: 0,
};

/**
 * Semantic kind of the values a dimension holds.
 */
export const ValueKind = z.enum(["numeric", "text", "categorical"]);
export type ValueKind = z.infer<typeof ValueKind>;

/**
 * Entity a data point is about.
 */
export const SubjectType = z.enum(["sector", "subcategory", "company", "technology"]);
export type SubjectType = z.infer<typeof SubjectType>;

/**
 * Maturity of a cross-cutting technology.
 */
export const MaturityLevel = z.enum(["emerging", "growing", "mature"]);
export type MaturityLevel = z.infer<typeof MaturityLevel>;

/**
 * Relevance of a technology to a sector.
 */
export const Relevance = z.enum(["high", "medium", "low"]);
export type Relevance = z.infer<typeof Relevance>;

/**
 * Provenance category of a source.
 */
export const SourceType = z.enum([
  "research_report",
  "news",
  "company",
  "interview",
  "government",
  "manual",
]);
export type SourceType = z.infer<typeof SourceType>;
