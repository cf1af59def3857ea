/**
 * Data point subjects.
 *
 * A data point is about exactly one entity. The reference is a tagged
 * union, so "exactly one subject" holds by construction for typed callers;
 * untyped payloads go through `SubjectRefSchema`.
 */

import { z } from "zod";
import type { SubjectType } from "./enums.js";

/**
 * Subject as named by a producer (ingestion, CLI, tests).
 * Subcategory names are only unique within their sector.
 */
export const SubjectRefSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("sector"), name: z.string().min(1) }).strict(),
  z
    .object({
      type: z.literal("subcategory"),
      sector: z.string().min(1),
      name: z.string().min(1),
    })
    .strict(),
  z.object({ type: z.literal("company"), name: z.string().min(1) }).strict(),
  z.object({ type: z.literal("technology"), name: z.string().min(1) }).strict(),
]);
export type SubjectRef = z.infer<typeof SubjectRefSchema>;

/**
 * Subject as stored: resolved id plus display names.
 */
export type Subject =
  | { readonly type: "sector"; readonly id: number; readonly name: string }
  | {
      readonly type: "subcategory";
      readonly id: number;
      readonly name: string;
      readonly sectorId: number;
      readonly sector: string;
    }
  | { readonly type: "company"; readonly id: number; readonly name: string }
  | { readonly type: "technology"; readonly id: number; readonly name: string };

/**
 * Stable key for grouping by subject, e.g. "sector:3".
 */
export type SubjectKey = `${SubjectType}:${number}`;

export function subjectKey(subject: Subject): SubjectKey {
  return `${subject.type}:${subject.id}`;
}

/**
 * Human-readable label, e.g. "Mobile Robotics / Drones/UAVs".
 */
export function subjectLabel(subject: Subject | SubjectRef): string {
  switch (subject.type) {
    case "subcategory":
      return `${subject.sector} / ${subject.name}`;
    case "sector":
    case "company":
    case "technology":
      return subject.name;
  }
}

/**
 * Convert a stored subject back into the reference a producer would use.
 */
export function toSubjectRef(subject: Subject): SubjectRef {
  if (subject.type === "subcategory") {
    return { type: "subcategory", sector: subject.sector, name: subject.name };
  }
  return { type: subject.type, name: subject.name };
}
