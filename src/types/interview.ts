/**
 * Expert interviews: qualitative intelligence kept beside the data points.
 */

import { z } from "zod";
import { JsonValueSchema, type JsonValue } from "./data-point.js";
import { ValidationStatus } from "./enums.js";

const entries = z.array(z.string().trim().min(1));

/**
 * Interview as submitted by an analyst or an import file.
 */
export const InterviewInputSchema = z
  .object({
    expertName: z.string().trim().min(1),
    expertTitle: z.string().nullable().optional(),
    expertCompany: z.string().nullable().optional(),
    /** Calendar date, YYYY-MM-DD */
    interviewDate: z.string().date().nullable().optional(),
    topics: entries.default([]),
    keyInsights: entries.default([]),
    summary: z.string().nullable().optional(),
    status: ValidationStatus.default("pending"),
    metadata: z.record(JsonValueSchema).nullable().optional(),
  })
  .strict();
export type InterviewInput = z.input<typeof InterviewInputSchema>;

export interface Interview {
  readonly id: number;
  readonly expertName: string;
  readonly expertTitle: string | null;
  readonly expertCompany: string | null;
  readonly interviewDate: string | null;
  readonly topics: readonly string[];
  readonly keyInsights: readonly string[];
  readonly summary: string | null;
  readonly status: ValidationStatus;
  readonly metadata: Readonly<Record<string, JsonValue>> | null;
  readonly createdAt: string;
}

export interface InterviewFilter {
  status?: ValidationStatus;
  /** Exact topic, case-insensitive */
  topic?: string;
  expertCompany?: string;
}
