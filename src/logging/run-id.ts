/**
 * Run IDs tie together every log line written by one CLI invocation.
 * Format: UTC date + random hex suffix, e.g. "20260615-a1b2c3".
 */

import { randomBytes } from "node:crypto";

const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

let currentRunId: string | null = null;

export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${datePart}-${randomBytes(3).toString("hex")}`;
}

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}

/**
 * Start a new run. Called once per process, before the first log line.
 */
export function initRunId(now?: Date): string {
  currentRunId = generateRunId(now);
  return currentRunId;
}

/**
 * Current run ID, or null before `initRunId`.
 */
export function getRunId(): string | null {
  return currentRunId;
}
