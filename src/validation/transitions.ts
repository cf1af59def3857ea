/**
 * Validation state machine.
 *
 *   pending ──► in_review ──► validated ──► outdated
 *                   │
 *                   └───────► rejected
 *
 * `rejected` and `outdated` are terminal.
 */

import { InvalidTransition } from "../errors.js";
import type { ValidationStatus } from "../types/enums.js";

export const TRANSITIONS: Readonly<Record<ValidationStatus, readonly ValidationStatus[]>> = {
  pending: ["in_review"],
  in_review: ["validated", "rejected"],
  validated: ["outdated"],
  rejected: [],
  outdated: [],
};

export function canTransition(from: ValidationStatus, to: ValidationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: ValidationStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function assertTransition(dataPointId: number, from: ValidationStatus, to: ValidationStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransition(dataPointId, from, to);
  }
}
