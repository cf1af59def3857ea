/**
 * Shared fixtures for tests: an in-memory database seeded with the default
 * taxonomy, a controllable clock and data point builders.
 */

import { openDatabase, type Connection } from "../db/connection.js";
import { IntelligenceRepository } from "../repository/repository.js";
import type { DataPointInput } from "../types/data-point.js";

export const FIXED_NOW = new Date("2026-06-15T12:00:00.000Z");

/**
 * Clock that only moves when told to.
 */
export class TestClock {
  private current: Date;

  constructor(start: Date = FIXED_NOW) {
    this.current = new Date(start.getTime());
  }

  readonly now = (): Date => new Date(this.current.getTime());

  advance(ms = 1000): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export interface TestContext {
  db: Connection;
  repo: IntelligenceRepository;
  clock: TestClock;
}

export function createTestContext(options: { seed?: boolean } = {}): TestContext {
  const db = openDatabase(":memory:");
  const clock = new TestClock();
  const repo = new IntelligenceRepository(db, { now: clock.now });
  if (options.seed ?? true) {
    repo.seedDefaultData();
  }
  return { db, repo, clock };
}

/**
 * Well-formed market size point for Industrial Robotics, 2025, sourced,
 * medium confidence. Overrides replace fields wholesale.
 */
export function marketSizeInput(overrides: Partial<DataPointInput> = {}): DataPointInput {
  return {
    dimension: "market_size",
    subject: { type: "sector", name: "Industrial Robotics" },
    value: 40,
    year: 2025,
    confidence: "medium",
    source: { name: "Example Research", url: "https://example.com/report" },
    ...overrides,
  };
}
