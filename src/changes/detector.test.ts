/**
 * Change Detector Tests
 *
 * Run with: node --import tsx --test src/changes/detector.test.ts
 *
 * These tests verify:
 *   1. Deltas, percentages and significance
 *   2. The zero guard on percentage change
 *   3. Representative selection and the outdated fallback
 *   4. Ordering and text rendering
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { DEFAULT_QUALITY_CONFIG } from "../config/quality/defaults.js";
import { loadQualityConfig } from "../config/quality/loader.js";
import { createTestContext, marketSizeInput, type TestContext } from "../testing/fixtures.js";
import type { DataPointInput } from "../types/data-point.js";
import { ValidationWorkflow } from "../validation/workflow.js";
import { ChangeDetector } from "./detector.js";
import { quarterPeriod, yearPeriod } from "./periods.js";
import { buildChangeReport, formatChangesAsText } from "./report.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

interface Fixture extends TestContext {
  workflow: ValidationWorkflow;
  detector: ChangeDetector;
  /** Create a point and take it through to `validated` */
  validated(overrides: Partial<DataPointInput>): number;
}

function setup(): Fixture {
  const ctx = createTestContext();
  const workflow = new ValidationWorkflow(ctx.repo, { now: ctx.clock.now });
  return {
    ...ctx,
    workflow,
    detector: new ChangeDetector(ctx.repo),
    validated(overrides) {
      const id = ctx.repo.createDataPoint(marketSizeInput(overrides));
      workflow.claimForReview(id, "ana");
      workflow.validateItem(id, "ana");
      ctx.clock.advance();
      return id;
    },
  };
}

const MOBILE = { type: "sector", name: "Mobile Robotics" } as const;

// ═══════════════════════════════════════════════════════════════════════════
// ARITHMETIC AND SIGNIFICANCE
// ═══════════════════════════════════════════════════════════════════════════

describe("year over year", () => {
  test("market size growth from 40.0 to 45.2 is a significant increase", () => {
    const f = setup();
    const oldId = f.validated({ subject: MOBILE, value: 40.0, year: 2024 });
    const newId = f.validated({ subject: MOBILE, value: 45.2, year: 2025 });

    const changes = f.detector.detectYearOverYear(2025);
    assert.equal(changes.length, 1);
    assert.deepEqual(changes[0], {
      dimension: "market_size",
      unit: "USD billions",
      subject: changes[0].subject,
      subjectLabel: "Mobile Robotics",
      oldValue: 40,
      newValue: 45.2,
      delta: 5.2,
      percentDelta: 13,
      changeType: "increase",
      significance: "significant",
      periodOld: "2024",
      periodNew: "2025",
      oldDataPointId: oldId,
      newDataPointId: newId,
      fromOutdated: { old: false, new: false },
    });
    assert.equal(changes[0].subject.type, "sector");
  });

  test("a move at the threshold is minor", () => {
    const f = setup();
    f.validated({ dimension: "adoption_rate", subject: MOBILE, value: 20, year: 2024 });
    f.validated({ dimension: "adoption_rate", subject: MOBILE, value: 21, year: 2025 });

    const [change] = f.detector.detectYearOverYear(2025);
    assert.equal(change.percentDelta, 5);
    assert.equal(change.significance, "minor");
  });

  test("new and removed keys are significant without a percentage", () => {
    const f = setup();
    f.validated({ subject: MOBILE, value: 12, year: 2024 });
    f.validated({ value: 40, year: 2025 });

    const changes = f.detector.detectYearOverYear(2025);
    assert.deepEqual(
      changes.map((c) => [c.subjectLabel, c.changeType, c.significance, c.percentDelta, c.delta]),
      [
        ["Industrial Robotics", "new-key", "significant", null, null],
        ["Mobile Robotics", "removed-key", "significant", null, null],
      ]
    );
  });
});

describe("zero guard", () => {
  test("growth from zero has no percentage but is significant", () => {
    const f = setup();
    f.validated({ dimension: "unit_shipments", subject: MOBILE, value: 0, year: 2024 });
    f.validated({ dimension: "unit_shipments", subject: MOBILE, value: 100, year: 2025 });

    const [change] = f.detector.detectYearOverYear(2025);
    assert.equal(change.delta, 100);
    assert.equal(change.percentDelta, null);
    assert.equal(change.changeType, "increase");
    assert.equal(change.significance, "significant");
  });

  test("zero to zero is unchanged and minor", () => {
    const f = setup();
    f.validated({ dimension: "unit_shipments", subject: MOBILE, value: 0, year: 2024 });
    f.validated({ dimension: "unit_shipments", subject: MOBILE, value: 0, year: 2025 });

    const [change] = f.detector.detectYearOverYear(2025);
    assert.equal(change.delta, 0);
    assert.equal(change.percentDelta, null);
    assert.equal(change.changeType, "unchanged");
    assert.equal(change.significance, "minor");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// REPRESENTATIVE SELECTION
// ═══════════════════════════════════════════════════════════════════════════

describe("representatives", () => {
  test("pending points and non-numeric dimensions are ignored", () => {
    const f = setup();
    f.repo.createDataPoint(marketSizeInput({ subject: MOBILE, value: 40, year: 2024 }));
    f.repo.createDataPoint(marketSizeInput({ subject: MOBILE, value: 45, year: 2025 }));
    f.validated({ dimension: "key_players", subject: MOBILE, value: ["Acme"], year: 2024 });
    f.validated({ dimension: "key_players", subject: MOBILE, value: ["Acme", "Globex"], year: 2025 });

    assert.deepEqual(f.detector.detectYearOverYear(2025), []);
  });

  test("a validated point outranks an outdated one of higher confidence", () => {
    const f = setup();
    f.validated({ subject: MOBILE, value: 38, year: 2024, confidence: "high" });
    const replacement = f.validated({ subject: MOBILE, value: 40, year: 2024, confidence: "low" });
    f.validated({ subject: MOBILE, value: 44, year: 2025 });

    const [change] = f.detector.detectYearOverYear(2025);
    assert.equal(change.oldDataPointId, replacement);
    assert.equal(change.oldValue, 40);
    assert.deepEqual(change.fromOutdated, { old: false, new: false });
  });

  test("outdated points stand in when nothing is validated", () => {
    const f = setup();
    const stale = f.validated({ subject: MOBILE, value: 40, year: 2024 });
    f.workflow.markOutdated(stale, "ana", "restated by publisher");
    f.validated({ subject: MOBILE, value: 45.2, year: 2025 });

    const [change] = f.detector.detectYearOverYear(2025);
    assert.equal(change.oldDataPointId, stale);
    assert.equal(change.changeType, "increase");
    assert.deepEqual(change.fromOutdated, { old: true, new: false });
  });

  test("without the fallback an outdated side counts as absent", () => {
    const f = setup();
    const stale = f.validated({ subject: MOBILE, value: 40, year: 2024 });
    f.workflow.markOutdated(stale, "ana", "restated by publisher");
    f.validated({ subject: MOBILE, value: 45.2, year: 2025 });

    const strict = new ChangeDetector(f.repo, {
      config: loadQualityConfig({
        ...DEFAULT_QUALITY_CONFIG,
        changeDetection: { includeOutdatedFallback: false },
      }),
    });
    const [change] = strict.detectYearOverYear(2025);
    assert.equal(change.changeType, "new-key");
    assert.equal(change.oldDataPointId, null);
  });

  test("periods match at their own granularity", () => {
    const f = setup();
    f.validated({ subject: MOBILE, value: 10, year: 2024, quarter: 4 });
    f.validated({ subject: MOBILE, value: 11, year: 2025, quarter: 1 });
    f.validated({ subject: MOBILE, value: 40, year: 2025 });

    const changes = f.detector.detectQuarterOverQuarter(2025, 1);
    assert.equal(changes.length, 1);
    assert.equal(changes[0].periodOld, "2024-Q4");
    assert.equal(changes[0].periodNew, "2025-Q1");
    assert.equal(changes[0].percentDelta, 10);

    assert.deepEqual(
      f.detector
        .detectChanges(quarterPeriod(2025, 1), yearPeriod(2025))
        .map((c) => [c.periodOld, c.oldValue, c.periodNew, c.newValue]),
      [["2025", 40, "2025-Q1", 11]]
    );
  });

  test("sector scope includes its subcategories", () => {
    const f = setup();
    const amr = { type: "subcategory", sector: "Mobile Robotics", name: "Autonomous Mobile Robots (AMR)" } as const;
    f.validated({ subject: amr, value: 4, year: 2024 });
    f.validated({ subject: amr, value: 5, year: 2025 });
    f.validated({ value: 20, year: 2024 });
    f.validated({ value: 25, year: 2025 });

    const changes = f.detector.detectYearOverYear(2025, { sector: "Mobile Robotics" });
    assert.deepEqual(
      changes.map((c) => c.subjectLabel),
      ["Mobile Robotics / Autonomous Mobile Robots (AMR)"]
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// ORDERING AND REPORTS
// ═══════════════════════════════════════════════════════════════════════════

describe("ordering and reports", () => {
  function scenario(): Fixture {
    const f = setup();
    f.validated({ subject: MOBILE, value: 40, year: 2024 });
    f.validated({ subject: MOBILE, value: 45.2, year: 2025 });
    f.validated({ value: 20, year: 2024 });
    f.validated({ value: 10, year: 2025 });
    f.validated({ subject: { type: "sector", name: "Service Robotics" }, value: 5, year: 2025 });
    return f;
  }

  test("missing percentages first, then largest magnitude", () => {
    const f = scenario();
    assert.deepEqual(
      f.detector.detectYearOverYear(2025).map((c) => [c.subjectLabel, c.percentDelta]),
      [
        ["Service Robotics", null],
        ["Industrial Robotics", -50],
        ["Mobile Robotics", 13],
      ]
    );
  });

  test("report counts by type and significance", () => {
    const f = scenario();
    const report = buildChangeReport(f.detector.detectYearOverYear(2025));
    assert.equal(report.periodOld, "2024");
    assert.equal(report.periodNew, "2025");
    assert.deepEqual(report.summary, {
      total: 3,
      significant: 3,
      minor: 0,
      byType: { increase: 1, decrease: 1, unchanged: 0, "new-key": 1, "removed-key": 0 },
    });
    assert.deepEqual(Object.keys(report.bySubject), [
      "Service Robotics",
      "Industrial Robotics",
      "Mobile Robotics",
    ]);
  });

  test("text rendering", () => {
    const f = scenario();
    assert.equal(
      formatChangesAsText(f.detector.detectYearOverYear(2025)),
      [
        "Changes 2024 -> 2025",
        "",
        "[SIG] Service Robotics - market_size: new: 5 USD billions",
        "[SIG] Industrial Robotics - market_size: 20 -> 10 USD billions (-50.0%)",
        "[SIG] Mobile Robotics - market_size: 40 -> 45.2 USD billions (+13.0%)",
      ].join("\n")
    );
    assert.equal(formatChangesAsText([]), "No changes detected.");
  });
});
