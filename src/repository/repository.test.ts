/**
 * Repository Tests
 *
 * Run with: node --import tsx --test src/repository/repository.test.ts
 *
 * These tests verify:
 *   1. Writes reject unknown references and malformed payloads
 *   2. Value kinds and temporal anchors are enforced
 *   3. Every write leaves exactly one ledger entry
 *   4. Queries filter and order deterministically
 *   5. Interviews round-trip their lists and filter by status and topic
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { IntegrityError, NotFound, SchemaViolation } from "../errors.js";
import { createTestContext, marketSizeInput } from "../testing/fixtures.js";
import { normalizePeriod } from "./repository.js";

function expectSchemaViolation(fn: () => unknown, path: string): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof SchemaViolation, `expected SchemaViolation, got ${String(err)}`);
    assert.ok(
      err.issues.some((issue) => issue.path === path),
      `no issue at '${path}': ${err.format()}`
    );
    return true;
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// CREATE
// ═══════════════════════════════════════════════════════════════════════════

describe("createDataPoint", () => {
  test("stores a pending point with resolved subject and source", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput());
    const record = repo.requireDataPoint(id);

    assert.equal(record.status, "pending");
    assert.equal(record.value, 40);
    assert.equal(record.dimension.name, "market_size");
    assert.equal(record.dimension.unit, "USD billions");
    assert.deepEqual(record.subject, {
      type: "sector",
      id: record.subject.id,
      name: "Industrial Robotics",
    });
    assert.equal(record.source?.url, "https://example.com/report");
    assert.equal(record.createdAt, "2026-06-15T12:00:00.000Z");
    assert.equal(record.updatedAt, record.createdAt);
  });

  test("writes one insert entry with no before snapshot", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput(), { actor: "ingest" });
    const changes = repo.getChanges({ recordId: id });

    assert.equal(changes.length, 1);
    assert.equal(changes[0].changeType, "insert");
    assert.equal(changes[0].before, null);
    assert.equal(changes[0].after.status, "pending");
    assert.equal(changes[0].after.value, 40);
    assert.equal(changes[0].actor, "ingest");
  });

  test("unknown dimension is an integrity error", () => {
    const { repo } = createTestContext();
    assert.throws(
      () => repo.createDataPoint(marketSizeInput({ dimension: "revenue_per_robot" })),
      (err: unknown) => err instanceof IntegrityError && err.entity === "dimension"
    );
  });

  test("unknown sector is an integrity error", () => {
    const { repo } = createTestContext();
    assert.throws(
      () => repo.createDataPoint(marketSizeInput({ subject: { type: "sector", name: "Space Robotics" } })),
      (err: unknown) => err instanceof IntegrityError && err.entity === "sector"
    );
  });

  test("subcategory must belong to the named sector", () => {
    const { repo } = createTestContext();
    assert.throws(
      () =>
        repo.createDataPoint(
          marketSizeInput({
            subject: { type: "subcategory", sector: "Service Robotics", name: "Drones/UAVs" },
          })
        ),
      (err: unknown) =>
        err instanceof IntegrityError &&
        err.entity === "subcategory" &&
        err.reference === "Service Robotics / Drones/UAVs"
    );
  });

  test("unknown source id is an integrity error", () => {
    const { repo } = createTestContext();
    assert.throws(
      () => repo.createDataPoint(marketSizeInput({ source: { id: 999 } })),
      (err: unknown) => err instanceof IntegrityError && err.entity === "source"
    );
  });

  test("failed insert leaves no row and no ledger entry", () => {
    const { repo } = createTestContext();
    assert.throws(() => repo.createDataPoint(marketSizeInput({ source: { id: 999 } })));
    assert.equal(repo.getDataPoints().length, 0);
    assert.equal(repo.getChanges().length, 0);
  });

  test("payload with an extra subject key is rejected", () => {
    const { repo } = createTestContext();
    const payload = JSON.parse(
      JSON.stringify({
        ...marketSizeInput(),
        subject: { type: "sector", name: "Industrial Robotics", company: "Acme Robotics" },
      })
    );
    expectSchemaViolation(() => repo.createDataPoint(payload), "subject");
  });

  test("payload without a subject is rejected", () => {
    const { repo } = createTestContext();
    const payload = JSON.parse(JSON.stringify({ dimension: "market_size", value: 1, year: 2025 }));
    expectSchemaViolation(() => repo.createDataPoint(payload), "subject");
  });

  test("null value is accepted", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput({ value: null }));
    assert.equal(repo.requireDataPoint(id).value, null);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// VALUE KINDS
// ═══════════════════════════════════════════════════════════════════════════

describe("value kinds", () => {
  test("text on a numeric dimension is rejected", () => {
    const { repo } = createTestContext();
    expectSchemaViolation(() => repo.createDataPoint(marketSizeInput({ value: "about 40" })), "value");
  });

  test("number on a text dimension is rejected", () => {
    const { repo } = createTestContext();
    expectSchemaViolation(
      () => repo.createDataPoint(marketSizeInput({ dimension: "market_outlook", value: 3 })),
      "value"
    );
  });

  test("categorical values keep their structure", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(
      marketSizeInput({ dimension: "key_players", value: ["Acme Robotics", "Example Automation"] })
    );
    assert.deepEqual(repo.requireDataPoint(id).value, ["Acme Robotics", "Example Automation"]);
  });

  test("categorical label is stored as text", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput({ dimension: "technology_maturity", value: "growing" }));
    assert.equal(repo.requireDataPoint(id).value, "growing");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// TEMPORAL ANCHORS
// ═══════════════════════════════════════════════════════════════════════════

describe("temporal anchors", () => {
  test("month without quarter derives the quarter", () => {
    assert.deepEqual(normalizePeriod({ year: 2025, quarter: null, month: 8 }), {
      year: 2025,
      quarter: 3,
      month: 8,
    });
  });

  test("contradictory quarter is rejected", () => {
    expectSchemaViolation(() => normalizePeriod({ year: 2025, quarter: 1, month: 8 }), "quarter");
  });

  test("quarter without year is rejected", () => {
    expectSchemaViolation(() => normalizePeriod({ year: null, quarter: 2, month: null }), "year");
  });

  test("out-of-range month is rejected at the payload", () => {
    const { repo } = createTestContext();
    expectSchemaViolation(() => repo.createDataPoint(marketSizeInput({ month: 13 })), "month");
  });

  test("stored point carries the derived quarter", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput({ month: 11 }));
    const record = repo.requireDataPoint(id);
    assert.equal(record.quarter, 4);
    assert.equal(record.month, 11);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// INTEGRITY BELOW THE REPOSITORY
// ═══════════════════════════════════════════════════════════════════════════

describe("database constraints", () => {
  test("foreign keys are enforced", () => {
    const { db } = createTestContext();
    assert.throws(
      () =>
        db
          .prepare(
            `INSERT INTO data_points (dimension_id, sector_id, created_at, updated_at)
             VALUES (999, 1, 'x', 'x')`
          )
          .run(),
      /FOREIGN KEY constraint failed/
    );
  });

  test("a row with two subjects violates the check constraint", () => {
    const { db } = createTestContext();
    assert.throws(
      () =>
        db
          .prepare(
            `INSERT INTO data_points (dimension_id, sector_id, subcategory_id, created_at, updated_at)
             VALUES (1, 1, 1, 'x', 'x')`
          )
          .run(),
      /CHECK constraint failed/
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// UPDATE
// ═══════════════════════════════════════════════════════════════════════════

describe("updateDataPoint", () => {
  test("records changed fields with before and after", () => {
    const { repo, clock } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput());
    clock.advance();

    const after = repo.updateDataPoint(id, { value: 42.5, notes: "restated" }, "publisher revision", "ana");

    assert.equal(after.value, 42.5);
    assert.equal(after.status, "pending");
    assert.equal(after.updatedAt, "2026-06-15T12:00:01.000Z");

    const [entry] = repo.getChanges({ recordId: id, changeType: "update" });
    assert.deepEqual(entry.fields, ["value", "notes"]);
    assert.equal(entry.before?.value, 40);
    assert.equal(entry.after.value, 42.5);
    assert.equal(entry.reason, "publisher revision");
    assert.equal(entry.actor, "ana");
  });

  test("a patch that changes nothing writes nothing", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput());
    repo.updateDataPoint(id, { value: 40, year: 2025 }, null, "ana");
    assert.equal(repo.getChanges({ recordId: id }).length, 1);
  });

  test("month patch re-derives the quarter", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput({ month: 2 }));
    const after = repo.updateDataPoint(id, { month: 7 }, null, "ana");
    assert.equal(after.quarter, 3);
  });

  test("kind is re-checked", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput());
    expectSchemaViolation(() => repo.updateDataPoint(id, { value: "forty" }, null, "ana"), "value");
  });

  test("status cannot be patched", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput());
    const payload = JSON.parse(JSON.stringify({ status: "validated" }));
    expectSchemaViolation(() => repo.updateDataPoint(id, payload, null, "ana"), "");
  });

  test("unknown id is not found", () => {
    const { repo } = createTestContext();
    assert.throws(() => repo.updateDataPoint(404, { value: 1 }, null, "ana"), NotFound);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════

describe("getDataPoints", () => {
  test("orders by period latest first with missing parts last, then by id", () => {
    const { repo } = createTestContext();
    const annual2024 = repo.createDataPoint(marketSizeInput({ year: 2024 }));
    const q2 = repo.createDataPoint(marketSizeInput({ year: 2025, quarter: 2 }));
    const annual2025 = repo.createDataPoint(marketSizeInput({ year: 2025 }));
    const may = repo.createDataPoint(marketSizeInput({ year: 2025, month: 5 }));
    const annual2025b = repo.createDataPoint(marketSizeInput({ year: 2025, value: 41 }));
    const undated = repo.createDataPoint(marketSizeInput({ year: null }));

    const ids = repo.getDataPoints().map((p) => p.id);
    assert.deepEqual(ids, [may, q2, annual2025, annual2025b, annual2024, undated]);
  });

  test("sector filter includes its subcategories", () => {
    const { repo } = createTestContext();
    const direct = repo.createDataPoint(marketSizeInput({ subject: { type: "sector", name: "Mobile Robotics" } }));
    const nested = repo.createDataPoint(
      marketSizeInput({ subject: { type: "subcategory", sector: "Mobile Robotics", name: "Drones/UAVs" } })
    );
    repo.createDataPoint(marketSizeInput());

    const ids = repo.getDataPoints({ sector: "Mobile Robotics" }).map((p) => p.id);
    assert.deepEqual(ids, [direct, nested]);
  });

  test("null quarter filter selects annual points", () => {
    const { repo } = createTestContext();
    const annual = repo.createDataPoint(marketSizeInput());
    repo.createDataPoint(marketSizeInput({ quarter: 1 }));

    const ids = repo.getDataPoints({ year: 2025, quarter: null }).map((p) => p.id);
    assert.deepEqual(ids, [annual]);
  });

  test("status and limit filters combine", () => {
    const { repo } = createTestContext();
    repo.createDataPoint(marketSizeInput());
    repo.createDataPoint(marketSizeInput());
    assert.equal(repo.getDataPoints({ status: "pending", limit: 1 }).length, 1);
    assert.equal(repo.getDataPoints({ status: ["validated", "rejected"] }).length, 0);
  });

  test("review queue is oldest first", () => {
    const { repo, clock } = createTestContext();
    const first = repo.createDataPoint(marketSizeInput({ year: 2021 }));
    clock.advance();
    const second = repo.createDataPoint(marketSizeInput({ year: 2025 }));

    assert.deepEqual(
      repo.getReviewQueue("pending").map((p) => p.id),
      [first, second]
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// REFERENCE DATA
// ═══════════════════════════════════════════════════════════════════════════

describe("reference data", () => {
  test("sources are shared by URL", () => {
    const { repo } = createTestContext();
    const a = repo.createDataPoint(marketSizeInput());
    const b = repo.createDataPoint(marketSizeInput({ year: 2024 }));
    assert.equal(repo.requireDataPoint(a).source?.id, repo.requireDataPoint(b).source?.id);
    assert.equal(repo.getStatistics().sources, 1);
  });

  test("companies are registered once and become subjects", () => {
    const { repo } = createTestContext();
    const first = repo.ensureCompany({ name: "Acme Robotics", primarySector: "Logistics Robotics" });
    const second = repo.ensureCompany({ name: "Acme Robotics" });
    assert.equal(first, second);

    const id = repo.createDataPoint(
      marketSizeInput({ dimension: "funding_raised", subject: { type: "company", name: "Acme Robotics" } })
    );
    assert.equal(repo.requireDataPoint(id).subject.type, "company");
    assert.equal(repo.getCompanies()[0].primarySector, "Logistics Robotics");
  });

  test("company with unknown primary sector is rejected", () => {
    const { repo } = createTestContext();
    assert.throws(
      () => repo.ensureCompany({ name: "Acme Robotics", primarySector: "Space Robotics" }),
      IntegrityError
    );
  });

  test("technology links carry relevance", () => {
    const { repo } = createTestContext();
    repo.linkTechnologyToSector("LiDAR", "Agricultural Robotics", "low");
    const lidar = repo.getTechnologies().find((t) => t.name === "LiDAR");
    assert.deepEqual(lidar?.sectors, [
      { sector: "Agricultural Robotics", relevance: "low" },
      { sector: "Construction Robotics", relevance: "medium" },
      { sector: "Mobile Robotics", relevance: "high" },
    ]);
  });

  test("sector description can be edited", () => {
    const { repo } = createTestContext();
    repo.updateSectorDescription("Service Robotics", "Professional and consumer service robots");
    assert.equal(
      repo.getSectorByName("Service Robotics")?.description,
      "Professional and consumer service robots"
    );
    assert.throws(() => repo.updateSectorDescription("Space Robotics", null), NotFound);
  });

  test("statistics count points per sector", () => {
    const { repo } = createTestContext();
    repo.createDataPoint(marketSizeInput());
    repo.createDataPoint(
      marketSizeInput({ subject: { type: "subcategory", sector: "Industrial Robotics", name: "Delta Robots" } })
    );
    const stats = repo.getStatistics();
    assert.equal(stats.dataPoints, 2);
    assert.deepEqual(stats.dataPointsBySector, { "Industrial Robotics": 2 });
    assert.deepEqual(stats.validationBreakdown, { pending: 2 });
    assert.equal(stats.changes, 2);
  });

  test("research sessions record their outcome", () => {
    const { repo } = createTestContext();
    const id = repo.startResearchSession("sector_deep_dive", "Industrial Robotics");
    repo.finishResearchSession(id, {
      status: "completed",
      findingsReceived: 3,
      dataPointsCreated: 2,
      findingsRejected: 1,
    });
    const [session] = repo.getResearchSessions();
    assert.equal(session.status, "completed");
    assert.equal(session.findingsRejected, 1);
    assert.equal(session.completedAt, "2026-06-15T12:00:00.000Z");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// INTERVIEWS
// ═══════════════════════════════════════════════════════════════════════════

describe("interviews", () => {
  test("stored with their lists and a pending status", () => {
    const { repo } = createTestContext();
    const id = repo.addInterview({
      expertName: "Dana Reyes",
      expertTitle: "VP Automation",
      expertCompany: "Acme Robotics",
      interviewDate: "2026-05-10",
      topics: [" Humanoids ", "Supply chain"],
      keyInsights: ["Actuator lead times are shrinking"],
      summary: "Demand is shifting toward mobile manipulators.",
    });

    assert.deepEqual(repo.getInterview(id), {
      id,
      expertName: "Dana Reyes",
      expertTitle: "VP Automation",
      expertCompany: "Acme Robotics",
      interviewDate: "2026-05-10",
      topics: ["Humanoids", "Supply chain"],
      keyInsights: ["Actuator lead times are shrinking"],
      summary: "Demand is shifting toward mobile manipulators.",
      status: "pending",
      metadata: null,
      createdAt: "2026-06-15T12:00:00.000Z",
    });
    assert.equal(repo.getStatistics().interviews, 1);
    assert.equal(repo.getInterview(id + 1), null);
  });

  test("malformed input is rejected", () => {
    const { repo } = createTestContext();
    expectSchemaViolation(() => repo.addInterview({ expertName: "  " }), "expertName");
    expectSchemaViolation(
      () => repo.addInterview({ expertName: "Dana Reyes", interviewDate: "2026-13-01" }),
      "interviewDate"
    );
    expectSchemaViolation(
      () => repo.addInterview({ expertName: "Dana Reyes", topics: ["Humanoids", ""] }),
      "topics.1"
    );
    assert.equal(repo.getStatistics().interviews, 0);
  });

  test("listed newest first with undated ones last", () => {
    const { repo } = createTestContext();
    const undated = repo.addInterview({ expertName: "Kim Osei" });
    const march = repo.addInterview({ expertName: "Lee Park", interviewDate: "2026-03-02" });
    const may = repo.addInterview({ expertName: "Dana Reyes", interviewDate: "2026-05-10" });

    assert.deepEqual(
      repo.getInterviews().map((i) => i.id),
      [may, march, undated]
    );
  });

  test("filtered by status, company and topic", () => {
    const { repo } = createTestContext();
    const first = repo.addInterview({
      expertName: "Dana Reyes",
      expertCompany: "Acme Robotics",
      topics: ["Humanoids"],
      status: "validated",
    });
    const second = repo.addInterview({
      expertName: "Lee Park",
      expertCompany: "Globex",
      topics: ["Warehouse automation", "humanoids"],
    });

    assert.deepEqual(repo.getInterviews({ status: "validated" }).map((i) => i.id), [first]);
    assert.deepEqual(repo.getInterviews({ expertCompany: "Globex" }).map((i) => i.id), [second]);
    assert.deepEqual(repo.getInterviews({ topic: "HUMANOIDS" }).map((i) => i.id), [second, first]);
    assert.deepEqual(repo.getInterviews({ topic: "Surgical" }), []);
  });
});
