/**
 * Ingestion Tests
 *
 * Run with: node --import tsx --test src/ingestion/session.test.ts
 *
 * These tests verify:
 *   1. Findings become pending data points
 *   2. Rejected findings are counted one by one
 *   3. Collaborator failures fail the session and propagate
 *   4. Analyzer output is recovered from surrounding prose
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { IntegrityError, SchemaViolation } from "../errors.js";
import { createTestContext, type TestContext } from "../testing/fixtures.js";
import { parseAnalyzerOutput } from "./analyzer-output.js";
import { FindingsFileCollaborator } from "./file-collaborator.js";
import type { ResearchTarget } from "./findings.js";
import { ResearchSession, type ResearchCollaborator } from "./session.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

class StubCollaborator implements ResearchCollaborator {
  readonly name = "stub";
  readonly targets: ResearchTarget[] = [];
  private readonly outcome: unknown[] | Error;

  constructor(outcome: unknown[] | Error) {
    this.outcome = outcome;
  }

  async research(target: ResearchTarget): Promise<unknown[]> {
    this.targets.push(target);
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

function setup(outcome: unknown[] | Error): TestContext & {
  collaborator: StubCollaborator;
  session: ResearchSession;
} {
  const ctx = createTestContext();
  const collaborator = new StubCollaborator(outcome);
  return {
    ...ctx,
    collaborator,
    session: new ResearchSession(ctx.repo, collaborator, { now: ctx.clock.now }),
  };
}

const ANALYZER_REPLY = [
  "Here is what I found in the sources:",
  "```json",
  JSON.stringify({
    dimension: "market_size",
    data_points: [
      {
        value: 12.5,
        unit: "USD billions",
        year: 2024,
        quarter: null,
        source_url: "https://example.com/a",
        source_name: "Example A",
        confidence: "high",
        notes: null,
      },
    ],
  }),
  "```",
  "Let me know if you need more.",
].join("\n");

// ═══════════════════════════════════════════════════════════════════════════
// SESSIONS
// ═══════════════════════════════════════════════════════════════════════════

describe("sector research", () => {
  test("findings are stored as pending data points", async () => {
    const { repo, session, collaborator } = setup([
      {
        researchType: "growth_rate",
        value: 12.5,
        year: 2025,
        confidence: "high",
        source: { name: "Example Research", url: "https://example.com/growth" },
      },
      { dimension: "market_size", value: 40, confidence: "very likely" },
    ]);

    const result = await session.researchSector("Mobile Robotics");
    assert.deepEqual(collaborator.targets, [{ type: "sector", name: "Mobile Robotics", year: 2026 }]);
    assert.equal(result.findingsReceived, 2);
    assert.deepEqual(result.rejected, []);

    const [growth, size] = result.dataPointIds.map((id) => repo.requireDataPoint(id));
    assert.equal(growth.dimension.name, "market_growth_rate");
    assert.equal(growth.status, "pending");
    assert.equal(growth.confidence, "high");
    assert.equal(growth.year, 2025);
    assert.equal(growth.source?.url, "https://example.com/growth");
    assert.deepEqual([growth.subject.type, growth.subject.name], ["sector", "Mobile Robotics"]);

    assert.equal(size.year, 2026);
    assert.equal(size.confidence, "unverified");
    assert.equal(size.source, null);
    assert.equal(size.notes, "reported confidence 'very likely' not recognised");

    const [entry] = repo.getChanges({ recordId: growth.id });
    assert.equal(entry.changeType, "insert");
    assert.equal(entry.actor, "research:stub");
    assert.equal(entry.reason, `research session #${result.sessionId}`);

    const [row] = repo.getResearchSessions();
    assert.equal(row.sessionType, "sector_deep_dive");
    assert.equal(row.target, "Mobile Robotics");
    assert.equal(row.status, "completed");
    assert.equal(row.findingsReceived, 2);
    assert.equal(row.dataPointsCreated, 2);
    assert.equal(row.findingsRejected, 0);
  });

  test("each rejected finding is reported and the rest are kept", async () => {
    const { repo, session } = setup([
      { dimension: "market_size", value: 40, year: 2025 },
      { dimension: "patent_filings", value: 1 },
      { value: 3 },
      { researchType: "rumours", value: 1 },
      { dimension: "market_size", value: 5, subject: { type: "sector", name: "Space Robotics" } },
      { dimension: "market_size", value: "forty" },
    ]);

    const result = await session.researchSector("Industrial Robotics");
    assert.equal(result.dataPointIds.length, 1);
    assert.deepEqual(
      result.rejected.map((r) => [r.index, r.code]),
      [
        [1, "INTEGRITY_ERROR"],
        [2, "SCHEMA_VIOLATION"],
        [3, "SCHEMA_VIOLATION"],
        [4, "INTEGRITY_ERROR"],
        [5, "SCHEMA_VIOLATION"],
      ]
    );
    assert.equal(result.rejected[2].message, "Unknown research type 'rumours'");

    const [row] = repo.getResearchSessions();
    assert.equal(row.status, "completed");
    assert.equal(row.findingsReceived, 6);
    assert.equal(row.dataPointsCreated, 1);
    assert.equal(row.findingsRejected, 5);
  });

  test("collaborator failure fails the session and propagates", async () => {
    const { repo, session } = setup(new Error("search quota exhausted"));

    await assert.rejects(session.researchSector("Mobile Robotics"), /search quota exhausted/);

    const [row] = repo.getResearchSessions();
    assert.equal(row.status, "failed");
    assert.equal(row.errorMessage, "search quota exhausted");
    assert.equal(row.completedAt, "2026-06-15T12:00:00.000Z");
  });

  test("unknown sector is refused before a session opens", async () => {
    const { repo, session, collaborator } = setup([]);
    await assert.rejects(session.researchSector("Space Robotics"), IntegrityError);
    assert.deepEqual(collaborator.targets, []);
    assert.deepEqual(repo.getResearchSessions(), []);
  });

  test("all sectors runs one session per sector", async () => {
    const { repo, session, collaborator } = setup([]);
    const results = await session.researchAllSectors(2025);
    assert.equal(results.length, 6);
    assert.equal(collaborator.targets.length, 6);
    assert.equal(repo.getResearchSessions().length, 6);
  });
});

describe("company and technology research", () => {
  test("the company is registered and is the default subject", async () => {
    const { repo, session } = setup([
      { dimension: "funding_raised", value: 120, source: { name: "Example Wire" } },
    ]);

    const result = await session.researchCompany("Acme Robotics");
    assert.deepEqual(
      repo.getCompanies().map((c) => c.name),
      ["Acme Robotics"]
    );
    const record = repo.requireDataPoint(result.dataPointIds[0]);
    assert.deepEqual([record.subject.type, record.subject.name], ["company", "Acme Robotics"]);
    assert.equal(record.source?.name, "Example Wire");
    assert.equal(repo.getResearchSessions()[0].sessionType, "company_research");
  });

  test("an unknown technology is registered as emerging", async () => {
    const { repo, session } = setup([]);
    await session.researchTechnology("Soft Grippers");
    const tech = repo.getTechnologies().find((t) => t.name === "Soft Grippers");
    assert.equal(tech?.category, "emerging");
    assert.equal(repo.getResearchSessions()[0].sessionType, "technology_research");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// ANALYZER OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

describe("parseAnalyzerOutput", () => {
  test("recovers data points from prose and reshapes source keys", () => {
    assert.deepEqual(parseAnalyzerOutput(ANALYZER_REPLY), [
      {
        dimension: "market_size",
        value: 12.5,
        unit: "USD billions",
        year: 2024,
        quarter: null,
        confidence: "high",
        notes: null,
        source: { name: "Example A", url: "https://example.com/a" },
      },
    ]);
  });

  test("a bare array passes through", () => {
    assert.deepEqual(parseAnalyzerOutput('[{"researchType": "pricing", "value": 35000}]'), [
      { researchType: "pricing", value: 35000 },
    ]);
  });

  test("text without JSON is a schema violation", () => {
    assert.throws(() => parseAnalyzerOutput("No figures were found."), SchemaViolation);
  });
});

test("findings file collaborator replays saved analyzer output", async () => {
  const dir = mkdtempSync(join(tmpdir(), "robotics-findings-"));
  try {
    const path = join(dir, "findings.txt");
    writeFileSync(path, ANALYZER_REPLY);
    const ctx = createTestContext();
    const session = new ResearchSession(ctx.repo, new FindingsFileCollaborator(path), { now: ctx.clock.now });

    const result = await session.researchSector("Logistics Robotics");
    assert.equal(result.dataPointIds.length, 1);
    const record = ctx.repo.requireDataPoint(result.dataPointIds[0]);
    assert.equal(record.value, 12.5);
    assert.equal(record.year, 2024);
    assert.equal(record.source?.url, "https://example.com/a");
    assert.equal(ctx.repo.getChanges({ recordId: record.id })[0].actor, "research:findings-file");
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("findings file collaborator can pick a file per target", async () => {
  const dir = mkdtempSync(join(tmpdir(), "robotics-findings-"));
  try {
    writeFileSync(join(dir, "Acme Robots.json"), '[{"researchType": "funding", "value": 120}]');
    const collaborator = new FindingsFileCollaborator((target) => join(dir, `${target.name}.json`));

    assert.deepEqual(await collaborator.research({ type: "company", name: "Acme Robots", year: 2026 }), [
      { researchType: "funding", value: 120 },
    ]);
    await assert.rejects(collaborator.research({ type: "company", name: "Globex", year: 2026 }));
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
