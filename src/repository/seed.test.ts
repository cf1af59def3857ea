/**
 * Reference Data Seeding Tests
 *
 * Run with: node --import tsx --test src/repository/seed.test.ts
 */

import { strict as assert } from "node:assert";
import { test } from "node:test";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { SchemaViolation } from "../errors.js";
import { createTestContext } from "../testing/fixtures.js";
import { ReferenceDataSchema, loadReferenceData } from "./seed.js";

test("default taxonomy seeds once", () => {
  const { repo } = createTestContext({ seed: false });

  assert.deepEqual(repo.seedDefaultData(), {
    sectorsCreated: 6,
    subcategoriesCreated: 29,
    dimensionsCreated: 13,
    technologiesCreated: 8,
    technologyLinksCreated: 18,
  });

  assert.deepEqual(repo.seedDefaultData(), {
    sectorsCreated: 0,
    subcategoriesCreated: 0,
    dimensionsCreated: 0,
    technologiesCreated: 0,
    technologyLinksCreated: 0,
  });

  const stats = repo.getStatistics();
  assert.equal(stats.sectors, 6);
  assert.equal(stats.subcategories, 29);
  assert.equal(stats.dimensions, 13);
});

test("seeding adds only what is missing", () => {
  const { repo } = createTestContext();
  const extra = ReferenceDataSchema.parse({
    sectors: [
      { name: "Industrial Robotics", subcategories: ["Articulated Robots", "Gantry Robots"] },
    ],
    dimensions: [{ name: "market_size" }, { name: "patent_filings", unit: "patents" }],
  });

  assert.deepEqual(repo.seedDefaultData(extra), {
    sectorsCreated: 0,
    subcategoriesCreated: 1,
    dimensionsCreated: 1,
    technologiesCreated: 0,
    technologyLinksCreated: 0,
  });
  assert.equal(repo.getDimensionByName("patent_filings")?.kind, "numeric");
});

test("sectors come back with their subcategories", () => {
  const { repo } = createTestContext();
  const mobile = repo.getSectorByName("Mobile Robotics");
  assert.deepEqual(
    mobile?.subcategories.map((sc) => sc.name),
    [
      "Automated Guided Vehicles (AGV)",
      "Autonomous Delivery Robots",
      "Autonomous Mobile Robots (AMR)",
      "Drones/UAVs",
    ]
  );
});

test("malformed reference file is a schema violation", () => {
  const dir = mkdtempSync(join(tmpdir(), "robotics-seed-"));
  try {
    const path = join(dir, "reference.json");
    writeFileSync(path, JSON.stringify({ sectors: [], dimensions: [{ name: "x", kind: "ordinal" }] }));
    assert.throws(
      () => loadReferenceData(path),
      (err: unknown) =>
        err instanceof SchemaViolation && err.issues.some((i) => i.path === "dimensions.0.kind")
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
