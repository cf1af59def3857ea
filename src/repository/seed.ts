/**
 * Reference data seeding.
 *
 * The default taxonomy (sectors with subcategories, dimensions and
 * technologies) lives in `config/reference-data.json`. Seeding is
 * idempotent: rows that already exist are left alone and not counted.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Connection } from "../db/connection.js";
import { MaturityLevel, Relevance, ValueKind } from "../types/enums.js";
import { parseOrViolation } from "./schema.js";

export const DEFAULT_REFERENCE_DATA_PATH = fileURLToPath(
  new URL("../../config/reference-data.json", import.meta.url)
);

export const ReferenceDataSchema = z
  .object({
    sectors: z.array(
      z
        .object({
          name: z.string().min(1),
          description: z.string().nullable().default(null),
          subcategories: z.array(z.string().min(1)).default([]),
        })
        .strict()
    ),
    dimensions: z.array(
      z
        .object({
          name: z.string().min(1),
          unit: z.string().nullable().default(null),
          description: z.string().nullable().default(null),
          kind: ValueKind.default("numeric"),
        })
        .strict()
    ),
    technologies: z
      .array(
        z
          .object({
            name: z.string().min(1),
            category: z.string().nullable().default(null),
            description: z.string().nullable().default(null),
            maturityLevel: MaturityLevel.nullable().default(null),
            sectors: z
              .array(z.object({ sector: z.string().min(1), relevance: Relevance }).strict())
              .default([]),
          })
          .strict()
      )
      .default([]),
  })
  .strict();

export type ReferenceData = z.infer<typeof ReferenceDataSchema>;
export type ReferenceDataInput = z.input<typeof ReferenceDataSchema>;

export interface SeedCounts {
  sectorsCreated: number;
  subcategoriesCreated: number;
  dimensionsCreated: number;
  technologiesCreated: number;
  technologyLinksCreated: number;
}

/**
 * Read and validate a reference data file.
 */
export function loadReferenceData(path: string = DEFAULT_REFERENCE_DATA_PATH): ReferenceData {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parseOrViolation(ReferenceDataSchema, raw, `reference data in ${path}`);
}

/**
 * Insert missing reference rows. Runs inside the caller's transaction.
 */
export function seedReferenceData(db: Connection, data: ReferenceData, timestamp: string): SeedCounts {
  const insertSector = db.prepare<[string, string | null, string, string]>(
    "INSERT OR IGNORE INTO sectors (name, description, created_at, updated_at) VALUES (?, ?, ?, ?)"
  );
  const sectorId = db.prepare<[string], { id: number }>("SELECT id FROM sectors WHERE name = ?");
  const insertSubcategory = db.prepare<[number, string, string]>(
    "INSERT OR IGNORE INTO subcategories (sector_id, name, created_at) VALUES (?, ?, ?)"
  );
  const insertDimension = db.prepare<[string, string | null, string | null, string, string]>(
    `INSERT OR IGNORE INTO dimensions (name, unit, description, value_kind, created_at)
     VALUES (?, ?, ?, ?, ?)`
  );
  const insertTechnology = db.prepare<[string, string | null, string | null, string | null, string]>(
    `INSERT OR IGNORE INTO technologies (name, category, description, maturity_level, created_at)
     VALUES (?, ?, ?, ?, ?)`
  );
  const technologyId = db.prepare<[string], { id: number }>(
    "SELECT id FROM technologies WHERE name = ?"
  );
  const insertLink = db.prepare<[number, number, string]>(
    "INSERT OR IGNORE INTO technology_sectors (technology_id, sector_id, relevance) VALUES (?, ?, ?)"
  );

  const counts: SeedCounts = {
    sectorsCreated: 0,
    subcategoriesCreated: 0,
    dimensionsCreated: 0,
    technologiesCreated: 0,
    technologyLinksCreated: 0,
  };

  for (const sector of data.sectors) {
    counts.sectorsCreated += insertSector.run(sector.name, sector.description, timestamp, timestamp).changes;
    const row = sectorId.get(sector.name);
    if (row === undefined) continue;
    for (const name of sector.subcategories) {
      counts.subcategoriesCreated += insertSubcategory.run(row.id, name, timestamp).changes;
    }
  }

  for (const dim of data.dimensions) {
    counts.dimensionsCreated += insertDimension.run(
      dim.name,
      dim.unit,
      dim.description,
      dim.kind,
      timestamp
    ).changes;
  }

  for (const tech of data.technologies) {
    counts.technologiesCreated += insertTechnology.run(
      tech.name,
      tech.category,
      tech.description,
      tech.maturityLevel,
      timestamp
    ).changes;
    const techRow = technologyId.get(tech.name);
    if (techRow === undefined) continue;
    for (const link of tech.sectors) {
      const sectorRow = sectorId.get(link.sector);
      // Links to sectors outside this taxonomy are skipped
      if (sectorRow === undefined) continue;
      counts.technologyLinksCreated += insertLink.run(techRow.id, sectorRow.id, link.relevance).changes;
    }
  }

  return counts;
}
