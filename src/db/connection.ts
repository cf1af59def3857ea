/**
 * SQLite connection factory.
 *
 * Every connection enforces foreign keys and has the schema applied, so a
 * fresh file or an in-memory database is ready to use on return.
 */

import Database from "better-sqlite3";
import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";

export type Connection = Database.Database;

export const IN_MEMORY = ":memory:";

/** `db/schema.sql` at the project root, from both src/ and dist/ */
export const SCHEMA_PATH = fileURLToPath(new URL("../../db/schema.sql", import.meta.url));

export interface OpenDatabaseOptions {
  /** Alternate schema file */
  schemaPath?: string;
}

export function openDatabase(path: string = IN_MEMORY, options: OpenDatabaseOptions = {}): Connection {
  const inMemory = path === IN_MEMORY;
  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma("foreign_keys = ON");
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.exec(readFileSync(options.schemaPath ?? SCHEMA_PATH, "utf-8"));
  return db;
}
