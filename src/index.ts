/**
 * Robotics market-intelligence tracker.
 *
 * Library entry point. The CLIs under src/cli are thin wrappers over these
 * modules:
 *
 *   const repo = new IntelligenceRepository(openDatabase("data/robotics.db"));
 *   repo.seedDefaultData();
 *   const workflow = new ValidationWorkflow(repo);
 *   const changes = new ChangeDetector(repo).detectYearOverYear(2025);
 */

export * from "./errors.js";
export * from "./types/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export { IN_MEMORY, SCHEMA_PATH, openDatabase, type Connection, type OpenDatabaseOptions } from "./db/connection.js";
export * from "./repository/index.js";
export * from "./validation/index.js";
export * from "./changes/index.js";
export * from "./ingestion/index.js";
export * from "./reporting/index.js";
