#!/usr/bin/env node
/**
 * Research CLI: seed the database and ingest research findings.
 *
 * Usage:
 *   npx tsx src/cli/research.ts <command> [options]
 *   npm run research -- <command> [options]
 *
 * Commands:
 *   init                 Create the schema and seed reference data
 *   check                Print database statistics
 *   sector <name>        Ingest findings for a sector
 *   company <name>       Ingest findings for a company
 *   technology <name>    Ingest findings for a technology
 *   all-sectors          Ingest findings for every sector
 *   ingest <file>        Ingest analyst-entered data points and interviews
 *
 * Options:
 *   --year <n>          Default year for findings without one (default: current year)
 *   --findings <path>   Saved analyzer output (JSON, optionally wrapped in prose).
 *                       A directory holds one <target_name>.json per target.
 *   --output <path>     Also write the session results as JSON
 *   --analyst <name>    Who entered the ingested file (default: $USER or "analyst")
 *   --verbose           Echo log lines to the console
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Any error, or an ingested file with rejected entries
 */

import { statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { parseArgs } from "node:util";

import { optionalEnv } from "../config/env.js";
import {
  FindingsFileCollaborator,
  ManualIngestion,
  ResearchSession,
  type ManualIngestionResult,
  type ResearchResult,
} from "../ingestion/index.js";
import { safeFileName } from "../reporting/exporters.js";
import { loadReferenceData } from "../repository/seed.js";
import { openCliContext, type CliContext } from "./context.js";
import { UsageError, c, intOption, printHeader, requirePositional, runCli } from "./output.js";

const USAGE = "Usage: research <init|check|sector|company|technology|all-sectors|ingest> [options]";

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      year: { type: "string" },
      findings: { type: "string" },
      output: { type: "string" },
      analyst: { type: "string", default: optionalEnv("USER", "analyst") },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
${USAGE}

Commands:
  init                 Create the schema and seed reference data
  check                Print database statistics
  sector <name>        Ingest findings for a sector
  company <name>       Ingest findings for a company
  technology <name>    Ingest findings for a technology
  all-sectors          Ingest findings for every sector
  ingest <file>        Ingest analyst-entered data points and interviews

Options:
  --year <n>          Default year for findings without one
  --findings <path>   Saved analyzer output, or a directory of <target_name>.json files
  --output <path>     Also write the session results as JSON
  --analyst <name>    Who entered the ingested file (default: $USER or "analyst")
  --verbose           Echo log lines to the console
  -h, --help          Show this help message
`);
    process.exit(0);
  }

  return { values, positionals };
}

// ============================================================
// Commands
// ============================================================

function runInit(ctx: CliContext): void {
  printHeader("Initialize Database");
  const counts = ctx.repo.seedDefaultData(loadReferenceData(ctx.config.referenceDataPath));

  console.log(`  Database:        ${ctx.config.databasePath}`);
  console.log(`  Sectors:         ${counts.sectorsCreated} created`);
  console.log(`  Subcategories:   ${counts.subcategoriesCreated} created`);
  console.log(`  Dimensions:      ${counts.dimensionsCreated} created`);
  console.log(`  Technologies:    ${counts.technologiesCreated} created`);
  console.log(`  Technology links: ${counts.technologyLinksCreated} created`);
  console.log("");
  console.log(c("green", "✓ Reference data ready"));
}

function runCheck(ctx: CliContext): void {
  printHeader("Database Status");
  const stats = ctx.repo.getStatistics();

  console.log(`  Sectors:        ${stats.sectors}`);
  console.log(`  Subcategories:  ${stats.subcategories}`);
  console.log(`  Dimensions:     ${stats.dimensions}`);
  console.log(`  Technologies:   ${stats.technologies}`);
  console.log(`  Companies:      ${stats.companies}`);
  console.log(`  Sources:        ${stats.sources}`);
  console.log(`  Data points:    ${stats.dataPoints}`);
  console.log(`  Audit entries:  ${stats.changes}`);

  console.log("");
  console.log(c("bold", "Validation status:"));
  for (const [status, n] of Object.entries(stats.validationBreakdown)) {
    console.log(`  ${status.padEnd(12)} ${n}`);
  }

  if (Object.keys(stats.dataPointsBySector).length > 0) {
    console.log("");
    console.log(c("bold", "Data points by sector:"));
    for (const [sector, n] of Object.entries(stats.dataPointsBySector)) {
      console.log(`  ${sector.padEnd(28)} ${n}`);
    }
  }

  if (stats.sectors === 0) {
    console.log("");
    console.log(c("yellow", "No reference data yet. Run: research init"));
  }
}

function collaboratorFor(path: string | undefined): FindingsFileCollaborator {
  if (path === undefined) {
    throw new UsageError("--findings <path> is required to ingest research");
  }
  if (statSync(path).isDirectory()) {
    return new FindingsFileCollaborator((target) => join(path, `${safeFileName(target.name)}.json`));
  }
  return new FindingsFileCollaborator(path);
}

function printResult(result: ResearchResult): void {
  const { target } = result;
  console.log(c("bold", `${target.type} ${target.name} (${target.year}) - session #${result.sessionId}`));
  console.log(`  Findings received: ${result.findingsReceived}`);
  console.log(c("green", `  Data points created: ${result.dataPointIds.length}`));
  if (result.rejected.length > 0) {
    console.log(c("yellow", `  Findings rejected: ${result.rejected.length}`));
    for (const rejection of result.rejected) {
      console.log(c("dim", `    [${rejection.index}] ${rejection.code}: ${rejection.message}`));
    }
  }
  console.log("");
}

function printManualResult(result: ManualIngestionResult): void {
  printHeader("Manual Ingestion");
  console.log(c("bold", `${result.label} - session #${result.sessionId}`));
  console.log(`  Entries received: ${result.received}`);
  console.log(c("green", `  Data points created: ${result.dataPointIds.length}`));
  console.log(c("green", `  Interviews created: ${result.interviewIds.length}`));
  if (result.rejected.length > 0) {
    console.log(c("yellow", `  Entries rejected: ${result.rejected.length}`));
    for (const rejection of result.rejected) {
      console.log(c("dim", `    ${rejection.kind}[${rejection.index}] ${rejection.code}: ${rejection.message}`));
    }
  }
  console.log("");
}

function writeResults(path: string | undefined, results: unknown): void {
  if (path === undefined) return;
  writeFileSync(path, `${JSON.stringify(results, null, 2)}\n`, "utf-8");
  console.log(`Results written to ${path}`);
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<number> {
  const { values, positionals } = parseCliArgs();
  const command = positionals[0];
  if (command === undefined) {
    throw new UsageError("Missing command");
  }

  const ctx = openCliContext({ command: `research ${command}`, verbose: values.verbose });
  try {
    if (command === "init") {
      runInit(ctx);
      return 0;
    }
    if (command === "check") {
      runCheck(ctx);
      return 0;
    }
    if (command === "ingest") {
      const manual = new ManualIngestion(ctx.repo, { logger: ctx.logger, analyst: values.analyst });
      const result = await manual.ingestFile(requirePositional(positionals, 1, "file to ingest"));
      printManualResult(result);
      console.log(`${result.dataPointIds.length} data points pending review. Run: review pending`);
      writeResults(values.output, result);
      return result.rejected.length > 0 ? 1 : 0;
    }

    const year = intOption("year", values.year);
    const session = new ResearchSession(ctx.repo, collaboratorFor(values.findings), { logger: ctx.logger });

    let results: ResearchResult[];
    switch (command) {
      case "sector":
        results = [await session.researchSector(requirePositional(positionals, 1, "sector name"), year)];
        break;
      case "company":
        results = [await session.researchCompany(requirePositional(positionals, 1, "company name"), year)];
        break;
      case "technology":
        results = [await session.researchTechnology(requirePositional(positionals, 1, "technology name"), year)];
        break;
      case "all-sectors":
        results = await session.researchAllSectors(year);
        break;
      default:
        throw new UsageError(`Unknown command '${command}'`);
    }

    printHeader("Research Results");
    results.forEach(printResult);

    const created = results.reduce((sum, r) => sum + r.dataPointIds.length, 0);
    console.log(`${created} data points pending review. Run: review pending`);

    writeResults(values.output, results);
    return 0;
  } finally {
    ctx.close();
  }
}

runCli(main, USAGE);
