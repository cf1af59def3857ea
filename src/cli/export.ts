#!/usr/bin/env node
/**
 * Export CLI: JSON reports and CSV tables from the intelligence database.
 *
 * Usage:
 *   npx tsx src/cli/export.ts <command> [options]
 *   npm run export -- <command> [options]
 *
 * Commands:
 *   list                          Show sectors, dimensions and counts
 *   full                          Validated data for every sector
 *   sector <name>                 Sector intelligence report
 *   dimension <name> [--year]     One dimension across sectors
 *   validation                    Validation status and review queues
 *   changes [--year --quarter --month]
 *                                 Changes against the previous period
 *   timeseries <sector> <dim>     Values over time
 *   by-dimension                  Latest-first values per dimension
 *   interviews [--status --topic] Expert interviews
 *   csv                           Data point rows (or --summary, --growth-rates,
 *                                 --market-sizes tables)
 *
 * Options:
 *   --year <n>         Year (changes default: current year)
 *   --quarter <n>      Quarter for changes
 *   --month <n>        Month for changes
 *   --sector <name>    CSV sector filter
 *   --dimension <name> CSV dimension filter
 *   --validated-only   Validated points only (sector report, CSV)
 *   --summary          CSV summary per sector and dimension
  --growth-rates     CSV of growth rates by sector
  --market-sizes     CSV of market sizes by sector
  --status <status>  Interview status filter
  --topic <topic>    Interview topic filter
 *   --growth-rates     CSV of growth rates by sector
 *   --market-sizes     CSV of market sizes by sector
 *   --status <status>  Interview status filter
 *   --topic <topic>    Interview topic filter
 *   --output <path>    Output file (default: timestamped file in EXPORT_PATH)
 *   --stdout           Print instead of writing a file
 *   --verbose          Echo log lines to the console
 *   -h, --help         Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Any error
 */

import { parseArgs } from "node:util";

import { ChangeDetector, formatChangesAsText } from "../changes/index.js";
import { periodFromParts } from "../changes/periods.js";
import { CsvExporter, JsonExporter, ReportGenerator, type Report } from "../reporting/index.js";
import { ValidationWorkflow } from "../validation/workflow.js";
import { openCliContext, type CliContext } from "./context.js";
import {
  UsageError,
  c,
  intOption,
  printHeader,
  requirePositional,
  runCli,
  statusOption,
} from "./output.js";

const USAGE =
  "Usage: export <list|full|sector|dimension|validation|changes|timeseries|by-dimension|interviews|csv> [options]";

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      year: { type: "string" },
      quarter: { type: "string" },
      month: { type: "string" },
      sector: { type: "string" },
      dimension: { type: "string" },
      "validated-only": { type: "boolean", default: false },
      summary: { type: "boolean", default: false },
      "growth-rates": { type: "boolean", default: false },
      "market-sizes": { type: "boolean", default: false },
      status: { type: "string" },
      topic: { type: "string" },
      output: { type: "string", short: "o" },
      stdout: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
${USAGE}

Commands:
  list                          Show sectors, dimensions and counts
  full                          Validated data for every sector
  sector <name>                 Sector intelligence report
  dimension <name> [--year]     One dimension across sectors
  validation                    Validation status and review queues
  changes [--year --quarter --month]
                                Changes against the previous period
  timeseries <sector> <dim>     Values over time
  by-dimension                  Latest-first values per dimension
  interviews [--status --topic] Expert interviews
  csv                           Data point rows (or --summary, --growth-rates,
                                --market-sizes tables)

Options:
  --year <n>         Year (changes default: current year)
  --quarter <n>      Quarter for changes
  --month <n>        Month for changes
  --sector <name>    CSV sector filter
  --dimension <name> CSV dimension filter
  --validated-only   Validated points only (sector report, CSV)
  --summary          CSV summary per sector and dimension
  --growth-rates     CSV of growth rates by sector
  --market-sizes     CSV of market sizes by sector
  --status <status>  Interview status filter
  --topic <topic>    Interview topic filter
  -o, --output <path> Output file (default: timestamped file in EXPORT_PATH)
  --stdout           Print instead of writing a file
  --verbose          Echo log lines to the console
  -h, --help         Show this help message
`);
    process.exit(0);
  }

  return { values, positionals };
}

type CliValues = ReturnType<typeof parseCliArgs>["values"];

// ============================================================
// Commands
// ============================================================

function listAvailable(ctx: CliContext): void {
  printHeader("Available Data");
  const stats = ctx.repo.getStatistics();

  console.log(c("bold", "Sectors:"));
  for (const sector of ctx.repo.getSectors()) {
    console.log(`  - ${sector.name} (${stats.dataPointsBySector[sector.name] ?? 0} data points)`);
  }

  console.log("");
  console.log(c("bold", "Dimensions:"));
  for (const dimension of ctx.repo.getDimensions()) {
    console.log(`  - ${dimension.name} (${dimension.unit ?? "N/A"}, ${dimension.kind})`);
  }

  console.log("");
  console.log(c("bold", "Statistics:"));
  console.log(`  Data points: ${stats.dataPoints}`);
  console.log(`  Sources:     ${stats.sources}`);
  console.log(`  Companies:   ${stats.companies}`);
  console.log(`  Interviews:  ${stats.interviews}`);

  console.log("");
  console.log(c("bold", "Validation status:"));
  for (const [status, n] of Object.entries(stats.validationBreakdown)) {
    console.log(`  ${status}: ${n}`);
  }
}

function buildReport(
  command: string,
  positionals: readonly string[],
  values: CliValues,
  reports: ReportGenerator,
  currentYear: number
): Report {
  switch (command) {
    case "full":
      return reports.generateFullExport();
    case "sector":
      return reports.generateSectorReport(requirePositional(positionals, 1, "sector name"), {
        includePending: !values["validated-only"],
      });
    case "dimension":
      return reports.generateDimensionReport(
        requirePositional(positionals, 1, "dimension name"),
        intOption("year", values.year)
      );
    case "validation":
      return reports.generateValidationReport();
    case "changes": {
      const period = periodFromParts(
        intOption("year", values.year) ?? currentYear,
        intOption("quarter", values.quarter),
        intOption("month", values.month)
      );
      return reports.generateChangesReport(period, { sector: values.sector, dimension: values.dimension });
    }
    case "timeseries":
      return reports.generateTimeSeries(
        requirePositional(positionals, 1, "sector name"),
        requirePositional(positionals, 2, "dimension name")
      );
    case "by-dimension":
      return reports.generateByDimensionExport();
    case "interviews":
      return reports.generateInterviewReport({ status: statusOption(values.status), topic: values.topic });
    default:
      throw new UsageError(`Unknown command '${command}'`);
  }
}

type CsvTable = "points" | "summary" | "growth-rates" | "market-sizes";

function csvTable(values: CliValues): CsvTable {
  const picked = (["summary", "growth-rates", "market-sizes"] as const).filter((flag) => values[flag]);
  if (picked.length > 1) {
    throw new UsageError(`Pick one of --${picked.join(", --")}`);
  }
  return picked[0] ?? "points";
}

function exportCsv(ctx: CliContext, values: CliValues): void {
  const table = csvTable(values);
  const dimension =
    table === "growth-rates" ? "market_growth_rate" : table === "market-sizes" ? "market_size" : values.dimension;
  const records = ctx.repo.getDataPoints({
    sector: values.sector,
    dimension,
    year: intOption("year", values.year),
    status: values["validated-only"] ? "validated" : undefined,
  });
  const exporter = new CsvExporter(ctx.config.exportDir, { logger: ctx.logger });

  if (values.stdout) {
    const csv = {
      points: () => exporter.toCsv(records),
      summary: () => exporter.summaryCsv(records),
      "growth-rates": () => exporter.growthRatesCsv(records),
      "market-sizes": () => exporter.marketSizesCsv(records),
    }[table]();
    process.stdout.write(csv);
    return;
  }

  switch (table) {
    case "points":
    case "summary": {
      const path =
        table === "summary"
          ? exporter.exportSummary(records, values.output)
          : exporter.exportDataPoints(records, values.output);
      console.log(c("green", `✓ Exported ${records.length} data points to ${path}`));
      return;
    }
    case "growth-rates":
    case "market-sizes": {
      const path =
        table === "growth-rates"
          ? exporter.exportGrowthRates(records, values.output)
          : exporter.exportMarketSizes(records, values.output);
      if (path === null) {
        console.log(c("yellow", `No ${dimension} values to export`));
        return;
      }
      console.log(c("green", `✓ Exported ${dimension} values to ${path}`));
      return;
    }
  }
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

  const ctx = openCliContext({ command: `export ${command}`, verbose: values.verbose });
  try {
    if (command === "list") {
      listAvailable(ctx);
      return 0;
    }
    if (command === "csv") {
      exportCsv(ctx, values);
      return 0;
    }

    const workflow = new ValidationWorkflow(ctx.repo, {
      config: ctx.quality,
      engine: ctx.engine,
      logger: ctx.logger,
    });
    const detector = new ChangeDetector(ctx.repo, { config: ctx.quality, logger: ctx.logger });
    const reports = new ReportGenerator(ctx.repo, { detector, workflow });
    const report = buildReport(command, positionals, values, reports, new Date().getUTCFullYear());

    if (values.stdout) {
      console.log(JSON.stringify(report, null, 2));
      return 0;
    }

    const path = new JsonExporter(ctx.config.exportDir, { logger: ctx.logger }).exportReport(
      report,
      values.output
    );
    console.log(c("green", `✓ Exported ${report.reportType} to ${path}`));

    if (report.reportType === "changes") {
      console.log("");
      console.log(formatChangesAsText(report.changes));
    } else if (report.reportType === "interview_intelligence") {
      console.log(`Total interviews: ${report.totalInterviews}`);
    }
    return 0;
  } finally {
    ctx.close();
  }
}

runCli(main, USAGE);
