#!/usr/bin/env node
/**
 * Review CLI: move data points through the validation workflow.
 *
 * Usage:
 *   npx tsx src/cli/review.ts <command> [options]
 *   npm run review -- <command> [options]
 *
 * Commands:
 *   pending              List items waiting for review
 *   queue                Validation statistics and both queues
 *   claim <id>           Take an item into review
 *   validate <id>        Confirm an item under review (--notes)
 *   reject <id>          Reject an item under review (--reason required)
 *   outdate <id>         Mark an item outdated (--reason required)
 *   sweep                Mark validated items older than --years outdated
 *   check <id>           Dry run of the validation rules (--rules to pick some)
 *   auto                 Claim and validate passing high-confidence items
 *   history <id>         Audit trail of an item
 *
 * Options:
 *   --analyst <name>    Who performs the action (default: $USER or "analyst")
 *   --reason <text>     Reason for reject/outdate
 *   --notes <text>      Notes stored with a validation
 *   --years <n>         Staleness window for sweep (default: quality config)
 *   --rules <a,b>       Rule names for check (default: all)
 *   --limit <n>         Maximum items listed
 *   --verbose           Echo log lines to the console
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Any error, including an item that fails validation
 */

import { parseArgs } from "node:util";

import { optionalEnv } from "../config/env.js";
import type { DataPointRecord } from "../types/data-point.js";
import { candidateFromRecord, type ValidationVerdict } from "../validation/engine.js";
import { ValidationWorkflow } from "../validation/workflow.js";
import { openCliContext, type CliContext } from "./context.js";
import {
  UsageError,
  c,
  describeRecord,
  idArgument,
  intOption,
  printHeader,
  ruleList,
  runCli,
} from "./output.js";

const USAGE =
  "Usage: review <pending|queue|claim|validate|reject|outdate|sweep|check|auto|history> [id] [options]";

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      analyst: { type: "string", default: optionalEnv("USER", "analyst") },
      reason: { type: "string" },
      notes: { type: "string" },
      years: { type: "string" },
      rules: { type: "string" },
      limit: { type: "string" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
${USAGE}

Commands:
  pending              List items waiting for review
  queue                Validation statistics and both queues
  claim <id>           Take an item into review
  validate <id>        Confirm an item under review (--notes)
  reject <id>          Reject an item under review (--reason required)
  outdate <id>         Mark an item outdated (--reason required)
  sweep                Mark validated items older than --years outdated
  check <id>           Dry run of the validation rules (--rules to pick some)
  auto                 Claim and validate passing high-confidence items
  history <id>         Audit trail of an item

Options:
  --analyst <name>    Who performs the action (default: $USER or "analyst")
  --reason <text>     Reason for reject/outdate
  --notes <text>      Notes stored with a validation
  --years <n>         Staleness window for sweep
  --rules <a,b>       Rule names for check (default: all)
  --limit <n>         Maximum items listed
  --verbose           Echo log lines to the console
  -h, --help          Show this help message
`);
    process.exit(0);
  }

  return { values, positionals };
}

// ============================================================
// Output
// ============================================================

function printItems(title: string, items: readonly DataPointRecord[]): void {
  console.log(c("bold", `${title} (${items.length})`));
  if (items.length === 0) {
    console.log(c("dim", "  (none)"));
  }
  for (const item of items) {
    console.log(`  ${describeRecord(item)}`);
  }
  console.log("");
}

function printVerdict(verdict: ValidationVerdict): void {
  for (const result of verdict.results) {
    const mark = result.passed
      ? c("green", "✓")
      : result.severity === "error"
        ? c("red", "✗")
        : c("yellow", "!");
    const reason = result.reason === null ? "" : c("dim", ` - ${result.reason}`);
    console.log(`  ${mark} ${result.rule}${reason}`);
  }
  console.log("");
  console.log(`Recommendation: ${c("bold", verdict.recommendation)}`);
}

function printHistory(ctx: CliContext, id: number): void {
  const record = ctx.repo.requireDataPoint(id);
  printHeader(`History of #${id}`);
  console.log(describeRecord(record));
  console.log("");

  for (const entry of ctx.repo.getChanges({ recordId: id })) {
    const status =
      entry.before !== null && entry.before.status !== entry.after.status
        ? ` ${entry.before.status} -> ${entry.after.status}`
        : "";
    const fields = entry.fields.length > 0 ? c("dim", ` [${entry.fields.join(", ")}]`) : "";
    const reason = entry.reason === null ? "" : `: ${entry.reason}`;
    console.log(`  ${entry.timestamp} ${entry.changeType}${status} by ${entry.actor}${reason}${fields}`);
  }
}

function requireReason(reason: string | undefined, command: string): string {
  if (reason === undefined || reason.trim() === "") {
    throw new UsageError(`${command} requires --reason <text>`);
  }
  return reason;
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

  const ctx = openCliContext({ command: `review ${command}`, verbose: values.verbose });
  try {
    const workflow = new ValidationWorkflow(ctx.repo, {
      config: ctx.quality,
      engine: ctx.engine,
      logger: ctx.logger,
    });
    const analyst = values.analyst;
    const limit = intOption("limit", values.limit);

    switch (command) {
      case "pending":
        printHeader("Pending Review");
        printItems("Pending", workflow.getPendingItems(limit));
        return 0;

      case "queue": {
        const stats = workflow.getValidationStats();
        printHeader("Validation Queue");
        console.log(`  Total: ${stats.total}  Validated: ${stats.validatedPercent}%`);
        for (const [status, n] of Object.entries(stats.byStatus)) {
          console.log(`  ${status.padEnd(12)} ${n}`);
        }
        console.log("");
        printItems("Pending", workflow.getPendingItems(limit));
        printItems("In review", workflow.getInReviewItems(limit));
        return 0;
      }

      case "claim": {
        const record = workflow.claimForReview(idArgument(positionals), analyst);
        console.log(c("green", `✓ Claimed ${describeRecord(record)}`));
        return 0;
      }

      case "validate": {
        const { record, verdict, superseded } = workflow.validateItem(
          idArgument(positionals),
          analyst,
          values.notes
        );
        console.log(c("green", `✓ Validated ${describeRecord(record)}`));
        for (const warning of verdict.warnings) {
          console.log(c("yellow", `  ! ${warning.rule}: ${warning.reason ?? "warning"}`));
        }
        if (superseded.length > 0) {
          console.log(`  Superseded: ${superseded.map((id) => `#${id}`).join(", ")}`);
        }
        return 0;
      }

      case "reject": {
        const id = idArgument(positionals);
        const record = workflow.rejectItem(id, analyst, requireReason(values.reason, "reject"));
        console.log(c("yellow", `✓ Rejected ${describeRecord(record)}`));
        return 0;
      }

      case "outdate": {
        const id = idArgument(positionals);
        const record = workflow.markOutdated(id, analyst, requireReason(values.reason, "outdate"));
        console.log(c("yellow", `✓ Outdated ${describeRecord(record)}`));
        return 0;
      }

      case "sweep": {
        const swept = workflow.sweepStale({ olderThanYears: intOption("years", values.years), actor: analyst });
        console.log(`Marked ${swept.length} stale items outdated`);
        if (swept.length > 0) {
          console.log(c("dim", `  ${swept.map((id) => `#${id}`).join(", ")}`));
        }
        return 0;
      }

      case "check": {
        const id = idArgument(positionals);
        const rules = ruleList(values.rules);
        const record = ctx.repo.requireDataPoint(id);
        printHeader(`Rule Check #${id}`);
        console.log(describeRecord(record));
        console.log("");
        const verdict =
          rules === undefined ? workflow.checkItem(id) : ctx.engine.evaluate(candidateFromRecord(record), rules);
        printVerdict(verdict);
        return verdict.passed ? 0 : 1;
      }

      case "auto": {
        const outcome = workflow.autoValidateHighConfidence(`auto:${analyst}`);
        console.log(c("green", `✓ Auto-validated ${outcome.validated.length} items`));
        if (outcome.leftInReview.length > 0) {
          console.log(
            c("yellow", `  Left in review: ${outcome.leftInReview.map((id) => `#${id}`).join(", ")}`)
          );
        }
        return 0;
      }

      case "history":
        printHistory(ctx, idArgument(positionals));
        return 0;

      default:
        throw new UsageError(`Unknown command '${command}'`);
    }
  } finally {
    ctx.close();
  }
}

runCli(main, USAGE);
