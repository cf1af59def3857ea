/**
 * Logger Tests
 *
 * Run with: node --import tsx --test src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { test } from "node:test";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { createLogger, formatLogEntry } from "./logger.js";
import { generateRunId, isRunId } from "./run-id.js";

const FIXED = new Date("2026-06-15T08:30:00.000Z");

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

test("entry carries timestamp, padded level and run id", () => {
  const line = formatLogEntry("warn", "bounds exceeded", undefined, FIXED, "20260615-abc123");
  assert.equal(line, "[2026-06-15T08:30:00.000Z] [WARN ] [20260615-abc123] bounds exceeded");
});

test("context is appended as JSON", () => {
  const line = formatLogEntry("info", "created", { id: 7 }, FIXED, null);
  assert.equal(line, '[2026-06-15T08:30:00.000Z] [INFO ] [no-run-id] created {"id":7}');
});

test("empty context is omitted", () => {
  const line = formatLogEntry("error", "boom", {}, FIXED, null);
  assert.equal(line, "[2026-06-15T08:30:00.000Z] [ERROR] [no-run-id] boom");
});

test("errors in context keep name and message", () => {
  const line = formatLogEntry("error", "failed", { err: new TypeError("bad") }, FIXED, null);
  assert.equal(
    line,
    '[2026-06-15T08:30:00.000Z] [ERROR] [no-run-id] failed {"err":{"name":"TypeError","message":"bad"}}'
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// RUN IDS
// ═══════════════════════════════════════════════════════════════════════════

test("run id starts with the UTC date", () => {
  const id = generateRunId(FIXED);
  assert.ok(id.startsWith("20260615-"));
  assert.ok(isRunId(id));
});

test("run id pattern rejects other shapes", () => {
  assert.equal(isRunId("2026-06-15"), false);
  assert.equal(isRunId("20260615-XYZ123"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// FILE OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

test("file output respects level and child bindings", () => {
  const dir = mkdtempSync(join(tmpdir(), "robotics-log-"));
  try {
    const logger = createLogger({
      level: "info",
      logDir: dir,
      logFile: "test.log",
      console: false,
      now: () => FIXED,
    });
    logger.debug("hidden");
    logger.child({ component: "repository" }).info("opened", { path: ":memory:" });

    const lines = readFileSync(join(dir, "test.log"), "utf-8").trimEnd().split("\n");
    assert.equal(lines.length, 1);
    assert.ok(lines[0].endsWith('opened {"component":"repository","path":":memory:"}'));
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
