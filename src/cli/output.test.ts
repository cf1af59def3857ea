/**
 * Tests for the shared CLI output helpers.
 *
 * Run with: node --import tsx --test src/cli/output.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { createTestContext, marketSizeInput } from "../testing/fixtures.js";
import {
  UsageError,
  describeRecord,
  formatValue,
  idArgument,
  intOption,
  recordPeriod,
  ruleList,
  statusOption,
} from "./output.js";

describe("record lines", () => {
  test("describe a stored data point", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput());
    assert.equal(
      describeRecord(repo.requireDataPoint(id)),
      `#${id} [pending] Industrial Robotics - market_size 2025: 40 USD billions (medium, Example Research)`
    );
  });

  test("periods and missing sources", () => {
    const { repo } = createTestContext();
    const id = repo.createDataPoint(marketSizeInput({ quarter: 3, source: null }));
    const record = repo.requireDataPoint(id);
    assert.equal(recordPeriod(record), "2025-Q3");
    assert.ok(describeRecord(record).endsWith("(medium, no source)"));
  });

  test("values by shape", () => {
    assert.equal(formatValue(12.5, "%"), "12.5 %");
    assert.equal(formatValue("stable demand", "text"), "stable demand");
    assert.equal(formatValue(["Acme", "Globex"], null), '["Acme","Globex"]');
    assert.equal(formatValue(null, "USD billions"), "(no value)");
  });
});

describe("arguments", () => {
  test("integer options", () => {
    assert.equal(intOption("year", undefined), undefined);
    assert.equal(intOption("year", "2025"), 2025);
    assert.throws(() => intOption("year", "twenty"), UsageError);
    assert.throws(() => intOption("year", "2025.5"), /--year must be an integer/);
  });

  test("data point ids", () => {
    assert.equal(idArgument(["claim", "12"]), 12);
    assert.throws(() => idArgument(["claim"]), /Missing data point id/);
    assert.throws(() => idArgument(["claim", "0"]), UsageError);
    assert.throws(() => idArgument(["claim", "abc"]), UsageError);
  });

  test("status filters", () => {
    assert.equal(statusOption(undefined), undefined);
    assert.equal(statusOption("validated"), "validated");
    assert.throws(
      () => statusOption("approved"),
      /--status must be one of pending, in_review, validated, rejected, outdated, got 'approved'/
    );
  });

  test("rule names", () => {
    assert.equal(ruleList(undefined), undefined);
    assert.deepEqual(ruleList("has_source, reasonable_bounds"), ["has_source", "reasonable_bounds"]);
    assert.throws(() => ruleList("has_source,no_such_rule"), /Unknown rule 'no_such_rule'/);
    assert.throws(() => ruleList(" , "), UsageError);
  });
});
