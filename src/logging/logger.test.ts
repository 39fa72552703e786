/**
 * Logger tests.
 *
 * Run: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { createLogger, formatLogEntry } from "./logger.js";
import { generateOperationId, generateRunId, getRunId, initRunId } from "./run-id.js";
import { captureLogger } from "../testing/fakes.js";
import { run, section, test } from "../testing/harness.js";

const AT = new Date("2026-03-01T09:30:00.000Z");

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

section("Formatting");

test("entries carry timestamp, padded level and run id", () => {
  const runId = initRunId();
  assert.equal(
    formatLogEntry("info", "Document created", undefined, undefined, AT),
    `[2026-03-01T09:30:00.000Z] [INFO ] [${runId}] Document created`
  );
});

test("component and context are appended", () => {
  const runId = getRunId();
  assert.equal(
    formatLogEntry("warn", "Retrying", { attempt: 2 }, "engine", AT),
    `[2026-03-01T09:30:00.000Z] [WARN ] [${runId}] [engine] Retrying {"attempt":2}`
  );
});

test("errors in the context keep name and message", () => {
  const line = formatLogEntry("error", "Failed", { error: new RangeError("bad span") }, undefined, AT);
  assert.ok(line.endsWith(` Failed {"error":{"name":"RangeError","message":"bad span"}}`));
});

test("run and operation ids have their documented shapes", () => {
  assert.match(generateRunId(), /^\d{8}-[0-9a-f]{6}$/);
  assert.match(generateOperationId(), /^op-[0-9a-f]{8}$/);
});

// ═══════════════════════════════════════════════════════════════════════════
// LEVELS AND CHILDREN
// ═══════════════════════════════════════════════════════════════════════════

section("Levels and child loggers");

test("entries below the level are dropped", () => {
  const { logger, lines } = captureLogger("warn");
  logger.debug("d");
  logger.info("i");
  logger.warn("w");
  logger.error("e");
  assert.deepEqual(
    lines.map((l) => l.level),
    ["warn", "error"]
  );
});

test("child loggers nest components and merge bindings", () => {
  const { logger, lines } = captureLogger();
  const child = logger.child("engine", { documentId: "doc-1" }).child("merge", { operationId: "op-1" });
  child.info("Topics merged", { key: "T4" });
  assert.equal(lines.length, 1);
  assert.ok(
    lines[0].line.endsWith(' [engine:merge] Topics merged {"documentId":"doc-1","operationId":"op-1","key":"T4"}')
  );
});

test("entry context overrides bindings of the same name", () => {
  const { logger, lines } = captureLogger();
  logger.child("engine", { state: "uploaded" }).info("Committed", { state: "segmented" });
  assert.ok(lines[0].line.endsWith(' [engine] Committed {"state":"segmented"}'));
});

// ═══════════════════════════════════════════════════════════════════════════
// FILE OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

section("File output");

test("lines are appended to the log file", () => {
  const dir = mkdtempSync(join(tmpdir(), "logger-"));
  try {
    const logger = createLogger({ console: false, logDir: join(dir, "logs"), logFile: "test.log" });
    logger.info("first");
    logger.info("second");
    const lines = readFileSync(join(dir, "logs", "test.log"), "utf-8").trim().split("\n");
    assert.equal(lines.length, 2);
    assert.ok(lines[1].endsWith(" second"));
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

await run();
