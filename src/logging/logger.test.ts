/**
 * Logger tests.
 *
 * Run: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { createLogger, formatLogEntry, generateRunId, getRunId, initRunId } from "./index.js";

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

const workDir = mkdtempSync(join(tmpdir(), "logger-test-"));
const NOW = new Date("2024-03-05T10:20:30.000Z");

test("run ID has a date prefix and six hex digits", () => {
  assert.match(generateRunId(NOW), /^20240305-[0-9a-f]{6}$/);
});

test("entry without a run ID", () => {
  assert.equal(getRunId(), null);
  assert.equal(
    formatLogEntry("info", "Student added", { roll: "1001" }, NOW),
    '[2024-03-05T10:20:30.000Z] [INFO ] [no-run-id] Student added {"roll":"1001"}'
  );
});

test("entry carries the current run ID and omits empty context", () => {
  const runId = initRunId();
  assert.equal(
    formatLogEntry("error", "Storage failure", {}, NOW),
    `[2024-03-05T10:20:30.000Z] [ERROR] [${runId}] Storage failure`
  );
});

test("file output respects the level and adds base context", () => {
  const logDir = join(workDir, "logs");
  const logger = createLogger({ level: "info", logDir, baseContext: { app: "roster" } });
  logger.debug("hidden");
  logger.info("shown", { roll: "1001" });

  const lines = readFileSync(join(logDir, "students.log"), "utf-8").trim().split("\n");
  assert.equal(lines.length, 1);
  assert.ok(lines[0]?.endsWith('shown {"app":"roster","roll":"1001"}'));
});

test("child loggers add their context and share the file", () => {
  const logDir = join(workDir, "child");
  const parent = createLogger({ logDir, baseContext: { app: "roster" } });
  const child = parent.child({ store: "students.csv" });
  child.info("Student added", { roll: "1001" });
  parent.info("Session finished");

  const lines = readFileSync(join(logDir, "students.log"), "utf-8").trim().split("\n");
  assert.equal(lines.length, 2);
  assert.ok(lines[0]?.endsWith('Student added {"app":"roster","store":"students.csv","roll":"1001"}'));
  assert.ok(lines[1]?.endsWith('Session finished {"app":"roster"}'));
});

test("file output can be turned off", () => {
  const logDir = join(workDir, "unused");
  createLogger({ logDir, file: false }).error("nowhere");
  assert.equal(existsSync(logDir), false);
});

rmSync(workDir, { recursive: true, force: true });

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
