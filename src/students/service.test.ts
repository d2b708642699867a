/**
 * Student operation tests against a real store file.
 *
 * Run: node --import tsx src/students/service.test.ts
 *
 * Tests cover:
 *   1. Add: roll assignment, validation, canonical marks
 *   2. Remove: lookup, confirmation, duplicate rolls
 *   3. Search and list
 *   4. Edit: keep-blank fields, all-or-nothing validation
 *   5. Statistics
 *   6. CSV and PDF export outcomes
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { StudentService } from "./service.js";
import { RecordStore } from "../store/record-store.js";
import { createSilentLogger } from "../logging/index.js";
import { PDFKIT_INSTALL_HINT } from "../export/index.js";
import type { Student, StudentDraft } from "./schema.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const HEADER = "roll,name,marks\n";
const workDir = mkdtempSync(join(tmpdir(), "student-service-test-"));
let fileCounter = 0;

interface Fixture {
  path: string;
  service: StudentService;
  read(): string;
}

/**
 * Service over a fresh store file. `rows` are CSV lines after the header.
 */
function fixture(rows: string[] = []): Fixture {
  fileCounter++;
  const path = join(workDir, `students-${fileCounter}.csv`);
  writeFileSync(path, HEADER + rows.map((row) => row + "\n").join(""));
  return {
    path,
    service: new StudentService(new RecordStore(path), createSilentLogger()),
    read: () => readFileSync(path, "utf-8"),
  };
}

function draft(name: string, marks: string): () => Promise<StudentDraft> {
  return async () => ({ name, marks });
}

const yes = async (): Promise<boolean> => true;
const no = async (): Promise<boolean> => false;

function rolls(students: readonly Student[]): string[] {
  return students.map((s) => s.roll);
}

// ═══════════════════════════════════════════════════════════════════════════
// ADD
// ═══════════════════════════════════════════════════════════════════════════

section("Add");

await test("first record gets roll 1001", async () => {
  const f = fixture();
  const outcome = await f.service.add(draft("Ada", "91"));
  assert.equal(outcome.status, "added");
  assert.equal(f.read(), HEADER + "1001,Ada,91\n");
});

await test("collector sees the roll before the record is written", async () => {
  const f = fixture(["1005,Bea,70"]);
  let seen = "";
  await f.service.add(async (roll) => {
    seen = roll;
    return { name: "Cy", marks: "60" };
  });
  assert.equal(seen, "1006");
  assert.equal(f.read(), HEADER + "1005,Bea,70\n1006,Cy,60\n");
});

await test("each add is one past the previous maximum", async () => {
  const f = fixture();
  await f.service.add(draft("Ada", "91"));
  await f.service.add(draft("Bea", "70"));
  const third = await f.service.add(draft("Cy", "60"));
  assert.ok(third.status === "added");
  assert.equal(third.student.roll, "1003");
});

await test("marks are stored in canonical form and name is trimmed", async () => {
  const f = fixture();
  await f.service.add(draft("  Ada  ", "85.50"));
  await f.service.add(draft("Bea", "1e2"));
  assert.equal(f.read(), HEADER + "1001,Ada,85.5\n1002,Bea,100\n");
});

await test("marks of 101 are rejected without a write", async () => {
  const f = fixture(["1001,Ada,91"]);
  const before = f.read();
  const outcome = await f.service.add(draft("Bea", "101"));
  assert.ok(outcome.status === "invalid");
  assert.equal(outcome.error.hasIssue("marks"), true);
  assert.equal(outcome.error.hasIssue("name"), false);
  assert.equal(f.read(), before);
});

await test("a blank name is rejected without a write", async () => {
  const f = fixture();
  const outcome = await f.service.add(draft("   ", "50"));
  assert.ok(outcome.status === "invalid");
  assert.equal(outcome.error.hasIssue("name"), true);
  assert.equal(f.read(), HEADER);
});

await test("non-numeric marks are rejected", async () => {
  const f = fixture();
  const outcome = await f.service.add(draft("Ada", "ninety"));
  assert.equal(outcome.status, "invalid");
  assert.equal(f.read(), HEADER);
});

// ═══════════════════════════════════════════════════════════════════════════
// REMOVE
// ═══════════════════════════════════════════════════════════════════════════

section("Remove");

await test("unknown roll is reported and never asks for confirmation", async () => {
  const f = fixture(["1001,Ada,91"]);
  const before = f.read();
  let asked = false;
  const outcome = await f.service.remove("2000", async () => {
    asked = true;
    return true;
  });
  assert.deepEqual(outcome, { status: "not_found", roll: "2000" });
  assert.equal(asked, false);
  assert.equal(f.read(), before);
});

await test("blank roll is invalid", async () => {
  const f = fixture(["1001,Ada,91"]);
  const outcome = await f.service.remove("  ", yes);
  assert.ok(outcome.status === "invalid");
  assert.equal(outcome.error.hasIssue("roll"), true);
});

await test("declined confirmation leaves the store alone", async () => {
  const f = fixture(["1001,Ada,91", "1002,Bea,70"]);
  const before = f.read();
  const outcome = await f.service.remove("1001", no);
  assert.equal(outcome.status, "cancelled");
  assert.equal(f.read(), before);
});

await test("confirmed delete removes the record", async () => {
  const f = fixture(["1001,Ada,91", "1002,Bea,70"]);
  const outcome = await f.service.remove(" 1001 ", yes);
  assert.ok(outcome.status === "removed");
  assert.equal(outcome.student.name, "Ada");
  assert.equal(f.read(), HEADER + "1002,Bea,70\n");
});

await test("every record sharing the roll is removed", async () => {
  const f = fixture(["1001,Ada,91", "1002,Bea,70", "1001,Ada Copy,50"]);
  const outcome = await f.service.remove("1001", yes);
  assert.ok(outcome.status === "removed");
  assert.equal(outcome.removed, 2);
  assert.equal(f.read(), HEADER + "1002,Bea,70\n");
});

// ═══════════════════════════════════════════════════════════════════════════
// SEARCH AND LIST
// ═══════════════════════════════════════════════════════════════════════════

section("Search");

await test("matches on roll and name", async () => {
  const f = fixture(["1099,Rossi,70", "1100,Ann99,80", "1101,Bob,90"]);
  const outcome = await f.service.search("99");
  assert.ok(outcome.status === "found");
  assert.deepEqual(rolls(outcome.matches), ["1099", "1100"]);
});

await test("no match is an explicit outcome", async () => {
  const f = fixture(["1001,Ada,91"]);
  assert.deepEqual(await f.service.search(" zed "), { status: "no_matches", query: "zed" });
});

await test("blank query is invalid", async () => {
  const f = fixture(["1001,Ada,91"]);
  const outcome = await f.service.search("");
  assert.ok(outcome.status === "invalid");
  assert.equal(outcome.error.hasIssue("query"), true);
});

section("List");

await test("empty store lists nothing", async () => {
  const f = fixture();
  assert.deepEqual(await f.service.list(), { status: "empty" });
});

await test("records come back sorted by roll", async () => {
  const f = fixture(["1010,Cy,60", "999,Ada,91", "1001,Bea,70"]);
  const outcome = await f.service.list();
  assert.ok(outcome.status === "listed");
  assert.deepEqual(rolls(outcome.students), ["999", "1001", "1010"]);
  assert.equal(f.read(), HEADER + "1010,Cy,60\n999,Ada,91\n1001,Bea,70\n");
});

// ═══════════════════════════════════════════════════════════════════════════
// EDIT
// ═══════════════════════════════════════════════════════════════════════════

section("Edit");

await test("blank fields keep the record and still rewrite identical content", async () => {
  const f = fixture(["1001,Ada,85.0", "1002,Bea,70"]);
  const before = f.read();
  const outcome = await f.service.edit("1001", draft("", ""));
  assert.ok(outcome.status === "updated");
  assert.deepEqual(outcome.after, outcome.before);
  assert.equal(f.read(), before);
});

await test("name-only edit keeps the stored marks text", async () => {
  const f = fixture(["1001,Ada,85.0"]);
  await f.service.edit("1001", draft("Ada King", ""));
  assert.equal(f.read(), HEADER + "1001,Ada King,85.0\n");
});

await test("new marks are validated and stored canonically", async () => {
  const f = fixture(["1001,Ada,85"]);
  await f.service.edit("1001", draft("", "90.0"));
  assert.equal(f.read(), HEADER + "1001,Ada,90\n");
});

await test("invalid marks discard the name change too", async () => {
  const f = fixture(["1001,Ada,85"]);
  const before = f.read();
  const outcome = await f.service.edit("1001", draft("Renamed", "150"));
  assert.equal(outcome.status, "invalid");
  assert.equal(f.read(), before);
});

await test("collector receives the current record", async () => {
  const f = fixture(["1001,Ada,85"]);
  const seen: Student[] = [];
  await f.service.edit("1001", async (student) => {
    seen.push(student);
    return { name: "", marks: "" };
  });
  assert.equal(seen.length, 1);
  assert.equal(seen[0]?.name, "Ada");
  assert.equal(seen[0]?.marks.text, "85");
});

await test("unknown roll is reported", async () => {
  const f = fixture(["1001,Ada,85"]);
  assert.deepEqual(await f.service.edit("1002", draft("X", "1")), {
    status: "not_found",
    roll: "1002",
  });
});

await test("only the first duplicate is edited", async () => {
  const f = fixture(["1001,Ada,85", "1001,Twin,40"]);
  await f.service.edit("1001", draft("First", ""));
  assert.equal(f.read(), HEADER + "1001,First,85\n1001,Twin,40\n");
});

// ═══════════════════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════════════════

section("Statistics");

await test("empty store has no statistics", async () => {
  assert.deepEqual(await fixture().service.statistics(), { status: "empty" });
});

await test("average and both tied toppers", async () => {
  const f = fixture(["1001,A,50", "1002,B,90", "1003,C,90", "1004,D,30"]);
  const outcome = await f.service.statistics();
  assert.ok(outcome.status === "computed");
  assert.equal(outcome.statistics.average, 65);
  assert.equal(outcome.statistics.topMarks, 90);
  assert.deepEqual(rolls(outcome.statistics.toppers), ["1002", "1003"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// EXPORT
// ═══════════════════════════════════════════════════════════════════════════

section("Export");

await test("CSV export of an empty roster writes nothing", async () => {
  const target = join(workDir, "empty-export.csv");
  const outcome = await fixture().service.exportCsv(target);
  assert.deepEqual(outcome, { status: "empty" });
  assert.equal(existsSync(target), false);
});

await test("CSV export copies the roster", async () => {
  const f = fixture(["1002,Bea,70", '1001,"Doe, J",91']);
  const target = join(workDir, "export.csv");
  const outcome = await f.service.exportCsv(target);
  assert.deepEqual(outcome, { status: "exported", path: target, count: 2 });
  assert.equal(readFileSync(target, "utf-8"), f.read());
});

await test("missing pdfkit reports unavailable and writes nothing", async () => {
  const f = fixture(["1001,Ada,91"]);
  const target = join(workDir, "missing.pdf");
  const outcome = await f.service.exportReport(target, async () => {
    throw Object.assign(new Error("Cannot find package 'pdfkit'"), { code: "ERR_MODULE_NOT_FOUND" });
  });
  assert.deepEqual(outcome, { status: "unavailable", reason: PDFKIT_INSTALL_HINT });
  assert.equal(existsSync(target), false);
});

await test("other loader failures propagate", async () => {
  const f = fixture(["1001,Ada,91"]);
  await assert.rejects(
    f.service.exportReport(join(workDir, "broken.pdf"), async () => {
      throw new Error("boom");
    }),
    /boom/
  );
});

// ═══════════════════════════════════════════════════════════════════════════

rmSync(workDir, { recursive: true, force: true });

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
