/**
 * Roster operations.
 *
 * Each operation loads the whole store, works in memory and, when it
 * mutates, saves the whole store once at the end. Steps that need the
 * operator (typing a name, confirming a delete) are passed in as
 * callbacks so they run between the load and the save.
 *
 * Validation and lookup failures come back as outcomes; storage
 * failures are thrown as StorageError.
 */

import type { Logger } from "../logging/index.js";
import type { RecordStore } from "../store/record-store.js";
import {
  buildReportRows,
  renderPdfReport,
  exportCsvSnapshot,
  type CsvExportOutcome,
  type ReportOutcome,
  type PdfKitLoader,
} from "../export/index.js";
import { StudentValidationError } from "./errors.js";
import { marksFromNumber } from "./marks.js";
import {
  computeStatistics,
  findByRoll,
  hasRoll,
  matchStudents,
  nextRoll,
  sortForDisplay,
  type RosterStatistics,
} from "./roster.js";
import {
  NewStudentSchema,
  RollInputSchema,
  SearchQuerySchema,
  StudentEditSchema,
  type Student,
  type StudentDraft,
} from "./schema.js";

type Invalid = { status: "invalid"; error: StudentValidationError };
type NotFound = { status: "not_found"; roll: string };

export type AddOutcome = { status: "added"; student: Student } | Invalid;

export type RemoveOutcome =
  | { status: "removed"; student: Student; removed: number }
  | { status: "cancelled"; student: Student }
  | NotFound
  | Invalid;

export type SearchOutcome =
  | { status: "found"; matches: Student[] }
  | { status: "no_matches"; query: string }
  | Invalid;

export type ListOutcome = { status: "listed"; students: Student[] } | { status: "empty" };

export type EditOutcome =
  | { status: "updated"; before: Student; after: Student }
  | NotFound
  | Invalid;

export type StatisticsOutcome =
  | { status: "computed"; statistics: RosterStatistics }
  | { status: "empty" };

function validateRoll(roll: string): { roll: string } | Invalid {
  const parsed = RollInputSchema.safeParse(roll);
  if (!parsed.success) {
    return { status: "invalid", error: StudentValidationError.fromZod(parsed.error.issues, "roll") };
  }
  return { roll: parsed.data };
}

export class StudentService {
  private readonly logger: Logger;

  constructor(
    private readonly store: RecordStore,
    logger: Logger
  ) {
    this.logger = logger.child({ store: store.path });
  }

  private async load(): Promise<Student[]> {
    const students = await this.store.loadAll();
    this.logger.debug("Roster loaded", { count: students.length });
    return students;
  }

  private async save(students: readonly Student[]): Promise<void> {
    await this.store.saveAll(students);
    this.logger.debug("Roster saved", { count: students.length });
  }

  /**
   * Add a record under the next free roll. `collect` receives that roll
   * before the operator types the name and marks.
   */
  async add(collect: (roll: string) => Promise<StudentDraft>): Promise<AddOutcome> {
    const students = await this.load();
    const roll = nextRoll(students);
    const draft = await collect(roll);

    const parsed = NewStudentSchema.safeParse(draft);
    if (!parsed.success) {
      this.logger.info("Add rejected", { roll });
      return { status: "invalid", error: StudentValidationError.fromZod(parsed.error.issues) };
    }

    const student: Student = {
      roll,
      name: parsed.data.name,
      marks: marksFromNumber(parsed.data.marks),
    };
    await this.save([...students, student]);
    this.logger.info("Student added", { roll, marks: student.marks.text });
    return { status: "added", student };
  }

  /**
   * Delete every record with the given roll once `confirm` agrees.
   */
  async remove(
    roll: string,
    confirm: (student: Student) => Promise<boolean>
  ): Promise<RemoveOutcome> {
    const students = await this.load();
    const checked = validateRoll(roll);
    if ("status" in checked) {
      return checked;
    }

    const student = findByRoll(students, checked.roll);
    if (!student) {
      return { status: "not_found", roll: checked.roll };
    }
    if (!(await confirm(student))) {
      return { status: "cancelled", student };
    }

    const remaining = students.filter((candidate) => !hasRoll(candidate, checked.roll));
    await this.save(remaining);
    const removed = students.length - remaining.length;
    this.logger.info("Student deleted", { roll: checked.roll, removed });
    return { status: "removed", student, removed };
  }

  async search(query: string): Promise<SearchOutcome> {
    const students = await this.load();
    const parsed = SearchQuerySchema.safeParse(query);
    if (!parsed.success) {
      return { status: "invalid", error: StudentValidationError.fromZod(parsed.error.issues, "query") };
    }

    const matches = matchStudents(students, parsed.data);
    if (matches.length === 0) {
      return { status: "no_matches", query: parsed.data };
    }
    return { status: "found", matches };
  }

  async list(): Promise<ListOutcome> {
    const students = await this.load();
    if (students.length === 0) {
      return { status: "empty" };
    }
    return { status: "listed", students: sortForDisplay(students) };
  }

  /**
   * Update name and/or marks of the first record with the given roll.
   * Blank draft fields keep the current value. Invalid marks discard
   * the whole edit.
   */
  async edit(
    roll: string,
    collect: (student: Student) => Promise<StudentDraft>
  ): Promise<EditOutcome> {
    const students = await this.load();
    const checked = validateRoll(roll);
    if ("status" in checked) {
      return checked;
    }

    const index = students.findIndex((candidate) => hasRoll(candidate, checked.roll));
    const before = students[index];
    if (before === undefined) {
      return { status: "not_found", roll: checked.roll };
    }

    const parsed = StudentEditSchema.safeParse(await collect(before));
    if (!parsed.success) {
      this.logger.info("Edit rejected", { roll: checked.roll });
      return { status: "invalid", error: StudentValidationError.fromZod(parsed.error.issues) };
    }

    const after: Student = {
      roll: before.roll,
      name: parsed.data.name ?? before.name,
      marks: parsed.data.marks === undefined ? before.marks : marksFromNumber(parsed.data.marks),
    };
    const updated = [...students];
    updated[index] = after;
    await this.save(updated);
    this.logger.info("Student updated", { roll: before.roll });
    return { status: "updated", before, after };
  }

  async statistics(): Promise<StatisticsOutcome> {
    const statistics = computeStatistics(await this.load());
    return statistics ? { status: "computed", statistics } : { status: "empty" };
  }

  async exportCsv(path: string): Promise<CsvExportOutcome> {
    const outcome = await exportCsvSnapshot(await this.load(), path);
    if (outcome.status === "exported") {
      this.logger.info("CSV export written", { path, count: outcome.count });
    }
    return outcome;
  }

  async exportReport(path: string, loadPdf?: PdfKitLoader): Promise<ReportOutcome> {
    const report = buildReportRows(await this.load());
    const outcome = await renderPdfReport(report, path, loadPdf);
    if (outcome.status === "exported") {
      this.logger.info("PDF report written", { path, count: outcome.count });
    } else {
      this.logger.warn("PDF report skipped", { reason: outcome.reason });
    }
    return outcome;
  }
}
