/**
 * Snapshot export of the roster to a second CSV file.
 */

import { RecordStore } from "../store/record-store.js";
import type { Student } from "../students/schema.js";

export type CsvExportOutcome =
  | { status: "exported"; path: string; count: number }
  | { status: "empty" };

/**
 * Write header plus every record to `path`, replacing any earlier export.
 * Nothing is written for an empty roster.
 */
export async function exportCsvSnapshot(
  students: readonly Student[],
  path: string
): Promise<CsvExportOutcome> {
  if (students.length === 0) {
    return { status: "empty" };
  }
  await new RecordStore(path).saveAll(students);
  return { status: "exported", path, count: students.length };
}
