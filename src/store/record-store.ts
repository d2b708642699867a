/**
 * Durable roster storage in a CSV file.
 *
 * Every call works on the whole file: loadAll() reads every row and
 * saveAll() replaces the file with the given records. There is no
 * locking, so two processes sharing a file can lose each other's writes.
 */

import { existsSync, writeFileSync } from "node:fs";
import { rename, writeFile, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { readCsvFile, formatCsv, type CsvTable } from "./csv.js";
import { STUDENT_FIELDS, StudentRowSchema, type Student } from "../students/schema.js";
import { marksFromText } from "../students/marks.js";

/**
 * The store file could not be read, parsed or written.
 */
export class StorageError extends Error {
  public readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
    this.path = path;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class RecordStore {
  constructor(public readonly path: string) {}

  exists(): boolean {
    return existsSync(this.path);
  }

  /**
   * Create the file with only the header row if it is missing.
   */
  async ensureInitialized(): Promise<void> {
    if (this.exists()) {
      return;
    }
    try {
      // "wx" fails instead of truncating if the file appeared meanwhile
      writeFileSync(this.path, formatCsv(STUDENT_FIELDS, []), { encoding: "utf-8", flag: "wx" });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") {
        return;
      }
      throw new StorageError(
        `Cannot create store ${this.path}: ${describe(err)}`,
        this.path,
        { cause: err }
      );
    }
  }

  /**
   * All records in file order.
   */
  async loadAll(): Promise<Student[]> {
    await this.ensureInitialized();

    const table = await this.readTable();
    const missing = STUDENT_FIELDS.filter((field) => !table.headers.includes(field));
    if (missing.length > 0) {
      throw new StorageError(
        `Malformed store ${this.path}: header is missing ${missing.join(", ")}`,
        this.path
      );
    }

    return table.rows.map((raw) => {
      const row = StudentRowSchema.parse(raw);
      return { roll: row.roll, name: row.name, marks: marksFromText(row.marks) };
    });
  }

  private async readTable(): Promise<CsvTable> {
    try {
      return await readCsvFile(this.path);
    } catch (err) {
      throw new StorageError(
        `Cannot read store ${this.path}: ${describe(err)}`,
        this.path,
        { cause: err }
      );
    }
  }

  /**
   * Replace the file with the header and the given records, in order.
   * Writes a sibling temp file and renames it over the store.
   */
  async saveAll(students: readonly Student[]): Promise<void> {
    const content = formatCsv(
      STUDENT_FIELDS,
      students.map((student) => [student.roll, student.name, student.marks.text])
    );
    const tempPath = join(dirname(this.path), `.${basename(this.path)}.${process.pid}.tmp`);

    try {
      await writeFile(tempPath, content, "utf-8");
      await rename(tempPath, this.path);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw new StorageError(
        `Cannot write store ${this.path}: ${describe(err)}`,
        this.path,
        { cause: err }
      );
    }
  }
}
