/**
 * CSV reading and writing for the roster files.
 *
 * Reading goes through csv-parser. Writing quotes a field only when it
 * contains the delimiter, the quote character or a line break, doubling
 * embedded quotes.
 */

import { createReadStream } from "node:fs";
import csv from "csv-parser";

export interface CsvTable {
  headers: string[];
  rows: Record<string, string>[];
}

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Parse a CSV file. `headers` is empty when the file has no header line.
 */
export function readCsvFile(path: string): Promise<CsvTable> {
  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: Record<string, string>[] = [];

    createReadStream(path, { encoding: "utf-8" })
      .on("error", reject)
      .pipe(csv({ mapHeaders: ({ header }) => header.trim() }))
      .on("headers", (names: string[]) => {
        headers = names;
      })
      .on("data", (row: Record<string, string>) => {
        rows.push(row);
      })
      .on("error", reject)
      .on("end", () => resolve({ headers, rows }));
  });
}

export function formatCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(formatCsvField).join(",");
}

/**
 * Header line followed by one line per row, each terminated by "\n".
 */
export function formatCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  return [header, ...rows].map((fields) => formatCsvRow(fields) + "\n").join("");
}
