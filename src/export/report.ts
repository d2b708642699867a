/**
 * Printable roster report.
 *
 * The roster supplies rows in column order (roll, name, marks) behind a
 * header row; pdfkit lays them out as a paginated A4 document. pdfkit is
 * loaded on first use, so a missing install turns into an "unavailable"
 * outcome instead of a crash at startup.
 */

import { createWriteStream } from "node:fs";
import { finished } from "node:stream/promises";
import { StorageError } from "../store/record-store.js";
import type { Student } from "../students/schema.js";

export const REPORT_TITLE = "Student Management System - Report";
export const REPORT_HEADER = ["Roll", "Name", "Marks"] as const;

export interface RosterReport {
  /** Header row first, then one row per record */
  rows: string[][];
  /** Number of records (excludes the header row) */
  count: number;
}

export type ReportOutcome =
  | { status: "exported"; path: string; count: number }
  | { status: "unavailable"; reason: string };

type PdfDocumentConstructor = new (options?: PDFKit.PDFDocumentOptions) => PDFKit.PDFDocument;

export type PdfKitLoader = () => Promise<PdfDocumentConstructor>;

export const PDFKIT_INSTALL_HINT = "pdfkit is not installed. Install it with: npm install pdfkit";

const COLUMN_WIDTHS = [60, 300, 60];
const ROW_HEIGHT = 20;
const CELL_PADDING = 4;
const HEADER_FILL = "#4B8BBE";
const GRID_COLOR = "grey";

export function buildReportRows(students: readonly Student[]): RosterReport {
  return {
    rows: [
      [...REPORT_HEADER],
      ...students.map((student) => [student.roll, student.name, student.marks.text]),
    ],
    count: students.length,
  };
}

export const loadPdfKit: PdfKitLoader = async () => {
  const module = await import("pdfkit");
  return module.default;
};

function isModuleNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ERR_MODULE_NOT_FOUND" || err.code === "MODULE_NOT_FOUND")
  );
}

/**
 * Write the report as a PDF file. Failure to write the file is a
 * StorageError.
 */
export async function renderPdfReport(
  report: RosterReport,
  path: string,
  load: PdfKitLoader = loadPdfKit
): Promise<ReportOutcome> {
  let PDFDocument: PdfDocumentConstructor;
  try {
    PDFDocument = await load();
  } catch (err) {
    if (isModuleNotFound(err)) {
      return { status: "unavailable", reason: PDFKIT_INSTALL_HINT };
    }
    throw err;
  }

  const doc = new PDFDocument({ size: "A4", margin: 50 });
  const out = createWriteStream(path);
  doc.pipe(out);

  doc.font("Helvetica-Bold").fontSize(20).text(REPORT_TITLE, { align: "center" });
  doc.moveDown();
  doc.font("Helvetica").fontSize(11).text(`Total students: ${report.count}`);
  doc.moveDown();

  const tableWidth = COLUMN_WIDTHS.reduce((sum, width) => sum + width, 0);
  const left = (doc.page.width - tableWidth) / 2;
  const [header, ...body] = report.rows;
  let y = doc.y;

  const drawRow = (cells: readonly string[], isHeader: boolean): void => {
    let x = left;
    if (isHeader) {
      doc.rect(left, y, tableWidth, ROW_HEIGHT).fill(HEADER_FILL);
    }
    doc.font(isHeader ? "Helvetica-Bold" : "Helvetica").fontSize(10);
    doc.fillColor(isHeader ? "white" : "black");
    cells.forEach((cell, index) => {
      const width = COLUMN_WIDTHS[index] ?? 0;
      doc.text(cell, x + CELL_PADDING, y + (ROW_HEIGHT - 10) / 2, {
        width: width - CELL_PADDING * 2,
        height: ROW_HEIGHT,
        align: "center",
        lineBreak: false,
        ellipsis: true,
      });
      doc.lineWidth(0.5).strokeColor(GRID_COLOR).rect(x, y, width, ROW_HEIGHT).stroke();
      x += width;
    });
    y += ROW_HEIGHT;
  };

  if (header) {
    drawRow(header, true);
    for (const row of body) {
      if (y + ROW_HEIGHT > doc.page.height - doc.page.margins.bottom) {
        doc.addPage();
        y = doc.page.margins.top;
        drawRow(header, true);
      }
      drawRow(row, false);
    }
  }

  doc.end();
  try {
    await finished(out);
  } catch (err) {
    throw new StorageError(
      `Cannot write report ${path}: ${err instanceof Error ? err.message : String(err)}`,
      path,
      { cause: err }
    );
  }

  return { status: "exported", path, count: report.count };
}
