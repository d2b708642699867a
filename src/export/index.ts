/**
 * Roster exports: CSV snapshot and PDF report.
 */

export { exportCsvSnapshot, type CsvExportOutcome } from "./csv-export.js";
export {
  buildReportRows,
  renderPdfReport,
  loadPdfKit,
  REPORT_TITLE,
  REPORT_HEADER,
  PDFKIT_INSTALL_HINT,
  type RosterReport,
  type ReportOutcome,
  type PdfKitLoader,
} from "./report.js";
