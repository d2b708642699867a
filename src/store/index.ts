/**
 * CSV-backed record storage.
 */

export { RecordStore, StorageError } from "./record-store.js";
export { readCsvFile, formatCsv, formatCsvRow, formatCsvField, type CsvTable } from "./csv.js";
