/**
 * Operator-facing text of the interactive shell.
 */

import { formatScore } from "../students/marks.js";
import type { RosterStatistics } from "../students/roster.js";
import type { Student } from "../students/schema.js";

export const MENU = `
Student Management System - CLI
1. Add Student
2. Delete Student
3. Search Student
4. Edit / Update Student
5. List All Students
6. Topper & Average
7. Export to PDF
8. Export to CSV
9. Exit

`;

export const PROMPTS = {
  choice: "Choose an option (1-9): ",
  name: "Enter Name: ",
  marks: "Enter Marks (0-100): ",
  deleteRoll: "Enter Roll Number to delete: ",
  editRoll: "Enter Roll Number to edit: ",
  search: "Search by Roll or Name (partial allowed): ",
  confirmDelete: (student: Student) =>
    `Are you sure you want to delete ${student.name} (roll ${student.roll.trim()})? [y/N]: `,
  newName: (student: Student) => `Enter new name [${student.name}] (press Enter to keep): `,
  newMarks: (student: Student) =>
    `Enter new marks [${student.marks.text}] (press Enter to keep): `,
} as const;

export const MESSAGES = {
  invalidOption: "Invalid option. Enter number 1-9.",
  goodbye: "Exiting. Goodbye!",
  interrupted: "\nInterrupted. Exiting.",
  inputClosed: "\nInput closed. Exiting.",

  generatedRoll: (roll: string) => `\nGenerated Roll Number: ${roll}`,
  emptyName: "Name cannot be empty. Aborting add.",
  invalidAddMarks: "Invalid marks. Please use a number between 0 and 100. Aborting add.",
  added: (roll: string) => `Student added successfully with Roll ${roll}.`,

  emptyDeleteRoll: "Empty roll. Aborting delete.",
  notFound: (roll: string) => `No student found with roll '${roll}'.`,
  deleteCancelled: "Delete cancelled.",
  deleted: "Student deleted and changes saved.",

  emptyQuery: "Empty query. Aborting search.",
  noMatches: "No matching student records found.",
  found: (count: number) => `\nFound ${count} result(s):`,

  emptyEditRoll: "Empty roll. Aborting edit.",
  editing: (student: Student) => `Editing ${student.name} (Roll ${student.roll})`,
  invalidEditMarks: "Invalid marks. Aborting edit.",
  updated: "Student updated and saved.",

  noRecords: "No student records yet.",
  total: (count: number) => `\nTotal students: ${count}\n`,

  noStatistics: "No records to calculate topper/average.",

  noExport: "No records to export.",
  csvExported: (path: string) => `Exported to CSV file: ${path}`,
  pdfExported: (path: string) => `PDF report generated: ${path}`,

  storageError: (message: string) => `Storage error: ${message}`,
} as const;

const SEPARATOR = "-".repeat(52);

export function formatRow(roll: string, name: string, marks: string): string {
  return `${roll.padEnd(10)} | ${name.padEnd(30)} | ${marks.padEnd(6)}`;
}

/**
 * Fixed-width table: header, dashed rule, one line per record.
 */
export function formatTable(students: readonly Student[]): string[] {
  return [
    formatRow("Roll", "Name", "Marks"),
    SEPARATOR,
    ...students.map((student) => formatRow(student.roll, student.name, student.marks.text)),
  ];
}

export function formatStatistics(statistics: RosterStatistics): string[] {
  return [
    `\nAverage Marks: ${formatScore(statistics.average)}`,
    `Top Marks: ${formatScore(statistics.topMarks)}`,
    "Topper(s):",
    ...statistics.toppers.map(
      (student) => ` - ${student.name} (Roll ${student.roll}) — ${student.marks.text}`
    ),
    "",
  ];
}
