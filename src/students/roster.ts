/**
 * In-memory roster queries.
 *
 * Pure functions over a loaded roster. The fallbacks here are fixed
 * behaviour that callers and stored data rely on:
 * - roll generation falls back to START_ROLL + count when no roll is numeric,
 *   which can repeat an existing roll;
 * - display sorting switches to a plain string sort of the whole roster
 *   as soon as one roll is not an integer;
 * - statistics count unparseable marks as 0.
 */

import type { Student } from "./schema.js";

export const START_ROLL = 1001;

const DIGITS_ONLY = /^\d+$/;
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Next roll number: one past the largest all-digit roll.
 */
export function nextRoll(existing: readonly Student[]): string {
  if (existing.length === 0) {
    return String(START_ROLL);
  }

  let max: bigint | null = null;
  for (const student of existing) {
    const roll = student.roll.trim();
    if (!DIGITS_ONLY.test(roll)) {
      continue;
    }
    const value = BigInt(roll);
    if (max === null || value > max) {
      max = value;
    }
  }

  if (max === null) {
    return String(START_ROLL + existing.length);
  }
  return String(max + 1n);
}

/**
 * First record whose trimmed roll equals the trimmed query.
 */
export function findByRoll(students: readonly Student[], roll: string): Student | undefined {
  const wanted = roll.trim();
  return students.find((student) => student.roll.trim() === wanted);
}

export function hasRoll(student: Student, roll: string): boolean {
  return student.roll.trim() === roll.trim();
}

/**
 * Case-insensitive substring match on roll or name, in store order.
 */
export function matchStudents(students: readonly Student[], query: string): Student[] {
  const needle = query.trim().toLowerCase();
  return students.filter(
    (student) =>
      student.roll.toLowerCase().includes(needle) ||
      student.name.toLowerCase().includes(needle)
  );
}

/**
 * Display order: numeric by roll when every roll is an integer,
 * otherwise a string sort of the whole roster.
 */
export function sortForDisplay(students: readonly Student[]): Student[] {
  const sorted = [...students];

  if (students.every((student) => INTEGER_PATTERN.test(student.roll))) {
    const keyed = sorted.map((student) => ({ student, key: BigInt(student.roll.trim()) }));
    keyed.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    return keyed.map((entry) => entry.student);
  }

  return sorted.sort((a, b) => (a.roll < b.roll ? -1 : a.roll > b.roll ? 1 : 0));
}

export interface RosterStatistics {
  /** Number of records, including those with unparseable marks */
  count: number;
  /** Mean rounded to 2 decimal places */
  average: number;
  topMarks: number;
  /** Every record scoring exactly topMarks, in store order */
  toppers: Student[];
}

/**
 * Average and topper(s). Null for an empty roster.
 */
export function computeStatistics(students: readonly Student[]): RosterStatistics | null {
  if (students.length === 0) {
    return null;
  }

  const values = students.map((student) => student.marks.value ?? 0);

  let total = 0;
  for (const value of values) {
    total += value;
  }
  const average = roundTo2(total / values.length);
  const topMarks = Math.max(...values);
  const toppers = students.filter((_, index) => values[index] === topMarks);

  return { count: students.length, average, topMarks, toppers };
}

/** Two decimal places; ties round up (0.125 gives 0.13). */
function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}
