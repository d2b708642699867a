/**
 * Marks parsing and formatting.
 *
 * Marks are numeric inside the program. Text is produced only where a
 * record is written (canonical form) or displayed (score form). Stored
 * text that is not a number is carried through unchanged so that a
 * rewrite of a hand-edited file keeps its field values.
 */

export const MIN_MARKS = 0;
export const MAX_MARKS = 100;

/**
 * Marks as held in a record.
 * `value` is null when `text` does not parse as a number.
 */
export interface Marks {
  readonly value: number | null;
  readonly text: string;
}

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse decimal text such as "85", " 72.5 ", "1e2".
 * Returns null for anything else, including "nan" and "inf".
 */
export function parseMarksNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function isMarksInRange(value: number): boolean {
  return value >= MIN_MARKS && value <= MAX_MARKS;
}

/**
 * Canonical stored form: integral values drop the decimal point.
 */
export function formatMarks(value: number): string {
  // String() already renders 90.0 as "90" and -0 as "0"
  return String(value);
}

/**
 * Display form for computed scores (averages, maxima): at least one
 * decimal place, e.g. 65.0 or 72.33.
 */
export function formatScore(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function marksFromNumber(value: number): Marks {
  return { value, text: formatMarks(value) };
}

export function marksFromText(text: string): Marks {
  return { value: parseMarksNumber(text), text };
}
