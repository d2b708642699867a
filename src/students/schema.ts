/**
 * Student record schema and input validation.
 *
 * Two kinds of schema live here:
 * - the row schema, applied to every CSV row read from the store
 *   (lenient: hand-edited files load as they are);
 * - input schemas, applied to what the operator types
 *   (strict: non-empty name, marks within [0, 100]).
 */

import { z } from "zod";
import { isMarksInRange, parseMarksNumber, type Marks } from "./marks.js";

/** Column order of the store and of every export. */
export const STUDENT_FIELDS = ["roll", "name", "marks"] as const;

export type StudentField = (typeof STUDENT_FIELDS)[number];

export interface Student {
  readonly roll: string;
  readonly name: string;
  readonly marks: Marks;
}

/**
 * One CSV row. Cells missing from a short row read as "".
 */
export const StudentRowSchema = z.object({
  roll: z.string().default(""),
  name: z.string().default(""),
  marks: z.string().default(""),
});

export type StudentRow = z.infer<typeof StudentRowSchema>;

export const MARKS_INPUT_MESSAGE = "Marks must be a number between 0 and 100";

/**
 * Operator-entered marks: trimmed text parsed to a number in range.
 */
export const MarksInputSchema = z.string().trim().transform(toMarksValue);

function toMarksValue(text: string, ctx: z.RefinementCtx): number {
  const value = parseMarksNumber(text);
  if (value === null || !isMarksInRange(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: MARKS_INPUT_MESSAGE });
    return z.NEVER;
  }
  return value;
}

/**
 * A new record as typed by the operator.
 */
export const NewStudentSchema = z.object({
  name: z.string().trim().min(1, "Name cannot be empty"),
  marks: MarksInputSchema,
});

/**
 * Edit input: a blank field keeps the current value.
 */
export const StudentEditSchema = z.object({
  name: z
    .string()
    .trim()
    .transform((text) => (text === "" ? undefined : text)),
  marks: z
    .string()
    .trim()
    .transform((text, ctx) => (text === "" ? undefined : toMarksValue(text, ctx))),
});

export const RollInputSchema = z.string().trim().min(1, "Empty roll");

export const SearchQuerySchema = z.string().trim().min(1, "Empty query");

/**
 * Raw text collected from the operator for add and edit.
 */
export interface StudentDraft {
  name: string;
  marks: string;
}
