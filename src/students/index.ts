/**
 * Student records: schema, roster queries and operations.
 *
 *   const store = new RecordStore("students.csv");
 *   const service = new StudentService(store, logger);
 *
 *   const outcome = await service.add(async (roll) => ({ name: "Ada", marks: "91" }));
 *   if (outcome.status === "added") {
 *     console.log(outcome.student.roll); // "1001" on an empty roster
 *   }
 */

export {
  STUDENT_FIELDS,
  StudentRowSchema,
  NewStudentSchema,
  StudentEditSchema,
  MarksInputSchema,
  RollInputSchema,
  SearchQuerySchema,
  type Student,
  type StudentDraft,
  type StudentField,
  type StudentRow,
} from "./schema.js";
export {
  MIN_MARKS,
  MAX_MARKS,
  parseMarksNumber,
  formatMarks,
  formatScore,
  marksFromNumber,
  marksFromText,
  isMarksInRange,
  type Marks,
} from "./marks.js";
export {
  START_ROLL,
  nextRoll,
  findByRoll,
  matchStudents,
  sortForDisplay,
  computeStatistics,
  type RosterStatistics,
} from "./roster.js";
export { StudentValidationError, type StudentIssue } from "./errors.js";
export {
  StudentService,
  type AddOutcome,
  type RemoveOutcome,
  type SearchOutcome,
  type ListOutcome,
  type EditOutcome,
  type StatisticsOutcome,
} from "./service.js";
