import type { ZodIssue } from "zod";

/**
 * Individual input validation issue.
 */
export interface StudentIssue {
  /** Input field the issue refers to: name, marks, roll or query */
  field: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Operator input rejected before any write.
 */
export class StudentValidationError extends Error {
  public readonly issues: StudentIssue[];

  constructor(message: string, issues: StudentIssue[]) {
    super(message);
    this.name = "StudentValidationError";
    this.issues = issues;
  }

  static fromZod(zodIssues: ZodIssue[], field?: string): StudentValidationError {
    const issues = zodIssues.map((issue) => ({
      field: field ?? issue.path.map(String).join("."),
      message: issue.message,
      code: issue.code,
    }));
    return new StudentValidationError(
      `Invalid input: ${issues.length} validation error(s)`,
      issues
    );
  }

  hasIssue(field: string): boolean {
    return this.issues.some((issue) => issue.field === field);
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Student input validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.field || "(input)"}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}
