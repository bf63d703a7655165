import type { IssueTable } from "./issues.ts";

export interface SummaryOutput {
  totalFiles: number;
  size: number;
  subjects: string[];
  errors: number;
  warnings: number;
}

/**
 * The output of a validation run
 */
export interface ValidationResult {
  /** No error rows were reported */
  valid: boolean;
  issues: IssueTable;
  /** Per-subject tables, only for sequential runs */
  subjectIssues?: Record<string, IssueTable>;
  summary: SummaryOutput;
}
