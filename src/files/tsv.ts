/**
 * @fileoverview Writes a validation result as a tab-separated issue table
 * plus the JSON data dictionary describing its columns.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import { getFieldCatalog } from "../issues/fieldCatalog.ts";
import { ISSUE_TABLE_COLUMNS } from "../issues/flatten.ts";
import type { IssueTable, SubjectIssueRecord } from "../types/issues.ts";
import type { ValidationResult } from "../types/validation-result.ts";

export interface WrittenFiles {
  tsvPath: string;
  jsonPath: string;
}

/**
 * Formats an issue table as TSV with a header row
 */
export function formatIssueTable(table: IssueTable): string {
  return stringify(table, {
    header: true,
    delimiter: "\t",
    columns: [...ISSUE_TABLE_COLUMNS],
  });
}

/**
 * Formats per-subject tables as one TSV with a trailing subject column
 */
export function formatSubjectIssueTable(
  subjectIssues: Record<string, IssueTable>,
): string {
  const rows: SubjectIssueRecord[] = Object.entries(subjectIssues).flatMap((
    [subject, table],
  ) => table.map((row) => ({ ...row, subject })));
  return stringify(rows, {
    header: true,
    delimiter: "\t",
    columns: [...ISSUE_TABLE_COLUMNS, "subject"],
  });
}

/**
 * Writes `<prefix>_validation.tsv` and `<prefix>_validation.json`
 *
 * @param result - Result of `validate`
 * @param outputPrefix - Path prefix shared by both files
 */
export async function writeValidationFiles(
  result: ValidationResult,
  outputPrefix: string,
): Promise<WrittenFiles> {
  const tsvPath = `${outputPrefix}_validation.tsv`;
  const jsonPath = `${outputPrefix}_validation.json`;

  await mkdir(path.dirname(path.resolve(tsvPath)), { recursive: true });
  const tsv = result.subjectIssues
    ? formatSubjectIssueTable(result.subjectIssues)
    : formatIssueTable(result.issues);
  await writeFile(tsvPath, tsv, "utf-8");
  await writeFile(jsonPath, JSON.stringify(getFieldCatalog(), null, 4) + "\n", "utf-8");

  return { tsvPath, jsonPath };
}
