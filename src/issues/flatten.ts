/**
 * @fileoverview Turns the validator's JSON report into an issue table.
 * Only errors and warnings are kept, in report order.
 */

import type { IssueTable, NormalizedIssueRecord, RawIssue } from "../types/issues.ts";
import { MalformedReportError } from "./errors.ts";
import { isRecord, normalizeIssue } from "./normalize.ts";

/** Columns of the issue table, in output order */
export const ISSUE_TABLE_COLUMNS = [
  "code",
  "severity",
  "location",
  "affects",
  "rule",
] as const satisfies readonly (keyof NormalizedIssueRecord)[];

const RETAINED_SEVERITIES: ReadonlySet<string> = new Set(["error", "warning"]);

/**
 * Flattens an already decoded report. The issue list lives under
 * `issues.issues`; a missing or mistyped level counts as empty.
 *
 * @param report - Decoded validator output
 * @returns One normalized row per error or warning
 */
export function flattenReport(report: unknown): IssueTable {
  const outer: RawIssue = isRecord(report) && isRecord(report.issues)
    ? report.issues
    : {};
  const entries: unknown[] = Array.isArray(outer.issues) ? outer.issues : [];

  const table: IssueTable = [];
  for (const entry of entries) {
    if (
      isRecord(entry) && typeof entry.severity === "string" &&
      RETAINED_SEVERITIES.has(entry.severity)
    ) {
      table.push(normalizeIssue(entry));
    }
  }
  return table;
}

/**
 * Decodes validator stdout
 * @throws {MalformedReportError} If the text is not valid JSON
 */
export function decodeReport(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new MalformedReportError(detail, { cause: error });
  }
}

/**
 * Decodes and flattens validator stdout in one step
 * @throws {MalformedReportError} If the text is not valid JSON
 */
export function parseValidatorOutput(text: string): IssueTable {
  return flattenReport(decodeReport(text));
}
