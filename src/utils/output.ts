/**
 * @fileoverview Handles formatting and display of validation results in the
 * terminal, with coloured issue lines and a summary table.
 */

import chalk from "chalk";
import Table from "cli-table3";
import type { IssueTable } from "../types/issues.ts";
import type { SummaryOutput, ValidationResult } from "../types/validation-result.ts";

type Chalk = InstanceType<typeof chalk.Instance>;

/** Configuration options for output formatting */
export interface LoggingOptions {
  /** List every location instead of the first few */
  verbose: boolean;
  showWarnings: boolean;
  /** Colour the output; follows terminal support when unset */
  color?: boolean;
}

/** Locations listed per issue unless verbose */
const LOCATIONS_SHOWN = 3;

/** Rows sharing a severity and code, with the locations they report */
interface IssueGroup {
  severity: string;
  code: string;
  rule: string;
  locations: string[];
}

/**
 * Converts bytes to human-readable format
 * @returns Formatted string with appropriate unit (B, KB, MB, etc.)
 */
export function prettyBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB"];
  if (bytes === 0) return "0 B";
  const i = Math.floor(Math.log(bytes) / Math.log(1024));
  return parseFloat((bytes / Math.pow(1024, i)).toFixed(2)) + " " + units[i];
}

/**
 * Groups table rows by severity and code, in order of first appearance
 */
export function groupIssues(table: IssueTable): IssueGroup[] {
  const groups = new Map<string, IssueGroup>();
  for (const row of table) {
    const key = `${row.severity}\u0000${row.code}`;
    let group = groups.get(key);
    if (!group) {
      group = { severity: row.severity, code: row.code, rule: row.rule, locations: [] };
      groups.set(key, group);
    }
    const location = row.location || row.affects;
    if (location) {
      group.locations.push(location);
    }
  }
  return [...groups.values()];
}

function formatIssue(
  group: IssueGroup,
  options: LoggingOptions | undefined,
  paint: Chalk,
): string {
  const color = group.severity === "error" ? paint.red : paint.yellow;
  const output = [];
  output.push(
    "\t" +
      color(
        `[${group.severity.toUpperCase()}] ${group.code}` +
          (group.rule ? ` (${group.rule})` : ""),
      ),
  );
  output.push("");

  const shown = options?.verbose
    ? group.locations
    : group.locations.slice(0, LOCATIONS_SHOWN);
  shown.forEach((location) => output.push("\t\t" + location));

  const hidden = group.locations.length - shown.length;
  if (hidden > 0) {
    output.push("");
    output.push(`\t\t${hidden} more files with the same issue`);
  }
  output.push("");

  return output.join("\n");
}

function formatSummary(summary: SummaryOutput, paint: Chalk): string {
  const table = new Table({ style: { head: [], border: [] } });

  table.push([
    paint.magenta("Summary:"),
    `${summary.totalFiles} Files, ${prettyBytes(summary.size)}`,
  ]);
  if (summary.subjects.length > 0) {
    table.push(["", `${summary.subjects.length} Subjects`]);
  }
  table.push(["", `${summary.errors} Errors, ${summary.warnings} Warnings`]);

  return table.toString();
}

/**
 * Formats a validation result for the terminal
 */
export function consoleFormat(
  result: ValidationResult,
  options?: LoggingOptions,
): string {
  const paint = new chalk.Instance({
    level: options?.color === false ? 0 : chalk.level,
  });
  const groups = groupIssues(result.issues);
  const errors = groups.filter((group) => group.severity === "error");
  const warnings = groups.filter((group) => group.severity === "warning");

  const banner = errors.length === 0
    ? "This dataset appears to be BIDS valid"
    : "This dataset does not appear to be BIDS valid";
  const stars = "*".repeat(banner.length);
  const color = errors.length === 0 ? paint.green : paint.red;

  const output = [];
  output.push(color(`\t${stars}\n\t${banner}\n\t${stars}\n`));
  errors.forEach((group) => output.push(formatIssue(group, options, paint)));
  if (options?.showWarnings) {
    warnings.forEach((group) => output.push(formatIssue(group, options, paint)));
  }

  output.push("");
  output.push(formatSummary(result.summary, paint));
  output.push("");

  return output.join("\n");
}
