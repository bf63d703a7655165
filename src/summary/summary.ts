/**
 * @fileoverview Collects summary counters for a validation run: files and
 * bytes handed to the validator, subjects seen, and retained issues.
 */

import fs from "node:fs";
import type { IssueTable } from "../types/issues.ts";
import type { SummaryOutput } from "../types/validation-result.ts";

export class Summary {
  /** Paths already counted; root-level files are shared between subjects */
  #seen: Set<string>;

  /** Number of distinct files validated */
  totalFiles: number;

  /** Total size of those files in bytes */
  size: number;

  /** Subjects validated one by one */
  subjects: Set<string>;

  errors: number;
  warnings: number;

  constructor() {
    this.#seen = new Set();
    this.totalFiles = 0;
    this.size = 0;
    this.subjects = new Set();
    this.errors = 0;
    this.warnings = 0;
  }

  /**
   * Counts files not seen before. Files that vanished since listing are
   * counted with size 0.
   */
  addFiles(files: readonly string[]): void {
    for (const file of files) {
      if (this.#seen.has(file)) {
        continue;
      }
      this.#seen.add(file);
      this.totalFiles++;
      this.size += fs.statSync(file, { throwIfNoEntry: false })?.size ?? 0;
    }
  }

  addSubject(label: string): void {
    this.subjects.add(label);
  }

  addIssues(table: IssueTable): void {
    for (const row of table) {
      if (row.severity === "error") {
        this.errors++;
      } else if (row.severity === "warning") {
        this.warnings++;
      }
    }
  }

  formatOutput(): SummaryOutput {
    return {
      totalFiles: this.totalFiles,
      size: this.size,
      subjects: Array.from(this.subjects),
      errors: this.errors,
      warnings: this.warnings,
    };
  }
}
