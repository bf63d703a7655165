/**
 * @fileoverview Runs the external BIDS validator over a dataset, either once
 * for the whole dataset or once per subject, and collects the issue tables.
 */

import type { EventEmitter } from "node:events";
import { materializeSubject, withTemporaryDataset } from "../files/materialize.ts";
import {
  buildSubjectPaths,
  listDatasetFiles,
  listSubjectLabels,
  subjectSearchPath,
} from "../files/partition.ts";
import { NoSubjectsFoundError } from "../issues/errors.ts";
import { parseValidatorOutput } from "../issues/flatten.ts";
import { buildValidatorCall, type ValidatorCallOptions } from "../setup/validatorCall.ts";
import { Summary } from "../summary/summary.ts";
import type { IssueTable } from "../types/issues.ts";
import type { SubjectManifest } from "../types/manifest.ts";
import type { ValidationResult } from "../types/validation-result.ts";
import { emitEvent } from "../utils/events.ts";
import { type Logger, silentLogger } from "../utils/logger.ts";
import { runValidator, type ValidatorRunner } from "./runValidator.ts";

export interface ValidateOptions extends ValidatorCallOptions {
  /** Validate every subject as a one-subject dataset */
  sequential?: boolean;
  /** Restricts a sequential run to these subject labels */
  sequentialSubjects?: string[];
  logger?: Logger;
  emitter?: EventEmitter;
}

/**
 * Runs the validator on one directory and parses its stdout
 */
function runAndParse(
  target: string,
  options: ValidateOptions,
  runner: ValidatorRunner,
  logger: Logger,
): IssueTable {
  const call = buildValidatorCall(target, options);
  logger.debug(`Running the validator with call: "${call.join(" ")}"`);

  const { stdout, stderr, status } = runner(call);
  logger.debug(`Validator exited with status ${status}`);
  if (stderr.trim().length > 0) {
    logger.warn(`Validator stderr: ${stderr.trim()}`);
  }

  return parseValidatorOutput(stdout);
}

/**
 * Keeps the requested subjects of a manifest
 * @throws {NoSubjectsFoundError} If none of the requested subjects exist
 */
function selectSubjects(
  manifest: SubjectManifest,
  requested: string[] | undefined,
  root: string,
  logger: Logger,
): [string, readonly string[]][] {
  const entries = Object.entries(manifest).sort(([a], [b]) => a < b ? -1 : a > b ? 1 : 0);
  if (!requested || requested.length === 0) {
    return entries;
  }

  for (const label of requested) {
    if (!Object.hasOwn(manifest, label)) {
      logger.warn(`Subject ${label} was requested but not found; skipping`);
    }
  }
  const selected = entries.filter(([label]) => requested.includes(label));
  if (selected.length === 0) {
    throw new NoSubjectsFoundError(subjectSearchPath(root));
  }
  return selected;
}

function validateDataset(
  root: string,
  options: ValidateOptions,
  runner: ValidatorRunner,
  logger: Logger,
  summary: Summary,
): IssueTable {
  const subjects = listSubjectLabels(root);
  emitEvent(options.emitter, "start", { sequential: false, subjects });
  const table = runAndParse(root, options, runner, logger);
  summary.addFiles(listDatasetFiles(root));
  subjects.forEach((label) => summary.addSubject(label));
  summary.addIssues(table);
  return table;
}

function validateSequential(
  root: string,
  options: ValidateOptions,
  runner: ValidatorRunner,
  logger: Logger,
  summary: Summary,
): Record<string, IssueTable> {
  const subjects = selectSubjects(
    buildSubjectPaths(root, logger),
    options.sequentialSubjects,
    root,
    logger,
  );
  emitEvent(options.emitter, "start", {
    sequential: true,
    subjects: subjects.map(([label]) => label),
  });

  const subjectIssues: Record<string, IssueTable> = {};
  for (const [subject, files] of subjects) {
    emitEvent(options.emitter, "subject-start", { subject, files: files.length });
    logger.info(`Validating ${subject}`);

    const table = withTemporaryDataset((dir) => {
      materializeSubject(root, files, dir);
      return runAndParse(dir, options, runner, logger);
    });

    subjectIssues[subject] = table;
    summary.addSubject(subject);
    summary.addFiles(files);
    summary.addIssues(table);
    emitEvent(options.emitter, "subject-complete", {
      subject,
      issues: table.length,
    });
  }
  return subjectIssues;
}

/**
 * Validates a dataset with the external validator
 *
 * @param datasetPath - Dataset root
 * @param options - Run mode, validator call options, logger and emitter
 * @param runner - Runs the validator process; replaced in tests
 * @returns Issue table, per-subject tables for sequential runs, and summary
 * @throws {NoSubjectsFoundError} Sequential run on a dataset without subjects
 * @throws {MalformedReportError} Validator output is not JSON
 * @throws {ValidatorExecutionError} Validator could not be started
 */
export function validate(
  datasetPath: string,
  options: ValidateOptions = {},
  runner: ValidatorRunner = runValidator,
): ValidationResult {
  const logger = options.logger ?? silentLogger;
  const summary = new Summary();

  let issues: IssueTable;
  let subjectIssues: Record<string, IssueTable> | undefined;
  if (options.sequential) {
    subjectIssues = validateSequential(datasetPath, options, runner, logger, summary);
    issues = Object.values(subjectIssues).flat();
  } else {
    issues = validateDataset(datasetPath, options, runner, logger, summary);
  }

  const valid = !issues.some((row) => row.severity === "error");
  emitEvent(options.emitter, "complete", { valid, issues: issues.length });

  const result: ValidationResult = {
    valid,
    issues,
    summary: summary.formatOutput(),
  };
  if (subjectIssues) {
    result.subjectIssues = subjectIssues;
  }
  return result;
}
