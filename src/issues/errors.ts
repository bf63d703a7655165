/**
 * @fileoverview Errors raised while partitioning a dataset, running the
 * external validator, or decoding its report.
 */

/**
 * Thrown when a dataset root holds no subject directories
 */
export class NoSubjectsFoundError extends Error {
  /** Pattern that was searched, e.g. "/data/ds000001/sub-*\/" */
  readonly searchPath: string;

  constructor(searchPath: string) {
    super(`Couldn't find any subjects in the specified directory:\n${searchPath}`);
    this.name = "NoSubjectsFoundError";
    this.searchPath = searchPath;
  }
}

/**
 * Thrown when the validator's stdout cannot be decoded as JSON.
 * The decoding error is kept as `cause`.
 */
export class MalformedReportError extends Error {
  constructor(detail: string, options?: ErrorOptions) {
    super(`Validator output is not valid JSON: ${detail}`, options);
    this.name = "MalformedReportError";
  }
}

/**
 * Thrown when the validator executable could not be started at all.
 * A validator that starts and exits non-zero does not raise this.
 */
export class ValidatorExecutionError extends Error {
  readonly command: string;

  constructor(command: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidatorExecutionError";
    this.command = command;
  }
}
