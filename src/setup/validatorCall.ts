/** Executable used when none is configured */
export const DEFAULT_VALIDATOR = "bids-validator";

export interface ValidatorCallOptions {
  /** Skip NIfTI header checks in the validator */
  ignoreNiftiHeaders?: boolean;
  /** Validator executable */
  validator?: string;
}

/**
 * Argument vector for one validator run with JSON output
 *
 * @param datasetPath - Dataset directory to validate
 */
export function buildValidatorCall(
  datasetPath: string,
  options: ValidatorCallOptions = {},
): string[] {
  const command = [
    options.validator ?? DEFAULT_VALIDATOR,
    datasetPath,
    "--verbose",
    "--json",
  ];

  if (options.ignoreNiftiHeaders) {
    command.push("--ignoreNiftiHeaders");
  }

  return command;
}
