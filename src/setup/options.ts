/**
 * @fileoverview Handles command-line argument parsing and configuration options
 * for the validator wrapper.
 */

import { Command, Option } from "commander";
import { type LevelName, LogLevels } from "../utils/logger.ts";
import { DEFAULT_VALIDATOR } from "./validatorCall.ts";

/**
 * Configuration options for a validation run
 */
export type ValidatorOptions = {
  /** Path to the dataset directory to validate */
  datasetPath: string;

  /** Prefix for the `_validation.tsv` and `_validation.json` outputs */
  outputPrefix?: string;

  /** Whether to validate each subject as a dataset of its own */
  sequential?: boolean;

  /** Subjects to restrict a sequential run to */
  sequentialSubjects?: string[];

  /** Whether to skip NIfTI header checks */
  ignoreNiftiHeaders?: boolean;

  /** Validator executable */
  validator: string;

  /** Whether to output in JSON format for machine readability */
  json?: boolean;

  /** Whether to list every affected location */
  verbose?: boolean;

  /** Whether to include warnings in addition to errors */
  showWarnings?: boolean;

  /** Whether to print per-subject progress */
  useEvents?: boolean;

  /** Log level for debug output */
  debug: LevelName;
};

/** Flags as commander reports them */
type CliFlags = {
  sequential?: boolean;
  sequentialSubjects?: string[];
  ignoreNiftiHeaders?: boolean;
  validator: string;
  json?: boolean;
  verbose?: boolean;
  showWarnings?: boolean;
  useEvents?: boolean;
  debug: LevelName;
};

/**
 * Parses command line arguments into validator configuration.
 * Invalid arguments throw a `CommanderError` instead of exiting the process.
 *
 * @param args - Arguments without the node and script entries
 */
export function parseOptions(args: string[]): ValidatorOptions {
  const program = new Command();

  program
    .name("bids-subject-validate")
    .description(
      "Runs the BIDS validator on a dataset, optionally one subject at a time, and tabulates its errors and warnings.",
    )
    .argument("<bids_dir>", "Path to the BIDS dataset directory")
    .argument(
      "[output_prefix]",
      "Prefix for the _validation.tsv and _validation.json outputs",
    )
    .version("0.1.0")
    .exitOverride()
    .option("--sequential", "Validate each subject as a dataset of its own")
    .option(
      "--sequentialSubjects <labels...>",
      "Only validate these subjects in a sequential run (e.g. sub-01 sub-02)",
    )
    .option("--ignoreNiftiHeaders", "Skip NIfTI header checks in the validator")
    .option(
      "--validator <command>",
      "Validator executable",
      DEFAULT_VALIDATOR,
    )
    .option("--json", "Output machine readable JSON")
    .option("-v, --verbose", "List every location affected by an issue")
    .option("-w, --showWarnings", "Include warnings in addition to errors")
    .option("--useEvents", "Display validation progress per subject")
    .addOption(
      new Option("--debug <level>", "Enable debug output")
        .choices(Object.values(LogLevels))
        .default(LogLevels.ERROR),
    );

  program.parse(args, { from: "user" });

  const options = program.opts<CliFlags>();
  const [datasetPath, outputPrefix] = program.args;

  return {
    datasetPath,
    outputPrefix,
    sequential: options.sequential,
    sequentialSubjects: options.sequentialSubjects,
    ignoreNiftiHeaders: options.ignoreNiftiHeaders,
    validator: options.validator,
    json: options.json,
    verbose: options.verbose,
    showWarnings: options.showWarnings,
    useEvents: options.useEvents,
    debug: options.debug,
  };
}
