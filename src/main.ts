import { EventEmitter } from "node:events";
import path from "node:path";
import process from "node:process";
import { CommanderError } from "commander";
import { writeValidationFiles } from "./files/tsv.ts";
import { parseOptions, type ValidatorOptions } from "./setup/options.ts";
import { createLogger } from "./utils/logger.ts";
import { consoleFormat } from "./utils/output.ts";
import { SubjectProgressTracker } from "./utils/progressTracker.ts";
import { validate } from "./validators/bids.ts";
import { runValidator, type ValidatorRunner } from "./validators/runValidator.ts";

/*
 * Command-line entry point. Parses arguments, runs the validator on the
 * dataset (or on each subject), writes the TSV and data dictionary when an
 * output prefix is given, and prints either JSON or formatted text.
 *
 * Failures are logged and reported through process.exitCode.
 */
export async function run(
  args: string[] = process.argv.slice(2),
  runner: ValidatorRunner = runValidator,
): Promise<void> {
  let options: ValidatorOptions;
  try {
    options = parseOptions(args);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    throw error;
  }

  const logger = createLogger({ level: options.debug });
  const datasetPath = path.resolve(options.datasetPath);

  try {
    const emitter = new EventEmitter();
    const tracker = options.useEvents
      ? new SubjectProgressTracker(emitter, logger)
      : null;

    const result = validate(datasetPath, {
      sequential: options.sequential,
      sequentialSubjects: options.sequentialSubjects,
      ignoreNiftiHeaders: options.ignoreNiftiHeaders,
      validator: options.validator,
      logger,
      emitter,
    }, runner);
    await tracker?.waitForCompletion();

    if (result.issues.length === 0) {
      logger.info("No issues/warnings parsed, your dataset is BIDS valid.");
    } else {
      logger.info("BIDS issues/warnings found in the dataset");
      if (options.outputPrefix) {
        const written = await writeValidationFiles(result, options.outputPrefix);
        logger.info(`Wrote ${written.tsvPath} and ${written.jsonPath}`);
      }
    }

    if (options.json) {
      console.log(JSON.stringify(result));
    } else {
      console.log(
        consoleFormat(result, {
          verbose: options.verbose ?? false,
          showWarnings: options.showWarnings ?? false,
        }),
      );
    }
  } catch (error) {
    logger.error(
      `Validation of ${datasetPath} failed: ${error instanceof Error ? error.message : String(error)}`,
    );
    process.exitCode = 1;
  }
}
