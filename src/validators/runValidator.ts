import { spawnSync } from "node:child_process";
import { ValidatorExecutionError } from "../issues/errors.ts";

/** Captured output of one validator process */
export interface ValidatorRun {
  stdout: string;
  stderr: string;
  /** Exit status, null when the process was killed by a signal */
  status: number | null;
}

export type ValidatorRunner = (call: readonly string[]) => ValidatorRun;

// Reports on large datasets run to hundreds of megabytes
const MAX_OUTPUT_BYTES = 512 * 1024 * 1024;

/**
 * Runs the validator and waits for it to exit. A non-zero exit status is
 * returned, not thrown: the validator exits non-zero whenever it finds errors.
 *
 * @param call - Executable followed by its arguments
 * @throws {ValidatorExecutionError} If the process cannot be started
 */
export const runValidator: ValidatorRunner = (call) => {
  if (call.length === 0) {
    throw new ValidatorExecutionError("", "Validator call is empty");
  }
  const [command, ...args] = call;

  const ret = spawnSync(command, args, {
    encoding: "utf-8",
    maxBuffer: MAX_OUTPUT_BYTES,
  });
  if (ret.error) {
    throw new ValidatorExecutionError(
      command,
      `Could not run ${command}: ${ret.error.message}`,
      { cause: ret.error },
    );
  }

  return { stdout: ret.stdout, stderr: ret.stderr, status: ret.status };
};
