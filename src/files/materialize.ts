/**
 * @fileoverview Lays out one subject's files as a dataset of its own in a
 * temporary directory, for sequential validation.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const TEMP_PREFIX = "bids-subject-";

/**
 * Copies files into `destination`, keeping their paths relative to the
 * dataset root. Files outside the root land at the top of `destination`.
 *
 * @returns Number of files copied
 */
export function materializeSubject(
  root: string,
  files: readonly string[],
  destination: string,
): number {
  for (const file of files) {
    const relative = path.relative(root, file);
    const target = relative.startsWith("..") || path.isAbsolute(relative)
      ? path.join(destination, path.basename(file))
      : path.join(destination, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.copyFileSync(file, target);
  }
  return files.length;
}

/**
 * Runs `fn` with a fresh temporary directory and removes the directory
 * afterwards, also when `fn` throws.
 */
export function withTemporaryDataset<T>(fn: (dir: string) => T): T {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), TEMP_PREFIX));
  try {
    return fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
