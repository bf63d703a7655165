/**
 * @fileoverview Splits a BIDS dataset into per-subject file lists.
 *
 * Paths are built by concatenation onto the dataset root with a trailing
 * separator. Hidden entries (leading ".") are never listed, and symbolic
 * links count as whatever they point to. Broken, looping or unreadable
 * entries are left out.
 */

import fs from "node:fs";
import path from "node:path";
import { NoSubjectsFoundError } from "../issues/errors.ts";
import type { SubjectManifest } from "../types/manifest.ts";
import { type Logger, silentLogger } from "../utils/logger.ts";

const SUBJECT_PREFIX = "sub-";

type EntryKind = "file" | "directory" | "other";

/**
 * Appends a path separator to the root when it has none
 */
export function withTrailingSeparator(root: string): string {
  return root.endsWith(path.sep) || root.endsWith("/") ? root : root + path.sep;
}

/** Pattern reported when no subject directory is found */
export function subjectSearchPath(root: string): string {
  return `${withTrailingSeparator(root)}${SUBJECT_PREFIX}*/`;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/** Errors after which an entry is treated as absent */
const UNREADABLE_CODES = new Set([
  "ENOENT",
  "ENOTDIR",
  "EACCES",
  "EPERM",
  "ELOOP",
  "ENAMETOOLONG",
]);

function isUnreadable(error: unknown): boolean {
  return isErrnoException(error) && error.code !== undefined &&
    UNREADABLE_CODES.has(error.code);
}

/**
 * Visible entry names of a directory in code-point order.
 * A missing or unreadable directory lists as empty.
 */
function listNames(dir: string): string[] {
  try {
    return fs.readdirSync(dir)
      .filter((name) => !name.startsWith("."))
      .sort();
  } catch (error) {
    if (isUnreadable(error)) {
      return [];
    }
    throw error;
  }
}

/** Kind of the entry a path leads to, following links */
function entryKind(entryPath: string): EntryKind {
  let stats: fs.Stats | undefined;
  try {
    stats = fs.statSync(entryPath, { throwIfNoEntry: false });
  } catch (error) {
    if (isUnreadable(error)) {
      return "other";
    }
    throw error;
  }
  if (!stats) {
    return "other";
  }
  if (stats.isFile()) {
    return "file";
  }
  return stats.isDirectory() ? "directory" : "other";
}

function resolvedPath(dir: string): string | undefined {
  try {
    return fs.realpathSync(dir);
  } catch (error) {
    if (isUnreadable(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Depth-first list of every file below a directory. Linked directories are
 * followed unless they resolve to a directory already being walked.
 * @param dir - Directory path ending with a separator
 * @param ancestors - Resolved paths of the directories above `dir`
 */
function collectFiles(
  dir: string,
  files: string[] = [],
  ancestors: Set<string> = new Set(),
): string[] {
  const real = resolvedPath(dir);
  if (real === undefined || ancestors.has(real)) {
    return files;
  }
  ancestors.add(real);
  for (const name of listNames(dir)) {
    const entryPath = dir + name;
    const kind = entryKind(entryPath);
    if (kind === "file") {
      files.push(entryPath);
    } else if (kind === "directory") {
      collectFiles(entryPath + path.sep, files, ancestors);
    }
  }
  ancestors.delete(real);
  return files;
}

/**
 * Files sitting directly under the dataset root
 */
export function listRootFiles(root: string): string[] {
  const base = withTrailingSeparator(root);
  return listNames(base)
    .map((name) => base + name)
    .filter((entryPath) => entryKind(entryPath) === "file");
}

/**
 * Labels of the `sub-*` directories directly under the dataset root
 */
export function listSubjectLabels(root: string): string[] {
  const base = withTrailingSeparator(root);
  return listNames(base).filter((name) =>
    name.startsWith(SUBJECT_PREFIX) && entryKind(base + name) === "directory"
  );
}

/**
 * Every file anywhere below the dataset root
 */
export function listDatasetFiles(root: string): string[] {
  return collectFiles(withTrailingSeparator(root));
}

/**
 * Builds one file list per subject. Each list holds the files below the
 * subject directory followed by the root-level files, so that every subject
 * can be validated as a dataset of its own.
 *
 * @param root - Dataset root directory
 * @param logger - Receives a debug line with the subject count
 * @returns Manifest keyed by subject label
 * @throws {NoSubjectsFoundError} If the root has no `sub-*` directory
 */
export function buildSubjectPaths(
  root: string,
  logger: Logger = silentLogger,
): SubjectManifest {
  const base = withTrailingSeparator(root);
  const rootFiles = listRootFiles(base);
  const subjects = listSubjectLabels(base);

  if (subjects.length < 1) {
    throw new NoSubjectsFoundError(subjectSearchPath(base));
  }

  const manifest: Record<string, string[]> = {};
  for (const subject of subjects) {
    const files = collectFiles(base + subject + path.sep);
    files.push(...rootFiles);
    manifest[subject] = files;
  }

  logger.debug(
    `Found ${subjects.length} subjects and ${rootFiles.length} root-level files in ${base}`,
  );
  return manifest;
}
