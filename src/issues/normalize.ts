/**
 * @fileoverview Shapes one raw validator issue into a fixed five-field record.
 * The defaults for missing or mistyped fields are declared once, per field,
 * in `ISSUE_FIELDS`.
 */

import type { NormalizedIssueRecord, RawIssue } from "../types/issues.ts";

/**
 * How one field is read from a raw issue
 */
export interface FieldRule<T> {
  /** Value used when the field is absent or has an unexpected shape */
  fallback: T;
  /** Returns the field's value, or undefined when it cannot be used */
  read: (value: unknown) => T | undefined;
}

interface IssueFieldRules {
  code: FieldRule<string>;
  severity: FieldRule<string>;
  location: FieldRule<string>;
  affects: FieldRule<readonly string[]>;
  rule: FieldRule<string>;
}

const readText = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

const readTextList = (value: unknown): string[] | undefined =>
  Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : undefined;

export const ISSUE_FIELDS: IssueFieldRules = {
  code: { fallback: "", read: readText },
  severity: { fallback: "", read: readText },
  location: { fallback: "", read: readText },
  affects: { fallback: [], read: readTextList },
  rule: { fallback: "", read: readText },
};

/** Separator used to join the affected files into one cell */
export const AFFECTS_SEPARATOR = ", ";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readField<T>(raw: RawIssue, key: keyof IssueFieldRules, rule: FieldRule<T>): T {
  return rule.read(raw[key]) ?? rule.fallback;
}

/**
 * Converts one raw issue into a normalized record. Never throws.
 *
 * @param raw - Issue mapping as decoded from the validator report
 */
export function normalizeIssue(raw: RawIssue): NormalizedIssueRecord {
  return {
    code: readField(raw, "code", ISSUE_FIELDS.code),
    severity: readField(raw, "severity", ISSUE_FIELDS.severity),
    location: readField(raw, "location", ISSUE_FIELDS.location),
    affects: readField(raw, "affects", ISSUE_FIELDS.affects).join(AFFECTS_SEPARATOR),
    rule: readField(raw, "rule", ISSUE_FIELDS.rule),
  };
}
