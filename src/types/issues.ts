/** One finding as reported by the external validator. Any field may be missing. */
export type RawIssue = Record<string, unknown>;

/** Fixed-shape row of the issue table */
export interface NormalizedIssueRecord {
  code: string;
  severity: string;
  location: string;
  /** Affected files, joined with ", " */
  affects: string;
  rule: string;
}

export type IssueTable = NormalizedIssueRecord[];

/** Issue row tagged with the subject whose one-subject run produced it */
export interface SubjectIssueRecord extends NormalizedIssueRecord {
  subject: string;
}

export interface FieldCatalogEntry {
  Description: string;
}

export type CatalogColumn = "location" | "code" | "subCode" | "severity" | "rule";

export type FieldCatalog = Record<CatalogColumn, FieldCatalogEntry>;
