import type { CatalogColumn, FieldCatalog } from "../types/issues.ts";

// subCode has no column in the issue table; it documents the validator's richer schema.
const FIELD_CATALOG: FieldCatalog = {
  location: { Description: "File with the validation issue." },
  code: { Description: "Code of the validation issue." },
  subCode: { Description: "Subcode providing additional issue details." },
  severity: { Description: "Severity of the issue (e.g., warning, error)." },
  rule: { Description: "Validation rule that triggered the issue." },
};

/**
 * Data dictionary for the issue table, as written to the JSON side-car
 * @returns A fresh copy on every call
 */
export function getFieldCatalog(): FieldCatalog {
  return structuredClone(FIELD_CATALOG);
}

function isCatalogColumn(column: string): column is CatalogColumn {
  return Object.hasOwn(FIELD_CATALOG, column);
}

/** Description of a column, or undefined when the catalog has none */
export function describeColumn(column: string): string | undefined {
  return isCatalogColumn(column) ? FIELD_CATALOG[column].Description : undefined;
}
