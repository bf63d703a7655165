import { test } from "node:test";
import { assertEquals, assertTrue } from "../deps/asserts.ts";
import { describeColumn, getFieldCatalog } from "./fieldCatalog.ts";
import { ISSUE_TABLE_COLUMNS } from "./flatten.ts";

test("field catalog", async (t) => {
  await t.test("describes the issue columns", () => {
    assertEquals(getFieldCatalog(), {
      location: { Description: "File with the validation issue." },
      code: { Description: "Code of the validation issue." },
      subCode: { Description: "Subcode providing additional issue details." },
      severity: { Description: "Severity of the issue (e.g., warning, error)." },
      rule: { Description: "Validation rule that triggered the issue." },
    });
  });

  await t.test("resolves every table column except affects", () => {
    for (const column of ISSUE_TABLE_COLUMNS) {
      const description = describeColumn(column);
      if (column === "affects") {
        assertEquals(description, undefined);
      } else {
        assertTrue(description && description.length > 0, `${column} has no description`);
      }
    }
  });

  await t.test("keeps subCode although no table column carries it", () => {
    assertEquals(describeColumn("subCode"), "Subcode providing additional issue details.");
    const columns: readonly string[] = ISSUE_TABLE_COLUMNS;
    assertEquals(columns.includes("subCode"), false);
  });

  await t.test("returns a fresh copy on each call", () => {
    const first = getFieldCatalog();
    first.code.Description = "changed";
    assertEquals(getFieldCatalog().code.Description, "Code of the validation issue.");
  });

  await t.test("does not describe unknown or inherited names", () => {
    assertEquals(describeColumn("subject"), undefined);
    assertEquals(describeColumn("toString"), undefined);
  });
});
