import { test } from "node:test";
import { assertEquals } from "../deps/asserts.ts";
import { ISSUE_FIELDS, normalizeIssue } from "./normalize.ts";

test("normalizeIssue", async (t) => {
  await t.test("fills every absent field with an empty string", () => {
    assertEquals(normalizeIssue({}), {
      code: "",
      severity: "",
      location: "",
      affects: "",
      rule: "",
    });
  });

  await t.test("joins affected files with a comma and a space", () => {
    assertEquals(normalizeIssue({ affects: ["a", "b", "c"] }).affects, "a, b, c");
  });

  await t.test("copies a complete issue", () => {
    const record = normalizeIssue({
      code: "NIFTI_HEADER_UNREADABLE",
      subCode: "sub-01_T1w.nii.gz",
      severity: "error",
      location: "/sub-01/anat/sub-01_T1w.nii.gz",
      affects: ["/sub-01/anat/sub-01_T1w.nii.gz"],
      rule: "rules.checks.nifti.NiftiHeaderReadable",
      issueMessage: "ignored",
    });
    assertEquals(record, {
      code: "NIFTI_HEADER_UNREADABLE",
      severity: "error",
      location: "/sub-01/anat/sub-01_T1w.nii.gz",
      affects: "/sub-01/anat/sub-01_T1w.nii.gz",
      rule: "rules.checks.nifti.NiftiHeaderReadable",
    });
  });

  await t.test("keeps the field order fixed", () => {
    const record = normalizeIssue({ rule: "r", affects: [], code: "c" });
    assertEquals(Object.keys(record), ["code", "severity", "location", "affects", "rule"]);
  });

  await t.test("treats mistyped fields as absent", () => {
    assertEquals(
      normalizeIssue({ code: 42, severity: null, location: ["x"], affects: "x.nii", rule: {} }),
      { code: "", severity: "", location: "", affects: "", rule: "" },
    );
  });

  await t.test("drops non-string affected entries", () => {
    assertEquals(normalizeIssue({ affects: ["a.nii", 3, null, "b.nii"] }).affects, "a.nii, b.nii");
  });

  await t.test("declares a default for every field", () => {
    assertEquals(ISSUE_FIELDS.code.fallback, "");
    assertEquals(ISSUE_FIELDS.affects.fallback, []);
    assertEquals(ISSUE_FIELDS.rule.read(undefined), undefined);
  });
});
