import path from "node:path";
import { test } from "node:test";
import { assertEquals } from "../deps/asserts.ts";
import { makeDataset, removeDataset } from "../tests/datasets.ts";
import { Summary } from "./summary.ts";

test("Summary class", async (t) => {
  const root = makeDataset({
    "dataset_description.json": "{}",
    "sub-01/anat/sub-01_T1w.nii.gz": "12345",
  });
  t.after(() => removeDataset(root));

  await t.test("Constructor succeeds, format output", () => {
    assertEquals(new Summary().formatOutput(), {
      totalFiles: 0,
      size: 0,
      subjects: [],
      errors: 0,
      warnings: 0,
    });
  });

  await t.test("counts shared files once", () => {
    const summary = new Summary();
    const shared = path.join(root, "dataset_description.json");
    summary.addFiles([path.join(root, "sub-01", "anat", "sub-01_T1w.nii.gz"), shared]);
    summary.addFiles([shared]);
    summary.addFiles([path.join(root, "gone.json")]);
    assertEquals(summary.totalFiles, 3);
    assertEquals(summary.size, 7);
  });

  await t.test("counts errors, warnings and subjects", () => {
    const summary = new Summary();
    summary.addSubject("sub-01");
    summary.addSubject("sub-01");
    summary.addIssues([
      { code: "A", severity: "error", location: "", affects: "", rule: "" },
      { code: "B", severity: "warning", location: "", affects: "", rule: "" },
      { code: "C", severity: "error", location: "", affects: "", rule: "" },
    ]);
    assertEquals(summary.formatOutput(), {
      totalFiles: 0,
      size: 0,
      subjects: ["sub-01"],
      errors: 2,
      warnings: 1,
    });
  });
});
