import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { assertEquals, assertThrows } from "../deps/asserts.ts";
import { makeDataset, removeDataset, TWO_SUBJECTS } from "../tests/datasets.ts";
import { materializeSubject, withTemporaryDataset } from "./materialize.ts";
import { buildSubjectPaths, listDatasetFiles } from "./partition.ts";

test("subject materialization", async (t) => {
  const root = makeDataset(TWO_SUBJECTS);
  t.after(() => removeDataset(root));

  await t.test("lays out one subject as a dataset", () => {
    const files = buildSubjectPaths(root)["sub-01"];
    withTemporaryDataset((dir) => {
      assertEquals(materializeSubject(root, files, dir), 4);
      assertEquals(listDatasetFiles(dir).map((file) => path.relative(dir, file)), [
        "dataset_description.json",
        "participants.tsv",
        path.join("sub-01", "anat", "sub-01_T1w.nii.gz"),
        path.join("sub-01", "func", "sub-01_task-rest_bold.nii.gz"),
      ]);
      assertEquals(
        fs.readFileSync(path.join(dir, "sub-01", "func", "sub-01_task-rest_bold.nii.gz"), "utf-8"),
        "bold",
      );
    });
  });

  await t.test("puts files from outside the root at the top", () => {
    const outside = makeDataset({ "extra/README": "readme" });
    t.after(() => removeDataset(outside));
    withTemporaryDataset((dir) => {
      materializeSubject(root, [path.join(outside, "extra", "README")], dir);
      assertEquals(fs.readFileSync(path.join(dir, "README"), "utf-8"), "readme");
    });
  });

  await t.test("removes the temporary directory afterwards", () => {
    const dir = withTemporaryDataset((created) => created);
    assertEquals(path.dirname(dir), os.tmpdir());
    assertEquals(fs.existsSync(dir), false);
  });

  await t.test("removes the temporary directory when the callback throws", () => {
    let created = "";
    assertThrows(
      () =>
        withTemporaryDataset((dir) => {
          created = dir;
          throw new Error("validator failed");
        }),
      Error,
      "validator failed",
    );
    assertEquals(fs.existsSync(created), false);
  });
});
