import { test } from "node:test";
import { assertEquals, assertThrows, assertTrue } from "../deps/asserts.ts";
import { MalformedReportError } from "./errors.ts";
import { decodeReport, flattenReport, parseValidatorOutput } from "./flatten.ts";

const report = (issues: unknown) => ({
  issues: { issues, codeMessages: {} },
  summary: { subjects: ["01"] },
});

test("flattenReport", async (t) => {
  await t.test("keeps errors and warnings in report order", () => {
    const table = flattenReport(report([
      { code: "A", severity: "error", location: "/a" },
      { code: "B", severity: "warning", location: "/b" },
      { code: "C", severity: "info", location: "/c" },
      { code: "D", severity: "error", location: "/d" },
    ]));
    assertEquals(table.length, 3);
    assertEquals(table.map((row) => row.code), ["A", "B", "D"]);
  });

  await t.test("normalizes each kept issue", () => {
    assertEquals(
      flattenReport(report([
        { code: "JSON_KEY_RECOMMENDED", severity: "warning", affects: ["x.json", "y.json"] },
      ])),
      [{
        code: "JSON_KEY_RECOMMENDED",
        severity: "warning",
        location: "",
        affects: "x.json, y.json",
        rule: "",
      }],
    );
  });

  await t.test("matches severity exactly", () => {
    assertEquals(
      flattenReport(report([
        { code: "A", severity: "Error" },
        { code: "B", severity: "errors" },
        { code: "C" },
      ])),
      [],
    );
  });

  await t.test("skips entries that are not mappings", () => {
    const table = flattenReport(report([null, "error", ["error"], { code: "A", severity: "error" }]));
    assertEquals(table.map((row) => row.code), ["A"]);
  });

  await t.test("yields an empty table for missing or mistyped levels", () => {
    assertEquals(flattenReport({}), []);
    assertEquals(flattenReport({ issues: {} }), []);
    assertEquals(flattenReport({ issues: [] }), []);
    assertEquals(flattenReport({ issues: { issues: "none" } }), []);
    assertEquals(flattenReport(null), []);
    assertEquals(flattenReport([1, 2]), []);
  });
});

test("parseValidatorOutput", async (t) => {
  await t.test("decodes and flattens JSON text", () => {
    const text = JSON.stringify(report([{ code: "EMPTY_FILE", severity: "error", location: "/sub-01/x" }]));
    assertEquals(parseValidatorOutput(text), [{
      code: "EMPTY_FILE",
      severity: "error",
      location: "/sub-01/x",
      affects: "",
      rule: "",
    }]);
  });

  await t.test("returns an empty table for a report without issues", () => {
    assertEquals(parseValidatorOutput("{}"), []);
  });

  await t.test("throws MalformedReportError for truncated JSON", () => {
    const error = assertThrows(
      () => parseValidatorOutput('{"issues": {"issues": [{"code": "EMP'),
      MalformedReportError,
      "Validator output is not valid JSON",
    );
    assertTrue(error.cause instanceof SyntaxError);
  });

  await t.test("throws MalformedReportError for empty output", () => {
    assertThrows(() => decodeReport(""), MalformedReportError);
  });
});
