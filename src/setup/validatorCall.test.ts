import { test } from "node:test";
import { assertEquals } from "../deps/asserts.ts";
import { buildValidatorCall } from "./validatorCall.ts";

test("buildValidatorCall", async (t) => {
  await t.test("asks for verbose JSON output", () => {
    assertEquals(buildValidatorCall("/data/ds"), [
      "bids-validator",
      "/data/ds",
      "--verbose",
      "--json",
    ]);
  });

  await t.test("adds the NIfTI header flag when requested", () => {
    assertEquals(buildValidatorCall("/data/ds", { ignoreNiftiHeaders: true }), [
      "bids-validator",
      "/data/ds",
      "--verbose",
      "--json",
      "--ignoreNiftiHeaders",
    ]);
  });

  await t.test("uses the configured executable", () => {
    assertEquals(
      buildValidatorCall("/data/ds", { validator: "/opt/bin/bids-validator" })[0],
      "/opt/bin/bids-validator",
    );
  });
});
