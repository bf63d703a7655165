/**
 * Assertion helpers for the test suites, built on node:assert.
 */

import assert from "node:assert";

export { assert };

/**
 * Asserts that two values are deeply and strictly equal.
 */
export function assertEquals(actual: unknown, expected: unknown, msg?: string): void {
  assert.deepStrictEqual(actual, expected, msg);
}

/**
 * Asserts that a value is not null or undefined.
 */
export function assertExists<T>(actual: T, msg?: string): asserts actual is NonNullable<T> {
  assert(actual !== null && actual !== undefined, msg);
}

/**
 * Asserts that a condition is truthy.
 */
export function assertTrue(condition: unknown, msg?: string): asserts condition {
  assert(!!condition, msg || `Expected ${String(condition)} to be truthy`);
}

// Constructor of the expected error; never[] accepts any parameter list
type ErrorClass<E extends Error> = new (...args: never[]) => E;

/**
 * Asserts that a function throws an instance of `errorClass`.
 *
 * @param msgIncludes - Text the error message must contain
 * @returns The thrown error, for further checks
 */
export function assertThrows<E extends Error>(
  fn: () => unknown,
  errorClass: ErrorClass<E>,
  msgIncludes?: string,
): E {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  assert(
    caught instanceof errorClass,
    `Expected ${errorClass.name} to be thrown, got ${String(caught)}`,
  );
  if (msgIncludes) {
    assert(
      caught.message.includes(msgIncludes),
      `Expected error message to include "${msgIncludes}", got "${caught.message}"`,
    );
  }
  return caught;
}
