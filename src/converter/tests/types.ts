/**
 * Shared test types for converter suites.
 */

/**
 * Represents a single row of data in a table-driven conversion test.
 *
 * @template T - The type of the expected result (defaults to unknown).
 */
export type TestScenario<T = unknown> = {
  /**
   * A short, unique identifier for the scenario.
   */
  id: string;

  /**
   * A human-readable explanation of the test logic and expected behavior.
   */
  description: string;

  /**
   * The Rust expression to parse and convert.
   */
  code: string;

  /**
   * The expected output from the function under test.
   */
  expected: T;
};
