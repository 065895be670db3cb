import type { Delimiter } from '../../types';

/**
 * Shared test types for syntax suites.
 */

/**
 * Represents a single row of data in a table-driven test.
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
   * The Rust source text under test.
   */
  code: string;

  /**
   * The expected output from the function under test.
   */
  expected: T;
};

/**
 * Offset-free view of a token tree, compared with `toStrictEqual`.
 *
 * Leaves read `ident x`, `lifetime a`, `punct + alone`, `literal 1u8`;
 * groups keep their nesting.
 */
export type TokenShape = string | { group: Delimiter; stream: TokenShape[] };

/**
 * Expected diagnostic of a failed parse.
 */
export type ErrorShape = {
  reason: string;
  line: number;
  column: number;
};
