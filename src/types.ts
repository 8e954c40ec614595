/**
 * Shared TypeScript types and interfaces
 *
 * This file contains the type definitions used across the plainunit codebase.
 * Types are organized into logical sections for better maintainability.
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Absolute tolerance used by almost-equal assertions
 */
export const ALMOST_EQUAL_TOLERANCE = 0.0001;

/**
 * Message recorded for thrown values that are not Error instances
 */
export const UNRECOGNIZED_FAILURE_MESSAGE = 'Totally unknown error was thrown!';

// ============================================================================
// Registration
// ============================================================================

/**
 * Body of a test: takes nothing, returns nothing, reports failure by throwing
 */
export type TestProcedure = () => void;

/**
 * A single registered test
 */
export interface TestEntry {
  /** Test name (unique within a registry) */
  readonly name: string;
  /** Test body */
  readonly procedure: TestProcedure;
}

/**
 * Values that define their own equality for assertEqual / assertUnequal
 */
export interface Equatable<T = unknown> {
  equals(other: T): boolean;
}

// ============================================================================
// Configuration & Options
// ============================================================================

/**
 * Anything the report can be written to (process.stdout, a buffer in tests)
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * Runner configuration options
 */
export interface RunnerOptions {
  /**
   * Where the report goes
   *
   * @default process.stdout
   */
  output?: OutputSink;
  /** Enable verbose debug logging (written to stderr) */
  debug?: boolean;
  /** Enable per-test and whole-run timing logs */
  debugTiming?: boolean;
}

/**
 * Runner options with every default filled in
 */
export interface ResolvedRunnerOptions {
  output: OutputSink;
  debug: boolean;
  debugTiming: boolean;
}

/**
 * Phase timings for a single test or for the whole run
 */
export interface PhaseTimings {
  /** Phase start time */
  phaseStart: number;
  /** Phase end time */
  phaseEnd: number;
}

// ============================================================================
// Test Execution & Results
// ============================================================================

/**
 * How a test finished:
 * - 'pass': nothing was thrown
 * - 'fail': an assertion threw a FailureSignal
 * - 'exception': some other Error was thrown
 * - 'unrecognized': a value that is not an Error was thrown
 */
export type TestOutcome = 'pass' | 'fail' | 'exception' | 'unrecognized';

/**
 * Failure line of the final report
 */
export interface FailureRecord {
  /** Name of the test that did not pass */
  testName: string;
  /** Rendered failure message (may contain escape codes) */
  message: string;
}

/**
 * Result of a single test execution
 */
export interface TestResult {
  /** Test name */
  name: string;
  /** Classified outcome */
  outcome: TestOutcome;
  /** Failure message, absent when the test passed */
  message?: string;
  /** Execution time in milliseconds */
  duration: number;
}

/**
 * Everything a run produced
 */
export interface RunReport {
  /** Number of tests that passed */
  passed: number;
  /** Number of tests that ran */
  total: number;
  /** One record per non-passing test, in execution order */
  failures: FailureRecord[];
  /** One result per test, in execution order */
  results: TestResult[];
  /** Process exit code for this run (always 0, failures are reported as text) */
  exitCode: number;
}
