/**
 * plainunit
 *
 * Self-registering unit tests, a sequential runner and a colorized pass/fail report
 *
 * Package entry point - exports the declaration surface, assertions and runner
 */

export { test, testMain, defaultRegistry } from './framework/index.js';
export { check, describeCall } from './framework/check.js';
export {
  assertTrue,
  assertFalse,
  assertEqual,
  assertUnequal,
  assertAlmostEqual,
  assertException,
  assertNoException,
} from './framework/assertions.js';
export { FailureSignal, renderFailure, isFailureSignal } from './framework/failure.js';
export { createTestRegistry, DuplicateTestError, RegistryLockedError } from './framework/registry.js';
export type { TestRegistry } from './framework/registry.js';
export { runTests, RUN_EXIT_CODE } from './runner/index.js';
export { createConsoleReporter } from './reporter/console-reporter.js';
export type { Reporter } from './reporter/console-reporter.js';
export { ansi, stripAnsi, StyleCode } from './utils/ansi.js';
export type { StyleCodeList } from './utils/ansi.js';
export { ALMOST_EQUAL_TOLERANCE, UNRECOGNIZED_FAILURE_MESSAGE } from './types.js';
export type {
  Equatable,
  FailureRecord,
  OutputSink,
  RunReport,
  RunnerOptions,
  TestEntry,
  TestOutcome,
  TestProcedure,
  TestResult,
} from './types.js';
