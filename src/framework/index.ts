/**
 * Test declaration surface
 *
 * Execution flow:
 * 1. Registration: test modules are imported; their top-level test() calls
 *    populate the default registry
 * 2. Execution: testMain() locks the registry and runs every test in name order
 *
 * Test files only need `test` and `check`; a single entry module imports the
 * test files and calls testMain():
 *
 *   import './parser.spec.js';
 *   import './lexer.spec.js';
 *   import { testMain } from 'plainunit';
 *
 *   testMain();
 */

import type { RunnerOptions, TestProcedure } from '../types.js';
import { runTests } from '../runner/index.js';
import { createTestRegistry } from './registry.js';

/**
 * Process-wide registry used by test() and testMain()
 */
export const defaultRegistry = createTestRegistry();

/**
 * Declare a test in the default registry
 *
 * @throws DuplicateTestError if another test already uses the name
 * @throws RegistryLockedError if testMain() has already started
 */
export function test(name: string, body: TestProcedure): void {
  defaultRegistry.register(name, body);
}

/**
 * Run every declared test and set the process exit code
 *
 * @returns The exit code (always 0)
 */
export function testMain(options: RunnerOptions = {}): number {
  const { exitCode } = runTests(defaultRegistry, options);
  process.exitCode = exitCode;
  return exitCode;
}
