/**
 * Test Executor - Per-Test Execution
 *
 * Runs one test body inside its own failure boundary. Nothing a test throws
 * escapes this module; it comes back as a classified TestResult instead.
 */

import type { TestEntry, TestResult } from '../types.js';
import { debug, debugError, debugTiming } from '../utils/debug.js';
import { createPhaseTimings, endPhase } from '../utils/timing.js';
import { classifyThrown } from './errors.js';

/**
 * Message for a test body that returned a promise
 */
export const ASYNC_PROCEDURE_MESSAGE = 'test procedures must be synchronous';

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * Execute a single test with failure isolation
 *
 * @param entry - Registered test to run
 * @returns Test result with outcome, message and duration
 */
export function executeTest(entry: TestEntry): TestResult {
  const timings = createPhaseTimings();
  debug('[Executor] Starting test:', entry.name);

  let result: TestResult;
  try {
    const returned: unknown = entry.procedure();
    if (isThenable(returned)) {
      // The run never waits; handle the settlement so a rejection is not left unhandled
      Promise.resolve(returned).catch((rejection: unknown) => {
        debugError(`[Executor] Async test "${entry.name}" rejected after it was reported:`, rejection);
      });
      throw new Error(ASYNC_PROCEDURE_MESSAGE);
    }
    result = { name: entry.name, outcome: 'pass', duration: endPhase(timings) };
  } catch (error) {
    const duration = endPhase(timings);
    const { outcome, message } = classifyThrown(error);
    debugError(`[Executor] Test "${entry.name}" finished as ${outcome}:`, error);
    result = { name: entry.name, outcome, message, duration };
  }

  debugTiming(`[TIMING] ${entry.name} - execute: ${result.duration}ms`);
  return result;
}
