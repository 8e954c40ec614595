/**
 * Outcome classification
 *
 * Maps whatever a test body threw onto one of the report categories.
 * Order matters: FailureSignal is itself an Error, so it is checked first.
 */

import type { TestOutcome } from '../types.js';
import { UNRECOGNIZED_FAILURE_MESSAGE } from '../types.js';
import { isFailureSignal, isRecognizedError } from '../framework/failure.js';

/**
 * Category and report message for a test that threw
 */
export interface ClassifiedFailure {
  outcome: Exclude<TestOutcome, 'pass'>;
  message: string;
}

/**
 * Classify a thrown value
 *
 * - FailureSignal: 'fail', with the rendered `Line <n>: <reason>` message
 * - any other Error: 'exception', naming the error and quoting its message
 * - anything else (strings, numbers, plain objects): 'unrecognized', fixed message
 */
export function classifyThrown(thrown: unknown): ClassifiedFailure {
  if (isFailureSignal(thrown)) {
    return { outcome: 'fail', message: thrown.message };
  }
  if (isRecognizedError(thrown)) {
    return { outcome: 'exception', message: `Unexpected ${thrown.name}: ${thrown.message}` };
  }
  return { outcome: 'unrecognized', message: UNRECOGNIZED_FAILURE_MESSAGE };
}
