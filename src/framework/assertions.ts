/**
 * Assertion functions
 *
 * Each assertion takes the evaluated value(s), the source text of the
 * expression(s) as written by the caller, and the line of the call. Messages
 * quote the source text, never the values.
 *
 * These are the explicit-argument forms; `check` (check.ts) fills in the line
 * from the call site.
 */

import { ALMOST_EQUAL_TOLERANCE } from '../types.js';
import type { Equatable } from '../types.js';
import { FailureSignal, isRecognizedError } from './failure.js';

// ============================================================================
// Helpers
// ============================================================================

function isEquatable(value: unknown): value is Equatable {
  return typeof value === 'object' && value !== null && 'equals' in value && typeof value.equals === 'function';
}

/**
 * Equality under the values' own rules: `equals()` when the left value has
 * one, strict equality otherwise
 */
export function valuesEqual(lhs: unknown, rhs: unknown): boolean {
  return isEquatable(lhs) ? lhs.equals(rhs) : lhs === rhs;
}

/**
 * Run `call` and report whether it threw a recognized error
 *
 * Only Error instances count (from any realm). A FailureSignal from a nested assertion and any
 * thrown non-Error value are rethrown for the runner to classify.
 */
export function raisesRecognizedError(call: () => unknown): boolean {
  try {
    call();
  } catch (error) {
    if (isRecognizedError(error)) {
      return true;
    }
    throw error;
  }
  return false;
}

// ============================================================================
// Boolean Assertions
// ============================================================================

export function assertTrue(expr: boolean, text: string, line: number): void {
  if (!expr) {
    throw new FailureSignal(`Expected TRUE, but was FALSE: "${text}"`, line);
  }
}

export function assertFalse(expr: boolean, text: string, line: number): void {
  if (expr) {
    throw new FailureSignal(`Expected FALSE, but was TRUE: "${text}"`, line);
  }
}

// ============================================================================
// Comparison Assertions
// ============================================================================

export function assertEqual<T1, T2>(lhs: T1, rhs: T2, lhsText: string, rhsText: string, line: number): void {
  if (!valuesEqual(lhs, rhs)) {
    throw new FailureSignal(`Expected EQUAL, but was NOT EQUAL: [${lhsText}] and [${rhsText}]`, line);
  }
}

export function assertUnequal<T1, T2>(lhs: T1, rhs: T2, lhsText: string, rhsText: string, line: number): void {
  if (valuesEqual(lhs, rhs)) {
    throw new FailureSignal(`Expected UNEQUAL, but was NOT UNEQUAL: [${lhsText}] and [${rhsText}]`, line);
  }
}

/**
 * Passes when |lhs - rhs| <= 0.0001 (absolute, boundary included)
 *
 * NaN on either side always fails.
 */
export function assertAlmostEqual(lhs: number, rhs: number, lhsText: string, rhsText: string, line: number): void {
  if (!(Math.abs(lhs - rhs) <= ALMOST_EQUAL_TOLERANCE)) {
    throw new FailureSignal(
      `Expected ALMOST EQUAL, but was NOT ALMOST EQUAL: [${lhsText}] and [${rhsText}]`,
      line
    );
  }
}

// ============================================================================
// Exception Assertions
// ============================================================================

export function assertException(call: () => unknown, text: string, line: number): void {
  if (!raisesRecognizedError(call)) {
    throw new FailureSignal(`Expected EXCEPTION, but got NO EXCEPTION: "${text}"`, line);
  }
}

export function assertNoException(call: () => unknown, text: string, line: number): void {
  if (raisesRecognizedError(call)) {
    throw new FailureSignal(`Expected NO EXCEPTION, but got EXCEPTION: "${text}"`, line);
  }
}
