/**
 * Call-site capturing assertions
 *
 * Same checks as assertions.ts, but the line number comes from the stack
 * instead of an argument:
 *
 *   test('parser', () => {
 *     check.isTrue(tokens.length > 0, 'tokens.length > 0');
 *     check.equal(tokens[0], 'let', 'tokens[0]', "'let'");
 *     check.throws(() => parse('}'));
 *   });
 *
 * Each wrapper passes itself as the stack boundary so the captured frame is
 * the test body, never this module.
 */

import { callerLine } from '../utils/call-site.js';
import {
  assertTrue,
  assertFalse,
  assertEqual,
  assertUnequal,
  assertAlmostEqual,
  assertException,
  assertNoException,
} from './assertions.js';

const ARROW_SOURCE = /^(?:async\s*)?\(\s*\)\s*=>\s*([\s\S]*)$/;

/**
 * Source text for a callback, used as the expression text of throws()/doesNotThrow()
 *
 * A named function or a named arrow `parseAll` gives `parseAll()`. An inline
 * `() => parse(x)` gives `parse(x)`, `() => { parse(x); }` gives `parse(x);`.
 * Anything else is quoted whole. Whitespace runs collapse to one space.
 */
export function describeCall(call: () => unknown): string {
  if (call.name !== '') {
    return `${call.name}()`;
  }
  const source = call.toString().trim();
  const arrow = ARROW_SOURCE.exec(source);
  let text = source;
  if (arrow?.[1] !== undefined) {
    const body = arrow[1].trim();
    text = body.startsWith('{') && body.endsWith('}') ? body.slice(1, -1).trim() : body;
  }
  return text.replace(/\s+/g, ' ');
}

function isTrue(expr: boolean, text: string): void {
  assertTrue(expr, text, callerLine(isTrue));
}

function isFalse(expr: boolean, text: string): void {
  assertFalse(expr, text, callerLine(isFalse));
}

function equal<T1, T2>(lhs: T1, rhs: T2, lhsText: string, rhsText: string): void {
  assertEqual(lhs, rhs, lhsText, rhsText, callerLine(equal));
}

function unequal<T1, T2>(lhs: T1, rhs: T2, lhsText: string, rhsText: string): void {
  assertUnequal(lhs, rhs, lhsText, rhsText, callerLine(unequal));
}

function almostEqual(lhs: number, rhs: number, lhsText: string, rhsText: string): void {
  assertAlmostEqual(lhs, rhs, lhsText, rhsText, callerLine(almostEqual));
}

function throws(call: () => unknown, text: string = describeCall(call)): void {
  assertException(call, text, callerLine(throws));
}

function doesNotThrow(call: () => unknown, text: string = describeCall(call)): void {
  assertNoException(call, text, callerLine(doesNotThrow));
}

export const check = {
  isTrue,
  isFalse,
  equal,
  unequal,
  almostEqual,
  throws,
  doesNotThrow,
} as const;
