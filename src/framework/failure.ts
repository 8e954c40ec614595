import { types } from 'node:util';
import { ansi, StyleCode } from '../utils/ansi.js';

/**
 * Raised by assertions when their check fails
 *
 * Carries the human-readable reason and the line of the assertion call site.
 * The runner reports it as FAIL; every other thrown value is an EXCEPTION or
 * an UNRECOGNIZED EXCEPTION.
 */
export class FailureSignal extends Error {
  readonly reason: string;
  readonly line: number;

  constructor(reason: string, line: number) {
    super(renderFailure(reason, line));
    this.name = 'FailureSignal';
    this.reason = reason;
    this.line = line;
  }
}

/**
 * Render a failure the way the report prints it: `Line <bold line>: <reason>`
 */
export function renderFailure(reason: string, line: number): string {
  return `Line ${ansi(StyleCode.Bold)}${line}${ansi(StyleCode.None)}: ${reason}`;
}

export function isFailureSignal(value: unknown): value is FailureSignal {
  return value instanceof FailureSignal;
}

/**
 * Errors the harness treats as "recognized": any Error (including one created
 * in another realm, such as a vm context) that is not a FailureSignal
 */
export function isRecognizedError(value: unknown): value is Error {
  return (value instanceof Error || types.isNativeError(value)) && !isFailureSignal(value);
}
