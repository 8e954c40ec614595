import { describe, it, expect } from 'vitest';
import {
  createConsoleReporter,
  formatStatus,
  formatSummary,
  formatTestStart,
} from '../src/reporter/console-reporter.js';
import { createBufferedOutput, ESC } from './helpers.js';

describe('formatStatus', () => {
  it('colors each outcome, resetting after the newline', () => {
    expect(formatStatus('pass')).toBe(`${ESC}32mPASS\n${ESC}0m`);
    expect(formatStatus('fail')).toBe(`${ESC}31mFAIL\n${ESC}0m`);
    expect(formatStatus('exception')).toBe(`${ESC}33mEXCEPTION\n${ESC}0m`);
    expect(formatStatus('unrecognized')).toBe(`${ESC}31;1mUNRECOGNIZED EXCEPTION\n${ESC}0m`);
  });
});

describe('formatTestStart', () => {
  it('quotes the name and leaves the line open', () => {
    expect(formatTestStart('parses "quoted" input')).toBe('Running test "parses "quoted" input" . . . ');
  });
});

describe('formatSummary', () => {
  it('omits the failures section when nothing failed', () => {
    expect(formatSummary({ passed: 3, total: 3, failures: [] })).toBe('\nTotal passed: [3 / 3]\n');
  });

  it('lists failures in the given order before the tally', () => {
    const text = formatSummary({
      passed: 1,
      total: 3,
      failures: [
        { testName: 'z', message: 'first' },
        { testName: 'a', message: 'second' },
      ],
    });
    expect(text).toBe('\n- - - Failures - - -\n -> [z] first\n -> [a] second\n\nTotal passed: [1 / 3]\n');
  });
});

describe('createConsoleReporter', () => {
  it('writes each event to the output', () => {
    const output = createBufferedOutput();
    const reporter = createConsoleReporter(output);

    reporter.testStarted('only');
    reporter.testFinished({ name: 'only', outcome: 'pass', duration: 0 });
    reporter.runFinished({ passed: 1, total: 1, failures: [], results: [], exitCode: 0 });

    expect(output.text).toBe(`Running test "only" . . . ${ESC}32mPASS\n${ESC}0m\nTotal passed: [1 / 1]\n`);
  });
});
