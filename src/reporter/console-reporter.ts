/**
 * Console Reporter
 *
 * Writes the human-readable report. The format is fixed byte for byte:
 *
 *   Running test "alpha" . . . <green>PASS
 *   <reset>Running test "beta" . . . <red>FAIL
 *   <reset>
 *   - - - Failures - - -
 *    -> [beta] Line <bold>10<reset>: Expected TRUE, but was FALSE: "false"
 *
 *   Total passed: [1 / 2]
 */

import type { OutputSink, RunReport, TestOutcome, TestResult } from '../types.js';
import { ansi, StyleCode } from '../utils/ansi.js';
import type { StyleCodeList } from '../utils/ansi.js';

/**
 * Receives run lifecycle events, in order: testStarted/testFinished per test,
 * then runFinished once
 */
export interface Reporter {
  testStarted(name: string): void;
  testFinished(result: TestResult): void;
  runFinished(report: RunReport): void;
}

const STATUS: Record<TestOutcome, { style: StyleCode | StyleCodeList; label: string }> = {
  pass: { style: StyleCode.Green, label: 'PASS' },
  fail: { style: StyleCode.Red, label: 'FAIL' },
  exception: { style: StyleCode.Yellow, label: 'EXCEPTION' },
  unrecognized: { style: [StyleCode.Red, StyleCode.Bold], label: 'UNRECOGNIZED EXCEPTION' },
};

/**
 * Colored status line ending for an outcome (the reset follows the newline)
 */
export function formatStatus(outcome: TestOutcome): string {
  const { style, label } = STATUS[outcome];
  return `${ansi(style)}${label}\n${ansi(StyleCode.None)}`;
}

export function formatTestStart(name: string): string {
  return `Running test "${name}" . . . `;
}

/**
 * Failures section (empty when nothing failed) followed by the tally
 */
export function formatSummary(report: Pick<RunReport, 'passed' | 'total' | 'failures'>): string {
  let text = '';

  if (report.failures.length > 0) {
    text += '\n- - - Failures - - -\n';
    for (const failure of report.failures) {
      text += ` -> [${failure.testName}] ${failure.message}\n`;
    }
  }

  text += `\nTotal passed: [${report.passed} / ${report.total}]\n`;
  return text;
}

/**
 * Create a reporter that writes the report to an output sink
 *
 * @param output - Destination, usually process.stdout
 * @returns Reporter instance
 */
export function createConsoleReporter(output: OutputSink): Reporter {
  return {
    testStarted(name: string): void {
      output.write(formatTestStart(name));
    },

    testFinished(result: TestResult): void {
      output.write(formatStatus(result.outcome));
    },

    runFinished(report: RunReport): void {
      output.write(formatSummary(report));
    },
  };
}
