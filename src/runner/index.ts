/**
 * Test Runner
 *
 * One sequential pass over a registry:
 *   lock registry → for each test in name order: announce, execute, report → summary
 *
 * Every test runs behind its own failure boundary (executeTest), so nothing a
 * test throws can stop the tests after it. The returned exit code is always 0:
 * pass/fail information is carried by the printed report and the RunReport.
 */

import type { FailureRecord, RunReport, RunnerOptions, TestResult } from '../types.js';
import type { TestRegistry } from '../framework/registry.js';
import { executeTest } from '../executor/index.js';
import { createConsoleReporter } from '../reporter/console-reporter.js';
import type { Reporter } from '../reporter/console-reporter.js';
import { setDebug, debug, debugTiming } from '../utils/debug.js';
import { createPhaseTimings, endPhase } from '../utils/timing.js';
import { resolveRunnerOptions } from './options.js';

/**
 * Exit code reported for every completed run, whatever its failures
 */
export const RUN_EXIT_CODE = 0;

/**
 * Run every test in a registry and print the report
 *
 * Locks the registry first; registering afterwards throws RegistryLockedError.
 *
 * @param registry - Tests to run
 * @param options - Output sink and debug switches
 * @param reporter - Override the console reporter (defaults to one writing to options.output)
 * @returns Counts, failure records and per-test results
 */
export function runTests(registry: TestRegistry, options: RunnerOptions = {}, reporter?: Reporter): RunReport {
  const resolved = resolveRunnerOptions(options);
  setDebug(resolved.debug, resolved.debugTiming);

  const activeReporter = reporter ?? createConsoleReporter(resolved.output);
  const runTimings = createPhaseTimings();

  registry.lock();
  const entries = registry.entries();
  debug('[Runner] Running', entries.length, 'tests');

  const results: TestResult[] = [];
  const failures: FailureRecord[] = [];

  for (const entry of entries) {
    activeReporter.testStarted(entry.name);
    const result = executeTest(entry);
    activeReporter.testFinished(result);

    results.push(result);
    if (result.message !== undefined) {
      failures.push({ testName: result.name, message: result.message });
    }
  }

  const report: RunReport = {
    passed: results.length - failures.length,
    total: results.length,
    failures,
    results,
    exitCode: RUN_EXIT_CODE,
  };

  activeReporter.runFinished(report);

  debugTiming(`[TIMING] run - ${report.total} tests: ${endPhase(runTimings)}ms`);
  debug('[Runner] Finished:', report.passed, 'of', report.total, 'passed');

  return report;
}
