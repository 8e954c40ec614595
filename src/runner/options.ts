import type { RunnerOptions, ResolvedRunnerOptions } from '../types.js';

/**
 * Fill in defaults for runner options
 *
 * @param options - Options as given by the caller
 * @returns Options with every field set
 * @example
 * const { output, debug } = resolveRunnerOptions({ debug: true });
 */
export function resolveRunnerOptions(options: RunnerOptions = {}): ResolvedRunnerOptions {
  return {
    output: options.output ?? process.stdout,
    debug: options.debug ?? false,
    debugTiming: options.debugTiming ?? false,
  };
}
