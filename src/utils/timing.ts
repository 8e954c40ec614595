/**
 * Timing utilities for performance tracking
 */

import type { PhaseTimings } from '../types.js';

/**
 * Create phase timings tracker
 *
 * @returns PhaseTimings object with phaseStart set to current time
 */
export function createPhaseTimings(): PhaseTimings {
  return {
    phaseStart: performance.now(),
    phaseEnd: 0,
  };
}

/**
 * Close a phase and return its duration in milliseconds
 */
export function endPhase(timings: PhaseTimings): number {
  timings.phaseEnd = performance.now();
  return timings.phaseEnd - timings.phaseStart;
}
