/**
 * Shared helpers for the test suites
 */

import type { OutputSink } from '../src/types.js';
import { FailureSignal } from '../src/framework/failure.js';

export const ESC = '\u001b[';

export interface BufferedOutput extends OutputSink {
  /** Everything written so far */
  readonly text: string;
}

/**
 * Output sink that keeps everything in memory
 */
export function createBufferedOutput(): BufferedOutput {
  const chunks: string[] = [];
  return {
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
    get text(): string {
      return chunks.join('');
    },
  };
}

/**
 * Run an action that is expected to fail an assertion and return the signal
 */
export function captureSignal(action: () => void): FailureSignal {
  try {
    action();
  } catch (error) {
    if (error instanceof FailureSignal) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a FailureSignal, but nothing was thrown');
}
