/**
 * Debug logging
 *
 * All diagnostics go to stderr so the report on stdout stays byte-exact.
 */

let debugEnabled = false;
let timingEnabled = false;

export function setDebug(enabled: boolean, timing: boolean = false): void {
  debugEnabled = enabled;
  timingEnabled = timing;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function debug(...args: unknown[]): void {
  if (debugEnabled) {
    console.error(...args);
  }
}

export function debugError(...args: unknown[]): void {
  if (debugEnabled) {
    console.error('[ERROR]', ...args);
  }
}

export function debugTiming(...args: unknown[]): void {
  if (timingEnabled) {
    console.error(...args);
  }
}
