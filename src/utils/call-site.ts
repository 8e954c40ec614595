/**
 * Call-site capture
 *
 * Finds the file:line:column of whoever called a given function by asking V8
 * for a stack trace that starts just above that function. The stack text is
 * used rather than raw CallSite objects so that source-map support installed
 * by the host (tsx, vitest, node --enable-source-maps) is already applied and
 * lines point at the TypeScript source.
 */

export interface CallSiteLocation {
  /** File path or URL, as printed in the stack */
  file: string;
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
}

// "    at fn (file:10:5)", "    at file:10:5", "    at async fn (file:10:5)"
const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):(\d+)\)?$/;

/**
 * Parse a single V8 stack frame line
 *
 * @returns Location, or null for frames without a position (native, eval)
 */
export function parseStackFrame(frame: string): CallSiteLocation | null {
  const match = FRAME_PATTERN.exec(frame);
  if (!match) {
    return null;
  }
  const [, file, line, column] = match;
  if (file === undefined || line === undefined || column === undefined) {
    return null;
  }
  return { file, line: Number(line), column: Number(column) };
}

/**
 * Locate the caller of `boundary`
 *
 * Frames for `boundary` and everything it called are omitted, so the first
 * frame left is the call site.
 *
 * @param boundary - The function whose caller we want
 * @returns Location of the call, or null if the stack has no usable frame
 */
export function captureCallSite(boundary: (...args: never[]) => unknown): CallSiteLocation | null {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);

  const frames = (holder.stack ?? '').split('\n').filter(line => line.trimStart().startsWith('at '));
  const first = frames[0];
  return first === undefined ? null : parseStackFrame(first);
}

/**
 * Line of the caller of `boundary`, 0 when unknown
 */
export function callerLine(boundary: (...args: never[]) => unknown): number {
  return captureCallSite(boundary)?.line ?? 0;
}
