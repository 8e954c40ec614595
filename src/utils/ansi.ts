/**
 * Terminal formatting
 *
 * Select Graphic Rendition codes used to decorate the report.
 */

export const StyleCode = {
  None: 0,
  Bold: 1,
  Red: 31,
  Green: 32,
  Yellow: 33,
} as const;

export type StyleCode = (typeof StyleCode)[keyof typeof StyleCode];

/**
 * Ordered, non-empty list of style codes
 */
export type StyleCodeList = readonly [StyleCode, ...StyleCode[]];

const ESCAPE = '\u001b[';

/**
 * Render one code, or an ordered list of codes, as an escape sequence
 *
 * @example
 * ansi(StyleCode.Green)                    // '\x1b[32m'
 * ansi([StyleCode.Red, StyleCode.Bold])    // '\x1b[31;1m'
 */
export function ansi(codes: StyleCode | StyleCodeList): string {
  const list: readonly StyleCode[] = typeof codes === 'number' ? [codes] : codes;

  // An empty list has no meaningful rendering
  if (list.length === 0) {
    throw new Error('ansi() requires at least one style code');
  }

  return `${ESCAPE}${list.join(';')}m`;
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

/**
 * Remove escape sequences produced by ansi()
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}
