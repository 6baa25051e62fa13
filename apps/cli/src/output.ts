/**
 * chalk-based console output and fixed-width text helpers.
 * Widths are terminal columns as terminal-kit measures them.
 */

import chalk from 'chalk';
import terminalKit from 'terminal-kit';

export type Align = 'left' | 'center' | 'right';

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

export function error(message: string): void {
  console.error(chalk.red(message));
}

/** Display width in terminal columns */
export function displayWidth(s: string): number {
  return terminalKit.stringWidth(s);
}

/** Replace line breaks, tabs and other control characters with spaces */
export function sanitize(s: string): string {
  return s.replace(/\r\n/g, ' ').replace(CONTROL_CHARS, ' ');
}

/** Cut to maxWidth columns, marking the cut with an ellipsis */
export function truncate(s: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (displayWidth(s) <= maxWidth) return s;
  return terminalKit.truncateString(s, maxWidth - 1) + '…';
}

/** Fit text to exactly `width` columns: sanitize, truncate, then pad */
export function fit(s: string, width: number, align: Align = 'left'): string {
  const text = truncate(sanitize(s), width);
  const short = width - displayWidth(text);
  if (short <= 0) return text;

  switch (align) {
    case 'right':
      return ' '.repeat(short) + text;
    case 'center': {
      const left = Math.floor(short / 2);
      return ' '.repeat(left) + text + ' '.repeat(short - left);
    }
    default:
      return text + ' '.repeat(short);
  }
}
