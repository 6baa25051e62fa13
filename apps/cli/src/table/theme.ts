import chalk, { type ChalkInstance } from 'chalk';
import type { Column } from './columns.js';
import type { Emphasis } from './row.js';

export const Colors = {
  border: '#689d6a',
  text: '#b8bb26',
  header: '#83a598',
  highlightText: '#fabd2f',
  highlightBackground: '#3c3836',
  danger: '#cc241d',
} as const;

export const Border = {
  top: '─',
  bottom: '─',
  left: '│',
  right: '│',
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  topJunction: '╥',
  bottomJunction: '╨',
  leftJunction: '├',
  rightJunction: '┤',
  innerJunction: '╫',
  innerDivider: '║',
} as const;

export interface Theme {
  border(s: string): string;
  header(s: string): string;
  cell(s: string, column: Column, emphasis: Emphasis | null, highlighted: boolean): string;
}

/** Pass a Chalk with an explicit level to pin the output (tests use level 0 for plain text) */
export function createTheme(c: ChalkInstance = chalk): Theme {
  const border = c.hex(Colors.border);
  const header = c.hex(Colors.header).bold;

  return {
    border: s => border(s),
    header: s => header(s),
    cell(s, column, emphasis, highlighted) {
      const fg = emphasis === 'danger'
        ? Colors.danger
        : highlighted ? Colors.highlightText : column.style?.color ?? Colors.text;

      let style = c.hex(fg);
      if (highlighted) style = style.bgHex(Colors.highlightBackground);
      if (column.style?.faint) style = style.dim;
      if (column.style?.bold) style = style.bold;
      return style(s);
    },
  };
}
