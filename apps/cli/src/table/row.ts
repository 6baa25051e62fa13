import type { ColumnKey } from './columns.js';

/** Rendering hint carried with a cell's text; the Theme decides what it looks like */
export type Emphasis = 'danger';

export interface Cell {
  readonly text: string;
  readonly emphasis: Emphasis | null;
  /** What the column sorts on; null sorts after every value */
  readonly sortValue: number | string | null;
}

export type DisplayRow = Readonly<Record<ColumnKey, Cell>>;

export function textCell(text: string, sortValue: number | string | null = text): Cell {
  return { text, emphasis: null, sortValue };
}
