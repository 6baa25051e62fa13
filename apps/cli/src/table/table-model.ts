/**
 * View state for the task table: rows in display order, the active sort,
 * the highlighted row and whether the header is shown.
 *
 * Rows are kept in the order they were given so that re-sorting is stable
 * with respect to insertion order, whatever sorts came before.
 */

import { fit } from '../output.js';
import { ColumnKey, type Column, type ColumnKind } from './columns.js';
import { Action, TABLE_KEYS, resolveAction, type InputEvent, type KeyMap } from './keymap.js';
import type { DisplayRow } from './row.js';
import { Border, createTheme, type Theme } from './theme.js';

export interface SortOrder {
  readonly column: ColumnKey;
  readonly ascending: boolean;
}

export const DEFAULT_SORT: SortOrder = { column: ColumnKey.Id, ascending: true };

export type Direction = 'up' | 'down';

export interface TableOptions {
  readonly sort?: SortOrder;
  readonly keyMap?: KeyMap;
  readonly theme?: Theme;
}

type SortValue = number | string | null;

/** Absent values go last regardless of direction */
function compareSortValues(a: SortValue, b: SortValue, kind: ColumnKind, ascending: boolean): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? 1 : -1;
  }

  let result: number;
  if (kind === 'text') {
    const x = String(a);
    const y = String(b);
    result = x < y ? -1 : x > y ? 1 : 0;
  } else {
    const diff = Number(a) - Number(b);
    result = Number.isNaN(diff) ? 0 : diff;
  }
  return ascending ? result : -result;
}

export class TableModel {
  private source: readonly DisplayRow[] = [];
  private rows: readonly DisplayRow[] = [];
  private sort: SortOrder = DEFAULT_SORT;
  private highlighted = 0;
  private headerVisible = true;

  private constructor(
    private readonly columns: readonly Column[],
    private readonly keyMap: KeyMap,
    private readonly theme: Theme,
  ) {}

  /** Build a table and sort its rows (ascending by id unless told otherwise) before first render */
  static initialize(columns: readonly Column[], rows: readonly DisplayRow[], options: TableOptions = {}): TableModel {
    const table = new TableModel(columns, options.keyMap ?? TABLE_KEYS, options.theme ?? createTheme());
    const sort = options.sort ?? DEFAULT_SORT;
    table.assertColumn(sort.column);
    table.sort = sort;
    table.replaceRows(rows);
    return table;
  }

  getRows(): readonly DisplayRow[] {
    return this.rows;
  }

  getSort(): SortOrder {
    return this.sort;
  }

  getHighlightedIndex(): number {
    return this.highlighted;
  }

  /** Null when the table is empty */
  getHighlightedRow(): DisplayRow | null {
    return this.rows[this.highlighted] ?? null;
  }

  isHeaderVisible(): boolean {
    return this.headerVisible;
  }

  /** Swap in a new row set, keeping the active sort and a valid highlight */
  replaceRows(rows: readonly DisplayRow[]): void {
    this.source = [...rows];
    this.rows = this.sorted();
    this.highlighted = this.rows.length === 0 ? 0 : Math.min(this.highlighted, this.rows.length - 1);
  }

  moveHighlight(direction: Direction): void {
    if (this.rows.length === 0) return;
    this.highlighted = direction === 'down'
      ? Math.min(this.highlighted + 1, this.rows.length - 1)
      : Math.max(this.highlighted - 1, 0);
  }

  toggleHeaderVisibility(): void {
    this.headerVisible = !this.headerVisible;
  }

  setSort(column: ColumnKey, ascending: boolean): void {
    this.assertColumn(column);
    this.sort = { column, ascending };
    this.rows = this.sorted();
  }

  /** Apply row navigation. Returns true when the event was a table key. */
  update(event: InputEvent): boolean {
    switch (resolveAction(this.keyMap, event)) {
      case Action.MoveDown:
        this.moveHighlight('down');
        return true;
      case Action.MoveUp:
        this.moveHighlight('up');
        return true;
      default:
        return false;
    }
  }

  render(): string {
    const { theme, columns } = this;
    const rule = (left: string, junction: string, right: string): string =>
      theme.border(left + columns.map(c => Border.top.repeat(c.width)).join(junction) + right);
    const divider = theme.border(Border.innerDivider);
    const edge = theme.border(Border.left);

    const lines = [rule(Border.topLeft, Border.topJunction, Border.topRight)];

    if (this.headerVisible) {
      const labels = columns.map(c => theme.header(fit(c.label, c.width, c.align)));
      lines.push(edge + labels.join(divider) + theme.border(Border.right));
      if (this.rows.length > 0) {
        lines.push(rule(Border.leftJunction, Border.innerJunction, Border.rightJunction));
      }
    }

    this.rows.forEach((row, i) => {
      const highlighted = i === this.highlighted;
      const cells = columns.map(c => {
        const cell = row[c.key];
        return theme.cell(fit(cell.text, c.width, c.align), c, cell.emphasis, highlighted);
      });
      lines.push(edge + cells.join(divider) + theme.border(Border.right));
    });

    lines.push(rule(Border.bottomLeft, Border.bottomJunction, Border.bottomRight));
    return lines.join('\n');
  }

  private sorted(): DisplayRow[] {
    const { column, ascending } = this.sort;
    const kind = this.columns.find(c => c.key === column)?.kind ?? 'text';
    return [...this.source].sort((a, b) =>
      compareSortValues(a[column].sortValue, b[column].sortValue, kind, ascending));
  }

  private assertColumn(key: ColumnKey): void {
    if (!this.columns.some(c => c.key === key)) {
      throw new Error(`Unknown sort column: ${key}`);
    }
  }
}
