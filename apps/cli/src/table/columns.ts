import type { Align } from '../output.js';

export const ColumnKey = {
  Id: 'id',
  Title: 'title',
  Status: 'status',
  Priority: 'priority',
  Created: 'created',
  DueDate: 'due_date',
  Notes: 'notes',
} as const;

export type ColumnKey = (typeof ColumnKey)[keyof typeof ColumnKey];

const COLUMN_KEYS: ReadonlySet<string> = new Set(Object.values(ColumnKey));

export function isColumnKey(value: string): value is ColumnKey {
  return COLUMN_KEYS.has(value);
}

/** How a column's sort values compare */
export type ColumnKind = 'numeric' | 'text' | 'timestamp';

export interface CellStyle {
  readonly color?: string;
  readonly faint?: boolean;
  readonly bold?: boolean;
}

export interface Column {
  readonly key: ColumnKey;
  readonly label: string;
  /** Exact rendered width in characters */
  readonly width: number;
  readonly align: Align;
  readonly kind: ColumnKind;
  readonly style?: CellStyle;
}

export const TASK_COLUMNS: readonly Column[] = [
  {
    key: ColumnKey.Id, label: 'ID', width: 5, align: 'center', kind: 'numeric',
    style: { faint: true, color: '#fabd2f' },
  },
  { key: ColumnKey.Title, label: 'Title', width: 20, align: 'left', kind: 'text' },
  { key: ColumnKey.Status, label: 'Status', width: 6, align: 'left', kind: 'text' },
  { key: ColumnKey.Priority, label: 'Priority', width: 8, align: 'left', kind: 'text' },
  { key: ColumnKey.Created, label: 'Created', width: 19, align: 'left', kind: 'timestamp' },
  { key: ColumnKey.DueDate, label: 'Due Date', width: 19, align: 'left', kind: 'timestamp' },
  // TODO: let Notes take the remaining terminal width once resize events carry layout
  { key: ColumnKey.Notes, label: 'Notes', width: 16, align: 'left', kind: 'text' },
];
