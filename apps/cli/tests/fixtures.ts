import type { Task, TaskFilters, TaskRepository } from '@tsk/core';
import { TaskStatus, TaskPriority } from '@tsk/core';
import type { Column, ColumnKey } from '../src/table/columns.js';
import { textCell, type Cell, type DisplayRow } from '../src/table/row.js';
import type { Screen } from '../src/terminal.js';

export const NOW = new Date(2024, 0, 10, 12, 0, 0);

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 1,
    title: 'Test task',
    status: TaskStatus.Todo,
    priority: TaskPriority.Low,
    createdAt: new Date(2024, 0, 1, 9, 0, 0),
    due: null,
    notes: [],
    ...overrides,
  };
}

export function makeRow(id: number, title = `task ${id}`, overrides: Partial<Record<ColumnKey, Cell>> = {}): DisplayRow {
  return {
    id: textCell(String(id), id),
    title: textCell(title),
    status: textCell('todo'),
    priority: textCell('low'),
    created: textCell('', null),
    due_date: textCell('', null),
    notes: textCell(''),
    ...overrides,
  };
}

export const ID_COLUMN: Column = { key: 'id', label: 'ID', width: 3, align: 'center', kind: 'numeric' };
export const TITLE_COLUMN: Column = { key: 'title', label: 'Title', width: 5, align: 'left', kind: 'text' };

/** A narrow two-column catalog that keeps rendered lines short */
export const NARROW_COLUMNS: readonly Column[] = [ID_COLUMN, TITLE_COLUMN];

export class FakeTaskRepository implements TaskRepository {
  readonly calls: TaskFilters[] = [];

  constructor(
    private readonly tasks: Task[],
    private readonly failure: Error | null = null,
  ) {}

  listTasksWithFilters(filters: TaskFilters): Task[] {
    this.calls.push(filters);
    if (this.failure) throw this.failure;
    return this.tasks;
  }
}

/** In-memory screen: records frames and lets a test press keys */
export class FakeScreen implements Screen {
  readonly frames: string[] = [];
  closed = 0;
  private keyListener: (name: string) => void = () => {};
  private resizeListener: (columns: number, rows: number) => void = () => {};

  onKey(listener: (name: string) => void): void {
    this.keyListener = listener;
  }

  onResize(listener: (columns: number, rows: number) => void): void {
    this.resizeListener = listener;
  }

  draw(frame: string): void {
    this.frames.push(frame);
  }

  close(): void {
    this.closed++;
  }

  press(...names: string[]): void {
    for (const name of names) this.keyListener(name);
  }

  resize(columns: number, rows: number): void {
    this.resizeListener(columns, rows);
  }

  lastFrame(): string | undefined {
    return this.frames[this.frames.length - 1];
  }
}
