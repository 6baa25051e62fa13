/**
 * Top-level state machine: load the task snapshot once, then route input
 * events to the table and the app's own bindings until quit.
 */

import type { Task, TaskRepository } from '@tsk/core';
import { NO_FILTERS, StorageError, errorMessage } from '@tsk/core';
import { TASK_COLUMNS } from './table/columns.js';
import { APP_KEYS, Action, resolveAction, type InputEvent, type KeyMap } from './table/keymap.js';
import { formatTaskRow } from './table/row-formatter.js';
import { TableModel, type TableOptions } from './table/table-model.js';

export type AppState = 'running' | 'terminated';

export interface AppOptions extends TableOptions {
  /** Clock for due-date humanization; read once at startup */
  readonly now?: () => Date;
  readonly appKeys?: KeyMap;
}

export class App {
  private state: AppState = 'running';

  private constructor(
    private readonly table: TableModel,
    private readonly keys: KeyMap,
  ) {}

  /**
   * Fetch every task and build the table. A failed fetch is fatal:
   * it throws StorageError and no App is created.
   */
  static start(repository: TaskRepository, options: AppOptions = {}): App {
    let tasks: Task[];
    try {
      tasks = repository.listTasksWithFilters(NO_FILTERS);
    } catch (err: unknown) {
      throw new StorageError(`failed to list tasks: ${errorMessage(err)}`, { cause: err });
    }

    const now = options.now?.() ?? new Date();
    const rows = tasks.map(task => formatTaskRow(task, now));
    const table = TableModel.initialize(TASK_COLUMNS, rows, options);
    return new App(table, options.appKeys ?? APP_KEYS);
  }

  getState(): AppState {
    return this.state;
  }

  getTable(): TableModel {
    return this.table;
  }

  update(event: InputEvent): AppState {
    if (this.state === 'terminated') return this.state;

    this.table.update(event);

    switch (resolveAction(this.keys, event)) {
      case Action.Quit:
        this.state = 'terminated';
        break;
      case Action.ToggleHeader:
        this.table.toggleHeaderVisibility();
        break;
    }

    return this.state;
  }

  view(): string {
    return this.table.render() + '\n';
  }
}
