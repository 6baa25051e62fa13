import { createDb, closeDb, createTaskRepository, StorageError, errorMessage } from '@tsk/core';
import type { TaskDb } from '@tsk/core';
import { App } from './app.js';
import type { SortOrder } from './table/table-model.js';
import { createTerminalScreen, runTerminal, type Screen } from './terminal.js';

export interface RunOptions {
  readonly dbPath: string;
  readonly sort: SortOrder;
}

/**
 * Open storage, load the snapshot and run the table until quit.
 * The database handle is closed on the way out, whether or not startup succeeded.
 */
export async function run(
  options: RunOptions,
  openScreen: () => Screen = createTerminalScreen,
): Promise<void> {
  let db: TaskDb;
  try {
    db = createDb(options.dbPath);
  } catch (err: unknown) {
    throw new StorageError(`failed to connect to database: ${errorMessage(err)}`, { cause: err });
  }

  try {
    const repository = createTaskRepository(db);
    const app = App.start(repository, { sort: options.sort });
    await runTerminal(app, openScreen());
  } finally {
    closeDb(db);
  }
}
