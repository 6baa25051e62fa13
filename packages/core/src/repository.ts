/**
 * The storage collaborator the table app reads from.
 */

import type { TaskDb } from './db.js';
import { CREATE_SCHEMA_SQL, getRawDb } from './db.js';
import type { Task, TaskFilters } from './types/task.js';
import { listTasksWithFilters } from './queries/task-queries.js';
import { StorageError, errorMessage } from './errors.js';

export interface TaskRepository {
  /** Throws StorageError when the read fails */
  listTasksWithFilters(filters: TaskFilters): Task[];
}

/**
 * Prepare the schema on an open database and return a repository over it.
 * Throws StorageError if the schema cannot be applied.
 */
export function createTaskRepository(db: TaskDb): TaskRepository {
  try {
    getRawDb(db).exec(CREATE_SCHEMA_SQL);
  } catch (err: unknown) {
    throw new StorageError(`failed to initialize task repository: ${errorMessage(err)}`, { cause: err });
  }

  return {
    listTasksWithFilters(filters) {
      try {
        return listTasksWithFilters(db, filters);
      } catch (err: unknown) {
        throw new StorageError(errorMessage(err), { cause: err });
      }
    },
  };
}
