import { eq, and, asc } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { TaskDb } from '../db.js';
import type { Task, TaskFilters } from '../types/task.js';
import { tasks } from '../schema/tasks.js';
import { toTask } from './task-helpers.js';

/** All tasks matching the non-null filter fields, ordered by id */
export function listTasksWithFilters(db: TaskDb, filters: TaskFilters): Task[] {
  const conditions: SQL[] = [];

  if (filters.status != null) {
    conditions.push(eq(tasks.status, filters.status));
  }
  if (filters.priority != null) {
    conditions.push(eq(tasks.priority, filters.priority));
  }

  const rows = db.select().from(tasks).where(and(...conditions)).orderBy(asc(tasks.id)).all();
  return rows.map(toTask);
}
