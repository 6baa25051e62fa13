import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { TaskStatus } from '../types/task-status.js';
import type { TaskPriority } from '../types/task-priority.js';

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  status: integer('status').$type<TaskStatus>().notNull().default(1),
  priority: integer('priority').$type<TaskPriority>().notNull().default(0),
  /** ISO string */
  createdAt: text('created_at').notNull(),
  /** ISO string, NULL when the task has no due date */
  due: text('due'),
  /** JSON array of strings, stored as TEXT */
  notes: text('notes'),
}, (table) => [
  index('idx_tasks_status').on(table.status),
  index('idx_tasks_priority').on(table.priority),
]);
