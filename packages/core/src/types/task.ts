import type { TaskStatus } from './task-status.js';
import type { TaskPriority } from './task-priority.js';

export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly status: TaskStatus;
  readonly priority: TaskPriority;
  readonly createdAt: Date;
  readonly due: Date | null;
  readonly notes: readonly string[];
}

/** Equality filters; null leaves the field unrestricted */
export interface TaskFilters {
  readonly status: TaskStatus | null;
  readonly priority: TaskPriority | null;
}

export const NO_FILTERS: TaskFilters = { status: null, priority: null };
