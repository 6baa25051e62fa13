export { TaskStatus, TaskStatusName } from './task-status.js';
export { TaskPriority, TaskPriorityName } from './task-priority.js';
export type { TaskId, Task, TaskFilters } from './task.js';
export { NO_FILTERS } from './task.js';
