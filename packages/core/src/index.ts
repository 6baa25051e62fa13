// Types
export { TaskStatus, TaskStatusName, TaskPriority, TaskPriorityName, NO_FILTERS } from './types/index.js';
export type { TaskId, Task, TaskFilters } from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, closeDb, getRawDb, getDefaultDbPath, CREATE_SCHEMA_SQL } from './db.js';
export type { TaskDb } from './db.js';

// Queries
export * from './queries/index.js';

// Repository
export { createTaskRepository } from './repository.js';
export type { TaskRepository } from './repository.js';

// Errors
export { StorageError, errorMessage } from './errors.js';
