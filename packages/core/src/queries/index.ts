export { serializeNotes, deserializeNotes, toTask } from './task-helpers.js';
export { listTasksWithFilters } from './task-queries.js';
