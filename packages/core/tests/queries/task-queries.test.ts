import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, getRawDb, type TaskDb } from '../../src/db.js';
import { tasks } from '../../src/schema/tasks.js';
import { listTasksWithFilters } from '../../src/queries/task-queries.js';
import { serializeNotes, deserializeNotes } from '../../src/queries/task-helpers.js';
import { TaskStatus } from '../../src/types/task-status.js';
import { TaskPriority } from '../../src/types/task-priority.js';
import { NO_FILTERS } from '../../src/types/task.js';

let db: TaskDb;

function insert(values: Partial<typeof tasks.$inferInsert> & { title: string }): void {
  db.insert(tasks).values({ createdAt: '2024-01-01T09:00:00.000Z', ...values }).run();
}

beforeEach(() => {
  db = createTestDb();
});

describe('listTasksWithFilters', () => {
  it('returns an empty list for an empty database', () => {
    expect(listTasksWithFilters(db, NO_FILTERS)).toEqual([]);
  });

  it('returns every task ordered by id with no filters', () => {
    insert({ id: 3, title: 'third' });
    insert({ id: 1, title: 'first' });
    insert({ id: 2, title: 'second' });

    const result = listTasksWithFilters(db, NO_FILTERS);
    expect(result.map(t => t.id)).toEqual([1, 2, 3]);
  });

  it('filters by status', () => {
    insert({ title: 'open', status: TaskStatus.Todo });
    insert({ title: 'busy', status: TaskStatus.Doing });

    const result = listTasksWithFilters(db, { status: TaskStatus.Doing, priority: null });
    expect(result.map(t => t.title)).toEqual(['busy']);
  });

  it('filters by priority', () => {
    insert({ title: 'low', priority: TaskPriority.Low });
    insert({ title: 'high', priority: TaskPriority.High });

    const result = listTasksWithFilters(db, { status: null, priority: TaskPriority.High });
    expect(result.map(t => t.title)).toEqual(['high']);
  });

  it('maps columns onto the task', () => {
    insert({
      id: 7,
      title: 'Write report',
      status: TaskStatus.Done,
      priority: TaskPriority.Medium,
      createdAt: '2024-01-02T03:04:05.000Z',
      due: '2024-02-01T00:00:00.000Z',
      notes: serializeNotes(['outline', 'draft']),
    });

    const [task] = listTasksWithFilters(db, NO_FILTERS);
    expect(task).toEqual({
      id: 7,
      title: 'Write report',
      status: TaskStatus.Done,
      priority: TaskPriority.Medium,
      createdAt: new Date('2024-01-02T03:04:05.000Z'),
      due: new Date('2024-02-01T00:00:00.000Z'),
      notes: ['outline', 'draft'],
    });
  });

  it('reads a missing due date as null and missing notes as empty', () => {
    insert({ title: 'bare' });

    const [task] = listTasksWithFilters(db, NO_FILTERS);
    expect(task?.due).toBeNull();
    expect(task?.notes).toEqual([]);
  });

  it('passes through status values outside the known set', () => {
    getRawDb(db)
      .prepare('INSERT INTO tasks (title, status, priority, created_at) VALUES (?, ?, ?, ?)')
      .run('odd', 9, 0, '2024-01-01T00:00:00.000Z');

    const [task] = listTasksWithFilters(db, NO_FILTERS);
    expect(task?.status).toBe(9);
  });
});

describe('notes serialization', () => {
  it('stores an empty list as null', () => {
    expect(serializeNotes([])).toBeNull();
  });

  it('stores notes as a JSON array', () => {
    expect(serializeNotes(['a', 'b'])).toBe('["a","b"]');
  });

  it('reads malformed JSON as empty', () => {
    expect(deserializeNotes('{not json')).toEqual([]);
  });

  it('drops non-string entries', () => {
    expect(deserializeNotes('["a", 2, "b"]')).toEqual(['a', 'b']);
  });
});
