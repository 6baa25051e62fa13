import type { Task } from '../types/task.js';
import type { tasks } from '../schema/tasks.js';

/** Serialize notes to JSON for storage, or null if empty */
export function serializeNotes(notes: readonly string[]): string | null {
  if (notes.length === 0) return null;
  return JSON.stringify(notes);
}

/** Deserialize notes from JSON; empty for NULL or malformed values */
export function deserializeNotes(json: string | null): string[] {
  if (!json) return [];
  try {
    const arr: unknown = JSON.parse(json);
    if (Array.isArray(arr)) return arr.filter((n): n is string => typeof n === 'string');
    return [];
  } catch {
    return [];
  }
}

/** Map a Drizzle row to a Task */
export function toTask(row: typeof tasks.$inferSelect): Task {
  return {
    id: row.id,
    title: row.title,
    status: row.status,
    priority: row.priority,
    createdAt: new Date(row.createdAt),
    due: row.due ? new Date(row.due) : null,
    notes: deserializeNotes(row.notes),
  };
}
