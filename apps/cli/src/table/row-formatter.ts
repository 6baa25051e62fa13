/**
 * Turns a Task into the strings shown in each table column.
 *
 * Due dates closer than a day, or already past, read better as relative
 * phrases ("in 6 hours", "2 days ago"); overdue ones carry `danger` emphasis.
 * Due exactly now counts as overdue.
 */

import { format, formatDistanceStrict, isValid } from 'date-fns';
import type { Task } from '@tsk/core';
import { TaskStatusName, TaskPriorityName } from '@tsk/core';
import { ColumnKey } from './columns.js';
import { textCell, type Cell, type DisplayRow } from './row.js';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';
export const UNKNOWN = 'unknown';
export const NOTE_SEPARATOR = ' ↵ ';

const DAY_MS = 24 * 60 * 60 * 1000;

export function formatTimestamp(date: Date): string {
  return isValid(date) ? format(date, TIMESTAMP_FORMAT) : UNKNOWN;
}

/** Humanized distance from `now`, e.g. "in 3 hours" or "5 minutes ago" */
export function formatRelative(date: Date, now: Date): string {
  return formatDistanceStrict(date, now, { addSuffix: true });
}

export function formatDue(due: Date | null, now: Date): Cell {
  if (due === null) return textCell('', null);
  if (!isValid(due)) return textCell(UNKNOWN, null);

  const sortValue = due.getTime();
  const untilDue = sortValue - now.getTime();

  if (untilDue > 0) {
    const text = untilDue < DAY_MS ? formatRelative(due, now) : formatTimestamp(due);
    return textCell(text, sortValue);
  }

  return { text: formatRelative(due, now), emphasis: 'danger', sortValue };
}

export function statusLabel(status: number): string {
  return TaskStatusName[status] ?? UNKNOWN;
}

export function priorityLabel(priority: number): string {
  return TaskPriorityName[priority] ?? UNKNOWN;
}

export function formatTaskRow(task: Task, now: Date): DisplayRow {
  const created = task.createdAt.getTime();

  return {
    [ColumnKey.Id]: textCell(String(task.id), task.id),
    [ColumnKey.Title]: textCell(task.title),
    [ColumnKey.Status]: textCell(statusLabel(task.status)),
    [ColumnKey.Priority]: textCell(priorityLabel(task.priority)),
    [ColumnKey.Created]: textCell(formatTimestamp(task.createdAt), Number.isNaN(created) ? null : created),
    [ColumnKey.DueDate]: formatDue(task.due, now),
    [ColumnKey.Notes]: textCell(task.notes.join(NOTE_SEPARATOR)),
  };
}
