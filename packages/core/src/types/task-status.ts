export const TaskStatus = {
  /** Unset; also means "no restriction" in filters */
  None: 0,
  Todo: 1,
  Doing: 2,
  Done: 3,
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Display names; values missing here (corrupt rows) have none */
export const TaskStatusName: Readonly<Record<number, string>> = {
  [TaskStatus.None]: '',
  [TaskStatus.Todo]: 'todo',
  [TaskStatus.Doing]: 'doing',
  [TaskStatus.Done]: 'done',
};
