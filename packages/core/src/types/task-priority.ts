export const TaskPriority = {
  /** Unset; also means "no restriction" in filters */
  None: 0,
  Low: 1,
  Medium: 2,
  High: 3,
} as const;

export type TaskPriority = (typeof TaskPriority)[keyof typeof TaskPriority];

export const TaskPriorityName: Readonly<Record<number, string>> = {
  [TaskPriority.None]: '',
  [TaskPriority.Low]: 'low',
  [TaskPriority.Medium]: 'medium',
  [TaskPriority.High]: 'high',
};
