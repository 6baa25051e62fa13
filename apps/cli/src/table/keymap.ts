export const Action = {
  MoveUp: 'move-up',
  MoveDown: 'move-down',
  ToggleHeader: 'toggle-header',
  Quit: 'quit',
  Unhandled: 'unhandled',
} as const;

export type Action = (typeof Action)[keyof typeof Action];

export type BoundAction = Exclude<Action, typeof Action.Unhandled>;

/**
 * One event from the terminal. Keys use terminal-kit names:
 * printable characters as typed, `UP`/`DOWN` for arrows, `CTRL_<KEY>` for chords.
 */
export type InputEvent =
  | { readonly type: 'key'; readonly key: string }
  | { readonly type: 'resize'; readonly columns: number; readonly rows: number };

export type KeyMap = ReadonlyMap<string, BoundAction>;

const BOUND_ACTIONS: readonly BoundAction[] = [
  Action.MoveUp, Action.MoveDown, Action.ToggleHeader, Action.Quit,
];

export function createKeyMap(bindings: Partial<Record<BoundAction, readonly string[]>>): KeyMap {
  const map = new Map<string, BoundAction>();
  for (const action of BOUND_ACTIONS) {
    for (const key of bindings[action] ?? []) map.set(key, action);
  }
  return map;
}

export function resolveAction(keyMap: KeyMap, event: InputEvent): Action {
  if (event.type !== 'key') return Action.Unhandled;
  return keyMap.get(event.key) ?? Action.Unhandled;
}

export const TABLE_KEYS: KeyMap = createKeyMap({
  [Action.MoveDown]: ['j', 'DOWN', 's'],
  [Action.MoveUp]: ['k', 'UP', 'w'],
});

export const APP_KEYS: KeyMap = createKeyMap({
  [Action.Quit]: ['q', 'CTRL_C'],
  [Action.ToggleHeader]: ['h'],
});
