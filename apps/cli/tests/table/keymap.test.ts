import { describe, it, expect } from 'vitest';
import {
  Action,
  APP_KEYS,
  TABLE_KEYS,
  createKeyMap,
  resolveAction,
} from '../../src/table/keymap.js';

const key = (k: string) => ({ type: 'key', key: k }) as const;

describe('TABLE_KEYS', () => {
  it.each(['j', 'DOWN', 's'])('maps %s to move-down', k => {
    expect(resolveAction(TABLE_KEYS, key(k))).toBe(Action.MoveDown);
  });

  it.each(['k', 'UP', 'w'])('maps %s to move-up', k => {
    expect(resolveAction(TABLE_KEYS, key(k))).toBe(Action.MoveUp);
  });

  it('does not bind app keys', () => {
    expect(resolveAction(TABLE_KEYS, key('q'))).toBe(Action.Unhandled);
  });
});

describe('APP_KEYS', () => {
  it.each(['q', 'CTRL_C'])('maps %s to quit', k => {
    expect(resolveAction(APP_KEYS, key(k))).toBe(Action.Quit);
  });

  it('maps h to toggle-header', () => {
    expect(resolveAction(APP_KEYS, key('h'))).toBe(Action.ToggleHeader);
  });

  it('leaves other keys unhandled', () => {
    expect(resolveAction(APP_KEYS, key('x'))).toBe(Action.Unhandled);
    expect(resolveAction(APP_KEYS, key('H'))).toBe(Action.Unhandled);
  });
});

describe('resolveAction', () => {
  it('leaves resize events unhandled', () => {
    expect(resolveAction(APP_KEYS, { type: 'resize', columns: 80, rows: 24 })).toBe(Action.Unhandled);
  });
});

describe('createKeyMap', () => {
  it('binds several keys to one action', () => {
    const keys = createKeyMap({ [Action.Quit]: ['x', 'ESCAPE'] });
    expect(resolveAction(keys, key('x'))).toBe(Action.Quit);
    expect(resolveAction(keys, key('ESCAPE'))).toBe(Action.Quit);
    expect(resolveAction(keys, key('q'))).toBe(Action.Unhandled);
  });
});
