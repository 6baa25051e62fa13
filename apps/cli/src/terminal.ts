/**
 * Host event loop: one consumer of terminal keys, full-frame redraw after
 * each event, until the app reaches its terminated state.
 */

import terminalKit from 'terminal-kit';
import type { App } from './app.js';
import type { InputEvent } from './table/keymap.js';

type Term = typeof terminalKit.terminal;

/** The drawing surface and key source the loop runs against */
export interface Screen {
  onKey(listener: (name: string) => void): void;
  onResize(listener: (columns: number, rows: number) => void): void;
  draw(frame: string): void;
  close(): void;
}

function setCursorVisible(term: Term, visible: boolean): void {
  term.hideCursor(!visible);
}

/** Take over the process terminal: alternate screen, hidden cursor, raw key input */
export function createTerminalScreen(term: Term = terminalKit.terminal): Screen {
  let keyListener: (name: string) => void = () => {};
  let resizeListener: (columns: number, rows: number) => void = () => {};

  const onKey = (name: string): void => {
    keyListener(name);
  };
  const onResize = (): void => {
    resizeListener(term.width, term.height);
  };

  term.fullscreen(true);
  setCursorVisible(term, false);
  term.grabInput(true);
  term.on('key', onKey);
  process.stdout.on('resize', onResize);

  return {
    onKey: listener => {
      keyListener = listener;
    },
    onResize: listener => {
      resizeListener = listener;
    },
    draw: frame => {
      term.moveTo(1, 1);
      term.eraseDisplayBelow();
      term.noFormat(frame);
    },
    close: () => {
      term.removeListener('key', onKey);
      process.stdout.removeListener('resize', onResize);
      term.grabInput(false);
      term.fullscreen(false);
      setCursorVisible(term, true);
      term.styleReset();
    },
  };
}

/** Resolves once the app terminates; the screen is closed before that */
export function runTerminal(app: App, screen: Screen): Promise<void> {
  return new Promise(resolve => {
    let done = false;

    const dispatch = (event: InputEvent): void => {
      if (done) return;
      if (app.update(event) === 'terminated') {
        done = true;
        screen.close();
        resolve();
        return;
      }
      screen.draw(app.view());
    };

    screen.onKey(name => dispatch({ type: 'key', key: name }));
    screen.onResize((columns, rows) => dispatch({ type: 'resize', columns, rows }));
    screen.draw(app.view());
  });
}
