/**
 * Terminal handle
 *
 * The single owner of terminal output and keyboard input for a session.
 * Raw input is only grabbed while a key wait is outstanding, so the terminal
 * sits in cooked mode whenever the client is drawing or talking to the
 * service.
 */

import type { Terminal } from 'terminal-kit';
import { TerminalError } from '../errors.js';

/**
 * Drawing and input surface used by the renderer and the round loop.
 * Rows and columns are 1-based, like terminal-kit's.
 */
export interface TerminalHandle {
  clearScreen(): void;
  moveTo(x: number, y: number): void;
  /** Erase the row the cursor is on */
  eraseLine(): void;
  saveCursor(): void;
  restoreCursor(): void;
  write(text: string): void;
  /**
   * Wait for one key. Keys that arrived since the last wait are delivered
   * first, in order. Otherwise raw mode is entered when the wait starts and
   * left as soon as the key arrives. Only one wait may be outstanding.
   */
  nextKey(): Promise<string>;
  /** Abandon an outstanding key wait (leaves raw mode); no-op otherwise */
  cancelKeyWait(): void;
  /** Leave raw mode and drop every listener; the handle is unusable after */
  release(): void;
}

/**
 * Creates a TerminalHandle backed by a terminal-kit terminal
 */
export function createTerminalHandle(
  term: Terminal,
  output: NodeJS.WritableStream = process.stdout,
): TerminalHandle {
  // One listener for the life of the handle: terminal-kit emits every key of
  // a stdin chunk synchronously, and keys past the first must not be lost
  const queued: string[] = [];
  let waiter: ((name: string) => void) | null = null;
  let listening = false;
  let released = false;

  function onKey(name: string): void {
    if (waiter) {
      const resolve = waiter;
      waiter = null;
      term.grabInput(false);
      resolve(name);
    } else {
      queued.push(name);
    }
  }

  function nextKey(): Promise<string> {
    if (released) {
      return Promise.reject(new TerminalError('Terminal handle already released'));
    }
    if (waiter) {
      return Promise.reject(new TerminalError('A key wait is already outstanding'));
    }

    const next = queued.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    return new Promise<string>((resolve, reject) => {
      try {
        term.grabInput(true);
      } catch (err) {
        reject(new TerminalError('Unable to enter raw input mode', { cause: err }));
        return;
      }
      if (!listening) {
        term.on('key', onKey);
        listening = true;
      }
      waiter = resolve;
    });
  }

  return {
    clearScreen() {
      term.clear();
    },
    moveTo(x, y) {
      term.moveTo(x, y);
    },
    eraseLine() {
      term.eraseLine();
    },
    saveCursor() {
      term.saveCursor();
    },
    restoreCursor() {
      term.restoreCursor();
    },
    write(text) {
      output.write(text);
    },
    nextKey,
    cancelKeyWait() {
      if (waiter) {
        waiter = null;
        term.grabInput(false);
      }
    },
    release() {
      if (released) return;
      released = true;
      waiter = null;
      queued.length = 0;
      // The handle owns the terminal, so no other key listener exists
      term.removeAllListeners('key');
      listening = false;
      term.grabInput(false);
    },
  };
}
