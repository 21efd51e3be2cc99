/**
 * Terminal cleanup
 *
 * Restores the terminal to a usable state when the client exits, on the
 * normal path as well as after a fatal error or a signal.
 */

import termKit from 'terminal-kit';

const term = termKit.terminal;

/**
 * Reset the terminal to cooked mode with a visible cursor.
 *
 * Unlike a fullscreen app the client draws inline, so the screen is left as
 * is and the cursor is moved below the last row that was drawn.
 */
export function restoreTerminal(lastRow?: number): void {
  // Release input grabbing
  term.grabInput(false);

  // Reset terminal styles
  term.styleReset();

  // Explicitly reset raw mode if it was set
  if (process.stdin.isTTY && process.stdin.setRawMode) {
    process.stdin.setRawMode(false);
  }

  if (lastRow !== undefined) {
    term.moveTo(1, lastRow + 1);
  }

  // Show cursor
  process.stdout.write('\x1b[?25h');
}
