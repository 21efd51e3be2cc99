/**
 * Line-region renderer
 *
 * Stateless helpers that redraw a range of rows without touching anything
 * else on screen. Callers keep a RenderedRegion per screen area and hand it
 * back on the next redraw so the old extent is cleared in full, whatever the
 * height of the new content.
 */

import { type RenderedRegion, splitLines } from '../session.js';
import { LEFT_COLUMN } from './constants.js';
import type { TerminalHandle } from './terminal.js';

/**
 * Erase `count` rows starting at `startLine`
 */
export function clearLines(terminal: TerminalHandle, startLine: number, count: number): void {
  for (let i = 0; i < count; i++) {
    terminal.moveTo(LEFT_COLUMN, startLine + i);
    terminal.eraseLine();
  }
}

/**
 * Replace one row with `text`
 */
export function drawLine(terminal: TerminalHandle, line: number, text: string): void {
  terminal.moveTo(LEFT_COLUMN, line);
  terminal.eraseLine();
  terminal.write(text);
}

/**
 * Draw each line of `text` from `startLine`, erasing every row first.
 * Leaves the cursor at the end of the last line written.
 */
export function drawBlock(terminal: TerminalHandle, startLine: number, text: string): RenderedRegion {
  const lines = splitLines(text);
  lines.forEach((line, idx) => {
    drawLine(terminal, startLine + idx, line);
  });
  return { startLine, lineCount: lines.length };
}

/**
 * Redraw a region in place of its previous content.
 *
 * Clears the previous extent, draws `newText` at the same start line and puts
 * the cursor back where it was, so typing on the query row is not disturbed.
 */
export function repaint(
  terminal: TerminalHandle,
  previous: RenderedRegion,
  newText: string,
): RenderedRegion {
  terminal.saveCursor();
  clearLines(terminal, previous.startLine, previous.lineCount);
  const region = drawBlock(terminal, previous.startLine, newText);
  terminal.restoreCursor();
  return region;
}
