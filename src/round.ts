// Round state machine
// One move-selection round: draws the board and the move list, then loops on
// whichever comes first of the next key and the pending preview reply until
// the user commits a move or quits.

import { type DebugLogger, silentLogger } from './debug-log.js';
import {
  type PendingPreview,
  PreviewCoordinator,
  type PreviewReply,
  type RenderFn,
} from './preview-coordinator.js';
import { findMove, type MoveOption, type RenderedRegion, type RoundOutcome, type Session } from './session.js';
import {
  BACKSPACE_KEYS,
  ENTER_KEYS,
  QUERY_PROMPT,
  QUIT_KEYS,
  RESET,
  YELLOW,
} from './tui/constants.js';
import { clearLines, drawBlock, drawLine, repaint } from './tui/renderer.js';
import type { TerminalHandle } from './tui/terminal.js';

// ============================================================================
// Types
// ============================================================================

export interface RoundDeps {
  terminal: TerminalHandle;
  render: RenderFn;
  logger?: DebugLogger;
  /** Shown ahead of the move list, e.g. the opponent's last move */
  notice?: string;
  /** Called once the board is drawn and the rows of the round are known */
  onLayout?: (layout: RoundLayout) => void;
}

/**
 * Rows used by a round (1-based). The preview region grows downwards from
 * `previewStart`.
 */
export interface RoundLayout {
  board: RenderedRegion;
  statusLine: number;
  queryLine: number;
  previewStart: number;
}

type RoundEvent =
  | { kind: 'key'; key: string }
  | { kind: 'preview'; pending: PendingPreview; reply: PreviewReply };

// ============================================================================
// Helpers
// ============================================================================

export function roundLayout(board: RenderedRegion): RoundLayout {
  const statusLine = board.startLine + board.lineCount;
  return {
    board,
    statusLine,
    queryLine: statusLine + 1,
    previewStart: statusLine + 2,
  };
}

export function statusText(player: string, legalMoves: readonly MoveOption[], notice?: string): string {
  const moves = `${player} moves: ${legalMoves.map((move) => `${move.id} `).join('')}`;
  return notice ? `${notice}. ${moves}` : moves;
}

export function invalidSelectionMessage(prefix: string, moveCount: number): string {
  return `You typed \`${prefix}\`; but you need to select one of the ${moveCount} moves listed above`;
}

/**
 * Characters that may be typed into a prefix: digits and anything that
 * appears in a move id
 */
export function prefixCharacters(legalMoves: readonly MoveOption[]): Set<string> {
  const chars = new Set('0123456789');
  for (const move of legalMoves) {
    for (const ch of move.id) {
      chars.add(ch);
    }
  }
  return chars;
}

/**
 * Applies an editing key to the prefix.
 * Returns null when the key does not change the prefix.
 */
export function applyEditKey(prefix: string, key: string, accepted: ReadonlySet<string>): string | null {
  if (BACKSPACE_KEYS.has(key)) {
    return prefix.length > 0 ? prefix.slice(0, -1) : null;
  }
  if (key.length === 1 && accepted.has(key)) {
    return prefix + key;
  }
  return null;
}

function nextEvent(keyWait: Promise<string>, pending: PendingPreview | null): Promise<RoundEvent> {
  const keyEvent = keyWait.then((key): RoundEvent => ({ kind: 'key', key }));
  if (!pending) {
    return keyEvent;
  }
  const previewEvent = pending.reply.then(
    (reply): RoundEvent => ({ kind: 'preview', pending, reply }),
  );
  return Promise.race([keyEvent, previewEvent]);
}

// ============================================================================
// Round
// ============================================================================

/**
 * Runs one round until the user commits a move or quits.
 * The board is never changed here; the caller applies a committed move.
 */
export async function runRound(session: Session, deps: RoundDeps): Promise<RoundOutcome> {
  const { terminal } = deps;
  const logger = deps.logger ?? silentLogger;
  const coordinator = new PreviewCoordinator(deps.render, logger);
  const accepted = prefixCharacters(session.legalMoves);

  const boardText = await deps.render(session.boardState);
  const layout = roundLayout(drawBlock(terminal, 1, boardText));
  deps.onLayout?.(layout);
  const status = statusText(session.currentPlayer, session.legalMoves, deps.notice);
  drawLine(terminal, layout.statusLine, status);

  let previewRegion: RenderedRegion = { startLine: layout.previewStart, lineCount: 0 };
  // Messages go below the tallest preview seen this round so a later,
  // shorter preview cannot leave them half covered
  let maxPreviewLines = 0;
  let messageLine: number | null = null;
  let keyWait: Promise<string> | null = null;

  function discardPreview(): void {
    clearLines(terminal, previewRegion.startLine, previewRegion.lineCount);
    previewRegion = { startLine: layout.previewStart, lineCount: 0 };
    session.preview = null;
    coordinator.supersede();
  }

  function clearRoundArtifacts(): void {
    discardPreview();
    if (messageLine !== null) {
      clearLines(terminal, messageLine, 1);
      messageLine = null;
    }
  }

  logger.log({
    type: 'round',
    text: `round started for ${session.currentPlayer}`,
    details: { boardState: session.boardState, moves: session.legalMoves.map((m) => m.id) },
  });

  try {
    for (;;) {
      // Don't put a space after the prefix; the user may still extend it
      drawLine(terminal, layout.queryLine, `${QUERY_PROMPT}${session.typedPrefix}`);

      // A key wait that lost the race to a preview stays outstanding
      keyWait ??= terminal.nextKey();
      const event = await nextEvent(keyWait, coordinator.pending);

      if (event.kind === 'preview') {
        const rendered = coordinator.onReply(event.pending, event.reply, session.typedPrefix);
        if (rendered) {
          previewRegion = repaint(terminal, previewRegion, rendered.text);
          maxPreviewLines = Math.max(maxPreviewLines, previewRegion.lineCount);
          session.preview = { status: 'ready', ...rendered };
        }
        continue;
      }

      keyWait = null;
      const { key } = event;
      logger.log({ type: 'key', text: key, details: { prefix: session.typedPrefix } });

      if (QUIT_KEYS.has(key)) {
        clearRoundArtifacts();
        return { kind: 'quit' };
      }

      if (ENTER_KEYS.has(key)) {
        const move = findMove(session.legalMoves, session.typedPrefix);
        if (move) {
          clearRoundArtifacts();
          logger.log({ type: 'round', text: `committed move ${move.id}` });
          return { kind: 'committed', move };
        }

        drawLine(terminal, layout.statusLine, status);
        const line = layout.queryLine + maxPreviewLines + 1;
        if (messageLine !== null && messageLine !== line) {
          clearLines(terminal, messageLine, 1);
        }
        messageLine = line;
        drawLine(
          terminal,
          messageLine,
          `${YELLOW}${invalidSelectionMessage(session.typedPrefix, session.legalMoves.length)}${RESET}`,
        );
        continue;
      }

      const nextPrefix = applyEditKey(session.typedPrefix, key, accepted);
      if (nextPrefix === null) {
        continue;
      }

      session.typedPrefix = nextPrefix;
      discardPreview();
      const pending = coordinator.maybeRequestPreview(session.typedPrefix, session.legalMoves);
      if (pending) {
        session.preview = { status: 'pending', requestedFor: pending.requestedFor };
      }
    }
  } finally {
    terminal.cancelKeyWait();
    coordinator.supersede();
  }
}
