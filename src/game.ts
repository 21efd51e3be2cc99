// Game loop
// Starts a fresh game and plays rounds until no move is left, the service
// reports a winner for a computer move, or the user quits.

import { type DebugLogger, silentLogger } from './debug-log.js';
import { GameServiceError } from './errors.js';
import type { GameService } from './game-service.js';
import { type RoundLayout, runRound } from './round.js';
import { createSession, findMove } from './session.js';
import { drawBlock } from './tui/renderer.js';
import type { TerminalHandle } from './tui/terminal.js';

export interface PlayGameDeps {
  service: GameService;
  terminal: TerminalHandle;
  /** Player the service moves for, null when every player is human */
  computerPlayer?: string | null;
  logger?: DebugLogger;
}

export type GameResult =
  | { kind: 'over'; boardState: string; winners: string[] | null; lastRow: number }
  | { kind: 'quit'; boardState: string; lastRow: number };

export async function playGame(deps: PlayGameDeps): Promise<GameResult> {
  const { service, terminal } = deps;
  const logger = deps.logger ?? silentLogger;
  const computerPlayer = deps.computerPlayer ?? null;

  let { boardState, player } = await service.freshGame();
  let lastRow = 0;
  const trackLayout = (layout: RoundLayout) => {
    lastRow = Math.max(lastRow, layout.queryLine);
  };

  // Last computer move, shown on the status row of the next round
  let notice: string | undefined;

  terminal.clearScreen();

  async function finish(winners: string[] | null): Promise<GameResult> {
    terminal.clearScreen();
    const region = drawBlock(terminal, 1, await service.render(boardState));
    return { kind: 'over', boardState, winners, lastRow: region.startLine + region.lineCount - 1 };
  }

  for (;;) {
    const moves = await service.listMoves(boardState);
    if (moves.length === 0) {
      logger.log({ type: 'system', text: 'no moves left' });
      return finish(null);
    }

    if (player === computerPlayer) {
      const selected = await service.selectMove(boardState);
      const move = findMove(moves, selected.moveId);
      if (!move) {
        throw new GameServiceError('select', `selected move \`${selected.moveId}\` is not a legal move`);
      }
      notice = `${player} plays ${move.id}`;
      logger.log({ type: 'system', text: `${player} (computer) plays ${move.id}` });
      boardState = move.resultingState;
      player = move.resultingPlayer;
      if (selected.victory) {
        return finish(selected.victory);
      }
      continue;
    }

    const session = createSession(boardState, player, moves);
    const outcome = await runRound(session, {
      terminal,
      render: (state, signal) => service.render(state, signal),
      logger,
      notice,
      onLayout: trackLayout,
    });
    notice = undefined;

    if (outcome.kind === 'quit') {
      return { kind: 'quit', boardState, lastRow };
    }

    boardState = outcome.move.resultingState;
    player = outcome.move.resultingPlayer;
  }
}

/**
 * One-line summary printed after the terminal is restored
 */
export function resultMessage(result: GameResult): string {
  if (result.kind === 'quit') {
    return `Game left at ${result.boardState}`;
  }
  if (result.winners === null) {
    return 'Game over';
  }
  if (result.winners.length === 0) {
    return 'Game over: draw';
  }
  return `Game over: ${result.winners.join(', ')} wins`;
}
