// Game service client
// The rules live behind an HTTP service addressed as <base>/<command>/<state>

import { z } from 'zod';
import { type DebugLogger, silentLogger } from './debug-log.js';
import { GameServiceError } from './errors.js';
import type { MoveOption } from './session.js';

/**
 * One-character command codes understood by the service
 */
export const COMMANDS = {
  newGame: 'n',
  list: 'l',
  render: 'r',
  select: 's',
} as const;

export type CommandName = keyof typeof COMMANDS;

// ============================================================================
// Reply schemas
// ============================================================================

const FreshResponseSchema = z.object({
  command: z.string(),
  parsed_game_state: z.string(),
  player: z.string().min(1),
});

const MoveDescriptionSchema = z.object({
  move_id: z.string().min(1),
  next_board: z.string(),
  next_player: z.string(),
});

const ListMovesResponseSchema = z.object({
  command: z.string(),
  next_game_states: z.array(MoveDescriptionSchema).nullable(),
});

const RenderResponseSchema = z.object({
  command: z.string(),
  text: z.string(),
});

const SelectResponseSchema = z.object({
  command: z.string(),
  selected_move: z.tuple([z.string(), z.string()]).nullable(),
  victory: z.array(z.string()).nullable(),
});

// ============================================================================
// Client
// ============================================================================

export interface FreshGame {
  boardState: string;
  player: string;
}

export interface SelectedMove {
  moveId: string;
  /** Winning players when the move ends the game, null otherwise */
  victory: string[] | null;
}

export interface GameService {
  freshGame(): Promise<FreshGame>;
  listMoves(boardState: string): Promise<MoveOption[]>;
  /** Latency is unbounded and overlapping calls may complete in any order */
  render(boardState: string, signal?: AbortSignal): Promise<string>;
  selectMove(boardState: string): Promise<SelectedMove>;
}

export interface GameServiceOptions {
  fetch?: typeof fetch;
  logger?: DebugLogger;
}

/**
 * Builds the request URL for a command.
 * A trailing slash on the base is not doubled.
 */
export function commandUrl(baseUrl: string, command: CommandName, boardState = ''): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}${COMMANDS[command]}/${encodeURIComponent(boardState)}`;
}

export function createGameService(baseUrl: string, options: GameServiceOptions = {}): GameService {
  const fetchImpl = options.fetch ?? fetch;
  const logger = options.logger ?? silentLogger;

  async function ask<T>(
    command: CommandName,
    boardState: string,
    schema: z.ZodType<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const url = commandUrl(baseUrl, command, boardState);
    logger.log({ type: 'service', text: `${command} ${url}` });

    let response: Response;
    try {
      response = await fetchImpl(url, { signal });
    } catch (err) {
      throw new GameServiceError(command, err instanceof Error ? err.message : String(err), {
        url,
        cause: err,
      });
    }

    if (!response.ok) {
      throw new GameServiceError(command, `HTTP ${response.status} ${response.statusText}`, { url });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new GameServiceError(command, 'reply is not valid JSON', { url, cause: err });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new GameServiceError(command, `malformed reply${where}: ${issue?.message ?? 'unknown'}`, {
        url,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  return {
    async freshGame() {
      const reply = await ask('newGame', '', FreshResponseSchema);
      return { boardState: reply.parsed_game_state, player: reply.player };
    },

    async listMoves(boardState) {
      const reply = await ask('list', boardState, ListMovesResponseSchema);
      return (reply.next_game_states ?? []).map((desc) => ({
        id: desc.move_id,
        resultingState: desc.next_board,
        resultingPlayer: desc.next_player,
      }));
    },

    async render(boardState, signal) {
      const reply = await ask('render', boardState, RenderResponseSchema, signal);
      return reply.text;
    },

    async selectMove(boardState) {
      const reply = await ask('select', boardState, SelectResponseSchema);
      if (!reply.selected_move) {
        throw new GameServiceError('select', 'service did not select a move', {
          url: commandUrl(baseUrl, 'select', boardState),
        });
      }
      return { moveId: reply.selected_move[0], victory: reply.victory };
    },
  };
}
