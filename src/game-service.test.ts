import { beforeEach, describe, expect, it, vi } from 'vitest';
import { GameServiceError } from './errors.js';
import { commandUrl, createGameService } from './game-service.js';

const BASE_URL = 'http://localhost:9000/tictactoe';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/json' },
    ...init,
  });
}

describe('game-service', () => {
  describe('commandUrl', () => {
    it('should append the command and the state', () => {
      expect(commandUrl(BASE_URL, 'render', 'X---O----')).toBe(
        'http://localhost:9000/tictactoe/r/X---O----',
      );
    });

    it('should not double a trailing slash', () => {
      expect(commandUrl(`${BASE_URL}/`, 'list', '---------')).toBe(
        'http://localhost:9000/tictactoe/l/---------',
      );
    });

    it('should leave the state empty for a new game', () => {
      expect(commandUrl(BASE_URL, 'newGame')).toBe('http://localhost:9000/tictactoe/n/');
    });
  });

  describe('createGameService', () => {
    const fetchMock = vi.fn(
      (..._args: Parameters<typeof fetch>): ReturnType<typeof fetch> =>
        Promise.reject(new Error('unexpected fetch')),
    );

    beforeEach(() => {
      fetchMock.mockReset();
    });

    it('should start a fresh game', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ command: 'new-game', parsed_game_state: '---------', player: 'X' }),
      );
      const service = createGameService(BASE_URL, { fetch: fetchMock });

      await expect(service.freshGame()).resolves.toEqual({ boardState: '---------', player: 'X' });
      expect(fetchMock).toHaveBeenCalledWith('http://localhost:9000/tictactoe/n/', {
        signal: undefined,
      });
    });

    it('should list moves in service order', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          command: 'list',
          next_game_states: [
            { move_id: '2', next_board: '-X-------', next_player: 'O' },
            { move_id: '1', next_board: 'X--------', next_player: 'O' },
          ],
        }),
      );
      const service = createGameService(BASE_URL, { fetch: fetchMock });

      await expect(service.listMoves('---------')).resolves.toEqual([
        { id: '2', resultingState: '-X-------', resultingPlayer: 'O' },
        { id: '1', resultingState: 'X--------', resultingPlayer: 'O' },
      ]);
    });

    it('should treat a missing move list as no moves', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ command: 'list', next_game_states: null }));
      const service = createGameService(BASE_URL, { fetch: fetchMock });

      await expect(service.listMoves('XOXXOOOXX')).resolves.toEqual([]);
    });

    it('should render a state and pass the abort signal on', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ command: 'render-to-text', text: ' X |   \n' }));
      const service = createGameService(BASE_URL, { fetch: fetchMock });
      const controller = new AbortController();

      await expect(service.render('X--------', controller.signal)).resolves.toBe(' X |   \n');
      expect(fetchMock).toHaveBeenCalledWith('http://localhost:9000/tictactoe/r/X--------', {
        signal: controller.signal,
      });
    });

    it('should return the move selected by the service', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ command: 'select', selected_move: ['5', '----X----'], victory: null }),
      );
      const service = createGameService(BASE_URL, { fetch: fetchMock });

      await expect(service.selectMove('---------')).resolves.toEqual({ moveId: '5', victory: null });
    });

    it('should reject a select reply without a move', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ command: 'select', selected_move: null, victory: null }),
      );
      const service = createGameService(BASE_URL, { fetch: fetchMock });

      await expect(service.selectMove('XOXXOOOXX')).rejects.toThrow(
        'select request to http://localhost:9000/tictactoe/s/XOXXOOOXX failed: service did not select a move',
      );
    });

    it('should reject a malformed reply', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          command: 'list',
          next_game_states: [{ next_board: 'X--------', next_player: 'O' }],
        }),
      );
      const service = createGameService(BASE_URL, { fetch: fetchMock });

      const error = await service.listMoves('---------').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(GameServiceError);
      expect(error).toHaveProperty('command', 'list');
      expect(error).toHaveProperty(
        'message',
        'list request to http://localhost:9000/tictactoe/l/--------- failed: malformed reply at next_game_states.0.move_id: Required',
      );
    });

    it('should reject a reply that is not JSON', async () => {
      fetchMock.mockResolvedValue(new Response('<html>', { status: 200 }));
      const service = createGameService(BASE_URL, { fetch: fetchMock });

      await expect(service.render('---------')).rejects.toThrow('reply is not valid JSON');
    });

    it('should reject an HTTP error status', async () => {
      fetchMock.mockResolvedValue(
        new Response('oops', { status: 502, statusText: 'Bad Gateway' }),
      );
      const service = createGameService(BASE_URL, { fetch: fetchMock });

      await expect(service.render('---------')).rejects.toThrow(
        'render request to http://localhost:9000/tictactoe/r/--------- failed: HTTP 502 Bad Gateway',
      );
    });

    it('should wrap network failures', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const service = createGameService(BASE_URL, { fetch: fetchMock });

      const error = await service.freshGame().catch((err: unknown) => err);
      expect(error).toBeInstanceOf(GameServiceError);
      expect(error).toHaveProperty(
        'message',
        'newGame request to http://localhost:9000/tictactoe/n/ failed: fetch failed',
      );
    });
  });
});
