import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { DebugLogEntry, DebugLogger } from './debug-log.js';
import { RenderOracleError } from './errors.js';
import { PreviewCoordinator } from './preview-coordinator.js';
import type { MoveOption } from './session.js';
import { type Deferred, deferred } from './testing/fake-terminal.js';

const MOVES: MoveOption[] = [
  { id: '1', resultingState: 'X--', resultingPlayer: 'O' },
  { id: '10', resultingState: 'X-X', resultingPlayer: 'O' },
];

describe('PreviewCoordinator', () => {
  let replies: Map<string, Deferred<string>>;
  let signals: Map<string, AbortSignal | undefined>;
  let entries: DebugLogEntry[];
  let coordinator: PreviewCoordinator;

  beforeEach(() => {
    replies = new Map();
    signals = new Map();
    entries = [];
    const render = vi.fn((state: string, signal?: AbortSignal) => {
      const reply = deferred<string>();
      replies.set(state, reply);
      signals.set(state, signal);
      return reply.promise;
    });
    const logger: DebugLogger = { log: (entry) => entries.push(entry) };
    coordinator = new PreviewCoordinator(render, logger);
  });

  describe('maybeRequestPreview', () => {
    it('should request a preview for an exact match only', () => {
      const pending = coordinator.maybeRequestPreview('1', MOVES);

      expect(pending?.requestedFor).toBe('1');
      expect(pending?.move).toBe(MOVES[0]);
      expect([...replies.keys()]).toEqual(['X--']);
      expect(coordinator.pending).toBe(pending);
    });

    it('should not request anything for a partial or unknown prefix', () => {
      expect(coordinator.maybeRequestPreview('0', MOVES)).toBeNull();
      expect(coordinator.maybeRequestPreview('', MOVES)).toBeNull();
      expect(coordinator.maybeRequestPreview('100', MOVES)).toBeNull();
      expect(replies.size).toBe(0);
    });

    it('should supersede the previous request', () => {
      coordinator.maybeRequestPreview('1', MOVES);
      const second = coordinator.maybeRequestPreview('10', MOVES);

      expect(signals.get('X--')?.aborted).toBe(true);
      expect(signals.get('X-X')?.aborted).toBe(false);
      expect(coordinator.pending).toBe(second);
    });

    it('should supersede the previous request even without a new match', () => {
      coordinator.maybeRequestPreview('1', MOVES);
      coordinator.maybeRequestPreview('19', MOVES);

      expect(signals.get('X--')?.aborted).toBe(true);
      expect(coordinator.pending).toBeNull();
    });
  });

  describe('onReply', () => {
    it('should accept the reply for the current prefix', async () => {
      const pending = coordinator.maybeRequestPreview('1', MOVES);
      if (!pending) throw new Error('expected a request');
      replies.get('X--')?.resolve(' X |   \n---+---\n');

      const reply = await pending.reply;
      expect(coordinator.onReply(pending, reply, '1')).toEqual({
        text: ' X |   \n---+---\n',
        lineCount: 2,
        renderedFor: '1',
      });
      expect(coordinator.pending).toBeNull();
    });

    it('should drop a reply for an abandoned prefix', async () => {
      const pending = coordinator.maybeRequestPreview('1', MOVES);
      if (!pending) throw new Error('expected a request');
      replies.get('X--')?.resolve('late\n');

      const reply = await pending.reply;
      expect(coordinator.onReply(pending, reply, '10')).toBeNull();
      expect(entries.at(-1)?.text).toBe('dropped stale preview for `1`');
    });

    it('should drop a reply for a superseded request', async () => {
      const first = coordinator.maybeRequestPreview('1', MOVES);
      if (!first) throw new Error('expected a request');
      coordinator.supersede();
      replies.get('X--')?.resolve('late\n');

      const reply = await first.reply;
      expect(coordinator.onReply(first, reply, '1')).toBeNull();
    });

    it('should settle a failed render instead of rejecting', async () => {
      const pending = coordinator.maybeRequestPreview('1', MOVES);
      if (!pending) throw new Error('expected a request');
      const error = new Error('timeout');
      replies.get('X--')?.reject(error);

      await expect(pending.reply).resolves.toEqual({ ok: false, error });
    });

    it('should throw when the current request failed', async () => {
      const pending = coordinator.maybeRequestPreview('1', MOVES);
      if (!pending) throw new Error('expected a request');
      replies.get('X--')?.reject(new Error('timeout'));

      const reply = await pending.reply;
      expect(() => coordinator.onReply(pending, reply, '1')).toThrow(RenderOracleError);
      expect(() => coordinator.onReply(pending, reply, '1')).not.toThrow();
    });

    it('should not treat a failed stale request as an error', async () => {
      const pending = coordinator.maybeRequestPreview('1', MOVES);
      if (!pending) throw new Error('expected a request');
      coordinator.maybeRequestPreview('10', MOVES);
      replies.get('X--')?.reject(new Error('aborted'));

      const reply = await pending.reply;
      expect(coordinator.onReply(pending, reply, '10')).toBeNull();
    });
  });
});
