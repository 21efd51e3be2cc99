// Preview coordinator
// Turns typed prefixes into render requests and decides whether a reply is
// still worth drawing. Latest prefix wins: every request is tagged with the
// prefix it was issued for and compared against the current one on arrival.

import { type DebugLogger, silentLogger } from './debug-log.js';
import { RenderOracleError } from './errors.js';
import { findMove, type MoveOption, splitLines } from './session.js';

export type RenderFn = (boardState: string, signal?: AbortSignal) => Promise<string>;

/**
 * Settled render result. Replies never reject, so a superseded request that
 * fails is simply ignored.
 */
export type PreviewReply = { ok: true; text: string } | { ok: false; error: unknown };

export interface PendingPreview {
  /** Prefix snapshot the request was issued for */
  readonly requestedFor: string;
  readonly move: MoveOption;
  readonly reply: Promise<PreviewReply>;
}

export interface RenderedPreview {
  text: string;
  lineCount: number;
  renderedFor: string;
}

interface LiveRequest {
  pending: PendingPreview;
  controller: AbortController;
}

export class PreviewCoordinator {
  private live: LiveRequest | null = null;

  constructor(
    private readonly render: RenderFn,
    private readonly logger: DebugLogger = silentLogger,
  ) {}

  /** The request whose reply may still be drawn, if any */
  get pending(): PendingPreview | null {
    return this.live?.pending ?? null;
  }

  /**
   * Issues a render request if `prefix` is exactly a move id.
   * Whatever was live before is superseded either way.
   */
  maybeRequestPreview(prefix: string, legalMoves: readonly MoveOption[]): PendingPreview | null {
    this.supersede();

    const move = findMove(legalMoves, prefix);
    if (!move) {
      return null;
    }

    const controller = new AbortController();
    const reply = this.render(move.resultingState, controller.signal).then(
      (text): PreviewReply => ({ ok: true, text }),
      (error: unknown): PreviewReply => ({ ok: false, error }),
    );
    const pending: PendingPreview = { requestedFor: prefix, move, reply };
    this.live = { pending, controller };

    this.logger.log({ type: 'preview', text: `requested preview for \`${prefix}\`` });
    return pending;
  }

  /**
   * Drops the live request. Its HTTP call is aborted and whatever it
   * eventually produces is discarded.
   */
  supersede(): void {
    if (!this.live) return;
    const { pending, controller } = this.live;
    this.live = null;
    controller.abort();
    this.logger.log({ type: 'preview', text: `superseded preview for \`${pending.requestedFor}\`` });
  }

  /**
   * Validates a reply against the current prefix.
   * Returns the preview to draw, or null for a stale reply. Throws
   * RenderOracleError when the live request failed.
   */
  onReply(pending: PendingPreview, reply: PreviewReply, currentPrefix: string): RenderedPreview | null {
    const isLive = this.live?.pending === pending;
    if (!isLive || pending.requestedFor !== currentPrefix) {
      this.logger.log({
        type: 'preview',
        text: `dropped stale preview for \`${pending.requestedFor}\``,
        details: { currentPrefix },
      });
      return null;
    }

    this.live = null;

    if (!reply.ok) {
      throw new RenderOracleError(pending.requestedFor, { cause: reply.error });
    }

    return {
      text: reply.text,
      lineCount: splitLines(reply.text).length,
      renderedFor: pending.requestedFor,
    };
  }
}
