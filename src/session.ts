// Session state for one move-selection round.
// The round loop in round.ts is the only code that mutates a Session.

/**
 * A legal move as listed by the game service
 */
export interface MoveOption {
  /** Identifier the user types to pick this move (unique within a round) */
  readonly id: string;
  /** Serialized game state after the move */
  readonly resultingState: string;
  /** Player to move after the move */
  readonly resultingPlayer: string;
}

/**
 * Preview of the move matching the typed prefix.
 * A ready preview is only valid while `renderedFor` equals the typed prefix.
 */
export type PreviewState =
  | { status: 'pending'; requestedFor: string }
  | { status: 'ready'; text: string; lineCount: number; renderedFor: string };

/**
 * Screen area bookkeeping, used to know how many rows to clear on redraw
 */
export interface RenderedRegion {
  startLine: number;
  lineCount: number;
}

export interface Session {
  readonly boardState: string;
  readonly currentPlayer: string;
  readonly legalMoves: readonly MoveOption[];
  typedPrefix: string;
  preview: PreviewState | null;
}

/**
 * Outcome of a round: the chosen move, or the user quit
 */
export type RoundOutcome = { kind: 'committed'; move: MoveOption } | { kind: 'quit' };

/**
 * Creates the session for a new round.
 * Throws if there is nothing to choose from or move ids collide.
 */
export function createSession(
  boardState: string,
  currentPlayer: string,
  legalMoves: readonly MoveOption[],
): Session {
  if (legalMoves.length === 0) {
    throw new Error('A round needs at least one legal move');
  }

  const seen = new Set<string>();
  for (const move of legalMoves) {
    if (seen.has(move.id)) {
      throw new Error(`Duplicate move id \`${move.id}\``);
    }
    seen.add(move.id);
  }

  return {
    boardState,
    currentPlayer,
    legalMoves,
    typedPrefix: '',
    preview: null,
  };
}

/**
 * Exact-match lookup of a move by id
 */
export function findMove(legalMoves: readonly MoveOption[], id: string): MoveOption | null {
  return legalMoves.find((move) => move.id === id) ?? null;
}

/**
 * Splits multi-line text into display lines.
 * A trailing newline terminates the last line rather than starting a new one.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}
