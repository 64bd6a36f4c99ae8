import type { Board, Color, Move } from '../chessTypes';

/**
 * AI boundary types.
 *
 * Keep these types UI-agnostic and JSON-serializable.
 */

export type AiConfig = {
  /** Optional seed to make tie-breaks reproducible in tests. */
  seed?: number;
};

export type AiMoveRequest = {
  /**
   * Snapshot of the board at the time the move was requested.
   * AI must treat this as immutable.
   */
  board: Board;
  /** Which side the AI is playing for this request. */
  aiColor: Color;
  config: AiConfig;
};

export type AiMoveMetadata = {
  timeMs?: number;
  /** Number of candidate moves evaluated. */
  nodes?: number;
  /** Evaluation of the chosen move (material + capture bonus). */
  score?: number;
  /** How many candidates shared the best score. */
  tiedMoves?: number;
};

export type AiMoveResult = {
  move: Move;
  meta?: AiMoveMetadata;
};

export interface ChessAi {
  /**
   * Compute a move for the provided snapshot.
   *
   * Returns null when the side has no move at all; the caller decides what that means.
   */
  getMove(request: AiMoveRequest): AiMoveResult | null;
}
