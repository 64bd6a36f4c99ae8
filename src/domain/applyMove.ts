import type { Board, Move, Piece } from './chessTypes';
import { getPiece, setPiece } from './board';

function promotionRank(moving: Piece): number {
  return moving.color === 'w' ? 0 : 7;
}

function isPromotionMove(moving: Piece, move: Move): boolean {
  return moving.type === 'p' && move.to.rank === promotionRank(moving);
}

/**
 * Apply a move to the board in place.
 *
 * Assumptions:
 * - The caller provides a pseudo-legal move (typically from `generateMoves`).
 * - Whatever occupies `to` is overwritten, which is how captures happen.
 * - A pawn reaching the far rank becomes `move.promotion`, or a queen when none is given.
 *   The promotion type is taken as-is.
 *
 * Moving from an empty square leaves the board untouched.
 */
export function applyMove(board: Board, move: Move): void {
  const moving = getPiece(board, move.from);
  if (!moving) return;

  const placed: Piece = isPromotionMove(moving, move)
    ? { color: moving.color, type: move.promotion ?? 'q' }
    : moving;

  setPiece(board, move.to, placed);
  setPiece(board, move.from, null);
}
