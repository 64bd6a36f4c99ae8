import type { Board, Color, Piece, PieceType } from './chessTypes';

export const PIECE_VALUE: Readonly<Record<PieceType, number>> = {
  p: 1,
  n: 3,
  b: 3,
  r: 5,
  q: 9,
  // The king is never traded, so it carries no material weight.
  k: 0
};

export function pieceValue(p: Piece | null): number {
  return p ? PIECE_VALUE[p.type] : 0;
}

/**
 * Signed material balance from `color`'s point of view.
 * materialScore(b, 'w') === -materialScore(b, 'b') for every board.
 */
export function materialScore(board: Board, color: Color): number {
  let s = 0;
  for (const p of board) {
    if (!p) continue;
    const v = PIECE_VALUE[p.type];
    s += p.color === color ? v : -v;
  }
  return s;
}
