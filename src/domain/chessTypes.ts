/**
 * Core chess domain types.
 *
 * Keep these types UI-agnostic and JSON-serializable.
 */

/** Color: white ('w') or black ('b'). */
export type Color = 'w' | 'b';

/**
 * Piece types are stored in lowercase, similar to FEN, but without color.
 * - p pawn
 * - n knight
 * - b bishop
 * - r rook
 * - q queen
 * - k king
 */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

export type Piece = {
  readonly color: Color;
  readonly type: PieceType;
};

/**
 * Board coordinate.
 *
 * Convention:
 * - rank 0 is Black's back rank (drawn at the top), rank 7 is White's
 * - file 0 is the a-file
 *
 * Off-board coordinates are representable; every board query treats them as empty.
 */
export type Square = {
  rank: number;
  file: number;
};

/**
 * A move is just an origin and a destination.
 *
 * Captures are not flagged: whatever sits on `to` before the move is the captured piece.
 */
export type Move = {
  from: Square;
  to: Square;
  /**
   * Piece a pawn becomes on the last rank. Defaults to a queen when absent.
   * Not validated: any piece type is accepted.
   */
  promotion?: PieceType;
};

/**
 * 64 cells in row-major order (index = rank * 8 + file).
 *
 * There are deliberately no castling rights, en passant target or move counters.
 */
export type Board = Array<Piece | null>;

export function oppositeColor(c: Color): Color {
  return c === 'w' ? 'b' : 'w';
}
