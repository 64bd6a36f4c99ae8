import type { Board, Color, Piece, PieceType, Square } from './chessTypes';
import { BOARD_SIZE, squareIndex } from './square';

const BACK_RANK: readonly PieceType[] = ['r', 'n', 'b', 'q', 'k', 'b', 'n', 'r'];

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE * BOARD_SIZE }, () => null);
}

/** Reads a square. Off-board squares are always empty. */
export function getPiece(board: Board, square: Square): Piece | null {
  const idx = squareIndex(square);
  if (idx === null) return null;
  return board[idx] ?? null;
}

/** Writes a square in place. Writing off-board is a no-op. */
export function setPiece(board: Board, square: Square, piece: Piece | null): void {
  const idx = squareIndex(square);
  if (idx === null) return;
  board[idx] = piece;
}

function piece(color: Color, type: PieceType): Piece {
  return { color, type };
}

function fillRank(board: Board, rank: number, pieceAt: (file: number) => Piece | null) {
  for (let file = 0; file < BOARD_SIZE; file++) {
    board[rank * BOARD_SIZE + file] = pieceAt(file);
  }
}

/**
 * Standard chess starting position, written in place.
 *
 * Black occupies ranks 0-1, White ranks 6-7.
 */
export function resetBoard(board: Board): void {
  board.length = BOARD_SIZE * BOARD_SIZE;
  fillRank(board, 0, (file) => piece('b', BACK_RANK[file]));
  fillRank(board, 1, () => piece('b', 'p'));
  for (let rank = 2; rank < 6; rank++) {
    fillRank(board, rank, () => null);
  }
  fillRank(board, 6, () => piece('w', 'p'));
  fillRank(board, 7, (file) => piece('w', BACK_RANK[file]));
}

export function createStartingBoard(): Board {
  const b = createEmptyBoard();
  resetBoard(b);
  return b;
}

export function countPieces(board: Board): number {
  let n = 0;
  for (const sq of board) {
    if (sq) n++;
  }
  return n;
}

export function cloneBoard(board: Board): Board {
  return board.map((p) => (p ? { ...p } : null));
}
