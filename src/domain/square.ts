import type { Square } from './chessTypes';

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

export const BOARD_SIZE = 8;

export function makeSquare(rank: number, file: number): Square {
  return { rank, file };
}

export function isOnBoard(square: Square): boolean {
  const { rank, file } = square;
  return (
    Number.isInteger(rank) &&
    Number.isInteger(file) &&
    rank >= 0 &&
    rank < BOARD_SIZE &&
    file >= 0 &&
    file < BOARD_SIZE
  );
}

/** Row-major cell index, or null for off-board squares. */
export function squareIndex(square: Square): number | null {
  if (!isOnBoard(square)) return null;
  return square.rank * BOARD_SIZE + square.file;
}

export function squareFromIndex(index: number): Square {
  return { rank: Math.floor(index / BOARD_SIZE), file: index % BOARD_SIZE };
}

export function squaresEqual(a: Square, b: Square): boolean {
  return a.rank === b.rank && a.file === b.file;
}

/** All 64 squares in scan order (rank 0 first, file a first). */
export function allSquares(): Square[] {
  return Array.from({ length: BOARD_SIZE * BOARD_SIZE }, (_, i) => squareFromIndex(i));
}

/**
 * Algebraic name of a square: rank 0 is the 8th rank.
 * Off-board squares render as "-".
 */
export function toAlgebraic(square: Square): string {
  if (!isOnBoard(square)) return '-';
  return `${FILES[square.file]}${BOARD_SIZE - square.rank}`;
}

export function parseAlgebraicSquare(text: string): Square | null {
  if (typeof text !== 'string') return null;
  const t = text.trim().toLowerCase();
  if (t.length !== 2) return null;

  const file = FILES.findIndex((f) => f === t[0]);
  const r = Number(t[1]);
  if (file < 0) return null;
  if (!Number.isInteger(r) || r < 1 || r > 8) return null;
  return makeSquare(BOARD_SIZE - r, file);
}
