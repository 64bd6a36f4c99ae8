import type { Board, Color, Move, Piece, Square } from './chessTypes';
import { getPiece } from './board';
import { BOARD_SIZE, isOnBoard, makeSquare } from './square';

/**
 * Pseudo-legal move generation.
 *
 * Pseudo-legal means: piece movement rules are respected, but king safety is NOT checked.
 * There is no castling and no en passant.
 */

type Delta = readonly [dRank: number, dFile: number];

const KNIGHT_DELTAS: readonly Delta[] = [
  [-2, -1],
  [-2, 1],
  [2, -1],
  [2, 1],
  [-1, -2],
  [-1, 2],
  [1, -2],
  [1, 2]
];

const BISHOP_DIRECTIONS: readonly Delta[] = [
  [-1, -1],
  [-1, 1],
  [1, -1],
  [1, 1]
];

const ROOK_DIRECTIONS: readonly Delta[] = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1]
];

const QUEEN_DIRECTIONS: readonly Delta[] = [...BISHOP_DIRECTIONS, ...ROOK_DIRECTIONS];

function offset(from: Square, [dRank, dFile]: Delta): Square {
  return makeSquare(from.rank + dRank, from.file + dFile);
}

function isEnemy(target: Piece | null, color: Color): boolean {
  return target !== null && target.color !== color;
}

function pushMove(moves: Move[], from: Square, to: Square) {
  moves.push({ from: { ...from }, to });
}

function addPawnMoves(board: Board, from: Square, piece: Piece, moves: Move[]) {
  const dir = piece.color === 'w' ? -1 : 1; // toward the opposing back rank
  const startRank = piece.color === 'w' ? 6 : 1;

  // Single push
  const one = offset(from, [dir, 0]);
  if (isOnBoard(one) && getPiece(board, one) === null) {
    pushMove(moves, from, one);

    // Double push from starting rank (only if single push is clear)
    const two = offset(from, [dir * 2, 0]);
    if (from.rank === startRank && isOnBoard(two) && getPiece(board, two) === null) {
      pushMove(moves, from, two);
    }
  }

  // Captures (diagonals). Promotion is resolved by applyMove.
  for (const dFile of [-1, 1]) {
    const cap = offset(from, [dir, dFile]);
    if (!isOnBoard(cap)) continue;
    if (isEnemy(getPiece(board, cap), piece.color)) {
      pushMove(moves, from, cap);
    }
  }
}

function addStepMoves(board: Board, from: Square, piece: Piece, moves: Move[], deltas: readonly Delta[]) {
  for (const delta of deltas) {
    const to = offset(from, delta);
    if (!isOnBoard(to)) continue;
    const target = getPiece(board, to);
    if (target === null || isEnemy(target, piece.color)) {
      pushMove(moves, from, to);
    }
  }
}

function addKingMoves(board: Board, from: Square, piece: Piece, moves: Move[]) {
  const deltas: Delta[] = [];
  for (let dRank = -1; dRank <= 1; dRank++) {
    for (let dFile = -1; dFile <= 1; dFile++) {
      if (dRank === 0 && dFile === 0) continue;
      deltas.push([dRank, dFile]);
    }
  }
  // No castling.
  addStepMoves(board, from, piece, moves, deltas);
}

function addSlidingMoves(board: Board, from: Square, piece: Piece, moves: Move[], directions: readonly Delta[]) {
  for (const direction of directions) {
    let to = offset(from, direction);
    while (isOnBoard(to)) {
      const target = getPiece(board, to);
      if (!target) {
        pushMove(moves, from, to);
      } else {
        if (target.color !== piece.color) {
          pushMove(moves, from, to);
        }
        break; // blocked
      }
      to = offset(to, direction);
    }
  }
}

function addMovesFromSquare(board: Board, color: Color, from: Square, moves: Move[]) {
  const piece = getPiece(board, from);
  if (!piece) return;
  if (piece.color !== color) return;

  switch (piece.type) {
    case 'p':
      addPawnMoves(board, from, piece, moves);
      break;
    case 'n':
      addStepMoves(board, from, piece, moves, KNIGHT_DELTAS);
      break;
    case 'b':
      addSlidingMoves(board, from, piece, moves, BISHOP_DIRECTIONS);
      break;
    case 'r':
      addSlidingMoves(board, from, piece, moves, ROOK_DIRECTIONS);
      break;
    case 'q':
      addSlidingMoves(board, from, piece, moves, QUEEN_DIRECTIONS);
      break;
    case 'k':
      addKingMoves(board, from, piece, moves);
      break;
  }
}

/**
 * Generates pseudo-legal moves for `color`, in board scan order (rank 0 first, then by file).
 *
 * If `fromSquare` is provided, only moves from that square are generated; an empty,
 * off-board or opponent-owned origin yields no moves. The board is never mutated.
 */
export function generateMoves(board: Board, color: Color, fromSquare?: Square): Move[] {
  const moves: Move[] = [];
  if (fromSquare) {
    addMovesFromSquare(board, color, fromSquare, moves);
    return moves;
  }

  for (let rank = 0; rank < BOARD_SIZE; rank++) {
    for (let file = 0; file < BOARD_SIZE; file++) {
      addMovesFromSquare(board, color, makeSquare(rank, file), moves);
    }
  }
  return moves;
}
