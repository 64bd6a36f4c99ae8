import type { Board, Color, Piece } from '../chessTypes';
import { createEmptyBoard } from '../board';
import { BOARD_SIZE } from '../square';

/**
 * FEN-style piece placement ("rnbqkbnr/pppppppp/8/...").
 *
 * Ranks are written top to bottom, i.e. starting from rank 0 (Black's back rank).
 * Only the placement field exists: the board keeps no side to move, castling or clocks.
 */

export type PlacementParseResult =
  | { ok: true; value: Board }
  | { ok: false; error: string };

function pieceToChar(p: Piece): string {
  const c = p.type;
  return p.color === 'w' ? c.toUpperCase() : c;
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function charToPiece(ch: string): Piece | null {
  const lower = ch.toLowerCase();
  const color: Color = ch === lower ? 'b' : 'w';
  if (lower === 'p' || lower === 'n' || lower === 'b' || lower === 'r' || lower === 'q' || lower === 'k') {
    return { color, type: lower };
  }
  return null;
}

export function toPlacement(board: Board): string {
  const ranks: string[] = [];

  for (let r = 0; r < BOARD_SIZE; r++) {
    let empty = 0;
    let out = '';
    for (let f = 0; f < BOARD_SIZE; f++) {
      const p = board[r * BOARD_SIZE + f];
      if (!p) {
        empty++;
      } else {
        if (empty > 0) {
          out += String(empty);
          empty = 0;
        }
        out += pieceToChar(p);
      }
    }
    if (empty > 0) out += String(empty);
    ranks.push(out);
  }

  return ranks.join('/');
}

export function tryParsePlacement(text: string): PlacementParseResult {
  if (typeof text !== 'string' || text.trim().length === 0) {
    return { ok: false, error: 'Placement must be a non-empty string' };
  }

  // Accept a full FEN and keep only its first field.
  const placement = text.trim().split(/\s+/)[0];
  const ranks = placement.split('/');
  if (ranks.length !== BOARD_SIZE) return { ok: false, error: 'Placement must have 8 ranks' };

  const board = createEmptyBoard();
  for (let r = 0; r < BOARD_SIZE; r++) {
    const row = ranks[r];
    let file = 0;
    for (const ch of row) {
      if (isDigit(ch)) {
        const n = Number(ch);
        if (n < 1 || n > 8) return { ok: false, error: `Invalid digit in rank ${BOARD_SIZE - r}` };
        file += n;
        if (file > BOARD_SIZE) return { ok: false, error: `Too many squares in rank ${BOARD_SIZE - r}` };
        continue;
      }

      const p = charToPiece(ch);
      if (!p) return { ok: false, error: `Invalid piece char "${ch}" in rank ${BOARD_SIZE - r}` };
      if (file >= BOARD_SIZE) return { ok: false, error: `Too many squares in rank ${BOARD_SIZE - r}` };
      board[r * BOARD_SIZE + file] = p;
      file++;
    }
    if (file !== BOARD_SIZE) return { ok: false, error: `Rank ${BOARD_SIZE - r} does not have 8 files` };
  }

  return { ok: true, value: board };
}

export function fromPlacement(text: string): Board {
  const r = tryParsePlacement(text);
  if (!r.ok) throw new Error(r.error);
  return r.value;
}
