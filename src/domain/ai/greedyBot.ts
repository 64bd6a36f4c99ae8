import type { Board, Color, Move, Piece } from '../chessTypes';
import type { AiMoveRequest, AiMoveResult, ChessAi } from './types';

import { applyMove } from '../applyMove';
import { cloneBoard, getPiece } from '../board';
import { materialScore, pieceValue } from '../material';
import { generateMoves } from '../movegen';
import { defaultRng, makeSeededRng, pickRandom, type Rng } from './rng';

/**
 * One-ply material-greedy bot.
 *
 * Every pseudo-legal move is played on a cloned board and scored by the resulting
 * material balance plus a small bonus for what it captured. Ties are broken toward
 * the most valuable capture, then at random.
 */

/** Weight of the captured piece's value in a move's score. */
export const CAPTURE_BONUS_WEIGHT = 0.1;

export type ScoredMove = {
  move: Move;
  score: number;
  /** Piece standing on the destination before the move, if any. */
  captured: Piece | null;
};

/** Scores every candidate for `color`, in generation order. */
export function scoreMoves(board: Board, color: Color): ScoredMove[] {
  return generateMoves(board, color).map((move) => {
    // Read the victim before simulating.
    const captured = getPiece(board, move.to);
    const captureBonus = pieceValue(captured);

    const sim = cloneBoard(board);
    applyMove(sim, move);

    return { move, score: materialScore(sim, color) + CAPTURE_BONUS_WEIGHT * captureBonus, captured };
  });
}

/** All candidates sharing the maximal score (exact equality, no tolerance). */
export function bestScoredMoves(scored: readonly ScoredMove[]): ScoredMove[] {
  let bestScore = -Infinity;
  let best: ScoredMove[] = [];
  for (const s of scored) {
    if (s.score > bestScore) {
      bestScore = s.score;
      best = [s];
    } else if (s.score === bestScore) {
      best.push(s);
    }
  }
  return best;
}

/**
 * Narrow a tied set to the captures of the most valuable piece.
 * A captured king (worth 0) still counts as a capture. Empty when nothing is captured.
 */
export function mostValuableCaptures(best: readonly ScoredMove[]): ScoredMove[] {
  let captureBest: ScoredMove[] = [];
  let captureBestValue = 0;
  for (const s of best) {
    if (!s.captured) continue;
    const value = pieceValue(s.captured);
    if (value > captureBestValue) {
      captureBest = [s];
      captureBestValue = value;
    } else if (value === captureBestValue) {
      captureBest.push(s);
    }
  }
  return captureBest;
}

function pickScored(board: Board, color: Color, rng: Rng): { picked: ScoredMove; nodes: number; tied: number } | null {
  const scored = scoreMoves(board, color);
  if (scored.length === 0) return null;

  const best = bestScoredMoves(scored);
  const captures = mostValuableCaptures(best);
  const picked = pickRandom(captures.length > 0 ? captures : best, rng);
  if (!picked) return null;

  return { picked, nodes: scored.length, tied: best.length };
}

/**
 * Pick a move for `color`, or null when the side has no pseudo-legal move
 * (the caller decides whether that is a pass or the end of the game).
 *
 * The board is not mutated.
 */
export function chooseMove(board: Board, color: Color, rng: Rng = defaultRng): Move | null {
  return pickScored(board, color, rng)?.picked.move ?? null;
}

export class GreedyBot implements ChessAi {
  private readonly rngOverride: Rng | null;

  /** A fixed random source takes precedence over `config.seed`. */
  constructor(rng?: Rng) {
    this.rngOverride = rng ?? null;
  }

  getMove(request: AiMoveRequest): AiMoveResult | null {
    const t0 = typeof performance !== 'undefined' ? performance.now() : Date.now();

    const { board, aiColor, config } = request;
    const rng: Rng =
      this.rngOverride ?? (typeof config.seed === 'number' ? makeSeededRng(config.seed) : defaultRng);

    const result = pickScored(board, aiColor, rng);
    if (!result) return null;

    const t1 = typeof performance !== 'undefined' ? performance.now() : Date.now();

    return {
      move: result.picked.move,
      meta: {
        timeMs: Math.max(0, Math.round(t1 - t0)),
        nodes: result.nodes,
        score: result.picked.score,
        tiedMoves: result.tied
      }
    };
  }
}
