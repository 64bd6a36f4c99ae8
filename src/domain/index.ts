export type { Board, Color, Move, Piece, PieceType, Square } from './chessTypes';

export { oppositeColor } from './chessTypes';

export {
  BOARD_SIZE,
  FILES,
  allSquares,
  isOnBoard,
  makeSquare,
  parseAlgebraicSquare,
  squareFromIndex,
  squareIndex,
  squaresEqual,
  toAlgebraic
} from './square';

export {
  cloneBoard,
  countPieces,
  createEmptyBoard,
  createStartingBoard,
  getPiece,
  resetBoard,
  setPiece
} from './board';

export { PIECE_VALUE, materialScore, pieceValue } from './material';

export { applyMove } from './applyMove';

export { generateMoves } from './movegen';

export type { PlacementParseResult } from './notation/placement';
export { fromPlacement, toPlacement, tryParsePlacement } from './notation/placement';

export type { Rng } from './ai/rng';
export { defaultRng, makeSeededRng, pickRandom } from './ai/rng';
export type { AiConfig, AiMoveMetadata, AiMoveRequest, AiMoveResult, ChessAi } from './ai/types';
export type { ScoredMove } from './ai/greedyBot';
export {
  CAPTURE_BONUS_WEIGHT,
  GreedyBot,
  bestScoredMoves,
  chooseMove,
  mostValuableCaptures,
  scoreMoves
} from './ai/greedyBot';

export type { GameSession, GameSessionSetup, SessionAction, SessionStatus } from './session/gameSession';
export {
  DEFAULT_AI_COLOR,
  createGameSession,
  hasAnyMove,
  isAiTurn,
  playAiTurn,
  sessionReducer
} from './session/gameSession';
