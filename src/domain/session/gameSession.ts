import type { Board, Color, Move, Square } from '../chessTypes';
import { oppositeColor } from '../chessTypes';
import { applyMove } from '../applyMove';
import { cloneBoard, createStartingBoard, getPiece } from '../board';
import { generateMoves } from '../movegen';
import { squaresEqual } from '../square';
import type { AiConfig, ChessAi } from '../ai/types';

/**
 * Turn and selection bookkeeping for one game, without any rendering.
 *
 * The reducer never mutates its input: moves are applied to a cloned board, so the
 * state can back a React `useReducer` directly.
 */

export type SessionStatus =
  | { kind: 'inProgress' }
  /** `color` had no pseudo-legal move and passed. */
  | { kind: 'noMoves'; color: Color };

export type GameSession = {
  board: Board;
  sideToMove: Color;
  /** Side played by the bot, or null for two humans. */
  aiColor: Color | null;
  selectedSquare: Square | null;
  legalMovesFromSelection: Move[];
  lastMove: Move | null;
  status: SessionStatus;
};

export type GameSessionSetup = {
  aiColor?: Color | null;
};

export type SessionAction =
  | { type: 'newGame' }
  | { type: 'squareClicked'; square: Square }
  | { type: 'moveRequested'; move: Move }
  | { type: 'aiMoveApplied'; move: Move | null }
  | { type: 'passRequested' };

export const DEFAULT_AI_COLOR: Color = 'b';

export function createGameSession(setup: GameSessionSetup = {}): GameSession {
  return {
    board: createStartingBoard(),
    sideToMove: 'w',
    aiColor: setup.aiColor === undefined ? DEFAULT_AI_COLOR : setup.aiColor,
    selectedSquare: null,
    legalMovesFromSelection: [],
    lastMove: null,
    status: { kind: 'inProgress' }
  };
}

export function isAiTurn(state: GameSession): boolean {
  return state.aiColor !== null && state.sideToMove === state.aiColor;
}

export function hasAnyMove(state: GameSession): boolean {
  return generateMoves(state.board, state.sideToMove).length > 0;
}

function select(state: GameSession, square: Square): GameSession {
  return {
    ...state,
    selectedSquare: { ...square },
    legalMovesFromSelection: generateMoves(state.board, state.sideToMove, square)
  };
}

function clearSelection(state: GameSession): GameSession {
  if (!state.selectedSquare && state.legalMovesFromSelection.length === 0) return state;
  return { ...state, selectedSquare: null, legalMovesFromSelection: [] };
}

function commitMove(state: GameSession, move: Move): GameSession {
  const board = cloneBoard(state.board);
  applyMove(board, move);
  return {
    ...state,
    board,
    sideToMove: oppositeColor(state.sideToMove),
    selectedSquare: null,
    legalMovesFromSelection: [],
    lastMove: move,
    status: { kind: 'inProgress' }
  };
}

function passTurn(state: GameSession): GameSession {
  return {
    ...state,
    sideToMove: oppositeColor(state.sideToMove),
    selectedSquare: null,
    legalMovesFromSelection: [],
    status: { kind: 'noMoves', color: state.sideToMove }
  };
}

/** The generated move matching `move`'s origin and destination, with the requested promotion. */
function matchPseudoLegal(state: GameSession, move: Move): Move | null {
  const candidate = generateMoves(state.board, state.sideToMove, move.from).find((m) => squaresEqual(m.to, move.to));
  if (!candidate) return null;
  return move.promotion ? { ...candidate, promotion: move.promotion } : candidate;
}

function handleSquareClick(state: GameSession, square: Square): GameSession {
  if (isAiTurn(state)) return state;

  const piece = getPiece(state.board, square);
  const ownPiece = piece !== null && piece.color === state.sideToMove;

  if (!state.selectedSquare) {
    return ownPiece ? select(state, square) : state;
  }

  // Clicking another own piece reselects.
  if (ownPiece) return select(state, square);

  const move = state.legalMovesFromSelection.find((m) => squaresEqual(m.to, square));
  if (move) return commitMove(state, move);

  return clearSelection(state);
}

export function sessionReducer(state: GameSession, action: SessionAction): GameSession {
  switch (action.type) {
    case 'newGame':
      return createGameSession({ aiColor: state.aiColor });
    case 'squareClicked':
      return handleSquareClick(state, action.square);
    case 'moveRequested': {
      if (isAiTurn(state)) return state;
      const move = matchPseudoLegal(state, action.move);
      return move ? commitMove(state, move) : state;
    }
    case 'aiMoveApplied': {
      if (!isAiTurn(state)) return state;
      if (action.move === null) {
        return hasAnyMove(state) ? state : passTurn(state);
      }
      const move = matchPseudoLegal(state, action.move);
      return move ? commitMove(state, move) : state;
    }
    case 'passRequested':
      // Only a side without any move may pass.
      if (isAiTurn(state) || hasAnyMove(state)) return state;
      return passTurn(state);
    default:
      return state;
  }
}

/**
 * Let `bot` play the current turn if it belongs to the AI.
 * A bot without a move makes the side pass.
 */
export function playAiTurn(state: GameSession, bot: ChessAi, config: AiConfig = {}): GameSession {
  if (!isAiTurn(state) || state.aiColor === null) return state;
  const result = bot.getMove({ board: state.board, aiColor: state.aiColor, config });
  return sessionReducer(state, { type: 'aiMoveApplied', move: result ? result.move : null });
}
