import type { Board, Move, Piece, Square } from '../domain/chessTypes';
import { getPiece } from '../domain/board';
import { toAlgebraic } from '../domain/square';

import { useCallback } from 'react';
import { pieceName } from './PieceIcon';
import { BoardGrid } from './chessboard/BoardGrid';
import { useBoardHighlights } from './chessboard/useBoardHighlights';

export type ChessBoardProps = {
  board: Board;
  selectedSquare: Square | null;
  legalMovesFromSelection: Move[];
  /** Last move played (for highlighting). */
  lastMove?: Move | null;
  /** When a square is clicked (selection / move attempt). */
  onSquareClick: (square: Square) => void;
  /** Disable interaction (e.g. while the bot is to move). */
  disabled?: boolean;
};

function describePiece(piece: Piece): string {
  return `${piece.color === 'w' ? 'white' : 'black'} ${pieceName(piece.type)}`;
}

function squareAriaLabel(board: Board, square: Square): string {
  const alg = toAlgebraic(square);
  const piece = getPiece(board, square);
  if (!piece) return `Square ${alg}`;
  return `Square ${alg}, ${describePiece(piece)}`;
}

export function ChessBoard({
  board,
  selectedSquare,
  legalMovesFromSelection,
  lastMove,
  onSquareClick,
  disabled
}: ChessBoardProps) {
  const highlights = useBoardHighlights({
    board,
    selectedSquare,
    legalMoves: legalMovesFromSelection,
    lastMove
  });

  const squareAria = useCallback((sq: Square) => squareAriaLabel(board, sq), [board]);

  return (
    <BoardGrid
      board={board}
      disabled={disabled}
      getSquareClass={highlights.getSquareClass}
      isLegalDestination={highlights.isLegalDestination}
      squareAriaLabel={squareAria}
      onSquareClick={onSquareClick}
    />
  );
}
