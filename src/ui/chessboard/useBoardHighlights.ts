import { useCallback, useMemo } from 'react';

import type { Board, Move, Square } from '../../domain/chessTypes';
import { getPiece } from '../../domain/board';
import { squareIndex, squaresEqual } from '../../domain/square';

function isDarkSquare(square: Square): boolean {
  // Convention: a1 (rank 7, file 0) is dark.
  return (square.rank + square.file) % 2 === 1;
}

export type BoardHighlights = {
  getSquareClass: (sq: Square) => string;
  isLegalDestination: (sq: Square) => boolean;
};

export function useBoardHighlights(args: {
  board: Board;
  selectedSquare: Square | null;
  legalMoves: Move[];
  lastMove?: Move | null;
}): BoardHighlights {
  const { board, selectedSquare, legalMoves, lastMove } = args;

  const { legalDestinations, captureDestinations } = useMemo(() => {
    const legal = new Set<number>();
    const capture = new Set<number>();

    for (const m of legalMoves) {
      const idx = squareIndex(m.to);
      if (idx === null) continue;
      legal.add(idx);
      if (getPiece(board, m.to)) capture.add(idx);
    }

    return { legalDestinations: legal, captureDestinations: capture };
  }, [legalMoves, board]);

  const lastFrom = lastMove ? lastMove.from : null;
  const lastTo = lastMove ? lastMove.to : null;

  const isLegalDestination = useCallback(
    (sq: Square) => {
      const idx = squareIndex(sq);
      return idx !== null && legalDestinations.has(idx);
    },
    [legalDestinations]
  );

  const getSquareClass = useCallback(
    (sq: Square) => {
      const idx = squareIndex(sq);
      const isSelected = selectedSquare !== null && squaresEqual(selectedSquare, sq);
      const isLegal = idx !== null && legalDestinations.has(idx);
      const isCapture = idx !== null && captureDestinations.has(idx);
      const isLastFrom = lastFrom !== null && squaresEqual(lastFrom, sq);
      const isLastTo = lastTo !== null && squaresEqual(lastTo, sq);

      return [
        'boardSq',
        isDarkSquare(sq) ? 'boardSq-dark' : 'boardSq-light',
        isSelected ? 'boardSq-selected' : '',
        isLastFrom ? 'boardSq-lastFrom' : '',
        isLastTo ? 'boardSq-lastTo' : '',
        isLegal ? 'boardSq-legal' : '',
        isCapture ? 'boardSq-capture' : ''
      ]
        .filter(Boolean)
        .join(' ');
    },
    [captureDestinations, lastFrom, lastTo, legalDestinations, selectedSquare]
  );

  return { getSquareClass, isLegalDestination };
}
