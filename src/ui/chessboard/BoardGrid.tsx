import type { Board, Square } from '../../domain/chessTypes';
import { getPiece } from '../../domain/board';
import { BOARD_SIZE, FILES, allSquares, squareIndex } from '../../domain/square';
import { SquareButton } from './SquareButton';

const RANK_LABELS = Array.from({ length: BOARD_SIZE }, (_, rank) => BOARD_SIZE - rank);

export function BoardGrid(props: {
  board: Board;
  disabled?: boolean;
  getSquareClass: (sq: Square) => string;
  isLegalDestination: (sq: Square) => boolean;
  squareAriaLabel: (sq: Square) => string;
  onSquareClick: (sq: Square) => void;
}) {
  const { board, disabled, getSquareClass, isLegalDestination, squareAriaLabel, onSquareClick } = props;

  return (
    <div className="boardWrap">
      <div className="boardCoords boardCoords-top" aria-hidden>
        {FILES.map((f) => (
          <div key={f} className="coord">
            {f}
          </div>
        ))}
      </div>

      <div className="boardRow">
        <div className="boardCoords boardCoords-left" aria-hidden>
          {RANK_LABELS.map((r) => (
            <div key={r} className="coord">
              {r}
            </div>
          ))}
        </div>

        <div className="board" role="grid" aria-label="Chess board">
          {/* Rank 0 is drawn first, at the top. */}
          {allSquares().map((sq) => {
            const piece = getPiece(board, sq);
            return (
              <SquareButton
                key={squareIndex(sq) ?? -1}
                className={getSquareClass(sq)}
                ariaLabel={squareAriaLabel(sq)}
                disabled={disabled}
                piece={piece}
                showHintDot={isLegalDestination(sq) && !piece}
                onClick={() => onSquareClick(sq)}
              />
            );
          })}
        </div>
      </div>
    </div>
  );
}
