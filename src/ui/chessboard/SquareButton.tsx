import type { Piece } from '../../domain/chessTypes';
import { PieceIcon } from '../PieceIcon';

export function SquareButton(props: {
  className: string;
  ariaLabel: string;
  disabled?: boolean;
  piece: Piece | null;
  showHintDot: boolean;
  onClick: () => void;
}) {
  const { className, ariaLabel, disabled, piece, showHintDot, onClick } = props;

  return (
    <button type="button" className={className} aria-label={ariaLabel} onClick={onClick} disabled={disabled}>
      <span className="boardPiece" aria-hidden>
        {piece ? <PieceIcon ariaHidden color={piece.color} type={piece.type} /> : null}
      </span>
      {/* Hint dots for legal moves. */}
      {showHintDot ? <span className="boardHint" aria-hidden /> : null}
    </button>
  );
}
