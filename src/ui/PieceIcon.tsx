import type { Color, PieceType } from '../domain/chessTypes';

type Props = {
  type: PieceType;
  color: Color;
  className?: string;
  ariaHidden?: boolean;
  title?: string;
};

const GLYPHS: Record<Color, Record<PieceType, string>> = {
  w: { k: '♔', q: '♕', r: '♖', b: '♗', n: '♘', p: '♙' },
  b: { k: '♚', q: '♛', r: '♜', b: '♝', n: '♞', p: '♟' }
};

/**
 * Unicode chess glyphs, so the board needs no image assets.
 */
export function PieceIcon(props: Props) {
  const { type, color, className, ariaHidden, title } = props;

  const label = ariaHidden ? undefined : title ?? `${color === 'w' ? 'White' : 'Black'} ${pieceName(type)}`;

  return (
    <span
      className={['pieceGlyph', color === 'w' ? 'pieceGlyph-white' : 'pieceGlyph-black', className ?? '']
        .filter(Boolean)
        .join(' ')}
      role={ariaHidden ? undefined : 'img'}
      aria-label={label}
      aria-hidden={ariaHidden ? true : undefined}
    >
      {GLYPHS[color][type]}
    </span>
  );
}

export default PieceIcon;

export function pieceName(type: PieceType) {
  switch (type) {
    case 'p':
      return 'pawn';
    case 'n':
      return 'knight';
    case 'b':
      return 'bishop';
    case 'r':
      return 'rook';
    case 'q':
      return 'queen';
    case 'k':
      return 'king';
  }
}
